export type { LinkMetadata, TargetDescription, ArtifactMap } from './link_metadata';
export { LINK_METADATA, LINK_TYPE, LINK_FORMAT_VERSION, linkFilename } from './link_metadata';
export { LinkMetadataBuilder } from './link_builder';
