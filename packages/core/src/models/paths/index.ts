export { safePath, isSafePath } from './safe_path';
export { MetadataPath } from './metadata_path';
export { TargetPath } from './target_path';
