export type { MetadataType, MetadataFormat } from './metadata.types';
export { defineFormat } from './metadata.types';
export { RawSignedMetadata, SignedMetadata } from './signed_metadata';
export { SignedMetadataBuilder } from './signed_metadata_builder';
export type { VerificationEvent, VerificationObserver } from './verification_observer';
export { createLoggingObserver, collectVerificationEvents, defaultVerificationObserver } from './verification_observer';
