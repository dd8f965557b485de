import signedMetadataSchema from './signed_metadata.schema.json';
import linkMetadataSchema from './link_metadata.schema.json';
import targetsMetadataSchema from './targets_metadata.schema.json';
import publicKeySchema from './public_key.schema.json';
import metablockConfigSchema from './metablock_config.schema.json';

export const Schemas = {
  SignedMetadata: signedMetadataSchema,
  LinkMetadata: linkMetadataSchema,
  TargetsMetadata: targetsMetadataSchema,
  PublicKey: publicKeySchema,
  MetablockConfig: metablockConfigSchema,
};

export { SchemaValidationCache, assertSchema, formatSchemaErrors } from './schema_cache';
