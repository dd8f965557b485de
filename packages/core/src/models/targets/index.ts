export type { TargetsMetadata, TargetInfo } from './targets_metadata';
export {
  TARGETS_METADATA,
  TARGETS_TYPE,
  describeTarget,
  createTargetsMetadata,
  targetPaths,
  hashPrefixedPaths,
  isExpired
} from './targets_metadata';
