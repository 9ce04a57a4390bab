export { PolicyIdentity, ATTACHMENT_KINDS, SYSTEM_MANAGED_PREFIX, isAttachmentKind } from './policy/identity.js';
export type { AttachmentKind, PolicyProvenance } from './policy/identity.js';
export {
  LINE_BREAK_MARKER,
  createPolicyDetail,
  formatPolicyDocument,
  hashDocumentText,
  unflattenDocumentText,
} from './policy/detail.js';
export type { PolicyDescriptor, PolicyDetail } from './policy/detail.js';
export { PolicyDetailResolver } from './policy/resolver.js';
export type { ResolverStats } from './policy/resolver.js';
export { groupPolicies, indexGroups } from './policy/attachments.js';
export { CacheStore, CACHE_OBJECT_KEY, serializeCache, deserializeCache } from './cache/store.js';
export { S3CacheTarget } from './cache/s3-target.js';
export type { S3CacheTargetOptions } from './cache/s3-target.js';
export type { CacheState, CacheStoreOptions, PolicyDetailMap, RemoteCacheTarget } from './cache/types.js';
export { IamPolicySource, decodePolicyDocument } from './aws/iam-source.js';
export type { PolicySource } from './aws/iam-source.js';
export { loadLedgerConfig, readConfigFile, DEFAULT_CONFIG_FILE } from './config/config.js';
export type { LedgerConfig, ConfigOverrides } from './config/types.js';
export { PolicyLedgerError, InvalidAttachmentKindError, CacheLoadError } from './shared/errors.js';
export { logger, setLogLevel } from './shared/logger.js';
export type { LogLevel } from './shared/logger.js';
