export {
  AppConfigSchema,
  LogLevelSchema,
  DEFAULTS,
  type AppConfig,
  type LoggingConfig,
  type RetryConfig,
  type LockConfig,
} from "./app-config.js";
export {
  BOX_NAME_PATTERN,
  ARCHIVE_STORAGE_CLASSES,
  BackendConfigSchema,
  BoxConfigSchema,
  LocalBackendConfigSchema,
  WebDavBackendConfigSchema,
  ObjectStoreBackendConfigSchema,
  ObjectStoreStorageClass,
  RetrievalTier,
  isArchiveStorageClass,
  type BackendConfig,
  type BackendConfigInput,
  type BoxConfig,
  type LocalBackendConfig,
  type WebDavBackendConfig,
  type ObjectStoreBackendConfig,
  type RetrievalTierName,
  type StorageClassName,
} from "./box-config.js";
