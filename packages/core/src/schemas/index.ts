export {
  DEFAULTS,
  StorageModeSchema,
  ModeSelectionSchema,
  StorageConfigSchema,
  type StorageMode,
  type ModeSelection,
  type StorageConfig,
  type LoggingConfig,
} from "./storage-config.js";
