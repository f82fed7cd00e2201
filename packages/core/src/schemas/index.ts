export {
  PipelineConfigSchema,
  ToleranceSettingSchema,
  StorageBackend,
  LocalStorageConfigSchema,
  HttpStorageConfigSchema,
  type PipelineConfig,
  type LoggingConfig,
  type ValidationConfig,
  type ShardingConfig,
  type UploadConfig,
  type StorageConfig,
  type ToleranceSetting,
} from "./pipeline-config.js";
