export { appPaths } from './appPaths';
export {
  loadEnvironmentConfig,
  validateEnvironmentConfig,
  getConfigSummary,
  ConfigValidationError,
  type EnvironmentConfig,
  type ServerConfig,
  type UploadConfig,
  type ToolConfig,
  type StorageConfig,
  type LoggingConfig
} from './environment';
