export * from './detection/index.js';
export {
  ConfigManager,
  getDefaultConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateConfig
} from './config/index.js';
export type {
  AppConfig,
  ConfigReloadEvent,
  DetectionConfig,
  GridDetectConfig,
  LoggingConfig
} from './config/index.js';
export {
  default as logger,
  getAvailableLogLevels,
  getLogLevel,
  getLogLevelMetrics,
  onLogLevelChange,
  setLogLevel
} from './logger.js';
export { default as metrics, MetricsRegistry } from './metrics/index.js';
