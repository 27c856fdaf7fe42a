/**
 * tracehound library entry point.
 */

export * from './types/index.js';
export * from './detection/index.js';
export * from './ingestion/index.js';
export * from './analysis/index.js';
export * from './reporting/index.js';
export {
  loadConfig,
  parseConfig,
  defaultConfig,
  mergeCliOptions,
  resolveConfigPath,
  CONFIG_ENV_VAR,
  type ConfigOverrides,
} from './config/loader.js';
export {
  TracehoundError,
  LogSourceError,
  ConfigError,
  type TracehoundErrorCode,
} from './utils/errors.js';
export { createLogger, setLogLevel, type Logger } from './utils/logger.js';
