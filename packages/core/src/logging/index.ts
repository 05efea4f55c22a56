export { Logger } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export {
  LOG_LEVEL_ENV,
  LOG_FORMAT_ENV,
  loggingConfigSchema,
  loadLoggingConfig,
  createLogger,
} from './config.js';
export type { LoggingConfig } from './config.js';
