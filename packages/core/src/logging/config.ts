import { z } from 'zod';
import { parseConfig } from '../validation/index.js';
import { Logger } from './logger.js';

export const LOG_LEVEL_ENV = 'FIELDBRIDGE_LOG_LEVEL';
export const LOG_FORMAT_ENV = 'FIELDBRIDGE_LOG_FORMAT';

export const loggingConfigSchema = z
  .object({
    [LOG_LEVEL_ENV]: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    [LOG_FORMAT_ENV]: z.enum(['text', 'json']).default('text'),
  })
  .transform((env) => ({
    level: env[LOG_LEVEL_ENV],
    format: env[LOG_FORMAT_ENV],
  }));

export type LoggingConfig = z.output<typeof loggingConfigSchema>;

/**
 * Read logging settings from the environment. Empty values count as unset.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const level = env[LOG_LEVEL_ENV] || undefined;
  const format = env[LOG_FORMAT_ENV] || undefined;
  return parseConfig(
    loggingConfigSchema,
    { [LOG_LEVEL_ENV]: level, [LOG_FORMAT_ENV]: format },
    'Invalid logging environment'
  );
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return new Logger(loadLoggingConfig(env));
}
