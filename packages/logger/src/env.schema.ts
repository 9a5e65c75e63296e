import { z } from 'zod';

import type { LoggerConfig } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('warn'),
  LOGGER_CONSOLE_ENABLED: flag(true),
  LOGGER_CONSOLE_COLOR: flag(false),
  LOGGER_CONSOLE_FORMAT: z.enum(['text', 'json']).default('text'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate the LOGGER_* environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Logger environment validation failed:\n${problems.join('\n')}`);
  }
  return result.data;
}

export function loggerConfigFromEnv(env: LoggerEnvConfig): LoggerConfig {
  if (!env.LOGGER_CONSOLE_ENABLED) {
    return { level: env.LOGGER_LOG_LEVEL, sinks: [] };
  }
  return {
    level: env.LOGGER_LOG_LEVEL,
    sinks: [new ConsoleSink({ color: env.LOGGER_CONSOLE_COLOR, format: env.LOGGER_CONSOLE_FORMAT })],
  };
}
