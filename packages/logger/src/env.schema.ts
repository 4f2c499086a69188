import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ConsoleSink } from './sinks/console.js';
import { PinoSink } from './sinks/pino.js';
import { initLogger, LOG_LEVELS, type LogLevel, type Sink } from './logger.js';

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val: string) => LOG_LEVELS.some((level) => level === val), { message: 'Invalid log level' })
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1).default('relaypress'),
  LOGGER_SINK: z.enum(['console', 'pino', 'none']).default('none'),
  LOGGER_CONSOLE_COLOR: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): Result<LoggerEnvConfig, Error> {
  const parsed = loggerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    return err(new Error(`Logger environment validation failed:\n${issues}`));
  }
  return ok(parsed.data);
}

function toLogLevel(value: string): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

/**
 * Configure the global logger from LOGGER_* variables.
 * LOGGER_SINK=none keeps the logger silent.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): Result<LoggerEnvConfig, Error> {
  return validateLoggerEnv(env).map((config) => {
    const sinks: Sink[] = [];
    if (config.LOGGER_SINK === 'console') {
      sinks.push(new ConsoleSink({ color: config.LOGGER_CONSOLE_COLOR }));
    } else if (config.LOGGER_SINK === 'pino') {
      sinks.push(new PinoSink({ serviceName: config.LOGGER_SERVICE_NAME }));
    }
    initLogger({ level: toLogLevel(config.LOGGER_LOG_LEVEL), sinks });
    return config;
  });
}
