export {
  initLogger,
  getLogger,
  flushLoggers,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, formatConsoleLine, type ConsoleSinkOptions } from './sinks/console.js';
export { PinoSink, type PinoSinkOptions } from './sinks/pino.js';
export { initLoggerFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
