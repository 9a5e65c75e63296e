export {
  flushLoggers,
  getLogger,
  initLogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogMethod,
  type Logger,
  type LoggerConfig,
  type Sink,
} from './logger.js';
export { ConsoleSink, formatJsonLine, formatLogLine, type ConsoleFormat, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
export { loggerConfigFromEnv, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
