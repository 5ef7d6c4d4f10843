export {
  initLogger,
  getLogger,
  flushLoggers,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { loggerEnvSchema, resolveLogLevel, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
