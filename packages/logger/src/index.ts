export {
  initLogger,
  getLogger,
  flushLoggers,
  serializeContext,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { initLoggerFromEnv } from './bootstrap.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
export { PinoSink, type PinoSinkOptions } from './sinks/pino.js';
