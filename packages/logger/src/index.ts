export {
  initLogger,
  getLogger,
  flushLoggers,
  serializeContext,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { MemorySink } from './sinks/memory.js';
