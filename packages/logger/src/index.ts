export {
  flushLoggers,
  getLogger,
  initLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type Sink,
} from './logger.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, type ConsoleSinkOptions, type TextStream } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
