export {
  logger,
  log,
  createLogger,
  setLogLevel,
  getLogLevel,
  setLogSink,
  isLogLevel,
} from './observability/logger';
export type { Logger, LogEntry, LogFields, LogLevel, LogSink } from './observability/logger';
export { loadRuntimeConfig, getRuntimeConfig } from './config';
export type { RuntimeConfig } from './config';
