/**
 * Structured JSON logger: one JSON object per line on stdout (stderr for
 * errors), so a generation run can be piped straight into jq or a log drain.
 *
 * Child loggers bind fields (job, runId, businessDate) that are merged into
 * every entry they emit.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogFields {
  job?: string;
  runId?: string;
  businessDate?: string;
  orderId?: string;
  catalogItemId?: string;
  durationMs?: number;
  error?: {
    code?: string;
    kind?: string;
    message: string;
  };
  [key: string]: unknown;
}

export interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

let minLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

const stdioSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
};

let sink: LogSink = stdioSink;

/** Redirects every logger to `next`. Returns a function restoring the previous sink. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

export function log(level: LogLevel, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return;
  sink({
    ...fields,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}

export function createLogger(bindings: LogFields = {}): Logger {
  const emit = (level: LogLevel) => (message: string, fields?: LogFields) =>
    log(level, message, { ...bindings, ...fields });
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger: Logger = createLogger();
