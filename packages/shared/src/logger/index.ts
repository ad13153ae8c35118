export const LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['text', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
}

export type LogWriter = (entry: LogEntry) => void;
export type Clock = () => string;

export interface LogSink {
  write: (chunk: string) => unknown;
}

export interface Logger {
  log: (level: LogLevel, message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warning: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  fatal: (message: string, context?: LogContext) => void;
  withContext: (context: LogContext) => Logger;
}

export interface CreateLoggerOptions {
  baseContext?: LogContext;
  writer?: LogWriter;
  now?: Clock;
  minLevel?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export function createJsonWriter(sink: LogSink): LogWriter {
  return (entry) => {
    sink.write(`${JSON.stringify(entry)}\n`);
  };
}

export function formatTextEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(7);
  const hasContext = Object.keys(entry.context).length > 0;
  const context = hasContext ? ` ${JSON.stringify(entry.context)}` : '';
  return `${entry.timestamp} ${level} ${entry.message}${context}`;
}

export function createTextWriter(sink: LogSink): LogWriter {
  return (entry) => {
    sink.write(`${formatTextEntry(entry)}\n`);
  };
}

function defaultWriter(entry: LogEntry): void {
  process.stdout.write(`${JSON.stringify(entry)}\n`);
}

function defaultNow(): string {
  return new Date().toISOString();
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const baseContext = options.baseContext ?? {};
  const writer = options.writer ?? defaultWriter;
  const now = options.now ?? defaultNow;
  const minLevel = options.minLevel ?? 'debug';

  const write = (level: LogLevel, message: string, context: LogContext = {}): void => {
    if (!isLogLevelEnabled(level, minLevel)) {
      return;
    }
    writer({
      timestamp: now(),
      level,
      message,
      context: { ...baseContext, ...context },
    });
  };

  return {
    log: write,
    debug: (message, context) => {
      write('debug', message, context);
    },
    info: (message, context) => {
      write('info', message, context);
    },
    warning: (message, context) => {
      write('warning', message, context);
    },
    error: (message, context) => {
      write('error', message, context);
    },
    fatal: (message, context) => {
      write('fatal', message, context);
    },
    withContext: (context) =>
      createLogger({
        baseContext: { ...baseContext, ...context },
        writer,
        now,
        minLevel,
      }),
  };
}
