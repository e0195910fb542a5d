export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  sink?: LogSink;
  // merged into every record, e.g. { component: 'quota-gate' }
  fields?: LogData;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    default:
      console.debug(line);
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const { enabled = true, level = 'info', sink = consoleSink, fields = {} } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (recordLevel: LogLevel, message: string, data?: LogData) => {
    if (!enabled || LEVEL_ORDER[recordLevel] < threshold) return;
    const record = {
      ...fields,
      ...data,
      timestamp: new Date().toISOString(),
      level: recordLevel,
      message,
    };
    sink(recordLevel, JSON.stringify(record, errorReplacer));
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const silentLogger: Logger = createLogger({ enabled: false });

// Error properties are non-enumerable and would serialize as {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
