export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const resolveLevel = (): LogLevel => {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
};

const shouldLog = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLevel()];

const formatMessage = (level: LogLevel, scope: string, message: string, meta?: Record<string, unknown>): string => {
  const tag = level.toUpperCase().padEnd(5);
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  return `[${new Date().toISOString()}] ${tag} [${scope}] ${message}${metaStr}`;
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const createLogger = (scope: string): Logger => ({
  debug: (message, meta) => {
    if (shouldLog('debug')) console.log(formatMessage('debug', scope, message, meta));
  },
  info: (message, meta) => {
    if (shouldLog('info')) console.log(formatMessage('info', scope, message, meta));
  },
  warn: (message, meta) => {
    if (shouldLog('warn')) console.warn(formatMessage('warn', scope, message, meta));
  },
  error: (message, meta) => {
    if (shouldLog('error')) console.error(formatMessage('error', scope, message, meta));
  }
});
