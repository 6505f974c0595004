/* eslint-disable no-console */
type LogLevel = 'debug' | 'info' | 'error' | 'warn';

const formatMessage = (level: LogLevel, message: string) => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

const isProduction = () => (process.env.NODE_ENV || 'development') === 'production';

export const logger = {
  debug: (message: string, payload?: unknown) => {
    if (isProduction()) {
      return;
    }
    if (payload !== undefined) {
      console.debug(formatMessage('debug', message), payload);
    } else {
      console.debug(formatMessage('debug', message));
    }
  },
  info: (message: string, payload?: unknown) => {
    if (payload !== undefined) {
      console.log(formatMessage('info', message), payload);
    } else {
      console.log(formatMessage('info', message));
    }
  },
  warn: (message: string, payload?: unknown) => {
    if (payload !== undefined) {
      console.warn(formatMessage('warn', message), payload);
    } else {
      console.warn(formatMessage('warn', message));
    }
  },
  error: (message: string, payload?: unknown) => {
    if (payload !== undefined) {
      console.error(formatMessage('error', message), payload);
    } else {
      console.error(formatMessage('error', message));
    }
  },
};

export type ScopedLogger = typeof logger;

export const createScopedLogger = (scope: string): ScopedLogger => ({
  debug: (message: string, payload?: unknown) => logger.debug(`[${scope}] ${message}`, payload),
  info: (message: string, payload?: unknown) => logger.info(`[${scope}] ${message}`, payload),
  warn: (message: string, payload?: unknown) => logger.warn(`[${scope}] ${message}`, payload),
  error: (message: string, payload?: unknown) => logger.error(`[${scope}] ${message}`, payload),
});
