import pino, { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return pino({
    name,
    level: process.env.LOG_LEVEL ?? 'info',
    ...options
  });
}
