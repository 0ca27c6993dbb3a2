import pino from 'pino';
import { env } from '../config/environment';

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

type Level = keyof Logger;

const base = pino({
  level: env.LOG_LEVEL ?? (env.ENVIRONMENT === 'DEBUG' ? 'debug' : 'info'),
  transport:
    env.ENVIRONMENT === 'DEBUG'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
          }
        }
      : undefined
});

function write(level: Level, message: string, meta?: unknown): void {
  if (meta === undefined) {
    base[level](message);
  } else if (meta instanceof Error) {
    base[level]({ err: meta }, message);
  } else {
    base[level]({ meta }, message);
  }
}

export const logger: Logger = {
  debug: (message, meta) => write('debug', message, meta),
  info: (message, meta) => write('info', message, meta),
  warn: (message, meta) => write('warn', message, meta),
  error: (message, meta) => write('error', message, meta)
};
