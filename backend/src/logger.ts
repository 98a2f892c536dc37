import { pino, type Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

export function createLogger(level: AppConfig['logLevel'] = 'info'): Logger {
  return pino({
    level,
    base: { service: 'storefront-etl' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
