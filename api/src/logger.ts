import { pino, type Logger } from 'pino';
import { config } from './config.js';

export type { Logger };

export function createLogger(level: string, name = 'reservation-engine'): Logger {
  return pino({ name, level });
}

export const logger = createLogger(config.logLevel);
