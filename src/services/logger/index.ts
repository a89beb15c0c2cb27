import pino from 'pino';
import { config } from '../../config/index.js';

/**
 * Named pino logger at the configured level.
 */
export function createLogger(name: string): pino.Logger {
  return pino({ name, level: config.LOG_LEVEL });
}
