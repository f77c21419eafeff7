/**
 * logger.ts - pino loggers, one per module
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import { environment } from './environment.js';

let base: Logger | null = null;

function rootLogger(): Logger {
  if (base === null) {
    base = pino({ name: 'keytrie', level: environment().LOG_LEVEL });
  }
  return base;
}

export function createLogger(name: string): Logger {
  return rootLogger().child({ module: name });
}
