import pino from 'pino';
import type { Logger } from 'pino';
import { config } from './config.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  enabled?: boolean;
}

// JSON lines on stderr; stdout carries command output.
export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino(
    {
      level: opts.level ?? config.logLevel,
      enabled: opts.enabled ?? true,
      base: { service: 'revharvest' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** Silent logger for tests. */
export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
