import { type Logger, pino } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { env } from './env.js';

export type { Logger };

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** Structured logger on stderr; stdout stays reserved for the translated document. */
export function createLogger(level: string = env.logLevel): Logger {
  const stream = PinoPretty({
    colorize: Boolean(process.stderr.isTTY),
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    destination: 2,
    sync: true,
  });
  return pino({ name: 'lingopipe', level: LEVELS.includes(level) ? level : 'warn' }, stream);
}

export const logger = createLogger();
