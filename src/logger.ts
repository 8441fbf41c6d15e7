import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

let defaultLogger: Logger | undefined;

/** Shared fallback logger for components constructed without one. */
export function createLogger(): Logger {
  defaultLogger ??= pino({
    name: 'relational-docstore',
    level: process.env['LOG_LEVEL'] ?? 'warn',
  });
  return defaultLogger;
}
