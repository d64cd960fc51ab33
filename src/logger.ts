/**
 * Logger factory.
 */

import { type Logger, pino } from 'pino';

import type { AppConfig } from './schemas/config.js';

/** Create the service logger: stdout, or a file when `log.file` is set. */
export function createLogger(log: AppConfig['log']): Logger {
  return pino({
    level: log.level,
    ...(log.file
      ? {
          transport: {
            target: 'pino/file',
            options: { destination: log.file, mkdir: true },
          },
        }
      : {}),
  });
}
