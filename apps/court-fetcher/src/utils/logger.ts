/**
 * Service logger (winston). Silent under tests.
 */

import { createLogger, format, transports } from 'winston';
import type { SearchLogger } from 'court-playwright';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  defaultMeta: { service: 'court-fetcher' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});

if (process.env.NODE_ENV === 'production') {
  logger.add(
    new transports.File({ filename: 'logs/error.log', level: 'error' })
  );
  logger.add(
    new transports.File({ filename: 'logs/combined.log' })
  );
}

/** Child logger handed to the search engine */
export function componentLogger(component: string): SearchLogger {
  return logger.child({ component });
}

/** Applies the configured level once the configuration is loaded */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
