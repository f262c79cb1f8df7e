/**
 * Default logger of the library. Applications usually inject their own.
 */

import type { SearchLogger } from '../types/index.js';

function format(scope: string, message: string, meta?: Record<string, unknown>): string {
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${scope}] ${message}${suffix}`;
}

export function createConsoleLogger(scope: string, options: { debug?: boolean } = {}): SearchLogger {
  return {
    info: (message, meta) => console.log(format(scope, message, meta)),
    warn: (message, meta) => console.warn(format(scope, message, meta)),
    error: (message, meta) => console.error(format(scope, message, meta)),
    debug: (message, meta) => {
      if (options.debug) console.debug(format(scope, message, meta));
    },
  };
}

export const silentLogger: SearchLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
