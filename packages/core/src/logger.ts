import type { Logger } from './types';

/* eslint-disable no-console */
export function createConsoleLogger(prefix = 'dbversion'): Logger {
  return {
    debug: (msg, ...args) => console.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => console.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
  };
}
/* eslint-enable no-console */

export const consoleLogger: Logger = createConsoleLogger();
