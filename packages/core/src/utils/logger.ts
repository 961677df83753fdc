import { LOGGING_DEFAULTS } from '../constants';

import type { Logger } from '../types';

/**
 * Console-backed logger that prefixes every message
 */
/* eslint-disable no-console */
export function createConsoleLogger(prefix: string = LOGGING_DEFAULTS.PREFIX): Logger {
  return {
    debug: (msg, ...args) => console.debug(`${prefix} ${msg}`, ...args),
    info: (msg, ...args) => console.info(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}
/* eslint-enable no-console */

