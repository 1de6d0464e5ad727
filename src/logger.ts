/**
 * overlay-spec Console Logging
 * Warnings and debug output go to stderr; stdout is reserved for results
 */

import { Logger } from './types.js';

export function createConsoleLogger(verbose = false): Logger {
  return {
    debug(message) {
      if (verbose) console.error(`[overlay-spec] ${message}`);
    },
    warn(message) {
      console.error(`WARNING: ${message}`);
    },
  };
}
