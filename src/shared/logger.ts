/**
 * @file logger.ts
 * @module shared/logger
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Console logger with a verbose switch for diagnostic output.
 */

export interface Logger {
  /** Printed only in verbose mode */
  debug(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Create a console-backed logger.
 *
 * @param verbose - Whether debug messages are printed
 */
export function createLogger(verbose: boolean): Logger {
  return {
    debug(message: string): void {
      if (verbose) {
        console.log(`[debug] ${message}`);
      }
    },
    error(message: string, error?: unknown): void {
      if (error !== undefined && verbose) {
        console.error(message, error);
      } else {
        console.error(message);
      }
    },
  };
}

/**
 * Logger that discards everything. Used by tests and library callers.
 */
export const silentLogger: Logger = {
  debug: () => {},
  error: () => {},
};
