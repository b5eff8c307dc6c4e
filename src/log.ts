/**
 * Console logging with scopes.
 */

import { describeError } from "./errors.js";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Logger whose lines are prefixed with an additional scope */
  child(scope: string): Logger;
}

/**
 * Create a logger writing timestamped lines to the console.
 *
 * @param scope - Prefix shown in brackets, e.g. "ingest"
 */
export function createLogger(scope = "courier"): Logger {
  const prefix = () => `${new Date().toISOString()} [${scope}]`;
  return {
    info: (message) => console.log(`${prefix()} ${message}`),
    warn: (message) => console.warn(`${prefix()} ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${prefix()} ${message}`);
      } else {
        console.error(`${prefix()} ${message}: ${describeError(error)}`);
      }
    },
    child: (child) => createLogger(`${scope}:${child}`),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
