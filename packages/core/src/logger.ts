/**
 * Tag-prefixed logging: every line reads `[tag] message`.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export function createConsoleLogger(tag: string): Logger {
  return {
    info(message) {
      console.info(`[${tag}] ${message}`);
    },
    warn(message) {
      console.warn(`[${tag}] ${message}`);
    },
  };
}

/** Discards everything. For callers that own their logging. */
export const silentLogger: Logger = Object.freeze({
  info() {},
  warn() {},
});
