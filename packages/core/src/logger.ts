/**
 * Minimal logging seam shared by the editor tooling packages.
 *
 * Components take a Logger in their options and default to a console
 * logger tagged with their own name, so hosts can route output elsewhere.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console-backed logger with a consistent format: `[tag] message`.
 */
export function createConsoleLogger(tag: string): Logger {
  return {
    debug: (message, ...details) => console.debug(`[${tag}] ${message}`, ...details),
    info: (message, ...details) => console.info(`[${tag}] ${message}`, ...details),
    warn: (message, ...details) => console.warn(`[${tag}] ${message}`, ...details),
    error: (message, ...details) => console.error(`[${tag}] ${message}`, ...details),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
