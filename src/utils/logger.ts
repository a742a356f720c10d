/**
 * Logger Interface for Library Code
 *
 * Library code accepts this via dependency injection. The CLI passes its
 * CommandContext (which satisfies Logger), a host service passes an adapter
 * over its own logger, and tests pass silent or spy loggers.
 */

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.debug(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
