/**
 * Error type definitions
 *
 * Every error carries a recovery hint and an exit code. Inside the library
 * these are built and logged rather than thrown past the public API: tracing
 * must never take down the service it observes. The CLI throws them and
 * lets the handler format them.
 */

/**
 * Base class for all errors raised by this package.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - sampleRatio outside 0..1
 * - Empty service name
 * - Non-numeric OTEL_TRACES_SAMPLER_ARG
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: search-obs check  to see the resolved configuration',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the OTLP exporter or the SDK around it cannot be built.
 *
 * Exit code 6: Exporter error
 */
export class ExporterError extends CLIError {
  /** The underlying failure for debugging */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check OTEL_EXPORTER_OTLP_ENDPOINT; spans are not exported until it is fixed',
      6
    );
    this.name = 'ExporterError';
    this.cause = cause;
  }
}
