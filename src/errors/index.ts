/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, describeError } from './errors/index.js';
 *
 *   logger.warn(describeError(new ConfigError('sampleRatio must be <= 1')));
 */

// Error types
export {
  CLIError,
  ConfigError,
  ExporterError,
} from './types.js';

// Error handling utilities
export {
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
