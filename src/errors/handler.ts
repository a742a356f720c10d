/**
 * Error formatting and handling
 *
 * - describeError(): one-line text for library log messages
 * - formatError(): colored or JSON output for the CLI
 * - handleError(): print + exit, used at the CLI top level
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Render any thrown value as a single line for a log message.
 *
 * Includes the hint for CLIError and the cause message for errors that
 * wrap another one.
 */
export function describeError(error: unknown): string {
  if (error instanceof CLIError) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return error.hint
      ? `${error.message}${cause}. ${error.hint}`
      : `${error.message}${cause}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format an error for terminal display.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (json) {
    const output: ErrorOutput = {
      error: error instanceof Error ? error.message : String(error),
      code: getExitCode(error),
      hint: error instanceof CLIError ? error.hint : undefined,
      stack: verbose && error instanceof Error ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  if (!(error instanceof Error)) {
    return chalk.red('Error: ') + String(error);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  if (error instanceof CLIError && error.hint) {
    lines.push(chalk.dim('Hint: ') + error.hint);
  } else if (!(error instanceof CLIError) && !verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error. CLIError has a specific code, everything
 * else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level 'uncaughtException' and
 * 'unhandledRejection' events.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
