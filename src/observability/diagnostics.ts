/**
 * Routes OpenTelemetry's internal diagnostics (export failures, dropped
 * spans, retry notices) into our Logger. Export errors are never surfaced
 * to request code; this is the only place they show up.
 */

import { diag, DiagLogLevel, type DiagLogger } from '@opentelemetry/api';
import type { Logger } from '../utils/logger.js';

function join(message: string, args: unknown[]): string {
  if (args.length === 0) return message;
  return [message, ...args.map((arg) => (arg instanceof Error ? arg.message : String(arg)))].join(' ');
}

export function createDiagLogger(logger: Logger): DiagLogger {
  const warn = (message: string, ...args: unknown[]): void => {
    logger.warn(`[otel] ${join(message, args)}`);
  };
  const debug = (message: string, ...args: unknown[]): void => {
    logger.debug?.(`[otel] ${join(message, args)}`);
  };

  return {
    error: warn,
    warn,
    info: debug,
    debug,
    verbose: debug,
  };
}

/**
 * Install the adapter globally at WARN level.
 */
export function routeDiagnostics(logger: Logger): void {
  diag.setLogger(createDiagLogger(logger), {
    logLevel: DiagLogLevel.WARN,
    suppressOverrideMessage: true,
  });
}

/**
 * Remove the adapter (shutdown and test isolation).
 */
export function stopDiagnostics(): void {
  diag.disable();
}
