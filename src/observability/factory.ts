/**
 * Backend Factory
 *
 * Creates the appropriate TracingBackend from resolved options.
 *
 * Decision tree:
 *   1. No API key                       → no-op backend (missing-credential)
 *   2. Exporter or SDK cannot be built  → no-op backend (exporter-failed)
 *   3. Otherwise                        → OTLP backend
 *
 * Never throws: observability must not be able to stop the service it
 * observes.
 */

import type { ResolvedOptions } from '../config/schema.js';
import { describeError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { createNoopBackend } from './noop-backend.js';
import { createOtlpBackend } from './otlp-backend.js';
import type { DisabledReason, TracingBackend } from './types.js';

export type BackendResult =
  | { status: 'enabled'; backend: TracingBackend }
  | { status: 'disabled'; backend: TracingBackend; reason: DisabledReason };

/**
 * Create a backend for the given options.
 */
export function createBackend(options: ResolvedOptions, logger: Logger): BackendResult {
  // Path 1: no credential, tracing stays local-only
  if (!options.apiKey) {
    logger.debug?.('Trace export is disabled (no API key found)');
    return { status: 'disabled', backend: createNoopBackend(), reason: 'missing-credential' };
  }

  // Path 2/3: credential present, try the real exporter
  try {
    const backend = createOtlpBackend({
      serviceName: options.serviceName,
      apiKey: options.apiKey,
      endpoint: options.endpoint,
      datasetName: options.datasetName,
      sampleRatio: options.sampleRatio,
    });
    logger.debug?.(
      `Trace export configured for ${options.serviceName} (endpoint: ${options.endpoint})`
    );
    return { status: 'enabled', backend };
  } catch (error) {
    logger.warn(`Trace export disabled: ${describeError(error)}`);
    return { status: 'disabled', backend: createNoopBackend(), reason: 'exporter-failed' };
  }
}
