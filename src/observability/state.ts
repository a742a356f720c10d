/**
 * Process-wide observability state.
 *
 * States: unconfigured → enabled | disabled. configure() moves out of
 * unconfigured exactly once; later calls return the same state. Until then
 * every TraceContext uses the no-op backend.
 *
 * Only export configuration lives here. Active spans and baggage live on
 * each request's TraceContext.
 */

import type { Tracer } from '@opentelemetry/api';
import { DEFAULT_OPTIONS } from '../config/defaults.js';
import {
  mergeOptions,
  optionsFingerprint,
  validateOptions,
  type MergedOptions,
} from '../config/loader.js';
import type { ObservabilityOptions, ResolvedOptions } from '../config/schema.js';
import { describeError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { routeDiagnostics, stopDiagnostics } from './diagnostics.js';
import { createBackend } from './factory.js';
import { createNoopBackend } from './noop-backend.js';
import { TraceContext, type TraceContextOptions } from './trace-context.js';
import type { DisabledReason, ExporterState, TracingBackend } from './types.js';

interface Installed {
  state: ExporterState;
  backend: TracingBackend;
  logger: Logger;
  fingerprint: string;
}

const UNCONFIGURED: ExporterState = Object.freeze({
  status: 'unconfigured',
  serviceName: DEFAULT_OPTIONS.serviceName,
  endpoint: DEFAULT_OPTIONS.endpoint,
  sampleRatio: DEFAULT_OPTIONS.sampleRatio,
  hasCredential: false,
});

let _installed: Installed | null = null;

function buildState(
  options: MergedOptions,
  status: 'enabled' | 'disabled',
  reason?: DisabledReason
): ExporterState {
  return Object.freeze({
    status,
    serviceName: options.serviceName,
    endpoint: options.endpoint,
    ...(options.datasetName !== undefined ? { datasetName: options.datasetName } : {}),
    sampleRatio: options.sampleRatio,
    hasCredential: options.apiKey !== undefined,
    ...(reason !== undefined ? { reason } : {}),
  });
}

/**
 * Configure trace export for this process. Idempotent: only the first call
 * has an effect. Never throws; any failure leaves export disabled.
 */
export function configure(
  options: ObservabilityOptions = {},
  logger: Logger = consoleLogger
): ExporterState {
  const fingerprint = optionsFingerprint(options);

  if (_installed) {
    if (_installed.fingerprint !== fingerprint) {
      logger.warn('Observability is already configured; ignoring the new options');
    }
    return _installed.state;
  }

  // Reported as given when validation fails
  let merged: MergedOptions = DEFAULT_OPTIONS;
  let resolved: ResolvedOptions;
  try {
    merged = mergeOptions(options);
    resolved = validateOptions(merged);
  } catch (error) {
    logger.warn(`Trace export disabled: ${describeError(error)}`);
    _installed = {
      state: buildState(merged, 'disabled', 'invalid-config'),
      backend: createNoopBackend(),
      logger,
      fingerprint,
    };
    return _installed.state;
  }

  const result = createBackend(resolved, logger);
  if (result.status === 'enabled') {
    routeDiagnostics(logger);
  }

  _installed = {
    state:
      result.status === 'enabled'
        ? buildState(resolved, 'enabled')
        : buildState(resolved, 'disabled', result.reason),
    backend: result.backend,
    logger,
    fingerprint,
  };
  return _installed.state;
}

/**
 * Current exporter state ('unconfigured' before configure()).
 */
export function getExporterState(): ExporterState {
  return _installed?.state ?? UNCONFIGURED;
}

/**
 * The backend new TraceContexts are bound to.
 */
export function getBackend(): TracingBackend {
  return _installed?.backend ?? createNoopBackend();
}

/**
 * Default TraceContext factory: one context per logical request, bound to
 * the configured backend and logger.
 */
export function createTraceContext(options: TraceContextOptions = {}): TraceContext {
  return new TraceContext(getBackend(), {
    logger: _installed?.logger,
    ...options,
  });
}

/**
 * Raw OpenTelemetry tracer for custom instrumentation. Non-recording
 * while export is disabled.
 */
export function currentTracer(name: string = getExporterState().serviceName): Tracer {
  return getBackend().getTracer(name);
}

/**
 * Export all buffered spans now. Failures are logged, never thrown.
 */
export async function flush(): Promise<void> {
  if (!_installed) return;
  try {
    await _installed.backend.flush();
  } catch (error) {
    _installed.logger.warn(`Trace flush failed: ${describeError(error)}`);
  }
}

/**
 * Flush and stop exporting. The state stays configured; spans opened
 * afterwards are no longer exported.
 */
export async function shutdown(): Promise<void> {
  if (!_installed) return;
  const { backend, logger } = _installed;
  try {
    await backend.shutdown();
  } catch (error) {
    logger.warn(`Trace shutdown failed: ${describeError(error)}`);
  } finally {
    stopDiagnostics();
  }
}

/**
 * Forget the installed state.
 * FOR TESTING ONLY - the SDK itself is not stopped.
 *
 * @internal
 */
export function _resetObservability(): void {
  _installed = null;
  stopDiagnostics();
}
