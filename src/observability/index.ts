/**
 * Observability Module
 *
 * Request-scoped tracing over OpenTelemetry. configure() once at startup,
 * then create one TraceContext per request and pass it down.
 *
 * @example
 * ```typescript
 * import { configure, createTraceContext, withSpan, setAttribute, shutdown } from '../observability/index.js';
 *
 * configure();
 * const ctx = createTraceContext();
 * await withSpan(ctx, 'search_request', async () => {
 *   setAttribute(ctx, 'query', 'sdg7');
 *   // ... do work ...
 * });
 * await shutdown();
 * ```
 */

// Types
export type {
  AttributeValue,
  Attributes,
  SpanStatus,
  SpanRecord,
  BackendSpan,
  StartSpanOptions,
  TracingBackend,
  ExporterStatus,
  DisabledReason,
  ExporterState,
} from './types.js';

// Configuration (primary API)
export {
  configure,
  getExporterState,
  createTraceContext,
  currentTracer,
  flush,
  shutdown,
  _resetObservability,
} from './state.js';

// Request-scoped operations
export { TraceContext, type TraceContextOptions } from './trace-context.js';
export { ScopeHandle, openSpan, withSpan, type WithSpanOptions } from './span-scope.js';
export { setAttribute, setAttributes, isAttributeValue } from './attributes.js';
export {
  DetachToken,
  BaggageOverlay,
  attachBaggage,
  detachBaggage,
  withBaggage,
} from './baggage.js';
export {
  extractRemoteContext,
  baggageFromContext,
  type HeaderCarrier,
} from './propagation.js';

// Backends (for testing or direct use)
export { createBackend, type BackendResult } from './factory.js';
export { createNoopBackend } from './noop-backend.js';
export { createOtlpBackend, type OtlpBackendConfig } from './otlp-backend.js';
export { BaggageAttributesProcessor } from './baggage-processor.js';
