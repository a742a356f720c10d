/**
 * Observability Types
 *
 * Request-scoped tracing over a pluggable backend. Follows the null-object
 * pattern: the no-op backend when export is disabled, the OTLP backend when
 * an API key is present. Request code holds a TraceContext and never knows
 * which backend sits behind it.
 *
 * Maps to OpenTelemetry:
 *   openSpan(ctx, name)    → tracer.startSpan(name, { attributes }, parentContext)
 *   scope.setAttribute()   → span.setAttribute()
 *   scope.recordError()    → span.recordException()
 *   scope.close()          → span.setStatus() + span.end(endTime)
 *   scope.run(fn)          → context.with(spanContext + baggage, fn)
 *   flush()                → batchProcessor.forceFlush()
 *   shutdown()             → sdk.shutdown()
 */

import type { Context, Tracer } from '@opentelemetry/api';

// ============================================================================
// Span data
// ============================================================================

/** Scalar values a span attribute may hold. Structured values must be
 * flattened or stringified by the caller. */
export type AttributeValue = string | number | boolean;

export type Attributes = Record<string, AttributeValue>;

export type SpanStatus = 'ok' | 'error';

/**
 * Snapshot of one span. endTime is null while the span is open.
 */
export interface SpanRecord {
  readonly spanId: string;
  readonly name: string;
  /** null for the root span of a trace */
  readonly parentId: string | null;
  /** Milliseconds since the epoch */
  readonly startTime: number;
  readonly endTime: number | null;
  readonly status: SpanStatus;
  readonly attributes: Readonly<Attributes>;
  readonly errorMessage?: string;
}

// ============================================================================
// Backend
// ============================================================================

export interface StartSpanOptions {
  attributes: Attributes;
  startTime: number;
  /** OpenTelemetry context holding the parent span (or the remote parent) */
  parent: Context;
}

/** One span as seen by the backend. */
export interface BackendSpan {
  /** The parent context with this span set as active */
  readonly context: Context;
  setAttribute(key: string, value: AttributeValue): void;
  recordException(error: unknown): void;
  end(status: SpanStatus, endTime: number, message?: string): void;
}

/**
 * Where spans go. Implementations: no-op (export disabled) or OTLP.
 */
export interface TracingBackend {
  startSpan(name: string, options: StartSpanOptions): BackendSpan;
  /** Run fn with `context` active for auto-instrumented libraries */
  bind<T>(context: Context, fn: () => T): T;
  /** Tracer for callers that want the raw OpenTelemetry API */
  getTracer(name: string): Tracer;
  /** Export all buffered spans */
  flush(): Promise<void>;
  /** Flush and stop exporting */
  shutdown(): Promise<void>;
}

// ============================================================================
// Exporter state
// ============================================================================

export type ExporterStatus = 'unconfigured' | 'enabled' | 'disabled';

export type DisabledReason = 'missing-credential' | 'invalid-config' | 'exporter-failed';

/**
 * Process-wide, read-only view of the export configuration. The API key is
 * deliberately absent; only its presence is reported.
 */
export interface ExporterState {
  readonly status: ExporterStatus;
  readonly serviceName: string;
  readonly endpoint: string;
  readonly datasetName?: string;
  readonly sampleRatio: number;
  readonly hasCredential: boolean;
  /** Set when status is 'disabled' */
  readonly reason?: DisabledReason;
}
