/**
 * No-op backend: null-object implementation.
 *
 * Used when export is disabled or before configure() runs. Spans still get
 * a context (the parent's) so baggage and remote trace headers pass through
 * unchanged; nothing is recorded or sent.
 */

import { ProxyTracerProvider, type Context, type Tracer } from '@opentelemetry/api';
import type { AttributeValue, BackendSpan, SpanStatus, StartSpanOptions, TracingBackend } from './types.js';

/**
 * A proxy provider with no delegate hands out tracers whose spans are all
 * non-recording.
 */
const NOOP_PROVIDER = new ProxyTracerProvider();

function noopSpan(parent: Context): BackendSpan {
  return {
    context: parent,
    setAttribute(_key: string, _value: AttributeValue): void {},
    recordException(_error: unknown): void {},
    end(_status: SpanStatus, _endTime: number, _message?: string): void {},
  };
}

const NOOP_BACKEND: TracingBackend = Object.freeze({
  startSpan(_name: string, options: StartSpanOptions): BackendSpan {
    return noopSpan(options.parent);
  },
  bind<T>(_context: Context, fn: () => T): T {
    return fn();
  },
  getTracer(name: string): Tracer {
    return NOOP_PROVIDER.getTracer(name);
  },
  async flush(): Promise<void> {},
  async shutdown(): Promise<void> {},
});

/**
 * Get the no-op backend. Every call returns the same frozen instance.
 */
export function createNoopBackend(): TracingBackend {
  return NOOP_BACKEND;
}
