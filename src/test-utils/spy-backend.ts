/**
 * Spy Backend
 *
 * A TracingBackend that records every call for assertion. Spans behave like
 * the no-op backend's (context = parent) but each call is logged in order.
 *
 * @example
 * ```typescript
 * const spy = createSpyBackend();
 * const ctx = new TraceContext(spy.backend, { clock: fakeClock() });
 * openSpan(ctx, 'work').close();
 * expect(spy.calls.map((c) => c.method)).toEqual(['startSpan', 'end']);
 * ```
 */

import { ProxyTracerProvider, type Context } from '@opentelemetry/api';
import type { AttributeValue, SpanStatus, StartSpanOptions, TracingBackend } from '../observability/types.js';

export interface SpyCall {
  method: 'startSpan' | 'setAttribute' | 'recordException' | 'end' | 'bind' | 'flush' | 'shutdown';
  span?: string;
  args: unknown[];
}

export interface SpyBackend {
  backend: TracingBackend;
  calls: SpyCall[];
}

export function createSpyBackend(): SpyBackend {
  const calls: SpyCall[] = [];
  const provider = new ProxyTracerProvider();

  const backend: TracingBackend = {
    startSpan(name: string, options: StartSpanOptions) {
      calls.push({ method: 'startSpan', span: name, args: [{ ...options.attributes }, options.startTime] });
      return {
        context: options.parent,
        setAttribute(key: string, value: AttributeValue) {
          calls.push({ method: 'setAttribute', span: name, args: [key, value] });
        },
        recordException(error: unknown) {
          calls.push({ method: 'recordException', span: name, args: [error] });
        },
        end(status: SpanStatus, endTime: number, message?: string) {
          calls.push({ method: 'end', span: name, args: [status, endTime, message] });
        },
      };
    },
    bind<T>(_context: Context, fn: () => T): T {
      calls.push({ method: 'bind', args: [] });
      return fn();
    },
    getTracer(name: string) {
      return provider.getTracer(name);
    },
    async flush() {
      calls.push({ method: 'flush', args: [] });
    },
    async shutdown() {
      calls.push({ method: 'shutdown', args: [] });
    },
  };

  return { backend, calls };
}

/**
 * Deterministic millisecond clock: each reading advances by `step`.
 */
export function fakeClock(start = 1_000, step = 10): () => number {
  let now = start - step;
  return () => {
    now += step;
    return now;
  };
}
