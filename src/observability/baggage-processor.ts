/**
 * Copies the baggage of a span's parent context onto the span as
 * attributes when it starts.
 *
 * Spans opened through a TraceContext already carry the request's baggage.
 * This covers the rest: client spans from the HTTP instrumentation and
 * spans started on currentTracer() inside scope.run(). Attributes set at
 * span start win over baggage with the same key.
 */

import { propagation, type Context } from '@opentelemetry/api';
import type { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';

export class BaggageAttributesProcessor implements SpanProcessor {
  onStart(span: Span, parentContext: Context): void {
    const baggage = propagation.getBaggage(parentContext);
    if (!baggage) return;

    for (const [key, entry] of baggage.getAllEntries()) {
      if (span.attributes[key] === undefined) {
        span.setAttribute(key, entry.value);
      }
    }
  }

  onEnd(_span: ReadableSpan): void {}

  async forceFlush(): Promise<void> {}

  async shutdown(): Promise<void> {}
}
