/**
 * W3C propagation (traceparent + baggage)
 *
 * The propagator is used explicitly rather than through the global API so
 * that inbound baggage is honored and outbound headers are written the same
 * way whether export is enabled or not.
 */

import {
  defaultTextMapGetter,
  defaultTextMapSetter,
  propagation,
  ROOT_CONTEXT,
  type Context,
} from '@opentelemetry/api';
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from '@opentelemetry/core';

/** Carrier shape of Node's IncomingHttpHeaders and plain header maps */
export type HeaderCarrier = Record<string, string | string[] | undefined>;

export const PROPAGATOR = new CompositePropagator({
  propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
});

/**
 * Read the remote parent span and baggage from inbound headers.
 * Returns ROOT_CONTEXT (plus whatever was found) for requests without them.
 */
export function extractRemoteContext(headers: HeaderCarrier): Context {
  return PROPAGATOR.extract(ROOT_CONTEXT, headers, defaultTextMapGetter);
}

/**
 * Flatten the baggage carried by a context into plain key/value pairs.
 */
export function baggageFromContext(context: Context): Record<string, string> {
  const baggage = propagation.getBaggage(context);
  if (!baggage) return {};

  const entries: Record<string, string> = {};
  for (const [key, entry] of baggage.getAllEntries()) {
    entries[key] = entry.value;
  }
  return entries;
}

/**
 * Replace the baggage on a context with `entries`.
 */
export function contextWithBaggage(context: Context, entries: Record<string, string>): Context {
  const keys = Object.keys(entries);
  if (keys.length === 0) {
    return propagation.deleteBaggage(context);
  }

  const baggage = propagation.createBaggage(
    Object.fromEntries(keys.map((key) => [key, { value: entries[key] ?? '' }]))
  );
  return propagation.setBaggage(context, baggage);
}

/**
 * Write traceparent/baggage headers for an outbound call.
 */
export function injectContext(context: Context, carrier: Record<string, string>): void {
  PROPAGATOR.inject(context, carrier, defaultTextMapSetter);
}
