/**
 * Incoming request instrumentation for Express.
 *
 * One TraceContext and one root span per request:
 *   - remote parent + baggage read from traceparent/baggage headers
 *   - root span "<METHOD> <path>" with http.method and api.endpoint
 *   - on 'finish': http.status_code, http.response_size,
 *     http.duration_seconds; 5xx marks the span failed
 *   - on 'close' without 'finish' (client went away): closed as cancelled
 *
 * Handlers get the request's context with getRequestContext(res).
 */

import { performance } from 'node:perf_hooks';
import type { Application } from 'express';
import { extractRemoteContext, type HeaderCarrier } from '../observability/propagation.js';
import { openSpan } from '../observability/span-scope.js';
import { createTraceContext } from '../observability/state.js';
import { TraceContext } from '../observability/trace-context.js';

/** The parts of an Express request the middleware reads */
export interface RequestLike {
  method: string;
  path: string;
  headers: HeaderCarrier;
}

/** The parts of an Express response the middleware uses */
export interface ResponseLike {
  statusCode: number;
  locals: Record<string, unknown>;
  getHeader(name: string): number | string | string[] | undefined;
  on(event: 'finish' | 'close', listener: () => void): unknown;
}

const CONTEXT_KEY = 'traceContext';

/** Apps that already carry the middleware */
const instrumented = new WeakSet<object>();

function responseSize(res: ResponseLike): number {
  const header = res.getHeader('content-length');
  const value = Array.isArray(header) ? header[0] : header;
  const size = Number(value ?? 0);
  return Number.isFinite(size) ? size : 0;
}

/**
 * Create the per-request tracing middleware.
 */
export function tracingMiddleware() {
  return (req: RequestLike, res: ResponseLike, next: () => void): void => {
    const startedAt = performance.now();
    const ctx = createTraceContext({ remote: extractRemoteContext(req.headers) });
    const scope = openSpan(ctx, `${req.method} ${req.path}`, {
      'http.method': req.method,
      'api.endpoint': req.path,
    });
    res.locals[CONTEXT_KEY] = ctx;

    res.on('finish', () => {
      scope.setAttribute('http.status_code', res.statusCode);
      scope.setAttribute('http.response_size', responseSize(res));
      scope.setAttribute('http.duration_seconds', (performance.now() - startedAt) / 1000);
      if (res.statusCode >= 500) {
        scope.recordError(`HTTP ${res.statusCode}`);
      }
      scope.close();
    });

    res.on('close', () => {
      if (scope.isOpen) {
        scope.cancel('client closed the connection');
        scope.close();
      }
    });

    scope.run(next);
  };
}

/**
 * Install the tracing middleware on an Express app. Installing twice on the
 * same app is a no-op.
 *
 * @returns true when the middleware was installed by this call
 */
export function instrumentIncomingRequests(app: Application): boolean {
  if (instrumented.has(app)) {
    return false;
  }
  instrumented.add(app);
  const middleware = tracingMiddleware();
  app.use((req, res, next) => middleware(req, res, next));
  return true;
}

/**
 * The TraceContext of the current request. Returns a fresh, unattached
 * context when the middleware did not run so callers never need to branch.
 */
export function getRequestContext(res: Pick<ResponseLike, 'locals'>): TraceContext {
  const ctx = res.locals[CONTEXT_KEY];
  return ctx instanceof TraceContext ? ctx : createTraceContext();
}
