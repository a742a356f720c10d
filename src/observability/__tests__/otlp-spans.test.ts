/**
 * OTLP backend span mapping
 *
 * The SDK and exporter modules are mocked; spans go to a real tracer
 * provider with an in-memory exporter so what would be exported can be
 * asserted directly.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import { hrTimeToMilliseconds } from '@opentelemetry/core';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';

vi.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: vi.fn(function () {
    return { start: vi.fn(), shutdown: vi.fn(async () => {}) };
  }),
}));

vi.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: vi.fn(function () {
    return { export: vi.fn(), shutdown: vi.fn(async () => {}), forceFlush: async () => {} };
  }),
}));

vi.mock('@opentelemetry/instrumentation-http', () => ({
  HttpInstrumentation: vi.fn(function () {
    return {};
  }),
}));

import { createOtlpBackend } from '../otlp-backend.js';
import { BaggageAttributesProcessor } from '../baggage-processor.js';
import { TraceContext } from '../trace-context.js';
import { openSpan, withSpan } from '../span-scope.js';
import { setAttribute } from '../attributes.js';
import { attachBaggage } from '../baggage.js';
import { extractRemoteContext } from '../propagation.js';
import { fakeClock } from '../../test-utils/index.js';
import type { TracingBackend } from '../types.js';

describe('OTLP backend spans', () => {
  const memory = new InMemorySpanExporter();
  const provider = new BasicTracerProvider();
  let backend: TracingBackend;

  beforeAll(() => {
    provider.addSpanProcessor(new BaggageAttributesProcessor());
    provider.addSpanProcessor(new SimpleSpanProcessor(memory));
    trace.setGlobalTracerProvider(provider);
    backend = createOtlpBackend({
      serviceName: 'search-backend',
      apiKey: 'test-secret',
      endpoint: 'https://api.honeycomb.io:443',
      sampleRatio: 1,
    });
  });

  afterAll(async () => {
    await provider.shutdown();
    trace.disable();
  });

  beforeEach(() => {
    memory.reset();
  });

  it('exports the search_request tree with parent links and attributes', () => {
    const ctx = new TraceContext(backend, { clock: fakeClock(1_700_000_000_000, 5) });

    const root = openSpan(ctx, 'search_request');
    setAttribute(ctx, 'query', 'sdg7');
    setAttribute(ctx, 'query.is_sdg', true);
    const filter = openSpan(ctx, 'filter_by_sdg_tag');
    setAttribute(ctx, 'sdg_results.count', 25);
    filter.close();
    root.close();

    const spans = memory.getFinishedSpans();
    expect(spans.map((s) => s.name)).toEqual(['filter_by_sdg_tag', 'search_request']);

    const [child, parent] = spans;
    expect(parent?.attributes).toEqual({ query: 'sdg7', 'query.is_sdg': true });
    expect(child?.attributes).toEqual({ 'sdg_results.count': 25 });
    expect(child?.parentSpanId).toBe(parent?.spanContext().spanId);
    expect(child?.spanContext().traceId).toBe(parent?.spanContext().traceId);
    expect(parent?.parentSpanId).toBeUndefined();
    expect(parent?.status.code).toBe(SpanStatusCode.OK);
  });

  it('uses the context clock for start and end times', () => {
    const ctx = new TraceContext(backend, { clock: fakeClock(1_700_000_000_000, 5) });

    openSpan(ctx, 'work').close();

    const [span] = memory.getFinishedSpans();
    expect(hrTimeToMilliseconds(span?.startTime ?? [0, 0])).toBe(1_700_000_000_000);
    expect(hrTimeToMilliseconds(span?.endTime ?? [0, 0])).toBe(1_700_000_000_005);
  });

  it('exports errors with status and exception event', async () => {
    const ctx = new TraceContext(backend);

    await expect(
      withSpan(ctx, 'search_request', async () => {
        throw new Error('index unavailable');
      })
    ).rejects.toThrow('index unavailable');

    const [span] = memory.getFinishedSpans();
    expect(span?.status).toEqual({ code: SpanStatusCode.ERROR, message: 'index unavailable' });
    expect(span?.events.map((e) => e.name)).toEqual(['exception']);
  });

  it('copies baggage onto exported spans', () => {
    const ctx = new TraceContext(backend);
    const root = openSpan(ctx, 'root');
    attachBaggage(ctx, 'tenant', 'acme');
    openSpan(ctx, 'child').close();
    root.close();

    const [child] = memory.getFinishedSpans();
    expect(child?.attributes).toEqual({ tenant: 'acme' });
  });

  it('copies baggage onto spans started on the raw tracer', () => {
    const ctx = new TraceContext(backend);
    const root = openSpan(ctx, 'root');
    attachBaggage(ctx, 'tenant', 'acme');

    backend.getTracer('http').startSpan('GET upstream', {}, ctx.backendContext(root)).end();
    root.close();

    const [outbound] = memory.getFinishedSpans();
    expect(outbound?.name).toBe('GET upstream');
    expect(outbound?.attributes).toEqual({ tenant: 'acme' });
  });

  it('keeps span attributes over inbound baggage with the same key', () => {
    const ctx = new TraceContext(backend, { remote: extractRemoteContext({ baggage: 'tier=free' }) });

    openSpan(ctx, 'root', { tier: 'gold' }).close();

    const [span] = memory.getFinishedSpans();
    expect(span?.attributes).toEqual({ tier: 'gold' });
  });

  it('continues a remote parent', () => {
    const remote = extractRemoteContext({
      traceparent: '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01',
    });
    const ctx = new TraceContext(backend, { remote });

    openSpan(ctx, 'GET /search').close();

    const [span] = memory.getFinishedSpans();
    expect(span?.spanContext().traceId).toBe('0af7651916cd43dd8448eb211c80319c');
    expect(span?.parentSpanId).toBe('b7ad6b7169203331');
  });

  it('injects the active exported span as traceparent', () => {
    const ctx = new TraceContext(backend);
    const root = openSpan(ctx, 'root');

    const headers = ctx.injectHeaders({});
    const spanContext = trace.getSpanContext(root.context);

    expect(headers['traceparent']).toBe(`00-${spanContext?.traceId}-${spanContext?.spanId}-01`);
    root.close();
  });
});
