import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ROOT_CONTEXT } from '@opentelemetry/api';

// Use vi.hoisted() so mock variables are available to vi.mock factories (which are hoisted)
const { mockSdkStart, mockSdkShutdown, mockExport, mockExporterShutdown } = vi.hoisted(() => ({
  mockSdkStart: vi.fn(),
  mockSdkShutdown: vi.fn(async () => {}),
  mockExport: vi.fn(),
  mockExporterShutdown: vi.fn(async () => {}),
}));

// Mock the external dependencies to avoid real SDK initialization and network
vi.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: vi.fn(function () {
    return { start: mockSdkStart, shutdown: mockSdkShutdown };
  }),
}));

vi.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: vi.fn(function () {
    return { export: mockExport, shutdown: mockExporterShutdown, forceFlush: async () => {} };
  }),
}));

vi.mock('@opentelemetry/instrumentation-http', () => ({
  HttpInstrumentation: vi.fn(function () {
    return {};
  }),
}));

import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { createOtlpBackend, exportHeaders, tracesUrl } from '../otlp-backend.js';
import { BaggageAttributesProcessor } from '../baggage-processor.js';
import { ExporterError } from '../../errors/index.js';

describe('tracesUrl', () => {
  it('appends the traces path to the ingestion host', () => {
    expect(tracesUrl('https://api.honeycomb.io:443')).toBe('https://api.honeycomb.io:443/v1/traces');
  });

  it('strips trailing slashes first', () => {
    expect(tracesUrl('http://localhost:4318//')).toBe('http://localhost:4318/v1/traces');
  });

  it('keeps a URL that already ends with the traces path', () => {
    expect(tracesUrl('http://collector:4318/v1/traces')).toBe('http://collector:4318/v1/traces');
  });

  it('rejects a relative URL', () => {
    expect(() => tracesUrl('not a url')).toThrow(ExporterError);
  });

  it('rejects a non-HTTP protocol', () => {
    expect(() => tracesUrl('ftp://collector')).toThrow('Unsupported OTLP endpoint protocol: ftp:');
  });
});

describe('exportHeaders', () => {
  it('sends the API key', () => {
    expect(exportHeaders({ apiKey: 'test-secret' })).toEqual({ 'x-honeycomb-team': 'test-secret' });
  });

  it('adds the dataset header for legacy accounts', () => {
    expect(exportHeaders({ apiKey: 'test-secret', datasetName: 'search' })).toEqual({
      'x-honeycomb-team': 'test-secret',
      'x-honeycomb-dataset': 'search',
    });
  });
});

describe('createOtlpBackend', () => {
  const config = {
    serviceName: 'search-backend',
    apiKey: 'test-secret',
    endpoint: 'https://api.honeycomb.io:443',
    sampleRatio: 0.25,
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mockSdkStart.mockImplementation(() => {});
  });

  it('creates the exporter with the traces URL and headers', () => {
    createOtlpBackend(config);

    expect(OTLPTraceExporter).toHaveBeenCalledWith({
      url: 'https://api.honeycomb.io:443/v1/traces',
      headers: { 'x-honeycomb-team': 'test-secret' },
      timeoutMillis: 30000,
    });
  });

  it('starts the SDK once with the sampler and resource', () => {
    createOtlpBackend(config);

    expect(NodeSDK).toHaveBeenCalledTimes(1);
    expect(mockSdkStart).toHaveBeenCalledTimes(1);

    const sdkConfig = vi.mocked(NodeSDK).mock.calls[0]?.[0];
    expect(sdkConfig?.resource?.attributes).toEqual({
      'service.name': 'search-backend',
      SampleRate: 4,
    });
    expect(sdkConfig?.sampler?.toString()).toMatch(/^ParentBased\{root=TraceIdRatioBased\{0\.25\}/);
    const processors = sdkConfig?.spanProcessors ?? [];
    expect(processors).toHaveLength(2);
    expect(processors[0]).toBeInstanceOf(BaggageAttributesProcessor);
    expect(processors[1]).toBeInstanceOf(BatchSpanProcessor);
  });

  it('leaves incoming requests to the middleware', () => {
    createOtlpBackend(config);

    const options = vi.mocked(HttpInstrumentation).mock.calls[0]?.[0];
    expect(options?.ignoreIncomingRequestHook).toBeTypeOf('function');
  });

  it('wraps SDK start failures in ExporterError', () => {
    mockSdkStart.mockImplementation(() => {
      throw new Error('already registered');
    });

    expect(() => createOtlpBackend(config)).toThrow(ExporterError);
  });

  it('fails before building anything for an invalid endpoint', () => {
    expect(() => createOtlpBackend({ ...config, endpoint: 'nope' })).toThrow(ExporterError);
    expect(NodeSDK).not.toHaveBeenCalled();
  });

  it('flushes and shuts the SDK down', async () => {
    const backend = createOtlpBackend(config);

    await backend.flush();
    await backend.shutdown();
    expect(mockSdkShutdown).toHaveBeenCalledTimes(1);
  });

  it('starts spans under the given parent', () => {
    const backend = createOtlpBackend(config);

    const span = backend.startSpan('search_request', {
      attributes: { query: 'sdg7' },
      startTime: Date.now(),
      parent: ROOT_CONTEXT,
    });

    expect(span.context).not.toBe(ROOT_CONTEXT);
    expect(() => span.end('ok', Date.now())).not.toThrow();
  });
});
