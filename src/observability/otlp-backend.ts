/**
 * OTLP backend: OpenTelemetry NodeSDK exporting over OTLP/HTTP.
 *
 * Lifecycle:
 *   createOtlpBackend(config) → TracingBackend
 *     sdk.start()                 registers the global tracer provider,
 *                                 AsyncLocalStorage context manager and
 *                                 W3C propagator
 *     backend.startSpan()         tracer.startSpan() under an explicit parent
 *     backend.flush()             processor.forceFlush()
 *     backend.shutdown()          sdk.shutdown() (flushes + closes)
 *
 * Spans go through a BatchSpanProcessor: producers only enqueue, export
 * happens on a timer, and a full queue drops spans instead of blocking.
 * A BaggageAttributesProcessor ahead of it stamps baggage onto spans the
 * SDK starts on its own.
 */

import {
  context as otelContext,
  SpanStatusCode,
  trace,
  type Context,
  type Tracer,
} from '@opentelemetry/api';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { API_KEY_HEADER, BATCH_EXPORT, DATASET_HEADER } from '../config/defaults.js';
import { ExporterError } from '../errors/index.js';
import { BaggageAttributesProcessor } from './baggage-processor.js';
import { PROPAGATOR } from './propagation.js';
import { createSampler, sampleRateFor } from './sampling.js';
import type {
  AttributeValue,
  BackendSpan,
  SpanStatus,
  StartSpanOptions,
  TracingBackend,
} from './types.js';

// ============================================================================
// Config
// ============================================================================

/** Configuration required to create an OTLP backend. */
export interface OtlpBackendConfig {
  serviceName: string;
  apiKey: string;
  endpoint: string;
  datasetName?: string;
  sampleRatio: number;
}

/**
 * Build the traces URL from the ingestion base URL:
 * "https://api.honeycomb.io:443" → "https://api.honeycomb.io:443/v1/traces".
 *
 * @throws ExporterError when the endpoint is not an absolute http(s) URL
 */
export function tracesUrl(endpoint: string): string {
  let parsed: URL;
  try {
    parsed = new URL(endpoint);
  } catch (error) {
    throw new ExporterError(
      `Invalid OTLP endpoint: ${endpoint}`,
      error instanceof Error ? error : undefined
    );
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ExporterError(`Unsupported OTLP endpoint protocol: ${parsed.protocol}`);
  }

  const base = endpoint.replace(/\/+$/, '');
  return base.endsWith('/v1/traces') ? base : `${base}/v1/traces`;
}

/**
 * Export headers. The dataset header is only for legacy dataset-scoped
 * accounts.
 */
export function exportHeaders(config: Pick<OtlpBackendConfig, 'apiKey' | 'datasetName'>): Record<string, string> {
  return {
    [API_KEY_HEADER]: config.apiKey,
    ...(config.datasetName ? { [DATASET_HEADER]: config.datasetName } : {}),
  };
}

// ============================================================================
// Span wrapper
// ============================================================================

function wrapSpan(tracer: Tracer, name: string, options: StartSpanOptions): BackendSpan {
  const span = tracer.startSpan(
    name,
    { attributes: options.attributes, startTime: options.startTime },
    options.parent
  );

  return {
    context: trace.setSpan(options.parent, span),
    setAttribute(key: string, value: AttributeValue): void {
      span.setAttribute(key, value);
    },
    recordException(error: unknown): void {
      span.recordException(error instanceof Error ? error : String(error));
    },
    end(status: SpanStatus, endTime: number, message?: string): void {
      span.setStatus(
        status === 'error'
          ? { code: SpanStatusCode.ERROR, message }
          : { code: SpanStatusCode.OK }
      );
      span.end(endTime);
    },
  };
}

// ============================================================================
// Backend factory
// ============================================================================

/**
 * Create and start an OTLP-exporting backend.
 *
 * Incoming HTTP requests are excluded from the HTTP instrumentation: the
 * Express middleware owns the server span, the instrumentation only covers
 * outbound calls so they carry propagation headers and get client spans.
 *
 * @throws ExporterError when the endpoint is invalid or the SDK fails to start
 */
export function createOtlpBackend(config: OtlpBackendConfig): TracingBackend {
  const exporter = new OTLPTraceExporter({
    url: tracesUrl(config.endpoint),
    headers: exportHeaders(config),
    timeoutMillis: BATCH_EXPORT.exportTimeoutMillis,
  });

  const processor = new BatchSpanProcessor(exporter, {
    maxQueueSize: BATCH_EXPORT.maxQueueSize,
    maxExportBatchSize: BATCH_EXPORT.maxExportBatchSize,
    scheduledDelayMillis: BATCH_EXPORT.scheduledDelayMillis,
    exportTimeoutMillis: BATCH_EXPORT.exportTimeoutMillis,
  });

  const sampleRate = sampleRateFor(config.sampleRatio);
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...(sampleRate !== undefined ? { SampleRate: sampleRate } : {}),
  });

  const sdk = new NodeSDK({
    resource,
    spanProcessors: [new BaggageAttributesProcessor(), processor],
    sampler: createSampler(config.sampleRatio),
    textMapPropagator: PROPAGATOR,
    instrumentations: [
      new HttpInstrumentation({
        ignoreIncomingRequestHook: () => true,
      }),
    ],
  });

  try {
    sdk.start();
  } catch (error) {
    throw new ExporterError(
      'Failed to start the OpenTelemetry SDK',
      error instanceof Error ? error : undefined
    );
  }

  const tracer = trace.getTracer(config.serviceName);

  return {
    startSpan(name: string, options: StartSpanOptions): BackendSpan {
      return wrapSpan(tracer, name, options);
    },
    bind<T>(context: Context, fn: () => T): T {
      return otelContext.with(context, fn);
    },
    getTracer(name: string): Tracer {
      return trace.getTracer(name);
    },
    async flush(): Promise<void> {
      await processor.forceFlush();
    },
    async shutdown(): Promise<void> {
      await sdk.shutdown();
    },
  };
}
