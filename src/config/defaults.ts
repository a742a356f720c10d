/**
 * Default Configuration Values
 *
 * Used for every option that is neither passed to configure() nor set
 * in the environment.
 */

import type { ResolvedOptions } from './schema.js';

export const DEFAULT_SERVICE_NAME = 'search-backend';

/** US ingestion host; EU accounts override it via OTEL_EXPORTER_OTLP_ENDPOINT */
export const DEFAULT_ENDPOINT = 'https://api.honeycomb.io:443';

export const DEFAULT_OPTIONS: Omit<ResolvedOptions, 'apiKey' | 'datasetName'> = {
  serviceName: DEFAULT_SERVICE_NAME,
  endpoint: DEFAULT_ENDPOINT,
  sampleRatio: 1.0,
};

/**
 * Batch export tuning. Spans are dropped once the queue is full so that
 * request handling never waits on the network.
 */
export const BATCH_EXPORT = {
  maxQueueSize: 2048,
  maxExportBatchSize: 512,
  scheduledDelayMillis: 5000,
  exportTimeoutMillis: 30000,
} as const;

/** Header names understood by the ingestion endpoint */
export const API_KEY_HEADER = 'x-honeycomb-team';
export const DATASET_HEADER = 'x-honeycomb-dataset';
