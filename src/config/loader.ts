/**
 * Option Resolution
 *
 * Merges, in order of precedence:
 * 1. Options passed to configure()
 * 2. Environment variables (see env.ts)
 * 3. DEFAULT_OPTIONS
 *
 * and validates the result with Zod.
 */

import { ResolvedOptionsSchema, type ObservabilityOptions, type ResolvedOptions } from './schema.js';
import { DEFAULT_OPTIONS } from './defaults.js';
import { getApiKeyFromEnv, loadEnv } from './env.js';
import { ConfigError } from '../errors/index.js';

/**
 * Parse OTEL_TRACES_SAMPLER_ARG. Returns NaN for non-numeric input so
 * that schema validation reports it.
 */
function parseSampleRatio(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  return Number(raw);
}

/**
 * Options after merging, before validation. Values may still be out of
 * range (an empty service name, a sample ratio above 1).
 */
export interface MergedOptions {
  serviceName: string;
  apiKey?: string;
  endpoint: string;
  datasetName?: string;
  sampleRatio: number;
}

/**
 * Merge explicit options over the environment over the defaults.
 */
export function mergeOptions(options: ObservabilityOptions = {}): MergedOptions {
  const env = loadEnv();

  return {
    serviceName: options.serviceName ?? env.OTEL_SERVICE_NAME ?? DEFAULT_OPTIONS.serviceName,
    apiKey: options.apiKey?.trim() || getApiKeyFromEnv(),
    endpoint: options.endpoint ?? env.OTEL_EXPORTER_OTLP_ENDPOINT ?? DEFAULT_OPTIONS.endpoint,
    datasetName: options.datasetName ?? env.HONEYCOMB_DATASET,
    sampleRatio:
      options.sampleRatio ?? parseSampleRatio(env.OTEL_TRACES_SAMPLER_ARG) ?? DEFAULT_OPTIONS.sampleRatio,
  };
}

/**
 * Validate merged options.
 *
 * @throws ConfigError listing every invalid field
 */
export function validateOptions(merged: MergedOptions): ResolvedOptions {
  const result = ResolvedOptionsSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid observability configuration:\n${issues}`);
  }

  return result.data;
}

/**
 * Resolve the effective options.
 *
 * @throws ConfigError when the merged options fail validation
 */
export function resolveOptions(options: ObservabilityOptions = {}): ResolvedOptions {
  return validateOptions(mergeOptions(options));
}

/**
 * Stable fingerprint of configure() arguments, used to detect a second
 * configure() call with different options.
 */
export function optionsFingerprint(options: ObservabilityOptions): string {
  const entries = Object.entries(options)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify(entries);
}
