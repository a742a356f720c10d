/**
 * Configuration Schema
 *
 * Options accepted by configure(), validated with Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Options a caller may pass to configure(). Every field is optional:
 * missing values come from the environment, then from DEFAULT_OPTIONS.
 */
export const ObservabilityOptionsSchema = z.object({
  serviceName: z
    .string()
    .min(1)
    .optional()
    .describe('Service name reported on every span (resource attribute service.name)'),
  apiKey: z
    .string()
    .optional()
    .describe('Ingestion API key; export is disabled when absent'),
  endpoint: z
    .string()
    .min(1)
    .optional()
    .describe('OTLP/HTTP ingestion base URL; /v1/traces is appended'),
  datasetName: z
    .string()
    .min(1)
    .optional()
    .describe('Dataset name, only for legacy dataset-scoped accounts'),
  sampleRatio: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe('Fraction of traces kept (0.0-1.0, default 1.0)'),
});

export type ObservabilityOptions = z.infer<typeof ObservabilityOptionsSchema>;

/**
 * Options after merging explicit values, environment and defaults.
 * Only apiKey and datasetName may still be absent.
 */
export const ResolvedOptionsSchema = ObservabilityOptionsSchema.required({
  serviceName: true,
  endpoint: true,
  sampleRatio: true,
});

export type ResolvedOptions = z.infer<typeof ResolvedOptionsSchema>;
