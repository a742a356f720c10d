/**
 * Environment Variable Handler
 *
 * Loads the tracing credential and export settings from the environment.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - The API key is NEVER logged; only presence or a masked form is reported
 * - The API key is NEVER included in error messages
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { API_KEY_HEADER } from './defaults.js';

// No-op if .env doesn't exist - production uses real env vars
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Every variable is optional: a missing API key means "export disabled",
 * not "misconfigured".
 */
export const EnvSchema = z.object({
  HONEYCOMB_API_KEY: z.string().optional(),
  HONEYCOMB_DATASET: z.string().optional(),
  OTEL_SERVICE_NAME: z.string().optional(),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().optional(),
  OTEL_EXPORTER_OTLP_HEADERS: z.string().optional(),
  OTEL_TRACES_SAMPLER_ARG: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Reset with _clearEnvCache() in tests.
 */
let _envCache: EnvVars | null = null;

/** Treat blank values the same as unset ones. */
function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    HONEYCOMB_API_KEY: nonBlank(process.env.HONEYCOMB_API_KEY),
    HONEYCOMB_DATASET: nonBlank(process.env.HONEYCOMB_DATASET),
    OTEL_SERVICE_NAME: nonBlank(process.env.OTEL_SERVICE_NAME),
    OTEL_EXPORTER_OTLP_ENDPOINT: nonBlank(process.env.OTEL_EXPORTER_OTLP_ENDPOINT),
    OTEL_EXPORTER_OTLP_HEADERS: nonBlank(process.env.OTEL_EXPORTER_OTLP_HEADERS),
    OTEL_TRACES_SAMPLER_ARG: nonBlank(process.env.OTEL_TRACES_SAMPLER_ARG),
  });

  return _envCache;
}

/**
 * Read the API key out of an OTLP headers string such as
 * "x-honeycomb-team=abc123,x-other=1".
 */
export function parseApiKeyHeader(headers: string | undefined): string | undefined {
  if (!headers) {
    return undefined;
  }

  for (const pair of headers.split(',')) {
    const separator = pair.indexOf('=');
    if (separator === -1) continue;

    const name = pair.slice(0, separator).trim().toLowerCase();
    if (name === API_KEY_HEADER) {
      return nonBlank(pair.slice(separator + 1));
    }
  }

  return undefined;
}

/**
 * Resolve the API key: HONEYCOMB_API_KEY first, then the header list.
 */
export function getApiKeyFromEnv(): string | undefined {
  const env = loadEnv();
  return env.HONEYCOMB_API_KEY ?? parseApiKeyHeader(env.OTEL_EXPORTER_OTLP_HEADERS);
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown by `search-obs check` when no API key is found.
 */
export const SETUP_INSTRUCTIONS = `
To export traces:

1. Create an ingest API key in your tracing account
2. Set the environment variable (or add it to .env):

   export HONEYCOMB_API_KEY="your-api-key"

3. Optional settings:

   export OTEL_SERVICE_NAME="search-backend"
   export OTEL_EXPORTER_OTLP_ENDPOINT="https://api.eu1.honeycomb.io:443"
   export HONEYCOMB_DATASET="search"       # legacy dataset-scoped accounts only
   export OTEL_TRACES_SAMPLER_ARG="0.25"    # keep 25% of traces
`.trim();
