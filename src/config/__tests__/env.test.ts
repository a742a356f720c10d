/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  loadEnv,
  getApiKeyFromEnv,
  parseApiKeyHeader,
  _clearEnvCache,
} from '../env.js';

const ENV_KEYS = [
  'HONEYCOMB_API_KEY',
  'HONEYCOMB_DATASET',
  'OTEL_SERVICE_NAME',
  'OTEL_EXPORTER_OTLP_ENDPOINT',
  'OTEL_EXPORTER_OTLP_HEADERS',
  'OTEL_TRACES_SAMPLER_ARG',
];

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
    // Blank counts as unset, so this hides any real values
    for (const key of ENV_KEYS) {
      vi.stubEnv(key, '');
    }
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads HONEYCOMB_API_KEY when set', () => {
      vi.stubEnv('HONEYCOMB_API_KEY', 'test-secret');

      const env = loadEnv();

      expect(env.HONEYCOMB_API_KEY).toBe('test-secret');
    });

    it('returns undefined for missing optional keys', () => {
      const env = loadEnv();

      expect(env.HONEYCOMB_API_KEY).toBeUndefined();
      expect(env.HONEYCOMB_DATASET).toBeUndefined();
      expect(env.OTEL_TRACES_SAMPLER_ARG).toBeUndefined();
    });

    it('trims values and treats whitespace-only values as unset', () => {
      vi.stubEnv('OTEL_SERVICE_NAME', '  search-api  ');
      vi.stubEnv('HONEYCOMB_DATASET', '   ');

      const env = loadEnv();

      expect(env.OTEL_SERVICE_NAME).toBe('search-api');
      expect(env.HONEYCOMB_DATASET).toBeUndefined();
    });

    it('caches environment after first load', () => {
      vi.stubEnv('OTEL_SERVICE_NAME', 'first');
      const env1 = loadEnv();

      vi.stubEnv('OTEL_SERVICE_NAME', 'second');
      const env2 = loadEnv();

      expect(env1).toBe(env2);
      expect(env2.OTEL_SERVICE_NAME).toBe('first');
    });

    it('reloads after _clearEnvCache()', () => {
      vi.stubEnv('OTEL_SERVICE_NAME', 'first');
      loadEnv();

      _clearEnvCache();
      vi.stubEnv('OTEL_SERVICE_NAME', 'second');

      expect(loadEnv().OTEL_SERVICE_NAME).toBe('second');
    });
  });

  describe('parseApiKeyHeader()', () => {
    it('reads the key from a single header', () => {
      expect(parseApiKeyHeader('x-honeycomb-team=test-secret')).toBe('test-secret');
    });

    it('finds the key among other headers', () => {
      expect(parseApiKeyHeader('x-other=1, x-honeycomb-team = test-secret ,x-last=2')).toBe(
        'test-secret'
      );
    });

    it('matches the header name case-insensitively', () => {
      expect(parseApiKeyHeader('X-Honeycomb-Team=test-secret')).toBe('test-secret');
    });

    it('returns undefined when the header is absent or empty', () => {
      expect(parseApiKeyHeader(undefined)).toBeUndefined();
      expect(parseApiKeyHeader('x-other=1')).toBeUndefined();
      expect(parseApiKeyHeader('x-honeycomb-team=')).toBeUndefined();
      expect(parseApiKeyHeader('garbage')).toBeUndefined();
    });
  });

  describe('getApiKeyFromEnv()', () => {
    it('prefers HONEYCOMB_API_KEY over the header list', () => {
      vi.stubEnv('HONEYCOMB_API_KEY', 'from-variable');
      vi.stubEnv('OTEL_EXPORTER_OTLP_HEADERS', 'x-honeycomb-team=from-header');

      expect(getApiKeyFromEnv()).toBe('from-variable');
    });

    it('falls back to OTEL_EXPORTER_OTLP_HEADERS', () => {
      vi.stubEnv('OTEL_EXPORTER_OTLP_HEADERS', 'x-honeycomb-team=from-header');

      expect(getApiKeyFromEnv()).toBe('from-header');
    });
  });
});
