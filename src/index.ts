/**
 * search-observability - Library Entry Point
 *
 * Request-scoped tracing for the search backend. Configure export once at
 * startup, create one TraceContext per request, and pass it down.
 *
 * ## CLI
 *
 * ```bash
 * search-obs check          # Show resolved tracing configuration
 * search-obs check --json   # Same, as JSON
 * ```
 *
 * @example Service startup
 * ```typescript
 * import express from 'express';
 * import { configure, instrumentIncomingRequests, shutdown } from 'search-observability';
 *
 * configure({ serviceName: 'search-backend' });
 * const app = express();
 * instrumentIncomingRequests(app);
 * process.on('SIGTERM', () => void shutdown());
 * ```
 *
 * @example Inside a handler
 * ```typescript
 * import { getRequestContext, traceSearchRequest } from 'search-observability';
 *
 * app.get('/search', async (req, res) => {
 *   const ctx = getRequestContext(res);
 *   const results = await traceSearchRequest(ctx, String(req.query.q), runSearch);
 *   res.json(results);
 * });
 * ```
 *
 * @packageDocumentation
 */

// Re-export types for library consumers
export type { GlobalOptions, CommandContext } from './cli/types.js';
export type { Logger } from './utils/logger.js';
export { consoleLogger, silentLogger } from './utils/logger.js';

// Request-scoped tracing
export {
  configure,
  getExporterState,
  createTraceContext,
  currentTracer,
  flush,
  shutdown,
  TraceContext,
  ScopeHandle,
  openSpan,
  withSpan,
  setAttribute,
  setAttributes,
  isAttributeValue,
  DetachToken,
  BaggageOverlay,
  attachBaggage,
  detachBaggage,
  withBaggage,
  extractRemoteContext,
  baggageFromContext,
  createBackend,
  createNoopBackend,
  createOtlpBackend,
} from './observability/index.js';
export type {
  AttributeValue,
  Attributes,
  SpanStatus,
  SpanRecord,
  BackendSpan,
  StartSpanOptions,
  TracingBackend,
  ExporterStatus,
  DisabledReason,
  ExporterState,
  TraceContextOptions,
  WithSpanOptions,
  HeaderCarrier,
  BackendResult,
  OtlpBackendConfig,
} from './observability/index.js';

// HTTP instrumentation
export {
  tracingMiddleware,
  instrumentIncomingRequests,
  getRequestContext,
} from './http/index.js';
export type { RequestLike, ResponseLike } from './http/index.js';

// Search spans
export {
  classifyQuery,
  traceSearchRequest,
  filterBySdgTag,
  semanticSearchCore,
  vectorizeQuery,
  calculateSimilarities,
} from './search/index.js';
export type { QueryClassification, SemanticSearchParams, VectorizedQuery } from './search/index.js';

// Configuration
export {
  resolveOptions,
  loadEnv,
  getApiKeyFromEnv,
  parseApiKeyHeader,
  DEFAULT_OPTIONS,
  ObservabilityOptionsSchema,
} from './config/index.js';
export type { ObservabilityOptions, ResolvedOptions, EnvVars } from './config/index.js';

// Errors
export {
  CLIError,
  ConfigError,
  ExporterError,
  describeError,
} from './errors/index.js';
