/**
 * Search request tracing
 *
 * The calls the search service makes into the tracing context around its
 * own pipeline. The pipeline itself (ranking, filtering) is an opaque
 * function; this module only names the spans and records what the
 * dashboards query on:
 *
 *   search_request            query, query.is_sdg, query.sdg_number,
 *                             search.results_count
 *     filter_by_sdg_tag       sdg_results.count
 *     semantic_search_core    search.query, search.top_n,
 *                             search.results_count
 *       vectorize_query       query.token_count, query.vector_size
 *       calculate_similarities
 *                             calculation.documents_processed,
 *                             calculation.duration_seconds
 *
 * Every helper writes through the handle of its own span, so steps run in
 * parallel on one request never write to each other's span.
 */

import { withSpan } from '../observability/span-scope.js';
import type { TraceContext } from '../observability/trace-context.js';

/** "sdg7", "SDG 13", "sdg 17": the 17 Sustainable Development Goals */
const SDG_QUERY = /^sdg\s*(\d{1,2})$/i;

export interface QueryClassification {
  isSdg: boolean;
  /** 1-17 when isSdg */
  sdgNumber?: number;
}

export function classifyQuery(query: string): QueryClassification {
  const match = SDG_QUERY.exec(query.trim());
  const goal = match?.[1] === undefined ? NaN : Number(match[1]);
  if (goal >= 1 && goal <= 17) {
    return { isSdg: true, sdgNumber: goal };
  }
  return { isSdg: false };
}

/**
 * Trace one search request. `search` runs inside the search_request span
 * and may open its own child spans on `ctx`.
 */
export async function traceSearchRequest<T>(
  ctx: TraceContext,
  query: string,
  search: (classification: QueryClassification) => Promise<readonly T[]>
): Promise<readonly T[]> {
  return withSpan(ctx, 'search_request', async (scope) => {
    const classification = classifyQuery(query);
    scope.setAttribute('query', query);
    scope.setAttribute('query.is_sdg', classification.isSdg);
    if (classification.sdgNumber !== undefined) {
      scope.setAttribute('query.sdg_number', classification.sdgNumber);
    }

    const results = await search(classification);
    scope.setAttribute('search.results_count', results.length);
    return results;
  });
}

/**
 * Trace the SDG tag filter step. `filter` receives the goal number and
 * returns the matching results.
 */
export async function filterBySdgTag<T>(
  ctx: TraceContext,
  sdgNumber: number,
  filter: (sdgNumber: number) => Promise<readonly T[]> | readonly T[]
): Promise<readonly T[]> {
  return withSpan(ctx, 'filter_by_sdg_tag', async (scope) => {
    const results = await filter(sdgNumber);
    scope.setAttribute('sdg_results.count', results.length);
    return results;
  });
}

export interface SemanticSearchParams {
  query: string;
  topN: number;
}

/**
 * Trace the ranked (non-SDG) search path.
 */
export async function semanticSearchCore<T>(
  ctx: TraceContext,
  params: SemanticSearchParams,
  search: (params: SemanticSearchParams) => Promise<readonly T[]> | readonly T[]
): Promise<readonly T[]> {
  const attributes = { 'search.query': params.query, 'search.top_n': params.topN };
  return withSpan(ctx, 'semantic_search_core', async (scope) => {
    const results = await search(params);
    scope.setAttribute('search.results_count', results.length);
    return results;
  }, { attributes });
}

/** What a query vectorizer produced */
export interface VectorizedQuery {
  tokens: readonly string[];
  vector: ArrayLike<number>;
}

/**
 * Trace turning the query text into a vector.
 */
export async function vectorizeQuery<Q extends VectorizedQuery>(
  ctx: TraceContext,
  query: string,
  vectorize: (query: string) => Promise<Q> | Q
): Promise<Q> {
  return withSpan(ctx, 'vectorize_query', async (scope) => {
    const vectorized = await vectorize(query);
    scope.setAttribute('query.token_count', vectorized.tokens.length);
    scope.setAttribute('query.vector_size', vectorized.vector.length);
    return vectorized;
  });
}

/**
 * Trace scoring `documentCount` documents against the query vector.
 * The duration is measured on the context clock.
 */
export async function calculateSimilarities<S>(
  ctx: TraceContext,
  documentCount: number,
  calculate: () => Promise<S> | S
): Promise<S> {
  return withSpan(ctx, 'calculate_similarities', async (scope) => {
    const scores = await calculate();
    scope.setAttribute('calculation.documents_processed', documentCount);
    scope.setAttribute('calculation.duration_seconds', (ctx.now() - scope.startTime) / 1000);
    return scores;
  });
}
