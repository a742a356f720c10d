export {
  classifyQuery,
  traceSearchRequest,
  filterBySdgTag,
  semanticSearchCore,
  vectorizeQuery,
  calculateSimilarities,
  type QueryClassification,
  type SemanticSearchParams,
  type VectorizedQuery,
} from './tracing.js';
