/**
 * Discovery module public API.
 *
 * Re-exports the types and classes needed to run search-result batches
 * through the pipeline: statistics, the per-batch context stages, the
 * processor itself and the SQLite review queue.
 */

// Types
export type {
  SearchResult,
  ProcessingStatistics,
  CandidateRequest,
  CreatedCandidate,
  CandidateSink,
} from './types.js';
export { totalCandidatesCreated, totalProcessed } from './types.js';

// Pipeline stages
export {
  createContext,
  countResult,
  extractStage,
  spamStage,
  dedupStage,
  eligibilityStage,
  gateStage,
  recordOutcome,
  toStatistics,
} from './processing-context.js';
export type {
  ProcessingContext,
  ProcessingCounters,
  StageResult,
  SkipStage,
  ConfidenceBand,
  Outcome,
} from './processing-context.js';

// Core classes
export { SearchResultProcessor } from './search-result-processor.js';
export type { SearchResultProcessorOptions } from './search-result-processor.js';
export { CandidateStore } from './candidate-store.js';
export { parseSearchResults, readSearchResultsFile } from './search-results-file.js';
export type { SearchResultBatch } from './search-results-file.js';
