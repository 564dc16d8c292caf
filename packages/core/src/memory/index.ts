/**
 * Memory Engine: semantic learning memory
 *
 * Records:    typed learnings with confidence and provenance
 * Embeddings: provider contract, timeout guard, offline hashing embedder
 * Index:      exhaustive cosine search, rebuildable from the record store
 * Merge:      near-duplicate policy (longest content, max confidence)
 * Ranking:    similarity blended with confidence
 */

// Records
export {
  LEARNING_TYPES,
  isLearningType,
  assertConfidence,
  validateCandidate,
  embeddingText,
} from './types.js';
export type {
  LearningType,
  LearningRecord,
  LearningCandidate,
  UncheckedCandidate,
  LearningPatch,
  LearningFilter,
  StoreResult,
  QueryOptions,
  RankedLearning,
} from './types.js';

// Errors
export {
  MemoryError,
  ValidationError,
  NotFoundError,
  EmbeddingUnavailableError,
  EmbeddingTimeoutError,
  StoreIOError,
  ConcurrencyConflictError,
  errorMessage,
} from './errors.js';
export type { MemoryErrorCode, EmbeddingFailureReason } from './errors.js';

// Embeddings
export { GuardedEmbeddingService } from './embeddingService.js';
export type { EmbeddingService } from './embeddingService.js';
export { HashingEmbeddingService, tokenize } from './hashingEmbedding.js';

// Index
export { SimilarityIndex } from './similarityIndex.js';
export type {
  IndexEntryMeta,
  IndexEntry,
  IndexHit,
  IndexFilter,
  RebuildEntry,
} from './similarityIndex.js';

// Concurrency
export { KeyedLock } from './keyedLock.js';

// Merge
export { mergeLearning, mergeContext, DEFAULT_MERGE_OPTIONS } from './mergePolicy.js';
export type { MergeOptions, MergeOutcome } from './mergePolicy.js';

// Ranking
export { rankLearnings, combinedScore, DEFAULT_RANKING_WEIGHTS } from './ranking.js';
export type { RankingWeights, RankFilter, SimilarityHit } from './ranking.js';
