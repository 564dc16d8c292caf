/**
 * Final ranking of query hits: similarity blended with stored confidence.
 */

import type { LearningRecord, LearningType, RankedLearning } from './types.js';

export interface RankingWeights {
  similarity: number;
  confidence: number;
}

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = {
  similarity: 0.7,
  confidence: 0.3,
};

export interface RankFilter {
  typeFilter?: LearningType;
  minConfidence?: number;
  /** Floor on the blended score, applied before truncation. */
  minScore?: number;
}

export interface SimilarityHit {
  record: LearningRecord;
  similarity: number;
}

export function combinedScore(similarity: number, confidence: number, weights: RankingWeights): number {
  return similarity * weights.similarity + confidence * weights.confidence;
}

/**
 * Drop archived and filtered-out hits, score the rest, drop scores under
 * `minScore` and keep the best `k`.
 * Equal scores fall back to the more recently created record.
 */
export function rankLearnings(
  hits: SimilarityHit[],
  k: number,
  filter: RankFilter = {},
  weights: RankingWeights = DEFAULT_RANKING_WEIGHTS,
): RankedLearning[] {
  const minConfidence = filter.minConfidence ?? 0;
  const minScore = filter.minScore ?? Number.NEGATIVE_INFINITY;

  const ranked = hits
    .filter(({ record }) =>
      !record.archived
      && (filter.typeFilter === undefined || record.type === filter.typeFilter)
      && record.confidence >= minConfidence)
    .map(({ record, similarity }) => ({
      record,
      similarity,
      score: combinedScore(similarity, record.confidence, weights),
    }))
    .filter(({ score }) => score >= minScore);

  ranked.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (a.record.createdAt === b.record.createdAt) return 0;
    return a.record.createdAt < b.record.createdAt ? 1 : -1;
  });

  return ranked.slice(0, Math.max(0, k)).map(({ record, similarity, score }) => ({
    id: record.id,
    type: record.type,
    content: record.content,
    context: record.context,
    confidence: record.confidence,
    score,
    similarity,
  }));
}
