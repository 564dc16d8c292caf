/**
 * Merge policy for near-duplicate learnings.
 *
 * Pure function: given the stored record and an incoming candidate that
 * resolved to it, compute the patch the store should apply.
 */

import type { LearningCandidate, LearningPatch, LearningRecord } from './types.js';

export interface MergeOptions {
  /** Append the candidate's context when it adds something new. */
  mergeContext: boolean;
  /** 'keep' preserves first-seen attribution; 'latest' takes the candidate's. */
  sessionSource: 'keep' | 'latest';
}

export const DEFAULT_MERGE_OPTIONS: MergeOptions = {
  mergeContext: true,
  sessionSource: 'keep',
};

export interface MergeOutcome {
  patch: LearningPatch;
  /** True when the candidate's content replaced the stored content. */
  contentReplaced: boolean;
}

export function mergeLearning(
  existing: LearningRecord,
  candidate: LearningCandidate,
  candidateEmbedding: ArrayLike<number>,
  embeddingModel: string,
  options: MergeOptions = DEFAULT_MERGE_OPTIONS,
): MergeOutcome {
  // Longer wins; a tie keeps what is already stored.
  const contentReplaced = candidate.content.length > existing.content.length;

  const patch: LearningPatch = {
    confidence: Math.max(existing.confidence, candidate.confidence),
    mergeCount: existing.mergeCount + 1,
  };

  if (contentReplaced) {
    patch.content = candidate.content;
    patch.embedding = Array.from(candidateEmbedding);
    patch.embeddingModel = embeddingModel;
  }

  if (options.mergeContext) {
    const context = mergeContext(existing.context, candidate.context);
    if (context !== existing.context) patch.context = context;
  }

  if (options.sessionSource === 'latest' && candidate.sessionSource.length > 0) {
    patch.sessionSource = candidate.sessionSource;
  }

  return { patch, contentReplaced };
}

export function mergeContext(existing: string, incoming: string): string {
  if (incoming.length === 0) return existing;
  if (existing.length === 0) return incoming;
  if (existing.toLowerCase().includes(incoming.toLowerCase())) return existing;
  return `${existing}; ${incoming}`;
}
