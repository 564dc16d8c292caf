/**
 * Learning records: the durable unit of knowledge kept by the daemon.
 */

import { ValidationError } from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

export const LEARNING_TYPES = [
  'WORKING_SOLUTION',
  'GOTCHA',
  'PATTERN',
  'DECISION',
  'FAILURE',
  'PREFERENCE',
] as const;

export type LearningType = typeof LEARNING_TYPES[number];

export interface LearningRecord {
  id: string;
  type: LearningType;
  content: string;
  context: string;
  confidence: number;
  embedding: number[];
  embeddingModel: string;
  sessionSource: string;
  createdAt: string;
  updatedAt: string;
  mergeCount: number;
  archived: boolean;
}

/** What a caller submits to be stored. */
export interface LearningCandidate {
  type: LearningType;
  content: string;
  context: string;
  confidence: number;
  sessionSource: string;
}

/** A candidate whose `type` has not been checked against LEARNING_TYPES yet. */
export type UncheckedCandidate = Omit<LearningCandidate, 'type'> & { type: string };

/** Fields the merge engine and administrative updates may change. */
export interface LearningPatch {
  content?: string;
  context?: string;
  confidence?: number;
  sessionSource?: string;
  mergeCount?: number;
  embedding?: number[];
  embeddingModel?: string;
}

export interface LearningFilter {
  type?: LearningType;
  sessionSource?: string;
  minConfidence?: number;
  includeArchived?: boolean;
}

export interface StoreResult {
  id: string;
  created: boolean;
  /** Similarity to the record a merge landed on. */
  similarity?: number;
}

export interface QueryOptions {
  k?: number;
  typeFilter?: LearningType;
  minConfidence?: number;
  minScore?: number;
}

export interface RankedLearning {
  id: string;
  type: LearningType;
  content: string;
  context: string;
  confidence: number;
  score: number;
  similarity: number;
}

// ============================================================================
// VALIDATION
// ============================================================================

export function isLearningType(value: unknown): value is LearningType {
  return typeof value === 'string' && (LEARNING_TYPES as readonly string[]).includes(value);
}

export function assertConfidence(confidence: number, field = 'confidence'): void {
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new ValidationError(`${field} must be a number between 0 and 1`, { [field]: confidence });
  }
}

/**
 * Normalises and checks a candidate before it reaches dedup or the store.
 * Returns a trimmed copy.
 */
export function validateCandidate(
  candidate: UncheckedCandidate,
  admissionThreshold: number,
): LearningCandidate {
  const { type } = candidate;
  if (!isLearningType(type)) {
    throw new ValidationError(
      `type must be one of ${LEARNING_TYPES.join(', ')}`,
      { type },
    );
  }

  const content = candidate.content.trim();
  if (content.length === 0) {
    throw new ValidationError('content must not be empty');
  }

  assertConfidence(candidate.confidence);
  if (candidate.confidence < admissionThreshold) {
    throw new ValidationError(
      `confidence ${candidate.confidence} is below the admission threshold ${admissionThreshold}`,
      { confidence: candidate.confidence, admissionThreshold },
    );
  }

  return {
    type,
    content,
    context: candidate.context.trim(),
    confidence: candidate.confidence,
    sessionSource: candidate.sessionSource.trim(),
  };
}

/** Text the embedding is derived from. */
export function embeddingText(content: string, context: string, includeContext: boolean): string {
  if (!includeContext || context.length === 0) return content;
  return `${content}\n${context}`;
}
