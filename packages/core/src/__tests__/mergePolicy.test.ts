/**
 * Merge policy tests
 */

import { describe, it, expect } from 'vitest';
import { mergeLearning, mergeContext } from '../memory/mergePolicy.js';
import type { LearningCandidate, LearningRecord } from '../memory/types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createRecord(overrides: Partial<LearningRecord> = {}): LearningRecord {
  return {
    id: 'rec-1',
    type: 'GOTCHA',
    content: 'X causes Y',
    context: 'build',
    confidence: 0.9,
    embedding: [1, 0, 0],
    embeddingModel: 'test-model',
    sessionSource: 'session-a',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    mergeCount: 1,
    archived: false,
    ...overrides,
  };
}

function createCandidate(overrides: Partial<LearningCandidate> = {}): LearningCandidate {
  return {
    type: 'GOTCHA',
    content: 'Doing X always causes Y to happen',
    context: '',
    confidence: 0.95,
    sessionSource: 'session-b',
    ...overrides,
  };
}

// ============================================================================
// mergeLearning
// ============================================================================

describe('mergeLearning', () => {
  it('takes the longer content with its embedding and the higher confidence', () => {
    const { patch, contentReplaced } = mergeLearning(
      createRecord(),
      createCandidate(),
      new Float32Array([0, 1, 0]),
      'test-model',
    );

    expect(contentReplaced).toBe(true);
    expect(patch).toEqual({
      content: 'Doing X always causes Y to happen',
      embedding: [0, 1, 0],
      embeddingModel: 'test-model',
      confidence: 0.95,
      mergeCount: 2,
    });
  });

  it('keeps existing content on a length tie', () => {
    const { patch, contentReplaced } = mergeLearning(
      createRecord({ content: 'abcd' }),
      createCandidate({ content: 'wxyz', confidence: 0.8 }),
      [0, 1, 0],
      'test-model',
    );

    expect(contentReplaced).toBe(false);
    expect(patch.content).toBeUndefined();
    expect(patch.embedding).toBeUndefined();
    expect(patch.confidence).toBe(0.9);
  });

  it('appends new context and skips context already present', () => {
    const added = mergeLearning(createRecord(), createCandidate({ context: 'vitest' }), [1, 0, 0], 'm');
    expect(added.patch.context).toBe('build; vitest');

    const present = mergeLearning(createRecord(), createCandidate({ context: 'Build' }), [1, 0, 0], 'm');
    expect(present.patch.context).toBeUndefined();
  });

  it('leaves context alone when merging context is off', () => {
    const { patch } = mergeLearning(
      createRecord(),
      createCandidate({ context: 'vitest' }),
      [1, 0, 0],
      'm',
      { mergeContext: false, sessionSource: 'keep' },
    );
    expect(patch.context).toBeUndefined();
  });

  it('keeps first-seen session attribution unless configured otherwise', () => {
    const kept = mergeLearning(createRecord(), createCandidate(), [1, 0, 0], 'm');
    expect(kept.patch.sessionSource).toBeUndefined();

    const latest = mergeLearning(
      createRecord(),
      createCandidate(),
      [1, 0, 0],
      'm',
      { mergeContext: true, sessionSource: 'latest' },
    );
    expect(latest.patch.sessionSource).toBe('session-b');
  });
});

describe('mergeContext', () => {
  it('handles empty sides', () => {
    expect(mergeContext('', 'node')).toBe('node');
    expect(mergeContext('node', '')).toBe('node');
  });
});
