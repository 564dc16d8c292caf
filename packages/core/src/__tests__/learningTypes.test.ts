/**
 * Learning record validation tests
 */

import { describe, it, expect } from 'vitest';
import {
  validateCandidate,
  isLearningType,
  embeddingText,
  type LearningCandidate,
} from '../memory/types.js';
import { ValidationError } from '../memory/errors.js';

function candidate(overrides: Partial<LearningCandidate> = {}): LearningCandidate {
  return {
    type: 'WORKING_SOLUTION',
    content: 'Run migrations before seeding',
    context: 'drizzle',
    confidence: 0.9,
    sessionSource: 'session-1',
    ...overrides,
  };
}

describe('validateCandidate', () => {
  it('returns a trimmed copy', () => {
    const result = validateCandidate(
      candidate({ content: '  Run migrations first \n', context: ' db ', sessionSource: ' s ' }),
      0.7,
    );
    expect(result).toEqual({
      type: 'WORKING_SOLUTION',
      content: 'Run migrations first',
      context: 'db',
      confidence: 0.9,
      sessionSource: 's',
    });
  });

  it('rejects empty content', () => {
    expect(() => validateCandidate(candidate({ content: '   ' }), 0.7)).toThrow(ValidationError);
  });

  it('rejects unknown types', () => {
    expect(() => validateCandidate({ ...candidate(), type: 'HUNCH' }, 0.7)).toThrow(/type must be one of/);
  });

  it.each([-0.1, 1.01, NaN])('rejects confidence %s', (confidence) => {
    expect(() => validateCandidate(candidate({ confidence }), 0)).toThrow(/between 0 and 1/);
  });

  it('rejects confidence below the admission threshold', () => {
    expect(() => validateCandidate(candidate({ confidence: 0.69 }), 0.7)).toThrow(/admission threshold/);
  });

  it('admits confidence exactly at the threshold', () => {
    expect(validateCandidate(candidate({ confidence: 0.7 }), 0.7).confidence).toBe(0.7);
  });
});

describe('helpers', () => {
  it('recognises learning types', () => {
    expect(isLearningType('FAILURE')).toBe(true);
    expect(isLearningType('failure')).toBe(false);
    expect(isLearningType(3)).toBe(false);
  });

  it('includes context in the embedded text only when asked', () => {
    expect(embeddingText('content', 'ctx', false)).toBe('content');
    expect(embeddingText('content', 'ctx', true)).toBe('content\nctx');
    expect(embeddingText('content', '', true)).toBe('content');
  });
});
