/**
 * Embedding Service Tests
 */

import { describe, it, expect } from 'vitest';
import {
  GuardedEmbeddingService,
  type EmbeddingService,
} from '../memory/embeddingService.js';
import { HashingEmbeddingService, tokenize } from '../memory/hashingEmbedding.js';
import { EmbeddingTimeoutError, EmbeddingUnavailableError } from '../memory/errors.js';

// ============================================================================
// GuardedEmbeddingService Tests
// ============================================================================

function stubService(
  embed: (text: string, signal?: AbortSignal) => Promise<Float32Array>,
  dimension = 3,
): EmbeddingService {
  return { embed, dimension, modelName: 'stub-model' };
}

describe('GuardedEmbeddingService', () => {
  it('passes through vectors of the declared dimension', async () => {
    const guarded = new GuardedEmbeddingService(
      stubService(async () => new Float32Array([0.1, 0.2, 0.3])),
      1000,
    );

    const vector = await guarded.embed('hello');
    expect(Array.from(vector)).toEqual([
      expect.closeTo(0.1),
      expect.closeTo(0.2),
      expect.closeTo(0.3),
    ]);
    expect(guarded.modelName).toBe('stub-model');
    expect(guarded.dimension).toBe(3);
  });

  it('times out and aborts a provider that never answers', async () => {
    let aborted = false;
    const guarded = new GuardedEmbeddingService(
      stubService((_text, signal) => new Promise((_, reject) => {
        signal?.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      })),
      20,
    );

    await expect(guarded.embed('slow')).rejects.toBeInstanceOf(EmbeddingTimeoutError);
    expect(aborted).toBe(true);
  });

  it('wraps provider failures as EmbeddingUnavailableError', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:11434');
    const guarded = new GuardedEmbeddingService(
      stubService(async () => { throw cause; }),
      1000,
    );

    const err = await guarded.embed('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingUnavailableError);
    if (!(err instanceof EmbeddingUnavailableError)) return;
    expect(err.reason).toBe('request_failed');
    expect(err.cause).toBe(cause);
    expect(err.retryable).toBe(true);
  });

  it('rejects vectors with the wrong dimension', async () => {
    const guarded = new GuardedEmbeddingService(
      stubService(async () => new Float32Array([1, 0])),
      1000,
    );

    const err = await guarded.embed('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingUnavailableError);
    if (!(err instanceof EmbeddingUnavailableError)) return;
    expect(err.reason).toBe('dimension_mismatch');
  });

  it('rejects vectors with non-finite components', async () => {
    const guarded = new GuardedEmbeddingService(
      stubService(async () => new Float32Array([1, NaN, 0])),
      1000,
    );

    const err = await guarded.embed('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingUnavailableError);
    if (!(err instanceof EmbeddingUnavailableError)) return;
    expect(err.reason).toBe('invalid_response');
  });
});

// ============================================================================
// HashingEmbeddingService Tests
// ============================================================================

/** Hashing vectors are unit length, so the dot product is their cosine. */
function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

describe('HashingEmbeddingService', () => {
  const embedder = new HashingEmbeddingService(384);

  it('tokenizes to lowercase words without stop words', () => {
    expect(tokenize('The SQLite DB is locked!')).toEqual(['sqlite', 'db', 'locked']);
  });

  it('keeps letters and digits outside ASCII', () => {
    expect(tokenize('Café crashes, naïve fix')).toEqual(['café', 'crashes', 'naïve', 'fix']);
    expect(tokenize('Сборка падает на ARM64')).toEqual(['сборка', 'падает', 'на', 'arm64']);
  });

  it('embeds non-Latin text to a unit vector', async () => {
    const v = await embedder.embed('Сборка падает без кэша');
    expect(dot(v, v)).toBeCloseTo(1.0, 5);

    const same = await embedder.embed('без кэша сборка падает');
    expect(dot(v, same)).toBeCloseTo(1.0, 5);
  });

  it('produces unit vectors of the configured dimension', async () => {
    const v = await embedder.embed('vitest needs a config file for workspaces');
    expect(v).toHaveLength(384);

    let norm = 0;
    for (const x of v) norm += x * x;
    expect(Math.sqrt(norm)).toBeCloseTo(1.0, 5);
  });

  it('is deterministic', async () => {
    const a = await embedder.embed('pin the node version in engines');
    const b = await embedder.embed('pin the node version in engines');
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it('scores reordered wording as identical', async () => {
    const a = await embedder.embed('sqlite database locked during migration');
    const b = await embedder.embed('during migration the sqlite database locked');
    expect(dot(a, b)).toBeCloseTo(1.0, 5);
  });

  it('scores unrelated text far lower than shared wording', async () => {
    const a = await embedder.embed('sqlite database locked during migration');
    const c = await embedder.embed('react component renders twice');
    expect(dot(a, c)).toBeLessThan(0.5);
  });

  it('returns a zero vector when nothing survives tokenization', async () => {
    const v = await embedder.embed('the a an');
    expect(v.every(x => x === 0)).toBe(true);
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new HashingEmbeddingService(0)).toThrow(/positive integer/);
  });
});
