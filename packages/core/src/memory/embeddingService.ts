/**
 * Embedding Service: semantic vectors for learnings and probes
 *
 * The provider contract for embedding-based retrieval.
 * Concrete providers (remote HTTP, local model server) live in the server
 * package; the hashing embedder in this package needs no network.
 *
 * Provides:
 * - EmbeddingService interface (implemented by providers)
 * - GuardedEmbeddingService: bounded timeout + output contract checks
 */

import {
  EmbeddingTimeoutError,
  EmbeddingUnavailableError,
  errorMessage,
} from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EmbeddingService {
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
  readonly dimension: number;
  readonly modelName: string;
}

// ============================================================================
// GUARDED SERVICE
// ============================================================================

/**
 * Wraps a provider so that no call outlives `timeoutMs` and every vector it
 * hands back has the declared dimension.
 *
 * A provider failure surfaces as EmbeddingUnavailableError and a slow
 * provider as EmbeddingTimeoutError; an empty result is never returned in
 * their place.
 */
export class GuardedEmbeddingService implements EmbeddingService {
  readonly dimension: number;
  readonly modelName: string;

  constructor(
    private readonly inner: EmbeddingService,
    private readonly timeoutMs: number,
  ) {
    this.dimension = inner.dimension;
    this.modelName = inner.modelName;
  }

  async embed(text: string): Promise<Float32Array> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle first: a provider that rejects synchronously on abort must
        // not win the race with its own error.
        reject(new EmbeddingTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      const vector = await Promise.race([this.inner.embed(text, controller.signal), timeout]);
      return this.checkVector(vector);
    } catch (err) {
      if (err instanceof EmbeddingTimeoutError || err instanceof EmbeddingUnavailableError) {
        throw err;
      }
      throw new EmbeddingUnavailableError(
        `Embedding request to ${this.modelName} failed: ${errorMessage(err)}`,
        'request_failed',
        err,
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private checkVector(vector: Float32Array): Float32Array {
    if (vector.length !== this.dimension) {
      throw new EmbeddingUnavailableError(
        `${this.modelName} returned a ${vector.length}-dim vector, expected ${this.dimension}`,
        'dimension_mismatch',
      );
    }
    for (let i = 0; i < vector.length; i++) {
      if (!Number.isFinite(vector[i])) {
        throw new EmbeddingUnavailableError(
          `${this.modelName} returned a non-finite component at ${i}`,
          'invalid_response',
        );
      }
    }
    return vector;
  }
}
