/**
 * Offline embedder: signed feature hashing over word tokens.
 *
 * No model and no network. Texts sharing vocabulary land close together,
 * which is enough for exact and lightly reworded duplicates and for running
 * the daemon without a model server.
 */

import type { EmbeddingService } from './embeddingService.js';

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'is', 'are', 'was', 'were', 'be', 'to', 'in', 'on', 'of',
  'and', 'or', 'that', 'this', 'it', 'its', 'as', 'at', 'by', 'for', 'from',
  'with', 'we', 'our', 'they',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(w => w.length > 1 && !STOP_WORDS.has(w));
}

/** 32-bit FNV-1a. */
function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEmbeddingService implements EmbeddingService {
  readonly modelName: string;

  constructor(
    readonly dimension: number = 384,
    modelName = 'hashing-v1',
  ) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`HashingEmbeddingService dimension must be a positive integer, got ${dimension}`);
    }
    this.modelName = modelName;
  }

  async embed(text: string): Promise<Float32Array> {
    return this.embedSync(text);
  }

  embedSync(text: string): Float32Array {
    const vector = new Float32Array(this.dimension);

    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimension;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    let norm = 0;
    for (let i = 0; i < vector.length; i++) norm += vector[i] * vector[i];
    if (norm === 0) return vector;

    const scale = 1 / Math.sqrt(norm);
    for (let i = 0; i < vector.length; i++) vector[i] *= scale;
    return vector;
  }
}
