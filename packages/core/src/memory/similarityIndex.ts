/**
 * Similarity Index: in-memory nearest-neighbour lookup over learning vectors
 *
 * A derived view of the record store: every entry can be rebuilt from the
 * stored embeddings, so nothing here is ever persisted on its own.
 *
 * Search is an exhaustive cosine scan and always returns the exact top-k.
 */

import type { LearningType } from './types.js';
import { ValidationError } from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface IndexEntryMeta {
  type: LearningType;
  createdAt: string;
}

export interface IndexEntry extends IndexEntryMeta {
  id: string;
  vector: Float32Array;
  norm: number;
}

export interface IndexHit {
  id: string;
  score: number;
}

export interface RebuildEntry extends IndexEntryMeta {
  id: string;
  embedding: ArrayLike<number>;
}

export type IndexFilter = (meta: IndexEntryMeta) => boolean;

// ============================================================================
// INDEX
// ============================================================================

export class SimilarityIndex {
  private entries = new Map<string, IndexEntry>();
  private _dimension: number | null;

  constructor(dimension?: number) {
    this._dimension = dimension ?? null;
  }

  get dimension(): number | null {
    return this._dimension;
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /**
   * Insert or replace the vector for `id`.
   * The entry object is swapped whole; readers never see a half-written one.
   */
  upsert(id: string, embedding: ArrayLike<number>, meta: IndexEntryMeta): void {
    this.entries.set(id, this.makeEntry(id, embedding, meta));
  }

  remove(id: string): boolean {
    return this.entries.delete(id);
  }

  clear(): void {
    this.entries = new Map();
  }

  /**
   * Replace the whole index with `records` in a single swap.
   */
  rebuild(records: Iterable<RebuildEntry>): number {
    const next = new Map<string, IndexEntry>();
    for (const record of records) {
      next.set(record.id, this.makeEntry(record.id, record.embedding, record));
    }
    this.entries = next;
    return next.size;
  }

  /**
   * Top `k` entries by cosine similarity, highest first.
   * Ties go to the more recently created entry; entries scoring below
   * `minScore` or rejected by `filter` are skipped.
   */
  search(
    query: ArrayLike<number>,
    k: number,
    minScore = -1,
    filter?: IndexFilter,
  ): IndexHit[] {
    if (k <= 0) return [];
    this.checkDimension(query.length);

    const queryNorm = vectorNorm(query);
    if (queryNorm === 0) {
      return minScore <= 0 ? this.zeroScoreHits(k, filter) : [];
    }

    const scored: Array<{ entry: IndexEntry; score: number }> = [];
    for (const entry of this.entries.values()) {
      if (filter && !filter(entry)) continue;

      let score = 0;
      if (entry.norm > 0) {
        let dot = 0;
        for (let i = 0; i < query.length; i++) dot += query[i] * entry.vector[i];
        score = dot / (queryNorm * entry.norm);
      }
      if (score < minScore) continue;
      scored.push({ entry, score });
    }

    scored.sort(compareHits);
    return scored.slice(0, k).map(({ entry, score }) => ({ id: entry.id, score }));
  }

  private zeroScoreHits(k: number, filter?: IndexFilter): IndexHit[] {
    const all = [...this.entries.values()]
      .filter(entry => !filter || filter(entry))
      .map(entry => ({ entry, score: 0 }));
    all.sort(compareHits);
    return all.slice(0, k).map(({ entry }) => ({ id: entry.id, score: 0 }));
  }

  private makeEntry(id: string, embedding: ArrayLike<number>, meta: IndexEntryMeta): IndexEntry {
    this.checkDimension(embedding.length);
    if (this._dimension === null) {
      this._dimension = embedding.length;
    }

    const vector = Float32Array.from(embedding);
    return {
      id,
      type: meta.type,
      createdAt: meta.createdAt,
      vector,
      norm: vectorNorm(vector),
    };
  }

  private checkDimension(length: number): void {
    if (length === 0) {
      throw new ValidationError('Embedding must not be empty');
    }
    if (this._dimension !== null && length !== this._dimension) {
      throw new ValidationError(
        `Embedding dimension ${length} does not match index dimension ${this._dimension}`,
        { expected: this._dimension, actual: length },
      );
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function vectorNorm(v: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  return Math.sqrt(sum);
}

function compareHits(
  a: { entry: IndexEntry; score: number },
  b: { entry: IndexEntry; score: number },
): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.entry.createdAt !== b.entry.createdAt) {
    return a.entry.createdAt < b.entry.createdAt ? 1 : -1;
  }
  return a.entry.id < b.entry.id ? 1 : a.entry.id > b.entry.id ? -1 : 0;
}
