import { randomUUID } from 'crypto';
import { and, desc, eq, gte, lt, ne, or, sql } from 'drizzle-orm';
import {
  MemoryError,
  StoreIOError,
  ValidationError,
  assertConfidence,
  validateCandidate,
  type LearningFilter,
  type LearningPatch,
  type LearningRecord,
  type LearningType,
  type UncheckedCandidate,
} from 'memory-core';
import type { Database } from './index.js';
import { learnings, storeMeta, type LearningRow, type NewLearningRow } from './schema.js';
import type { IoHealthObserver } from '../services/healthTracker.js';

export interface RecordStoreOptions {
  admissionThreshold: number;
  dimension: number;
  health?: IoHealthObserver;
  clock?: () => Date;
}

export interface PageOptions {
  limit: number;
  cursor?: string;
}

export interface RecordPage {
  records: LearningRecord[];
  nextCursor: string | null;
}

export interface StoreStats {
  total: number;
  byType: Partial<Record<LearningType, number>>;
}

export interface StaleEmbedding {
  id: string;
  content: string;
  context: string;
}

/**
 * Durable, keyed storage of learning records and their embeddings.
 *
 * Each write is a single SQLite statement, committed before the promise
 * resolves; a record is never visible half-written.
 */
export class RecordStore {
  private readonly admissionThreshold: number;
  private readonly dimension: number;
  private readonly health?: IoHealthObserver;
  private readonly clock: () => Date;

  constructor(private readonly db: Database, options: RecordStoreOptions) {
    this.admissionThreshold = options.admissionThreshold;
    this.dimension = options.dimension;
    this.health = options.health;
    this.clock = options.clock ?? (() => new Date());
  }

  async create(
    candidate: UncheckedCandidate,
    embedding: ArrayLike<number>,
    embeddingModel: string,
  ): Promise<LearningRecord> {
    const valid = validateCandidate(candidate, this.admissionThreshold);
    this.checkEmbedding(embedding);

    const now = this.now();
    const row: NewLearningRow = {
      id: randomUUID(),
      type: valid.type,
      content: valid.content,
      context: valid.context,
      confidence: valid.confidence,
      embedding: Array.from(embedding),
      embeddingModel,
      sessionSource: valid.sessionSource,
      mergeCount: 1,
      archived: false,
      createdAt: now,
      updatedAt: now,
    };

    const rows = await this.io('create', () =>
      this.db.insert(learnings).values(row).returning());
    return toRecord(firstRow(rows, 'create'));
  }

  async get(id: string): Promise<LearningRecord | null> {
    const rows = await this.io('get', () =>
      this.db.select().from(learnings).where(eq(learnings.id, id)).limit(1));
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async update(id: string, patch: LearningPatch): Promise<LearningRecord | null> {
    const values: Partial<NewLearningRow> = { updatedAt: this.now() };

    if (patch.content !== undefined) {
      const content = patch.content.trim();
      if (content.length === 0) throw new ValidationError('content must not be empty');
      values.content = content;
    }
    if (patch.context !== undefined) values.context = patch.context.trim();
    if (patch.confidence !== undefined) {
      assertConfidence(patch.confidence);
      values.confidence = patch.confidence;
    }
    if (patch.sessionSource !== undefined) values.sessionSource = patch.sessionSource.trim();
    if (patch.mergeCount !== undefined) {
      if (!Number.isInteger(patch.mergeCount) || patch.mergeCount < 1) {
        throw new ValidationError('mergeCount must be a positive integer', { mergeCount: patch.mergeCount });
      }
      values.mergeCount = patch.mergeCount;
    }
    if (patch.embedding !== undefined) {
      this.checkEmbedding(patch.embedding);
      values.embedding = Array.from(patch.embedding);
    }
    if (patch.embeddingModel !== undefined) values.embeddingModel = patch.embeddingModel;

    const rows = await this.io('update', () =>
      this.db.update(learnings).set(values).where(eq(learnings.id, id)).returning());
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  /**
   * Lazy, restartable walk over matching records, newest first.
   * Every iteration starts again from the top.
   */
  list(filter: LearningFilter = {}, pageSize = 100): AsyncIterable<LearningRecord> {
    return {
      [Symbol.asyncIterator]: () => this.iterate(filter, pageSize),
    };
  }

  async listPage(filter: LearningFilter, options: PageOptions): Promise<RecordPage> {
    const conditions = [
      filter.type !== undefined ? eq(learnings.type, filter.type) : undefined,
      filter.sessionSource !== undefined ? eq(learnings.sessionSource, filter.sessionSource) : undefined,
      filter.minConfidence !== undefined ? gte(learnings.confidence, filter.minConfidence) : undefined,
      filter.includeArchived ? undefined : eq(learnings.archived, false),
    ];

    if (options.cursor) {
      const { createdAt, id } = decodeCursor(options.cursor);
      conditions.push(or(
        lt(learnings.createdAt, createdAt),
        and(eq(learnings.createdAt, createdAt), lt(learnings.id, id)),
      ));
    }

    const rows = await this.io('list', () =>
      this.db.select()
        .from(learnings)
        .where(and(...conditions))
        .orderBy(desc(learnings.createdAt), desc(learnings.id))
        .limit(options.limit + 1));

    const hasMore = rows.length > options.limit;
    const records = rows.slice(0, options.limit).map(toRecord);
    const last = records[records.length - 1];

    return {
      records,
      nextCursor: hasMore && last ? encodeCursor(last.createdAt, last.id) : null,
    };
  }

  /**
   * Soft delete. Returns false when the id is unknown or already archived.
   */
  async delete(id: string): Promise<boolean> {
    const rows = await this.io('delete', () =>
      this.db.update(learnings)
        .set({ archived: true, updatedAt: this.now() })
        .where(and(eq(learnings.id, id), eq(learnings.archived, false)))
        .returning({ id: learnings.id }));
    return rows.length > 0;
  }

  /**
   * Physically removes archived records. Returns how many were removed.
   */
  async purge(): Promise<number> {
    const rows = await this.io('purge', () =>
      this.db.delete(learnings)
        .where(eq(learnings.archived, true))
        .returning({ id: learnings.id }));
    return rows.length;
  }

  async stats(): Promise<StoreStats> {
    const rows = await this.io('stats', () =>
      this.db.select({
        type: learnings.type,
        count: sql<number>`COUNT(*)`,
      })
        .from(learnings)
        .where(eq(learnings.archived, false))
        .groupBy(learnings.type));

    const byType: Partial<Record<LearningType, number>> = {};
    let total = 0;
    for (const row of rows) {
      const count = Number(row.count);
      byType[row.type] = count;
      total += count;
    }
    return { total, byType };
  }

  /** Records (archived included) whose embedding came from another model. */
  async staleEmbeddings(embeddingModel: string): Promise<StaleEmbedding[]> {
    return this.io('staleEmbeddings', () =>
      this.db.select({ id: learnings.id, content: learnings.content, context: learnings.context })
        .from(learnings)
        .where(ne(learnings.embeddingModel, embeddingModel)));
  }

  async getMeta(key: string): Promise<string | null> {
    const rows = await this.io('getMeta', () =>
      this.db.select().from(storeMeta).where(eq(storeMeta.key, key)).limit(1));
    return rows.length > 0 ? rows[0].value : null;
  }

  async setMeta(key: string, value: string): Promise<void> {
    await this.io('setMeta', () =>
      this.db.insert(storeMeta)
        .values({ key, value })
        .onConflictDoUpdate({ target: storeMeta.key, set: { value } }));
  }

  // ========================================================================
  // INTERNALS
  // ========================================================================

  private async *iterate(filter: LearningFilter, pageSize: number): AsyncGenerator<LearningRecord> {
    let cursor: string | undefined;
    do {
      const page = await this.listPage(filter, { limit: pageSize, cursor });
      yield* page.records;
      cursor = page.nextCursor ?? undefined;
    } while (cursor);
  }

  private async io<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      this.health?.recordSuccess();
      return result;
    } catch (err) {
      if (err instanceof MemoryError) throw err;
      const ioError = new StoreIOError(operation, err);
      this.health?.recordFailure(ioError);
      throw ioError;
    }
  }

  private checkEmbedding(embedding: ArrayLike<number>): void {
    if (embedding.length !== this.dimension) {
      throw new ValidationError(
        `embedding must have ${this.dimension} dimensions, got ${embedding.length}`,
        { expected: this.dimension, actual: embedding.length },
      );
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function toRecord(row: LearningRow): LearningRecord {
  return {
    id: row.id,
    type: row.type,
    content: row.content,
    context: row.context,
    confidence: row.confidence,
    embedding: row.embedding,
    embeddingModel: row.embeddingModel,
    sessionSource: row.sessionSource,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    mergeCount: row.mergeCount,
    archived: row.archived,
  };
}

function firstRow(rows: LearningRow[], operation: string): LearningRow {
  if (rows.length === 0) {
    throw new StoreIOError(operation, new Error('statement returned no row'));
  }
  return rows[0];
}

function encodeCursor(createdAt: string, id: string): string {
  return Buffer.from(`${createdAt}|${id}`, 'utf-8').toString('base64url');
}

function decodeCursor(cursor: string): { createdAt: string; id: string } {
  const decoded = Buffer.from(cursor, 'base64url').toString('utf-8');
  const separator = decoded.indexOf('|');
  if (separator <= 0 || separator === decoded.length - 1) {
    throw new ValidationError('Invalid cursor', { cursor });
  }
  return { createdAt: decoded.slice(0, separator), id: decoded.slice(separator + 1) };
}
