import type { FastifyBaseLogger } from 'fastify';
import {
  DEFAULT_MERGE_OPTIONS,
  DEFAULT_RANKING_WEIGHTS,
  KeyedLock,
  MemoryError,
  NotFoundError,
  SimilarityIndex,
  ValidationError,
  assertConfidence,
  embeddingText,
  errorMessage,
  mergeLearning,
  rankLearnings,
  validateCandidate,
  type EmbeddingService,
  type LearningCandidate,
  type LearningFilter,
  type LearningRecord,
  type MergeOptions,
  type QueryOptions,
  type RankedLearning,
  type RankingWeights,
  type RebuildEntry,
  type SimilarityHit,
  type StoreResult,
} from 'memory-core';
import type { ServerConfig } from '../config.js';
import type {
  PageOptions,
  RecordPage,
  RecordStore,
  StaleEmbedding,
  StoreStats,
} from '../db/recordStore.js';

export interface LearningServiceOptions {
  admissionThreshold: number;
  dedupThreshold: number;
  defaultConfidence: number;
  weights: RankingWeights;
  queryOversample: number;
  queryMinScore: number;
  embedContext: boolean;
  merge: MergeOptions;
  lockTimeoutMs: number;
}

export const DEFAULT_SERVICE_OPTIONS: LearningServiceOptions = {
  admissionThreshold: 0.7,
  dedupThreshold: 0.92,
  defaultConfidence: 0.8,
  weights: DEFAULT_RANKING_WEIGHTS,
  queryOversample: 3,
  queryMinScore: 0,
  embedContext: false,
  merge: DEFAULT_MERGE_OPTIONS,
  lockTimeoutMs: 2000,
};

export function serviceOptionsFromConfig(config: ServerConfig): LearningServiceOptions {
  return {
    admissionThreshold: config.admissionThreshold,
    dedupThreshold: config.dedupThreshold,
    defaultConfidence: config.defaultConfidence,
    weights: { similarity: config.similarityWeight, confidence: config.confidenceWeight },
    queryOversample: config.queryOversample,
    queryMinScore: config.queryMinScore,
    embedContext: config.embedContext,
    merge: { mergeContext: config.mergeContext, sessionSource: config.mergeSessionSource },
    lockTimeoutMs: config.lockTimeoutMs,
  };
}

/** A store request as it arrives; omitted fields take their defaults. */
export interface StoreRequest {
  type: string;
  content: string;
  context?: string;
  confidence?: number;
  sessionSource?: string;
}

export interface AdminPatch {
  content?: string;
  context?: string;
  confidence?: number;
  sessionSource?: string;
}

export interface ItemError {
  code: string;
  message: string;
}

export interface BatchStoreItem {
  index: number;
  ok: boolean;
  id?: string;
  created?: boolean;
  similarity?: number;
  error?: ItemError;
}

export interface BulkDeleteItem {
  id: string;
  deleted: boolean;
  error?: ItemError;
}

export interface StartupReport {
  indexed: number;
  reembedded: number;
}

type IndexWrite =
  | { op: 'upsert'; record: LearningRecord }
  | { op: 'remove' };

const META_EMBEDDING_MODEL = 'embedding_model';
const META_EMBEDDING_DIMENSION = 'embedding_dimension';

/**
 * Orchestrates the record store, the similarity index and the embedding
 * provider: admission, dedup and merge on the way in, ranked retrieval on the
 * way out.
 *
 * The index is derived state. It is rebuilt from the store on `start()` and
 * kept in step with every write made through this service.
 */
export class LearningService {
  private readonly index: SimilarityIndex;
  private readonly typeLocks: KeyedLock;
  private readonly recordLocks: KeyedLock;
  private readonly log: FastifyBaseLogger;
  private started = false;
  private rebuilding: Promise<number> | null = null;
  /** Index writes made while a rebuild is reading the store. */
  private rebuildJournal: Map<string, IndexWrite> | null = null;

  constructor(
    private readonly records: RecordStore,
    private readonly embeddings: EmbeddingService,
    logger: FastifyBaseLogger,
    private readonly options: LearningServiceOptions = DEFAULT_SERVICE_OPTIONS,
  ) {
    this.index = new SimilarityIndex(embeddings.dimension);
    this.typeLocks = new KeyedLock(options.lockTimeoutMs);
    this.recordLocks = new KeyedLock(options.lockTimeoutMs);
    this.log = logger.child({ module: 'learnings' });
  }

  get ready(): boolean {
    return this.started;
  }

  get indexSize(): number {
    return this.index.size;
  }

  get embeddingModel(): string {
    return this.embeddings.modelName;
  }

  /**
   * Bring stored embeddings in line with the configured model, then load the
   * index. Fails when records need re-embedding and the provider is down.
   */
  async start(): Promise<StartupReport> {
    const reembedded = await this.refreshEmbeddings();
    const indexed = await this.reindex();
    this.started = true;
    this.log.info({ indexed, reembedded, model: this.embeddings.modelName }, 'learning index ready');
    return { indexed, reembedded };
  }

  // ========================================================================
  // STORE
  // ========================================================================

  async store(request: StoreRequest): Promise<StoreResult> {
    const candidate = validateCandidate({
      type: request.type,
      content: request.content,
      context: request.context ?? '',
      confidence: request.confidence ?? this.options.defaultConfidence,
      sessionSource: request.sessionSource ?? '',
    }, this.options.admissionThreshold);

    const vector = await this.embeddings.embed(
      embeddingText(candidate.content, candidate.context, this.options.embedContext),
    );

    return this.typeLocks.withLock(candidate.type, async () => {
      const [best] = this.index.search(
        vector,
        1,
        this.options.dedupThreshold,
        meta => meta.type === candidate.type,
      );

      if (!best) {
        this.log.debug({ type: candidate.type }, 'no near-duplicate, creating learning');
        return this.create(candidate, vector);
      }

      return this.recordLocks.withLock(best.id, () =>
        this.mergeInto(best.id, best.score, candidate, vector));
    });
  }

  /**
   * Stores each item in order. One item failing does not stop the rest.
   */
  async storeBatch(requests: StoreRequest[]): Promise<BatchStoreItem[]> {
    const results: BatchStoreItem[] = [];
    for (const [index, request] of requests.entries()) {
      try {
        const result = await this.store(request);
        results.push({ index, ok: true, ...result });
      } catch (err) {
        results.push({ index, ok: false, error: this.itemError(err, 'store') });
      }
    }
    return results;
  }

  // ========================================================================
  // QUERY
  // ========================================================================

  async query(probeText: string, options: QueryOptions = {}): Promise<RankedLearning[]> {
    const probe = probeText.trim();
    if (probe.length === 0) {
      throw new ValidationError('probe_text must not be empty');
    }

    const k = options.k ?? 5;
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError('k must be a positive integer', { k });
    }
    if (options.minConfidence !== undefined) {
      assertConfidence(options.minConfidence, 'min_confidence');
    }

    const vector = await this.embeddings.embed(probe);
    const { typeFilter } = options;
    const candidates = this.index.search(
      vector,
      k * this.options.queryOversample,
      -1,
      typeFilter === undefined ? undefined : meta => meta.type === typeFilter,
    );

    const records = await Promise.all(candidates.map(hit => this.records.get(hit.id)));
    const hits: SimilarityHit[] = [];
    candidates.forEach((hit, i) => {
      const record = records[i];
      if (record) hits.push({ record, similarity: hit.score });
    });

    return rankLearnings(
      hits,
      k,
      {
        typeFilter,
        minConfidence: options.minConfidence,
        minScore: options.minScore ?? this.options.queryMinScore,
      },
      this.options.weights,
    );
  }

  // ========================================================================
  // ADMINISTRATION
  // ========================================================================

  async get(id: string): Promise<LearningRecord> {
    const record = await this.records.get(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }

  list(filter: LearningFilter = {}): AsyncIterable<LearningRecord> {
    return this.records.list(filter);
  }

  listPage(filter: LearningFilter, page: PageOptions): Promise<RecordPage> {
    return this.records.listPage(filter, page);
  }

  /**
   * Administrative edit of an active record. A change to the embedded text
   * re-embeds the record before the write.
   */
  async update(id: string, patch: AdminPatch): Promise<LearningRecord> {
    if (patch.content !== undefined && patch.content.trim().length === 0) {
      throw new ValidationError('content must not be empty');
    }
    if (patch.confidence !== undefined) assertConfidence(patch.confidence);

    const before = await this.activeRecord(id);
    const plannedText = this.textAfterPatch(before, patch);
    const planned = plannedText === this.textOf(before)
      ? null
      : await this.embeddings.embed(plannedText);

    return this.recordLocks.withLock(id, async () => {
      const current = await this.activeRecord(id);
      const text = this.textAfterPatch(current, patch);

      let vector: Float32Array | null = null;
      if (text !== this.textOf(current)) {
        // The record may have been merged into while we were embedding.
        vector = planned && text === plannedText ? planned : await this.embeddings.embed(text);
      }

      const updated = await this.records.update(id, {
        ...patch,
        ...(vector && { embedding: Array.from(vector), embeddingModel: this.embeddings.modelName }),
      });
      if (!updated) throw new NotFoundError(id);

      if (vector) this.indexUpsert(updated);
      this.log.info({ id, reembedded: vector !== null }, 'learning updated');
      return updated;
    });
  }

  /**
   * Archive a record. Unknown and already archived ids answer false.
   */
  async delete(id: string): Promise<boolean> {
    return this.recordLocks.withLock(id, async () => {
      const deleted = await this.records.delete(id);
      if (deleted) {
        this.indexRemove(id);
        this.log.info({ id }, 'learning archived');
      }
      return deleted;
    });
  }

  async deleteMany(ids: string[]): Promise<BulkDeleteItem[]> {
    const results: BulkDeleteItem[] = [];
    for (const id of ids) {
      try {
        results.push({ id, deleted: await this.delete(id) });
      } catch (err) {
        results.push({ id, deleted: false, error: this.itemError(err, 'delete') });
      }
    }
    return results;
  }

  async purge(): Promise<number> {
    const purged = await this.records.purge();
    this.log.info({ purged }, 'archived learnings purged');
    return purged;
  }

  /**
   * Rebuild the index from every active record in the store.
   * Calls made while a rebuild is running share it.
   */
  reindex(): Promise<number> {
    this.rebuilding ??= this.rebuildIndex().finally(() => {
      this.rebuilding = null;
    });
    return this.rebuilding;
  }

  stats(): Promise<StoreStats> {
    return this.records.stats();
  }

  // ========================================================================
  // INTERNALS
  // ========================================================================

  private async create(candidate: LearningCandidate, vector: Float32Array): Promise<StoreResult> {
    const record = await this.records.create(candidate, vector, this.embeddings.modelName);
    this.indexUpsert(record);
    this.log.info({ id: record.id, type: record.type }, 'learning created');
    return { id: record.id, created: true };
  }

  private async mergeInto(
    id: string,
    similarity: number,
    candidate: LearningCandidate,
    vector: Float32Array,
  ): Promise<StoreResult> {
    const existing = await this.records.get(id);
    if (!existing || existing.archived) {
      // Archived or purged after the index lookup.
      this.indexRemove(id);
      return this.create(candidate, vector);
    }

    const { patch, contentReplaced } = mergeLearning(
      existing,
      candidate,
      vector,
      this.embeddings.modelName,
      this.options.merge,
    );

    const updated = await this.records.update(id, patch);
    if (!updated) {
      this.indexRemove(id);
      return this.create(candidate, vector);
    }

    if (contentReplaced) {
      this.indexUpsert(updated);
    }
    this.log.info(
      { id, similarity, mergeCount: updated.mergeCount, contentReplaced },
      'learning merged',
    );
    return { id, created: false, similarity };
  }

  /**
   * Writes made while the store is being read for a rebuild are replayed on
   * top of the rebuilt index, so the swap cannot drop them.
   */
  private async rebuildIndex(): Promise<number> {
    const journal = new Map<string, IndexWrite>();
    this.rebuildJournal = journal;
    try {
      const entries: RebuildEntry[] = [];
      for await (const record of this.records.list({})) {
        entries.push({
          id: record.id,
          type: record.type,
          createdAt: record.createdAt,
          embedding: record.embedding,
        });
      }
      this.index.rebuild(entries);
      for (const [id, write] of journal) {
        if (write.op === 'upsert') {
          this.index.upsert(id, write.record.embedding, write.record);
        } else {
          this.index.remove(id);
        }
      }
      if (journal.size > 0) {
        this.log.debug({ replayed: journal.size }, 'replayed writes made during rebuild');
      }
      return this.index.size;
    } finally {
      this.rebuildJournal = null;
    }
  }

  private indexUpsert(record: LearningRecord): void {
    this.index.upsert(record.id, record.embedding, record);
    this.rebuildJournal?.set(record.id, { op: 'upsert', record });
  }

  private indexRemove(id: string): void {
    this.index.remove(id);
    this.rebuildJournal?.set(id, { op: 'remove' });
  }

  private async activeRecord(id: string): Promise<LearningRecord> {
    const record = await this.records.get(id);
    if (!record || record.archived) throw new NotFoundError(id);
    return record;
  }

  private textOf(record: LearningRecord): string {
    return embeddingText(record.content, record.context, this.options.embedContext);
  }

  private textAfterPatch(record: LearningRecord, patch: AdminPatch): string {
    return embeddingText(
      patch.content?.trim() ?? record.content,
      patch.context?.trim() ?? record.context,
      this.options.embedContext,
    );
  }

  private async refreshEmbeddings(): Promise<number> {
    const { modelName, dimension } = this.embeddings;
    const storedDimension = await this.records.getMeta(META_EMBEDDING_DIMENSION);
    const dimensionChanged = storedDimension !== null && Number(storedDimension) !== dimension;

    const stale = dimensionChanged
      ? await this.allRecordTexts()
      : await this.records.staleEmbeddings(modelName);

    if (stale.length > 0) {
      this.log.warn(
        { count: stale.length, model: modelName, dimensionChanged },
        're-embedding learnings for the configured model',
      );
    }
    for (const record of stale) {
      const vector = await this.embeddings.embed(
        embeddingText(record.content, record.context, this.options.embedContext),
      );
      await this.records.update(record.id, { embedding: Array.from(vector), embeddingModel: modelName });
    }

    await this.records.setMeta(META_EMBEDDING_MODEL, modelName);
    await this.records.setMeta(META_EMBEDDING_DIMENSION, String(dimension));
    return stale.length;
  }

  private async allRecordTexts(): Promise<StaleEmbedding[]> {
    const texts: StaleEmbedding[] = [];
    for await (const record of this.records.list({ includeArchived: true })) {
      texts.push({ id: record.id, content: record.content, context: record.context });
    }
    return texts;
  }

  private itemError(err: unknown, operation: string): ItemError {
    if (err instanceof MemoryError) {
      return { code: err.code, message: err.message };
    }
    this.log.error({ err, operation }, 'unexpected error in batch item');
    return { code: 'INTERNAL_ERROR', message: errorMessage(err) };
  }
}
