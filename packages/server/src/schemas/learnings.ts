import { z } from 'zod';
import { LEARNING_TYPES, type LearningRecord } from 'memory-core';

const learningType = z.enum(LEARNING_TYPES);
const confidence = z.number().min(0, 'confidence must be between 0 and 1').max(1, 'confidence must be between 0 and 1');

export const storeSchema = z.object({
  type: learningType,
  content: z.string().min(1, 'content is required'),
  context: z.string().optional(),
  confidence: confidence.optional(),
  session_source: z.string().optional(),
});

// Batch items are checked one by one by the service so that a bad item
// is reported in its own slot instead of rejecting the whole request.
const batchItemSchema = z.object({
  type: z.string(),
  content: z.string(),
  context: z.string().optional(),
  confidence: z.number().optional(),
  session_source: z.string().optional(),
});

export const MAX_BATCH_SIZE = 500;

export const storeBatchSchema = z.object({
  learnings: z.array(batchItemSchema).min(1).max(MAX_BATCH_SIZE),
});

export const querySchema = z.object({
  probe_text: z.string().min(1, 'probe_text is required'),
  k: z.number().int().min(1).max(100).default(5),
  type_filter: learningType.optional(),
  min_confidence: confidence.optional(),
  min_score: z.number().min(-1).max(1).optional(),
});

export const listQuerySchema = z.object({
  type_filter: learningType.optional(),
  session_source: z.string().optional(),
  min_confidence: z.coerce.number().min(0).max(1).optional(),
  include_archived: z.enum(['true', 'false']).transform(v => v === 'true').optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  cursor: z.string().min(1).optional(),
});

export const idParamsSchema = z.object({
  id: z.string().min(1),
});

export const patchSchema = z.object({
  content: z.string().min(1).optional(),
  context: z.string().optional(),
  confidence: confidence.optional(),
  session_source: z.string().optional(),
}).refine(
  patch => Object.values(patch).some(value => value !== undefined),
  { message: 'at least one field must be provided' },
);

export const bulkDeleteSchema = z.object({
  ids: z.array(z.string().min(1)).min(1).max(MAX_BATCH_SIZE),
});

export type StoreInput = z.infer<typeof storeSchema>;
export type QueryInput = z.infer<typeof querySchema>;
export type PatchInput = z.infer<typeof patchSchema>;

/** Wire form of a stored record. The vector itself is not sent. */
export function toWireLearning(record: LearningRecord) {
  return {
    id: record.id,
    type: record.type,
    content: record.content,
    context: record.context,
    confidence: record.confidence,
    session_source: record.sessionSource,
    merge_count: record.mergeCount,
    archived: record.archived,
    embedding_model: record.embeddingModel,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}
