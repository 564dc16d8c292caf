import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import { LEARNING_TYPES } from 'memory-core';

export const learnings = sqliteTable('learnings', {
  id: text('id').primaryKey(),
  type: text('type', { enum: LEARNING_TYPES }).notNull(),
  content: text('content').notNull(),
  context: text('context').notNull().default(''),
  confidence: real('confidence').notNull(),
  embedding: text('embedding', { mode: 'json' }).$type<number[]>().notNull(),
  embeddingModel: text('embedding_model').notNull(),
  sessionSource: text('session_source').notNull().default(''),
  mergeCount: integer('merge_count').notNull().default(1),
  archived: integer('archived', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const storeMeta = sqliteTable('store_meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

export type LearningRow = typeof learnings.$inferSelect;
export type NewLearningRow = typeof learnings.$inferInsert;
