import { drizzle } from 'drizzle-orm/libsql';
import { createClient } from '@libsql/client';
import { sql } from 'drizzle-orm';
import * as schema from './schema.js';

export type Database = ReturnType<typeof createDatabase>;

export function createDatabase(dbPath: string) {
  const client = createClient({ url: dbPath });
  const db = drizzle(client, { schema });
  return db;
}

export async function initDatabase(dbPath: string): Promise<Database> {
  const db = createDatabase(dbPath);

  // File databases get a WAL journal; every commit is still synced before
  // the statement returns.
  if (dbPath !== ':memory:') {
    await db.run(sql`PRAGMA journal_mode = WAL`);
  }
  await db.run(sql`PRAGMA synchronous = FULL`);

  await db.run(sql`
    CREATE TABLE IF NOT EXISTS learnings (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      content TEXT NOT NULL,
      context TEXT NOT NULL DEFAULT '',
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      embedding TEXT NOT NULL,
      embedding_model TEXT NOT NULL,
      session_source TEXT NOT NULL DEFAULT '',
      merge_count INTEGER NOT NULL DEFAULT 1,
      archived INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  await db.run(sql`
    CREATE TABLE IF NOT EXISTS store_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_learnings_created ON learnings(created_at, id)`);
  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_learnings_type ON learnings(type, archived)`);
  await db.run(sql`CREATE INDEX IF NOT EXISTS idx_learnings_session ON learnings(session_source)`);

  return db;
}

export function closeDatabase(db: Database): void {
  db.$client.close();
}

export { schema };
