import pgPromise from 'pg-promise';
import type { DatabaseConfig } from '../config/env';
import type { DocumentSink, StoredDocument } from '../types/job';

const pgp = pgPromise();

// Column set for batch inserts using pgp.helpers
const documentColumns = new pgp.helpers.ColumnSet(
  [
    'job_id',
    'source_name',
    'row_index',
    { name: 'data', cast: 'jsonb' },
    { name: 'metadata', cast: 'jsonb', def: null },
    { name: 'created_at', def: 'NOW()', mod: ':raw' },
  ],
  { table: { table: 'replay_documents', schema: 'public' } }
);

let db: pgPromise.IDatabase<{}> | null = null;

/**
 * Get the pg-promise database instance (lazy-initialized)
 */
export function getDb(config: DatabaseConfig): pgPromise.IDatabase<{}> {
  if (db) return db;

  db = pgp({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
  });

  return db;
}

/**
 * Close the database connection (for graceful shutdown)
 */
export async function closeDb(): Promise<void> {
  if (db) {
    pgp.end();
    db = null;
  }
}

/**
 * Ensure the replay_documents table exists (idempotent)
 */
export async function ensureTableExists(config: DatabaseConfig): Promise<void> {
  const database = getDb(config);
  await database.none(`
    CREATE TABLE IF NOT EXISTS public.replay_documents (
      id INTEGER PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
      job_id TEXT NOT NULL,
      source_name TEXT NOT NULL,
      row_index INTEGER NOT NULL,
      data JSONB NOT NULL,
      metadata JSONB,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT replay_documents_job_row_unique UNIQUE (job_id, row_index)
    )
  `);
}

/**
 * Insert a batch of replayed documents using pgp.helpers.
 * Re-inserting a (job_id, row_index) pair replaces its data.
 */
export async function insertDocumentsBatch(
  config: DatabaseConfig,
  jobId: string,
  sourceName: string,
  documents: StoredDocument[],
  metadata?: Record<string, string>
): Promise<number> {
  if (documents.length === 0) return 0;

  const database = getDb(config);

  const metadataJson = metadata && Object.keys(metadata).length > 0
    ? JSON.stringify(metadata)
    : null;

  const rows = documents.map((document) => ({
    job_id: jobId,
    source_name: sourceName,
    row_index: document.rowIndex,
    data: JSON.stringify(document.data),
    metadata: metadataJson,
  }));

  const insert = pgp.helpers.insert(rows, documentColumns);
  const onConflict =
    ' ON CONFLICT (job_id, row_index) DO UPDATE SET ' +
    'data = EXCLUDED.data, ' +
    'metadata = EXCLUDED.metadata, ' +
    'created_at = EXCLUDED.created_at';

  const result = await database.result(insert + onConflict);

  console.log(`[DB] Inserted ${result.rowCount} document(s) for ${jobId}`);

  // Optional throttle for debugging (set DB_INSERT_DELAY_MS env var)
  if (config.insertDelayMs > 0) {
    await new Promise((r) => setTimeout(r, config.insertDelayMs));
  }

  return result.rowCount;
}

/**
 * DocumentSink backed by the replay_documents table
 */
export class PostgresDocumentSink implements DocumentSink {
  constructor(private readonly config: DatabaseConfig) {}

  async ensureReady(): Promise<void> {
    await ensureTableExists(this.config);
  }

  async write(
    jobId: string,
    sourceName: string,
    documents: StoredDocument[],
    metadata?: Record<string, string>
  ): Promise<number> {
    return insertDocumentsBatch(this.config, jobId, sourceName, documents, metadata);
  }
}
