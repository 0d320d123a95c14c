import { z } from 'zod';
import { SqlPool } from '@storage/sql';
import { INGEST_KINDS, IndexEntry, IndexFilter, IndexPersistence } from './types';

const SEQUENCE = 'metadata_index_id_seq';

const kindSchema = z.enum(['media', 'document', 'json']);

const rowSchema = z.object({
  id: z.coerce.number().int(),
  filename: z.string(),
  kind: kindSchema,
  category_or_schema: z.string(),
  storage_type: z.enum(['sql', 'nosql']).nullable(),
  storage_location: z.string(),
  mime_type: z.string().nullable(),
  text: z.string().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  created_at: z.union([z.date(), z.string()]),
});

const toEntry = (raw: unknown): IndexEntry => {
  const row = rowSchema.parse(raw);
  const entry: IndexEntry = {
    id: row.id,
    filename: row.filename,
    kind: row.kind,
    categoryOrSchema: row.category_or_schema,
    storageLocation: row.storage_location,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
  };
  if (row.storage_type) entry.storageType = row.storage_type;
  if (row.mime_type) entry.mimeType = row.mime_type;
  if (row.text) entry.text = row.text;
  if (row.metadata) entry.metadata = row.metadata;
  return entry;
};

/**
 * Index entries in Postgres. Ids come from a sequence, so concurrent writers on
 * any number of processes never share one.
 */
export class PostgresIndexStore implements IndexPersistence {
  readonly sequenced = true;

  constructor(private pool: SqlPool) {}

  async ensureTables() {
    await this.pool.query(`CREATE SEQUENCE IF NOT EXISTS ${SEQUENCE}`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS metadata_index (
        id BIGINT PRIMARY KEY,
        filename TEXT NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN (${INGEST_KINDS.map((kind) => `'${kind}'`).join(', ')})),
        category_or_schema TEXT NOT NULL,
        storage_type TEXT,
        storage_location TEXT NOT NULL,
        mime_type TEXT,
        text TEXT,
        metadata JSONB,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_metadata_index_kind_category ON metadata_index(kind, category_or_schema)`,
    );
  }

  async nextId() {
    const { rows } = await this.pool.query(`SELECT nextval('${SEQUENCE}') AS id`);
    return z.object({ id: z.coerce.number().int() }).parse(rows[0]).id;
  }

  async append(entry: IndexEntry) {
    await this.pool.query(
      `INSERT INTO metadata_index
         (id, filename, kind, category_or_schema, storage_type, storage_location, mime_type, text, metadata, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        entry.id,
        entry.filename,
        entry.kind,
        entry.categoryOrSchema,
        entry.storageType ?? null,
        entry.storageLocation,
        entry.mimeType ?? null,
        entry.text ?? null,
        entry.metadata ? JSON.stringify(entry.metadata) : null,
        entry.createdAt,
      ],
    );
  }

  async query(filter: IndexFilter) {
    const clauses: string[] = [];
    const params: unknown[] = [];
    const bind = (value: unknown) => {
      params.push(value);
      return `$${params.length}`;
    };
    if (filter.kind) clauses.push(`kind = ${bind(filter.kind)}`);
    if (filter.categoryOrSchema) clauses.push(`category_or_schema = ${bind(filter.categoryOrSchema)}`);
    if (filter.storageType) clauses.push(`storage_type = ${bind(filter.storageType)}`);
    if (filter.text) {
      const pattern = bind(`%${filter.text.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`);
      clauses.push(`(filename ILIKE ${pattern} OR COALESCE(text, '') ILIKE ${pattern})`);
    }
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = filter.limit === undefined ? '' : `LIMIT ${bind(filter.limit)}`;
    const { rows } = await this.pool.query(
      `SELECT id, filename, kind, category_or_schema, storage_type, storage_location, mime_type, text, metadata, created_at
       FROM metadata_index ${where}
       ORDER BY id DESC ${limit}`,
      params,
    );
    return rows.map(toEntry);
  }
}
