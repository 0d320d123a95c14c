import { v4 as uuidv4 } from 'uuid';
import { DocumentSchema } from '@schema/types';
import { logger } from '@telemetry/index';
import { SqlPool, applyDdl, insertRows, quoteIdent } from './sql';
import { DocumentBackend, Row, StorageLocation } from './types';

export const COLLECTIONS_TABLE = 'document_collections';

/**
 * Document collections kept as JSONB tables, one row per document. The field
 * structure of every collection is recorded in `document_collections`.
 */
export class PostgresDocumentBackend implements DocumentBackend {
  readonly name = 'postgres-jsonb';

  constructor(private pool: SqlPool) {}

  async apply(schema: DocumentSchema): Promise<StorageLocation> {
    const collection = quoteIdent(schema.collectionName);
    await applyDdl(this.pool, [
      `CREATE TABLE IF NOT EXISTS ${COLLECTIONS_TABLE} (
        name TEXT PRIMARY KEY,
        field_structure JSONB NOT NULL,
        created_at TIMESTAMPTZ DEFAULT NOW()
      )`,
      `CREATE TABLE IF NOT EXISTS ${collection} (
        id UUID PRIMARY KEY,
        payload JSONB NOT NULL,
        created_at TIMESTAMPTZ DEFAULT NOW()
      )`,
      {
        text: `INSERT INTO ${COLLECTIONS_TABLE} (name, field_structure) VALUES ($1, $2)
               ON CONFLICT (name) DO NOTHING`,
        params: [schema.collectionName, JSON.stringify(schema.fieldStructure)],
      },
    ]);
    logger.info({ collection: schema.collectionName }, 'Document collection applied');
    return { backend: this.name, kind: 'collection', name: schema.collectionName };
  }

  async insert(collectionName: string, documents: Row[]): Promise<number> {
    return insertRows(
      this.pool,
      collectionName,
      documents.map((document) => ({ id: uuidv4(), payload: JSON.stringify(document) })),
    );
  }
}
