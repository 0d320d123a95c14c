import { Pool } from 'pg';
import config from '@config';
import { flattenTables } from '@schema/relational';
import { RelationalSchema } from '@schema/types';
import { logger } from '@telemetry/index';
import { SqlPool, applyDdl, insertRows, quoteIdent, withTransaction } from './sql';
import { RelationalBackend, StorageLocation, TableRows } from './types';

export const renderCreateTable = (table: RelationalSchema): string => {
  const definitions = table.columns.map((column) => {
    const parts = [quoteIdent(column.name), column.type];
    if (column.primaryKey) {
      parts.push('PRIMARY KEY');
    } else if (!column.nullable) {
      parts.push('NOT NULL');
    }
    if (column.foreignKey) {
      parts.push(
        `REFERENCES ${quoteIdent(column.foreignKey.table)} (${quoteIdent(column.foreignKey.column)}) ON DELETE CASCADE`,
      );
    }
    return parts.join(' ');
  });
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table.tableName)} (${definitions.join(', ')})`;
};

export class PostgresRelationalBackend implements RelationalBackend {
  readonly name = 'postgres';

  constructor(private pool: SqlPool) {}

  async apply(schema: RelationalSchema): Promise<StorageLocation> {
    const tables = flattenTables(schema);
    await applyDdl(this.pool, tables.map(renderCreateTable));
    logger.info({ table: schema.tableName, tables: tables.length }, 'Relational schema applied');
    return {
      backend: this.name,
      kind: 'table',
      name: schema.tableName,
      tables: tables.map((table) => table.tableName),
    };
  }

  async insert(batches: TableRows[]): Promise<number> {
    return withTransaction(this.pool, async (client) => {
      let written = 0;
      for (const { table, rows } of batches) {
        written += await insertRows(client, table, rows);
      }
      return written;
    });
  }
}

export const createPool = () => {
  logger.info('Connecting to PostgreSQL...');
  return new Pool({
    connectionString: config.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30000,
  });
};
