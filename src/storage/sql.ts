import { logger } from '@telemetry/index';

/**
 * The slice of `pg` the storage layer needs. `pg.Pool` satisfies it, and tests
 * hand in an in-process stand-in.
 */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

/** duplicate_table and the pg_type unique_violation raised by concurrent CREATE TABLE. */
const CREATE_RACE_CODES = new Set(['42P07', '23505']);

export const pgErrorCode = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

export const isCreateRace = (error: unknown) => CREATE_RACE_CODES.has(pgErrorCode(error) ?? '');

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

/**
 * A client whose ROLLBACK failed is handed back with the error so the pool
 * discards it; the caller still sees the original failure.
 */
export const withTransaction = async <T>(
  pool: SqlPool,
  fn: (client: SqlClient) => Promise<T>,
): Promise<T> => {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.warn({ err: rollbackError }, 'Rollback failed, discarding connection');
    }
    throw err;
  } finally {
    client.release(broken);
  }
};

export type Statement = string | { text: string; params: unknown[] };

/**
 * Runs a DDL transaction, running it a second time when it lost a
 * CREATE TABLE race to another caller; the second pass finds the objects in place.
 */
export const applyDdl = async (pool: SqlPool, statements: Statement[]) => {
  for (let pass = 1; ; pass++) {
    try {
      await withTransaction(pool, async (client) => {
        for (const statement of statements) {
          if (typeof statement === 'string') {
            await client.query(statement);
          } else {
            await client.query(statement.text, statement.params);
          }
        }
      });
      return;
    } catch (err) {
      if (pass >= 2 || !isCreateRace(err)) throw err;
    }
  }
};

/** Postgres caps bind parameters per statement at 65535. */
const MAX_PARAMS = 60000;

export const insertRows = async (client: SqlClient, table: string, rows: Record<string, unknown>[]) => {
  if (!rows.length) return 0;
  const columns = Object.keys(rows[0]);
  if (!columns.length) return 0;
  const batchSize = Math.max(1, Math.floor(MAX_PARAMS / columns.length));
  for (let start = 0; start < rows.length; start += batchSize) {
    const batch = rows.slice(start, start + batchSize);
    const values = batch
      .map(
        (_, rowIndex) =>
          `(${columns
            .map((__, colIndex) => `$${rowIndex * columns.length + colIndex + 1}`)
            .join(', ')})`,
      )
      .join(', ');
    const params = batch.flatMap((row) => columns.map((col) => row[col] ?? null));
    await client.query(
      `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(', ')}) VALUES ${values}`,
      params,
    );
  }
  return rows.length;
};
