import config from '@config';
import { SchemaDecision } from '@decision/engine';
import { BackendApplyError, BackendInsertError } from '@errors/index';
import { toDocument } from '@schema/document';
import { flattenTables } from '@schema/relational';
import { logger, metrics, telemetryBus } from '@telemetry/index';
import { RetryExhaustedError, RetryOptions, retry } from '@utils/async';
import { KeyFactory, shredRecords } from './shred';
import { DocumentBackend, RelationalBackend, Row, StorageLocation, TableRows } from './types';

export type StorageRouterOptions = {
  retry?: Partial<RetryOptions>;
  newKey?: KeyFactory;
};

export type InsertSummary = {
  records: number;
  rows: number;
  tables: Record<string, number>;
};

/**
 * Sends a decision to the backend it names. Applying a schema is retried with
 * backoff; inserts are not. A failed insert writes no rows at all but leaves
 * the schema in place.
 */
export class StorageRouter {
  private readonly retryOptions: Partial<RetryOptions>;

  constructor(
    private readonly relational: RelationalBackend,
    private readonly document: DocumentBackend,
    private readonly options: StorageRouterOptions = {},
  ) {
    this.retryOptions = {
      maxAttempts: config.storage.applyAttempts,
      initialDelayMs: config.storage.retryDelayMs,
      maxDelayMs: config.storage.maxRetryDelayMs,
      ...options.retry,
    };
  }

  backendFor(decision: SchemaDecision): RelationalBackend | DocumentBackend {
    return decision.storageType === 'sql' ? this.relational : this.document;
  }

  async apply(decision: SchemaDecision): Promise<StorageLocation> {
    const backend = this.backendFor(decision);
    try {
      const { value, attempts } = await retry(
        () =>
          decision.storageType === 'sql'
            ? this.relational.apply(decision.schema)
            : this.document.apply(decision.schema),
        {
          ...this.retryOptions,
          onRetry: (err, attempt) =>
            logger.warn(
              { err, attempt, backend: backend.name, schemaName: decision.schemaName },
              'Schema apply failed, retrying',
            ),
        },
      );
      metrics.incrementCounter(`schema_applied_${decision.storageType}`);
      telemetryBus.publish({
        type: 'schema.applied',
        payload: {
          schemaName: decision.schemaName,
          storageType: decision.storageType,
          backend: backend.name,
          attempts,
        },
      });
      return value;
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new BackendApplyError(backend.name, decision.schemaName, err.attempts, err.lastError);
      }
      throw new BackendApplyError(backend.name, decision.schemaName, 1, err);
    }
  }

  async insert(decision: SchemaDecision, records: readonly unknown[]): Promise<InsertSummary> {
    if (decision.storageType === 'nosql') {
      const documents = records.map(toDocument).filter(isRow);
      await this.write(this.document, decision.schema.collectionName, documents);
      return {
        records: records.length,
        rows: documents.length,
        tables: { [decision.schema.collectionName]: documents.length },
      };
    }

    const rowsByTable = shredRecords(decision.schema, records, this.options.newKey);
    const batches: TableRows[] = flattenTables(decision.schema)
      .map((table) => ({ table: table.tableName, rows: rowsByTable.get(table.tableName) ?? [] }))
      .filter((batch) => batch.rows.length > 0);
    const rows = batches.reduce((total, batch) => total + batch.rows.length, 0);
    if (batches.length) {
      await this.guard(this.relational.name, decision.schema.tableName, rows, () => this.relational.insert(batches));
    }
    const tables: Record<string, number> = {};
    for (const batch of batches) {
      tables[batch.table] = batch.rows.length;
    }
    return { records: records.length, rows, tables };
  }

  private async write(backend: DocumentBackend, target: string, rows: Row[]) {
    await this.guard(backend.name, target, rows.length, () => backend.insert(target, rows));
  }

  private async guard(backend: string, target: string, rows: number, insert: () => Promise<number>) {
    try {
      await insert();
    } catch (err) {
      logger.error({ err, backend, target, rows }, 'Insert failed');
      throw new BackendInsertError(backend, target, rows, err);
    }
  }
}

const isRow = (value: unknown): value is Row =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
