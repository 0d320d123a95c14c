import config, { CategoryCatalog } from '@config';
import { StructuralDescriptor } from '@analyzer/types';
import { DecisionEngineOptions, SchemaDecision, StorageDecisionEngine } from '@decision/engine';
import { CategoryResolution, CategoryResolver, ClassifyFn, createDocumentResolver, createMediaResolver } from '@media/resolver';
import { MetadataIndexer } from '@metadata/indexer';
import { PostgresIndexStore } from '@metadata/pgStore';
import { IndexEntry, IndexEntryFields, IndexFilter, IndexStats } from '@metadata/types';
import { PostgresDocumentBackend } from '@storage/documents';
import { PostgresRelationalBackend } from '@storage/postgres';
import { InsertSummary, StorageRouter } from '@storage/router';
import { SqlPool } from '@storage/sql';
import { StorageLocation } from '@storage/types';

export type StorageCoreDeps = {
  engine: StorageDecisionEngine;
  router: StorageRouter;
  indexer: MetadataIndexer;
  mediaResolver: CategoryResolver;
  documentResolver: CategoryResolver;
};

export type Inspection = {
  descriptor: StructuralDescriptor;
  decision: SchemaDecision;
};

/**
 * The decision API the rest of the system calls into: analysis and routing of
 * JSON payloads, category resolution for files, and the ingestion index.
 */
export class StorageCore {
  constructor(private readonly deps: StorageCoreDeps) {}

  analyzeAndDecide(records: readonly unknown[], isArrayRoot = true): SchemaDecision {
    return this.deps.engine.decide(records, isArrayRoot);
  }

  inspect(records: readonly unknown[], isArrayRoot = true): Inspection {
    const descriptor = this.deps.engine.analyze(records, isArrayRoot);
    return { descriptor, decision: this.deps.engine.decideFromDescriptor(descriptor) };
  }

  applySchema(decision: SchemaDecision): Promise<StorageLocation> {
    return this.deps.router.apply(decision);
  }

  insertRecords(decision: SchemaDecision, records: readonly unknown[]): Promise<InsertSummary> {
    return this.deps.router.insert(decision, records);
  }

  async resolveMediaCategory(bytes: Buffer, filename: string): Promise<string> {
    return (await this.deps.mediaResolver.resolve({ bytes, filename })).category;
  }

  resolveMedia(bytes: Buffer, filename: string): Promise<CategoryResolution> {
    return this.deps.mediaResolver.resolve({ bytes, filename });
  }

  resolveDocument(bytes: Buffer, filename: string, text: string): Promise<CategoryResolution> {
    return this.deps.documentResolver.resolve({ bytes, filename, text });
  }

  async recordIngestion(fields: IndexEntryFields): Promise<number> {
    return (await this.deps.indexer.record(fields)).id;
  }

  search(filter: IndexFilter = {}): Promise<IndexEntry[]> {
    return this.deps.indexer.search(filter);
  }

  stats(): Promise<IndexStats> {
    return this.deps.indexer.stats();
  }
}

export type PostgresCoreOptions = {
  classify?: ClassifyFn;
  catalog?: CategoryCatalog;
  confidenceFloor?: number;
  engine?: DecisionEngineOptions;
};

/** Wires the core against one Postgres pool for tables, collections and the index. */
export const createPostgresCore = async (pool: SqlPool, options: PostgresCoreOptions = {}) => {
  const catalog = options.catalog ?? config.media;
  const indexStore = new PostgresIndexStore(pool);
  await indexStore.ensureTables();
  return new StorageCore({
    engine: new StorageDecisionEngine(options.engine),
    router: new StorageRouter(new PostgresRelationalBackend(pool), new PostgresDocumentBackend(pool)),
    indexer: new MetadataIndexer(indexStore),
    mediaResolver: createMediaResolver({
      catalog,
      confidenceFloor: options.confidenceFloor ?? config.media.confidenceFloor,
      classify: options.classify,
    }),
    documentResolver: createDocumentResolver(catalog),
  });
};
