import { logger } from '@telemetry/index';
import { startServer } from './server';

export { analyze, analyzePayload, toRecords } from '@analyzer/structure';
export { detect } from '@analyzer/patterns';
export type { FieldProfile, FieldType, Pattern, StructuralDescriptor } from '@analyzer/types';
export { buildSchema } from '@schema/index';
export type { DocumentSchema, RelationalSchema, StorageSchema } from '@schema/types';
export { StorageDecisionEngine } from '@decision/engine';
export type { SchemaDecision, DecisionReasoning } from '@decision/engine';
export { SchemaNameRegistry } from '@decision/registry';
export { StorageRouter } from '@storage/router';
export type { DocumentBackend, RelationalBackend, StorageLocation } from '@storage/types';
export { MetadataIndexer } from '@metadata/indexer';
export { InMemoryIndexStore } from '@metadata/memoryStore';
export { PostgresIndexStore } from '@metadata/pgStore';
export type { IndexEntry, IndexFilter, IndexPersistence } from '@metadata/types';
export { CategoryResolver, createDocumentResolver, createMediaResolver } from '@media/resolver';
export type { ClassifyFn, ExtractTextFn } from '@media/resolver';
export { StorageCore, createPostgresCore } from '@core/index';
export { IngestionService } from '@ingest/service';
export { buildServer } from '@api/http';
export * from '@errors/index';
export { startServer };

if (require.main === module) {
  startServer().catch((err) => {
    logger.error({ err }, 'Failed to start StoreSense');
    process.exit(1);
  });
}
