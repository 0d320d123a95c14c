import config from '@config';
import { buildServer } from '@api/http';
import { createPostgresCore } from '@core/index';
import { IngestionService } from '@ingest/service';
import { CategoryDirectoryStore } from '@storage/directory';
import { createPool } from '@storage/postgres';
import { logger } from '@telemetry/index';

export type StartServerOptions = {
  port?: number;
  host?: string;
};

export const startServer = async ({ port = config.port, host = '0.0.0.0' }: StartServerOptions = {}) => {
  const pool = createPool();
  const core = await createPostgresCore(pool);
  const ingestion = new IngestionService(core, new CategoryDirectoryStore(config.storage.root));
  const server = buildServer({ core, ingestion });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await server.close();
    await pool.end();
    process.exit(0);
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  await server.listen({ port, host });
  logger.info({ port, storageRoot: config.storage.root }, `StoreSense listening on port ${port}`);
  return server;
};
