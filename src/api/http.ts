import Fastify, { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import multipart from '@fastify/multipart';
import { ZodError, z } from 'zod';
import { toRecords } from '@analyzer/structure';
import { StorageCore } from '@core/index';
import { PayloadRejectedError, isStoreSenseError } from '@errors/index';
import { IngestionService, UploadedFile } from '@ingest/service';
import { INGEST_KINDS } from '@metadata/types';
import { logger, metrics } from '@telemetry/index';

export type ApiDeps = {
  core: StorageCore;
  ingestion: IngestionService;
  /** Upload size ceiling in bytes. */
  maxFileSize?: number;
};

const DEFAULT_MAX_FILE_SIZE = 100 * 1024 * 1024;

const searchQuerySchema = z.object({
  kind: z.enum(['media', 'document', 'json']).optional(),
  category: z.string().min(1).optional(),
  storageType: z.enum(['sql', 'nosql']).optional(),
  q: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

type HttpError = Error & { statusCode?: number };

const statusFor = (error: HttpError) => {
  if (error instanceof PayloadRejectedError || error instanceof ZodError) return 400;
  if (isStoreSenseError(error)) return 500;
  return error.statusCode ?? 500;
};

const errorBody = (error: HttpError, statusCode: number) => {
  if (isStoreSenseError(error)) return { error: error.toJSON() };
  if (error instanceof ZodError) {
    return { error: { name: 'ValidationError', message: 'Invalid request', issues: error.issues } };
  }
  return { error: { name: error.name, message: statusCode >= 500 ? 'Internal server error' : error.message } };
};

export const buildServer = ({ core, ingestion, maxFileSize = DEFAULT_MAX_FILE_SIZE }: ApiDeps): FastifyInstance => {
  const app = Fastify({ logger: logger as unknown as FastifyBaseLogger });

  app.register(multipart, { limits: { fileSize: maxFileSize } });

  app.setErrorHandler((error: HttpError, request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = statusFor(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.warn({ err: error }, 'Request rejected');
    }
    metrics.incrementCounter(`http_${statusCode}`);
    return reply.code(statusCode).send(errorBody(error, statusCode));
  });

  app.get('/health', async () => ({ status: 'ok', kinds: INGEST_KINDS }));

  app.post('/api/upload', async (request, reply) => {
    const data = await request.file();
    if (!data) {
      reply.code(400);
      return { error: { name: 'BadRequest', message: 'file is required' } };
    }
    const file: UploadedFile = {
      filename: data.filename,
      bytes: await data.toBuffer(),
      mimeType: data.mimetype,
    };
    return ingestion.ingest(file);
  });

  app.post('/api/upload/batch', async (request, reply) => {
    const files: UploadedFile[] = [];
    for await (const part of request.files()) {
      files.push({ filename: part.filename, bytes: await part.toBuffer(), mimeType: part.mimetype });
    }
    if (!files.length) {
      reply.code(400);
      return { error: { name: 'BadRequest', message: 'at least one file is required' } };
    }
    return { results: await ingestion.ingestBatch(files) };
  });

  app.post('/api/analyze', async (request) => {
    const { records, isArrayRoot } = toRecords(request.body);
    const decision = core.analyzeAndDecide(records, isArrayRoot);
    return {
      storageType: decision.storageType,
      schemaName: decision.schemaName,
      reasoning: decision.reasoning,
      policy: decision.policy,
      schema: decision.schema,
    };
  });

  app.get('/api/search', async (request) => {
    const query = searchQuerySchema.parse(request.query ?? {});
    const results = await core.search({
      kind: query.kind,
      categoryOrSchema: query.category,
      storageType: query.storageType,
      text: query.q,
      limit: query.limit,
    });
    return { results, count: results.length };
  });

  app.get('/api/stats', async () => core.stats());

  app.get('/metrics', async () => metrics.snapshot());

  return app;
};
