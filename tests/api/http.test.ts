import fs from 'fs';
import os from 'os';
import path from 'path';
import { FastifyInstance } from 'fastify';
import { buildServer } from '@api/http';
import { IngestionService } from '@ingest/service';
import { CategoryDirectoryStore } from '@storage/directory';
import { createTestCore } from '../utils/fakes';

const BOUNDARY = '----storesense-test-boundary';

type Part = { filename: string; contentType: string; content: string };

const multipart = (parts: Part[]) => ({
  headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  payload: Buffer.concat([
    ...parts.flatMap((part) => [
      Buffer.from(
        `--${BOUNDARY}\r\n` +
          `Content-Disposition: form-data; name="file"; filename="${part.filename}"\r\n` +
          `Content-Type: ${part.contentType}\r\n\r\n`,
      ),
      Buffer.from(part.content),
      Buffer.from('\r\n'),
    ]),
    Buffer.from(`--${BOUNDARY}--\r\n`),
  ]),
});

const peopleJson = JSON.stringify([
  { id: 1, name: 'a' },
  { id: 2, name: 'b' },
]);

describe('HTTP API', () => {
  let root: string;
  let app: FastifyInstance;

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'storesense-http-'));
    const { core } = createTestCore();
    app = buildServer({ core, ingestion: new IngestionService(core, new CategoryDirectoryStore(root)) });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', kinds: ['media', 'document', 'json'] });
  });

  it('decides storage for a JSON body without writing', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/analyze', payload: JSON.parse(peopleJson) });
    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.storageType).toBe('sql');
    expect(body.reasoning).toEqual({ consistency: 1, nestingDepth: 1, fieldCount: 2 });
    expect(body.schemaName).toMatch(/^json_data_[0-9a-f]{12}$/);

    const search = await app.inject({ method: 'GET', url: '/api/search' });
    expect(search.json()).toEqual({ results: [], count: 0 });
  });

  it('maps payload errors to 400 with their context', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/analyze', payload: [] });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: { name: 'EmptyInputError', code: 'E1000', message: 'No records to analyze', context: { records: 0 } },
    });
  });

  it('ingests an uploaded JSON file', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/upload',
      ...multipart([{ filename: 'people.json', contentType: 'application/json', content: peopleJson }]),
    });
    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({ status: 'success', type: 'json', storageType: 'sql', indexId: 1 });
    expect(body.summary.sampleKeys).toEqual(['id', 'name']);
  });

  it('rejects uploads of broken JSON', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/upload',
      ...multipart([{ filename: 'broken.json', contentType: 'application/json', content: '{"a":' }]),
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toMatchObject({ name: 'InvalidJsonError', code: 'E1003', context: { filename: 'broken.json' } });
  });

  it('ingests a batch and reports each file', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/upload/batch',
      ...multipart([
        { filename: 'people.json', contentType: 'application/json', content: peopleJson },
        { filename: 'nature.png', contentType: 'image/png', content: 'fake image' },
        { filename: 'broken.json', contentType: 'application/json', content: 'nope' },
      ]),
    });
    expect(response.statusCode).toBe(200);
    const { results } = response.json();
    expect(results).toHaveLength(3);
    expect(results[0]).toMatchObject({ status: 'success', type: 'json' });
    expect(results[1]).toMatchObject({ status: 'success', type: 'media', category: 'nature' });
    expect(results[2]).toMatchObject({ status: 'error', filename: 'broken.json', code: 'E1003' });
  });

  it('searches and summarizes the index', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/upload',
      ...multipart([{ filename: 'people.json', contentType: 'application/json', content: peopleJson }]),
    });
    await app.inject({
      method: 'POST',
      url: '/api/upload',
      ...multipart([{ filename: 'food.png', contentType: 'image/png', content: 'fake image' }]),
    });

    const media = await app.inject({ method: 'GET', url: '/api/search?kind=media&limit=5' });
    expect(media.statusCode).toBe(200);
    expect(media.json().results.map((entry: { filename: string }) => entry.filename)).toEqual(['food.png']);

    const byText = await app.inject({ method: 'GET', url: '/api/search?q=PEOPLE' });
    expect(byText.json().count).toBe(1);

    const stats = await app.inject({ method: 'GET', url: '/api/stats' });
    expect(stats.json()).toMatchObject({ total: 2, counts: { media: 1, document: 0, json: 1 }, categories: ['food'] });
  });

  it('validates search parameters', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/search?kind=spreadsheet' });
    expect(response.statusCode).toBe(400);
    expect(response.json().error.name).toBe('ValidationError');
  });
});
