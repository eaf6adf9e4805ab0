import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/api/server.js';
import { toErrorResponse } from '../../src/api/handlers/errors.js';
import { RagService } from '../../src/services/RagService.js';
import { Fragmenter } from '../../src/services/chunking/Fragmenter.js';
import { EmbeddingAdapter } from '../../src/services/embedding/EmbeddingAdapter.js';
import { EmbeddingUnavailableError, EmptyIndexError, IngestionError } from '../../src/utils/errors.js';
import { KeywordEmbeddingProvider, StubGenerator } from '../helpers/stubs.js';

const BOUNDARY = '----fragment-retrieval-test';

const multipart = (file: { name: string; content: string }, fields: Record<string, string> = {}) => {
  const parts = Object.entries(fields).map(
    ([name, value]) => `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`
  );
  parts.push(
    `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="${file.name}"\r\n` +
      `Content-Type: text/csv\r\n\r\n${file.content}\r\n`
  );
  parts.push(`--${BOUNDARY}--\r\n`);
  return {
    payload: parts.join(''),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
};

const STAFF_CSV = 'name,company\nAlice,Acme\nBob,Globex\nCarol,Acme\n';

describe('API server', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    const rag = new RagService(
      new Fragmenter(),
      new EmbeddingAdapter(new KeywordEmbeddingProvider(['acme', 'globex']), { baseDelayMs: 0 }),
      new StubGenerator(prompt => `Based on: ${prompt.context}`),
      { chunkSize: 200, chunkOverlap: 20, batchSize: 64, concurrency: 1, metric: 'cosine', k: 4, maxContextLength: 1000 }
    );
    server = await buildServer(rag, { maxUploadSizeMB: 1, environment: 'test' });
  });

  afterEach(async () => {
    await server.close();
  });

  const ingestStaff = async () => {
    const response = await server.inject({ method: 'POST', url: '/indexes', ...multipart({ name: 'staff.csv', content: STAFF_CSV }) });
    expect(response.statusCode).toBe(201);
    return response.json<{ id: string }>().id;
  };

  it('reports health', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', environment: 'test', indexes: 0, services: { generator: true } });
  });

  it('ingests an uploaded document', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/indexes',
      ...multipart({ name: 'staff.csv', content: STAFF_CSV }, { chunkSize: '50', chunkOverlap: '5' }),
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toMatchObject({
      source: 'staff.csv',
      status: 'complete',
      requested: 3,
      completed: 3,
      size: 3,
      dimension: 3,
      metric: 'cosine',
    });
  });

  it('rejects an overlap that is not smaller than the chunk size', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/indexes',
      ...multipart({ name: 'staff.csv', content: STAFF_CSV }, { chunkSize: '10', chunkOverlap: '10' }),
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'INVALID_CONFIGURATION' });
  });

  it('lists ingested indexes', async () => {
    const id = await ingestStaff();

    const response = await server.inject({ method: 'GET', url: '/indexes' });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ indexes: Array<{ id: string }> }>().indexes.map(index => index.id)).toEqual([id]);
  });

  it('returns ranked fragments for a query', async () => {
    const id = await ingestStaff();

    const response = await server.inject({
      method: 'POST',
      url: `/indexes/${id}/query`,
      payload: { question: 'Who works at Acme?', k: 2 },
    });

    expect(response.statusCode).toBe(200);
    const { results } = response.json<{ results: Array<{ text: string; sourceMetadata: Record<string, string> }> }>();
    expect(results.map(r => r.text)).toEqual(['name: Alice company: Acme', 'name: Carol company: Acme']);
    expect(results[0].sourceMetadata).toMatchObject({ source: 'staff.csv', row: '1' });
  });

  it('applies a metadata filter', async () => {
    const id = await ingestStaff();

    const response = await server.inject({
      method: 'POST',
      url: `/indexes/${id}/query`,
      payload: { question: 'Who works at Acme?', filter: { row: { gte: 2 } } },
    });

    const { results } = response.json<{ results: Array<{ text: string }> }>();
    expect(results.map(r => r.text)).toEqual(['name: Carol company: Acme', 'name: Bob company: Globex']);
  });

  it('matches nothing for a filter on an inherited property name', async () => {
    const id = await ingestStaff();

    const response = await server.inject({
      method: 'POST',
      url: `/indexes/${id}/query`,
      payload: { question: 'Who works at Acme?', filter: { constructor: { gt: 0 } } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ results: [] });
  });

  it('answers a question with its sources', async () => {
    const id = await ingestStaff();

    const response = await server.inject({
      method: 'POST',
      url: `/indexes/${id}/answer`,
      payload: { question: 'Who works at Globex?', k: 1 },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ answer: string; sources: Array<{ text: string }> }>();
    expect(body.answer).toBe('Based on: name: Bob company: Globex');
    expect(body.sources.map(s => s.text)).toEqual(['name: Bob company: Globex']);
  });

  it('returns 404 for an unknown index', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/indexes/idx-unknown/query',
      payload: { question: 'Anyone?' },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'INDEX_NOT_FOUND', message: 'Index not found: idx-unknown' });
  });

  it('rejects a request without a question', async () => {
    const id = await ingestStaff();

    const response = await server.inject({ method: 'POST', url: `/indexes/${id}/query`, payload: { k: 2 } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'INVALID_REQUEST' });
  });
});

describe('toErrorResponse', () => {
  it('maps domain errors to statuses', () => {
    expect(toErrorResponse(new EmptyIndexError()).status).toBe(409);
    expect(toErrorResponse(new EmbeddingUnavailableError('down', true))).toEqual({
      status: 502,
      body: { error: 'EMBEDDING_UNAVAILABLE', message: 'down', details: { retryable: true } },
    });
    expect(toErrorResponse(new IngestionError('failed', 'embedding', 2, 5, null)).body.details).toEqual({
      stage: 'embedding',
      completed: 2,
      requested: 5,
    });
    expect(toErrorResponse(new Error('boom'))).toEqual({
      status: 500,
      body: { error: 'INTERNAL_ERROR', message: 'boom' },
    });
  });
});
