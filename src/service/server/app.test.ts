import type { Server } from 'http';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { IndexUnavailableError } from '../../../shared/lib/errors.js';
import { EmbeddingClient } from '../../embedding-pipeline/nlp/embedding/openaiEmbedding.js';
import { FakeEmbeddingProvider, FakeLlmProvider, HttpStatusError, makeRecord, recordingSleep } from '../../testing/fakes.js';
import { AnswerSynthesizer } from '../qa/answer.js';
import { QueryOrchestrator } from '../qa/queryOrchestrator.js';
import type { QueryServices } from '../services.js';
import { METADATA_FORMAT_VERSION } from '../vector-store/indexArtifacts.js';
import { IndexCache, type IndexLoader } from '../vector-store/indexCache.js';
import { VectorIndex } from '../vector-store/vectorIndex.js';
import { createApp } from './app.js';

const workingLoader: IndexLoader = async () => ({
  index: VectorIndex.fromVectors([[0, 0], [1, 1]], 2),
  metadata: {
    formatVersion: METADATA_FORMAT_VERSION,
    buildId: 'b1',
    organization: 'aws-samples',
    createdAt: '2026-01-01T00:00:00.000Z',
    embedding: { model: 'fake-embedding', dimension: 2 },
    count: 2,
    records: [makeRecord('repo-0'), makeRecord('repo-1')],
  },
  source: 'memory://test/index',
  loadedAt: '2026-01-01T00:00:00.000Z',
  loadTimeMs: 1,
});

function servicesWith(loader: IndexLoader, embedding = new FakeEmbeddingProvider(() => [0, 0])): QueryServices {
  const sleep = recordingSleep().sleep;
  const indexCache = new IndexCache(loader, 'memory://test/index');
  const orchestrator = new QueryOrchestrator({
    indexCache,
    embedder: new EmbeddingClient(embedding, {
      dimension: 2,
      batchSize: 16,
      timeoutMs: 1000,
      retry: { maxAttempts: 1, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 2 },
      sleep,
    }),
    synthesizer: new AnswerSynthesizer(new FakeLlmProvider(['Try repo-0.', 'Try repo-0.']), {
      contextLimit: 5,
      timeoutMs: 1000,
      sleep,
    }),
    config: { defaultK: 1, maxK: 5, contextLimit: 5, requestTimeoutMs: 1000 },
  });
  return { indexCache, orchestrator, allowedOrigin: 'https://repos.example.com' };
}

describe('Express app', () => {
  let server: Server | null = null;

  async function start(services: QueryServices): Promise<string> {
    const app = createApp(services);
    const listening = await new Promise<Server>((resolve) => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  function post(baseUrl: string, body: string) {
    return fetch(`${baseUrl}/api/ask`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      await new Promise<void>((resolve, reject) => running.close((error) => (error ? reject(error) : resolve())));
    }
  });

  it('answers POST /api/ask', async () => {
    const baseUrl = await start(servicesWith(workingLoader));

    const res = await post(baseUrl, JSON.stringify({ query: 'which repo?' }));

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      answer: 'Try repo-0.',
      degraded: false,
      sources: [{ id: 'aws-samples/repo-0', distance: 0, similarityScore: 1 }],
    });
  });

  it('returns 400 for an empty query', async () => {
    const baseUrl = await start(servicesWith(workingLoader));

    const res = await post(baseUrl, JSON.stringify({ query: '  ' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'query must not be empty', kind: 'InvalidRequest' });
  });

  it('returns 400 for malformed JSON', async () => {
    const baseUrl = await start(servicesWith(workingLoader));

    const res = await post(baseUrl, '{"query": ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON', kind: 'InvalidRequest' });
  });

  it('returns 503 when the index is unavailable', async () => {
    const baseUrl = await start(servicesWith(async () => {
      throw new IndexUnavailableError('corrupt_artifact', 'Corrupt vector index: bad magic "XXXX"');
    }));

    const res = await post(baseUrl, JSON.stringify({ query: 'q' }));

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'Corrupt vector index: bad magic "XXXX"',
      kind: 'IndexUnavailable',
      reason: 'corrupt_artifact',
    });
  });

  it('returns 502 when embedding is unavailable', async () => {
    const embedding = new FakeEmbeddingProvider(() => [0, 0]);
    embedding.failures.push(new HttpStatusError(500));
    const baseUrl = await start(servicesWith(workingLoader, embedding));

    const res = await post(baseUrl, JSON.stringify({ query: 'q' }));

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ kind: 'EmbeddingUnavailable' });
  });

  it('reports index status on GET /api/health', async () => {
    const services = servicesWith(workingLoader);
    const baseUrl = await start(services);

    const before: unknown = await (await fetch(`${baseUrl}/api/health`)).json();
    await services.indexCache.getOrLoad();
    const after: unknown = await (await fetch(`${baseUrl}/api/health`)).json();

    expect(before).toMatchObject({ status: 'ok', index: { state: 'empty', vectorCount: 0 } });
    expect(after).toMatchObject({ status: 'ok', index: { state: 'ready', vectorCount: 2, buildId: 'b1' } });
  });

  it('reports degraded health after a failed load', async () => {
    const services = servicesWith(async () => {
      throw new IndexUnavailableError('missing_object', 'Artifact not found');
    });
    const baseUrl = await start(services);
    await expect(services.indexCache.getOrLoad()).rejects.toThrow('Artifact not found');

    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'degraded',
      index: { state: 'failed', lastError: 'Artifact not found' },
    });
  });

  it('returns 404 for unknown routes', async () => {
    const baseUrl = await start(servicesWith(workingLoader));

    const res = await fetch(`${baseUrl}/api/unknown`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not Found' });
  });

  it('allows the configured origin', async () => {
    const baseUrl = await start(servicesWith(workingLoader));

    const allowed = await fetch(`${baseUrl}/api/health`, { headers: { Origin: 'https://repos.example.com' } });
    const other = await fetch(`${baseUrl}/api/health`, { headers: { Origin: 'https://elsewhere.example.com' } });

    expect(allowed.headers.get('access-control-allow-origin')).toBe('https://repos.example.com');
    expect(other.headers.get('access-control-allow-origin')).toBeNull();
  });
});
