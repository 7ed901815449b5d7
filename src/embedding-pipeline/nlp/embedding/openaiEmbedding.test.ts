import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  DimensionMismatchError,
  EmbeddingUnavailableError,
  UpstreamRequestError,
} from '../../../../shared/lib/errors.js';
import { Deadline } from '../../../../shared/lib/timeout.js';
import { FakeEmbeddingProvider, HangingEmbeddingProvider, HttpStatusError, recordingSleep } from '../../../testing/fakes.js';
import { EmbeddingClient, MAX_EMBEDDING_INPUT_CHARS, type EmbeddingProvider } from './openaiEmbedding.js';

const retry = { maxAttempts: 3, initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2 };

/** [length, first char code] so the order of vectors is visible */
const embedText = (text: string) => [text.length, text.charCodeAt(0)];

function clientFor(provider: EmbeddingProvider, sleep = recordingSleep().sleep) {
  return new EmbeddingClient(provider, { dimension: 2, batchSize: 2, timeoutMs: 1000, retry, sleep });
}

describe('EmbeddingClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('splits texts into batches and keeps input order', async () => {
    const provider = new FakeEmbeddingProvider(embedText);

    const result = await clientFor(provider).embed(['a', 'bb', 'ccc', 'dddd', 'e']);

    expect(provider.calls).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['e']]);
    expect(result._unsafeUnwrap()).toEqual([[1, 97], [2, 98], [3, 99], [4, 100], [1, 101]]);
  });

  it('uses an explicit batch size', async () => {
    const provider = new FakeEmbeddingProvider(embedText);

    await clientFor(provider).embed(['a', 'b', 'c'], 3);

    expect(provider.calls).toEqual([['a', 'b', 'c']]);
  });

  it('returns [] for no texts without calling the provider', async () => {
    const provider = new FakeEmbeddingProvider(embedText);

    const result = await clientFor(provider).embed([]);

    expect(result._unsafeUnwrap()).toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it('truncates long inputs', async () => {
    const provider = new FakeEmbeddingProvider(embedText);

    await clientFor(provider).embed(['x'.repeat(MAX_EMBEDDING_INPUT_CHARS + 50)]);

    expect(provider.calls[0]?.[0]).toHaveLength(MAX_EMBEDDING_INPUT_CHARS);
  });

  it('retries a rate-limited batch with exponential backoff', async () => {
    const provider = new FakeEmbeddingProvider(embedText);
    provider.failures.push(new HttpStatusError(429), new HttpStatusError(503));
    const { sleep, delays } = recordingSleep();

    const result = await clientFor(provider, sleep).embed(['a']);

    expect(result._unsafeUnwrap()).toEqual([[1, 97]]);
    expect(provider.calls).toHaveLength(3);
    expect(delays).toEqual([100, 200]);
  });

  it('gives up after maxAttempts with EmbeddingUnavailable', async () => {
    const provider = new FakeEmbeddingProvider(embedText);
    provider.failures.push(new HttpStatusError(500), new HttpStatusError(500), new HttpStatusError(500));

    const result = await clientFor(provider).embed(['a']);

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(error.message).toContain('failed after 3 attempt(s)');
    expect(provider.calls).toHaveLength(3);
  });

  it('does not retry a client error', async () => {
    const provider = new FakeEmbeddingProvider(embedText);
    provider.failures.push(new HttpStatusError(400, 'bad input'));

    const result = await clientFor(provider).embed(['a']);

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(error.cause).toBeInstanceOf(UpstreamRequestError);
    expect(provider.calls).toHaveLength(1);
  });

  it('fails with DimensionMismatch when the provider returns the wrong dimension', async () => {
    const provider = new FakeEmbeddingProvider(() => [1, 2, 3]);

    const result = await clientFor(provider).embed(['a']);

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(DimensionMismatchError);
    expect(error.message).toBe('Embedding for text 0: expected dimension 2, got 3');
  });

  it('rejects a short response without retrying', async () => {
    const provider: EmbeddingProvider = {
      model: 'short',
      embedBatch: vi.fn(async () => [[1, 1]]),
    };

    const result = await clientFor(provider).embed(['a', 'b']);

    expect(result._unsafeUnwrapErr().message).toContain('expected 2 vectors, got 1');
    expect(provider.embedBatch).toHaveBeenCalledTimes(1);
  });

  it('stops when the request budget is used up', async () => {
    const provider = new FakeEmbeddingProvider(embedText);
    const deadline = new Deadline(100, () => 1_000);
    let now = 1_000;
    const expired = new Deadline(100, () => now);
    now += 500;

    const fresh = await clientFor(provider).embed(['a'], 1, { deadline });
    const late = await clientFor(provider).embed(['a'], 1, { deadline: expired });

    expect(fresh.isOk()).toBe(true);
    expect(late._unsafeUnwrapErr().message).toContain('request time budget exhausted');
    expect(provider.calls).toHaveLength(1);
  });

  it('does not back off past the request budget after a timed-out call', async () => {
    const provider = new HangingEmbeddingProvider();
    const { sleep, delays } = recordingSleep();
    const deadline = new Deadline(50);

    const result = await clientFor(provider, sleep).embed(['a'], 1, { deadline });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(EmbeddingUnavailableError);
    expect(provider.calls).toBe(1);
    expect(delays).toEqual([]);
  });
});
