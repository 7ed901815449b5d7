import { mkdtemp, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalArtifactStore, createArtifactStore, S3ArtifactStore } from './artifactStore.js';

describe('LocalArtifactStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'artifact-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing key', async () => {
    const store = new LocalArtifactStore(dir);

    await expect(store.get('acme/vector_index.bin')).resolves.toBeNull();
  });

  it('writes nested keys and reads them back', async () => {
    const store = new LocalArtifactStore(dir);

    await store.put('acme/metadata.json', Buffer.from('{"count":0}'), 'application/json');

    const body = await store.get('acme/metadata.json');
    expect(body?.toString('utf-8')).toBe('{"count":0}');
    expect(await readdir(path.join(dir, 'acme'))).toEqual(['metadata.json']);
  });

  it('overwrites an existing key', async () => {
    const store = new LocalArtifactStore(dir);

    await store.put('index.bin', Buffer.from([1]), 'application/octet-stream');
    await store.put('index.bin', Buffer.from([2, 3]), 'application/octet-stream');

    expect([...(await store.get('index.bin')) ?? []]).toEqual([2, 3]);
  });

  it('refuses keys outside its root', async () => {
    const store = new LocalArtifactStore(dir);

    await expect(store.get('../outside.bin')).rejects.toThrow('Artifact key escapes the store root: ../outside.bin');
    await expect(store.put('../outside.bin', Buffer.from([1]), 'application/octet-stream')).rejects.toThrow(
      'Artifact key escapes the store root'
    );
  });
});

describe('createArtifactStore', () => {
  it('follows the configured driver', () => {
    const base = { bucket: 'test-bucket', region: 'us-west-2', indexKey: 'i', metadataKey: 'm', localDir: 'output' };

    expect(createArtifactStore({ ...base, driver: 's3' })).toBeInstanceOf(S3ArtifactStore);
    expect(createArtifactStore({ ...base, driver: 's3' }).location).toBe('s3://test-bucket');
    expect(createArtifactStore({ ...base, driver: 'local' }).location).toBe(path.resolve('output'));
  });
});
