import { describe, it, expect } from 'vitest';
import { IndexUnavailableError } from '../../../shared/lib/errors.js';
import { makeRecord } from '../../testing/fakes.js';
import {
  METADATA_FORMAT_VERSION,
  assertPairAligned,
  decodeIndexArtifact,
  decodeMetadataTable,
  encodeIndexArtifact,
  encodeMetadataTable,
  type MetadataTable,
} from './indexArtifacts.js';
import { VectorIndex } from './vectorIndex.js';

function metadataFor(buildId: string, count: number): MetadataTable {
  const records = Array.from({ length: count }, (_, i) => makeRecord(`repo-${i}`));
  return {
    formatVersion: METADATA_FORMAT_VERSION,
    buildId,
    organization: 'aws-samples',
    createdAt: '2026-01-01T00:00:00.000Z',
    embedding: { model: 'fake-embedding', dimension: 2 },
    count,
    records,
  };
}

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof IndexUnavailableError ? error.reason : 'not-index-unavailable';
  }
  return undefined;
}

async function asyncReasonOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof IndexUnavailableError ? error.reason : 'not-index-unavailable';
  }
  return undefined;
}

describe('vector index artifact', () => {
  const index = VectorIndex.fromVectors([[0, 0], [1, 0.5]], 2);

  it('decodes what it encodes', () => {
    const decoded = decodeIndexArtifact(encodeIndexArtifact(index, 'build-1'));

    expect(decoded.buildId).toBe('build-1');
    expect(decoded.index.dimension).toBe(2);
    expect(decoded.index.vectorCount).toBe(2);
    expect(Array.from(decoded.index.toFlat())).toEqual([0, 0, 1, 0.5]);
  });

  it('starts with the magic and the header fields', () => {
    const bytes = encodeIndexArtifact(index, 'b');

    expect(bytes.toString('ascii', 0, 4)).toBe('RVIX');
    expect(bytes.readUInt32LE(8)).toBe(2);
    expect(bytes.readUInt32LE(12)).toBe(2);
    expect(bytes.length).toBe(20 + 1 + 4 * 4);
  });

  it('rejects a truncated payload', () => {
    const bytes = encodeIndexArtifact(index, 'build-1');

    expect(reasonOf(() => decodeIndexArtifact(bytes.subarray(0, bytes.length - 4)))).toBe('corrupt_artifact');
    expect(reasonOf(() => decodeIndexArtifact(bytes.subarray(0, 10)))).toBe('corrupt_artifact');
  });

  it('rejects a bad magic', () => {
    const bytes = Buffer.from(encodeIndexArtifact(index, 'build-1'));
    bytes.write('XXXX', 0, 'ascii');

    expect(() => decodeIndexArtifact(bytes)).toThrow('bad magic "XXXX"');
  });

  it('rejects an unknown format version', () => {
    const bytes = Buffer.from(encodeIndexArtifact(index, 'build-1'));
    bytes.writeUInt16LE(9, 4);

    expect(() => decodeIndexArtifact(bytes)).toThrow('unsupported format version 9');
  });

  it('rejects NaN and infinite components', () => {
    const nan = Buffer.from(encodeIndexArtifact(index, 'build-1'));
    nan.writeFloatLE(NaN, 20 + 'build-1'.length + 2 * 4);
    const infinite = Buffer.from(encodeIndexArtifact(index, 'build-1'));
    infinite.writeFloatLE(-Infinity, 20 + 'build-1'.length);

    expect(reasonOf(() => decodeIndexArtifact(nan))).toBe('corrupt_artifact');
    expect(() => decodeIndexArtifact(nan)).toThrow('Corrupt vector index: non-finite value in vector 1');
    expect(() => decodeIndexArtifact(infinite)).toThrow('non-finite value in vector 0');
  });
});

describe('metadata table', () => {
  it('round-trips plain JSON', async () => {
    const table = metadataFor('build-1', 2);

    const decoded = await decodeMetadataTable(await encodeMetadataTable(table, 'org/metadata.json'), 'org/metadata.json');

    expect(decoded).toEqual(table);
  });

  it('gzips when the key ends in .gz', async () => {
    const table = metadataFor('build-1', 1);

    const bytes = await encodeMetadataTable(table, 'org/metadata.json.gz');

    expect(bytes[0]).toBe(0x1f);
    expect(bytes[1]).toBe(0x8b);
    expect((await decodeMetadataTable(bytes, 'org/metadata.json.gz')).records).toHaveLength(1);
  });

  it('rejects invalid JSON', async () => {
    expect(await asyncReasonOf(decodeMetadataTable(Buffer.from('{not json'), 'm.json'))).toBe('corrupt_artifact');
  });

  it('rejects a count that differs from the records it holds', async () => {
    const table = { ...metadataFor('build-1', 2), count: 3 };

    expect(await asyncReasonOf(decodeMetadataTable(Buffer.from(JSON.stringify(table)), 'm.json'))).toBe('length_mismatch');
  });

  it('rejects a malformed record', async () => {
    const table = metadataFor('build-1', 1);
    const raw = JSON.stringify({ ...table, records: [{ id: 'x' }] });

    await expect(decodeMetadataTable(Buffer.from(raw), 'm.json')).rejects.toThrow('Metadata record at position 0 is malformed');
  });

  it('returns frozen records', async () => {
    const table = metadataFor('build-1', 1);

    const decoded = await decodeMetadataTable(Buffer.from(JSON.stringify(table)), 'm.json');

    expect(Object.isFrozen(decoded.records[0])).toBe(true);
    expect(Object.isFrozen(decoded.records[0]?.awsServices)).toBe(true);
  });
});

describe('assertPairAligned', () => {
  const index = VectorIndex.fromVectors([[0, 0], [1, 1]], 2);

  it('accepts a matching pair', () => {
    expect(() => assertPairAligned(index, 'build-1', metadataFor('build-1', 2))).not.toThrow();
  });

  it('rejects differing build ids', () => {
    expect(reasonOf(() => assertPairAligned(index, 'build-1', metadataFor('build-2', 2)))).toBe('build_mismatch');
  });

  it('rejects a record count that differs from the vector count', () => {
    expect(reasonOf(() => assertPairAligned(index, 'build-1', metadataFor('build-1', 3)))).toBe('length_mismatch');
  });
});
