/**
 * Index artifact pair: binary vector index + JSON metadata table.
 *
 * Vector index layout (little-endian):
 *   magic "RVIX" | formatVersion u16 | reserved u16 | dimension u32 |
 *   count u32 | buildIdLength u32 | buildId utf-8 | count x dimension f32
 *
 * The metadata table carries the same buildId; a loader refuses a pair whose
 * ids differ.
 *
 * Every published pair is also kept under `<dir>/builds/<buildId>/<name>`.
 */
import path from "path";
import { promisify } from "util";
import { gunzip, gzip } from "zlib";
import { IndexUnavailableError, errorMessage } from "../../../shared/lib/errors.js";
import { freezeRecord, isRepoRecord, type RepoRecord } from "../../../shared/models/RepoRecord.js";
import { VectorIndex, firstNonFinite } from "./vectorIndex.js";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const INDEX_MAGIC = "RVIX";
export const INDEX_FORMAT_VERSION = 1;
export const METADATA_FORMAT_VERSION = 1;
const FIXED_HEADER_BYTES = 20;

export interface MetadataTable {
    formatVersion: number;
    buildId: string;
    organization: string;
    createdAt: string;
    embedding: {
        model: string;
        dimension: number;
    };
    count: number;
    records: RepoRecord[];
}

export interface IndexArtifacts {
    buildId: string;
    index: VectorIndex;
    metadata: MetadataTable;
}

/**
 * `<dir>/builds/<buildId>/<name>` for a serving key `<dir>/<name>`.
 */
export function versionedKey(servingKey: string, buildId: string): string {
    const dir = path.posix.dirname(servingKey);
    const name = path.posix.basename(servingKey);
    return dir === "." ? `builds/${buildId}/${name}` : `${dir}/builds/${buildId}/${name}`;
}

export function encodeIndexArtifact(index: VectorIndex, buildId: string): Buffer {
    const idBytes = Buffer.from(buildId, "utf-8");
    const flat = index.toFlat();
    const buffer = Buffer.alloc(FIXED_HEADER_BYTES + idBytes.length + flat.length * 4);

    buffer.write(INDEX_MAGIC, 0, "ascii");
    buffer.writeUInt16LE(INDEX_FORMAT_VERSION, 4);
    buffer.writeUInt16LE(0, 6);
    buffer.writeUInt32LE(index.dimension, 8);
    buffer.writeUInt32LE(index.vectorCount, 12);
    buffer.writeUInt32LE(idBytes.length, 16);
    idBytes.copy(buffer, FIXED_HEADER_BYTES);

    let offset = FIXED_HEADER_BYTES + idBytes.length;
    for (const value of flat) {
        buffer.writeFloatLE(value, offset);
        offset += 4;
    }
    return buffer;
}

function corrupt(message: string): IndexUnavailableError {
    return new IndexUnavailableError("corrupt_artifact", `Corrupt vector index: ${message}`);
}

export function decodeIndexArtifact(buffer: Buffer): { index: VectorIndex; buildId: string } {
    if (buffer.length < FIXED_HEADER_BYTES) {
        throw corrupt(`${buffer.length} bytes is shorter than the header`);
    }
    const magic = buffer.toString("ascii", 0, 4);
    if (magic !== INDEX_MAGIC) {
        throw corrupt(`bad magic "${magic}"`);
    }
    const version = buffer.readUInt16LE(4);
    if (version !== INDEX_FORMAT_VERSION) {
        throw corrupt(`unsupported format version ${version}`);
    }

    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    const idLength = buffer.readUInt32LE(16);
    if (dimension === 0) {
        throw corrupt("dimension is 0");
    }

    const dataStart = FIXED_HEADER_BYTES + idLength;
    const expectedLength = dataStart + count * dimension * 4;
    if (buffer.length !== expectedLength) {
        throw corrupt(`expected ${expectedLength} bytes for ${count} x ${dimension} vectors, got ${buffer.length}`);
    }

    const buildId = buffer.toString("utf-8", FIXED_HEADER_BYTES, dataStart);
    const flat = new Float32Array(count * dimension);
    for (let i = 0; i < flat.length; i++) {
        flat[i] = buffer.readFloatLE(dataStart + i * 4);
    }
    const nonFinite = firstNonFinite(flat);
    if (nonFinite !== -1) {
        throw corrupt(`non-finite value in vector ${Math.floor(nonFinite / dimension)}`);
    }

    return { index: VectorIndex.fromFlat(flat, dimension, count), buildId };
}

export async function encodeMetadataTable(table: MetadataTable, key: string): Promise<Buffer> {
    const json = JSON.stringify(table);
    return key.endsWith(".gz") ? gzipAsync(json) : Buffer.from(json, "utf-8");
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function decodeMetadataTable(buffer: Buffer, key: string): Promise<MetadataTable> {
    let parsed: unknown;
    try {
        const text = key.endsWith(".gz") ? (await gunzipAsync(buffer)).toString("utf-8") : buffer.toString("utf-8");
        parsed = JSON.parse(text);
    } catch (error) {
        throw new IndexUnavailableError("corrupt_artifact", `Metadata table is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    if (!isObject(parsed)) {
        throw new IndexUnavailableError("corrupt_artifact", "Metadata table is not a JSON object");
    }

    const { formatVersion, buildId, organization, createdAt, count, embedding, records } = parsed;
    if (formatVersion !== METADATA_FORMAT_VERSION) {
        throw new IndexUnavailableError("corrupt_artifact", `Unsupported metadata format version ${String(formatVersion)}`);
    }
    if (typeof buildId !== "string" || typeof organization !== "string" || typeof createdAt !== "string" || typeof count !== "number") {
        throw new IndexUnavailableError("corrupt_artifact", "Metadata table header fields are malformed");
    }
    if (!isObject(embedding) || typeof embedding.model !== "string" || typeof embedding.dimension !== "number") {
        throw new IndexUnavailableError("corrupt_artifact", "Metadata table embedding info is malformed");
    }
    if (!Array.isArray(records)) {
        throw new IndexUnavailableError("corrupt_artifact", "Metadata table has no records array");
    }

    const validRecords: RepoRecord[] = [];
    records.forEach((record: unknown, position: number) => {
        if (!isRepoRecord(record)) {
            throw new IndexUnavailableError("corrupt_artifact", `Metadata record at position ${position} is malformed`);
        }
        validRecords.push(freezeRecord(record));
    });

    if (count !== validRecords.length) {
        throw new IndexUnavailableError(
            "length_mismatch",
            `Metadata table declares ${count} records but holds ${validRecords.length}`
        );
    }

    return {
        formatVersion: METADATA_FORMAT_VERSION,
        buildId,
        organization,
        createdAt,
        embedding: { model: embedding.model, dimension: embedding.dimension },
        count,
        records: validRecords,
    };
}

/**
 * Checks that a decoded pair belongs together.
 */
export function assertPairAligned(
    index: VectorIndex,
    indexBuildId: string,
    metadata: MetadataTable
): void {
    if (indexBuildId !== metadata.buildId) {
        throw new IndexUnavailableError(
            "build_mismatch",
            `Vector index build ${indexBuildId} does not match metadata build ${metadata.buildId}`
        );
    }
    if (metadata.records.length !== index.vectorCount) {
        throw new IndexUnavailableError(
            "length_mismatch",
            `Metadata has ${metadata.records.length} records but the index holds ${index.vectorCount} vectors`
        );
    }
    if (metadata.embedding.dimension !== index.dimension) {
        throw new IndexUnavailableError(
            "corrupt_artifact",
            `Metadata dimension ${metadata.embedding.dimension} differs from index dimension ${index.dimension}`
        );
    }
}
