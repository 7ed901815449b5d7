/**
 * Process-wide holder of the loaded index pair
 *
 * Cold start: the first getOrLoad() fetches both artifacts, validates them
 * and keeps the result for the life of the process.
 * Warm start: later calls return the same object without touching storage.
 *
 * Concurrent callers during the first load share a single in-flight promise.
 * A failed load caches nothing; the next call starts a fresh load.
 */
import type { ArtifactStore } from "../../../shared/lib/artifactStore.js";
import { IndexUnavailableError, RagError, errorMessage } from "../../../shared/lib/errors.js";
import {
    assertPairAligned,
    decodeIndexArtifact,
    decodeMetadataTable,
    versionedKey,
    type MetadataTable,
} from "./indexArtifacts.js";
import type { VectorIndex } from "./vectorIndex.js";

export interface IndexLocation {
    indexKey: string;
    metadataKey: string;
}

export interface LoadedIndex {
    index: VectorIndex;
    metadata: MetadataTable;
    source: string;
    loadedAt: string;
    loadTimeMs: number;
}

export type IndexCacheState = "empty" | "loading" | "ready" | "failed";

export interface IndexCacheStatus {
    state: IndexCacheState;
    source: string;
    vectorCount: number;
    dimension: number;
    buildId: string | null;
    loadedAt: string | null;
    lastError: string | null;
}

async function fetchOptional(store: ArtifactStore, key: string): Promise<Buffer | null> {
    try {
        return await store.get(key);
    } catch (error) {
        throw new IndexUnavailableError(
            "storage_error",
            `Failed to fetch ${store.location}/${key}: ${errorMessage(error)}`,
            { cause: error }
        );
    }
}

async function fetchArtifact(store: ArtifactStore, key: string): Promise<Buffer> {
    const body = await fetchOptional(store, key);
    if (body === null) {
        throw new IndexUnavailableError("missing_object", `Artifact not found: ${store.location}/${key}`);
    }
    return body;
}

interface DecodedPair {
    index: VectorIndex;
    buildId: string;
    metadata: MetadataTable;
}

async function fetchPair(store: ArtifactStore, location: IndexLocation): Promise<DecodedPair> {
    const downloadStart = Date.now();
    const [indexBytes, metadataBytes] = await Promise.all([
        fetchArtifact(store, location.indexKey),
        fetchArtifact(store, location.metadataKey),
    ]);
    console.log(`  ⏱️  Download: ${Date.now() - downloadStart}ms (${indexBytes.length} + ${metadataBytes.length} bytes)`);

    const { index, buildId } = decodeIndexArtifact(indexBytes);
    const metadata = await decodeMetadataTable(metadataBytes, location.metadataKey);
    return { index, buildId, metadata };
}

/**
 * Serving keys on two different builds mean a publish is half way: the index
 * key already holds the new build, the metadata key still the old one. Both
 * builds are kept under their build keys, so the pair is completed from there,
 * preferring the newer build. Null when neither half can be found.
 */
async function completeFromBuildKeys(
    store: ArtifactStore,
    location: IndexLocation,
    pair: DecodedPair
): Promise<DecodedPair | null> {
    const newerMetadata = await fetchOptional(store, versionedKey(location.metadataKey, pair.buildId));
    if (newerMetadata !== null) {
        return { ...pair, metadata: await decodeMetadataTable(newerMetadata, location.metadataKey) };
    }

    const olderIndex = await fetchOptional(store, versionedKey(location.indexKey, pair.metadata.buildId));
    if (olderIndex !== null) {
        const { index, buildId } = decodeIndexArtifact(olderIndex);
        return { index, buildId, metadata: pair.metadata };
    }
    return null;
}

/**
 * Fetches, decodes and validates the pair.
 */
export async function loadIndexPair(store: ArtifactStore, location: IndexLocation): Promise<LoadedIndex> {
    const startTime = Date.now();
    const source = `${store.location}/${location.indexKey}`;
    console.log(`📥 Loading vector index from ${source}`);

    let pair = await fetchPair(store, location);
    if (pair.buildId !== pair.metadata.buildId) {
        console.warn(`⚠️  Index build ${pair.buildId} and metadata build ${pair.metadata.buildId} differ, reading build keys`);
        pair = (await completeFromBuildKeys(store, location, pair)) ?? pair;
    }
    assertPairAligned(pair.index, pair.buildId, pair.metadata);

    const loadTimeMs = Date.now() - startTime;
    console.log(`✅ Loaded index build ${pair.buildId} with ${pair.index.vectorCount} vectors (dim ${pair.index.dimension}) in ${loadTimeMs}ms`);

    return {
        index: pair.index,
        metadata: pair.metadata,
        source,
        loadedAt: new Date().toISOString(),
        loadTimeMs,
    };
}

export type IndexLoader = () => Promise<LoadedIndex>;

export class IndexCache {
    private loaded: LoadedIndex | null = null;
    private inFlight: Promise<LoadedIndex> | null = null;
    private lastError: RagError | null = null;
    private loadCount = 0;

    constructor(private readonly loader: IndexLoader, private readonly sourceLabel: string = "") {}

    static forStore(store: ArtifactStore, location: IndexLocation): IndexCache {
        return new IndexCache(() => loadIndexPair(store, location), `${store.location}/${location.indexKey}`);
    }

    async getOrLoad(): Promise<LoadedIndex> {
        if (this.loaded) {
            console.log("⚡ Using cached index (warm start)");
            return this.loaded;
        }
        if (!this.inFlight) {
            this.inFlight = this.load();
        }
        return this.inFlight;
    }

    private async load(): Promise<LoadedIndex> {
        this.loadCount++;
        try {
            // Deferred, so a loader that throws synchronously still settles after inFlight is set.
            const result = await Promise.resolve().then(() => this.loader());
            this.loaded = result;
            this.lastError = null;
            return result;
        } catch (error) {
            const failure = error instanceof IndexUnavailableError
                ? error
                : new IndexUnavailableError("storage_error", `Index load failed: ${errorMessage(error)}`, { cause: error });
            this.lastError = failure;
            console.error(`❌ Index load failed (${failure.reason}): ${failure.message}`);
            throw failure;
        } finally {
            this.inFlight = null;
        }
    }

    /** Number of loads started, for diagnostics and tests. */
    get loads(): number {
        return this.loadCount;
    }

    status(): IndexCacheStatus {
        const state: IndexCacheState = this.loaded
            ? "ready"
            : this.inFlight
                ? "loading"
                : this.lastError
                    ? "failed"
                    : "empty";

        return {
            state,
            source: this.loaded?.source ?? this.sourceLabel,
            vectorCount: this.loaded?.index.vectorCount ?? 0,
            dimension: this.loaded?.index.dimension ?? 0,
            buildId: this.loaded?.metadata.buildId ?? null,
            loadedAt: this.loaded?.loadedAt ?? null,
            lastError: this.lastError?.message ?? null,
        };
    }
}
