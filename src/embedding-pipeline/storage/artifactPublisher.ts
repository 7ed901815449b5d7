/**
 * Writes a built index pair to disk or to the artifact store.
 */
import path from "path";
import { LocalArtifactStore, type ArtifactStore } from "../../../shared/lib/artifactStore.js";
import {
    encodeIndexArtifact,
    encodeMetadataTable,
    versionedKey,
    type IndexArtifacts,
} from "../../service/vector-store/indexArtifacts.js";
import type { IndexLocation } from "../../service/vector-store/indexCache.js";

export const LOCAL_INDEX_FILE = "vector_index.bin";
export const LOCAL_METADATA_FILE = "metadata.json";

const INDEX_CONTENT_TYPE = "application/octet-stream";
const METADATA_CONTENT_TYPE = "application/json";

export interface LocalArtifactPaths {
    indexPath: string;
    metadataPath: string;
}

export async function writeArtifactsLocally(dir: string, artifacts: IndexArtifacts): Promise<LocalArtifactPaths> {
    const store = new LocalArtifactStore(dir);
    const indexBytes = encodeIndexArtifact(artifacts.index, artifacts.buildId);
    const metadataBytes = await encodeMetadataTable(artifacts.metadata, LOCAL_METADATA_FILE);

    await store.put(LOCAL_INDEX_FILE, indexBytes, INDEX_CONTENT_TYPE);
    await store.put(LOCAL_METADATA_FILE, metadataBytes, METADATA_CONTENT_TYPE);

    const paths = {
        indexPath: path.join(store.location, LOCAL_INDEX_FILE),
        metadataPath: path.join(store.location, LOCAL_METADATA_FILE),
    };
    console.log(`💾 Wrote ${artifacts.index.vectorCount} vectors to ${paths.indexPath}`);
    console.log(`💾 Wrote metadata to ${paths.metadataPath}`);
    return paths;
}

export interface PublishedKeys {
    indexKey: string;
    metadataKey: string;
    versionedIndexKey: string;
    versionedMetadataKey: string;
}

/**
 * Uploads the pair to its immutable build keys, then replaces the serving
 * keys index first, metadata last. A reader that lands between the two
 * serving writes finds the matching half under the build keys.
 */
export async function publishArtifacts(
    store: ArtifactStore,
    artifacts: IndexArtifacts,
    location: IndexLocation
): Promise<PublishedKeys> {
    const indexBytes = encodeIndexArtifact(artifacts.index, artifacts.buildId);
    const metadataBytes = await encodeMetadataTable(artifacts.metadata, location.metadataKey);

    const keys: PublishedKeys = {
        indexKey: location.indexKey,
        metadataKey: location.metadataKey,
        versionedIndexKey: versionedKey(location.indexKey, artifacts.buildId),
        versionedMetadataKey: versionedKey(location.metadataKey, artifacts.buildId),
    };

    console.log(`☁️  Uploading build ${artifacts.buildId} to ${store.location}`);
    await store.put(keys.versionedIndexKey, indexBytes, INDEX_CONTENT_TYPE);
    await store.put(keys.versionedMetadataKey, metadataBytes, METADATA_CONTENT_TYPE);

    await store.put(keys.indexKey, indexBytes, INDEX_CONTENT_TYPE);
    await store.put(keys.metadataKey, metadataBytes, METADATA_CONTENT_TYPE);
    console.log(`✅ Published ${store.location}/${keys.indexKey} and ${store.location}/${keys.metadataKey}`);

    return keys;
}
