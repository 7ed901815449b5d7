/**
 * Index builder
 *
 * records → embedding texts → vectors (batched, checkpointed) → VectorIndex
 * plus the position-aligned metadata table. Vector i always belongs to
 * records[i].
 */
import { createHash } from "crypto";
import { err, ok, type Result } from "neverthrow";
import { v4 as uuidv4 } from "uuid";
import { InvalidRequestError, type RagError } from "../../../shared/lib/errors.js";
import type { RepoRecord } from "../../../shared/models/RepoRecord.js";
import {
    METADATA_FORMAT_VERSION,
    assertPairAligned,
    type IndexArtifacts,
} from "../../service/vector-store/indexArtifacts.js";
import { VectorIndex } from "../../service/vector-store/vectorIndex.js";
import { generateEmbeddingTexts } from "../nlp/embedding/embeddingTextGenerator.js";
import type { EmbeddingClient } from "../nlp/embedding/openaiEmbedding.js";
import type { BuildCheckpoint, CheckpointStore } from "../storage/checkpointStore.js";

export interface IndexBuilderOptions {
    organization: string;
    /** Defaults to the embedding client's batch size */
    batchSize?: number;
    checkpoint?: CheckpointStore;
    createBuildId?: () => string;
    now?: () => Date;
}

/**
 * Identifies one exact build input: model, dimension and every text in order.
 */
export function buildFingerprint(model: string, dimension: number, texts: readonly string[]): string {
    const hash = createHash("sha256");
    hash.update(`${model}\n${dimension}\n${texts.length}\n`);
    for (const text of texts) {
        hash.update(text);
        hash.update("\n");
    }
    return hash.digest("hex");
}

export class IndexBuilder {
    constructor(private readonly embedder: EmbeddingClient, private readonly options: IndexBuilderOptions) {}

    async build(records: readonly RepoRecord[]): Promise<Result<IndexArtifacts, RagError>> {
        if (records.length === 0) {
            return err(new InvalidRequestError("Cannot build an index from zero records"));
        }

        const startTime = Date.now();
        const texts = generateEmbeddingTexts(records);
        const fingerprint = buildFingerprint(this.embedder.model, this.embedder.dimension, texts);
        const batchSize = this.options.batchSize ?? this.embedder.batchSize;

        const embeddings = await this.resumeFrom(fingerprint, texts.length);
        if (embeddings.length > 0) {
            console.log(`🔁 Resuming from checkpoint: ${embeddings.length}/${texts.length} records already embedded`);
        }

        console.log(`🔢 Embedding ${texts.length - embeddings.length} records with ${this.embedder.model}...`);
        for (let start = embeddings.length; start < texts.length; start += batchSize) {
            const batch = texts.slice(start, start + batchSize);
            const result = await this.embedder.embed(batch, batchSize);
            if (result.isErr()) {
                console.error(`❌ Build stopped at record ${start}: ${result.error.message}`);
                return err(result.error);
            }
            embeddings.push(...result.value);
            await this.saveCheckpoint({ fingerprint, processed: embeddings.length, embeddings });
            console.log(`   → ${embeddings.length}/${texts.length} embedded`);
        }

        const buildId = this.options.createBuildId?.() ?? uuidv4();
        const index = VectorIndex.fromVectors(embeddings, this.embedder.dimension);
        const metadata = {
            formatVersion: METADATA_FORMAT_VERSION,
            buildId,
            organization: this.options.organization,
            createdAt: (this.options.now?.() ?? new Date()).toISOString(),
            embedding: { model: this.embedder.model, dimension: this.embedder.dimension },
            count: records.length,
            records: [...records],
        };
        assertPairAligned(index, buildId, metadata);

        await this.options.checkpoint?.clear();
        console.log(`✅ Built index ${buildId}: ${index.vectorCount} vectors in ${Date.now() - startTime}ms`);

        return ok({ buildId, index, metadata });
    }

    private async resumeFrom(fingerprint: string, total: number): Promise<number[][]> {
        const store = this.options.checkpoint;
        if (!store) return [];

        const checkpoint = await store.load();
        if (!checkpoint) return [];

        const usable = checkpoint.fingerprint === fingerprint
            && checkpoint.processed === checkpoint.embeddings.length
            && checkpoint.processed <= total;
        if (!usable) {
            console.warn("⚠️  Checkpoint belongs to different inputs, starting over");
            await store.clear();
            return [];
        }
        return [...checkpoint.embeddings];
    }

    private async saveCheckpoint(checkpoint: BuildCheckpoint): Promise<void> {
        await this.options.checkpoint?.save(checkpoint);
    }
}
