/**
 * Embedding client
 *
 * Sends texts to the embedding model in batches of `batchSize`, retries
 * transient failures (429, 5xx, timeouts) with exponential backoff and checks
 * that every batch comes back complete, in order and with the index
 * dimension. The same client serves the index build and query embedding.
 */
import OpenAI from "openai";
import { err, ok, type Result } from "neverthrow";
import type { EmbeddingConfig } from "../../../../shared/config/env.js";
import {
    ConfigError,
    DimensionMismatchError,
    EmbeddingUnavailableError,
    RagError,
    UpstreamRequestError,
    classifyUpstreamError,
} from "../../../../shared/lib/errors.js";
import { withRetry, type RetryConfig } from "../../../../shared/lib/retry.js";
import { withTimeout, type Deadline } from "../../../../shared/lib/timeout.js";

/** Longest input accepted per text; longer texts are cut. */
export const MAX_EMBEDDING_INPUT_CHARS = 8000;

export interface EmbeddingProvider {
    readonly model: string;
    embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]>;
}

/**
 * OpenAI embeddings API. Retries are disabled in the SDK so the client's
 * own policy is the only one in effect.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    constructor(
        private readonly client: OpenAI,
        readonly model: string,
        private readonly dimension: number
    ) {}

    static fromConfig(config: EmbeddingConfig): OpenAIEmbeddingProvider {
        if (!config.apiKey) {
            throw new ConfigError("[embedding] Missing required environment variable: OPENAI_API_KEY");
        }
        return new OpenAIEmbeddingProvider(new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }), config.modelId, config.dimension);
    }

    async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
        const response = await this.client.embeddings.create(
            {
                model: this.model,
                input: texts,
                encoding_format: "float",
                // Only the text-embedding-3 family accepts a reduced dimension
                ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimension } : {}),
            },
            { signal }
        );

        return [...response.data]
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    }
}

export interface EmbeddingClientOptions {
    dimension: number;
    batchSize: number;
    timeoutMs: number;
    retry: RetryConfig;
    sleep?: (ms: number) => Promise<void>;
}

export interface EmbedOptions {
    /** Request budget; each call is clipped to what is left of it */
    deadline?: Deadline;
    onBatch?: (embedded: number, total: number) => void;
}

export class EmbeddingClient {
    constructor(private readonly provider: EmbeddingProvider, private readonly options: EmbeddingClientOptions) {}

    static fromConfig(config: EmbeddingConfig): EmbeddingClient {
        return new EmbeddingClient(OpenAIEmbeddingProvider.fromConfig(config), config);
    }

    get model(): string {
        return this.provider.model;
    }

    get dimension(): number {
        return this.options.dimension;
    }

    get batchSize(): number {
        return this.options.batchSize;
    }

    /**
     * One vector per text, same order, same length.
     */
    async embed(
        texts: readonly string[],
        batchSize: number = this.options.batchSize,
        embedOptions: EmbedOptions = {}
    ): Promise<Result<number[][], RagError>> {
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            return err(new UpstreamRequestError(`Invalid batch size ${batchSize}`));
        }

        const vectors: number[][] = [];
        for (let start = 0; start < texts.length; start += batchSize) {
            const batch = texts.slice(start, start + batchSize).map((text) => text.slice(0, MAX_EMBEDDING_INPUT_CHARS));
            const result = await this.embedBatchWithRetry(batch, start, embedOptions.deadline);
            if (result.isErr()) {
                return err(result.error);
            }
            vectors.push(...result.value);
            embedOptions.onBatch?.(vectors.length, texts.length);
        }

        return ok(vectors);
    }

    private async embedBatchWithRetry(
        batch: string[],
        offset: number,
        deadline: Deadline | undefined
    ): Promise<Result<number[][], RagError>> {
        const label = `Embedding batch ${offset}-${offset + batch.length - 1}`;

        const { result, attempts } = await withRetry(
            () => this.callOnce(batch, offset, label, deadline),
            this.options.retry,
            { label, sleep: this.options.sleep, deadline }
        );

        if (result.isOk()) {
            return result;
        }

        const error = result.error;
        if (error instanceof DimensionMismatchError || error instanceof EmbeddingUnavailableError) {
            return err(error);
        }
        console.error(`❌ ${label} failed after ${attempts} attempt(s): ${error.message}`);
        return err(new EmbeddingUnavailableError(
            `${label} failed after ${attempts} attempt(s): ${error.message}`,
            { cause: error }
        ));
    }

    private async callOnce(
        batch: string[],
        offset: number,
        label: string,
        deadline: Deadline | undefined
    ): Promise<Result<number[][], RagError>> {
        const timeoutMs = deadline ? deadline.clip(this.options.timeoutMs) : this.options.timeoutMs;
        if (timeoutMs <= 0) {
            return err(new EmbeddingUnavailableError(`${label}: request time budget exhausted`));
        }

        let vectors: number[][];
        try {
            vectors = await withTimeout(label, timeoutMs, (signal) => this.provider.embedBatch(batch, signal));
        } catch (error) {
            return err(classifyUpstreamError(error, "embedding"));
        }

        if (vectors.length !== batch.length) {
            return err(new UpstreamRequestError(`${label}: expected ${batch.length} vectors, got ${vectors.length}`));
        }
        for (const [i, vector] of vectors.entries()) {
            if (vector.length !== this.options.dimension) {
                return err(new DimensionMismatchError(this.options.dimension, vector.length, `Embedding for text ${offset + i}`));
            }
            if (!vector.every(Number.isFinite)) {
                return err(new UpstreamRequestError(`${label}: embedding for text ${offset + i} contains non-finite values`));
            }
        }

        return ok(vectors);
    }
}
