/**
 * Environment configuration
 *
 * Everything the server, the serverless handlers and the build CLI read from
 * the environment goes through this module. `.env` is loaded by the entry
 * points (dotenv), never here.
 */
import { ConfigError } from "../lib/errors.js";
import type { RetryConfig } from "../lib/retry.js";

type Env = Record<string, string | undefined>;

/**
 * Required variable. Throws when the calling service cannot work without it.
 */
export function requireEnv(key: string, serviceName: string, source: Env = process.env): string {
    const value = source[key];
    if (!value) {
        throw new ConfigError(
            `[${serviceName}] Missing required environment variable: ${key}. ` +
            `Set ${key} in the environment or in .env.`
        );
    }
    return value;
}

/**
 * Optional variable with a default.
 */
export function getEnv(key: string, defaultValue: string = "", source: Env = process.env): string {
    return source[key] || defaultValue;
}

function getNumberEnv(
    key: string,
    defaultValue: number,
    source: Env,
    { min, integer = true }: { min?: number; integer?: boolean } = {}
): number {
    const raw = source[key];
    if (raw === undefined || raw.trim() === "") {
        return defaultValue;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
        throw new ConfigError(`${key} must be ${integer ? "an integer" : "a number"}, got "${raw}"`);
    }
    if (min !== undefined && value < min) {
        throw new ConfigError(`${key} must be >= ${min}, got ${value}`);
    }
    return value;
}

export type StorageDriver = "s3" | "local";
export type LlmProviderName = "anthropic" | "gemini";

const DEFAULT_LLM_MODELS: Record<LlmProviderName, string> = {
    anthropic: "claude-sonnet-4-20250514",
    gemini: "gemini-1.5-flash",
};

export interface StorageConfig {
    driver: StorageDriver;
    bucket: string;
    region: string;
    indexKey: string;
    metadataKey: string;
    localDir: string;
}

export interface EmbeddingConfig {
    apiKey: string;
    modelId: string;
    dimension: number;
    batchSize: number;
    timeoutMs: number;
    retry: RetryConfig;
}

export interface LlmConfig {
    provider: LlmProviderName;
    apiKey: string;
    modelId: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
}

export interface QueryConfig {
    defaultK: number;
    maxK: number;
    contextLimit: number;
    requestTimeoutMs: number;
}

export interface ServiceConfig {
    corpusId: string;
    storage: StorageConfig;
    embedding: EmbeddingConfig;
    llm: LlmConfig;
    query: QueryConfig;
    server: {
        port: number;
        allowedOrigin: string;
    };
}

function parseStorageDriver(raw: string): StorageDriver {
    if (raw === "s3" || raw === "local") return raw;
    throw new ConfigError(`STORAGE_DRIVER must be "s3" or "local", got "${raw}"`);
}

function parseLlmProvider(raw: string): LlmProviderName {
    if (raw === "anthropic" || raw === "gemini") return raw;
    throw new ConfigError(`LLM_PROVIDER must be "anthropic" or "gemini", got "${raw}"`);
}

export function loadStorageConfig(source: Env = process.env, corpusId: string = getEnv("CORPUS_ID", "aws-samples", source)): StorageConfig {
    const driver = parseStorageDriver(getEnv("STORAGE_DRIVER", "s3", source));
    return {
        driver,
        bucket: driver === "s3" ? requireEnv("INDEX_BUCKET", "storage", source) : getEnv("INDEX_BUCKET", "", source),
        region: getEnv("AWS_REGION", "us-west-2", source),
        indexKey: getEnv("INDEX_KEY", `${corpusId}/vector_index.bin`, source),
        metadataKey: getEnv("METADATA_KEY", `${corpusId}/metadata.json`, source),
        localDir: getEnv("LOCAL_INDEX_DIR", "output", source),
    };
}

export function loadEmbeddingConfig(source: Env = process.env): EmbeddingConfig {
    return {
        apiKey: getEnv("OPENAI_API_KEY", "", source),
        modelId: getEnv("EMBEDDING_MODEL_ID", "text-embedding-3-small", source),
        dimension: getNumberEnv("EMBEDDING_DIMENSION", 1024, source, { min: 1 }),
        batchSize: getNumberEnv("EMBEDDING_BATCH_SIZE", 16, source, { min: 1 }),
        timeoutMs: getNumberEnv("EMBEDDING_TIMEOUT_MS", 10_000, source, { min: 1 }),
        retry: {
            maxAttempts: getNumberEnv("EMBEDDING_MAX_ATTEMPTS", 4, source, { min: 1 }),
            initialDelayMs: getNumberEnv("EMBEDDING_RETRY_DELAY_MS", 500, source, { min: 0 }),
            maxDelayMs: getNumberEnv("EMBEDDING_RETRY_MAX_DELAY_MS", 8000, source, { min: 0 }),
            backoffMultiplier: 2,
        },
    };
}

export function loadLlmConfig(source: Env = process.env): LlmConfig {
    const provider = parseLlmProvider(getEnv("LLM_PROVIDER", "anthropic", source));
    return {
        provider,
        apiKey: getEnv(provider === "anthropic" ? "CLAUDE_API_KEY" : "GEMINI_API_KEY", "", source),
        modelId: getEnv("LLM_MODEL_ID", DEFAULT_LLM_MODELS[provider], source),
        maxTokens: getNumberEnv("LLM_MAX_TOKENS", 500, source, { min: 1 }),
        temperature: getNumberEnv("LLM_TEMPERATURE", 0.7, source, { min: 0, integer: false }),
        timeoutMs: getNumberEnv("LLM_TIMEOUT_MS", 20_000, source, { min: 1 }),
    };
}

/**
 * Full configuration for the query service.
 */
export function loadServiceConfig(source: Env = process.env): ServiceConfig {
    const corpusId = getEnv("CORPUS_ID", "aws-samples", source);
    const defaultK = getNumberEnv("DEFAULT_K", 5, source, { min: 1 });
    const maxK = getNumberEnv("MAX_K", 20, source, { min: 1 });
    if (defaultK > maxK) {
        throw new ConfigError(`DEFAULT_K (${defaultK}) must not exceed MAX_K (${maxK})`);
    }

    return {
        corpusId,
        storage: loadStorageConfig(source, corpusId),
        embedding: loadEmbeddingConfig(source),
        llm: loadLlmConfig(source),
        query: {
            defaultK,
            maxK,
            contextLimit: getNumberEnv("CONTEXT_LIMIT", 5, source, { min: 1 }),
            requestTimeoutMs: getNumberEnv("REQUEST_TIMEOUT_MS", 28_000, source, { min: 1 }),
        },
        server: {
            port: getNumberEnv("API_PORT", 3001, source, { min: 0 }),
            allowedOrigin: getEnv("ALLOWED_ORIGIN", "", source),
        },
    };
}
