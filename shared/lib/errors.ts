/**
 * Error taxonomy
 *
 * Every failure that crosses a pipeline stage is one of these classes.
 * `kind` is what the HTTP layer and the logs see, `retryable` is what the
 * retry helper looks at.
 */

export type ErrorKind =
    | "InvalidRequest"
    | "IndexUnavailable"
    | "EmbeddingUnavailable"
    | "SynthesisUnavailable"
    | "DimensionMismatch"
    | "TransientUpstream"
    | "UpstreamRequest"
    | "Config";

export abstract class RagError extends Error {
    abstract readonly kind: ErrorKind;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class InvalidRequestError extends RagError {
    readonly kind = "InvalidRequest";
    readonly retryable = false;
}

export type IndexUnavailableReason =
    | "missing_object"
    | "corrupt_artifact"
    | "length_mismatch"
    | "build_mismatch"
    | "storage_error"
    | "timeout";

export class IndexUnavailableError extends RagError {
    readonly kind = "IndexUnavailable";
    readonly retryable = false;

    constructor(
        readonly reason: IndexUnavailableReason,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class EmbeddingUnavailableError extends RagError {
    readonly kind = "EmbeddingUnavailable";
    readonly retryable = false;
}

export class SynthesisUnavailableError extends RagError {
    readonly kind = "SynthesisUnavailable";
    readonly retryable = false;
}

export class DimensionMismatchError extends RagError {
    readonly kind = "DimensionMismatch";
    readonly retryable = false;

    constructor(readonly expected: number, readonly actual: number, context: string) {
        super(`${context}: expected dimension ${expected}, got ${actual}`);
    }
}

export type TransientCode = "rate_limited" | "timeout" | "server_error" | "network";

/** Rate limits, timeouts and 5xx responses from a remote model. */
export class TransientUpstreamError extends RagError {
    readonly kind = "TransientUpstream";
    readonly retryable = true;

    constructor(readonly code: TransientCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class TimeoutError extends TransientUpstreamError {
    constructor(label: string, readonly timeoutMs: number) {
        super("timeout", `${label} timed out after ${timeoutMs}ms`);
    }
}

/** 4xx responses and malformed replies. Retrying will not help. */
export class UpstreamRequestError extends RagError {
    readonly kind = "UpstreamRequest";
    readonly retryable = false;

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class ConfigError extends RagError {
    readonly kind = "Config";
    readonly retryable = false;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

function readStatus(error: object): number | undefined {
    if ("status" in error && typeof error.status === "number") {
        return error.status;
    }
    return undefined;
}

const NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "ENOTFOUND", "EPIPE"]);

/**
 * Maps an error thrown by an SDK call (OpenAI, Anthropic, Gemini, fetch) to
 * either a retryable or a non-retryable upstream error.
 */
export function classifyUpstreamError(error: unknown, service: string): RagError {
    if (error instanceof RagError) return error;

    const message = `${service}: ${errorMessage(error)}`;

    if (typeof error === "object" && error !== null) {
        const status = readStatus(error);
        if (status === 429) {
            return new TransientUpstreamError("rate_limited", message, { cause: error });
        }
        if (status === 408) {
            return new TransientUpstreamError("timeout", message, { cause: error });
        }
        if (status !== undefined && status >= 500) {
            return new TransientUpstreamError("server_error", message, { cause: error });
        }
        if (status !== undefined && status >= 400) {
            return new UpstreamRequestError(message, status, { cause: error });
        }

        if (error instanceof Error && (error.name === "AbortError" || error.name === "APIConnectionTimeoutError")) {
            return new TransientUpstreamError("timeout", message, { cause: error });
        }
        if (error instanceof Error && error.name === "APIConnectionError") {
            return new TransientUpstreamError("network", message, { cause: error });
        }
        if ("code" in error && typeof error.code === "string" && NETWORK_CODES.has(error.code)) {
            return new TransientUpstreamError("network", message, { cause: error });
        }
    }

    // Gemini's SDK reports HTTP failures only in the message text.
    if (/\[429[^\]]*\]/.test(message) || /too many requests|throttl/i.test(message)) {
        return new TransientUpstreamError("rate_limited", message, { cause: error });
    }
    if (/\[5\d\d[^\]]*\]/.test(message)) {
        return new TransientUpstreamError("server_error", message, { cause: error });
    }

    return new UpstreamRequestError(message, undefined, { cause: error });
}
