/**
 * Bounded retry with exponential backoff.
 *
 * Works on functions that return a neverthrow Result. Only errors marked
 * `retryable` are tried again; anything else is returned on the spot.
 */
import { err, type Result } from "neverthrow";
import type { RagError } from "./errors.js";
import type { Deadline } from "./timeout.js";

export interface RetryConfig {
    /** Total attempts, including the first one */
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxAttempts: 4,
    initialDelayMs: 500,
    maxDelayMs: 8000,
    backoffMultiplier: 2,
};

export interface RetryOptions {
    /** Used in log lines */
    label: string;
    sleep?: (ms: number) => Promise<void>;
    onRetry?: (attempt: number, delayMs: number, error: RagError) => void;
    /** No retry is scheduled once its backoff would outlast the budget. */
    deadline?: Deadline;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (0-based).
 */
export function backoffDelay(config: RetryConfig, attempt: number): number {
    return Math.min(
        config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt),
        config.maxDelayMs
    );
}

export interface RetryOutcome<T> {
    result: Result<T, RagError>;
    attempts: number;
}

export async function withRetry<T>(
    fn: (attempt: number) => Promise<Result<T, RagError>>,
    config: RetryConfig,
    options: RetryOptions
): Promise<RetryOutcome<T>> {
    const wait = options.sleep ?? sleep;
    const maxAttempts = Math.max(1, config.maxAttempts);

    let attempt = 0;
    for (;;) {
        const result = await fn(attempt);
        if (result.isOk()) {
            return { result, attempts: attempt + 1 };
        }

        const error = result.error;
        if (!error.retryable || attempt === maxAttempts - 1) {
            return { result: err(error), attempts: attempt + 1 };
        }

        const delay = backoffDelay(config, attempt);
        if (options.deadline && delay >= options.deadline.remaining()) {
            console.warn(`⚠️  ${options.label}: ${error.message}. No time left for another attempt`);
            return { result: err(error), attempts: attempt + 1 };
        }
        console.warn(`⚠️  ${options.label}: ${error.message}. Retrying in ${delay}ms (attempt ${attempt + 2}/${maxAttempts})`);
        options.onRetry?.(attempt + 1, delay, error);
        await wait(delay);
        attempt++;
    }
}
