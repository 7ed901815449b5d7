/**
 * Timeout helpers for remote calls and the per-request budget.
 */
import { TimeoutError } from "./errors.js";

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes first, even if the
 * underlying client ignores the signal.
 */
export async function withTimeout<T>(
    label: string,
    timeoutMs: number,
    task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    if (timeoutMs <= 0) {
        throw new TimeoutError(label, 0);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            // Reject first so the race settles with TimeoutError, not the task's abort error.
            reject(new TimeoutError(label, timeoutMs));
            controller.abort();
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Wall-clock budget shared by all stages of one request.
 */
export class Deadline {
    private readonly startedAt: number;

    constructor(private readonly budgetMs: number, private readonly now: () => number = Date.now) {
        this.startedAt = now();
    }

    elapsed(): number {
        return this.now() - this.startedAt;
    }

    remaining(): number {
        return Math.max(0, this.budgetMs - this.elapsed());
    }

    /** Per-call timeout clipped to what is left of the budget. */
    clip(callTimeoutMs: number): number {
        return Math.min(callTimeoutMs, this.remaining());
    }

    expired(): boolean {
        return this.remaining() === 0;
    }
}
