import { defaultLogger } from "./logger";
import { systemClock, type Clock } from "./rate-limit";
import type { Logger } from "./types";

export interface BackoffPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
}

/** 3 attempts, waiting 1s then 2s between them */
export const DEFAULT_BACKOFF: BackoffPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    multiplier: 2,
};

/** Delay to wait after the given (1-based) failed attempt */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
    return policy.baseDelayMs * policy.multiplier ** (attempt - 1);
}

export type RetryResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: unknown; attempts: number };

export interface RetryOptions {
    policy?: BackoffPolicy;
    clock?: Clock;
    /** Prefix for log lines, e.g. "[TopicExtractor] segment 3" */
    label?: string;
    logger?: Logger;
}

/**
 * Run `operation` until it resolves or the policy's attempts are used up.
 * Never throws: the last error is returned in the result.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<RetryResult<T>> {
    const policy = options.policy ?? DEFAULT_BACKOFF;
    const clock = options.clock ?? systemClock;
    const logger = options.logger ?? defaultLogger;
    const label = options.label ?? "[retry]";
    const maxAttempts = Math.max(1, policy.maxAttempts);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await operation(attempt);
            return { ok: true, value, attempts: attempt };
        } catch (error) {
            lastError = error;
            const message = error instanceof Error ? error.message : String(error);

            if (attempt < maxAttempts) {
                const delayMs = backoffDelay(policy, attempt);
                logger.warn(
                    `${label} attempt ${attempt}/${maxAttempts} failed (${message}), retrying in ${delayMs}ms.`
                );
                await clock.sleep(delayMs);
            } else {
                logger.warn(`${label} attempt ${attempt}/${maxAttempts} failed (${message}), giving up.`);
            }
        }
    }

    return { ok: false, error: lastError, attempts: maxAttempts };
}
