/**
 * Backoff schedule and retry helpers shared by the coordinator and the storage adapters
 */

import { CycleCancelledError, getErrorMessage, StorageUnavailableError } from '../errors';
import { RetryPolicy } from '../types';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    jitterMs: 1000
};

/**
 * Storage calls get a short, fast schedule; cycle-level retries cover longer outages
 */
export const STORAGE_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 200,
    maxDelayMs: 2000,
    jitterMs: 100
};

/**
 * Calculate exponential backoff with jitter
 * @param attempt Attempt that just failed (1-indexed)
 * @param random Source of randomness in [0, 1)
 * @returns Wait time in milliseconds, never above maxDelayMs
 */
export function calculateBackoff(
    attempt: number,
    policy: RetryPolicy,
    random: () => number = Math.random
): number {
    const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const jitter = random() * policy.jitterMs;
    return Math.min(exponential + jitter, policy.maxDelayMs);
}

/**
 * Sleep for specified milliseconds, waking early with CycleCancelledError if the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new CycleCancelledError());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CycleCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface StorageRetryOptions {
    policy?: RetryPolicy;
    isTransient: (error: unknown) => boolean;
    sleeper?: Sleeper;
}

/**
 * Run a storage operation, retrying transport failures with backoff.
 * Transient failures that outlast the schedule surface as StorageUnavailableError;
 * anything else is rethrown untouched.
 */
export async function withStorageRetry<T>(
    label: string,
    operation: () => Promise<T>,
    options: StorageRetryOptions
): Promise<T> {
    const policy = options.policy ?? STORAGE_RETRY_POLICY;
    const sleeper = options.sleeper ?? sleep;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (!options.isTransient(error)) {
                throw error;
            }

            if (attempt >= policy.maxAttempts) {
                console.error(`${label} failed after ${attempt} attempts:`, getErrorMessage(error));
                throw new StorageUnavailableError(`${label} unavailable: ${getErrorMessage(error)}`, { cause: error });
            }

            const waitTime = calculateBackoff(attempt, policy);
            console.warn(`${label} failed on attempt ${attempt}. Retrying in ${Math.round(waitTime)}ms...`);
            await sleeper(waitTime);
        }
    }
}
