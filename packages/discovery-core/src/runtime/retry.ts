/**
 * Retry Utilities
 *
 * Provides a standard way to retry async operations with a per-failure delay.
 * Produces structured ProfileGraphError with RETRY_EXHAUSTED code.
 */

import { ProfileGraphError, ErrorCode } from '../errors';
import type { ErrorMetadata } from '../errors';
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_MS } from '../config/defaults';
import { CancellationError, isCancellationError } from './cancellation';
import type { CancellationToken } from './cancellation';

/**
 * Error thrown when all retry attempts have been exhausted.
 */
export class RetryExhaustedError extends ProfileGraphError {
    constructor(
        message: string,
        cause?: unknown,
        meta?: ErrorMetadata
    ) {
        super(message, {
            code: ErrorCode.RETRY_EXHAUSTED,
            cause,
            meta,
        });
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Function called after a failed attempt that will be retried, before waiting
 */
export type OnRetryFn = (error: unknown, attempt: number, delayMs: number) => void;

/**
 * Function to determine if an error should trigger a retry
 */
export type RetryOnFn = (error: unknown, attempt: number) => boolean;

/**
 * Function overriding the delay for a given failure.
 * Returning undefined falls back to `delayMs`.
 */
export type DelayForFn = (error: unknown, attempt: number) => number | undefined;

/**
 * Options for withRetry
 */
export interface RetryOptions {
    /** Maximum number of attempts (including initial attempt). Default: 3 */
    attempts?: number;
    /** Delay between retries in milliseconds. Default: 2000 */
    delayMs?: number;
    /** Function to determine if error should trigger retry. Default: retry all except cancellation */
    retryOn?: RetryOnFn;
    /** Per-failure delay override */
    delayFor?: DelayForFn;
    /** Callback before waiting for the next attempt */
    onRetry?: OnRetryFn;
    /** Cancellation token; checked before every attempt and interrupts backoff waits */
    cancellation?: CancellationToken;
    /** Optional operation name for error messages */
    operationName?: string;
    /** Additional metadata for errors */
    meta?: ErrorMetadata;
}

/**
 * Default retry predicate - retry everything except cancellation errors
 */
export const defaultRetryOn: RetryOnFn = (error: unknown): boolean => {
    return !isCancellationError(error);
};

/**
 * Execute an async function with retries.
 *
 * @param fn The async function to execute; receives the 1-based attempt number
 * @param options Retry configuration
 * @returns Promise resolving to the function's result
 * @throws RetryExhaustedError if all attempts fail
 * @throws CancellationError if cancelled
 * @throws Original error if retryOn returns false
 *
 * @example
 * ```typescript
 * const result = await withRetry(
 *     () => api.getFullProfile('jane-doe'),
 *     {
 *         attempts: 3,
 *         delayMs: 2000,
 *         onRetry: (error, attempt, delay) => logger.warn('Gateway', `retrying in ${delay}ms`)
 *     }
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const {
        attempts = DEFAULT_MAX_RETRIES,
        delayMs = DEFAULT_RETRY_DELAY_MS,
        retryOn = defaultRetryOn,
        delayFor,
        onRetry,
        cancellation,
        operationName,
        meta,
    } = options ?? {};

    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
        cancellation?.throwIfCancelled({ ...meta, attempt, maxAttempts: attempts });

        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;

            if (!retryOn(error, attempt)) {
                throw error;
            }

            if (attempt < attempts) {
                const delay = delayFor?.(error, attempt) ?? delayMs;
                onRetry?.(error, attempt, delay);
                await sleep(delay, cancellation);
            }
        }
    }

    const name = operationName ?? 'Operation';
    throw new RetryExhaustedError(
        `${name} failed after ${attempts} attempts`,
        lastError,
        {
            ...meta,
            attempt: attempts,
            maxAttempts: attempts,
        }
    );
}

/**
 * Check if an error is a retry exhausted error
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
    if (error instanceof RetryExhaustedError) {
        return true;
    }
    if (error instanceof ProfileGraphError && error.code === ErrorCode.RETRY_EXHAUSTED) {
        return true;
    }
    return false;
}

/**
 * Sleep for a specified duration.
 * Rejects with CancellationError as soon as the token is cancelled.
 */
export function sleep(ms: number, cancellation?: CancellationToken): Promise<void> {
    if (cancellation?.isCancelled()) {
        return Promise.reject(new CancellationError());
    }

    return new Promise((resolve, reject) => {
        let unsubscribe: () => void = () => {};
        const timer = setTimeout(() => {
            unsubscribe();
            resolve();
        }, ms);

        if (cancellation) {
            unsubscribe = cancellation.onCancelled(() => {
                clearTimeout(timer);
                reject(new CancellationError());
            });
        }
    });
}
