/**
 * Runtime Module - Public API
 *
 * Exports centralized async policy utilities for retry and cancellation.
 */

// Cancellation
export {
    CancellationError,
    CancellationTokenSource,
    isCancellationError,
    raceCancellation,
} from './cancellation';
export type { IsCancelledFn, CancellationToken } from './cancellation';

// Retry
export {
    RetryExhaustedError,
    defaultRetryOn,
    withRetry,
    isRetryExhaustedError,
    sleep,
} from './retry';
export type {
    OnRetryFn,
    RetryOnFn,
    DelayForFn,
    RetryOptions,
} from './retry';
