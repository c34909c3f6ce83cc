/**
 * Cancellation Utilities
 *
 * Provides a standard way to signal, check for and react to cancellation
 * across async operations. A token can be polled (`isCancelled`) at
 * strategic points and can also wake up waiters (`onCancelled`), so a
 * join over in-flight work returns as soon as cancellation is requested.
 */

import { ProfileGraphError, ErrorCode } from '../errors';
import type { ErrorMetadata } from '../errors';

/**
 * Error thrown when an operation is cancelled.
 * Extends ProfileGraphError with CANCELLED code.
 */
export class CancellationError extends ProfileGraphError {
    constructor(message = 'Operation cancelled', meta?: ErrorMetadata) {
        super(message, {
            code: ErrorCode.CANCELLED,
            meta,
        });
        this.name = 'CancellationError';
    }
}

/**
 * Function type for cancellation check.
 * Returns true if the operation should be cancelled.
 */
export type IsCancelledFn = () => boolean;

/**
 * Read side of a cancellation source, handed to the operations that must stop.
 */
export interface CancellationToken {
    /** Whether cancellation has been requested */
    readonly isCancelled: IsCancelledFn;
    /**
     * Register a listener invoked once when cancellation is requested.
     * Invoked synchronously if the token is already cancelled.
     * Returns a function that unregisters the listener.
     */
    onCancelled(listener: () => void): () => void;
    /** Throws CancellationError if cancellation has been requested */
    throwIfCancelled(meta?: ErrorMetadata): void;
}

/**
 * Check if an error is a cancellation error
 */
export function isCancellationError(error: unknown): error is CancellationError {
    if (error instanceof CancellationError) {
        return true;
    }
    if (error instanceof ProfileGraphError && error.code === ErrorCode.CANCELLED) {
        return true;
    }
    return false;
}

/**
 * Owner side of a cancellation signal.
 *
 * @example
 * ```typescript
 * const source = new CancellationTokenSource();
 * process.once('SIGINT', () => source.cancel());
 * const report = await discovery.discover(usernames, 3, { cancellation: source.token });
 * ```
 */
export class CancellationTokenSource {
    private cancelled = false;
    private listeners = new Set<() => void>();

    readonly token: CancellationToken = {
        isCancelled: () => this.cancelled,
        onCancelled: (listener) => this.subscribe(listener),
        throwIfCancelled: (meta) => {
            if (this.cancelled) {
                throw new CancellationError('Operation cancelled', meta);
            }
        },
    };

    get isCancelled(): boolean {
        return this.cancelled;
    }

    /**
     * Request cancellation. Listeners run once; later calls are no-ops.
     */
    cancel(): void {
        if (this.cancelled) {
            return;
        }
        this.cancelled = true;
        const listeners = [...this.listeners];
        this.listeners.clear();
        for (const listener of listeners) {
            listener();
        }
    }

    private subscribe(listener: () => void): () => void {
        if (this.cancelled) {
            listener();
            return () => {};
        }
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }
}

/**
 * Settle with the promise, or reject with CancellationError as soon as the
 * token is cancelled. The promise itself keeps running; its outcome is ignored.
 */
export function raceCancellation<T>(promise: Promise<T>, token?: CancellationToken): Promise<T> {
    if (!token) {
        return promise;
    }

    return new Promise<T>((resolve, reject) => {
        let settled = false;
        const unsubscribe = token.onCancelled(() => {
            if (!settled) {
                settled = true;
                reject(new CancellationError());
            }
        });

        promise.then(
            (value) => {
                if (!settled) {
                    settled = true;
                    unsubscribe();
                    resolve(value);
                }
            },
            (error: unknown) => {
                if (!settled) {
                    settled = true;
                    unsubscribe();
                    reject(error);
                }
            }
        );
    });
}
