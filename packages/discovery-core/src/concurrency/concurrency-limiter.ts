/**
 * ConcurrencyLimiter
 *
 * Bounds how many frontier nodes of a level are expanded against the remote
 * API at once. Tasks wait in FIFO order for a free slot; a cancelled token
 * drops every waiting task at once, so nothing new starts after cancellation.
 */

import { CancellationError } from '../runtime/cancellation';
import type { CancellationToken } from '../runtime/cancellation';
import { DEFAULT_MAX_CONCURRENCY } from '../config/defaults';

interface Waiter {
    start: () => void;
    drop: () => void;
}

export class ConcurrencyLimiter {
    private active = 0;
    private readonly waiters: Waiter[] = [];

    constructor(private readonly maxConcurrency: number = DEFAULT_MAX_CONCURRENCY) {
        if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
            throw new Error('maxConcurrency must be at least 1');
        }
    }

    /**
     * Run one task once a slot is free.
     * @throws CancellationError when the token is cancelled before the task starts
     */
    async run<T>(task: () => Promise<T>, cancellation?: CancellationToken): Promise<T> {
        await this.acquire(cancellation);
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    /**
     * Run every task under the limit; results keep the input order.
     */
    all<T>(tasks: Array<() => Promise<T>>, cancellation?: CancellationToken): Promise<T[]> {
        return Promise.all(tasks.map(task => this.run(task, cancellation)));
    }

    private acquire(cancellation?: CancellationToken): Promise<void> {
        if (cancellation?.isCancelled()) {
            return Promise.reject(new CancellationError());
        }
        if (this.active < this.maxConcurrency) {
            this.active++;
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            let unsubscribe: () => void = () => {};
            const waiter: Waiter = {
                start: () => {
                    unsubscribe();
                    this.active++;
                    resolve();
                },
                drop: () => {
                    const index = this.waiters.indexOf(waiter);
                    if (index >= 0) {
                        this.waiters.splice(index, 1);
                    }
                    reject(new CancellationError());
                },
            };
            this.waiters.push(waiter);
            if (cancellation) {
                unsubscribe = cancellation.onCancelled(() => waiter.drop());
            }
        });
    }

    private release(): void {
        this.active--;
        this.waiters.shift()?.start();
    }
}
