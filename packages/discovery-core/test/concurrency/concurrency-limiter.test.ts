/**
 * Tests for ConcurrencyLimiter
 */

import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from '../../src/concurrency/concurrency-limiter';
import { CancellationError, CancellationTokenSource } from '../../src/runtime';
import { deferred } from '../helpers/fake-profile-api';

describe('ConcurrencyLimiter', () => {
    it('constructor throws for invalid maxConcurrency', () => {
        expect(() => new ConcurrencyLimiter(0)).toThrow(/maxConcurrency must be at least 1/);
        expect(() => new ConcurrencyLimiter(-1)).toThrow(/maxConcurrency must be at least 1/);
        expect(() => new ConcurrencyLimiter(1.5)).toThrow(/maxConcurrency must be at least 1/);
    });

    it('run() returns the result and propagates errors', async () => {
        const limiter = new ConcurrencyLimiter(2);
        await expect(limiter.run(async () => 42)).resolves.toBe(42);
        await expect(limiter.run(async () => { throw new Error('test error'); })).rejects.toThrow('test error');
    });

    it('all() returns results in input order', async () => {
        const limiter = new ConcurrencyLimiter(3);
        const tasks = [30, 5, 15, 1].map((ms, i) => async () => {
            await delay(ms);
            return i;
        });

        expect(await limiter.all(tasks)).toEqual([0, 1, 2, 3]);
    });

    it('all() never runs more tasks than the limit', async () => {
        const limiter = new ConcurrencyLimiter(2);
        let maxConcurrent = 0;
        let currentConcurrent = 0;

        const tasks = [1, 2, 3, 4, 5].map(value => async () => {
            currentConcurrent++;
            maxConcurrent = Math.max(maxConcurrent, currentConcurrent);
            await delay(10);
            currentConcurrent--;
            return value;
        });
        await limiter.all(tasks);

        expect(maxConcurrent).toBe(2);
    });

    it('starts queued tasks in FIFO order as slots free up', async () => {
        const limiter = new ConcurrencyLimiter(1);
        const order: string[] = [];

        const first = limiter.run(async () => {
            order.push('first-start');
            await delay(20);
            order.push('first-end');
        });
        const second = limiter.run(async () => {
            order.push('second');
        });
        const third = limiter.run(async () => {
            order.push('third');
        });

        await Promise.all([first, second, third]);
        expect(order).toEqual(['first-start', 'first-end', 'second', 'third']);
    });

    it('frees the slot when a task throws', async () => {
        const limiter = new ConcurrencyLimiter(1);
        await limiter.run(async () => { throw new Error('fail'); }).catch(() => undefined);

        await expect(limiter.run(async () => 'success')).resolves.toBe('success');
    });

    describe('Cancellation', () => {
        it('run() rejects for an already cancelled token', async () => {
            const limiter = new ConcurrencyLimiter(5);
            const source = new CancellationTokenSource();
            source.cancel();

            await expect(limiter.run(async () => 42, source.token)).rejects.toBeInstanceOf(CancellationError);
        });

        it('drops a queued task as soon as the token is cancelled', async () => {
            const limiter = new ConcurrencyLimiter(1);
            const source = new CancellationTokenSource();
            const gate = deferred();
            let queuedRan = false;

            const blocking = limiter.run(async () => {
                await gate.promise;
                return 'blocking';
            });
            const queued = limiter.run(async () => {
                queuedRan = true;
            }, source.token);

            source.cancel();
            await expect(queued).rejects.toBeInstanceOf(CancellationError);

            gate.resolve();
            await expect(blocking).resolves.toBe('blocking');
            await expect(limiter.run(async () => 'next')).resolves.toBe('next');
            expect(queuedRan).toBe(false);
        });

        it('all() starts no new task after cancellation', async () => {
            const limiter = new ConcurrencyLimiter(1);
            const source = new CancellationTokenSource();
            const executed: number[] = [];

            const tasks = [1, 2, 3].map(id => async () => {
                executed.push(id);
                source.cancel();
                await delay(5);
                return id;
            });

            await expect(limiter.all(tasks, source.token)).rejects.toBeInstanceOf(CancellationError);
            await delay(10);
            expect(executed).toEqual([1]);
        });
    });
});

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
