/**
 * Tests for cancellation utilities
 */

import { describe, it, expect, vi } from 'vitest';
import {
    CancellationError,
    CancellationTokenSource,
    isCancellationError,
    raceCancellation,
} from '../../src/runtime';
import { ErrorCode, ProfileGraphError } from '../../src/errors';
import { deferred } from '../helpers/fake-profile-api';

describe('CancellationError', () => {
    it('should create error with default message', () => {
        const error = new CancellationError();
        expect(error.message).toBe('Operation cancelled');
        expect(error.code).toBe(ErrorCode.CANCELLED);
        expect(error.name).toBe('CancellationError');
    });

    it('isCancellationError should accept any CANCELLED error', () => {
        expect(isCancellationError(new CancellationError())).toBe(true);
        expect(isCancellationError(new ProfileGraphError('x', { code: ErrorCode.CANCELLED }))).toBe(true);
        expect(isCancellationError(new Error('Operation cancelled'))).toBe(false);
    });
});

describe('CancellationTokenSource', () => {
    it('should start uncancelled', () => {
        const source = new CancellationTokenSource();
        expect(source.isCancelled).toBe(false);
        expect(source.token.isCancelled()).toBe(false);
        expect(() => source.token.throwIfCancelled()).not.toThrow();
    });

    it('should notify listeners once', () => {
        const source = new CancellationTokenSource();
        const listener = vi.fn();
        source.token.onCancelled(listener);

        source.cancel();
        source.cancel();

        expect(listener).toHaveBeenCalledTimes(1);
        expect(source.token.isCancelled()).toBe(true);
        expect(() => source.token.throwIfCancelled()).toThrow(CancellationError);
    });

    it('should throw with metadata from the token once cancelled', () => {
        const source = new CancellationTokenSource();
        source.cancel();

        try {
            source.token.throwIfCancelled({ identifier: 'jane-doe' });
            expect.fail('should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(CancellationError);
            expect(error instanceof CancellationError && error.meta).toEqual({ identifier: 'jane-doe' });
        }
    });

    it('should call late listeners immediately', () => {
        const source = new CancellationTokenSource();
        source.cancel();

        const listener = vi.fn();
        source.token.onCancelled(listener);
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should not call unsubscribed listeners', () => {
        const source = new CancellationTokenSource();
        const listener = vi.fn();
        const unsubscribe = source.token.onCancelled(listener);

        unsubscribe();
        source.cancel();

        expect(listener).not.toHaveBeenCalled();
    });
});

describe('raceCancellation', () => {
    it('should pass the promise through without a token', async () => {
        await expect(raceCancellation(Promise.resolve(7))).resolves.toBe(7);
    });

    it('should resolve with the promise when not cancelled', async () => {
        const source = new CancellationTokenSource();
        await expect(raceCancellation(Promise.resolve('done'), source.token)).resolves.toBe('done');
    });

    it('should reject as soon as the token is cancelled', async () => {
        const source = new CancellationTokenSource();
        const pending = deferred();
        const raced = raceCancellation(pending.promise, source.token);

        source.cancel();

        await expect(raced).rejects.toBeInstanceOf(CancellationError);
        pending.resolve();
    });

    it('should propagate rejections of the promise', async () => {
        const source = new CancellationTokenSource();
        await expect(
            raceCancellation(Promise.reject(new Error('boom')), source.token)
        ).rejects.toThrow('boom');
    });
});
