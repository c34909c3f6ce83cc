/**
 * Tests for ProfileGateway: retry classification, validation and batch fetch
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProfileGateway, isTerminalMessage, isRateLimitMessage } from '../../src/gateway';
import { ErrorCode } from '../../src/errors';
import { CancellationTokenSource } from '../../src/runtime';
import { nullLogger } from '../../src/logger';
import { FakeProfileApi, createRecordingLogger } from '../helpers/fake-profile-api';

function createGateway(api: FakeProfileApi, overrides: { maxRetries?: number } = {}) {
    const recorder = createRecordingLogger();
    const gateway = new ProfileGateway(api, {
        maxRetries: overrides.maxRetries ?? 3,
        retryDelayMs: 5,
        failureRetryDelayMs: 1,
        logger: recorder.logger,
    });
    return { gateway, lines: recorder.lines };
}

describe('failure markers', () => {
    it('isTerminalMessage matches not-found style messages case-insensitively', () => {
        expect(isTerminalMessage('Profile NOT FOUND')).toBe(true);
        expect(isTerminalMessage("This profile doesn't exist")).toBe(true);
        expect(isTerminalMessage('Profile cannot be displayed')).toBe(true);
        expect(isTerminalMessage('Internal server error')).toBe(false);
    });

    it('isRateLimitMessage matches 429 and too many requests', () => {
        expect(isRateLimitMessage('HTTP 429')).toBe(true);
        expect(isRateLimitMessage('Too Many Requests')).toBe(true);
        expect(isRateLimitMessage('HTTP 500')).toBe(false);
    });
});

describe('ProfileGateway.fetchFullProfile', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('returns the profile payload on success', async () => {
        const api = new FakeProfileApi().addProfile('jane', 'urn-jane', { firstName: 'Jane' });
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({
            success: true,
            data: { urn: 'urn-jane', username: 'jane', firstName: 'Jane' },
        });
        expect(api.fullProfileCalls).toEqual(['jane']);
        expect(lines).toEqual([]);
    });

    it('retries an empty response', async () => {
        const api = new FakeProfileApi().addProfile('jane', 'urn-jane').scriptFull('jane', null);
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result.success).toBe(true);
        expect(api.fullProfileCalls).toEqual(['jane', 'jane']);
        expect(lines).toEqual(['warn [Gateway] (jane) Empty response... retrying']);
    });

    it('treats an empty object as an empty response', async () => {
        const api = new FakeProfileApi().scriptFull('jane', {}, {}, {});
        const { gateway } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({ success: false, error: 'Empty response', code: ErrorCode.EMPTY_RESPONSE });
        expect(api.fullProfileCalls).toHaveLength(3);
    });

    it('fails immediately on a not-found message', async () => {
        const api = new FakeProfileApi();
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('ghost');

        expect(result).toEqual({ success: false, error: 'Profile not found', code: ErrorCode.NOT_FOUND });
        expect(api.fullProfileCalls).toEqual(['ghost']);
        expect(lines).toEqual([]);
    });

    it('retries other provider failures and returns the last message', async () => {
        const busy = { success: false, message: 'Server busy' };
        const api = new FakeProfileApi().scriptFull('jane', busy, busy, busy);
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({ success: false, error: 'Server busy', code: ErrorCode.REMOTE_FAILURE });
        expect(api.fullProfileCalls).toHaveLength(3);
        expect(lines).toEqual(['warn [Gateway] (jane) Server busy... retrying']);
    });

    it('uses "Unknown error" for a failure without message', async () => {
        const api = new FakeProfileApi().scriptFull('jane', { success: false }, { success: false }, { success: false });
        const { gateway } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({ success: false, error: 'Unknown error', code: ErrorCode.REMOTE_FAILURE });
    });

    it('succeeds after a rate limit on the first attempt', async () => {
        const api = new FakeProfileApi()
            .addProfile('jane', 'urn-jane')
            .scriptFull('jane', new Error('HTTP 429 Too Many Requests'));
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result.success).toBe(true);
        expect(api.fullProfileCalls).toHaveLength(2);
        expect(lines).toEqual(['warn [Gateway] (jane) Rate limit hit - waiting 0.005s']);
    });

    it('reports "Rate limit exceeded" when every attempt is rate limited', async () => {
        const limited = new Error('too many requests');
        const api = new FakeProfileApi().scriptFull('jane', limited, limited, limited);
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({ success: false, error: 'Rate limit exceeded', code: ErrorCode.RATE_LIMITED });
        expect(api.fullProfileCalls).toHaveLength(3);
        expect(lines).toHaveLength(1);
    });

    it('waits base * attempt between rate-limited attempts', async () => {
        vi.useFakeTimers();
        const limited = new Error('HTTP 429');
        const api = new FakeProfileApi().scriptFull('jane', limited, limited, limited);
        const gateway = new ProfileGateway(api, { maxRetries: 3, retryDelayMs: 1000 });

        const pending = gateway.fetchFullProfile('jane');

        await vi.advanceTimersByTimeAsync(999);
        expect(api.fullProfileCalls).toHaveLength(1);
        await vi.advanceTimersByTimeAsync(1);
        expect(api.fullProfileCalls).toHaveLength(2);
        await vi.advanceTimersByTimeAsync(1999);
        expect(api.fullProfileCalls).toHaveLength(2);
        await vi.advanceTimersByTimeAsync(1);
        expect(api.fullProfileCalls).toHaveLength(3);

        await expect(pending).resolves.toEqual({
            success: false,
            error: 'Rate limit exceeded',
            code: ErrorCode.RATE_LIMITED,
        });
    });

    it('retries transport errors and returns the last message', async () => {
        const hangUp = new Error('socket hang up');
        const api = new FakeProfileApi().scriptFull('jane', hangUp, hangUp, hangUp);
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({ success: false, error: 'socket hang up', code: ErrorCode.TRANSPORT_ERROR });
        expect(lines).toEqual(['warn [Gateway] (jane) Error: socket hang up... retrying']);
    });

    it('logs once per failure category', async () => {
        const api = new FakeProfileApi()
            .addProfile('jane', 'urn-jane')
            .scriptFull('jane', null, { success: false, message: 'Busy' });
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result.success).toBe(true);
        expect(lines).toEqual([
            'warn [Gateway] (jane) Empty response... retrying',
            'warn [Gateway] (jane) Busy... retrying',
        ]);
    });

    it('shortens long messages in log lines', async () => {
        const message = 'x'.repeat(70);
        const api = new FakeProfileApi()
            .addProfile('jane', 'urn-jane')
            .scriptFull('jane', { success: false, message });
        const { gateway, lines } = createGateway(api);

        await gateway.fetchFullProfile('jane');

        expect(lines).toEqual([`warn [Gateway] (jane) ${'x'.repeat(60)}... retrying`]);
    });

    it('fails without retry on a response with neither flag', async () => {
        const api = new FakeProfileApi().scriptFull('jane', { data: { urn: 'urn-jane' } });
        const { gateway } = createGateway(api);

        const result = await gateway.fetchFullProfile('jane');

        expect(result).toEqual({
            success: false,
            error: 'Invalid response format',
            code: ErrorCode.INVALID_RESPONSE,
        });
        expect(api.fullProfileCalls).toHaveLength(1);
    });

    it('requires data in a successful response', async () => {
        const api = new FakeProfileApi().scriptFull('jane', { success: true });
        const { gateway } = createGateway(api);

        expect(await gateway.fetchFullProfile('jane')).toEqual({
            success: false,
            error: 'No data in response',
            code: ErrorCode.INVALID_RESPONSE,
        });
    });

    it('requires urn and username in the payload', async () => {
        const api = new FakeProfileApi().scriptFull('jane', { success: true, data: { urn: 'urn-jane' } });
        const { gateway } = createGateway(api);

        expect(await gateway.fetchFullProfile('jane')).toEqual({
            success: false,
            error: 'Invalid profile data structure',
            code: ErrorCode.INVALID_PROFILE_DATA,
        });
        expect(api.fullProfileCalls).toHaveLength(1);
    });

    it('makes no call when maxRetries is 0', async () => {
        const api = new FakeProfileApi().addProfile('jane', 'urn-jane');
        const { gateway } = createGateway(api, { maxRetries: 0 });

        expect(await gateway.fetchFullProfile('jane')).toEqual({
            success: false,
            error: 'Max retries exceeded',
            code: ErrorCode.RETRY_EXHAUSTED,
        });
        expect(api.fullProfileCalls).toEqual([]);
    });
});

describe('ProfileGateway.fetchSimilarProfiles', () => {
    it('drops entries without urn or id', async () => {
        const api = new FakeProfileApi().scriptSimilar('urn-a', {
            success: true,
            data: [
                { urn: 'urn-b', id: 1, username: 'b' },
                { urn: 'urn-c' },
                { id: 2, username: 'd' },
                'garbage',
            ],
        });
        const { gateway } = createGateway(api);

        const result = await gateway.fetchSimilarProfiles('urn-a');

        expect(result).toEqual({
            success: true,
            data: [{ urn: 'urn-b', id: 1, username: 'b', publicIdentifier: undefined }],
        });
    });

    it('requires a list payload', async () => {
        const api = new FakeProfileApi().scriptSimilar('urn-a', { success: true, data: { urn: 'urn-b' } });
        const { gateway } = createGateway(api);

        expect(await gateway.fetchSimilarProfiles('urn-a')).toEqual({
            success: false,
            error: 'Invalid data format',
            code: ErrorCode.INVALID_RESPONSE,
        });
    });

    it('shortens the URN to 20 characters in log lines', async () => {
        const urn = 'urn:li:fsd_profile:ACoAAB1234567';
        const api = new FakeProfileApi().scriptSimilar(urn, null);
        const { gateway, lines } = createGateway(api);

        const result = await gateway.fetchSimilarProfiles(urn);

        expect(result).toEqual({ success: true, data: [] });
        expect(lines).toEqual(['warn [Gateway] (urn:li:fsd_profile:A) Empty response... retrying']);
    });
});

describe('ProfileGateway cancellation', () => {
    it('starts no call once cancelled', async () => {
        const source = new CancellationTokenSource();
        source.cancel();
        const api = new FakeProfileApi().addProfile('jane', 'urn-jane');
        const gateway = new ProfileGateway(api, { cancellation: source.token });

        expect(await gateway.fetchFullProfile('jane')).toEqual({
            success: false,
            error: 'Operation cancelled',
            code: ErrorCode.CANCELLED,
        });
        expect(api.fullProfileCalls).toEqual([]);
    });

    it('ends a backoff wait when cancelled', async () => {
        const source = new CancellationTokenSource();
        const api = new FakeProfileApi().addProfile('jane', 'urn-jane').scriptFull('jane', null);
        const gateway = new ProfileGateway(api, {
            retryDelayMs: 60_000,
            cancellation: source.token,
            logger: { ...nullLogger, warn: () => source.cancel() },
        });

        const result = await gateway.fetchFullProfile('jane');

        expect(result.success).toBe(false);
        expect(result.success === false && result.code).toBe(ErrorCode.CANCELLED);
        expect(api.fullProfileCalls).toEqual(['jane']);
    });

    it('withOptions binds a token to a copy', async () => {
        const source = new CancellationTokenSource();
        source.cancel();
        const api = new FakeProfileApi().addProfile('jane', 'urn-jane');
        const gateway = new ProfileGateway(api);

        const bound = gateway.withOptions({ cancellation: source.token });

        expect((await bound.fetchFullProfile('jane')).success).toBe(false);
        expect((await gateway.fetchFullProfile('jane')).success).toBe(true);
    });
});

describe('ProfileGateway.fetchFullProfilesBatch', () => {
    it('returns one outcome per username in input order', async () => {
        const api = new FakeProfileApi()
            .addProfile('a', 'urn-a')
            .addProfile('b', 'urn-b');
        const { gateway } = createGateway(api);

        const outcomes = await gateway.fetchFullProfilesBatch(['a', 'ghost', 'b']);

        expect(outcomes).toEqual([
            { username: 'a', success: true, profile: { urn: 'urn-a', username: 'a' } },
            { username: 'ghost', success: false, error: 'Profile not found' },
            { username: 'b', success: true, profile: { urn: 'urn-b', username: 'b' } },
        ]);
    });

    it('returns an empty list for no usernames', async () => {
        const { gateway } = createGateway(new FakeProfileApi());
        expect(await gateway.fetchFullProfilesBatch([])).toEqual([]);
    });
});
