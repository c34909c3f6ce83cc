/**
 * Profile Gateway
 *
 * Wraps the remote profile API with bounded retries, per-failure backoff and
 * payload validation. Every call resolves to a FetchResult; nothing thrown by
 * the transport escapes.
 *
 * Retry policy per attempt:
 * - empty response: retry after `retryDelayMs`
 * - `success: false` with a not-found style message: fail immediately
 * - `success: false` otherwise: retry after `failureRetryDelayMs`
 * - thrown error mentioning 429 / too many requests: retry after `retryDelayMs * attempt`
 * - any other thrown error: retry after `retryDelayMs`
 * - neither flag: fail immediately ("Invalid response format")
 */

import { ErrorCode, ProfileGraphError, getErrorMessage } from '../errors';
import type { ErrorCodeType } from '../errors';
import { LogCategory, nullLogger } from '../logger';
import type { Logger } from '../logger';
import { withRetry, isRetryExhaustedError, isCancellationError } from '../runtime';
import type { CancellationToken } from '../runtime';
import { toProfileData, toSimilarProfile } from '../profile';
import type { ProfileData, SimilarProfile } from '../profile';
import {
    DEFAULT_FAILURE_RETRY_DELAY_MS,
    DEFAULT_MAX_RETRIES,
    DEFAULT_RETRY_DELAY_MS,
} from '../config/defaults';
import {
    classifyResponse,
    classifyTransportError,
    isRetryableFailure,
} from './response-classifier';
import type {
    BatchFetchOutcome,
    FetchResult,
    ProfileApi,
    ProfileGatewayOptions,
} from './types';

/** URNs are shortened to this length in log lines */
const URN_LOG_LENGTH = 20;

/** Provider messages are shortened to this length in log lines */
const MESSAGE_LOG_LENGTH = 60;

export class ProfileGateway {
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;
    private readonly failureRetryDelayMs: number;
    private readonly logger: Logger;
    private readonly cancellation?: CancellationToken;

    constructor(private readonly api: ProfileApi, options: ProfileGatewayOptions = {}) {
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
        this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
        this.failureRetryDelayMs = options.failureRetryDelayMs ?? DEFAULT_FAILURE_RETRY_DELAY_MS;
        this.logger = options.logger ?? nullLogger;
        this.cancellation = options.cancellation;
    }

    /**
     * Return a gateway over the same API with some options replaced.
     * Used by a discovery run to bind its own logger and cancellation token.
     */
    withOptions(overrides: ProfileGatewayOptions): ProfileGateway {
        return new ProfileGateway(this.api, {
            maxRetries: this.maxRetries,
            retryDelayMs: this.retryDelayMs,
            failureRetryDelayMs: this.failureRetryDelayMs,
            logger: this.logger,
            cancellation: this.cancellation,
            ...overrides,
        });
    }

    /**
     * Fetch the full profile of a username.
     * Fails with "Invalid profile data structure" when `urn` or `username` is missing.
     */
    async fetchFullProfile(username: string): Promise<FetchResult<ProfileData>> {
        const response = await this.callWithRetry(() => this.api.getFullProfile(username), username);
        if (!response.success) {
            return response;
        }

        const payload = response.data.data;
        if (!payload) {
            return failure('No data in response', ErrorCode.INVALID_RESPONSE);
        }

        const profile = toProfileData(payload);
        if (!profile) {
            return failure('Invalid profile data structure', ErrorCode.INVALID_PROFILE_DATA);
        }

        return { success: true, data: profile };
    }

    /**
     * Fetch the profiles the provider considers similar to `urn`.
     * Entries without both `urn` and `id` are dropped.
     */
    async fetchSimilarProfiles(urn: string): Promise<FetchResult<SimilarProfile[]>> {
        const response = await this.callWithRetry(
            () => this.api.getSimilarProfiles(urn),
            urn.slice(0, URN_LOG_LENGTH)
        );
        if (!response.success) {
            return response;
        }

        const payload = response.data.data;
        if (!Array.isArray(payload)) {
            return failure('Invalid data format', ErrorCode.INVALID_RESPONSE);
        }

        const profiles: SimilarProfile[] = [];
        for (const entry of payload) {
            const similar = toSimilarProfile(entry);
            if (similar) {
                profiles.push(similar);
            }
        }

        return { success: true, data: profiles };
    }

    /**
     * Fetch full profiles for all usernames concurrently.
     * One outcome per input, in input order; a failure never affects its siblings.
     */
    async fetchFullProfilesBatch(usernames: string[]): Promise<BatchFetchOutcome[]> {
        return Promise.all(
            usernames.map(async (username): Promise<BatchFetchOutcome> => {
                const result = await this.fetchFullProfile(username);
                return result.success
                    ? { username, success: true, profile: result.data }
                    : { username, success: false, error: result.error };
            })
        );
    }

    // ========================================================================
    // Retry loop
    // ========================================================================

    private async callWithRetry(
        call: () => Promise<unknown>,
        identifier: string
    ): Promise<FetchResult<Record<string, unknown>>> {
        const loggedCodes = new Set<ErrorCodeType>();

        try {
            const envelope = await withRetry(
                async () => {
                    let response: unknown;
                    try {
                        response = await call();
                    } catch (error) {
                        throw classifyTransportError(error, identifier);
                    }
                    return classifyResponse(response, identifier);
                },
                {
                    attempts: this.maxRetries,
                    delayMs: this.retryDelayMs,
                    retryOn: isRetryableFailure,
                    delayFor: (error, attempt) => this.delayFor(error, attempt),
                    onRetry: (error, _attempt, delayMs) =>
                        this.logFirstRetry(error, identifier, delayMs, loggedCodes),
                    cancellation: this.cancellation,
                    operationName: `Request for ${identifier}`,
                    meta: { identifier },
                }
            );
            return { success: true, data: envelope };
        } catch (error) {
            return toFailure(error);
        }
    }

    private delayFor(error: unknown, attempt: number): number | undefined {
        if (!(error instanceof ProfileGraphError)) {
            return undefined;
        }
        switch (error.code) {
            case ErrorCode.RATE_LIMITED:
                return this.retryDelayMs * attempt;
            case ErrorCode.REMOTE_FAILURE:
                return this.failureRetryDelayMs;
            default:
                return undefined;
        }
    }

    /**
     * One warning per failure category per call, on the first retry of that category.
     */
    private logFirstRetry(
        error: unknown,
        identifier: string,
        delayMs: number,
        loggedCodes: Set<ErrorCodeType>
    ): void {
        if (!(error instanceof ProfileGraphError) || loggedCodes.has(error.code)) {
            return;
        }
        loggedCodes.add(error.code);

        const excerpt = error.message.slice(0, MESSAGE_LOG_LENGTH);
        switch (error.code) {
            case ErrorCode.RATE_LIMITED:
                this.logger.warn(LogCategory.GATEWAY, `(${identifier}) Rate limit hit - waiting ${delayMs / 1000}s`);
                break;
            case ErrorCode.REMOTE_FAILURE:
                this.logger.warn(LogCategory.GATEWAY, `(${identifier}) ${excerpt}... retrying`);
                break;
            case ErrorCode.EMPTY_RESPONSE:
                this.logger.warn(LogCategory.GATEWAY, `(${identifier}) Empty response... retrying`);
                break;
            default:
                this.logger.warn(LogCategory.GATEWAY, `(${identifier}) Error: ${excerpt}... retrying`);
                break;
        }
    }
}

function failure(error: string, code: ErrorCodeType): { success: false; error: string; code: ErrorCodeType } {
    return { success: false, error, code };
}

/**
 * Convert whatever ended the retry loop into a failed FetchResult.
 * Exhausted retries report the last recorded error.
 */
function toFailure(error: unknown): { success: false; error: string; code: ErrorCodeType } {
    if (isCancellationError(error)) {
        return failure('Operation cancelled', ErrorCode.CANCELLED);
    }

    if (isRetryExhaustedError(error)) {
        const last = error.cause;
        if (last instanceof ProfileGraphError) {
            if (last.code === ErrorCode.RATE_LIMITED) {
                return failure('Rate limit exceeded', ErrorCode.RATE_LIMITED);
            }
            return failure(last.message, last.code);
        }
        return failure('Max retries exceeded', ErrorCode.RETRY_EXHAUSTED);
    }

    if (error instanceof ProfileGraphError) {
        return failure(error.message, error.code);
    }

    return failure(getErrorMessage(error), ErrorCode.UNKNOWN);
}
