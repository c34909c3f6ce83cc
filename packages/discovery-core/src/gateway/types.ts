/**
 * Gateway Types
 */

import type { ErrorCodeType } from '../errors';
import type { Logger } from '../logger';
import type { CancellationToken } from '../runtime';
import type { ProfileData } from '../profile';

/**
 * Transport to the remote profile provider.
 *
 * Implementations return the provider's response envelope untouched
 * (`{ success, message?, data? }` or nothing) and throw on transport-level
 * failures. The gateway is responsible for retries and validation.
 */
export interface ProfileApi {
    getFullProfile(username: string): Promise<unknown>;
    getSimilarProfiles(urn: string): Promise<unknown>;
}

/**
 * Outcome of a gateway call
 */
export type FetchResult<T> =
    | { success: true; data: T }
    | { success: false; error: string; code: ErrorCodeType };

/**
 * One entry of a batch full-profile fetch, in input order
 */
export interface BatchFetchOutcome {
    username: string;
    success: boolean;
    profile?: ProfileData;
    error?: string;
}

/**
 * Options for ProfileGateway
 */
export interface ProfileGatewayOptions {
    /** Attempts per remote call, including the first. Default: 3 */
    maxRetries?: number;
    /** Base delay in milliseconds; rate-limited calls wait base * attempt. Default: 2000 */
    retryDelayMs?: number;
    /** Delay before retrying a call the provider flagged as failed. Default: 1000 */
    failureRetryDelayMs?: number;
    /** Receives one warning per failure category per call on its first retry */
    logger?: Logger;
    /** Once cancelled, no new remote call starts */
    cancellation?: CancellationToken;
}
