/**
 * Response Classifier
 *
 * Turns one raw provider response, or one thrown transport error, into
 * either a payload or a ProfileGraphError whose code tells the retry loop
 * what to do with it.
 */

import { ProfileGraphError, ErrorCode, getErrorMessage } from '../errors';
import type { ErrorCodeType } from '../errors';
import { isCancellationError } from '../runtime';
import { isRecord } from '../profile';

/** Substrings (lowercase) marking a provider failure as final */
export const TERMINAL_FAILURE_MARKERS = ['not found', "doesn't exist", 'cannot be displayed'] as const;

/** Codes the gateway retries */
export const RETRYABLE_CODES: ReadonlySet<ErrorCodeType> = new Set<ErrorCodeType>([
    ErrorCode.EMPTY_RESPONSE,
    ErrorCode.REMOTE_FAILURE,
    ErrorCode.RATE_LIMITED,
    ErrorCode.TRANSPORT_ERROR,
]);

/**
 * Check whether a failure should be retried
 */
export function isRetryableFailure(error: unknown): boolean {
    return error instanceof ProfileGraphError && RETRYABLE_CODES.has(error.code);
}

/**
 * Check whether a provider message marks the failure as final
 */
export function isTerminalMessage(message: string): boolean {
    const lower = message.toLowerCase();
    return TERMINAL_FAILURE_MARKERS.some(marker => lower.includes(marker));
}

/**
 * Check whether a transport error text signals rate limiting
 */
export function isRateLimitMessage(message: string): boolean {
    return message.includes('429') || message.toLowerCase().includes('too many requests');
}

function isEmptyResponse(response: unknown): boolean {
    if (response === null || response === undefined || response === '') {
        return true;
    }
    return isRecord(response) && Object.keys(response).length === 0;
}

/**
 * Classify a provider response envelope.
 *
 * @returns the envelope when it carries `success: true`
 * @throws ProfileGraphError coded EMPTY_RESPONSE, NOT_FOUND, REMOTE_FAILURE or INVALID_RESPONSE
 */
export function classifyResponse(response: unknown, identifier: string): Record<string, unknown> {
    if (isEmptyResponse(response)) {
        throw new ProfileGraphError('Empty response', {
            code: ErrorCode.EMPTY_RESPONSE,
            meta: { identifier },
        });
    }

    if (!isRecord(response)) {
        throw new ProfileGraphError('Invalid response format', {
            code: ErrorCode.INVALID_RESPONSE,
            meta: { identifier },
        });
    }

    if ('success' in response && !response.success) {
        const message = typeof response.message === 'string' && response.message
            ? response.message
            : 'Unknown error';
        throw new ProfileGraphError(message, {
            code: isTerminalMessage(message) ? ErrorCode.NOT_FOUND : ErrorCode.REMOTE_FAILURE,
            meta: { identifier },
        });
    }

    if ('success' in response && response.success) {
        return response;
    }

    throw new ProfileGraphError('Invalid response format', {
        code: ErrorCode.INVALID_RESPONSE,
        meta: { identifier },
    });
}

/**
 * Classify an error thrown by the transport.
 * Cancellation passes through untouched.
 */
export function classifyTransportError(error: unknown, identifier: string): ProfileGraphError {
    if (isCancellationError(error)) {
        return error;
    }
    const message = getErrorMessage(error);
    return new ProfileGraphError(message, {
        code: isRateLimitMessage(message) ? ErrorCode.RATE_LIMITED : ErrorCode.TRANSPORT_ERROR,
        cause: error,
        meta: { identifier },
    });
}
