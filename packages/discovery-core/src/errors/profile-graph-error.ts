/**
 * ProfileGraphError
 *
 * Base error class for all discovery-core errors.
 * Provides structured error information with:
 * - code: Well-known error code for programmatic handling
 * - cause: Original error that caused this error (error chaining)
 * - meta: Additional context metadata
 */

import { ErrorCode } from './error-codes';
import type { ErrorCodeType } from './error-codes';

/**
 * Metadata that can be attached to errors for debugging and log output
 */
export interface ErrorMetadata {
    /** Username or URN the failing call was made for */
    identifier?: string;
    /** Retry attempt number */
    attempt?: number;
    /** Maximum retry attempts configured */
    maxAttempts?: number;
    /** Additional custom metadata */
    [key: string]: unknown;
}

/**
 * Base error class for the discovery-core package.
 *
 * @example
 * ```typescript
 * throw new ProfileGraphError('Invalid profile data structure', {
 *     code: ErrorCode.INVALID_PROFILE_DATA,
 *     meta: { identifier: 'jane-doe' }
 * });
 * ```
 */
export class ProfileGraphError extends Error {
    /** Well-known error code for programmatic handling */
    readonly code: ErrorCodeType;

    /** Original error that caused this error */
    readonly cause?: unknown;

    /** Additional context metadata */
    readonly meta?: ErrorMetadata;

    constructor(
        message: string,
        options?: {
            code?: ErrorCodeType;
            cause?: unknown;
            meta?: ErrorMetadata;
        }
    ) {
        super(message);

        this.name = 'ProfileGraphError';
        this.code = options?.code ?? ErrorCode.UNKNOWN;
        this.cause = options?.cause;
        this.meta = options?.meta;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
