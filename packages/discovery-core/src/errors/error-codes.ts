/**
 * Error Codes for Discovery Core
 *
 * Well-known error codes used across the discovery-core package.
 * These codes provide structured error identification without relying on message parsing.
 *
 * Categories:
 * - Control flow: CANCELLED, RETRY_EXHAUSTED
 * - Remote API: RATE_LIMITED, EMPTY_RESPONSE, REMOTE_FAILURE, NOT_FOUND, INVALID_*, TRANSPORT_ERROR
 * - Configuration and input: CONFIG_INVALID, INPUT_INVALID
 * - Output: EXPORT_FAILED
 */

/**
 * Error codes as a const object for type safety and autocompletion
 */
export const ErrorCode = {
    // =========================================================================
    // Control Flow
    // =========================================================================
    /** Operation was cancelled by user or system */
    CANCELLED: 'CANCELLED',
    /** All retry attempts have been exhausted */
    RETRY_EXHAUSTED: 'RETRY_EXHAUSTED',

    // =========================================================================
    // Remote API
    // =========================================================================
    /** Provider answered with HTTP 429 / "too many requests" */
    RATE_LIMITED: 'RATE_LIMITED',
    /** Provider returned nothing */
    EMPTY_RESPONSE: 'EMPTY_RESPONSE',
    /** Provider flagged the call as failed with a retryable message */
    REMOTE_FAILURE: 'REMOTE_FAILURE',
    /** Provider reported the profile as missing or hidden */
    NOT_FOUND: 'NOT_FOUND',
    /** Response carried neither a success nor a failure flag */
    INVALID_RESPONSE: 'INVALID_RESPONSE',
    /** Profile payload lacks its identifying fields */
    INVALID_PROFILE_DATA: 'INVALID_PROFILE_DATA',
    /** Network or protocol level failure */
    TRANSPORT_ERROR: 'TRANSPORT_ERROR',

    // =========================================================================
    // Configuration & Input
    // =========================================================================
    /** Configuration is invalid or incomplete */
    CONFIG_INVALID: 'CONFIG_INVALID',
    /** User supplied input is invalid */
    INPUT_INVALID: 'INPUT_INVALID',

    // =========================================================================
    // Export
    // =========================================================================
    /** Export could not be produced or written */
    EXPORT_FAILED: 'EXPORT_FAILED',

    // =========================================================================
    // Unknown / Fallback
    // =========================================================================
    /** Error code could not be determined */
    UNKNOWN: 'UNKNOWN',
} as const;

/**
 * Type representing valid error codes
 */
export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];
