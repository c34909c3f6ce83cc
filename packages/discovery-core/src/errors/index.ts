/**
 * Errors Module - Public API
 *
 * Exports all error types and utilities for the discovery-core package.
 */

// Error codes
export { ErrorCode } from './error-codes';
export type { ErrorCodeType } from './error-codes';

// Core error class and utilities
export {
    ProfileGraphError,
    getErrorMessage,
} from './profile-graph-error';
export type { ErrorMetadata } from './profile-graph-error';
