/**
 * Centralized Defaults
 *
 * Single source of truth for all DEFAULT_* constants used across the discovery-core package.
 */

// ============================================================================
// Discovery
// ============================================================================

/**
 * Default number of expansion levels below the seeds.
 */
export const DEFAULT_MAX_DEPTH = 3;

/**
 * Default number of frontier nodes expanded at the same time within a level.
 */
export const DEFAULT_MAX_CONCURRENCY = 10;

/**
 * Number of log lines kept in the activity log of a report.
 */
export const DEFAULT_ACTIVITY_LOG_SIZE = 30;

// ============================================================================
// Retry
// ============================================================================

/**
 * Default number of attempts per remote call (including the first).
 */
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Default base delay between attempts (2 seconds).
 * Rate-limited calls wait base * attempt.
 */
export const DEFAULT_RETRY_DELAY_MS = 2000;

/**
 * Delay before retrying a call the provider flagged as failed (1 second).
 */
export const DEFAULT_FAILURE_RETRY_DELAY_MS = 1000;

// ============================================================================
// Export
// ============================================================================

/**
 * Maximum nesting rendered by the tree exporter.
 */
export const DEFAULT_TREE_MAX_DEPTH = 5;

/**
 * Maximum children rendered per node by the tree exporter.
 */
export const DEFAULT_TREE_MAX_CHILDREN = 10;

/**
 * Prefix of generated export file names.
 */
export const DEFAULT_EXPORT_FILE_PREFIX = 'profile_graph';

// ============================================================================
// Display
// ============================================================================

/**
 * Rows shown by the profiles table before eliding.
 */
export const DEFAULT_DISPLAY_MAX_ROWS = 20;

/**
 * Levels shown by the on-screen tree.
 */
export const DEFAULT_DISPLAY_TREE_DEPTH = 3;

/**
 * Children shown per node by the on-screen tree.
 */
export const DEFAULT_DISPLAY_TREE_CHILDREN = 5;

/**
 * Root profiles shown by the on-screen tree.
 */
export const DEFAULT_DISPLAY_TREE_ROOTS = 10;
