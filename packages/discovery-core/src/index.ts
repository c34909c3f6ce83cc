/**
 * discovery-core
 *
 * Breadth-first discovery of a professional-network profile graph through
 * the "similar profiles" relation, with retrying remote access, URN-based
 * deduplication, bounded concurrency and partial results on cancellation.
 * A pure Node.js package with no terminal or rendering dependency.
 *
 * @example
 * ```typescript
 * import {
 *     ProfileGateway,
 *     TreeDiscovery,
 *     CancellationTokenSource,
 *     consoleLogger,
 *     exportToCsv,
 * } from '@profile-graph/discovery-core';
 *
 * const gateway = new ProfileGateway(api, { maxRetries: 3 });
 * const discovery = new TreeDiscovery({ gateway, logger: consoleLogger });
 * const source = new CancellationTokenSource();
 *
 * const report = await discovery.discover(['jane-doe'], 2, { cancellation: source.token });
 * const csv = exportToCsv(report.profiles);
 * ```
 */

// ============================================================================
// Logger
// ============================================================================

export { LogCategory, consoleLogger, nullLogger } from './logger';
export type { Logger } from './logger';

// ============================================================================
// Errors
// ============================================================================

export { ErrorCode, ProfileGraphError, getErrorMessage } from './errors';
export type { ErrorCodeType, ErrorMetadata } from './errors';

// ============================================================================
// Defaults
// ============================================================================

export * from './config/defaults';

// ============================================================================
// Runtime
// ============================================================================

export {
    CancellationError,
    CancellationTokenSource,
    isCancellationError,
    raceCancellation,
    RetryExhaustedError,
    defaultRetryOn,
    withRetry,
    isRetryExhaustedError,
    sleep,
} from './runtime';
export type {
    IsCancelledFn,
    CancellationToken,
    OnRetryFn,
    RetryOnFn,
    DelayForFn,
    RetryOptions,
} from './runtime';

// ============================================================================
// Concurrency
// ============================================================================

export { ConcurrencyLimiter } from './concurrency/concurrency-limiter';

// ============================================================================
// Profiles
// ============================================================================

export {
    isRecord,
    getStringField,
    getBooleanField,
    getDisplayName,
    getGeo,
    getCurrentPosition,
    getNamedList,
    getFirstSchool,
    toProfileData,
    toSimilarProfile,
    getCandidateHandle,
} from './profile';
export type {
    ProfileData,
    ProfileRecord,
    SimilarProfile,
    GeoInfo,
    PositionSummary,
} from './profile';

// ============================================================================
// Gateway
// ============================================================================

export {
    ProfileGateway,
    TERMINAL_FAILURE_MARKERS,
    RETRYABLE_CODES,
    isRetryableFailure,
    isTerminalMessage,
    isRateLimitMessage,
    classifyResponse,
    classifyTransportError,
} from './gateway';
export type {
    ProfileApi,
    FetchResult,
    BatchFetchOutcome,
    ProfileGatewayOptions,
} from './gateway';

// ============================================================================
// Discovery
// ============================================================================

export { TreeDiscovery, DiscoveryState, ActivityLog } from './discovery';
export type {
    DiscoveryReport,
    DiscoveryObserver,
    TreeDiscoveryOptions,
    DiscoverOptions,
} from './discovery';

// ============================================================================
// Export
// ============================================================================

export {
    exportToJson,
    parseJsonExport,
    flattenProfile,
    escapeCsvCell,
    exportToCsv,
    exportToTree,
    buildChildrenMap,
    formatTimestamp,
    renderExport,
    defaultExportFilename,
    writeExport,
    EXPORT_FORMATS,
    EXPORT_EXTENSIONS,
    isExportFormat,
} from './export';
export type {
    ExportFormat,
    FlatProfileRow,
    TreeExportOptions,
    WriteExportOptions,
} from './export';

// ============================================================================
// File Utilities
// ============================================================================

export {
    safeExists,
    safeReadFile,
    safeWriteFile,
    readYAML,
    getFileErrorMessage,
} from './utils';
export type { FileOperationResult } from './utils';
