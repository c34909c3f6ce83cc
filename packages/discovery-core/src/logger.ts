/**
 * Logger abstraction for the discovery-core package.
 *
 * This module provides a simple logger interface that can be implemented
 * by different environments (CLI, tests, embedding applications).
 *
 * The core never reaches for a process-wide logger: every gateway and
 * discovery run receives its logger explicitly, and falls back to
 * `nullLogger` when none is given.
 *
 * Usage:
 *   import { TreeDiscovery, consoleLogger } from '@profile-graph/discovery-core';
 *
 *   const discovery = new TreeDiscovery({ gateway, logger: consoleLogger });
 */

/**
 * Log categories for different subsystems
 */
export enum LogCategory {
    /** Tree discovery orchestration */
    DISCOVERY = 'Discovery',
    /** Remote API calls and retries */
    GATEWAY = 'Gateway',
    /** Result exporters */
    EXPORT = 'Export',
    /** Configuration loading */
    CONFIG = 'Config',
    /** General operations */
    GENERAL = 'General',
}

/**
 * Logger interface that can be implemented by different environments.
 */
export interface Logger {
    /**
     * Log a debug message (verbose, for development)
     */
    debug(category: string, message: string): void;

    /**
     * Log an informational message
     */
    info(category: string, message: string): void;

    /**
     * Log a warning message
     */
    warn(category: string, message: string): void;

    /**
     * Log an error message with optional Error object
     */
    error(category: string, message: string, error?: Error): void;
}

/**
 * Console-based logger implementation.
 * Outputs to stdout/stderr with categories.
 */
export const consoleLogger: Logger = {
    debug: (cat, msg) => console.debug(`[DEBUG] [${cat}] ${msg}`),
    info: (cat, msg) => console.log(`[INFO] [${cat}] ${msg}`),
    warn: (cat, msg) => console.warn(`[WARN] [${cat}] ${msg}`),
    error: (cat, msg, err) => console.error(`[ERROR] [${cat}] ${msg}`, err || ''),
};

/**
 * Null logger that discards all messages.
 * Used when no logger is passed to a run.
 */
export const nullLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};
