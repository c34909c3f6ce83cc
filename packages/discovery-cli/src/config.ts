/**
 * CLI Configuration
 *
 * Resolves CLI configuration from the config file, the environment and
 * built-in defaults. Configuration file: ~/.profile-graph.yaml
 *
 * Precedence: command-line flags > environment > config file > defaults.
 * Flags are applied by the command handlers on top of resolveConfig().
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as path from 'path';
import * as os from 'os';
import {
    DEFAULT_MAX_CONCURRENCY,
    DEFAULT_MAX_DEPTH,
    DEFAULT_MAX_RETRIES,
    DEFAULT_RETRY_DELAY_MS,
    isExportFormat,
    isRecord,
    readYAML,
    safeExists,
} from '@profile-graph/discovery-core';
import type { ExportFormat } from '@profile-graph/discovery-core';

// ============================================================================
// Types
// ============================================================================

/** Export format chosen on the command line; 'none' skips the export */
export type OutputFormat = ExportFormat | 'none';

/** On-screen rendering of the discovered profiles */
export type ViewMode = 'table' | 'tree' | 'none';

/**
 * CLI configuration as stored in the config file
 */
export interface CLIConfig {
    /** Key sent to the remote profile API */
    apiKey?: string;
    /** Base URL of the remote profile API */
    baseUrl?: string;
    /** Default discovery depth (1..10) */
    depth?: number;
    /** Frontier nodes expanded at once */
    concurrency?: number;
    /** Attempts per remote call */
    maxRetries?: number;
    /** Base delay between attempts in milliseconds */
    retryDelayMs?: number;
    /** Socket timeout of one HTTP request in milliseconds */
    requestTimeoutMs?: number;
    /** Directory export files are written to */
    outputDir?: string;
    /** Default export format */
    format?: OutputFormat;
}

/**
 * Resolved CLI configuration with all defaults applied
 */
export interface ResolvedCLIConfig {
    apiKey?: string;
    baseUrl: string;
    depth: number;
    concurrency: number;
    maxRetries: number;
    retryDelayMs: number;
    requestTimeoutMs: number;
    outputDir: string;
    format: OutputFormat;
}

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE_NAME = '.profile-graph.yaml';

export const ENV_API_KEY = 'PROFILE_GRAPH_API_KEY';
export const ENV_BASE_URL = 'PROFILE_GRAPH_BASE_URL';

/** Depth range accepted from users */
export const MIN_DEPTH = 1;
export const MAX_DEPTH = 10;

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'tree', 'none'];
export const VIEW_MODES: readonly ViewMode[] = ['table', 'tree', 'none'];

export const DEFAULT_CONFIG: ResolvedCLIConfig = {
    baseUrl: 'https://linkdapi.com',
    depth: DEFAULT_MAX_DEPTH,
    concurrency: DEFAULT_MAX_CONCURRENCY,
    maxRetries: DEFAULT_MAX_RETRIES,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    requestTimeoutMs: 30000,
    outputDir: '.',
    format: 'json',
};

// ============================================================================
// Guards
// ============================================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
    return value === 'none' || isExportFormat(value);
}

export function isViewMode(value: unknown): value is ViewMode {
    return typeof value === 'string' && VIEW_MODES.some(mode => mode === value);
}

export function isValidDepth(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= MIN_DEPTH && value <= MAX_DEPTH;
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === 'string' && value.trim().length > 0;
}

// ============================================================================
// Config Resolution
// ============================================================================

/**
 * Get the path to the config file
 */
export function getConfigFilePath(): string {
    return path.join(os.homedir(), CONFIG_FILE_NAME);
}

/**
 * Load CLI configuration from the config file.
 * Returns undefined if the file doesn't exist or can't be parsed.
 */
export function loadConfigFile(configPath?: string): CLIConfig | undefined {
    const filePath = configPath || getConfigFilePath();
    if (!safeExists(filePath)) {
        return undefined;
    }
    const result = readYAML(filePath);
    if (!result.success) {
        return undefined;
    }
    return validateConfig(result.data);
}

/**
 * Validate and sanitize a config object. Invalid fields are dropped.
 */
export function validateConfig(config: unknown): CLIConfig | undefined {
    if (!isRecord(config)) {
        return undefined;
    }

    const result: CLIConfig = {};

    if (isNonEmptyString(config.apiKey)) {
        result.apiKey = config.apiKey;
    }

    if (isNonEmptyString(config.baseUrl)) {
        result.baseUrl = config.baseUrl;
    }

    if (isValidDepth(config.depth)) {
        result.depth = config.depth;
    }

    if (typeof config.concurrency === 'number' && config.concurrency >= 1) {
        result.concurrency = Math.floor(config.concurrency);
    }

    if (typeof config.maxRetries === 'number' && config.maxRetries >= 1) {
        result.maxRetries = Math.floor(config.maxRetries);
    }

    if (typeof config.retryDelayMs === 'number' && config.retryDelayMs >= 0) {
        result.retryDelayMs = config.retryDelayMs;
    }

    if (typeof config.requestTimeoutMs === 'number' && config.requestTimeoutMs > 0) {
        result.requestTimeoutMs = config.requestTimeoutMs;
    }

    if (isNonEmptyString(config.outputDir)) {
        result.outputDir = config.outputDir;
    }

    if (isOutputFormat(config.format)) {
        result.format = config.format;
    }

    return result;
}

/**
 * Configuration taken from environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): CLIConfig {
    const result: CLIConfig = {};
    const apiKey = env[ENV_API_KEY];
    if (isNonEmptyString(apiKey)) {
        result.apiKey = apiKey;
    }
    const baseUrl = env[ENV_BASE_URL];
    if (isNonEmptyString(baseUrl)) {
        result.baseUrl = baseUrl;
    }
    return result;
}

/**
 * Resolve CLI configuration: defaults, then the config file, then the environment.
 * Command-line options should be applied on top of the result.
 */
export function resolveConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ResolvedCLIConfig {
    const fileConfig = loadConfigFile(configPath);
    return mergeConfig(mergeConfig(DEFAULT_CONFIG, fileConfig), readEnvConfig(env));
}

/**
 * Merge a partial config on top of a base config
 */
export function mergeConfig(base: ResolvedCLIConfig, override?: CLIConfig): ResolvedCLIConfig {
    if (!override) {
        return { ...base };
    }

    return {
        apiKey: override.apiKey ?? base.apiKey,
        baseUrl: override.baseUrl ?? base.baseUrl,
        depth: override.depth ?? base.depth,
        concurrency: override.concurrency ?? base.concurrency,
        maxRetries: override.maxRetries ?? base.maxRetries,
        retryDelayMs: override.retryDelayMs ?? base.retryDelayMs,
        requestTimeoutMs: override.requestTimeoutMs ?? base.requestTimeoutMs,
        outputDir: override.outputDir ?? base.outputDir,
        format: override.format ?? base.format,
    };
}
