/**
 * CLI Argument Parser
 *
 * Defines the CLI commands and options using Commander.
 * Routes parsed arguments to the appropriate command handlers.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { Command } from 'commander';
import {
    ErrorCode,
    ProfileGraphError,
    getErrorMessage,
    isExportFormat,
    safeExists,
} from '@profile-graph/discovery-core';
import type { ExportFormat } from '@profile-graph/discovery-core';
import { executeDiscover } from './commands/discover';
import type { DiscoverCommandOptions } from './commands/discover';
import { executeExport } from './commands/export';
import { executeView } from './commands/view';
import type { ViewCommandMode } from './commands/view';
import {
    MAX_DEPTH,
    MIN_DEPTH,
    isOutputFormat,
    isValidDepth,
    isViewMode,
    resolveConfig,
} from './config';
import type { ResolvedCLIConfig } from './config';
import { EXIT_CODES } from './exit-codes';
import { printError, setColorEnabled, setVerbosity } from './logger';

export { EXIT_CODES } from './exit-codes';

// ============================================================================
// Types
// ============================================================================

interface GlobalFlags {
    config?: string;
    color?: boolean;
    verbose?: boolean;
}

/**
 * Raw `discover` flags as Commander hands them over
 */
export interface DiscoverFlags extends GlobalFlags {
    file?: string;
    depth?: string;
    concurrency?: string;
    retries?: string;
    retryDelay?: string;
    apiKey?: string;
    baseUrl?: string;
    output?: string;
    outputDir?: string;
    outputFile?: string;
    view?: string;
}

interface ExportFlags extends GlobalFlags {
    output?: string;
    outputDir?: string;
    outputFile?: string;
}

interface ViewFlags extends GlobalFlags {
    mode?: string;
}

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('profile-graph')
        .description('Discover professional-network profiles breadth-first through similar-profile links')
        .version('1.0.0');

    // ========================================================================
    // profile-graph discover [usernames...]
    // ========================================================================

    program
        .command('discover')
        .description('Discover profiles starting from seed usernames')
        .argument('[usernames...]', 'Seed usernames (comma-separated values are split)')
        .option('-f, --file <path>', 'File with one username per line')
        .option('-d, --depth <n>', `Expansion levels below the seeds (${MIN_DEPTH}-${MAX_DEPTH})`)
        .option('-c, --concurrency <n>', 'Profiles expanded at once')
        .option('--retries <n>', 'Attempts per remote call')
        .option('--retry-delay <ms>', 'Base delay between attempts in milliseconds')
        .option('--api-key <key>', 'Remote API key (or PROFILE_GRAPH_API_KEY)')
        .option('--base-url <url>', 'Remote API base URL (or PROFILE_GRAPH_BASE_URL)')
        .option('--config <path>', 'Config file (default: ~/.profile-graph.yaml)')
        .option('-o, --output <format>', 'Export format: json, csv, tree, none')
        .option('--output-dir <dir>', 'Directory for the export file')
        .option('--output-file <name>', 'Export file name (default: timestamped)')
        .option('--view <mode>', 'Show results as: table, tree, none', 'table')
        .option('-v, --verbose', 'Verbose logging', false)
        .option('--no-color', 'Disable colored output')
        .action(async (usernames: string[], flags: DiscoverFlags) => {
            const config = loadConfig(flags);
            applyGlobalOptions(flags);

            let options: DiscoverCommandOptions;
            try {
                options = buildDiscoverOptions(usernames, flags, config);
            } catch (error) {
                printError(getErrorMessage(error));
                process.exit(EXIT_CODES.CONFIG_ERROR);
            }

            const exitCode = await executeDiscover(options);
            process.exit(exitCode);
        });

    // ========================================================================
    // profile-graph export <file>
    // ========================================================================

    program
        .command('export')
        .description('Convert a JSON export to another format')
        .argument('<file>', 'JSON export written by discover')
        .option('-o, --output <format>', 'Export format: csv, tree, json', 'csv')
        .option('--output-dir <dir>', 'Directory for the export file')
        .option('--output-file <name>', 'Export file name (default: timestamped)')
        .option('--config <path>', 'Config file (default: ~/.profile-graph.yaml)')
        .option('--no-color', 'Disable colored output')
        .action((inputPath: string, flags: ExportFlags) => {
            const config = loadConfig(flags);
            applyGlobalOptions(flags);

            let output: ExportFormat;
            try {
                output = parseExportFormat(flags.output);
            } catch (error) {
                printError(getErrorMessage(error));
                process.exit(EXIT_CODES.CONFIG_ERROR);
            }

            const exitCode = executeExport(inputPath, {
                output,
                outputDir: flags.outputDir ?? config.outputDir,
                outputFile: flags.outputFile,
            });
            process.exit(exitCode);
        });

    // ========================================================================
    // profile-graph view <file>
    // ========================================================================

    program
        .command('view')
        .description('Show the profiles of a JSON export')
        .argument('<file>', 'JSON export written by discover')
        .option('--mode <mode>', 'Display mode: table, tree', 'table')
        .option('--no-color', 'Disable colored output')
        .action((inputPath: string, flags: ViewFlags) => {
            applyGlobalOptions(flags);

            if (flags.mode !== 'table' && flags.mode !== 'tree') {
                printError(`Invalid view mode: ${flags.mode} (expected table or tree)`);
                process.exit(EXIT_CODES.CONFIG_ERROR);
            }
            const mode: ViewCommandMode = flags.mode;

            const exitCode = executeView(inputPath, { mode });
            process.exit(exitCode);
        });

    return program;
}

// ============================================================================
// Option Parsing
// ============================================================================

function invalidOption(message: string): ProfileGraphError {
    return new ProfileGraphError(message, { code: ErrorCode.CONFIG_INVALID });
}

/**
 * Parse a whole-number flag value
 *
 * @throws ProfileGraphError (CONFIG_INVALID) when the value is not an integer of at least `min`
 */
export function parseIntegerOption(name: string, value: string, min: number): number {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (!/^-?\d+$/.test(trimmed) || parsed < min) {
        throw invalidOption(`Invalid ${name}: ${value} (expected an integer of at least ${min})`);
    }
    return parsed;
}

export function parseExportFormat(value: string | undefined): ExportFormat {
    if (!isExportFormat(value)) {
        throw invalidOption(`Invalid output format: ${value} (expected json, csv or tree)`);
    }
    return value;
}

/**
 * Apply `discover` flags on top of the resolved configuration
 *
 * @throws ProfileGraphError (CONFIG_INVALID) for malformed flag values
 */
export function buildDiscoverOptions(
    usernames: string[],
    flags: DiscoverFlags,
    config: ResolvedCLIConfig
): DiscoverCommandOptions {
    let depth = config.depth;
    if (flags.depth !== undefined) {
        const parsed = Number(flags.depth);
        if (!isValidDepth(parsed) || !/^\d+$/.test(flags.depth.trim())) {
            throw invalidOption(`Depth must be an integer between ${MIN_DEPTH} and ${MAX_DEPTH}`);
        }
        depth = parsed;
    }

    const output = flags.output ?? config.format;
    if (!isOutputFormat(output)) {
        throw invalidOption(`Invalid output format: ${output} (expected json, csv, tree or none)`);
    }

    const view = flags.view ?? 'table';
    if (!isViewMode(view)) {
        throw invalidOption(`Invalid view mode: ${view} (expected table, tree or none)`);
    }

    return {
        usernames,
        file: flags.file,
        depth,
        concurrency: flags.concurrency !== undefined
            ? parseIntegerOption('concurrency', flags.concurrency, 1)
            : config.concurrency,
        maxRetries: flags.retries !== undefined
            ? parseIntegerOption('retries', flags.retries, 1)
            : config.maxRetries,
        retryDelayMs: flags.retryDelay !== undefined
            ? parseIntegerOption('retry delay', flags.retryDelay, 0)
            : config.retryDelayMs,
        requestTimeoutMs: config.requestTimeoutMs,
        apiKey: flags.apiKey ?? config.apiKey,
        baseUrl: flags.baseUrl ?? config.baseUrl,
        output,
        outputDir: flags.outputDir ?? config.outputDir,
        outputFile: flags.outputFile,
        view,
    };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Resolve configuration; an explicit --config path must exist
 */
function loadConfig(flags: GlobalFlags): ResolvedCLIConfig {
    if (flags.config && !safeExists(flags.config)) {
        printError(`Config file not found: ${flags.config}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
    }
    return resolveConfig(flags.config);
}

/**
 * Apply global options (colors, verbosity) based on CLI flags
 */
function applyGlobalOptions(flags: GlobalFlags): void {
    // Handle --no-color: commander sets color: false when --no-color is used
    if (flags.color === false) {
        setColorEnabled(false);
    }

    // Also respect NO_COLOR env variable
    if (process.env.NO_COLOR !== undefined) {
        setColorEnabled(false);
    }

    if (flags.verbose) {
        setVerbosity('verbose');
    }
}
