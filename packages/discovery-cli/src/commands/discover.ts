/**
 * Discover Command
 *
 * Runs a breadth-first discovery from seed usernames, shows progress,
 * prints the summary, renders the requested view and writes the export.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import {
    CancellationTokenSource,
    ProfileGateway,
    TreeDiscovery,
    getErrorMessage,
    getFileErrorMessage,
    writeExport,
} from '@profile-graph/discovery-core';
import type { DiscoveryReport, ProfileApi } from '@profile-graph/discovery-core';
import type { OutputFormat, ViewMode } from '../config';
import { HttpProfileApi } from '../http-profile-api';
import { collectUsernames } from '../input-loader';
import {
    ProgressDisplay,
    createCLILogger,
    printError,
    printHeader,
    printInfo,
    printKeyValue,
    printSuccess,
    printWarning,
    green,
    bold,
} from '../logger';
import {
    formatDuration,
    formatProfilesTable,
    formatProfilesTree,
    formatSummary,
    maskApiKey,
} from '../output-formatter';
import { EXIT_CODES } from '../exit-codes';

// ============================================================================
// Types
// ============================================================================

export interface DiscoverCommandOptions {
    /** Positional usernames; comma-separated values are split */
    usernames: string[];
    /** File with one username per line */
    file?: string;
    depth: number;
    concurrency: number;
    maxRetries: number;
    retryDelayMs: number;
    requestTimeoutMs: number;
    apiKey?: string;
    baseUrl: string;
    output: OutputFormat;
    outputDir: string;
    outputFile?: string;
    view: ViewMode;
}

/**
 * Collaborators replaced in tests
 */
export interface DiscoverCommandDeps {
    /** Transport used instead of HTTP; no API key is needed then */
    api?: ProfileApi;
    /** Cancellation source used instead of a SIGINT-driven one */
    cancellation?: CancellationTokenSource;
    /** Clock for export file names */
    now?: Date;
}

// ============================================================================
// Discover Command
// ============================================================================

/**
 * Execute the discover command
 *
 * @returns exit code
 */
export async function executeDiscover(
    options: DiscoverCommandOptions,
    deps: DiscoverCommandDeps = {}
): Promise<number> {
    // 1. Collect seeds
    const collected = collectUsernames(options.usernames, options.file);
    if (!collected.success) {
        printError(getFileErrorMessage(collected.errorCode ?? 'UNKNOWN', options.file));
        return EXIT_CODES.CONFIG_ERROR;
    }
    const usernames = collected.data ?? [];
    if (usernames.length === 0) {
        printError('No usernames provided');
        return EXIT_CODES.CONFIG_ERROR;
    }

    // 2. Resolve the transport
    let api = deps.api;
    if (!api) {
        if (!options.apiKey) {
            printError('API key is required: pass --api-key or set PROFILE_GRAPH_API_KEY');
            return EXIT_CODES.CONFIG_ERROR;
        }
        api = new HttpProfileApi({
            apiKey: options.apiKey,
            baseUrl: options.baseUrl,
            timeoutMs: options.requestTimeoutMs,
        });
    }

    printHeader('Profile Graph Discovery');
    if (options.apiKey) {
        printKeyValue('API Key', maskApiKey(options.apiKey));
    }
    printKeyValue('Usernames', String(usernames.length));
    printKeyValue('Depth', String(options.depth));
    printKeyValue('Concurrency', String(options.concurrency));
    printKeyValue('Retries', String(options.maxRetries));
    process.stderr.write('\n');

    // 3. Wire up the run
    const logger = createCLILogger();
    const progress = new ProgressDisplay({ total: options.depth, label: 'Depth' });
    const gateway = new ProfileGateway(api, {
        maxRetries: options.maxRetries,
        retryDelayMs: options.retryDelayMs,
        logger,
    });
    const discovery = new TreeDiscovery({
        gateway,
        maxConcurrency: options.concurrency,
        logger,
        observer: {
            onLevelComplete: (level, newProfiles) => {
                progress.update(level, `${newProfiles} new profiles`);
            },
        },
    });

    // 4. First Ctrl+C cancels, second forces exit
    const source = deps.cancellation ?? new CancellationTokenSource();
    const sigintHandler = () => {
        if (source.isCancelled) {
            process.exit(EXIT_CODES.CANCELLED);
        }
        process.stderr.write('\n');
        printInfo('Cancelling... (press Ctrl+C again to force exit)');
        source.cancel();
    };
    process.on('SIGINT', sigintHandler);

    const startTime = Date.now();
    let report: DiscoveryReport;
    try {
        report = await discovery.discover(usernames, options.depth, { cancellation: source.token });
    } catch (error) {
        printError(`Discovery failed: ${getErrorMessage(error)}`);
        return EXIT_CODES.EXECUTION_ERROR;
    } finally {
        process.removeListener('SIGINT', sigintHandler);
    }

    if (!report.cancelled) {
        progress.complete('Discovery complete');
    }

    // 5. Report
    process.stderr.write(`\n${formatSummary(report)}\n`);
    process.stderr.write(`\n  ${green(bold('Done'))} in ${formatDuration(Date.now() - startTime)}\n`);
    if (report.cancelled) {
        printWarning(`Discovery interrupted: ${report.totalDiscovered} profiles discovered before interruption`);
    }

    if (report.profiles.length === 0) {
        printWarning('No profiles discovered');
    } else {
        if (options.view === 'table') {
            process.stdout.write(`${formatProfilesTable(report.profiles)}\n`);
        } else if (options.view === 'tree') {
            process.stdout.write(`${formatProfilesTree(report.profiles)}\n`);
        }

        if (options.output !== 'none') {
            try {
                const filePath = writeExport(report.profiles, options.output, {
                    outputDir: options.outputDir,
                    filename: options.outputFile,
                    now: deps.now,
                });
                printSuccess(`Exported ${report.profiles.length} profiles to ${filePath}`);
            } catch (error) {
                printError(getErrorMessage(error));
                return EXIT_CODES.EXECUTION_ERROR;
            }
        }
    }

    return exitCodeFor(report);
}

/**
 * 130 when interrupted; 1 when nothing was found and something failed; else 0
 */
export function exitCodeFor(report: DiscoveryReport): number {
    if (report.cancelled) {
        return EXIT_CODES.CANCELLED;
    }
    if (report.profiles.length === 0 && report.failedUsernames.length > 0) {
        return EXIT_CODES.EXECUTION_ERROR;
    }
    return EXIT_CODES.SUCCESS;
}
