/**
 * View Command
 *
 * Prints the profiles of a JSON export as a table or a tree.
 */

import { formatProfilesTable, formatProfilesTree } from '../output-formatter';
import { EXIT_CODES } from '../exit-codes';
import { loadReportFile } from './report-file';

export type ViewCommandMode = 'table' | 'tree';

export interface ViewCommandOptions {
    mode: ViewCommandMode;
    /** Table rows shown. Default: 20 */
    maxRows?: number;
}

/**
 * Execute the view command
 *
 * @returns exit code
 */
export function executeView(inputPath: string, options: ViewCommandOptions): number {
    const profiles = loadReportFile(inputPath);
    if (!profiles) {
        return EXIT_CODES.CONFIG_ERROR;
    }

    const output = options.mode === 'tree'
        ? formatProfilesTree(profiles)
        : formatProfilesTable(profiles, options.maxRows);
    process.stdout.write(`${output}\n`);
    return EXIT_CODES.SUCCESS;
}
