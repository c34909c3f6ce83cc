/**
 * Export Command
 *
 * Re-exports a JSON export file as CSV, tree text or JSON.
 */

import { getErrorMessage, writeExport } from '@profile-graph/discovery-core';
import type { ExportFormat } from '@profile-graph/discovery-core';
import { printError, printSuccess } from '../logger';
import { EXIT_CODES } from '../exit-codes';
import { loadReportFile } from './report-file';

export interface ExportCommandOptions {
    output: ExportFormat;
    outputDir: string;
    outputFile?: string;
    /** Clock for generated file names */
    now?: Date;
}

/**
 * Execute the export command
 *
 * @returns exit code
 */
export function executeExport(inputPath: string, options: ExportCommandOptions): number {
    const profiles = loadReportFile(inputPath);
    if (!profiles) {
        return EXIT_CODES.CONFIG_ERROR;
    }

    try {
        const filePath = writeExport(profiles, options.output, {
            outputDir: options.outputDir,
            filename: options.outputFile,
            now: options.now,
        });
        printSuccess(`Exported ${profiles.length} profiles to ${filePath}`);
        return EXIT_CODES.SUCCESS;
    } catch (error) {
        printError(getErrorMessage(error));
        return EXIT_CODES.EXECUTION_ERROR;
    }
}
