/**
 * Loads the profile records of a JSON export for re-export and viewing.
 */

import { getErrorMessage, getFileErrorMessage, parseJsonExport, safeReadFile } from '@profile-graph/discovery-core';
import type { ProfileRecord } from '@profile-graph/discovery-core';
import { printError } from '../logger';

/**
 * Records of the export at `filePath`, or undefined after printing why not
 */
export function loadReportFile(filePath: string): ProfileRecord[] | undefined {
    const result = safeReadFile(filePath);
    if (!result.success || result.data === undefined) {
        printError(getFileErrorMessage(result.errorCode ?? 'UNKNOWN', filePath));
        return undefined;
    }
    try {
        return parseJsonExport(result.data);
    } catch (error) {
        printError(`${filePath}: ${getErrorMessage(error)}`);
        return undefined;
    }
}
