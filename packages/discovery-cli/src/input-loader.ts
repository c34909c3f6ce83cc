/**
 * Seed Input Loader
 *
 * Collects seed usernames from positional arguments (comma-separated
 * values are split) and from a file with one username per line.
 */

import { safeReadFile } from '@profile-graph/discovery-core';
import type { FileOperationResult } from '@profile-graph/discovery-core';

/**
 * Split comma-separated values and drop blanks. Order and duplicates are kept.
 */
export function parseUsernames(values: string[]): string[] {
    return values
        .flatMap(value => value.split(','))
        .map(value => value.trim())
        .filter(value => value.length > 0);
}

/**
 * Read one username per non-empty line
 */
export function loadUsernamesFromFile(filePath: string): FileOperationResult<string[]> {
    const result = safeReadFile(filePath);
    if (!result.success || result.data === undefined) {
        return { success: false, error: result.error, errorCode: result.errorCode };
    }
    const usernames = result.data
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
    return { success: true, data: usernames };
}

/**
 * Positional usernames followed by the file's usernames
 */
export function collectUsernames(args: string[], filePath?: string): FileOperationResult<string[]> {
    const usernames = parseUsernames(args);
    if (!filePath) {
        return { success: true, data: usernames };
    }
    const fromFile = loadUsernamesFromFile(filePath);
    if (!fromFile.success) {
        return fromFile;
    }
    return { success: true, data: [...usernames, ...(fromFile.data ?? [])] };
}
