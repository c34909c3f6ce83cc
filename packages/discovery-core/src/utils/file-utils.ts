/**
 * File Utilities
 *
 * File I/O with explicit result objects instead of thrown errors.
 * Used by the exporters and by the CLI for config and input files.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

/**
 * Result type for file operations that may fail.
 */
export interface FileOperationResult<T> {
    success: boolean;
    data?: T;
    error?: Error;
    errorCode?: string;
}

/**
 * Safely checks if a file or directory exists.
 */
export function safeExists(filePath: string): boolean {
    try {
        return fs.existsSync(filePath);
    } catch {
        // Unreadable parent: treat as non-existent
        return false;
    }
}

/**
 * Safely reads a UTF-8 file.
 *
 * @example
 * ```typescript
 * const result = safeReadFile('./usernames.txt');
 * if (!result.success) {
 *     printError(getFileErrorMessage(result.errorCode ?? 'UNKNOWN', 'usernames.txt'));
 * }
 * ```
 */
export function safeReadFile(filePath: string): FileOperationResult<string> {
    try {
        const data = fs.readFileSync(filePath, 'utf8');
        return { success: true, data };
    } catch (error) {
        return failure(error);
    }
}

/**
 * Safely writes a UTF-8 file, creating parent directories.
 */
export function safeWriteFile(filePath: string, content: string): FileOperationResult<void> {
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, content, 'utf8');
        return { success: true };
    } catch (error) {
        return failure(error);
    }
}

/**
 * Reads and parses a YAML file. The parsed value is not validated.
 */
export function readYAML(filePath: string): FileOperationResult<unknown> {
    const readResult = safeReadFile(filePath);
    if (!readResult.success || readResult.data === undefined) {
        return {
            success: false,
            error: readResult.error,
            errorCode: readResult.errorCode,
        };
    }

    try {
        const parsed: unknown = yaml.load(readResult.data);
        return { success: true, data: parsed };
    } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        return {
            success: false,
            error: new Error(`YAML parse error in ${filePath}: ${err.message}`),
            errorCode: 'YAML_PARSE_ERROR',
        };
    }
}

/**
 * Gets a user-friendly error message for common file operation errors.
 */
export function getFileErrorMessage(errorCode: string, context?: string): string {
    const prefix = context ? `${context}: ` : '';

    switch (errorCode) {
        case 'ENOENT':
            return `${prefix}File or directory not found`;
        case 'EACCES':
        case 'EPERM':
            return `${prefix}Permission denied`;
        case 'ENOTDIR':
            return `${prefix}Not a directory`;
        case 'EISDIR':
            return `${prefix}Is a directory`;
        case 'ENOSPC':
            return `${prefix}No space left on device`;
        case 'YAML_PARSE_ERROR':
            return `${prefix}Invalid YAML syntax`;
        default:
            return `${prefix}File operation failed`;
    }
}

function failure(error: unknown): { success: false; error: Error; errorCode: string } {
    const err = error instanceof Error ? error : new Error(String(error));
    return { success: false, error: err, errorCode: extractErrorCode(err) };
}

/**
 * Node.js file system errors carry a string `code`
 */
function extractErrorCode(error: Error): string {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return 'UNKNOWN';
}
