/**
 * Export File Writer
 */

import * as path from 'path';
import { ErrorCode, ProfileGraphError } from '../errors';
import { safeWriteFile } from '../utils/file-utils';
import { DEFAULT_EXPORT_FILE_PREFIX } from '../config/defaults';
import type { ProfileRecord } from '../profile';
import { exportToCsv } from './csv-exporter';
import { exportToJson } from './json-exporter';
import { exportToTree } from './tree-exporter';
import { EXPORT_EXTENSIONS } from './types';
import type { ExportFormat, WriteExportOptions } from './types';

/**
 * Render records in the given format
 */
export function renderExport(
    profiles: ProfileRecord[],
    format: ExportFormat,
    options: Pick<WriteExportOptions, 'now' | 'tree'> = {}
): string {
    switch (format) {
        case 'json':
            return exportToJson(profiles);
        case 'csv':
            return exportToCsv(profiles);
        case 'tree':
            return exportToTree(profiles, { ...options.tree, generatedAt: options.now });
    }
}

/**
 * Default file name: `profile_graph[_tree]_YYYYMMDD_HHMMSS.<ext>`
 */
export function defaultExportFilename(format: ExportFormat, now: Date = new Date()): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
        `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    const kind = format === 'tree' ? '_tree' : '';
    return `${DEFAULT_EXPORT_FILE_PREFIX}${kind}_${stamp}${EXPORT_EXTENSIONS[format]}`;
}

/**
 * Write records to a file in `outputDir` and return its path.
 *
 * @throws ProfileGraphError (EXPORT_FAILED) when there is nothing to write or the write fails
 */
export function writeExport(
    profiles: ProfileRecord[],
    format: ExportFormat,
    options: WriteExportOptions
): string {
    const now = options.now ?? new Date();
    const extension = EXPORT_EXTENSIONS[format];

    let filename = options.filename ?? defaultExportFilename(format, now);
    if (!filename.endsWith(extension)) {
        filename += extension;
    }
    const filePath = path.join(options.outputDir, filename);

    if (profiles.length === 0) {
        throw new ProfileGraphError('No profiles to export', {
            code: ErrorCode.EXPORT_FAILED,
            meta: { filePath },
        });
    }

    const content = renderExport(profiles, format, { now, tree: options.tree });
    if (!content) {
        throw new ProfileGraphError('No root profiles to export', {
            code: ErrorCode.EXPORT_FAILED,
            meta: { filePath },
        });
    }

    const result = safeWriteFile(filePath, content);
    if (!result.success) {
        throw new ProfileGraphError(`Failed to write ${filePath}: ${result.error?.message ?? 'unknown error'}`, {
            code: ErrorCode.EXPORT_FAILED,
            cause: result.error,
            meta: { filePath },
        });
    }

    return filePath;
}
