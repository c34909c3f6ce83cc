/**
 * Export Types
 */

/** Supported export formats */
export type ExportFormat = 'json' | 'csv' | 'tree';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'tree'];

/** File extension per format */
export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    csv: '.csv',
    tree: '.txt',
};

/** A flattened profile: one CSV row */
export type FlatProfileRow = Record<string, string | number | boolean>;

export interface TreeExportOptions {
    /** Children rendered per node before "... and N more profiles". Default: 10 */
    maxChildrenPerNode?: number;
    /** Levels rendered below each root. Default: 5 */
    maxDepth?: number;
    /** Timestamp printed in the banner. Default: now */
    generatedAt?: Date;
}

export interface WriteExportOptions {
    outputDir: string;
    /** File name; the format's extension is appended when missing */
    filename?: string;
    /** Clock used for generated file names and the tree banner */
    now?: Date;
    /** Tree rendering limits */
    tree?: Omit<TreeExportOptions, 'generatedAt'>;
}

export function isExportFormat(value: unknown): value is ExportFormat {
    return typeof value === 'string' && EXPORT_FORMATS.some(format => format === value);
}
