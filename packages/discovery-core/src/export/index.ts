export { exportToJson, parseJsonExport } from './json-exporter';
export { flattenProfile, escapeCsvCell, exportToCsv } from './csv-exporter';
export { exportToTree, buildChildrenMap, formatTimestamp } from './tree-exporter';
export { renderExport, defaultExportFilename, writeExport } from './file-writer';
export { EXPORT_FORMATS, EXPORT_EXTENSIONS, isExportFormat } from './types';
export type {
    ExportFormat,
    FlatProfileRow,
    TreeExportOptions,
    WriteExportOptions,
} from './types';
