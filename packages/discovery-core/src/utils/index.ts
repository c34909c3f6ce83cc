export {
    safeExists,
    safeReadFile,
    safeWriteFile,
    readYAML,
    getFileErrorMessage,
} from './file-utils';
export type { FileOperationResult } from './file-utils';
