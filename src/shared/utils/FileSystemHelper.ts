/**
 * File System Helper
 *
 * Artifact writes go through here. A failed write is logged and reported as
 * `false`/`undefined`; it never aborts a visit.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';
import type { Logger } from '../../core/Logger.js';

export class FileSystemHelper {
    /**
     * Ensure a directory exists, creating it if necessary
     */
    static ensureDir(dirPath: string, logger?: Logger): boolean {
        if (fs.existsSync(dirPath)) return true;

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.mkdirSync(dirPath, { recursive: true });
                return true;
            },
            { component: 'FileSystemHelper', operation: 'ensureDir', data: { dirPath }, logger },
            false,
            ErrorSeverity.WARNING
        );
    }

    static ensureDirForFile(filePath: string, logger?: Logger): boolean {
        return this.ensureDir(path.dirname(filePath), logger);
    }

    /**
     * Write text or bytes, returning the path on success
     */
    static safeWrite(filePath: string, content: string | Buffer, logger?: Logger): string | undefined {
        this.ensureDirForFile(filePath, logger);

        return ErrorHandler.safeExecuteSync<string | undefined>(
            () => {
                fs.writeFileSync(filePath, content);
                return filePath;
            },
            { component: 'FileSystemHelper', operation: 'safeWrite', data: { filePath }, logger },
            undefined,
            ErrorSeverity.ERROR
        );
    }

    static safeWriteJSON(filePath: string, data: unknown, logger?: Logger): string | undefined {
        return this.safeWrite(filePath, `${JSON.stringify(data, null, 2)}\n`, logger);
    }
}

export default FileSystemHelper;
