/**
 * File System Helper
 *
 * File operations used by the report sink, debug capture and config loader,
 * with failures routed through the run's ErrorHandler.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';

export class FileSystemHelper {
    constructor(private readonly errors: ErrorHandler) { }

    /**
     * Ensure a directory exists, creating it if necessary
     */
    ensureDir(dirPath: string): boolean {
        if (fs.existsSync(dirPath)) return true;

        return this.errors.safeExecuteSync(
            () => {
                fs.mkdirSync(dirPath, { recursive: true });
                return true;
            },
            { component: 'FileSystemHelper', operation: 'ensureDir', data: { dirPath } },
            false,
            ErrorSeverity.WARNING
        );
    }

    /**
     * Ensure the parent directory of a file exists
     */
    ensureDirForFile(filePath: string): boolean {
        return this.ensureDir(path.dirname(filePath));
    }

    /**
     * Read a UTF-8 text file. Returns null when the file does not exist or
     * cannot be read.
     */
    readText(filePath: string): string | null {
        if (!fs.existsSync(filePath)) return null;

        return this.errors.safeExecuteSync<string | null>(
            () => fs.readFileSync(filePath, 'utf-8'),
            { component: 'FileSystemHelper', operation: 'readText', data: { filePath } },
            null,
            ErrorSeverity.WARNING
        );
    }

    writeText(filePath: string, content: string): boolean {
        this.ensureDirForFile(filePath);

        return this.errors.safeExecuteSync(
            () => {
                fs.writeFileSync(filePath, content, 'utf-8');
                return true;
            },
            { component: 'FileSystemHelper', operation: 'writeText', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    writeBuffer(filePath: string, content: Buffer): boolean {
        this.ensureDirForFile(filePath);

        return this.errors.safeExecuteSync(
            () => {
                fs.writeFileSync(filePath, content);
                return true;
            },
            { component: 'FileSystemHelper', operation: 'writeBuffer', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    /**
     * Write pretty-printed JSON. JSON.stringify leaves non-ASCII characters
     * as literal UTF-8.
     */
    writeJSON(filePath: string, data: unknown): boolean {
        return this.writeText(filePath, `${JSON.stringify(data, null, 2)}\n`);
    }
}

export default FileSystemHelper;
