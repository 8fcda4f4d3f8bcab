/**
 * Write files only when their content actually changed, so re-running
 * aggregation over the same transcripts leaves outputs untouched.
 */

import * as fs from 'fs/promises';

/**
 * Write content to a file only if it differs from what is on disk.
 * @returns true if the file was written, false if skipped (no changes).
 */
export async function writeIfChanged(filePath: string, newContent: string): Promise<boolean> {
    try {
        const existingContent = await fs.readFile(filePath, 'utf-8');
        if (existingContent === newContent) {
            return false;
        }
    } catch (error) {
        if (!isNotFound(error)) throw error;
    }

    await fs.writeFile(filePath, newContent, 'utf-8');
    return true;
}

/**
 * True for ENOENT errors from fs calls
 */
export function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
