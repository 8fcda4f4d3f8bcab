/**
 * Per-file processor: raw engine output -> normalized transcript
 *
 * archive original -> parse -> filter -> collapse -> write normalized/<name>.tsv
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { OutputPaths } from '../config/config';
import { errorMessage } from '../shared/errors';
import { isNotFound } from '../shared/write-if-changed';
import {
    IgnoreMatcher,
    collapseSegments,
    filterSegments,
    parseRawSegments,
    serializeTranscript,
    splitLines,
} from './segments';
import { ProcessResult } from './types';

export interface ProcessorContext {
    paths: Pick<OutputPaths, 'originals' | 'normalized'>;
    ignore: IgnoreMatcher;
}

/**
 * Copy the raw output to originals/ unless a copy is already there.
 * The first archived copy is never overwritten.
 * @returns true if a copy was made
 */
export async function archiveOriginal(rawPath: string, originalsDir: string): Promise<boolean> {
    const target = path.join(originalsDir, path.basename(rawPath));
    if (path.resolve(target) === path.resolve(rawPath)) return false;

    try {
        await fs.copyFile(rawPath, target, fs.constants.COPYFILE_EXCL);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
            return false;
        }
        throw error;
    }
}

/**
 * Normalized transcript path for a raw engine output
 */
export function normalizedPathFor(rawPath: string, normalizedDir: string): string {
    return path.join(normalizedDir, `${path.parse(rawPath).name}.tsv`);
}

/**
 * Normalize one raw engine output file. Never throws.
 */
export async function processRawTranscript(
    rawPath: string,
    speaker: string,
    ctx: ProcessorContext
): Promise<ProcessResult> {
    try {
        await archiveOriginal(rawPath, ctx.paths.originals);

        const content = await fs.readFile(rawPath, 'utf-8');
        const parsed = parseRawSegments(splitLines(content), speaker);
        const { kept, dropped } = filterSegments(parsed, ctx.ignore);
        const segments = collapseSegments(kept);

        const outputPath = normalizedPathFor(rawPath, ctx.paths.normalized);
        await fs.writeFile(outputPath, serializeTranscript(segments), 'utf-8');

        return {
            ok: true,
            outputPath,
            segments: segments.length,
            dropped,
            collapsed: kept.length - segments.length,
        };
    } catch (error) {
        return { ok: false, error: isNotFound(error) ? `Raw transcript not found: ${rawPath}` : errorMessage(error) };
    }
}
