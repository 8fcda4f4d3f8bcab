/**
 * Aggregator: merge every normalized per-file transcript into one
 * time-ordered transcript plus one transcript per speaker.
 *
 * Pure view over normalized/: recomputing from the same inputs
 * reproduces the same bytes.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { OutputPaths } from '../config/config';
import { AggregationParseError } from '../shared/errors';
import { writeIfChanged } from '../shared/write-if-changed';
import { readNormalizedTranscript, serializeTranscript } from './segments';
import { AggregateResult, TranscriptRow } from './types';

const INTEGER = /^-?\d+$/;

/**
 * Parse the data rows of one normalized transcript.
 * @throws AggregationParseError on a non-numeric start
 */
export function parseTranscriptRows(content: string, fileLabel: string): TranscriptRow[] {
    const rows: TranscriptRow[] = [];

    for (const { segment, line } of readNormalizedTranscript(content)) {
        const start = segment.start.trim();
        if (!INTEGER.test(start)) {
            throw new AggregationParseError(fileLabel, line, segment.start);
        }
        rows.push({ ...segment, startMs: parseInt(start, 10) });
    }

    return rows;
}

/**
 * Stable sort by numeric start (ties keep input order)
 */
export function sortByStart(rows: readonly TranscriptRow[]): TranscriptRow[] {
    return [...rows].sort((a, b) => a.startMs - b.startMs);
}

/**
 * Group rows by speaker, keeping order, speakers in order of first appearance
 */
export function groupBySpeaker(rows: readonly TranscriptRow[]): Map<string, TranscriptRow[]> {
    const bySpeaker = new Map<string, TranscriptRow[]>();
    for (const row of rows) {
        const existing = bySpeaker.get(row.speaker);
        if (existing) {
            existing.push(row);
        } else {
            bySpeaker.set(row.speaker, [row]);
        }
    }
    return bySpeaker;
}

/**
 * File name for a speaker transcript
 */
export function speakerFileName(speaker: string): string {
    return `${speaker.replace(/[\\/:*?"<>|\x00-\x1f]/g, '_')}.tsv`;
}

async function listTsv(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
        .filter(e => e.isFile() && e.name.toLowerCase().endsWith('.tsv'))
        .map(e => e.name)
        .sort();
}

/**
 * Read every normalized transcript and write the merged and per-speaker outputs.
 * @throws AggregationParseError (nothing is written in that case)
 */
export async function aggregateTranscripts(
    paths: Pick<OutputPaths, 'normalized' | 'speakers' | 'merged'>
): Promise<AggregateResult> {
    const rows: TranscriptRow[] = [];
    for (const name of await listTsv(paths.normalized)) {
        const content = await fs.readFile(path.join(paths.normalized, name), 'utf-8');
        rows.push(...parseTranscriptRows(content, name));
    }

    const sorted = sortByStart(rows);
    const written: string[] = [];

    if (await writeIfChanged(paths.merged, serializeTranscript(sorted))) {
        written.push(paths.merged);
    }

    await fs.mkdir(paths.speakers, { recursive: true });
    const bySpeaker = groupBySpeaker(sorted);
    const keep = new Set<string>();

    for (const [speaker, speakerRows] of bySpeaker) {
        const file = speakerFileName(speaker);
        keep.add(file);
        const target = path.join(paths.speakers, file);
        if (await writeIfChanged(target, serializeTranscript(speakerRows))) {
            written.push(target);
        }
    }

    // Speakers that no longer appear in any transcript
    for (const name of await listTsv(paths.speakers)) {
        if (!keep.has(name)) {
            await fs.rm(path.join(paths.speakers, name), { force: true });
        }
    }

    return {
        rowCount: sorted.length,
        speakers: [...bySpeaker.keys()],
        mergedPath: paths.merged,
        written,
    };
}
