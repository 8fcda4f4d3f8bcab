/**
 * Segment pipeline: parse raw engine output, drop ignored phrases,
 * collapse repeated utterances, and (de)serialize normalized transcripts.
 */

import { Segment, TRANSCRIPT_COLUMNS } from './types';

const TRAILING_PUNCTUATION = new Set(['.', ',', '!', '?', ';', ':']);

// ============ PARSING ============

/**
 * Split file content into lines, tolerating CRLF.
 */
export function splitLines(content: string): string[] {
    return content.split(/\r?\n/);
}

/**
 * Parse raw engine output (`start\tend\ttext`) into segments for one speaker.
 *
 * The returned iterable is lazy and can be iterated any number of times.
 * Header, blank and malformed lines are skipped.
 */
export function parseRawSegments(lines: readonly string[], speaker: string): Iterable<Segment> {
    return {
        *[Symbol.iterator]() {
            for (const line of lines) {
                if (line.startsWith('start')) continue;
                if (line.trim() === '') continue;

                const fields = line.split('\t');
                if (fields.length < 3) continue;

                yield {
                    speaker,
                    start: fields[0],
                    end: fields[1],
                    text: fields[2].trim(),
                };
            }
        },
    };
}

export interface NumberedSegment {
    segment: Segment;
    /** 1-based line number in the source */
    line: number;
}

/**
 * Read the segments of a normalized transcript with their line numbers.
 * The header and blank lines are skipped, as are rows with fewer than 4 fields.
 */
export function* readNormalizedTranscript(content: string): Generator<NumberedSegment> {
    const lines = splitLines(content);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (i === 0 && isTranscriptHeader(line)) continue;
        if (line.trim() === '') continue;

        const fields = line.split('\t');
        if (fields.length < 4) continue;

        yield {
            segment: { speaker: fields[0], start: fields[1], end: fields[2], text: fields[3] },
            line: i + 1,
        };
    }
}

/**
 * Parse a normalized per-file transcript back into segments.
 */
export function parseNormalizedTranscript(content: string): Segment[] {
    return Array.from(readNormalizedTranscript(content), row => row.segment);
}

export function isTranscriptHeader(line: string): boolean {
    return line.startsWith(TRANSCRIPT_COLUMNS.join('\t'));
}

// ============ FILTERING ============

export interface IgnoreMatcher {
    shouldKeep(segment: Segment): boolean;
}

/**
 * Build a matcher that drops segments whose whole text is an ignore phrase,
 * optionally followed by one punctuation mark. Matching is case-insensitive.
 */
export function createIgnoreMatcher(phrases: readonly string[]): IgnoreMatcher {
    const ignored = new Set(
        phrases.map(p => p.trim().toLowerCase()).filter(p => p.length > 0)
    );

    return {
        shouldKeep(segment: Segment): boolean {
            const text = segment.text.trim().toLowerCase();
            if (ignored.has(text)) return false;

            const last = text.slice(-1);
            if (TRAILING_PUNCTUATION.has(last) && ignored.has(text.slice(0, -1))) {
                return false;
            }
            return true;
        },
    };
}

export function filterSegments(
    segments: Iterable<Segment>,
    matcher: IgnoreMatcher
): { kept: Segment[]; dropped: number } {
    const kept: Segment[] = [];
    let dropped = 0;

    for (const segment of segments) {
        if (matcher.shouldKeep(segment)) {
            kept.push(segment);
        } else {
            dropped++;
        }
    }

    return { kept, dropped };
}

// ============ COLLAPSING ============

function sameUtterance(a: Segment, b: Segment): boolean {
    return a.speaker === b.speaker && a.text.toLowerCase() === b.text.toLowerCase();
}

/**
 * Merge runs of consecutive segments with the same speaker and text.
 * The merged segment keeps the first start and text and takes the last end.
 */
export function collapseSegments(segments: Iterable<Segment>): Segment[] {
    const collapsed: Segment[] = [];
    let current: Segment | null = null;

    for (const segment of segments) {
        if (current && sameUtterance(current, segment)) {
            const merged: Segment = { ...current, end: segment.end };
            current = merged;
            continue;
        }
        if (current) collapsed.push(current);
        current = segment;
    }

    if (current) collapsed.push(current);
    return collapsed;
}

// ============ SERIALIZATION ============

export function formatSegment(segment: Segment): string {
    return [segment.speaker, segment.start, segment.end, segment.text].join('\t');
}

/**
 * Serialize segments as a normalized transcript: header, one line per segment,
 * single trailing newline.
 */
export function serializeTranscript(segments: Iterable<Segment>): string {
    const lines = [TRANSCRIPT_COLUMNS.join('\t')];
    for (const segment of segments) {
        lines.push(formatSegment(segment));
    }
    return lines.join('\n') + '\n';
}
