/**
 * Transcript types
 */

/**
 * One utterance. Timestamps are kept exactly as the engine wrote them
 * (integer milliseconds for whisper's tsv output).
 */
export interface Segment {
    readonly speaker: string;
    readonly start: string;
    readonly end: string;
    readonly text: string;
}

/** A segment read back from a normalized transcript, with its numeric start */
export interface TranscriptRow extends Segment {
    readonly startMs: number;
}

/** Canonical header of normalized, merged and per-speaker transcripts */
export const TRANSCRIPT_COLUMNS = ['speaker', 'start', 'end', 'text'] as const;

export type ProcessResult =
    | {
        ok: true;
        outputPath: string;
        /** Segments written after filtering and collapsing */
        segments: number;
        /** Segments dropped by the ignore list */
        dropped: number;
        /** Segments merged into a neighbour */
        collapsed: number;
    }
    | { ok: false; error: string };

export interface AggregateResult {
    rowCount: number;
    speakers: string[];
    mergedPath: string;
    /** Output files whose content changed */
    written: string[];
}
