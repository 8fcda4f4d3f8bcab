/**
 * Run State Tracker
 *
 * Append-only CSV record of every processing attempt. A file counts as done once
 * any attempt for it succeeded, which lets an interrupted batch resume by simply
 * running it again.
 */

import * as fs from 'fs/promises';
import { formatCSVRow, parseCSV } from '../shared/csv';
import { StateSchemaError, StateWriteError, errorMessage } from '../shared/errors';
import { isNotFound } from '../shared/write-if-changed';

// ============ SCHEMA ============

/** Bumped whenever STATE_COLUMNS changes */
export const STATE_SCHEMA_VERSION = 1;

export const STATE_COLUMNS = [
    'FileName',
    'FileSize',
    'ProcessingTime',
    'Status',
    'Timestamp',
    'PlayerName',
    'ErrorMessage',
] as const;

type StateColumn = typeof STATE_COLUMNS[number];

export type ProcessingStatus = 'Success' | 'Error';

export interface ProcessingRecord {
    fileName: string;
    fileSizeBytes: number;
    processingTimeSeconds: number;
    status: ProcessingStatus;
    /** ISO-8601 */
    timestamp: string;
    speakerLabel: string;
    /** Empty on success */
    errorMessage: string;
}

export interface RunStats {
    totalFiles: number;
    successCount: number;
    errorCount: number;
    totalDurationSeconds: number;
    averageDurationSeconds: number;
    totalSizeBytes: number;
}

export interface RunStateOptions {
    /** Rewrite a store with mismatching columns instead of failing */
    migrateSchema?: boolean;
}

function toNumber(value: string | undefined): number {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
}

function fromRow(row: Record<string, string>): ProcessingRecord {
    return {
        fileName: row.FileName ?? '',
        fileSizeBytes: toNumber(row.FileSize),
        processingTimeSeconds: toNumber(row.ProcessingTime),
        status: row.Status === 'Success' ? 'Success' : 'Error',
        timestamp: row.Timestamp ?? '',
        speakerLabel: row.PlayerName ?? '',
        errorMessage: row.ErrorMessage ?? '',
    };
}

function toRow(record: ProcessingRecord): Record<StateColumn, string> {
    return {
        FileName: record.fileName,
        FileSize: String(record.fileSizeBytes),
        ProcessingTime: record.processingTimeSeconds.toFixed(2),
        Status: record.status,
        Timestamp: record.timestamp,
        PlayerName: record.speakerLabel,
        ErrorMessage: record.errorMessage,
    };
}

function formatRecord(record: ProcessingRecord): string {
    const row = toRow(record);
    return formatCSVRow(STATE_COLUMNS.map(column => row[column]));
}

function sameColumns(found: readonly string[]): boolean {
    return found.length === STATE_COLUMNS.length && STATE_COLUMNS.every((c, i) => found[i] === c);
}

// ============ TRACKER ============

export class RunStateTracker {
    private readonly stateFile: string;
    private readonly options: RunStateOptions;
    private records: ProcessingRecord[] = [];
    private hasHeader = false;
    /** The store on disk does not end with a line break */
    private unterminated = false;

    private constructor(stateFile: string, options: RunStateOptions) {
        this.stateFile = stateFile;
        this.options = options;
    }

    /**
     * Open the store, loading existing records.
     * @throws StateSchemaError when the columns differ and migrateSchema is not set
     */
    static async open(stateFile: string, options: RunStateOptions = {}): Promise<RunStateTracker> {
        const tracker = new RunStateTracker(stateFile, options);
        await tracker.load();
        return tracker;
    }

    private async load(): Promise<void> {
        let content: string;
        try {
            content = await fs.readFile(this.stateFile, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) return;
            throw new StateWriteError(`Cannot read state store ${this.stateFile}: ${errorMessage(error)}`, { cause: error });
        }

        // Whitespace only: the first record rewrites the file with a header
        if (content.trim() === '') return;

        const table = parseCSV(content);
        this.records = table.rows.map(fromRow);
        this.hasHeader = true;
        this.unterminated = !content.endsWith('\n');

        if (!sameColumns(table.headers)) {
            if (!this.options.migrateSchema) {
                throw new StateSchemaError(STATE_SCHEMA_VERSION, STATE_COLUMNS, table.headers);
            }
            await this.rewrite();
        }
    }

    /**
     * Rewrite the whole store in the current schema, keeping every record
     */
    private async rewrite(): Promise<void> {
        const content = formatCSVRow(STATE_COLUMNS) + this.records.map(formatRecord).join('');
        try {
            await fs.writeFile(this.stateFile, content, 'utf-8');
            this.unterminated = false;
        } catch (error) {
            throw new StateWriteError(`Cannot migrate state store ${this.stateFile}: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * True if any attempt for this file succeeded
     */
    isProcessed(fileName: string): boolean {
        return this.records.some(r => r.fileName === fileName && r.status === 'Success');
    }

    /**
     * Append one record. Earlier rows are never touched.
     */
    async record(record: ProcessingRecord): Promise<void> {
        const line = formatRecord(record);
        try {
            if (!this.hasHeader) {
                await fs.writeFile(this.stateFile, formatCSVRow(STATE_COLUMNS) + line, 'utf-8');
                this.hasHeader = true;
            } else {
                // A last row without a line break would swallow the new one
                await fs.appendFile(this.stateFile, (this.unterminated ? '\n' : '') + line, 'utf-8');
            }
            this.unterminated = false;
        } catch (error) {
            throw new StateWriteError(`Cannot append to state store ${this.stateFile}: ${errorMessage(error)}`, { cause: error });
        }
        this.records.push(record);
    }

    getRecords(): readonly ProcessingRecord[] {
        return this.records;
    }

    getRecordsFor(fileName: string): ProcessingRecord[] {
        return this.records.filter(r => r.fileName === fileName);
    }

    stats(): RunStats {
        let successCount = 0;
        let totalDurationSeconds = 0;
        let totalSizeBytes = 0;

        for (const record of this.records) {
            if (record.status === 'Success') successCount++;
            totalDurationSeconds += record.processingTimeSeconds;
            totalSizeBytes += record.fileSizeBytes;
        }

        const totalFiles = this.records.length;
        return {
            totalFiles,
            successCount,
            errorCount: totalFiles - successCount,
            totalDurationSeconds,
            averageDurationSeconds: totalFiles > 0 ? totalDurationSeconds / totalFiles : 0,
            totalSizeBytes,
        };
    }
}

/**
 * Format seconds as "<m>m <s>s"
 */
export function formatDuration(seconds: number): string {
    const total = Math.round(seconds);
    const minutes = Math.floor(total / 60);
    return `${minutes}m ${total % 60}s`;
}
