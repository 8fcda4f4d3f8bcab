/**
 * Batch Logger
 * Mirrors every message to the console and to an append-only CSV log
 * (Timestamp, Level, Message) in the output folder.
 */

import * as fs from 'fs/promises';
import { formatCSVRow } from '../shared/csv';
import { isNotFound } from '../shared/write-if-changed';

export type LogLevel = 'INFO' | 'WARNING' | 'ERROR';

export const LOG_COLUMNS = ['Timestamp', 'Level', 'Message'] as const;

export interface LoggerOptions {
    /** Echo to stdout/stderr (default true) */
    console?: boolean;
    /** Clock used for timestamps */
    now?: () => Date;
}

const CONSOLE_PREFIX: Record<LogLevel, string> = {
    INFO: 'ℹ️ ',
    WARNING: '⚠️ ',
    ERROR: '❌',
};

export class BatchLogger {
    private readonly logFile: string;
    private readonly echo: boolean;
    private readonly now: () => Date;
    private headerChecked = false;

    constructor(logFile: string, options: LoggerOptions = {}) {
        this.logFile = logFile;
        this.echo = options.console ?? true;
        this.now = options.now ?? (() => new Date());
    }

    async info(message: string): Promise<void> {
        await this.write('INFO', message, CONSOLE_PREFIX.INFO);
    }

    /** INFO entry shown with a success marker */
    async success(message: string): Promise<void> {
        await this.write('INFO', message, '✅');
    }

    async warn(message: string): Promise<void> {
        await this.write('WARNING', message, CONSOLE_PREFIX.WARNING);
    }

    async error(message: string): Promise<void> {
        await this.write('ERROR', message, CONSOLE_PREFIX.ERROR);
    }

    /**
     * Console-only output (progress lines, summaries)
     */
    print(message: string): void {
        if (this.echo) {
            process.stdout.write(`${message}\n`);
        }
    }

    private async write(level: LogLevel, message: string, marker: string): Promise<void> {
        const timestamp = this.now().toISOString();

        if (this.echo) {
            const line = `${marker} [${level}] ${message}\n`;
            if (level === 'ERROR') {
                process.stderr.write(line);
            } else {
                process.stdout.write(line);
            }
        }

        await this.ensureHeader();
        await fs.appendFile(this.logFile, formatCSVRow([timestamp, level, message]), 'utf-8');
    }

    private async ensureHeader(): Promise<void> {
        if (this.headerChecked) return;
        try {
            await fs.stat(this.logFile);
        } catch (error) {
            if (!isNotFound(error)) throw error;
            await fs.appendFile(this.logFile, formatCSVRow(LOG_COLUMNS), 'utf-8');
        }
        this.headerChecked = true;
    }
}
