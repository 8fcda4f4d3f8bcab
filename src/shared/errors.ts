/**
 * Error types shared across the batch pipeline.
 *
 * Per-file failures are returned as results; these are thrown only where a whole
 * pass (startup, aggregation, a state write) has to stop.
 */

export type BatchErrorCode =
    | 'CONFIG'
    | 'DEPENDENCY_MISSING'
    | 'ENGINE_INVOCATION'
    | 'AGGREGATION_PARSE'
    | 'STATE_WRITE'
    | 'STATE_SCHEMA';

export class BatchError extends Error {
    readonly code: BatchErrorCode;

    constructor(code: BatchErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Missing input folder, bad flags, unreadable config.json */
export class ConfigError extends BatchError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

export class DependencyMissingError extends BatchError {
    readonly missing: string[];

    constructor(missing: string[]) {
        super('DEPENDENCY_MISSING', `Required tools not found on PATH: ${missing.join(', ')}`);
        this.missing = missing;
    }
}

export class EngineInvocationError extends BatchError {
    readonly exitCode: number | null;

    constructor(message: string, exitCode: number | null) {
        super('ENGINE_INVOCATION', message);
        this.exitCode = exitCode;
    }
}

/**
 * A non-numeric start value while merging transcripts.
 * Coercing it would corrupt the sort order, so the aggregation pass stops.
 */
export class AggregationParseError extends BatchError {
    readonly file: string;
    readonly line: number;
    readonly value: string;

    constructor(file: string, line: number, value: string) {
        super('AGGREGATION_PARSE', `Non-numeric start "${value}" in ${file} at line ${line}`);
        this.file = file;
        this.line = line;
        this.value = value;
    }
}

export class StateWriteError extends BatchError {
    constructor(message: string, options?: { cause?: unknown; code?: 'STATE_WRITE' | 'STATE_SCHEMA' }) {
        super(options?.code ?? 'STATE_WRITE', message, options);
    }
}

export class StateSchemaError extends StateWriteError {
    readonly version: number;
    readonly expected: readonly string[];
    readonly found: readonly string[];

    constructor(version: number, expected: readonly string[], found: readonly string[]) {
        super(
            `State store columns [${found.join(', ')}] do not match schema v${version} [${expected.join(', ')}]. ` +
            'Re-run with --migrate-state to rewrite the store in the current schema.',
            { code: 'STATE_SCHEMA' }
        );
        this.version = version;
        this.expected = expected;
        this.found = found;
    }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
