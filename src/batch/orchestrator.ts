/**
 * Batch Orchestrator
 *
 * Walks the input folder one file at a time:
 *   Pending -> Skipped                 (already succeeded, no --force)
 *   Pending -> Running -> Succeeded    (engine ok, output present, normalized)
 *   Pending -> Running -> Failed       (anything else; recorded, batch continues)
 * then merges every normalized transcript.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, EngineInvocationError, errorMessage } from '../shared/errors';
import { isNotFound } from '../shared/write-if-changed';
import { RunStats, formatDuration } from '../state/run-state';
import { aggregateTranscripts } from '../transcripts/aggregator';
import { EngineRun, expectedOutputPath } from '../transcripts/engine';
import { processRawTranscript } from '../transcripts/processor';
import { extractSpeaker } from '../transcripts/speaker';
import { AggregateResult } from '../transcripts/types';
import { BatchContext } from './context';

// ============ TYPES ============

export type FileOutcome =
    | { state: 'Skipped'; fileName: string }
    | {
        state: 'Succeeded';
        fileName: string;
        speaker: string;
        seconds: number;
        segments: number;
        dropped: number;
        collapsed: number;
    }
    | { state: 'Failed'; fileName: string; speaker: string; seconds: number; error: string };

export type AggregateOutcome =
    | { ok: true; result: AggregateResult }
    | { ok: false; error: string };

export interface BatchSummary {
    mode: 'transcribe' | 'post-process';
    outcomes: FileOutcome[];
    total: number;
    skipped: number;
    succeeded: number;
    failed: number;
    elapsedSeconds: number;
    /** null when there was nothing to process */
    aggregate: AggregateOutcome | null;
    stats: RunStats;
}

// ============ DISCOVERY ============

/**
 * Audio files in the input folder, sorted by name
 * @throws ConfigError when the folder does not exist
 */
export async function findAudioFiles(folder: string, extensions: readonly string[]): Promise<string[]> {
    const entries = await fs.readdir(folder, { withFileTypes: true }).catch((error: unknown) => {
        if (isNotFound(error)) {
            throw new ConfigError(`Input folder does not exist: ${folder}`);
        }
        throw error;
    });

    const allowed = new Set(extensions.map(e => e.toLowerCase()));
    return entries
        .filter(e => e.isFile() && allowed.has(path.extname(e.name).toLowerCase()))
        .map(e => e.name)
        .sort()
        .map(name => path.join(folder, name));
}

/**
 * Files whose output name (basename without extension) is already taken by an
 * earlier file in the list, mapped to that earlier file
 */
export function findOutputCollisions(audioFiles: readonly string[]): Map<string, string> {
    const owners = new Map<string, string>();
    const collisions = new Map<string, string>();
    for (const audioPath of audioFiles) {
        const stem = path.parse(audioPath).name;
        const owner = owners.get(stem);
        if (owner) {
            collisions.set(audioPath, owner);
        } else {
            owners.set(stem, audioPath);
        }
    }
    return collisions;
}

async function listTsvFiles(dir: string): Promise<string[]> {
    try {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        return entries
            .filter(e => e.isFile() && e.name.toLowerCase().endsWith('.tsv'))
            .map(e => e.name);
    } catch (error) {
        if (isNotFound(error)) return [];
        throw error;
    }
}

/**
 * Raw engine outputs on disk, one per basename, sorted by name.
 * An archived original wins over the working copy in raw/.
 */
export async function findRawOutputs(paths: BatchContext['paths']): Promise<string[]> {
    const byName = new Map<string, string>();
    for (const name of await listTsvFiles(paths.raw)) {
        byName.set(name, path.join(paths.raw, name));
    }
    for (const name of await listTsvFiles(paths.originals)) {
        byName.set(name, path.join(paths.originals, name));
    }
    return [...byName.keys()].sort().map(name => byName.get(name) ?? name);
}

// ============ SINGLE FILE ============

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Why an engine run counts as failed, or null if it succeeded
 */
export async function checkEngineRun(
    run: EngineRun,
    outputPath: string,
    timeoutMinutes: number
): Promise<EngineInvocationError | null> {
    if (run.timedOut) {
        return new EngineInvocationError(`Engine timed out after ${timeoutMinutes} minute(s)`, null);
    }
    if (run.exitCode !== 0) {
        const detail = run.stderr.trim().split('\n').pop() ?? '';
        const status = run.exitCode === null ? 'could not run' : `exited with code ${run.exitCode}`;
        return new EngineInvocationError(`Engine ${status}${detail ? `: ${detail}` : ''}`, run.exitCode);
    }
    if (!(await fileExists(outputPath))) {
        return new EngineInvocationError(`Engine produced no output (expected ${path.basename(outputPath)})`, 0);
    }
    return null;
}

type AttemptResult =
    | { ok: true; segments: number; dropped: number; collapsed: number }
    | { ok: false; error: string };

async function attempt(audioPath: string, speaker: string, ctx: BatchContext): Promise<AttemptResult> {
    const outputPath = expectedOutputPath(audioPath, ctx.paths.raw);
    // A leftover from an earlier attempt must not pass for this run's output
    await fs.rm(outputPath, { force: true });
    const run = await ctx.engine.transcribe(audioPath, ctx.paths.raw);

    const failure = await checkEngineRun(run, outputPath, ctx.config.timeoutMinutes);
    if (failure) {
        return { ok: false, error: failure.message };
    }

    const processed = await processRawTranscript(outputPath, speaker, ctx);
    if (!processed.ok) {
        return { ok: false, error: `Post-processing failed: ${processed.error}` };
    }
    return { ok: true, segments: processed.segments, dropped: processed.dropped, collapsed: processed.collapsed };
}

/**
 * Transcribe and normalize one audio file, recording the attempt.
 * Per-file failures come back as a Failed outcome.
 */
export async function transcribeFile(audioPath: string, ctx: BatchContext): Promise<FileOutcome> {
    const fileName = path.basename(audioPath);
    const speaker = extractSpeaker(fileName);

    if (!ctx.options.force && ctx.state.isProcessed(fileName)) {
        await ctx.logger.info(`Skipping (already processed): ${fileName}`);
        return { state: 'Skipped', fileName };
    }

    await ctx.logger.info(`Transcribing ${fileName} (speaker: ${speaker})`);
    const started = Date.now();

    let sizeBytes = 0;
    let result: AttemptResult;
    try {
        sizeBytes = (await fs.stat(audioPath)).size;
        result = await attempt(audioPath, speaker, ctx);
    } catch (error) {
        result = { ok: false, error: errorMessage(error) };
    }

    const seconds = (Date.now() - started) / 1000;

    await ctx.state.record({
        fileName,
        fileSizeBytes: sizeBytes,
        processingTimeSeconds: seconds,
        status: result.ok ? 'Success' : 'Error',
        timestamp: new Date().toISOString(),
        speakerLabel: speaker,
        errorMessage: result.ok ? '' : result.error,
    });

    if (!result.ok) {
        await ctx.logger.error(`Failed ${fileName}: ${result.error}`);
        return { state: 'Failed', fileName, speaker, seconds, error: result.error };
    }

    await ctx.logger.success(
        `Processed ${fileName} in ${formatDuration(seconds)} ` +
        `(${result.segments} segments, ${result.dropped} dropped, ${result.collapsed} collapsed)`
    );
    return {
        state: 'Succeeded',
        fileName,
        speaker,
        seconds,
        segments: result.segments,
        dropped: result.dropped,
        collapsed: result.collapsed,
    };
}

/**
 * Record a file that cannot be transcribed because its output name is taken
 */
async function rejectCollision(audioPath: string, owner: string, ctx: BatchContext): Promise<FileOutcome> {
    const fileName = path.basename(audioPath);
    const speaker = extractSpeaker(fileName);
    const error = `Output ${path.parse(audioPath).name}.tsv is already used by ${path.basename(owner)}`;
    const sizeBytes = await fs.stat(audioPath).then(s => s.size, () => 0);

    await ctx.state.record({
        fileName,
        fileSizeBytes: sizeBytes,
        processingTimeSeconds: 0,
        status: 'Error',
        timestamp: new Date().toISOString(),
        speakerLabel: speaker,
        errorMessage: error,
    });
    await ctx.logger.error(`Failed ${fileName}: ${error}`);
    return { state: 'Failed', fileName, speaker, seconds: 0, error };
}

// ============ RUNS ============

function summarize(
    mode: BatchSummary['mode'],
    outcomes: FileOutcome[],
    started: number,
    aggregate: AggregateOutcome | null,
    ctx: BatchContext
): BatchSummary {
    return {
        mode,
        outcomes,
        total: outcomes.length,
        skipped: outcomes.filter(o => o.state === 'Skipped').length,
        succeeded: outcomes.filter(o => o.state === 'Succeeded').length,
        failed: outcomes.filter(o => o.state === 'Failed').length,
        elapsedSeconds: (Date.now() - started) / 1000,
        aggregate,
        stats: ctx.state.stats(),
    };
}

async function aggregate(ctx: BatchContext): Promise<AggregateOutcome> {
    try {
        const result = await aggregateTranscripts(ctx.paths);
        await ctx.logger.success(
            `Merged ${result.rowCount} segment(s) from ${result.speakers.length} speaker(s) into ${path.basename(result.mergedPath)}`
        );
        return { ok: true, result };
    } catch (error) {
        const message = errorMessage(error);
        await ctx.logger.error(`Aggregation failed: ${message}`);
        return { ok: false, error: message };
    }
}

async function cleanup(ctx: BatchContext): Promise<void> {
    if (!ctx.options.cleanup) return;
    await fs.rm(ctx.paths.raw, { recursive: true, force: true });
    await ctx.logger.info(`Removed engine working folder ${ctx.paths.raw}`);
}

/**
 * Rebuild normalized transcripts from raw outputs already on disk (no engine)
 */
export async function runPostProcess(ctx: BatchContext): Promise<BatchSummary> {
    const started = Date.now();
    const rawFiles = await findRawOutputs(ctx.paths);

    if (rawFiles.length === 0) {
        await ctx.logger.warn(`No raw transcripts found in ${ctx.paths.raw} or ${ctx.paths.originals}`);
        return summarize('post-process', [], started, null, ctx);
    }

    // Start from an empty normalized/ so reruns do not add up
    for (const name of await listTsvFiles(ctx.paths.normalized)) {
        await fs.rm(path.join(ctx.paths.normalized, name), { force: true });
    }

    await ctx.logger.info(`Post-processing ${rawFiles.length} raw transcript(s)`);
    const outcomes: FileOutcome[] = [];

    for (const rawPath of rawFiles) {
        const fileName = path.basename(rawPath);
        const speaker = extractSpeaker(fileName);
        const fileStarted = Date.now();
        const result = await processRawTranscript(rawPath, speaker, ctx);
        const seconds = (Date.now() - fileStarted) / 1000;

        if (result.ok) {
            await ctx.logger.success(`Normalized ${fileName} (${result.segments} segments, ${result.dropped} dropped)`);
            outcomes.push({
                state: 'Succeeded',
                fileName,
                speaker,
                seconds,
                segments: result.segments,
                dropped: result.dropped,
                collapsed: result.collapsed,
            });
        } else {
            await ctx.logger.error(`Failed ${fileName}: ${result.error}`);
            outcomes.push({ state: 'Failed', fileName, speaker, seconds, error: result.error });
        }
    }

    const merged = await aggregate(ctx);
    await cleanup(ctx);
    return summarize('post-process', outcomes, started, merged, ctx);
}

/**
 * Transcribe every audio file in the input folder, then merge.
 * @throws ConfigError, DependencyMissingError (before any file is touched)
 */
export async function runBatch(ctx: BatchContext): Promise<BatchSummary> {
    if (ctx.options.postProcessOnly) {
        return runPostProcess(ctx);
    }

    const started = Date.now();
    const audioFiles = await findAudioFiles(ctx.paths.input, ctx.config.audioExtensions);

    if (audioFiles.length === 0) {
        await ctx.logger.warn(`No audio files found in ${ctx.paths.input}`);
        return summarize('transcribe', [], started, null, ctx);
    }
    await ctx.logger.info(`Found ${audioFiles.length} audio file(s) in ${ctx.paths.input}`);

    const collisions = findOutputCollisions(audioFiles);
    for (const [audioPath, owner] of collisions) {
        await ctx.logger.warn(`${path.basename(audioPath)} has the same name as ${path.basename(owner)}; only the first is transcribed`);
    }

    const pending = audioFiles.filter(f =>
        !collisions.has(f) && (ctx.options.force || !ctx.state.isProcessed(path.basename(f)))
    );
    if (pending.length > 0) {
        await ctx.engine.checkAvailable();
        await ctx.logger.info(`Engine ready: ${ctx.engine.name} (model: ${ctx.config.model}, language: ${ctx.config.language})`);
    }

    const outcomes: FileOutcome[] = [];
    for (const audioPath of audioFiles) {
        const owner = collisions.get(audioPath);
        outcomes.push(owner ? await rejectCollision(audioPath, owner, ctx) : await transcribeFile(audioPath, ctx));
    }

    const merged = await aggregate(ctx);
    await cleanup(ctx);
    return summarize('transcribe', outcomes, started, merged, ctx);
}

// ============ REPORTING ============

/**
 * Print the run summary and log a one-line record of it
 */
export async function reportSummary(summary: BatchSummary, ctx: BatchContext): Promise<void> {
    const { logger } = ctx;
    const { stats } = summary;

    logger.print(`\n📊 Summary (${summary.mode}):`);
    logger.print(`   Files: ${summary.total}`);
    logger.print(`   Succeeded: ${summary.succeeded}`);
    logger.print(`   Skipped: ${summary.skipped}`);
    logger.print(`   Failed: ${summary.failed}`);
    logger.print(`   Elapsed: ${formatDuration(summary.elapsedSeconds)}`);
    logger.print(`\n🗂️  All runs (${ctx.paths.stateFile}):`);
    logger.print(`   Attempts: ${stats.totalFiles} (${stats.successCount} ok, ${stats.errorCount} errors)`);
    logger.print(`   Total time: ${formatDuration(stats.totalDurationSeconds)}`);
    logger.print(`   Average time: ${formatDuration(stats.averageDurationSeconds)}`);
    logger.print(`   Audio processed: ${(stats.totalSizeBytes / (1024 * 1024)).toFixed(1)} MB`);

    await logger.info(
        `Run complete (${summary.mode}): ${summary.total} file(s), ${summary.succeeded} succeeded, ` +
        `${summary.skipped} skipped, ${summary.failed} failed in ${formatDuration(summary.elapsedSeconds)}`
    );
}
