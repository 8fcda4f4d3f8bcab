/**
 * Everything a run needs, resolved once at startup and passed explicitly.
 */

import { OutputPaths, RunOptions, TranscriberConfig, ensureOutputDirs, getResolvedPaths } from '../config/config';
import { RunStateTracker } from '../state/run-state';
import { TranscriptionEngine, createEngine } from '../transcripts/engine';
import { IgnoreMatcher, createIgnoreMatcher } from '../transcripts/segments';
import { BatchLogger, LoggerOptions } from './logger';

export interface BatchContext {
    config: TranscriberConfig;
    options: RunOptions;
    paths: OutputPaths;
    logger: BatchLogger;
    state: RunStateTracker;
    engine: TranscriptionEngine;
    ignore: IgnoreMatcher;
}

export interface ContextOverrides {
    /** Replaces the engine built from config (tests use a fake) */
    engine?: TranscriptionEngine;
    logger?: LoggerOptions;
}

/**
 * Create output folders, open the log and state stores, and build the engine.
 * @throws StateSchemaError when the state store needs --migrate-state
 */
export async function createBatchContext(
    config: TranscriberConfig,
    options: RunOptions,
    overrides: ContextOverrides = {}
): Promise<BatchContext> {
    const paths = getResolvedPaths(options);
    await ensureOutputDirs(paths);

    const logger = new BatchLogger(paths.logFile, overrides.logger);
    const state = await RunStateTracker.open(paths.stateFile, { migrateSchema: options.migrateState });

    return {
        config,
        options,
        paths,
        logger,
        state,
        engine: overrides.engine ?? createEngine(config),
        ignore: createIgnoreMatcher(config.ignorePhrases),
    };
}
