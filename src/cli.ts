/**
 * Command-line front ends: batch transcription and the status API
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Server } from 'http';
import { CliArgs, USAGE, parseArgs } from './config/args';
import { TranscriberConfig, getResolvedPaths, loadConfig } from './config/config';
import { ContextOverrides, createBatchContext } from './batch/context';
import { reportSummary, runBatch } from './batch/orchestrator';
import { createStatusApi, startStatusApi } from './batch/status-api';
import { BatchError, errorMessage } from './shared/errors';

async function isDirectory(dir: string): Promise<boolean> {
    try {
        return (await fs.stat(dir)).isDirectory();
    } catch {
        return false;
    }
}

function reportFatal(error: unknown): void {
    if (error instanceof BatchError) {
        console.error(`❌ ${error.message}`);
    } else {
        console.error('💥 Fatal error:', error);
    }
}

async function resolveConfig(args: CliArgs): Promise<TranscriberConfig> {
    const configFile = args.configFile ? path.resolve(args.configFile) : undefined;
    const config = await loadConfig(configFile, message => console.warn(`⚠️  ${message}`));
    if (args.ignorePhrases) {
        config.ignorePhrases = args.ignorePhrases;
    }
    return config;
}

/**
 * Run a batch. Resolves to the process exit code.
 */
export async function runTranscribeCli(argv: readonly string[], overrides: ContextOverrides = {}): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    } catch (error) {
        console.error(`❌ ${errorMessage(error)}\n`);
        console.error(USAGE);
        return 1;
    }
    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    const input = path.resolve(args.inputFolder);
    if (!(await isDirectory(input))) {
        console.error(`❌ Input folder does not exist: ${input}`);
        return 1;
    }

    try {
        const config = await resolveConfig(args);
        const ctx = await createBatchContext(config, args, overrides);
        await ctx.logger.info(
            `Starting ${args.postProcessOnly ? 'post-processing' : 'transcription'}: ${ctx.paths.input} -> ${ctx.paths.output}`
        );

        try {
            const summary = await runBatch(ctx);
            await reportSummary(summary, ctx);
            return summary.aggregate && !summary.aggregate.ok ? 1 : 0;
        } catch (error) {
            await ctx.logger.error(errorMessage(error));
            return 1;
        }
    } catch (error) {
        reportFatal(error);
        return 1;
    }
}

/**
 * Serve the status API for an output folder.
 * Resolves with the listening server, or an exit code when nothing was started.
 */
export async function runStatusCli(argv: readonly string[]): Promise<Server | number> {
    let args: CliArgs;
    try {
        args = parseArgs(argv);
    } catch (error) {
        console.error(`❌ ${errorMessage(error)}\n`);
        console.error(USAGE);
        return 1;
    }
    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    const config = await resolveConfig(args);
    const paths = getResolvedPaths(args);
    const port = args.port ?? config.statusPort;

    const server = await startStatusApi(createStatusApi(paths), port);
    console.log(`📊 Status API for ${paths.output} listening on http://localhost:${port}`);
    return server;
}
