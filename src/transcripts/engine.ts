/**
 * Speech-to-text engine adapters
 *
 * The engine is an external process: audio file in, `<basename>.tsv` out.
 * Two ways to run it: the local whisper CLI, or WhisperX via Docker.
 */

import * as path from 'path';
import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import { TranscriberConfig, WHISPERX_DOCKER_IMAGE } from '../config/config';
import { DependencyMissingError } from '../shared/errors';

const execFileAsync = promisify(execFile);

// Keep only the end of stderr for error messages
const STDERR_TAIL = 4000;

export interface EngineRun {
    /** null when the process could not start or was killed */
    exitCode: number | null;
    stderr: string;
    timedOut: boolean;
}

export interface TranscriptionEngine {
    readonly name: string;
    /** @throws DependencyMissingError */
    checkAvailable(): Promise<void>;
    transcribe(audioPath: string, outputDir: string): Promise<EngineRun>;
}

/**
 * Where the engine writes its segment file for an audio file
 */
export function expectedOutputPath(audioPath: string, outputDir: string): string {
    return path.join(outputDir, `${path.parse(audioPath).name}.tsv`);
}

// ============ PROCESS HELPERS ============

/**
 * Run a process to completion, capturing stderr. Never rejects.
 */
export function runProcess(command: string, args: string[], timeoutMs = 0): Promise<EngineRun> {
    return new Promise((resolve) => {
        let stderr = '';
        let timedOut = false;
        let settled = false;

        const finish = (run: EngineRun) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            resolve(run);
        };

        const child = spawn(command, args, {
            stdio: ['ignore', 'inherit', 'pipe'],
            cwd: process.cwd(),
        });

        const timer = timeoutMs > 0
            ? setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
            }, timeoutMs)
            : undefined;

        child.stderr?.on('data', (data: Buffer) => {
            stderr = (stderr + data.toString()).slice(-STDERR_TAIL);
        });

        child.on('close', (code) => {
            finish({ exitCode: timedOut ? null : code, stderr, timedOut });
        });

        child.on('error', (err) => {
            finish({ exitCode: null, stderr: err.message, timedOut });
        });
    });
}

/**
 * True if the command can be started (a non-zero exit still counts as present)
 */
export async function commandExists(command: string, probeArgs: string[]): Promise<boolean> {
    try {
        await execFileAsync(command, probeArgs, { timeout: 30 * 1000 });
        return true;
    } catch (error) {
        return !(error instanceof Error && 'code' in error && error.code === 'ENOENT');
    }
}

/**
 * True if the command runs and exits 0 (output discarded)
 */
export async function commandSucceeds(command: string, args: string[]): Promise<boolean> {
    try {
        await execFileAsync(command, args, { timeout: 30 * 1000, maxBuffer: 10 * 1024 * 1024 });
        return true;
    } catch {
        return false;
    }
}

// ============ WHISPER CLI ============

export function buildWhisperArgs(audioPath: string, outputDir: string, config: TranscriberConfig): string[] {
    return [
        audioPath,
        '--model', config.model,
        '--language', config.language,
        '--condition_on_previous_text', 'False',
        '--compression_ratio_threshold', String(config.compressionRatioThreshold),
        '--output_dir', outputDir,
        '--output_format', 'tsv',
    ];
}

export class WhisperCliEngine implements TranscriptionEngine {
    readonly name = 'whisper';

    constructor(private readonly config: TranscriberConfig) {}

    async checkAvailable(): Promise<void> {
        const missing: string[] = [];
        if (!(await commandExists(this.config.whisperCommand, ['--help']))) {
            missing.push(this.config.whisperCommand);
        }
        // whisper decodes audio through ffmpeg
        if (!(await commandExists('ffmpeg', ['-version']))) {
            missing.push('ffmpeg');
        }
        if (missing.length > 0) {
            throw new DependencyMissingError(missing);
        }
    }

    transcribe(audioPath: string, outputDir: string): Promise<EngineRun> {
        return runProcess(
            this.config.whisperCommand,
            buildWhisperArgs(audioPath, outputDir, this.config),
            this.config.timeoutMinutes * 60 * 1000
        );
    }
}

// ============ WHISPERX (DOCKER) ============

export function buildDockerArgs(audioPath: string, outputDir: string, config: TranscriberConfig): string[] {
    const audioDir = path.dirname(path.resolve(audioPath));
    const filename = path.basename(audioPath);

    return [
        'run', '--rm',
        ...(config.device === 'cuda' ? ['--gpus', 'all'] : []),
        '-v', `${audioDir}:/audio:ro`,
        '-v', `${path.resolve(outputDir)}:/output`,
        `${WHISPERX_DOCKER_IMAGE}:no_model`,
        '--',
        `/audio/${filename}`,
        '--model', config.model,
        '--language', config.language,
        '--compute_type', config.computeType,
        '--condition_on_previous_text', 'False',
        '--compression_ratio_threshold', String(config.compressionRatioThreshold),
        '--output_dir', '/output',
        '--output_format', 'tsv',
    ];
}

export type ProcessRunner = (command: string, args: string[], timeoutMs?: number) => Promise<EngineRun>;
export type CommandProbe = (command: string, args: string[]) => Promise<boolean>;

export class WhisperXDockerEngine implements TranscriptionEngine {
    readonly name = 'whisperx (docker)';

    constructor(
        private readonly config: TranscriberConfig,
        private readonly run: ProcessRunner = runProcess,
        private readonly exists: CommandProbe = commandExists,
        private readonly succeeds: CommandProbe = commandSucceeds
    ) {}

    async checkAvailable(): Promise<void> {
        if (!(await this.exists('docker', ['--version']))) {
            throw new DependencyMissingError(['docker']);
        }

        const image = `${WHISPERX_DOCKER_IMAGE}:no_model`;
        if (await this.succeeds('docker', ['image', 'inspect', image])) return;

        // First pull can take a long time; no timeout
        const pull = await this.run('docker', ['pull', image]);
        if (pull.exitCode !== 0) {
            throw new DependencyMissingError([image]);
        }
    }

    transcribe(audioPath: string, outputDir: string): Promise<EngineRun> {
        return this.run(
            'docker',
            buildDockerArgs(audioPath, outputDir, this.config),
            this.config.timeoutMinutes * 60 * 1000
        );
    }
}

export function createEngine(config: TranscriberConfig): TranscriptionEngine {
    return config.engine === 'docker'
        ? new WhisperXDockerEngine(config)
        : new WhisperCliEngine(config);
}
