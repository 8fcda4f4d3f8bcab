/**
 * Configuration types and management for the transcription batch
 *
 * Engine settings come from config.json (merged over defaults); the folders and
 * run switches come from the command line. Both are resolved once into the
 * BatchContext that every component receives.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, errorMessage } from '../shared/errors';
import { isNotFound } from '../shared/write-if-changed';

// ============ CONSTANTS ============

/**
 * Supported audio file extensions
 */
export const SUPPORTED_AUDIO_EXTENSIONS = [
    '.mp3', '.mp4', '.mpeg', '.mpga', '.m4a', '.wav', '.webm', '.ogg', '.flac'
];

/**
 * Whisper model sizes
 */
export const WHISPER_MODELS = ['tiny', 'base', 'small', 'medium', 'large', 'large-v2', 'large-v3', 'turbo'] as const;
export type WhisperModel = typeof WHISPER_MODELS[number];

export const ENGINES = ['whisper', 'docker'] as const;
export type EngineKind = typeof ENGINES[number];

/**
 * Docker image for WhisperX
 */
export const WHISPERX_DOCKER_IMAGE = 'ghcr.io/jim60105/whisperx';

/**
 * Common whisper hallucinations on silence
 */
export const DEFAULT_IGNORE_PHRASES = [
    'you',
    'thank you',
    'thanks for watching',
    'thank you for watching',
    'thank you so much for watching',
    'bye',
    'please subscribe',
    'subtitles by the amara.org community',
];

// ============ INTERFACES ============

/**
 * Engine and pipeline settings (stored in config.json)
 */
export interface TranscriberConfig {
    /** Local whisper CLI or WhisperX via Docker */
    engine: EngineKind;

    /** Command used to run the local whisper CLI */
    whisperCommand: string;

    model: WhisperModel;

    /** Language passed to the engine (e.g. 'en') */
    language: string;

    /** Segments above this gzip compression ratio are treated as failed decodes */
    compressionRatioThreshold: number;

    /** Docker engine only: 'cuda' adds --gpus all */
    device: 'cuda' | 'cpu';

    /** Docker engine only */
    computeType: 'float16' | 'float32' | 'int8';

    /** Kill the engine after this many minutes (0 = wait forever) */
    timeoutMinutes: number;

    audioExtensions: string[];

    /** Case-insensitive phrases dropped from transcripts */
    ignorePhrases: string[];

    /** Port of the status API */
    statusPort: number;
}

/**
 * Switches for one run (from the command line)
 */
export interface RunOptions {
    inputFolder: string;
    /** Defaults to a "transcriptions" folder next to the input folder */
    outputFolder?: string;
    force: boolean;
    postProcessOnly: boolean;
    /** Remove the engine working folder when the run completes */
    cleanup: boolean;
    /** Rewrite a state store whose columns do not match the current schema */
    migrateState: boolean;
}

export interface OutputPaths {
    input: string;
    output: string;
    /** Engine working folder */
    raw: string;
    /** First copy of every raw engine output */
    originals: string;
    normalized: string;
    speakers: string;
    merged: string;
    stateFile: string;
    logFile: string;
}

// ============ DEFAULTS ============

export const DEFAULT_CONFIG: TranscriberConfig = {
    engine: 'whisper',
    whisperCommand: 'whisper',
    model: 'large-v3',
    language: 'en',
    compressionRatioThreshold: 2.4,
    device: 'cpu',
    computeType: 'int8',
    timeoutMinutes: 0,
    audioExtensions: SUPPORTED_AUDIO_EXTENSIONS,
    ignorePhrases: DEFAULT_IGNORE_PHRASES,
    statusPort: 3456,
};

const CONFIG_FILE = 'config.json';

// ============ MERGE ============

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function oneOf<T extends string>(options: readonly T[], value: unknown): value is T {
    return typeof value === 'string' && options.some(option => option === value);
}

/**
 * Merge user config with defaults.
 * Invalid values are reported through `warn` and replaced by the default.
 */
export function mergeWithDefaults(
    raw: unknown,
    warn: (message: string) => void = () => undefined
): TranscriberConfig {
    const config: TranscriberConfig = { ...DEFAULT_CONFIG };
    if (raw === undefined) return config;
    if (!isRecord(raw)) {
        warn('config.json must contain an object, using defaults');
        return config;
    }

    const invalid = (key: string) => warn(`Invalid value for "${key}" in config.json, using default`);

    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
            case 'engine':
                if (oneOf(ENGINES, value)) config.engine = value; else invalid(key);
                break;
            case 'model':
                if (oneOf(WHISPER_MODELS, value)) config.model = value; else invalid(key);
                break;
            case 'device':
                if (oneOf(['cuda', 'cpu'] as const, value)) config.device = value; else invalid(key);
                break;
            case 'computeType':
                if (oneOf(['float16', 'float32', 'int8'] as const, value)) config.computeType = value; else invalid(key);
                break;
            case 'whisperCommand':
                if (typeof value === 'string' && value.trim()) config.whisperCommand = value.trim(); else invalid(key);
                break;
            case 'language':
                if (typeof value === 'string' && value.trim()) config.language = value.trim(); else invalid(key);
                break;
            case 'compressionRatioThreshold':
                if (typeof value === 'number' && value > 0) config.compressionRatioThreshold = value; else invalid(key);
                break;
            case 'timeoutMinutes':
                if (typeof value === 'number' && value >= 0) config.timeoutMinutes = value; else invalid(key);
                break;
            case 'statusPort':
                if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < 65536) {
                    config.statusPort = value;
                } else {
                    invalid(key);
                }
                break;
            case 'audioExtensions':
                if (isStringArray(value)) {
                    config.audioExtensions = value.map(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());
                } else {
                    invalid(key);
                }
                break;
            case 'ignorePhrases':
                if (isStringArray(value)) config.ignorePhrases = value; else invalid(key);
                break;
            default:
                warn(`Unknown key "${key}" in config.json, ignoring`);
        }
    }

    return config;
}

// ============ LOAD ============

/**
 * Load config.json (or return defaults when it does not exist)
 */
export async function loadConfig(
    configFile: string = path.join(process.cwd(), CONFIG_FILE),
    warn?: (message: string) => void
): Promise<TranscriberConfig> {
    let data: string;
    try {
        data = await fs.readFile(configFile, 'utf-8');
    } catch (error) {
        if (isNotFound(error)) return mergeWithDefaults(undefined);
        throw new ConfigError(`Cannot read ${configFile}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (error) {
        throw new ConfigError(`Invalid JSON in ${configFile}: ${errorMessage(error)}`);
    }
    return mergeWithDefaults(raw, warn);
}

// ============ RESOLVED PATHS ============

/**
 * Default output folder: a "transcriptions" sibling of the input folder
 */
export function defaultOutputFolder(inputFolder: string): string {
    return path.join(path.dirname(path.resolve(inputFolder)), 'transcriptions');
}

/**
 * Get resolved absolute paths for a run
 */
export function getResolvedPaths(options: Pick<RunOptions, 'inputFolder' | 'outputFolder'>): OutputPaths {
    const input = path.resolve(options.inputFolder);
    const output = options.outputFolder
        ? path.resolve(options.outputFolder)
        : defaultOutputFolder(input);

    return {
        input,
        output,
        raw: path.join(output, 'raw'),
        originals: path.join(output, 'originals'),
        normalized: path.join(output, 'normalized'),
        speakers: path.join(output, 'speakers'),
        merged: path.join(output, 'merged_transcript.tsv'),
        stateFile: path.join(output, 'processing_state.csv'),
        logFile: path.join(output, 'transcription_log.csv'),
    };
}

/**
 * Create the output folders a run writes into
 */
export async function ensureOutputDirs(paths: OutputPaths): Promise<void> {
    for (const dir of [paths.output, paths.raw, paths.originals, paths.normalized, paths.speakers]) {
        await fs.mkdir(dir, { recursive: true });
    }
}
