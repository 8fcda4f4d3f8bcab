/**
 * Command-line flags
 *
 *   transcribe <inputFolder> [--output <dir>] [--force] [--post-process-only]
 *              [--cleanup] [--migrate-state] [--ignore "a,b"] [--config <file>]
 */

import { ConfigError } from '../shared/errors';
import { RunOptions } from './config';

export interface CliArgs extends RunOptions {
    /** Replaces the configured ignore list */
    ignorePhrases?: string[];
    configFile?: string;
    port?: number;
    help: boolean;
}

export const USAGE = `Usage: npm run transcribe -- <inputFolder> [options]

Options:
  -o, --output <dir>        Output folder (default: ../transcriptions next to the input)
  -f, --force               Re-transcribe files that already succeeded
  -p, --post-process-only   Skip the engine; rebuild transcripts from existing raw output
      --cleanup             Remove the engine working folder when done
      --migrate-state       Rewrite a state store with outdated columns
      --ignore "a,b"        Comma-separated phrases to drop (replaces config.json list)
      --config <file>       Path to config.json
      --port <n>            Status API port (status command)
  -h, --help                Show this help`;

/**
 * Parse argv (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        inputFolder: '',
        force: false,
        postProcessOnly: false,
        cleanup: false,
        migrateState: false,
        help: false,
    };
    const positional: string[] = [];

    const takeValue = (flag: string, i: number): string => {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
            throw new ConfigError(`Missing value for ${flag}`);
        }
        return value;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '-o':
            case '--output':
                args.outputFolder = takeValue(arg, i++);
                break;
            case '-f':
            case '--force':
                args.force = true;
                break;
            case '-p':
            case '--post-process-only':
                args.postProcessOnly = true;
                break;
            case '--cleanup':
                args.cleanup = true;
                break;
            case '--migrate-state':
                args.migrateState = true;
                break;
            case '--ignore':
                args.ignorePhrases = takeValue(arg, i++)
                    .split(',')
                    .map(p => p.trim())
                    .filter(p => p.length > 0);
                break;
            case '--config':
                args.configFile = takeValue(arg, i++);
                break;
            case '--port': {
                const port = Number(takeValue(arg, i++));
                if (!Number.isInteger(port) || port < 0 || port > 65535) {
                    throw new ConfigError(`Invalid port: ${argv[i]}`);
                }
                args.port = port;
                break;
            }
            case '-h':
            case '--help':
                args.help = true;
                break;
            default:
                if (arg.startsWith('-')) {
                    throw new ConfigError(`Unknown option: ${arg}`);
                }
                positional.push(arg);
        }
    }

    if (positional.length > 1) {
        throw new ConfigError(`Expected one input folder, got: ${positional.join(', ')}`);
    }
    if (positional.length === 0 && !args.help) {
        throw new ConfigError('Missing input folder');
    }
    args.inputFolder = positional[0] ?? '';

    return args;
}
