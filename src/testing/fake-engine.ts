/**
 * In-process stand-in for the speech-to-text engine, plus temp folder helpers.
 * Test-only; excluded from the build.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DependencyMissingError } from '../shared/errors';
import { EngineRun, TranscriptionEngine } from '../transcripts/engine';

export type FakeBehaviour =
    | { output: string }
    | { exitCode: number; stderr?: string }
    | { noOutput: true }
    | { timedOut: true };

export class FakeEngine implements TranscriptionEngine {
    readonly name = 'fake';
    readonly calls: string[] = [];
    availabilityChecks = 0;
    missingTools: string[] = [];

    /** Behaviour per audio file name; unknown files exit 1 */
    constructor(private readonly behaviours: Record<string, FakeBehaviour> = {}) {}

    async checkAvailable(): Promise<void> {
        this.availabilityChecks++;
        if (this.missingTools.length > 0) {
            throw new DependencyMissingError(this.missingTools);
        }
    }

    async transcribe(audioPath: string, outputDir: string): Promise<EngineRun> {
        const fileName = path.basename(audioPath);
        this.calls.push(fileName);

        const behaviour = this.behaviours[fileName];
        if (!behaviour) {
            return { exitCode: 1, stderr: `no behaviour for ${fileName}`, timedOut: false };
        }
        if ('output' in behaviour) {
            const target = path.join(outputDir, `${path.parse(fileName).name}.tsv`);
            await fs.writeFile(target, behaviour.output, 'utf-8');
            return { exitCode: 0, stderr: '', timedOut: false };
        }
        if ('exitCode' in behaviour) {
            return { exitCode: behaviour.exitCode, stderr: behaviour.stderr ?? '', timedOut: false };
        }
        if ('timedOut' in behaviour) {
            return { exitCode: null, stderr: '', timedOut: true };
        }
        return { exitCode: 0, stderr: '', timedOut: false };
    }
}

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'session-scribe-'));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Create placeholder audio files
 */
export async function writeAudioFiles(dir: string, names: string[]): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
    for (const name of names) {
        await fs.writeFile(path.join(dir, name), Buffer.alloc(16));
    }
}
