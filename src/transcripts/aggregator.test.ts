import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AggregationParseError } from '../shared/errors';
import { makeTempDir, removeDir } from '../testing/fake-engine';
import { serializeTranscript } from './segments';
import { aggregateTranscripts, parseTranscriptRows, sortByStart, speakerFileName } from './aggregator';

const HEADER = 'speaker\tstart\tend\ttext\n';

describe('parseTranscriptRows', () => {
    it('skips header, blank and short rows', () => {
        const rows = parseTranscriptRows(`${HEADER}bob\t0\t1000\thello\n\nbob\t5\n`, 'bob.tsv');
        expect(rows).toEqual([{ speaker: 'bob', start: '0', end: '1000', text: 'hello', startMs: 0 }]);
    });

    it('reads back what the processor writes', () => {
        const segments = [
            { speaker: 'carol', start: '500', end: '1500', text: 'hi there' },
            { speaker: 'carol', start: '2000', end: '2600', text: 'again, "quoted"' },
        ];
        const rows = parseTranscriptRows(serializeTranscript(segments), 'carol.tsv');
        expect(rows.map(({ startMs, ...segment }) => segment)).toEqual(segments);
        expect(rows.map(r => r.startMs)).toEqual([500, 2000]);
    });

    it('reports the line of a bad start after skipped lines', () => {
        expect(() => parseTranscriptRows(`${HEADER}\nbob\t1\nbob\t12s\t2\tx\n`, 'bob.tsv'))
            .toThrow('Non-numeric start "12s" in bob.tsv at line 4');
    });

    it('rejects a non-numeric start', () => {
        expect(() => parseTranscriptRows(`${HEADER}bob\t1.5\t2\tx\n`, 'bob.tsv')).toThrow(AggregationParseError);
        expect(() => parseTranscriptRows(`${HEADER}bob\tabc\t2\tx\n`, 'bob.tsv'))
            .toThrow('Non-numeric start "abc" in bob.tsv at line 2');
    });
});

describe('sortByStart', () => {
    it('orders by numeric start and keeps ties in input order', () => {
        const rows = parseTranscriptRows(
            `${HEADER}a\t500\t600\tlast\nb\t100\t200\ttie one\nc\t100\t150\ttie two\nd\t300\t400\tmiddle\n`,
            'mixed.tsv'
        );
        expect(sortByStart(rows).map(r => `${r.start}:${r.text}`)).toEqual([
            '100:tie one',
            '100:tie two',
            '300:middle',
            '500:last',
        ]);
    });

    it('sorts numerically, not lexically', () => {
        const rows = parseTranscriptRows(`${HEADER}a\t900\t1\tx\na\t10000\t1\ty\n`, 'a.tsv');
        expect(sortByStart(rows).map(r => r.start)).toEqual(['900', '10000']);
    });
});

describe('speakerFileName', () => {
    it('replaces characters that are not allowed in file names', () => {
        expect(speakerFileName('alice')).toBe('alice.tsv');
        expect(speakerFileName('a/b:c')).toBe('a_b_c.tsv');
    });
});

describe('aggregateTranscripts', () => {
    let root: string;
    let paths: { normalized: string; speakers: string; merged: string };

    beforeEach(async () => {
        root = await makeTempDir();
        paths = {
            normalized: path.join(root, 'normalized'),
            speakers: path.join(root, 'speakers'),
            merged: path.join(root, 'merged_transcript.tsv'),
        };
        await fs.mkdir(paths.normalized);
    });

    afterEach(async () => {
        await removeDir(root);
    });

    async function writeNormalized(name: string, rows: string[]): Promise<void> {
        await fs.writeFile(path.join(paths.normalized, name), HEADER + rows.map(r => `${r}\n`).join(''));
    }

    it('merges files into one stably sorted transcript and one file per speaker', async () => {
        await writeNormalized('1-bob_1.tsv', ['bob\t500\t900\tlate', 'bob\t100\t200\tfirst tie']);
        await writeNormalized('1-carol_1.tsv', ['carol\t100\t300\tsecond tie', 'carol\t300\t400\tmid']);

        const result = await aggregateTranscripts(paths);

        expect(result.rowCount).toBe(4);
        expect(result.speakers).toEqual(['bob', 'carol']);
        expect(await fs.readFile(paths.merged, 'utf-8')).toBe(
            HEADER +
            'bob\t100\t200\tfirst tie\n' +
            'carol\t100\t300\tsecond tie\n' +
            'carol\t300\t400\tmid\n' +
            'bob\t500\t900\tlate\n'
        );
        expect(await fs.readFile(path.join(paths.speakers, 'bob.tsv'), 'utf-8')).toBe(
            `${HEADER}bob\t100\t200\tfirst tie\nbob\t500\t900\tlate\n`
        );
        expect(await fs.readFile(path.join(paths.speakers, 'carol.tsv'), 'utf-8')).toBe(
            `${HEADER}carol\t100\t300\tsecond tie\ncarol\t300\t400\tmid\n`
        );
    });

    it('reproduces identical output when recomputed', async () => {
        await writeNormalized('a.tsv', ['x\t10\t20\tone']);
        await writeNormalized('b.tsv', ['y\t5\t8\ttwo']);

        const first = await aggregateTranscripts(paths);
        const merged = await fs.readFile(paths.merged, 'utf-8');
        const second = await aggregateTranscripts(paths);

        expect(first.written).toHaveLength(3);
        expect(second.written).toEqual([]);
        expect(await fs.readFile(paths.merged, 'utf-8')).toBe(merged);
    });

    it('removes speaker files for speakers that are gone', async () => {
        await fs.mkdir(paths.speakers);
        await fs.writeFile(path.join(paths.speakers, 'ghost.tsv'), HEADER);
        await writeNormalized('a.tsv', ['alice\t0\t1\thi']);

        await aggregateTranscripts(paths);

        expect((await fs.readdir(paths.speakers)).sort()).toEqual(['alice.tsv']);
    });

    it('writes an empty merged transcript when there is nothing to merge', async () => {
        const result = await aggregateTranscripts(paths);
        expect(result.rowCount).toBe(0);
        expect(await fs.readFile(paths.merged, 'utf-8')).toBe(HEADER);
    });

    it('writes nothing when a start is not numeric', async () => {
        await writeNormalized('a.tsv', ['alice\t0\t1\tfine']);
        await writeNormalized('b.tsv', ['bob\tsoon\t1\tbroken']);

        await expect(aggregateTranscripts(paths)).rejects.toThrow('Non-numeric start "soon" in b.tsv at line 2');
        await expect(fs.access(paths.merged)).rejects.toThrow();
    });
});
