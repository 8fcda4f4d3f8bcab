import { describe, expect, it } from 'vitest';
import {
    collapseSegments,
    createIgnoreMatcher,
    filterSegments,
    parseNormalizedTranscript,
    parseRawSegments,
    serializeTranscript,
    splitLines,
} from './segments';
import { Segment } from './types';

function seg(speaker: string, start: string, end: string, text: string): Segment {
    return { speaker, start, end, text };
}

describe('parseRawSegments', () => {
    const lines = [
        'start\tend\ttext',
        '0\t1000\t  Hello there ',
        '',
        '   ',
        'bad line',
        '1000\t2000',
        '2000\t3000\tsecond\textra',
    ];

    it('skips header, blank and short lines and trims text', () => {
        expect([...parseRawSegments(lines, 'alice')]).toEqual([
            seg('alice', '0', '1000', 'Hello there'),
            seg('alice', '2000', '3000', 'second'),
        ]);
    });

    it('can be iterated more than once', () => {
        const parsed = parseRawSegments(lines, 'alice');
        expect([...parsed]).toEqual([...parsed]);
    });

    it('copies timestamps verbatim', () => {
        expect([...parseRawSegments(['00:01\tlater\tx'], 'bob')]).toEqual([seg('bob', '00:01', 'later', 'x')]);
    });

    it('handles CRLF content', () => {
        const parsed = parseRawSegments(splitLines('start\tend\ttext\r\n0\t5\thi\r\n'), 'bob');
        expect([...parsed]).toEqual([seg('bob', '0', '5', 'hi')]);
    });
});

describe('createIgnoreMatcher', () => {
    const matcher = createIgnoreMatcher(['um', ' Thank You ']);
    const keeps = (text: string) => matcher.shouldKeep(seg('a', '0', '1', text));

    it('drops exact matches in any case', () => {
        expect(keeps('Um')).toBe(false);
        expect(keeps('  um  ')).toBe(false);
        expect(keeps('thank you')).toBe(false);
    });

    it('drops a match followed by one punctuation mark', () => {
        expect(keeps('um.')).toBe(false);
        expect(keeps('um?')).toBe(false);
        expect(keeps('Thank you!')).toBe(false);
        expect(keeps('um;')).toBe(false);
    });

    it('keeps partial matches and extra punctuation', () => {
        expect(keeps('umbrella')).toBe(true);
        expect(keeps('well, um')).toBe(true);
        expect(keeps('um..')).toBe(true);
        expect(keeps('um-')).toBe(true);
    });

    it('keeps everything with an empty list', () => {
        expect(createIgnoreMatcher([]).shouldKeep(seg('a', '0', '1', ''))).toBe(true);
    });
});

describe('filterSegments', () => {
    it('counts dropped segments', () => {
        const segments = [seg('a', '0', '1', 'um'), seg('a', '1', '2', 'umbrella'), seg('a', '2', '3', 'Um.')];
        const { kept, dropped } = filterSegments(segments, createIgnoreMatcher(['um']));
        expect(kept).toEqual([seg('a', '1', '2', 'umbrella')]);
        expect(dropped).toBe(2);
    });
});

describe('collapseSegments', () => {
    it('merges consecutive same-speaker repeats, ignoring case', () => {
        const input = [
            seg('a', '0', '1', 'Hi'),
            seg('a', '1', '2', 'hi'),
            seg('a', '2', '3', 'HI'),
            seg('b', '3', '4', 'hi'),
            seg('a', '4', '5', 'hi'),
            seg('a', '5', '6', 'bye'),
        ];
        expect(collapseSegments(input)).toEqual([
            seg('a', '0', '3', 'Hi'),
            seg('b', '3', '4', 'hi'),
            seg('a', '4', '5', 'hi'),
            seg('a', '5', '6', 'bye'),
        ]);
    });

    it('takes the end of the last merged segment, not the largest', () => {
        const input = [seg('a', '0', '5000', 'x'), seg('a', '1000', '2000', 'x')];
        expect(collapseSegments(input)).toEqual([seg('a', '0', '2000', 'x')]);
    });

    it('is idempotent', () => {
        const once = collapseSegments([
            seg('a', '0', '1', 'go'),
            seg('a', '1', '2', 'go'),
            seg('a', '2', '3', 'stop'),
            seg('a', '3', '4', 'go'),
        ]);
        expect(collapseSegments(once)).toEqual(once);
    });

    it('returns nothing for no input', () => {
        expect(collapseSegments([])).toEqual([]);
    });

    it('does not modify its input', () => {
        const first = seg('a', '0', '1', 'x');
        collapseSegments([first, seg('a', '1', '2', 'x')]);
        expect(first.end).toBe('1');
    });
});

describe('serializeTranscript', () => {
    it('writes the header and one tab-separated line per segment', () => {
        const content = serializeTranscript([seg('bob', '0', '1000', 'hello'), seg('bob', '1000', '1500', 'again')]);
        expect(content).toBe('speaker\tstart\tend\ttext\nbob\t0\t1000\thello\nbob\t1000\t1500\tagain\n');
    });

    it('writes only the header for no segments', () => {
        expect(serializeTranscript([])).toBe('speaker\tstart\tend\ttext\n');
    });
});

describe('parseNormalizedTranscript', () => {
    it('round-trips through serialize', () => {
        const content = 'speaker\tstart\tend\ttext\ncarol\t500\t1500\thi there\n\nbroken\t1\n';
        const parsed = parseNormalizedTranscript(content);
        expect(parsed).toEqual([seg('carol', '500', '1500', 'hi there')]);
        expect(parseNormalizedTranscript(serializeTranscript(parsed))).toEqual(parsed);
    });
});
