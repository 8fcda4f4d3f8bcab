import { describe, expect, it } from 'vitest';
import { formatCSVRow, parseCSV, parseCSVRows } from './csv';

describe('parseCSV', () => {
    it('keys rows by header and handles quoted fields', () => {
        const table = parseCSV('Timestamp,Level,Message\r\n2026-01-01,INFO,"a, ""quoted"" value"\n2026-01-02,ERROR,"two\nlines"\n');
        expect(table.headers).toEqual(['Timestamp', 'Level', 'Message']);
        expect(table.rows).toEqual([
            { Timestamp: '2026-01-01', Level: 'INFO', Message: 'a, "quoted" value' },
            { Timestamp: '2026-01-02', Level: 'ERROR', Message: 'two\nlines' },
        ]);
    });

    it('fills missing cells with empty strings', () => {
        expect(parseCSV('A,B\n1\n').rows).toEqual([{ A: '1', B: '' }]);
    });

    it('returns no headers for empty content', () => {
        expect(parseCSV('')).toEqual({ headers: [], rows: [] });
    });
});

describe('formatCSVRow', () => {
    it('quotes only when needed', () => {
        expect(formatCSVRow(['plain', 'with,comma', 'say "hi"', 'multi\nline'])).toBe(
            'plain,"with,comma","say ""hi""","multi\nline"\n'
        );
    });

    it('parses back what it writes', () => {
        const values = ['x', 'a,b', '"q"', ''];
        expect(parseCSVRows(formatCSVRow(values))).toEqual([values]);
    });
});
