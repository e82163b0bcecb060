import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { makeId } from '../utils/stable-id.js';
import {
    cleanHeader,
    extractYear,
    mapColumns,
    normalizeRecords,
    parseKeywords,
    splitAuthors,
    stripDoiPrefix,
} from '../sources/normalizer.js';
import { detectDelimiter, parseCsv } from '../sources/csv.js';
import { parseJsonRecords, readRecordsFile } from '../sources/file-reader.js';
import { BiblioRagError, SchemaValidationError } from '../utils/errors.js';
import { makeTmpDir, removeDir } from './helpers.js';

describe('makeId', () => {
    it('should be stable across case and surrounding whitespace', () => {
        expect(makeId('AUTHOR', '  Smith, J. ')).toBe(makeId('AUTHOR', 'smith, j.'));
    });

    it('should have the prefix and 24 hex characters', () => {
        expect(makeId('YEAR', '2020')).toMatch(/^YEAR_[0-9a-f]{24}$/);
    });

    it('should separate prefixes', () => {
        expect(makeId('AUTHOR', 'Marketing')).not.toBe(makeId('KEYWORD', 'Marketing'));
    });

    it('should separate different values', () => {
        expect(makeId('AUTHOR', 'Smith, J.')).not.toBe(makeId('AUTHOR', 'Smith, K.'));
    });
});

describe('normalizer helpers', () => {
    it('should clean spreadsheet headers', () => {
        expect(cleanHeader('\uFEFF"Article Title" ')).toBe('Article Title');
        expect(cleanHeader('  Cited   by ')).toBe('Cited by');
    });

    it('should strip DOI resolver prefixes', () => {
        expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('http://dx.doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('doi: 10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('10.1234/test')).toBe('10.1234/test');
    });

    it('should split authors on semicolons and dedupe', () => {
        expect(splitAuthors('Smith, J.; Doe, A.; smith, j.;  ')).toEqual(['Smith, J.', 'Doe, A.']);
    });

    it('should split keywords on the strongest delimiter present', () => {
        expect(parseKeywords('a, b; c')).toEqual(['a, b', 'c']);
        expect(parseKeywords('a | b')).toEqual(['a', 'b']);
        expect(parseKeywords('Trust, trust, Loyalty')).toEqual(['Trust', 'Loyalty']);
        expect(parseKeywords('')).toEqual([]);
    });

    it('should extract a plausible year', () => {
        expect(extractYear('2020-05-01')).toBe(2020);
        expect(extractYear('May 2019')).toBe(2019);
        expect(extractYear('n.d.')).toBeNull();
        expect(extractYear('12345')).toBeNull();
        expect(extractYear('1700, 1999')).toBe(1999);
    });

    it('should map aliases and keep the first column per field', () => {
        const mapping = mapColumns(['DI', 'Article Title', 'AB', 'DOI', 'Funding']);
        expect([...mapping.fields.entries()]).toEqual([
            ['DI', 'document_id'],
            ['Article Title', 'title'],
            ['AB', 'abstract'],
        ]);
        expect(mapping.extras).toEqual([
            { column: 'DOI', name: 'DOI' },
            { column: 'Funding', name: 'Funding' },
        ]);
    });
});

describe('normalizeRecords', () => {
    it('should map a standardized export row', () => {
        const { records, dropped } = normalizeRecords([
            {
                DOI: 'https://doi.org/10.1/a',
                Title: 'Brand trust',
                Abstract: 'About trust.',
                Authors: 'Smith, J.; Doe, A.',
                Journal_Name: 'Journal of Marketing',
                Date: '2020-03-01',
                Sources: 'trust; brands',
                VHBRanking: 'A',
                ABDCRanking: 'N/A',
                Citations: '12.0',
                Notes: 'checked',
            },
        ]);

        expect(dropped).toEqual({ missingRequired: 0, duplicate: 0 });
        expect(records).toEqual([
            {
                document_id: '10.1/a',
                title: 'Brand trust',
                abstract: 'About trust.',
                authors: 'Smith, J.; Doe, A.',
                journal_name: 'Journal of Marketing',
                publication_date: '2020-03-01',
                year: 2020,
                author_keywords: 'trust; brands',
                index_keywords: '',
                vhb_ranking: 'A',
                abdc_ranking: null,
                citations: 12,
                url: null,
                issn: null,
                eissn: null,
                extras: { Notes: 'checked' },
            },
        ]);
    });

    it('should drop rows missing required values and duplicate DOIs', () => {
        const { records, dropped } = normalizeRecords([
            { DOI: '10.1/A', Title: 'One', Abstract: 'x' },
            { DOI: '10.1/a', Title: 'One again', Abstract: 'y' },
            { DOI: '', Title: 'No doi', Abstract: 'z' },
            { DOI: '10.1/b', Title: 'No abstract', Abstract: '  ' },
        ]);

        expect(records.map((r) => r.document_id)).toEqual(['10.1/A']);
        expect(dropped).toEqual({ missingRequired: 2, duplicate: 1 });
    });

    it('should reject a table without required columns', () => {
        try {
            normalizeRecords([{ Title: 'x', Authors: 'y' }]);
            expect.unreachable('should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(SchemaValidationError);
            if (!(error instanceof SchemaValidationError)) return;
            expect(error.missingFields).toEqual(['doi', 'abstract']);
            expect(error.foundColumns).toEqual(['Title', 'Authors']);
        }
    });

    it('should reject an empty header even with no rows', () => {
        expect(() => normalizeRecords([], [])).toThrow(SchemaValidationError);
    });

    it('should ignore non-numeric citation counts', () => {
        const { records } = normalizeRecords([{ DOI: '10.1/a', Title: 't', Abstract: 'a', 'Cited by': 'many' }]);
        expect(records[0]?.citations).toBeNull();
    });
});

describe('CSV reader', () => {
    it('should detect the delimiter from the header', () => {
        expect(detectDelimiter('a;b;c\n1;2;3')).toBe(';');
        expect(detectDelimiter('a\tb\n1\t2')).toBe('\t');
        expect(detectDelimiter('"a;b",c,d\n')).toBe(',');
    });

    it('should parse quotes, doubled quotes and embedded newlines', () => {
        const table = parseCsv('\uFEFFDOI,Title,Abstract\r\n10.1/a,"Trust, ""brands""","line one\nline two"\r\n\r\n10.1/b,Short\n');
        expect(table.columns).toEqual(['DOI', 'Title', 'Abstract']);
        expect(table.rows).toEqual([
            { DOI: '10.1/a', Title: 'Trust, "brands"', Abstract: 'line one\nline two' },
            { DOI: '10.1/b', Title: 'Short', Abstract: '' },
        ]);
    });

    it('should return an empty table for empty text', () => {
        expect(parseCsv('')).toEqual({ columns: [], rows: [] });
    });
});

describe('readRecordsFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTmpDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('should read CSV and TSV files', () => {
        const csv = path.join(dir, 'export.csv');
        fs.writeFileSync(csv, 'DOI;Title;Abstract\n10.1/a;T;A\n');
        expect(readRecordsFile(csv).rows).toEqual([{ DOI: '10.1/a', Title: 'T', Abstract: 'A' }]);

        const tsv = path.join(dir, 'export.tsv');
        fs.writeFileSync(tsv, 'DI\tTI\tAB\n10.1/b\tT2\tA2\n');
        expect(readRecordsFile(tsv).columns).toEqual(['DI', 'TI', 'AB']);
    });

    it('should read a JSON array of records', () => {
        const file = path.join(dir, 'export.json');
        fs.writeFileSync(file, JSON.stringify([{ DOI: '10.1/a', Title: 'T' }, 'skip', { Abstract: 'A' }]));
        expect(readRecordsFile(file)).toEqual({
            columns: ['DOI', 'Title', 'Abstract'],
            rows: [{ DOI: '10.1/a', Title: 'T' }, { Abstract: 'A' }],
        });
    });

    it('should reject JSON that is not an array', () => {
        expect(() => parseJsonRecords('{"a":1}')).toThrow(BiblioRagError);
    });

    it('should reject unsupported extensions', () => {
        const file = path.join(dir, 'export.xlsx');
        fs.writeFileSync(file, 'binary');
        expect(() => readRecordsFile(file)).toThrow(/Unsupported file type "\.xlsx"/);
    });
});
