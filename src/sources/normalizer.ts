import type { CanonicalField, CanonicalRecord, NormalizationResult, RawRecord } from '../types/index.js';
import { SchemaValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Header aliases per canonical field, compared after `cleanHeader()` and
 * lowercasing. Covers the standardized legacy export, Scopus CSV and
 * Web of Science field tags.
 */
const COLUMN_ALIASES: Record<CanonicalField, readonly string[]> = {
    document_id: ['doi', 'di'],
    title: ['title', 'ti', 'article title', 'document title'],
    abstract: ['abstract', 'ab'],
    authors: ['authors', 'author', 'au'],
    journal_name: ['journal_name', 'journal', 'source title', 'so', 'publication name'],
    publication_date: ['date', 'year', 'py', 'publication year', 'publication_date'],
    author_keywords: ['author keywords', 'keywords', 'de', 'sources'],
    index_keywords: ['index keywords', 'keywords plus', 'id'],
    vhb_ranking: ['vhbranking', 'vhb ranking', 'vhb'],
    abdc_ranking: ['abdcranking', 'abcdranking', 'abdc ranking', 'abdc'],
    citations: ['citations', 'cited by', 'times cited', 'tc'],
    url: ['url', 'link'],
    issn: ['issn', 'sn'],
    eissn: ['eissn', 'e-issn', 'ei'],
};

/** Canonical fields a table must provide, with the name reported when missing */
const REQUIRED_FIELDS: ReadonlyArray<[CanonicalField, string]> = [
    ['document_id', 'doi'],
    ['title', 'title'],
    ['abstract', 'abstract'],
];

const ALIAS_LOOKUP: ReadonlyMap<string, CanonicalField> = buildAliasLookup();

function buildAliasLookup(): Map<string, CanonicalField> {
    const lookup = new Map<string, CanonicalField>();
    for (const [field, aliases] of Object.entries(COLUMN_ALIASES)) {
        if (!isCanonicalField(field)) continue;
        for (const alias of aliases) lookup.set(alias, field);
    }
    return lookup;
}

function isCanonicalField(value: string): value is CanonicalField {
    return Object.prototype.hasOwnProperty.call(COLUMN_ALIASES, value);
}

/**
 * Clean a header exported by a spreadsheet: strip BOM, turn non-breaking
 * spaces into spaces, collapse whitespace and drop wrapping quotes.
 */
export function cleanHeader(header: string): string {
    return header
        .replace(/\uFEFF/g, '')
        .replace(/\u00A0/g, ' ')
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/^["']+|["']+$/g, '')
        .trim();
}

/**
 * Strip DOI resolver prefixes.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string): string {
    return doi
        .trim()
        .replace(/^https?:\/\/(?:dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim();
}

/**
 * Split a semicolon-delimited author list. Commas inside a single
 * "Last, First" name are kept. Duplicates (case-insensitive) are dropped.
 */
export function splitAuthors(raw: string): string[] {
    return dedupeCaseInsensitive(raw.split(';'));
}

/**
 * Split a keyword field on `;`, else `|`, else `,`. Case-insensitive
 * dedupe, first-seen order and casing kept.
 */
export function parseKeywords(raw: string): string[] {
    const delimiter = raw.includes(';') ? ';' : raw.includes('|') ? '|' : ',';
    return dedupeCaseInsensitive(raw.split(delimiter));
}

/**
 * First standalone four-digit run between 1800 and 2099, or null.
 * Lossy on purpose: "2020-05-01" → 2020, "May 2019" → 2019, "n.d." → null.
 */
export function extractYear(raw: string): number | null {
    for (const match of raw.matchAll(/(?<!\d)(\d{4})(?!\d)/g)) {
        const year = parseInt(match[1] ?? '', 10);
        if (year >= 1800 && year <= 2099) return year;
    }
    return null;
}

/**
 * Render a raw cell as a trimmed string. null, undefined and NaN become ''.
 */
export function cellToString(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
    return JSON.stringify(value);
}

/**
 * Column → canonical field assignment for one table. The first column that
 * maps to a field wins; later ones are kept as extras.
 */
export interface ColumnMapping {
    fields: Map<string, CanonicalField>;
    extras: Array<{ column: string; name: string }>;
}

export function mapColumns(columns: string[]): ColumnMapping {
    const fields = new Map<string, CanonicalField>();
    const taken = new Set<CanonicalField>();
    const extras: Array<{ column: string; name: string }> = [];

    for (const column of columns) {
        const name = cleanHeader(column);
        const field = ALIAS_LOOKUP.get(name.toLowerCase());
        if (field && !taken.has(field)) {
            fields.set(column, field);
            taken.add(field);
        } else if (name) {
            extras.push({ column, name });
        }
    }

    return { fields, extras };
}

/**
 * Normalize one uploaded table into canonical records.
 *
 * @param rows - Raw rows keyed by their original column names
 * @param columns - Column order; defaults to first-seen key order across rows
 * @throws SchemaValidationError when a required column is absent
 */
export function normalizeRecords(rows: RawRecord[], columns?: string[]): NormalizationResult {
    const columnOrder = columns ?? collectColumns(rows);
    const mapping = mapColumns(columnOrder);

    const mapped = new Set(mapping.fields.values());
    const missing = REQUIRED_FIELDS.filter(([field]) => !mapped.has(field)).map(([, name]) => name);
    if (missing.length > 0) {
        throw new SchemaValidationError(missing, columnOrder.map(cleanHeader));
    }

    const records: CanonicalRecord[] = [];
    const seen = new Set<string>();
    let missingRequired = 0;
    let duplicate = 0;

    for (const row of rows) {
        const values = new Map<CanonicalField, string>();
        for (const [column, field] of mapping.fields) {
            values.set(field, cellToString(row[column]));
        }

        const record = toCanonical(values, row, mapping);
        if (!record.document_id || !record.title || !record.abstract) {
            missingRequired++;
            continue;
        }
        // DOIs are case-insensitive
        const key = record.document_id.toLowerCase();
        if (seen.has(key)) {
            duplicate++;
            continue;
        }
        seen.add(key);
        records.push(record);
    }

    logger.info(
        { rows: rows.length, records: records.length, missingRequired, duplicate },
        'Normalized records'
    );

    return { records, dropped: { missingRequired, duplicate } };
}

function toCanonical(values: Map<CanonicalField, string>, row: RawRecord, mapping: ColumnMapping): CanonicalRecord {
    const text = (field: CanonicalField): string => values.get(field) ?? '';
    const optional = (field: CanonicalField): string | null => text(field) || null;

    const publicationDate = text('publication_date');
    const extras: Record<string, string> = {};
    for (const { column, name } of mapping.extras) {
        extras[name] = cellToString(row[column]);
    }

    return {
        document_id: stripDoiPrefix(text('document_id')),
        title: text('title'),
        abstract: text('abstract'),
        authors: text('authors'),
        journal_name: text('journal_name'),
        publication_date: publicationDate,
        year: extractYear(publicationDate),
        author_keywords: text('author_keywords'),
        index_keywords: text('index_keywords'),
        vhb_ranking: rankingCode(text('vhb_ranking')),
        abdc_ranking: rankingCode(text('abdc_ranking')),
        citations: parseCount(text('citations')),
        url: optional('url'),
        issn: optional('issn'),
        eissn: optional('eissn'),
        extras,
    };
}

function collectColumns(rows: RawRecord[]): string[] {
    const columns: string[] = [];
    const seen = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            if (seen.has(key)) continue;
            seen.add(key);
            columns.push(key);
        }
    }
    return columns;
}

function rankingCode(raw: string): string | null {
    if (!raw || raw.toUpperCase() === 'N/A') return null;
    return raw;
}

function parseCount(raw: string): number | null {
    if (!/^\d+(?:\.0+)?$/.test(raw)) return null;
    return parseInt(raw, 10);
}

function dedupeCaseInsensitive(parts: string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const part of parts) {
        const value = part.trim();
        if (!value) continue;
        const key = value.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(value);
    }
    return out;
}
