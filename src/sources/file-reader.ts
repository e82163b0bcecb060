import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import type { RawRecord } from '../types/index.js';
import { BiblioRagError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseCsv } from './csv.js';

const logger = getLogger();

/**
 * Raw table read from an uploaded file, before normalization.
 */
export interface RawTable {
    /** Columns in file order */
    columns: string[];
    rows: RawRecord[];
}

/**
 * Read a `.csv`, `.tsv` or `.json` export into raw rows.
 * JSON files must hold an array of objects.
 */
export function readRecordsFile(filePath: string): RawTable {
    const extension = extname(filePath).toLowerCase();
    const text = readFileSync(filePath, 'utf-8');

    let table: RawTable;
    switch (extension) {
        case '.csv':
            table = parseCsv(text);
            break;
        case '.tsv':
            table = parseCsv(text, '\t');
            break;
        case '.json':
            table = parseJsonRecords(text, filePath);
            break;
        default:
            throw new BiblioRagError(
                'UNSUPPORTED_FILE',
                `Unsupported file type "${extension || '(none)'}": expected .csv, .tsv or .json`
            );
    }

    logger.debug({ filePath, rows: table.rows.length, columns: table.columns.length }, 'Read records file');
    return table;
}

/**
 * Parse a JSON array of row objects. Column order is first-seen key order.
 */
export function parseJsonRecords(text: string, label = 'input'): RawTable {
    const parsed: unknown = JSON.parse(text.startsWith('\uFEFF') ? text.slice(1) : text);
    if (!Array.isArray(parsed)) {
        throw new BiblioRagError('UNSUPPORTED_FILE', `${label}: expected a JSON array of records`);
    }

    const rows: RawRecord[] = [];
    const columns: string[] = [];
    const seen = new Set<string>();

    const items: unknown[] = parsed;
    for (const item of items) {
        if (!isRecord(item)) continue;
        rows.push(item);
        for (const key of Object.keys(item)) {
            if (seen.has(key)) continue;
            seen.add(key);
            columns.push(key);
        }
    }

    return { columns, rows };
}

function isRecord(value: unknown): value is RawRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
