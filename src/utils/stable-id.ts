import { createHash } from 'node:crypto';

/**
 * Prefixes for hash-derived graph node ids. Documents use their DOI instead.
 */
export type IdPrefix = 'AUTHOR' | 'JOURNAL' | 'RANKING_BODY' | 'RANKING' | 'YEAR' | 'KEYWORD';

/**
 * Normalization applied before hashing: trim + lowercase.
 */
export function normalizeIdValue(value: string): string {
    return value.trim().toLowerCase();
}

/**
 * Deterministic node id: `${prefix}_${sha256(normalized)[0..24]}`.
 * Equal normalized values map to the same node across separate imports.
 */
export function makeId(prefix: IdPrefix, value: string): string {
    const digest = createHash('sha256').update(normalizeIdValue(value), 'utf8').digest('hex');
    return `${prefix}_${digest.slice(0, 24)}`;
}
