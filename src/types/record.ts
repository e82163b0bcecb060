/**
 * A raw tabular row as it comes out of the upload boundary (CSV/JSON reader).
 * Column names are whatever the exporting database used.
 */
export type RawRecord = Record<string, unknown>;

/**
 * CanonicalRecord: one bibliographic entry, normalized from any supported
 * export format into this common shape. Consumed by both the graph projector
 * and the vector indexer.
 */
export interface CanonicalRecord {
    /** DOI, used as the document id in both stores (never empty) */
    document_id: string;

    /** Paper title (never empty) */
    title: string;

    /** Full abstract text (never empty) */
    abstract: string;

    /** Raw author list, semicolon-delimited ("Smith, J.; Doe, A.") */
    authors: string;

    /** Journal / source title ('' when unknown) */
    journal_name: string;

    /** Raw publication date or year as exported ('' when unknown) */
    publication_date: string;

    /** Best-effort year pulled out of publication_date */
    year: number | null;

    /** Raw author keyword field */
    author_keywords: string;

    /** Raw index keyword field (Scopus "Index Keywords", WoS "Keywords Plus") */
    index_keywords: string;

    /** VHB ranking code (e.g. "A+", "B") */
    vhb_ranking: string | null;

    /** ABDC ranking code (e.g. "A*", "C") */
    abdc_ranking: string | null;

    /** Citation count from the export */
    citations: number | null;

    /** Landing page URL from the export */
    url: string | null;

    issn: string | null;
    eissn: string | null;

    /** Present but unmapped columns, in input column order */
    extras: Record<string, string>;
}

/**
 * Canonical field names a raw column can map to.
 */
export type CanonicalField = Exclude<keyof CanonicalRecord, 'year' | 'extras'>;

/**
 * Output of a normalization pass over one uploaded table.
 */
export interface NormalizationResult {
    records: CanonicalRecord[];
    dropped: {
        /** Rows with empty DOI, title or abstract */
        missingRequired: number;
        /** Rows repeating a DOI already seen in this batch */
        duplicate: number;
    };
}
