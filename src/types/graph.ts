/**
 * Node labels of the scholarly relationship graph.
 */
export enum NodeLabel {
    Document = 'Document',
    Author = 'Author',
    Journal = 'Journal',
    RankingBody = 'RankingBody',
    Ranking = 'Ranking',
    Year = 'Year',
    Keyword = 'Keyword',
}

/**
 * Relationship types.
 *
 * Directed:
 *   HAS_AUTHOR (Document→Author), PUBLISHED_IN (Document→Journal),
 *   HAS_RATING (Journal→Ranking), ISSUED_BY (Ranking→RankingBody),
 *   HAS_KEYWORD (Document→Keyword), IN_YEAR (Document→Year)
 *
 * Undirected, stored with the smaller id as src_id:
 *   COLLABORATED_WITH (Author↔Author), SAME_YEAR_AS (Document↔Document)
 */
export enum RelationshipType {
    HAS_AUTHOR = 'HAS_AUTHOR',
    PUBLISHED_IN = 'PUBLISHED_IN',
    HAS_RATING = 'HAS_RATING',
    ISSUED_BY = 'ISSUED_BY',
    COLLABORATED_WITH = 'COLLABORATED_WITH',
    SAME_YEAR_AS = 'SAME_YEAR_AS',
    HAS_KEYWORD = 'HAS_KEYWORD',
    IN_YEAR = 'IN_YEAR',
}

export const UNDIRECTED_RELATIONSHIPS: ReadonlySet<RelationshipType> = new Set([
    RelationshipType.COLLABORATED_WITH,
    RelationshipType.SAME_YEAR_AS,
]);

export type KeywordKind = 'author' | 'index';

export interface DocumentNode {
    document_id: string;
    title: string;
    abstract: string;
    publication_date: string;
    year: number | null;
    journal_name: string;
    url: string | null;
    citations: number | null;
}

export interface AuthorNode {
    author_id: string;
    name: string;
}

export interface JournalNode {
    journal_id: string;
    name: string;
    issn: string | null;
    eissn: string | null;
}

export interface RankingBodyNode {
    body_id: string;
    name: string;
}

export interface RankingNode {
    ranking_id: string;
    body_id: string;
    code: string;
}

export interface YearNode {
    year_id: string;
    value: number;
}

export interface KeywordNode {
    keyword_id: string;
    name: string;
}

/**
 * A relationship between two graph nodes.
 */
export interface Relationship {
    type: RelationshipType;
    src_id: string;
    dst_id: string;

    /** 1.0 except COLLABORATED_WITH, where it counts shared documents */
    weight: number;

    /** Author position on the document (HAS_AUTHOR only) */
    position: number | null;

    /** Keyword field of origin (HAS_KEYWORD only) */
    kind: KeywordKind | null;
}

/**
 * Nodes and relationships derived from one batch of canonical records,
 * grouped by entity and relationship type.
 */
export interface ProjectedGraph {
    documents: DocumentNode[];
    authors: AuthorNode[];
    journals: JournalNode[];
    rankingBodies: RankingBodyNode[];
    rankings: RankingNode[];
    years: YearNode[];
    keywords: KeywordNode[];
    relationships: Record<RelationshipType, Relationship[]>;
}
