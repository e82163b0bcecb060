import { UndirectedGraph } from 'graphology';
import type {
    AuthorNode,
    CanonicalRecord,
    DocumentNode,
    JournalNode,
    KeywordKind,
    KeywordNode,
    ProjectedGraph,
    RankingBodyNode,
    RankingNode,
    Relationship,
    YearNode,
} from '../types/index.js';
import { RelationshipType } from '../types/index.js';
import { parseKeywords, splitAuthors } from '../sources/normalizer.js';
import { makeId } from '../utils/stable-id.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Ranking bodies whose codes are carried on canonical records.
 */
const RANKING_BODIES = [
    { name: 'VHB', field: 'vhb_ranking' },
    { name: 'ABDC', field: 'abdc_ranking' },
] as const;

type PairAttributes = { weight: number };

export interface ProjectorOptions {
    /** Warn when one year holds more documents than this (default 200) */
    sameYearBucketWarning?: number;
}

/**
 * Derive graph nodes and relationships from a batch of canonical records.
 *
 * Entities are keyed by stable id, so repeated names collapse into one node.
 * Co-authorship and same-year pairs are accumulated in undirected graphs
 * and emitted with the lexicographically smaller id as `src_id`.
 * All output lists are sorted, so projecting the same input twice gives
 * deep-equal results.
 */
export function projectGraph(records: CanonicalRecord[], options: ProjectorOptions = {}): ProjectedGraph {
    const bucketWarning = options.sameYearBucketWarning ?? 200;

    const documents = new Map<string, DocumentNode>();
    const authors = new Map<string, AuthorNode>();
    const journals = new Map<string, JournalNode>();
    const rankingBodies = new Map<string, RankingBodyNode>();
    const rankings = new Map<string, RankingNode>();
    const years = new Map<string, YearNode>();
    const keywords = new Map<string, KeywordNode>();

    const directed = new Map<string, Relationship>();
    const collaborations = new UndirectedGraph<Record<string, never>, PairAttributes>();
    const yearBuckets = new Map<number, string[]>();

    const link = (
        type: RelationshipType,
        src: string,
        dst: string,
        extra: Partial<Pick<Relationship, 'position' | 'kind'>> = {}
    ): void => {
        const key = `${type}|${src}|${dst}`;
        if (directed.has(key)) return;
        directed.set(key, {
            type,
            src_id: src,
            dst_id: dst,
            weight: 1,
            position: extra.position ?? null,
            kind: extra.kind ?? null,
        });
    };

    for (const record of records) {
        const docId = record.document_id;
        if (documents.has(docId)) continue;

        documents.set(docId, {
            document_id: docId,
            title: record.title,
            abstract: record.abstract,
            publication_date: record.publication_date,
            year: record.year,
            journal_name: record.journal_name,
            url: record.url,
            citations: record.citations,
        });

        // Authors + co-authorship
        const authorIds: string[] = [];
        splitAuthors(record.authors).forEach((name, index) => {
            const authorId = makeId('AUTHOR', name);
            if (!authors.has(authorId)) authors.set(authorId, { author_id: authorId, name });
            if (authorIds.includes(authorId)) return;
            authorIds.push(authorId);
            link(RelationshipType.HAS_AUTHOR, docId, authorId, { position: index + 1 });
        });

        for (let i = 0; i < authorIds.length; i++) {
            for (let j = i + 1; j < authorIds.length; j++) {
                addPair(collaborations, authorIds[i] ?? '', authorIds[j] ?? '');
            }
        }

        // Journal + rankings
        const journalName = record.journal_name.trim();
        if (journalName) {
            const journalId = makeId('JOURNAL', journalName);
            const existing = journals.get(journalId);
            if (existing) {
                existing.issn = existing.issn ?? record.issn;
                existing.eissn = existing.eissn ?? record.eissn;
            } else {
                journals.set(journalId, {
                    journal_id: journalId,
                    name: journalName,
                    issn: record.issn,
                    eissn: record.eissn,
                });
            }
            link(RelationshipType.PUBLISHED_IN, docId, journalId);

            for (const body of RANKING_BODIES) {
                const code = record[body.field]?.trim();
                if (!code || code.toUpperCase() === 'N/A') continue;

                const bodyId = makeId('RANKING_BODY', body.name);
                const rankingId = makeId('RANKING', `${body.name}:${code}`);
                if (!rankingBodies.has(bodyId)) rankingBodies.set(bodyId, { body_id: bodyId, name: body.name });
                if (!rankings.has(rankingId)) rankings.set(rankingId, { ranking_id: rankingId, body_id: bodyId, code });

                link(RelationshipType.HAS_RATING, journalId, rankingId);
                link(RelationshipType.ISSUED_BY, rankingId, bodyId);
            }
        }

        // Year
        if (record.year !== null) {
            const yearId = makeId('YEAR', String(record.year));
            if (!years.has(yearId)) years.set(yearId, { year_id: yearId, value: record.year });
            link(RelationshipType.IN_YEAR, docId, yearId);

            const bucket = yearBuckets.get(record.year) ?? [];
            bucket.push(docId);
            yearBuckets.set(record.year, bucket);
        }

        // Keywords: author keywords take precedence over index keywords
        const kinds = new Map<string, KeywordKind>();
        const addKeywords = (raw: string, kind: KeywordKind): void => {
            for (const name of parseKeywords(raw)) {
                const keywordId = makeId('KEYWORD', name);
                if (!keywords.has(keywordId)) keywords.set(keywordId, { keyword_id: keywordId, name });
                if (!kinds.has(keywordId)) kinds.set(keywordId, kind);
            }
        };
        addKeywords(record.author_keywords, 'author');
        addKeywords(record.index_keywords, 'index');
        for (const [keywordId, kind] of kinds) {
            link(RelationshipType.HAS_KEYWORD, docId, keywordId, { kind });
        }
    }

    // Same-year pairs: quadratic per bucket
    const sameYear = new UndirectedGraph<Record<string, never>, PairAttributes>();
    for (const [year, docIds] of yearBuckets) {
        if (docIds.length > bucketWarning) {
            logger.warn(
                { year, documents: docIds.length, pairs: (docIds.length * (docIds.length - 1)) / 2 },
                'Large same-year bucket'
            );
        }
        for (let i = 0; i < docIds.length; i++) {
            for (let j = i + 1; j < docIds.length; j++) {
                addPair(sameYear, docIds[i] ?? '', docIds[j] ?? '');
            }
        }
    }

    const relationships = emptyRelationships();
    for (const rel of directed.values()) relationships[rel.type].push(rel);
    relationships[RelationshipType.COLLABORATED_WITH] = pairRelationships(collaborations, RelationshipType.COLLABORATED_WITH);
    relationships[RelationshipType.SAME_YEAR_AS] = pairRelationships(sameYear, RelationshipType.SAME_YEAR_AS);
    for (const list of Object.values(relationships)) list.sort(compareRelationships);

    const projected: ProjectedGraph = {
        documents: sortBy([...documents.values()], (d) => d.document_id),
        authors: sortBy([...authors.values()], (a) => a.author_id),
        journals: sortBy([...journals.values()], (j) => j.journal_id),
        rankingBodies: sortBy([...rankingBodies.values()], (b) => b.body_id),
        rankings: sortBy([...rankings.values()], (r) => r.ranking_id),
        years: sortBy([...years.values()], (y) => y.year_id),
        keywords: sortBy([...keywords.values()], (k) => k.keyword_id),
        relationships,
    };

    logger.info(
        {
            documents: projected.documents.length,
            authors: projected.authors.length,
            journals: projected.journals.length,
            collaborations: relationships[RelationshipType.COLLABORATED_WITH].length,
            sameYearPairs: relationships[RelationshipType.SAME_YEAR_AS].length,
        },
        'Graph projection complete'
    );

    return projected;
}

/**
 * Total relationship count across all types.
 */
export function countRelationships(graph: ProjectedGraph): number {
    return Object.values(graph.relationships).reduce((sum, list) => sum + list.length, 0);
}

function addPair(graph: UndirectedGraph<Record<string, never>, PairAttributes>, a: string, b: string): void {
    if (!a || !b || a === b) return;
    graph.mergeNode(a);
    graph.mergeNode(b);
    if (graph.hasEdge(a, b)) {
        graph.setEdgeAttribute(a, b, 'weight', graph.getEdgeAttribute(a, b, 'weight') + 1);
    } else {
        graph.addEdge(a, b, { weight: 1 });
    }
}

function pairRelationships(
    graph: UndirectedGraph<Record<string, never>, PairAttributes>,
    type: RelationshipType
): Relationship[] {
    const out: Relationship[] = [];
    graph.forEachEdge((_edge, attributes, source, target) => {
        const [src, dst] = source < target ? [source, target] : [target, source];
        out.push({
            type,
            src_id: src,
            dst_id: dst,
            weight: type === RelationshipType.COLLABORATED_WITH ? attributes.weight : 1,
            position: null,
            kind: null,
        });
    });
    return out;
}

function emptyRelationships(): Record<RelationshipType, Relationship[]> {
    return {
        [RelationshipType.HAS_AUTHOR]: [],
        [RelationshipType.PUBLISHED_IN]: [],
        [RelationshipType.HAS_RATING]: [],
        [RelationshipType.ISSUED_BY]: [],
        [RelationshipType.COLLABORATED_WITH]: [],
        [RelationshipType.SAME_YEAR_AS]: [],
        [RelationshipType.HAS_KEYWORD]: [],
        [RelationshipType.IN_YEAR]: [],
    };
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function compareRelationships(a: Relationship, b: Relationship): number {
    return compareStrings(a.src_id, b.src_id) || compareStrings(a.dst_id, b.dst_id);
}

function sortBy<T>(items: T[], key: (item: T) => string): T[] {
    return items.sort((a, b) => compareStrings(key(a), key(b)));
}
