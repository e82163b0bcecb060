import type { DocumentMetadata } from './indexed-document.js';

/**
 * Closed set of query intents.
 */
export const INTENT_LABELS = [
    'PAPERS_BY_AUTHOR',
    'TOPICS_BY_AUTHOR',
    'COLLABORATIONS',
    'PAPERS_BY_TOPIC',
    'LIST_AUTHORS',
    'LIST_TOPICS',
    'CONCEPT_QUESTION',
    'OTHER',
] as const;

export type IntentLabel = (typeof INTENT_LABELS)[number];

/**
 * Entity mentions pulled out of a query.
 */
export interface ExtractedEntities {
    authors: string[];
    topics: string[];
}

/**
 * Parameterized graph query templates.
 */
export type GraphTemplateName =
    | 'papers-by-author'
    | 'papers-coauthored-by'
    | 'collaborators-of-author'
    | 'papers-by-topic'
    | 'papers-by-year'
    | 'list-all-authors'
    | 'list-all-topics'
    | 'topics-by-author'
    | 'authors-with-multiple-papers'
    | 'natural-language';

/**
 * Result of the graph retrieval path.
 *
 * - documents: explicit document ids (authoritative for MERGE)
 * - narrative: text answer with no documents (e.g. collaborator names)
 * - no-results: a template ran (with its one relaxed retry) and found nothing
 * - no-pattern: no template fit the query shape and no fallback was usable
 * - unavailable: the graph could not be queried for this session
 */
export type GraphSearchOutcome =
    | { kind: 'documents'; template: GraphTemplateName; query: string; summary: string; documentIds: string[] }
    | { kind: 'narrative'; template: GraphTemplateName; query: string; summary: string }
    | { kind: 'no-results'; template: GraphTemplateName; query: string; summary: string }
    | { kind: 'no-pattern'; summary: string }
    | { kind: 'unavailable'; summary: string };

/**
 * States a query passes through, in order. None is revisited.
 */
export type RetrievalState = 'CLASSIFY' | 'VECTOR_SEARCH' | 'GRAPH_SEARCH' | 'SKIP_GRAPH' | 'MERGE' | 'RESPOND';

export type SourceOrigin = 'graph' | 'vector';

/**
 * One grounding source in the final ranked list.
 */
export interface RankedSource {
    id: string;
    similarity: number;
    origin: SourceOrigin;
    metadata: DocumentMetadata;
}

/**
 * How the answer was produced.
 *
 * - generated: the generation capability answered from the sources
 * - graph-narrative: the graph's text result is the answer
 * - fallback: generation failed, timed out or is disabled; sources still valid
 * - no-match: nothing relevant was found (not an error)
 */
export type AnswerOutcome = 'generated' | 'graph-narrative' | 'fallback' | 'no-match';

/**
 * Response object of one hybrid query.
 */
export interface HybridAnswer {
    query: string;
    answer: string;
    outcome: AnswerOutcome;
    intent: IntentLabel;
    sources: RankedSource[];
    /** Same order as `sources` */
    similarities: number[];
    best_score: number;
    graph_used: boolean;
    graph_template: GraphTemplateName | null;
    graph_query: string | null;
    graph_summary: string | null;
    /** Dataset generation the query ran against */
    generation: number;
    generation_failed: boolean;
    states: RetrievalState[];
}
