import type {
    BiblioRagConfig,
    EmbeddingProvider,
    GraphSearchOutcome,
    HybridAnswer,
    IntentLabel,
    LlmProvider,
    RankedSource,
    RetrievalState,
} from '../types/index.js';
import type { DatasetGeneration } from '../storage/generations.js';
import type { EntityExtractor } from '../nlp/entity-extraction.js';
import { HeuristicEntityExtractor, detectTopicConstraint } from '../nlp/entity-extraction.js';
import { dot, normalizeVector } from '../nlp/similarity.js';
import { IntentClassifier, shouldUseGraph } from './intent-classifier.js';
import { GraphSearch } from './graph-search.js';
import {
    AnswerAssembler,
    FALLBACK_ANSWER,
    GENERATION_DISABLED_ANSWER,
    NO_MATCH_ANSWER,
    buildPrompt,
} from './answer-assembler.js';
import { GraphUnavailable, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export type RetrieverConfig = Pick<BiblioRagConfig, 'retrieval' | 'graph' | 'llm'>;

export interface HybridRetrieverOptions {
    dataset: DatasetGeneration;
    embedder: EmbeddingProvider;
    /** Text-generation capability; null answers with sources only */
    llm: LlmProvider | null;
    config: RetrieverConfig;
    extractor?: EntityExtractor;
}

interface VectorResult {
    sources: RankedSource[];
}

/**
 * Per-query engine over one dataset generation.
 *
 * Every query walks CLASSIFY → VECTOR_SEARCH → GRAPH_SEARCH | SKIP_GRAPH →
 * MERGE → RESPOND. Vector and graph searches run concurrently. `answer()`
 * never rejects: each failure narrows the result instead.
 *
 * A graph store that fails once is dropped for the rest of this
 * retriever's life and later queries run vector-only.
 */
export class HybridRetriever {
    private readonly dataset: DatasetGeneration;
    private readonly embedder: EmbeddingProvider;
    private readonly llm: LlmProvider | null;
    private readonly config: RetrieverConfig;
    private readonly extractor: EntityExtractor;
    private readonly classifier: IntentClassifier;
    private readonly assembler: AnswerAssembler | null;
    private graphSearch: GraphSearch | null;

    constructor(options: HybridRetrieverOptions) {
        this.dataset = options.dataset;
        this.embedder = options.embedder;
        this.llm = options.llm;
        this.config = options.config;
        this.extractor = options.extractor ?? new HeuristicEntityExtractor();
        this.classifier = new IntentClassifier(this.llm, { timeoutMs: this.config.llm.classifierTimeoutMs });
        this.assembler = this.llm
            ? new AnswerAssembler(this.llm, { temperature: this.config.llm.temperature, maxTokens: this.config.llm.maxTokens })
            : null;
        this.graphSearch =
            this.config.graph.enabled && this.dataset.graph
                ? new GraphSearch(this.dataset.graph, this.extractor, this.llm, {
                      resultLimit: this.config.graph.resultLimit,
                      nlFallback: this.config.graph.nlFallback,
                  })
                : null;
    }

    get generation(): number {
        return this.dataset.generation;
    }

    /** Whether the graph path is still in use for this session */
    get graphAvailable(): boolean {
        return this.graphSearch !== null;
    }

    async answer(query: string): Promise<HybridAnswer> {
        const started = Date.now();
        const deadline = started + this.config.retrieval.queryDeadlineMs;
        const states: RetrievalState[] = [];
        const enter = (state: RetrievalState): void => {
            states.push(state);
            logger.debug({ state, elapsedMs: Date.now() - started }, 'Retrieval state');
        };

        let intent: IntentLabel = 'OTHER';
        try {
            enter('CLASSIFY');
            intent = await this.classifier.classify(query);
            const graphSearch = shouldUseGraph(query) ? this.graphSearch : null;

            enter('VECTOR_SEARCH');
            const vectorPromise = this.vectorSearch(query);

            let graphPromise: Promise<GraphSearchOutcome | null>;
            if (graphSearch) {
                enter('GRAPH_SEARCH');
                graphPromise = this.runGraph(graphSearch, query, intent, deadline);
            } else {
                enter('SKIP_GRAPH');
                graphPromise = Promise.resolve(null);
            }

            const [vector, graph] = await Promise.all([vectorPromise, graphPromise]);

            enter('MERGE');
            const merged = await this.merge(query, vector, graph);

            enter('RESPOND');
            const result = await this.respond(query, intent, merged, graph, deadline, states);

            logger.info(
                {
                    intent,
                    outcome: result.outcome,
                    sources: result.sources.length,
                    graphUsed: result.graph_used,
                    template: result.graph_template,
                    elapsedMs: Date.now() - started,
                },
                'Query answered'
            );
            return result;
        } catch (error) {
            logger.error({ error: describeError(error) }, 'Query failed unexpectedly');
            if (states[states.length - 1] !== 'RESPOND') states.push('RESPOND');
            return this.build(query, intent, states, {
                answer: FALLBACK_ANSWER,
                outcome: 'fallback',
                sources: [],
                graph: null,
                graphUsed: false,
                generationFailed: true,
            });
        }
    }

    private async vectorSearch(query: string): Promise<VectorResult> {
        const { topK, threshold } = this.config.retrieval;
        try {
            const [embedding] = await this.embedder.embed([query]);
            if (!embedding) return { sources: [] };

            const hits = await this.dataset.vectorIndex.query(normalizeVector(embedding), topK);
            const sources = hits
                .map((hit) => ({ id: hit.id, similarity: 1 - hit.distance, origin: 'vector' as const, metadata: hit.metadata }))
                .filter((source) => source.similarity >= threshold);

            logger.debug({ hits: hits.length, kept: sources.length, threshold }, 'Vector search done');
            return { sources };
        } catch (error) {
            logger.error({ error: describeError(error) }, 'Vector search failed');
            return { sources: [] };
        }
    }

    private async runGraph(
        graphSearch: GraphSearch,
        query: string,
        intent: IntentLabel,
        deadline: number
    ): Promise<GraphSearchOutcome> {
        const budget = Math.min(this.config.llm.timeoutMs, deadline - Date.now());
        try {
            return await graphSearch.search(query, intent, budget);
        } catch (error) {
            if (error instanceof GraphUnavailable) {
                this.graphSearch = null;
                logger.warn({ error: describeError(error) }, 'Graph store unavailable, continuing vector-only');
                return { kind: 'unavailable', summary: 'Graph store unavailable' };
            }
            logger.error({ error: describeError(error) }, 'Graph search failed');
            return { kind: 'unavailable', summary: 'Graph search failed' };
        }
    }

    /**
     * Graph documents win when there are any: they are fetched from the
     * vector index at similarity 1.0, or scored against the topic of a
     * "papers about X by Y" question. A narrative result carries no
     * documents. Otherwise the vector ranking stands.
     */
    private async merge(
        query: string,
        vector: VectorResult,
        graph: GraphSearchOutcome | null
    ): Promise<{ sources: RankedSource[]; graphUsed: boolean }> {
        if (graph?.kind === 'narrative') return { sources: [], graphUsed: true };
        if (graph?.kind !== 'documents') return { sources: vector.sources, graphUsed: false };

        const documents = await this.dataset.vectorIndex.get(graph.documentIds);
        if (documents.length === 0) {
            logger.debug({ ids: graph.documentIds.length }, 'Graph documents missing from vector index');
            return { sources: vector.sources, graphUsed: false };
        }

        const constraint = detectTopicConstraint(query);
        if (constraint) {
            try {
                const [topicEmbedding] = await this.embedder.embed([constraint.topic]);
                if (topicEmbedding) {
                    const topic = normalizeVector(topicEmbedding);
                    const scored = documents.map((doc) => ({
                        id: doc.id,
                        similarity: dot(topic, doc.embedding),
                        origin: 'graph' as const,
                        metadata: doc.metadata,
                    }));
                    scored.sort((a, b) => b.similarity - a.similarity || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
                    return { sources: scored, graphUsed: true };
                }
            } catch (error) {
                logger.warn({ error: describeError(error) }, 'Topic re-ranking failed, keeping graph order');
            }
        }

        return {
            sources: documents.map((doc) => ({ id: doc.id, similarity: 1, origin: 'graph' as const, metadata: doc.metadata })),
            graphUsed: true,
        };
    }

    private async respond(
        query: string,
        intent: IntentLabel,
        merged: { sources: RankedSource[]; graphUsed: boolean },
        graph: GraphSearchOutcome | null,
        deadline: number,
        states: RetrievalState[]
    ): Promise<HybridAnswer> {
        const base = { sources: merged.sources, graph, graphUsed: merged.graphUsed };

        if (graph?.kind === 'narrative') {
            return this.build(query, intent, states, {
                ...base,
                answer: graph.summary,
                outcome: 'graph-narrative',
                generationFailed: false,
            });
        }

        if (merged.sources.length === 0) {
            const answer = graph?.kind === 'no-pattern' ? graph.summary : NO_MATCH_ANSWER;
            return this.build(query, intent, states, { ...base, answer, outcome: 'no-match', generationFailed: false });
        }

        if (!this.assembler) {
            return this.build(query, intent, states, {
                ...base,
                answer: GENERATION_DISABLED_ANSWER,
                outcome: 'fallback',
                generationFailed: false,
            });
        }

        const timeoutMs = Math.min(this.config.llm.timeoutMs, deadline - Date.now());
        if (timeoutMs <= 0) {
            logger.warn('Query deadline reached before generation');
            return this.build(query, intent, states, {
                ...base,
                answer: FALLBACK_ANSWER,
                outcome: 'fallback',
                generationFailed: true,
            });
        }

        const findings = graph?.kind === 'documents' && merged.graphUsed ? graph.summary : null;
        try {
            const answer = await this.assembler.invoke(buildPrompt(query, merged.sources, findings), timeoutMs);
            return this.build(query, intent, states, { ...base, answer, outcome: 'generated', generationFailed: false });
        } catch (error) {
            logger.warn({ error: describeError(error), timeoutMs }, 'Answer generation failed, returning sources only');
            return this.build(query, intent, states, {
                ...base,
                answer: FALLBACK_ANSWER,
                outcome: 'fallback',
                generationFailed: true,
            });
        }
    }

    private build(
        query: string,
        intent: IntentLabel,
        states: RetrievalState[],
        parts: {
            answer: string;
            outcome: HybridAnswer['outcome'];
            sources: RankedSource[];
            graph: GraphSearchOutcome | null;
            graphUsed: boolean;
            generationFailed: boolean;
        }
    ): HybridAnswer {
        const similarities = parts.sources.map((source) => source.similarity);
        const graph = parts.graph;
        const ran = graph && graph.kind !== 'no-pattern' && graph.kind !== 'unavailable' ? graph : null;

        return {
            query,
            answer: parts.answer,
            outcome: parts.outcome,
            intent,
            sources: parts.sources,
            similarities,
            best_score: similarities.length > 0 ? Math.max(...similarities) : 0,
            graph_used: parts.graphUsed,
            graph_template: ran?.template ?? null,
            graph_query: ran?.query ?? null,
            graph_summary: graph?.summary ?? null,
            generation: this.dataset.generation,
            generation_failed: parts.generationFailed,
            states: [...states],
        };
    }
}
