import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { ingestTable } from '../builder/dataset-builder.js';
import { HashingEmbedder } from '../embedding/hashing-embedder.js';
import { HybridRetriever } from '../retrieval/hybrid-retriever.js';
import type { RetrieverConfig } from '../retrieval/hybrid-retriever.js';
import { QueryService } from '../retrieval/query-service.js';
import { FALLBACK_ANSWER, GENERATION_DISABLED_ANSWER, NO_MATCH_ANSWER } from '../retrieval/answer-assembler.js';
import { DatasetRegistry } from '../storage/dataset-registry.js';
import { openActiveGeneration, type DatasetGeneration } from '../storage/generations.js';
import type { RawTable } from '../sources/file-reader.js';
import { DEFAULT_CONFIG, type GraphCapability } from '../types/index.js';
import { GraphUnavailable } from '../utils/errors.js';
import { FakeLlm, makeTmpDir, removeDir } from './helpers.js';

const table: RawTable = {
    columns: ['DOI', 'Title', 'Abstract', 'Authors', 'Year', 'Author Keywords'],
    rows: [
        {
            DOI: '10.1/a',
            Title: 'Service quality in retail banking',
            Abstract: 'We study service quality perceptions of retail bank customers.',
            Authors: 'Smith, J.; Doe, A.',
            Year: '2020',
            'Author Keywords': 'service quality',
        },
        {
            DOI: '10.1/b',
            Title: 'Brand trust and loyalty',
            Abstract: 'Brand trust drives customer loyalty in online markets.',
            Authors: 'Smith, J.',
            Year: '2020',
            'Author Keywords': 'trust',
        },
        {
            DOI: '10.1/c',
            Title: 'Pricing strategy for subscriptions',
            Abstract: 'Subscription pricing and churn.',
            Authors: 'Lee, K.',
            Year: '2021',
            'Author Keywords': 'pricing',
        },
    ],
};

const embedder = new HashingEmbedder();

function retrieverConfig(llm: Partial<RetrieverConfig['llm']> = {}, deadlineMs = 10_000): RetrieverConfig {
    return {
        retrieval: { ...DEFAULT_CONFIG.retrieval, queryDeadlineMs: deadlineMs },
        graph: DEFAULT_CONFIG.graph,
        llm: { ...DEFAULT_CONFIG.llm, timeoutMs: 1000, classifierTimeoutMs: 1000, ...llm },
    };
}

describe('HybridRetriever', () => {
    let dataDir: string;
    let dataset: DatasetGeneration;

    beforeAll(async () => {
        dataDir = makeTmpDir();
        await ingestTable(table, { config: { ...DEFAULT_CONFIG, dataDir }, embedder });
        dataset = openActiveGeneration(dataDir);
    });

    afterAll(() => {
        dataset.close();
        removeDir(dataDir);
    });

    it('should answer author questions from graph documents', async () => {
        const llm = new FakeLlm(['PAPERS_BY_AUTHOR', 'Smith wrote two papers [1][2].']);
        const retriever = new HybridRetriever({ dataset, embedder, llm, config: retrieverConfig() });

        const result = await retriever.answer('Which papers were written by Smith?');

        expect(result.outcome).toBe('generated');
        expect(result.answer).toBe('Smith wrote two papers [1][2].');
        expect(result.intent).toBe('PAPERS_BY_AUTHOR');
        expect(result.sources.map((s) => s.id)).toEqual(['10.1/a', '10.1/b']);
        expect(result.sources.map((s) => s.origin)).toEqual(['graph', 'graph']);
        expect(result.similarities).toEqual([1, 1]);
        expect(result.best_score).toBe(1);
        expect(result.graph_used).toBe(true);
        expect(result.graph_template).toBe('papers-by-author');
        expect(result.graph_summary).toBe('Found 2 paper(s) by Smith, J.');
        expect(result.generation).toBe(1);
        expect(result.generation_failed).toBe(false);
        expect(result.states).toEqual(['CLASSIFY', 'VECTOR_SEARCH', 'GRAPH_SEARCH', 'MERGE', 'RESPOND']);

        const prompt = llm.prompts[1] ?? '';
        expect(prompt).toContain('[1] Title: Service quality in retail banking');
        expect(prompt).toContain('[2] Title: Brand trust and loyalty');
        expect(prompt).toContain('GRAPH FINDINGS:\nFound 2 paper(s) by Smith, J.');
        expect(prompt).toContain('QUESTION: Which papers were written by Smith?');
    });

    it('should treat graph matches as exact without a model', async () => {
        const retriever = new HybridRetriever({ dataset, embedder, llm: null, config: retrieverConfig() });

        const result = await retriever.answer('papers by Smith');

        expect(result.intent).toBe('PAPERS_BY_AUTHOR');
        expect(result.sources.map((s) => s.id)).toEqual(['10.1/a', '10.1/b']);
        expect(result.similarities).toEqual([1, 1]);
        expect(result.graph_used).toBe(true);
    });

    it('should keep the sources when generation hangs', async () => {
        const llm = new FakeLlm(['PAPERS_BY_AUTHOR', 'hang']);
        const retriever = new HybridRetriever({ dataset, embedder, llm, config: retrieverConfig({ timeoutMs: 30 }) });

        const result = await retriever.answer('Which papers were written by Smith?');

        expect(result.outcome).toBe('fallback');
        expect(result.answer).toBe(FALLBACK_ANSWER);
        expect(result.generation_failed).toBe(true);
        expect(result.sources.map((s) => s.id)).toEqual(['10.1/a', '10.1/b']);
    });

    it('should skip generation once the query deadline has passed', async () => {
        const llm = new FakeLlm(['PAPERS_BY_AUTHOR', 'unused']);
        const retriever = new HybridRetriever({ dataset, embedder, llm, config: retrieverConfig({}, 0) });

        const result = await retriever.answer('Which papers were written by Smith?');

        expect(result.outcome).toBe('fallback');
        expect(result.generation_failed).toBe(true);
        expect(llm.prompts).toHaveLength(1);
    });

    it('should answer with the graph narrative and skip generation', async () => {
        const llm = new FakeLlm(['COLLABORATIONS']);
        const retriever = new HybridRetriever({ dataset, embedder, llm, config: retrieverConfig() });

        const result = await retriever.answer('Who collaborated with Smith?');

        expect(result.outcome).toBe('graph-narrative');
        expect(result.answer).toBe('Smith, J. collaborated with: Doe, A. (1 shared paper)');
        expect(result.sources).toEqual([]);
        expect(result.best_score).toBe(0);
        expect(result.graph_used).toBe(true);
        expect(result.graph_template).toBe('collaborators-of-author');
        expect(llm.prompts).toHaveLength(1);
    });

    it('should return sources without an answer when generation is disabled', async () => {
        const retriever = new HybridRetriever({ dataset, embedder, llm: null, config: retrieverConfig() });

        const result = await retriever.answer('papers from 2020');

        expect(result.intent).toBe('OTHER');
        expect(result.outcome).toBe('fallback');
        expect(result.answer).toBe(GENERATION_DISABLED_ANSWER);
        expect(result.generation_failed).toBe(false);
        expect(result.graph_template).toBe('papers-by-year');
        expect(result.sources.map((s) => s.id)).toEqual(['10.1/a', '10.1/b']);
    });

    it('should rank graph documents by the topic of a constrained question', async () => {
        const retriever = new HybridRetriever({ dataset, embedder, llm: null, config: retrieverConfig() });

        const result = await retriever.answer('papers about brand trust by Smith');

        expect(result.graph_template).toBe('papers-by-author');
        expect(result.sources.map((s) => s.id)).toEqual(['10.1/b', '10.1/a']);
        expect(result.sources.every((s) => s.origin === 'graph')).toBe(true);
        expect(result.similarities[0]).toBeGreaterThan(result.similarities[1] ?? 1);
        expect(result.best_score).toBe(result.similarities[0]);
    });

    it('should skip the graph for concept questions and rank by vector similarity', async () => {
        const retriever = new HybridRetriever({ dataset, embedder, llm: null, config: retrieverConfig() });

        const result = await retriever.answer('Explain retail bank service quality perceptions');

        expect(result.states).toEqual(['CLASSIFY', 'VECTOR_SEARCH', 'SKIP_GRAPH', 'MERGE', 'RESPOND']);
        expect(result.intent).toBe('CONCEPT_QUESTION');
        expect(result.graph_used).toBe(false);
        expect(result.graph_template).toBeNull();
        expect(result.sources.map((s) => s.id)).toEqual(['10.1/a']);
        expect(result.sources[0]?.origin).toBe('vector');
        expect(result.best_score).toBeGreaterThan(0.5);
    });

    it('should report no match when nothing clears the threshold', async () => {
        const retriever = new HybridRetriever({ dataset, embedder, llm: null, config: retrieverConfig() });

        const result = await retriever.answer('Explain quantum chromodynamics');

        expect(result.outcome).toBe('no-match');
        expect(result.answer).toBe(NO_MATCH_ANSWER);
        expect(result.sources).toEqual([]);
        expect(result.best_score).toBe(0);
    });

    it('should drop a failing graph store for the rest of the session', async () => {
        const run = vi.fn(async () => {
            throw new GraphUnavailable('Graph store query failed');
        });
        const broken: GraphCapability = { run, describeSchema: () => '', close: () => undefined };
        const retriever = new HybridRetriever({
            dataset: { ...dataset, graph: broken },
            embedder,
            llm: null,
            config: retrieverConfig(),
        });

        const first = await retriever.answer('Which papers were written by Smith?');
        expect(first.states).toContain('GRAPH_SEARCH');
        expect(first.graph_used).toBe(false);
        expect(first.graph_summary).toBe('Graph store unavailable');
        expect(first.graph_template).toBeNull();
        expect(retriever.graphAvailable).toBe(false);

        const second = await retriever.answer('Which papers were written by Smith?');
        expect(second.states).toContain('SKIP_GRAPH');
        expect(run).toHaveBeenCalledTimes(1);
    });
});

describe('QueryService', () => {
    let dataDir: string;
    let registry: DatasetRegistry;

    beforeAll(() => {
        dataDir = makeTmpDir();
        registry = new DatasetRegistry();
    });

    afterAll(() => {
        registry.close();
        removeDir(dataDir);
    });

    it('should reuse one retriever per generation and switch on publish', async () => {
        const config = { ...DEFAULT_CONFIG, dataDir };
        await ingestTable(table, { config, embedder });
        registry.publish(openActiveGeneration(dataDir));

        const factory = vi.fn(
            (dataset: DatasetGeneration) => new HybridRetriever({ dataset, embedder, llm: null, config: retrieverConfig() })
        );
        const service = new QueryService(registry, factory);

        expect((await service.ask('papers from 2020')).generation).toBe(1);
        expect((await service.ask('papers from 2021')).generation).toBe(1);
        expect(factory).toHaveBeenCalledTimes(1);

        await ingestTable(table, { config, embedder });
        registry.publish(openActiveGeneration(dataDir));

        const answer = await service.ask('papers from 2021');
        expect(answer.generation).toBe(2);
        expect(answer.sources.map((s) => s.id)).toEqual(['10.1/c']);
        expect(factory).toHaveBeenCalledTimes(2);
        expect(registry.retiringCount()).toBe(0);
    });
});
