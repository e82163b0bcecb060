import type { HybridAnswer } from '../types/index.js';
import type { DatasetGeneration } from '../storage/generations.js';
import type { DatasetRegistry } from '../storage/dataset-registry.js';
import type { HybridRetriever } from './hybrid-retriever.js';

export type RetrieverFactory = (dataset: DatasetGeneration) => HybridRetriever;

/**
 * Answers questions against whatever generation the registry currently
 * publishes. Each query leases its generation for its whole run; one
 * retriever is kept per generation so session state (a dropped graph
 * store) carries across queries until the next swap.
 */
export class QueryService {
    private retriever: HybridRetriever | null = null;

    constructor(
        private readonly registry: DatasetRegistry,
        private readonly createRetriever: RetrieverFactory
    ) {}

    /**
     * @throws BiblioRagError (DATASET_NOT_FOUND) when nothing is published
     */
    async ask(query: string): Promise<HybridAnswer> {
        const lease = this.registry.acquire();
        try {
            return await this.retrieverFor(lease.dataset).answer(query);
        } finally {
            lease.release();
        }
    }

    private retrieverFor(dataset: DatasetGeneration): HybridRetriever {
        if (this.retriever?.generation !== dataset.generation) {
            this.retriever = this.createRetriever(dataset);
        }
        return this.retriever;
    }
}
