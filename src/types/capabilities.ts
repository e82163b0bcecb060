import type { IndexedDocument, VectorHit } from './indexed-document.js';

/**
 * Embedding capability: text in, fixed-length unit vectors out.
 * Deterministic for a fixed model and input.
 */
export interface EmbeddingProvider {
    /** Provider name (for logs and the import record) */
    readonly name: string;

    /** Vector length this provider produces */
    readonly dimensions: number;

    /**
     * Encode a batch of texts in one call.
     * @returns One vector per input text, in input order
     */
    embed(texts: string[]): Promise<number[][]>;
}

/**
 * Vector index capability over unit-normalized embeddings.
 */
export interface VectorIndex {
    upsert(documents: IndexedDocument[]): Promise<void>;

    /**
     * Nearest neighbours of `vector`, closest first.
     * `similarity = 1 - distance` for unit vectors.
     */
    query(vector: number[], k: number): Promise<VectorHit[]>;

    /** Fetch stored documents by id; unknown ids are skipped */
    get(ids: string[]): Promise<IndexedDocument[]>;

    count(): Promise<number>;

    close(): void;
}

/** Values that can be bound to a named query parameter */
export type QueryParam = string | number | null;

/** One result row: plain column → value mapping */
export type GraphRow = Record<string, unknown>;

/**
 * Graph capability: runs a read-only structured query against the fixed
 * node/relationship schema. Parameters are always bound, never spliced.
 */
export interface GraphCapability {
    run(query: string, params?: Record<string, QueryParam>): Promise<GraphRow[]>;

    /** Human/model-readable description of tables and relationship types */
    describeSchema(): string;

    close(): void;
}
