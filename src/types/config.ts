/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export type LlmProviderName = 'ollama' | 'openai';

export type EmbeddingProviderName = 'hashing' | 'ollama' | 'openai';

/**
 * Text-generation configuration (answering and intent classification).
 */
export interface LlmConfig {
    enabled: boolean;
    provider: LlmProviderName;
    model: string;
    baseUrl?: string;
    temperature: number;
    maxTokens: number;
    /** Deadline for one answer generation call */
    timeoutMs: number;
    /** Deadline for one intent classification call */
    classifierTimeoutMs: number;
}

/**
 * Embedding configuration.
 */
export interface EmbeddingConfig {
    provider: EmbeddingProviderName;
    /** Remote model name (ignored by the hashing embedder) */
    model: string;
    baseUrl?: string;
    dimensions: number;
}

/**
 * Vector retrieval configuration.
 */
export interface RetrievalConfig {
    /** Nearest neighbours requested from the index */
    topK: number;
    /** Minimum cosine similarity kept */
    threshold: number;
    /** Whole-query deadline; generation gets what is left of it */
    queryDeadlineMs: number;
}

/**
 * Graph retrieval and projection configuration.
 */
export interface GraphConfig {
    enabled: boolean;
    /** Row cap for every template query */
    resultLimit: number;
    /** Allow the model-written query fallback when no template fits */
    nlFallback: boolean;
    /** Warn when a year bucket holds more documents than this */
    sameYearBucketWarning: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface BiblioRagConfig {
    /** Root directory holding dataset generations and the active pointer */
    dataDir: string;

    /** Generations kept on disk after a new one is published */
    keepGenerations: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    retrieval: RetrievalConfig;
    graph: GraphConfig;
    embedding: EmbeddingConfig;
    llm: LlmConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BiblioRagConfig = {
    dataDir: './bibliorag-data',
    keepGenerations: 2,
    logLevel: 'info',
    jsonLogs: false,
    retrieval: {
        topK: 10,
        threshold: 0.35,
        queryDeadlineMs: 90_000,
    },
    graph: {
        enabled: true,
        resultLimit: 25,
        nlFallback: true,
        sameYearBucketWarning: 200,
    },
    embedding: {
        provider: 'hashing',
        model: 'all-minilm',
        dimensions: 384,
    },
    llm: {
        enabled: true,
        provider: 'ollama',
        model: 'llama3.2',
        temperature: 0.7,
        maxTokens: 512,
        timeoutMs: 60_000,
        classifierTimeoutMs: 15_000,
    },
};

/**
 * Import metadata stored in the graph database `imports` table.
 */
export interface ImportRecord {
    import_id?: number;
    created_at: string;
    bibliorag_version: string;
    generation: number;
    source_file: string;
    config_json: string;
    stats_json: string;
}
