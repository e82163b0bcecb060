/**
 * Library entry point.
 */
export * from './types/index.js';

export { makeId } from './utils/stable-id.js';
export {
    BiblioRagError,
    SchemaValidationError,
    EmptyDatasetError,
    EntityExtractionAmbiguous,
    GraphUnavailable,
    GraphQueryRejected,
    GenerationTimeout,
    GenerationError,
} from './utils/errors.js';
export type { ErrorCode } from './utils/errors.js';
export { resolveConfig, mergeConfig, type ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';

export { readRecordsFile, type RawTable } from './sources/file-reader.js';
export { parseCsv } from './sources/csv.js';
export { normalizeRecords } from './sources/normalizer.js';
export { projectGraph } from './graph/projector.js';
export { buildTextBlock, buildMetadata, embedAndStore } from './indexer/vector-indexer.js';

export { createEmbeddingProvider, HashingEmbedder, OllamaEmbedder, OpenAiEmbedder } from './embedding/index.js';
export { createLlmProvider, OllamaProvider, OpenAiProvider } from './llm/index.js';

export { GraphDatabase } from './storage/graph-database.js';
export { SqliteVectorIndex } from './storage/vector-index.js';
export { DatasetRegistry, type DatasetLease } from './storage/dataset-registry.js';
export { openActiveGeneration, openGeneration, type DatasetGeneration } from './storage/generations.js';
export { ingestFile, ingestTable, type IngestOptions, type IngestResult } from './builder/dataset-builder.js';

export { HeuristicEntityExtractor, type EntityExtractor } from './nlp/entity-extraction.js';
export { IntentClassifier, shouldUseGraph, parseIntentLabel } from './retrieval/intent-classifier.js';
export { GraphSearch, planTemplate } from './retrieval/graph-search.js';
export { AnswerAssembler, buildPrompt } from './retrieval/answer-assembler.js';
export { HybridRetriever, type HybridRetrieverOptions } from './retrieval/hybrid-retriever.js';
export { QueryService } from './retrieval/query-service.js';
export { VERSION } from './version.js';
