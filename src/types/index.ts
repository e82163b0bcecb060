/**
 * Barrel export for all shared types.
 */
export type { RawRecord, CanonicalRecord, CanonicalField, NormalizationResult } from './record.js';
export { NodeLabel, RelationshipType, UNDIRECTED_RELATIONSHIPS } from './graph.js';
export type {
    KeywordKind,
    DocumentNode,
    AuthorNode,
    JournalNode,
    RankingBodyNode,
    RankingNode,
    YearNode,
    KeywordNode,
    Relationship,
    ProjectedGraph,
} from './graph.js';
export type { DocumentMetadata, IndexedDocument, VectorHit } from './indexed-document.js';
export type { EmbeddingProvider, VectorIndex, GraphCapability, GraphRow, QueryParam } from './capabilities.js';
export { INTENT_LABELS } from './query.js';
export type {
    IntentLabel,
    ExtractedEntities,
    GraphTemplateName,
    GraphSearchOutcome,
    RetrievalState,
    SourceOrigin,
    RankedSource,
    AnswerOutcome,
    HybridAnswer,
} from './query.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    BiblioRagConfig,
    LogLevel,
    LlmProviderName,
    EmbeddingProviderName,
    LlmConfig,
    EmbeddingConfig,
    RetrievalConfig,
    GraphConfig,
    ImportRecord,
} from './config.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
