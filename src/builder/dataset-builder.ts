import { mkdirSync, rmSync } from 'node:fs';
import { basename, join } from 'node:path';
import type { BiblioRagConfig, EmbeddingProvider, NodeLabel } from '../types/index.js';
import type { RawTable } from '../sources/file-reader.js';
import { readRecordsFile } from '../sources/file-reader.js';
import { normalizeRecords } from '../sources/normalizer.js';
import { countRelationships, projectGraph } from '../graph/projector.js';
import { embedAndStore } from '../indexer/vector-indexer.js';
import { GraphDatabase } from '../storage/graph-database.js';
import { SqliteVectorIndex } from '../storage/vector-index.js';
import {
    GRAPH_FILE,
    VECTORS_FILE,
    generationDir,
    nextGenerationNumber,
    pruneGenerations,
    writeActivePointer,
} from '../storage/generations.js';
import { EmptyDatasetError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const logger = getLogger();

export interface IngestOptions {
    config: Pick<BiblioRagConfig, 'dataDir' | 'keepGenerations' | 'graph' | 'embedding'>;
    embedder: EmbeddingProvider;
    /** Name recorded in the import log */
    sourceFile?: string;
}

export interface IngestResult {
    generation: number;
    directory: string;
    rows: number;
    documents: number;
    dropped: { missingRequired: number; duplicate: number };
    nodes: Record<NodeLabel, number>;
    relationships: number;
    durationMs: number;
}

/**
 * Read an export file and ingest it as a new dataset generation.
 */
export async function ingestFile(filePath: string, options: Omit<IngestOptions, 'sourceFile'>): Promise<IngestResult> {
    const table = readRecordsFile(filePath);
    return ingestTable(table, { ...options, sourceFile: basename(filePath) });
}

/**
 * Ingestion pipeline:
 *
 * 1. Normalize rows into canonical records
 * 2. Project the graph and load it into a fresh graph store
 * 3. Embed every record into a fresh vector index
 * 4. Record the import, seal both stores
 * 5. Switch the active pointer, prune old generations
 *
 * Both stores are built side by side in a new generation directory, so the
 * generation being served is never touched. Any failure removes the new
 * directory and leaves the active pointer where it was.
 *
 * @throws SchemaValidationError before anything is written
 * @throws EmptyDatasetError when every row was dropped
 */
export async function ingestTable(table: RawTable, options: IngestOptions): Promise<IngestResult> {
    const { config, embedder } = options;
    const startTime = Date.now();

    // Step 1: Normalize
    const normalized = normalizeRecords(table.rows, table.columns);
    if (normalized.records.length === 0) throw new EmptyDatasetError(table.rows.length);

    const generation = nextGenerationNumber(config.dataDir);
    const directory = generationDir(config.dataDir, generation);
    mkdirSync(directory, { recursive: true });
    logger.info({ generation, records: normalized.records.length }, 'Building dataset generation');

    let graphDb: GraphDatabase | null = null;
    let vectorIndex: SqliteVectorIndex | null = null;

    try {
        // Step 2: Graph
        const projected = projectGraph(normalized.records, {
            sameYearBucketWarning: config.graph.sameYearBucketWarning,
        });
        graphDb = new GraphDatabase(join(directory, GRAPH_FILE));
        graphDb.load(projected);

        // Step 3: Vectors
        vectorIndex = SqliteVectorIndex.create(join(directory, VECTORS_FILE));
        const documents = await embedAndStore(normalized.records, vectorIndex, embedder);

        // Step 4: Import log
        const stats = graphDb.getStats();
        const durationMs = Date.now() - startTime;
        graphDb.insertImport({
            created_at: new Date().toISOString(),
            bibliorag_version: VERSION,
            generation,
            source_file: options.sourceFile ?? 'inline',
            config_json: JSON.stringify({ embedding: config.embedding, embedder: embedder.name }),
            stats_json: JSON.stringify({
                rows: table.rows.length,
                documents,
                dropped: normalized.dropped,
                nodes: stats.nodes,
                relationships: stats.edges,
                durationMs,
            }),
        });

        graphDb.seal();
        vectorIndex.seal();
        graphDb.close();
        vectorIndex.close();

        // Step 5: Publish
        writeActivePointer(config.dataDir, generation);
        pruneGenerations(config.dataDir, config.keepGenerations);

        logger.info(
            { generation, documents, relationships: countRelationships(projected), durationMs },
            'Dataset generation ready'
        );

        return {
            generation,
            directory,
            rows: table.rows.length,
            documents,
            dropped: normalized.dropped,
            nodes: stats.nodes,
            relationships: stats.edges,
            durationMs,
        };
    } catch (error) {
        graphDb?.close();
        vectorIndex?.close();
        rmSync(directory, { recursive: true, force: true });
        logger.error({ generation }, 'Ingestion failed, generation discarded');
        throw error;
    }
}
