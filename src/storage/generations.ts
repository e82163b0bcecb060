import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { GraphCapability, VectorIndex } from '../types/index.js';
import { BiblioRagError, GraphUnavailable, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { GraphDatabase } from './graph-database.js';
import { SqliteVectorIndex } from './vector-index.js';

const logger = getLogger();

export const GRAPH_FILE = 'graph.db';
export const VECTORS_FILE = 'vectors.db';
const ACTIVE_FILE = 'active.json';
const GENERATION_DIR = /^gen-(\d+)$/;

const ActivePointerSchema = z.object({
    generation: z.number().int().positive(),
    directory: z.string().min(1),
    published_at: z.string(),
});

/**
 * Content of `<dataDir>/active.json`: which generation answers queries.
 * `directory` is relative to the data directory.
 */
export type ActivePointer = z.infer<typeof ActivePointerSchema>;

/**
 * One dataset generation opened for queries: sibling vector and graph
 * stores built by the same ingestion run. `graph` is null when the graph
 * store cannot be opened (vector-only).
 */
export interface DatasetGeneration {
    generation: number;
    directory: string;
    vectorIndex: VectorIndex;
    graph: GraphCapability | null;
    close(): void;
}

export function generationsRoot(dataDir: string): string {
    return join(dataDir, 'generations');
}

export function generationDirName(generation: number): string {
    return `gen-${String(generation).padStart(4, '0')}`;
}

export function generationDir(dataDir: string, generation: number): string {
    return join(generationsRoot(dataDir), generationDirName(generation));
}

/**
 * Generation numbers present on disk, ascending.
 */
export function listGenerations(dataDir: string): number[] {
    const root = generationsRoot(dataDir);
    if (!existsSync(root)) return [];

    const numbers: number[] = [];
    for (const entry of readdirSync(root, { withFileTypes: true })) {
        const match = entry.isDirectory() ? GENERATION_DIR.exec(entry.name) : null;
        if (match?.[1]) numbers.push(parseInt(match[1], 10));
    }
    return numbers.sort((a, b) => a - b);
}

/**
 * Next unused generation number. Never reuses a number still on disk or
 * named by the active pointer.
 */
export function nextGenerationNumber(dataDir: string): number {
    const onDisk = listGenerations(dataDir);
    const active = readActivePointer(dataDir)?.generation ?? 0;
    return Math.max(active, onDisk[onDisk.length - 1] ?? 0) + 1;
}

/**
 * Read the active pointer, or null when none has been published yet.
 */
export function readActivePointer(dataDir: string): ActivePointer | null {
    const path = join(dataDir, ACTIVE_FILE);
    if (!existsSync(path)) return null;

    const parsed = ActivePointerSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (!parsed.success) {
        throw new BiblioRagError('DATASET_NOT_FOUND', `Active dataset pointer ${path} is malformed`);
    }
    return parsed.data;
}

/**
 * Replace the active pointer atomically: write a temp file, then rename
 * it over `active.json`. Readers see the old or the new pointer, never a
 * partial one.
 */
export function writeActivePointer(dataDir: string, generation: number): ActivePointer {
    mkdirSync(dataDir, { recursive: true });
    const pointer: ActivePointer = {
        generation,
        directory: join('generations', generationDirName(generation)),
        published_at: new Date().toISOString(),
    };

    const target = join(dataDir, ACTIVE_FILE);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    writeFileSync(temp, JSON.stringify(pointer, null, 2) + '\n', 'utf-8');
    renameSync(temp, target);

    logger.info({ generation }, 'Active dataset generation switched');
    return pointer;
}

/**
 * Delete old generations, keeping the newest `keep` and always the active one.
 *
 * @returns Generation numbers removed
 */
export function pruneGenerations(dataDir: string, keep: number): number[] {
    const active = readActivePointer(dataDir)?.generation;
    const all = listGenerations(dataDir);
    const retained = new Set(all.slice(Math.max(0, all.length - keep)));
    if (active !== undefined) retained.add(active);

    const removed: number[] = [];
    for (const generation of all) {
        if (retained.has(generation)) continue;
        rmSync(generationDir(dataDir, generation), { recursive: true, force: true });
        removed.push(generation);
    }

    if (removed.length > 0) logger.info({ removed }, 'Pruned old dataset generations');
    return removed;
}

/**
 * Open one generation read-only. A missing or unusable vector index is
 * fatal; an unusable graph store leaves the generation vector-only.
 */
export function openGeneration(dataDir: string, generation: number): DatasetGeneration {
    const directory = generationDir(dataDir, generation);
    const vectorsPath = join(directory, VECTORS_FILE);
    if (!existsSync(vectorsPath)) {
        throw new BiblioRagError('DATASET_NOT_FOUND', `Dataset generation ${generation} has no vector index at ${vectorsPath}`);
    }

    const vectorIndex = SqliteVectorIndex.openReadonly(vectorsPath);

    let graph: GraphDatabase | null = null;
    try {
        graph = GraphDatabase.openReadonly(join(directory, GRAPH_FILE));
    } catch (error) {
        if (!(error instanceof GraphUnavailable)) {
            vectorIndex.close();
            throw error;
        }
        logger.warn({ generation, error: describeError(error) }, 'Graph store unavailable, generation is vector-only');
    }

    return {
        generation,
        directory,
        vectorIndex,
        graph,
        close: () => {
            vectorIndex.close();
            graph?.close();
        },
    };
}

/**
 * Open the generation named by `active.json`.
 *
 * @throws BiblioRagError (DATASET_NOT_FOUND) when nothing has been ingested yet
 */
export function openActiveGeneration(dataDir: string): DatasetGeneration {
    const pointer = readActivePointer(dataDir);
    if (!pointer) {
        throw new BiblioRagError('DATASET_NOT_FOUND', `No dataset has been ingested into ${dataDir} yet`);
    }
    return openGeneration(dataDir, pointer.generation);
}
