import Database from 'better-sqlite3';
import { existsSync, rmSync } from 'node:fs';
import { z } from 'zod';
import type { DocumentMetadata, IndexedDocument, VectorHit, VectorIndex } from '../types/index.js';
import { dot } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const SCHEMA_VERSION = 1;

const MIGRATION_V1 = `
CREATE TABLE IF NOT EXISTS vectors (
  id TEXT PRIMARY KEY,
  dimensions INTEGER NOT NULL,
  embedding_json TEXT NOT NULL,
  text_block TEXT NOT NULL,
  metadata_json TEXT NOT NULL
);
`;

const MetadataSchema: z.ZodType<DocumentMetadata> = z.object({
    title: z.string(),
    authors: z.string(),
    author_list: z.array(z.string()),
    journal: z.string(),
    year: z.number().nullable(),
    doi: z.string(),
    url: z.string(),
    abstract_snippet: z.string(),
    rankings: z.object({ vhb: z.string().nullable(), abdc: z.string().nullable() }),
    citations: z.number().nullable(),
    keywords: z.array(z.string()),
});

const EmbeddingSchema = z.array(z.number());

interface VectorRow {
    id: string;
    dimensions: number;
    embedding_json: string;
    text_block: string;
    metadata_json: string;
}

/**
 * Vector index on better-sqlite3. Embeddings are stored as JSON and the
 * nearest-neighbour query is an exact scan: dot product over unit vectors,
 * ties broken by id.
 */
export class SqliteVectorIndex implements VectorIndex {
    private constructor(
        private readonly db: Database.Database,
        readonly dbPath: string
    ) {}

    /**
     * Create a fresh index, removing any previous file at `dbPath`.
     */
    static create(dbPath: string): SqliteVectorIndex {
        for (const suffix of ['', '-wal', '-shm']) {
            if (existsSync(dbPath + suffix)) rmSync(dbPath + suffix, { force: true });
        }

        const db = new Database(dbPath);
        db.pragma('journal_mode = WAL');
        db.exec(MIGRATION_V1);
        db.pragma(`user_version = ${SCHEMA_VERSION}`);
        logger.debug({ dbPath }, 'Vector index created');
        return new SqliteVectorIndex(db, dbPath);
    }

    /**
     * Open an existing index read-only.
     */
    static openReadonly(dbPath: string): SqliteVectorIndex {
        const db = new Database(dbPath, { readonly: true, fileMustExist: true });
        const version: unknown = db.pragma('user_version', { simple: true });
        if (version !== SCHEMA_VERSION) {
            db.close();
            throw new Error(`Vector index at ${dbPath} has schema version ${String(version)}, expected ${SCHEMA_VERSION}`);
        }
        return new SqliteVectorIndex(db, dbPath);
    }

    async upsert(documents: IndexedDocument[]): Promise<void> {
        const stmt = this.db.prepare(`
      INSERT INTO vectors (id, dimensions, embedding_json, text_block, metadata_json)
      VALUES (@id, @dimensions, @embedding_json, @text_block, @metadata_json)
      ON CONFLICT(id) DO UPDATE SET
        dimensions = excluded.dimensions,
        embedding_json = excluded.embedding_json,
        text_block = excluded.text_block,
        metadata_json = excluded.metadata_json
    `);

        const insertAll = this.db.transaction((docs: IndexedDocument[]) => {
            for (const doc of docs) {
                stmt.run({
                    id: doc.id,
                    dimensions: doc.embedding.length,
                    embedding_json: JSON.stringify(doc.embedding),
                    text_block: doc.text_block,
                    metadata_json: JSON.stringify(doc.metadata),
                });
            }
        });

        insertAll(documents);
    }

    async query(vector: number[], k: number): Promise<VectorHit[]> {
        if (k <= 0) return [];

        const scored: VectorHit[] = [];
        for (const row of this.db.prepare<[], VectorRow>('SELECT * FROM vectors').iterate()) {
            const similarity = dot(vector, parseEmbedding(row.embedding_json));
            scored.push({ id: row.id, distance: 1 - similarity, metadata: parseMetadata(row.metadata_json) });
        }

        scored.sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
        return scored.slice(0, k);
    }

    async get(ids: string[]): Promise<IndexedDocument[]> {
        const stmt = this.db.prepare<[string], VectorRow>('SELECT * FROM vectors WHERE id = ?');
        const out: IndexedDocument[] = [];
        for (const id of ids) {
            const row = stmt.get(id);
            if (!row) continue;
            out.push({
                id: row.id,
                embedding: parseEmbedding(row.embedding_json),
                text_block: row.text_block,
                metadata: parseMetadata(row.metadata_json),
            });
        }
        return out;
    }

    async count(): Promise<number> {
        return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vectors').get()?.count ?? 0;
    }

    /**
     * Fold the write-ahead log into the main file so the index can be
     * opened read-only without side files.
     */
    seal(): void {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
        this.db.pragma('journal_mode = DELETE');
    }

    close(): void {
        if (!this.db.open) return;
        this.db.close();
        logger.debug({ dbPath: this.dbPath }, 'Vector index closed');
    }
}

function parseEmbedding(json: string): number[] {
    return EmbeddingSchema.parse(JSON.parse(json));
}

function parseMetadata(json: string): DocumentMetadata {
    return MetadataSchema.parse(JSON.parse(json));
}
