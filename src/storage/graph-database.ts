import Database from 'better-sqlite3';
import type { GraphCapability, GraphRow, ImportRecord, ProjectedGraph, QueryParam, Relationship } from '../types/index.js';
import { NodeLabel, RelationshipType } from '../types/index.js';
import { GraphQueryRejected, GraphUnavailable } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const SCHEMA_VERSION = 1;

/**
 * SQLite schema migration v1.
 * One table per node label, a typed edge table and the import log.
 */
const MIGRATION_V1 = `
-- Imports: one row per ingestion run
CREATE TABLE IF NOT EXISTS imports (
  import_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  bibliorag_version TEXT NOT NULL,
  generation INTEGER NOT NULL,
  source_file TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Documents: keyed by DOI
CREATE TABLE IF NOT EXISTS documents (
  document_id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  abstract TEXT NOT NULL,
  publication_date TEXT NOT NULL DEFAULT '',
  year INTEGER,
  journal_name TEXT NOT NULL DEFAULT '',
  url TEXT,
  citations INTEGER
);

CREATE TABLE IF NOT EXISTS authors (
  author_id TEXT PRIMARY KEY,
  name TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS journals (
  journal_id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  issn TEXT,
  eissn TEXT
);

CREATE TABLE IF NOT EXISTS ranking_bodies (
  body_id TEXT PRIMARY KEY,
  name TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS rankings (
  ranking_id TEXT PRIMARY KEY,
  body_id TEXT NOT NULL REFERENCES ranking_bodies(body_id),
  code TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS years (
  year_id TEXT PRIMARY KEY,
  value INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS keywords (
  keyword_id TEXT PRIMARY KEY,
  name TEXT NOT NULL
);

-- Edges: every relationship type; undirected ones stored once, smaller id first
CREATE TABLE IF NOT EXISTS edges (
  type TEXT NOT NULL,
  src_id TEXT NOT NULL,
  dst_id TEXT NOT NULL,
  weight REAL NOT NULL DEFAULT 1.0,
  position INTEGER,
  kind TEXT,
  PRIMARY KEY (type, src_id, dst_id)
);

CREATE INDEX IF NOT EXISTS idx_edges_src ON edges(src_id, type);
CREATE INDEX IF NOT EXISTS idx_edges_dst ON edges(dst_id, type);
CREATE INDEX IF NOT EXISTS idx_documents_year ON documents(year);
`;

/**
 * Table holding the nodes of each label.
 */
const NODE_TABLES: Record<NodeLabel, string> = {
    [NodeLabel.Document]: 'documents',
    [NodeLabel.Author]: 'authors',
    [NodeLabel.Journal]: 'journals',
    [NodeLabel.RankingBody]: 'ranking_bodies',
    [NodeLabel.Ranking]: 'rankings',
    [NodeLabel.Year]: 'years',
    [NodeLabel.Keyword]: 'keywords',
};

/**
 * Schema description handed to the text-generation model when it has to
 * write a query itself.
 */
const SCHEMA_DESCRIPTION = `SQLite database of a bibliographic graph.
Node tables:
  documents(document_id TEXT PRIMARY KEY -- the DOI, title, abstract, publication_date, year INTEGER, journal_name, url, citations INTEGER)
  authors(author_id TEXT PRIMARY KEY, name)
  journals(journal_id TEXT PRIMARY KEY, name, issn, eissn)
  ranking_bodies(body_id TEXT PRIMARY KEY, name)  -- 'VHB' or 'ABDC'
  rankings(ranking_id TEXT PRIMARY KEY, body_id, code)
  years(year_id TEXT PRIMARY KEY, value INTEGER)
  keywords(keyword_id TEXT PRIMARY KEY, name)
Relationship table:
  edges(type, src_id, dst_id, weight REAL, position INTEGER, kind)
Relationship types (src → dst):
  HAS_AUTHOR: documents.document_id → authors.author_id (position = author order, 1-based)
  PUBLISHED_IN: documents.document_id → journals.journal_id
  HAS_RATING: journals.journal_id → rankings.ranking_id
  ISSUED_BY: rankings.ranking_id → ranking_bodies.body_id
  HAS_KEYWORD: documents.document_id → keywords.keyword_id (kind = 'author' or 'index')
  IN_YEAR: documents.document_id → years.year_id
  COLLABORATED_WITH: authors.author_id ↔ authors.author_id (undirected, src_id < dst_id, weight = shared documents)
  SAME_YEAR_AS: documents.document_id ↔ documents.document_id (undirected, src_id < dst_id)
Match names case-insensitively with the Unicode-aware ulower(), e.g. instr(ulower(a.name), ulower('smith')) > 0.`;

export interface GraphStats {
    nodes: Record<NodeLabel, number>;
    edges: number;
    edgesByType: Record<string, number>;
    imports: number;
}

export interface GraphDatabaseOptions {
    /** Open an existing store for queries only */
    readonly?: boolean;
}

/**
 * Graph store on better-sqlite3.
 *
 * Writers (the dataset builder) load a projected graph; readers run
 * parameterized read-only statements through the graph capability.
 */
export class GraphDatabase implements GraphCapability {
    private db: Database.Database;
    readonly isReadonly: boolean;

    /**
     * @throws GraphUnavailable when the file cannot be opened or carries an unknown schema
     */
    constructor(readonly dbPath: string, options: GraphDatabaseOptions = {}) {
        this.isReadonly = options.readonly ?? false;
        this.db = openDatabase(dbPath, this.isReadonly);

        try {
            if (this.isReadonly) {
                this.checkVersion();
            } else {
                this.db.pragma('journal_mode = WAL');
                this.db.pragma('foreign_keys = ON');
                this.migrate();
            }
        } catch (error) {
            this.db.close();
            if (error instanceof GraphUnavailable) throw error;
            throw new GraphUnavailable(`Graph store at ${dbPath} is not usable`, { cause: error });
        }

        logger.debug({ dbPath, readonly: this.isReadonly }, 'Graph store opened');
    }

    /**
     * Open an existing store read-only, for queries.
     */
    static openReadonly(dbPath: string): GraphDatabase {
        return new GraphDatabase(dbPath, { readonly: true });
    }

    private userVersion(): number {
        const version: unknown = this.db.pragma('user_version', { simple: true });
        return typeof version === 'number' ? version : 0;
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        if (this.userVersion() < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
            logger.debug('Graph store migrated to v1');
        }
    }

    private checkVersion(): void {
        const version = this.userVersion();
        if (version !== SCHEMA_VERSION) {
            throw new GraphUnavailable(`Graph store at ${this.dbPath} has schema version ${version}, expected ${SCHEMA_VERSION}`);
        }
    }

    // ─── Loading ──────────────────────────────────────────────

    /**
     * Upsert a projected graph in one transaction. Loading the same
     * projection twice leaves every count unchanged.
     */
    load(graph: ProjectedGraph): void {
        const upsertDocument = this.db.prepare(`
      INSERT INTO documents (document_id, title, abstract, publication_date, year, journal_name, url, citations)
      VALUES (@document_id, @title, @abstract, @publication_date, @year, @journal_name, @url, @citations)
      ON CONFLICT(document_id) DO UPDATE SET
        title = excluded.title,
        abstract = excluded.abstract,
        publication_date = excluded.publication_date,
        year = excluded.year,
        journal_name = excluded.journal_name,
        url = COALESCE(excluded.url, url),
        citations = COALESCE(excluded.citations, citations)
    `);
        const upsertAuthor = this.db.prepare(`
      INSERT INTO authors (author_id, name) VALUES (@author_id, @name)
      ON CONFLICT(author_id) DO NOTHING
    `);
        const upsertJournal = this.db.prepare(`
      INSERT INTO journals (journal_id, name, issn, eissn) VALUES (@journal_id, @name, @issn, @eissn)
      ON CONFLICT(journal_id) DO UPDATE SET
        issn = COALESCE(issn, excluded.issn),
        eissn = COALESCE(eissn, excluded.eissn)
    `);
        const upsertBody = this.db.prepare(`
      INSERT INTO ranking_bodies (body_id, name) VALUES (@body_id, @name)
      ON CONFLICT(body_id) DO NOTHING
    `);
        const upsertRanking = this.db.prepare(`
      INSERT INTO rankings (ranking_id, body_id, code) VALUES (@ranking_id, @body_id, @code)
      ON CONFLICT(ranking_id) DO NOTHING
    `);
        const upsertYear = this.db.prepare(`
      INSERT INTO years (year_id, value) VALUES (@year_id, @value)
      ON CONFLICT(year_id) DO NOTHING
    `);
        const upsertKeyword = this.db.prepare(`
      INSERT INTO keywords (keyword_id, name) VALUES (@keyword_id, @name)
      ON CONFLICT(keyword_id) DO NOTHING
    `);
        const upsertEdge = this.db.prepare(`
      INSERT INTO edges (type, src_id, dst_id, weight, position, kind)
      VALUES (@type, @src_id, @dst_id, @weight, @position, @kind)
      ON CONFLICT(type, src_id, dst_id) DO UPDATE SET
        weight = excluded.weight,
        position = excluded.position,
        kind = excluded.kind
    `);

        const loadAll = this.db.transaction((g: ProjectedGraph) => {
            for (const node of g.documents) upsertDocument.run(node);
            for (const node of g.authors) upsertAuthor.run(node);
            for (const node of g.journals) upsertJournal.run(node);
            for (const node of g.rankingBodies) upsertBody.run(node);
            for (const node of g.rankings) upsertRanking.run(node);
            for (const node of g.years) upsertYear.run(node);
            for (const node of g.keywords) upsertKeyword.run(node);

            const all: Relationship[] = Object.values(g.relationships).flat();
            for (const rel of all) upsertEdge.run(rel);
        });

        loadAll(graph);
        logger.debug({ documents: graph.documents.length }, 'Graph loaded');
    }

    // ─── Graph capability ─────────────────────────────────────

    /**
     * Run one read-only statement with named parameters (`@name`).
     *
     * @throws GraphQueryRejected for anything but a single read-only query, or invalid SQL
     * @throws GraphUnavailable when the store itself fails
     */
    async run(query: string, params: Record<string, QueryParam> = {}): Promise<GraphRow[]> {
        let statement: Database.Statement;
        try {
            statement = this.db.prepare(query);
        } catch (error) {
            throw this.classifyError(error, query);
        }

        if (!statement.reader || !statement.readonly) {
            throw new GraphQueryRejected('Only read-only queries that return rows are allowed');
        }

        try {
            const rows: unknown[] = Object.keys(params).length > 0 ? statement.all(params) : statement.all();
            return rows.filter(isRow);
        } catch (error) {
            throw this.classifyError(error, query);
        }
    }

    describeSchema(): string {
        return SCHEMA_DESCRIPTION;
    }

    private classifyError(error: unknown, query: string): Error {
        // A bad statement (syntax, unknown column, multiple statements) is the query's fault
        if (error instanceof RangeError || (error instanceof Error && 'code' in error && error.code === 'SQLITE_ERROR')) {
            return new GraphQueryRejected(`Invalid graph query: ${error.message}`, { cause: error });
        }
        logger.debug({ query }, 'Graph query failed');
        return new GraphUnavailable('Graph store query failed', { cause: error });
    }

    // ─── Imports ──────────────────────────────────────────────

    insertImport(record: Omit<ImportRecord, 'import_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO imports (created_at, bibliorag_version, generation, source_file, config_json, stats_json)
      VALUES (@created_at, @bibliorag_version, @generation, @source_file, @config_json, @stats_json)
    `);
        const result = stmt.run(record);
        return Number(result.lastInsertRowid);
    }

    getImports(): ImportRecord[] {
        return this.db
            .prepare<[], ImportRecord>('SELECT * FROM imports ORDER BY import_id')
            .all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): GraphStats {
        const count = (table: string): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

        const nodes: Record<NodeLabel, number> = {
            [NodeLabel.Document]: 0,
            [NodeLabel.Author]: 0,
            [NodeLabel.Journal]: 0,
            [NodeLabel.RankingBody]: 0,
            [NodeLabel.Ranking]: 0,
            [NodeLabel.Year]: 0,
            [NodeLabel.Keyword]: 0,
        };
        for (const label of Object.values(NodeLabel)) {
            nodes[label] = count(NODE_TABLES[label]);
        }

        const edgeTypeRows = this.db
            .prepare<[], { type: string; count: number }>('SELECT type, COUNT(*) AS count FROM edges GROUP BY type ORDER BY type')
            .all();
        const edgesByType: Record<string, number> = {};
        for (const type of Object.values(RelationshipType)) edgesByType[type] = 0;
        for (const row of edgeTypeRows) edgesByType[row.type] = row.count;

        return { nodes, edges: count('edges'), edgesByType, imports: count('imports') };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Fold the write-ahead log into the main file and leave WAL mode, so the
     * finished store can be opened read-only without side files.
     */
    seal(): void {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
        this.db.pragma('journal_mode = DELETE');
    }

    /**
     * Close the database connection.
     */
    close(): void {
        if (!this.db.open) return;
        this.db.close();
        logger.debug({ dbPath: this.dbPath }, 'Graph store closed');
    }
}

function openDatabase(dbPath: string, readonly: boolean): Database.Database {
    let db: Database.Database;
    try {
        db = readonly ? new Database(dbPath, { readonly: true, fileMustExist: true }) : new Database(dbPath);
    } catch (error) {
        throw new GraphUnavailable(`Cannot open graph store at ${dbPath}`, { cause: error });
    }
    // SQLite's lower() only folds ASCII.
    db.function('ulower', { deterministic: true }, (value: unknown) =>
        typeof value === 'string' ? value.toLowerCase() : value
    );
    return db;
}

function isRow(value: unknown): value is GraphRow {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
