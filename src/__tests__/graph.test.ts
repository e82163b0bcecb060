import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { projectGraph, countRelationships } from '../graph/projector.js';
import { GraphDatabase } from '../storage/graph-database.js';
import { NodeLabel, RelationshipType } from '../types/index.js';
import { makeId } from '../utils/stable-id.js';
import { GraphQueryRejected, GraphUnavailable } from '../utils/errors.js';
import { makeRecord, makeTmpDir, removeDir } from './helpers.js';

const records = [
    makeRecord({
        document_id: '10.1/a',
        title: 'Brand trust',
        authors: 'Smith, J.; Doe, A.',
        journal_name: 'Journal of Marketing',
        year: 2020,
        publication_date: '2020',
        author_keywords: 'trust; brands',
        index_keywords: 'Trust; loyalty',
        vhb_ranking: 'A',
        abdc_ranking: 'A*',
        issn: '0022-2429',
    }),
    makeRecord({
        document_id: '10.1/b',
        title: 'Loyalty programs',
        authors: 'Doe, A.; Smith, J.',
        journal_name: 'journal of marketing',
        year: 2020,
        publication_date: '2020',
        vhb_ranking: 'A',
    }),
    makeRecord({
        document_id: '10.1/c',
        title: 'Pricing',
        authors: 'Lee, K.',
        year: 2021,
        publication_date: '2021',
    }),
];

describe('projectGraph', () => {
    const graph = projectGraph(records);

    it('should collapse repeated entities into one node', () => {
        expect(graph.documents).toHaveLength(3);
        expect(graph.authors.map((a) => a.name).sort()).toEqual(['Doe, A.', 'Lee, K.', 'Smith, J.']);
        expect(graph.journals).toHaveLength(1);
        expect(graph.journals[0]).toEqual({
            journal_id: makeId('JOURNAL', 'Journal of Marketing'),
            name: 'Journal of Marketing',
            issn: '0022-2429',
            eissn: null,
        });
        expect(graph.years.map((y) => y.value).sort()).toEqual([2020, 2021]);
    });

    it('should record author order on HAS_AUTHOR', () => {
        const edges = graph.relationships[RelationshipType.HAS_AUTHOR].filter((r) => r.src_id === '10.1/b');
        const byAuthor = new Map(edges.map((r) => [r.dst_id, r.position]));
        expect(byAuthor.get(makeId('AUTHOR', 'Doe, A.'))).toBe(1);
        expect(byAuthor.get(makeId('AUTHOR', 'Smith, J.'))).toBe(2);
    });

    it('should weight collaborations by shared documents and store them once', () => {
        const smith = makeId('AUTHOR', 'Smith, J.');
        const doe = makeId('AUTHOR', 'Doe, A.');
        const [src, dst] = smith < doe ? [smith, doe] : [doe, smith];

        expect(graph.relationships[RelationshipType.COLLABORATED_WITH]).toEqual([
            { type: RelationshipType.COLLABORATED_WITH, src_id: src, dst_id: dst, weight: 2, position: null, kind: null },
        ]);
    });

    it('should pair every co-author of a three-author paper exactly once', () => {
        const trio = [makeRecord({ document_id: '10.9/x', title: 'Joint work', authors: 'Kaya, B.; Ng, C.; Ortiz, D.', year: 2019 })];
        const ids = ['Kaya, B.', 'Ng, C.', 'Ortiz, D.'].map((name) => makeId('AUTHOR', name));

        const pairs = projectGraph(trio).relationships[RelationshipType.COLLABORATED_WITH];

        expect(pairs).toHaveLength(3);
        expect(pairs.every((r) => r.src_id < r.dst_id && r.weight === 1)).toBe(true);
        expect(new Set(pairs.map((r) => `${r.src_id}|${r.dst_id}`))).toEqual(
            new Set(
                [
                    [ids[0], ids[1]],
                    [ids[0], ids[2]],
                    [ids[1], ids[2]],
                ].map(([a = '', b = '']) => (a < b ? `${a}|${b}` : `${b}|${a}`))
            )
        );
        expect(projectGraph(trio).relationships[RelationshipType.COLLABORATED_WITH]).toEqual(pairs);
    });

    it('should link documents of the same year', () => {
        expect(graph.relationships[RelationshipType.SAME_YEAR_AS]).toEqual([
            {
                type: RelationshipType.SAME_YEAR_AS,
                src_id: '10.1/a',
                dst_id: '10.1/b',
                weight: 1,
                position: null,
                kind: null,
            },
        ]);
    });

    it('should share one ranking node per body and code', () => {
        expect(graph.rankingBodies.map((b) => b.name).sort()).toEqual(['ABDC', 'VHB']);
        expect(graph.rankings.map((r) => r.code).sort()).toEqual(['A', 'A*']);
        expect(graph.relationships[RelationshipType.HAS_RATING]).toHaveLength(2);
        expect(graph.relationships[RelationshipType.ISSUED_BY]).toHaveLength(2);
    });

    it('should prefer the author kind for keywords in both fields', () => {
        const edges = graph.relationships[RelationshipType.HAS_KEYWORD];
        const kinds = new Map(edges.map((r) => [r.dst_id, r.kind]));
        expect(kinds.get(makeId('KEYWORD', 'trust'))).toBe('author');
        expect(kinds.get(makeId('KEYWORD', 'loyalty'))).toBe('index');
        expect(graph.keywords).toHaveLength(3);
    });

    it('should skip journal edges for records without a journal', () => {
        const published = graph.relationships[RelationshipType.PUBLISHED_IN].map((r) => r.src_id);
        expect(published).toEqual(['10.1/a', '10.1/b']);
    });

    it('should be deterministic', () => {
        expect(projectGraph(records.map((r) => ({ ...r })))).toEqual(graph);
    });

    it('should count relationships across types', () => {
        // 5 HAS_AUTHOR, 2 PUBLISHED_IN, 2 HAS_RATING, 2 ISSUED_BY, 1 COLLABORATED_WITH,
        // 1 SAME_YEAR_AS, 3 HAS_KEYWORD, 3 IN_YEAR
        expect(countRelationships(graph)).toBe(19);
    });
});

describe('GraphDatabase', () => {
    let dir: string;
    let dbPath: string;
    let db: GraphDatabase;

    beforeEach(() => {
        dir = makeTmpDir();
        dbPath = path.join(dir, 'graph.db');
        db = new GraphDatabase(dbPath);
        db.load(projectGraph(records));
    });

    afterEach(() => {
        db.close();
        removeDir(dir);
    });

    it('should set PRAGMA user_version = 1 and count nodes', () => {
        const stats = db.getStats();
        expect(stats.nodes).toEqual({
            [NodeLabel.Document]: 3,
            [NodeLabel.Author]: 3,
            [NodeLabel.Journal]: 1,
            [NodeLabel.RankingBody]: 2,
            [NodeLabel.Ranking]: 2,
            [NodeLabel.Year]: 2,
            [NodeLabel.Keyword]: 3,
        });
        expect(stats.edges).toBe(19);
        expect(stats.edgesByType[RelationshipType.SAME_YEAR_AS]).toBe(1);
    });

    it('should be idempotent when the same projection is loaded again', () => {
        const before = db.getStats();
        db.load(projectGraph(records));
        expect(db.getStats()).toEqual(before);
    });

    it('should run parameterized read-only queries', async () => {
        const rows = await db.run(
            'SELECT d.document_id FROM documents d WHERE d.year = @year ORDER BY d.document_id',
            { year: 2020 }
        );
        expect(rows).toEqual([{ document_id: '10.1/a' }, { document_id: '10.1/b' }]);
    });

    it('should reject writes and invalid SQL', async () => {
        await expect(db.run("DELETE FROM documents WHERE document_id = '10.1/a'")).rejects.toBeInstanceOf(
            GraphQueryRejected
        );
        await expect(db.run('SELECT nope FROM nowhere')).rejects.toBeInstanceOf(GraphQueryRejected);
        await expect(db.run('SELECT 1; SELECT 2')).rejects.toBeInstanceOf(GraphQueryRejected);
        expect((await db.run('SELECT COUNT(*) AS n FROM documents'))[0]).toEqual({ n: 3 });
    });

    it('should describe its schema', () => {
        expect(db.describeSchema()).toContain('COLLABORATED_WITH');
    });

    it('should record imports', () => {
        db.insertImport({
            created_at: '2026-01-01T00:00:00.000Z',
            bibliorag_version: '1.0.0',
            generation: 1,
            source_file: 'export.csv',
            config_json: '{}',
            stats_json: '{}',
        });
        expect(db.getImports()).toMatchObject([{ import_id: 1, generation: 1, source_file: 'export.csv' }]);
    });

    it('should open read-only after sealing', async () => {
        db.seal();
        db.close();

        const reader = GraphDatabase.openReadonly(dbPath);
        expect(reader.isReadonly).toBe(true);
        expect(await reader.run('SELECT COUNT(*) AS n FROM authors')).toEqual([{ n: 3 }]);
        expect(await reader.run("SELECT ulower('ÖZTÜRK, Ä.') AS name")).toEqual([{ name: 'öztürk, ä.' }]);
        reader.close();
    });

    it('should refuse a missing or foreign store', () => {
        expect(() => GraphDatabase.openReadonly(path.join(dir, 'missing.db'))).toThrow(GraphUnavailable);

        const junk = path.join(dir, 'junk.db');
        fs.writeFileSync(junk, 'not a database at all, just text padding it out past the header');
        expect(() => GraphDatabase.openReadonly(junk)).toThrow(GraphUnavailable);
    });
});
