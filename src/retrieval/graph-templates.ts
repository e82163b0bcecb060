import type { GraphRow, GraphTemplateName } from '../types/index.js';

/**
 * Documents templates return `document_id` rows the retriever resolves
 * against the vector index; narrative templates are rendered as text.
 */
export type TemplateKind = 'documents' | 'narrative';

export interface GraphTemplate {
    name: Exclude<GraphTemplateName, 'natural-language'>;
    kind: TemplateKind;
    /** Read-only SQL with named parameters; always bounded by `@limit` */
    sql: string;
    /** Text for the rows of a non-empty result */
    summarize(rows: GraphRow[], params: Record<string, string | number>): string;
}

const AUTHOR_MATCH = 'instr(ulower(a.name), ulower(@author)) > 0';

export const PAPERS_BY_AUTHOR: GraphTemplate = {
    name: 'papers-by-author',
    kind: 'documents',
    sql: `SELECT DISTINCT d.document_id, d.title, d.year, a.name AS author
FROM authors a
JOIN edges e ON e.type = 'HAS_AUTHOR' AND e.dst_id = a.author_id
JOIN documents d ON d.document_id = e.src_id
WHERE ${AUTHOR_MATCH}
ORDER BY d.year DESC, d.document_id
LIMIT @limit`,
    summarize: (rows, params) => {
        const names = distinct(rows.map((row) => text(row.author)));
        return `Found ${countDocuments(rows)} paper(s) by ${names.join('; ') || String(params.author)}`;
    },
};

export const PAPERS_COAUTHORED_BY: GraphTemplate = {
    name: 'papers-coauthored-by',
    kind: 'documents',
    sql: `SELECT d.document_id, d.title, d.year
FROM documents d
WHERE EXISTS (
  SELECT 1 FROM edges e JOIN authors a ON a.author_id = e.dst_id
  WHERE e.type = 'HAS_AUTHOR' AND e.src_id = d.document_id AND instr(ulower(a.name), ulower(@first)) > 0
)
AND EXISTS (
  SELECT 1 FROM edges e JOIN authors a ON a.author_id = e.dst_id
  WHERE e.type = 'HAS_AUTHOR' AND e.src_id = d.document_id AND instr(ulower(a.name), ulower(@second)) > 0
)
ORDER BY d.year DESC, d.document_id
LIMIT @limit`,
    summarize: (rows, params) =>
        `Found ${countDocuments(rows)} paper(s) co-authored by ${String(params.first)} and ${String(params.second)}`,
};

export const COLLABORATORS_OF_AUTHOR: GraphTemplate = {
    name: 'collaborators-of-author',
    kind: 'narrative',
    sql: `SELECT a.name AS author, c.name AS collaborator, e.weight AS shared
FROM authors a
JOIN edges e ON e.type = 'COLLABORATED_WITH' AND (e.src_id = a.author_id OR e.dst_id = a.author_id)
JOIN authors c ON c.author_id = CASE WHEN e.src_id = a.author_id THEN e.dst_id ELSE e.src_id END
WHERE ${AUTHOR_MATCH}
ORDER BY e.weight DESC, c.name
LIMIT @limit`,
    summarize: (rows) => {
        const byAuthor = new Map<string, string[]>();
        for (const row of rows) {
            const author = text(row.author);
            const list = byAuthor.get(author) ?? [];
            list.push(`${text(row.collaborator)} (${plural(Number(row.shared), 'shared paper')})`);
            byAuthor.set(author, list);
        }
        return [...byAuthor]
            .map(([author, collaborators]) => `${author} collaborated with: ${collaborators.join(', ')}`)
            .join('\n');
    },
};

export const PAPERS_BY_TOPIC: GraphTemplate = {
    name: 'papers-by-topic',
    kind: 'documents',
    sql: `SELECT d.document_id, d.title, d.year
FROM documents d
WHERE instr(ulower(d.title), ulower(@topic)) > 0
   OR instr(ulower(d.abstract), ulower(@topic)) > 0
   OR EXISTS (
     SELECT 1 FROM edges e JOIN keywords k ON k.keyword_id = e.dst_id
     WHERE e.type = 'HAS_KEYWORD' AND e.src_id = d.document_id AND instr(ulower(k.name), ulower(@topic)) > 0
   )
ORDER BY d.year DESC, d.document_id
LIMIT @limit`,
    summarize: (rows, params) => `Found ${countDocuments(rows)} paper(s) about "${String(params.topic)}".`,
};

export const PAPERS_BY_YEAR: GraphTemplate = {
    name: 'papers-by-year',
    kind: 'documents',
    sql: `SELECT d.document_id, d.title, d.year,
  (SELECT COUNT(*) FROM edges s
   WHERE s.type = 'SAME_YEAR_AS' AND (s.src_id = d.document_id OR s.dst_id = d.document_id)) AS same_year_links
FROM documents d
JOIN edges e ON e.type = 'IN_YEAR' AND e.src_id = d.document_id
JOIN years y ON y.year_id = e.dst_id
WHERE y.value = @year
ORDER BY d.document_id
LIMIT @limit`,
    summarize: (rows, params) => {
        const found = `Found ${countDocuments(rows)} paper(s) published in ${String(params.year)}`;
        // Every paper of a year links to all the others, so the largest count is the bucket size minus one.
        const links = Math.max(0, ...rows.map((row) => Number(row.same_year_links) || 0));
        if (links === 0) return `${found}.`;
        return `${found}, each linked to ${plural(links, 'other paper')} from the same year.`;
    },
};

export const LIST_ALL_AUTHORS: GraphTemplate = {
    name: 'list-all-authors',
    kind: 'narrative',
    sql: `SELECT a.name AS author, COUNT(e.src_id) AS papers
FROM authors a
LEFT JOIN edges e ON e.type = 'HAS_AUTHOR' AND e.dst_id = a.author_id
GROUP BY a.author_id
ORDER BY papers DESC, a.name
LIMIT @limit`,
    summarize: (rows) => `Authors: ${rows.map((row) => `${text(row.author)} (${plural(Number(row.papers), 'paper')})`).join(', ')}`,
};

export const LIST_ALL_TOPICS: GraphTemplate = {
    name: 'list-all-topics',
    kind: 'narrative',
    sql: `SELECT k.name AS topic, COUNT(e.src_id) AS papers
FROM keywords k
LEFT JOIN edges e ON e.type = 'HAS_KEYWORD' AND e.dst_id = k.keyword_id
GROUP BY k.keyword_id
ORDER BY papers DESC, k.name
LIMIT @limit`,
    summarize: (rows) => `Topics: ${rows.map((row) => `${text(row.topic)} (${plural(Number(row.papers), 'paper')})`).join(', ')}`,
};

export const TOPICS_BY_AUTHOR: GraphTemplate = {
    name: 'topics-by-author',
    kind: 'narrative',
    sql: `SELECT a.name AS author, k.name AS topic, COUNT(DISTINCT w.src_id) AS papers
FROM authors a
JOIN edges w ON w.type = 'HAS_AUTHOR' AND w.dst_id = a.author_id
JOIN edges e ON e.type = 'HAS_KEYWORD' AND e.src_id = w.src_id
JOIN keywords k ON k.keyword_id = e.dst_id
WHERE ${AUTHOR_MATCH}
GROUP BY a.author_id, k.keyword_id
ORDER BY papers DESC, k.name
LIMIT @limit`,
    summarize: (rows) => {
        const byAuthor = new Map<string, string[]>();
        for (const row of rows) {
            const author = text(row.author);
            const list = byAuthor.get(author) ?? [];
            list.push(text(row.topic));
            byAuthor.set(author, list);
        }
        return [...byAuthor].map(([author, topics]) => `${author} works on: ${topics.join(', ')}`).join('\n');
    },
};

export const AUTHORS_WITH_MULTIPLE_PAPERS: GraphTemplate = {
    name: 'authors-with-multiple-papers',
    kind: 'narrative',
    sql: `SELECT a.name AS author, COUNT(*) AS papers
FROM authors a
JOIN edges e ON e.type = 'HAS_AUTHOR' AND e.dst_id = a.author_id
GROUP BY a.author_id
HAVING COUNT(*) > 1
ORDER BY papers DESC, a.name
LIMIT @limit`,
    summarize: (rows) =>
        `Authors with multiple papers: ${rows.map((row) => `${text(row.author)} (${plural(Number(row.papers), 'paper')})`).join(', ')}`,
};

/**
 * Render arbitrary rows, one line each, for model-written queries.
 */
export function formatRows(rows: GraphRow[]): string {
    return rows
        .map((row) =>
            Object.entries(row)
                .map(([key, value]) => `${key}: ${value === null ? '' : text(value)}`)
                .join(', ')
        )
        .join('\n');
}

/**
 * Document ids in first-seen order.
 */
export function documentIds(rows: GraphRow[]): string[] {
    return distinct(rows.map((row) => row.document_id).filter((id): id is string => typeof id === 'string' && id !== ''));
}

function countDocuments(rows: GraphRow[]): number {
    return documentIds(rows).length;
}

function text(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value) ?? '';
}

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function distinct(values: string[]): string[] {
    return [...new Set(values)];
}
