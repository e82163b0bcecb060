import type {
    ExtractedEntities,
    GraphCapability,
    GraphRow,
    GraphSearchOutcome,
    IntentLabel,
    LlmProvider,
} from '../types/index.js';
import type { EntityExtractor } from '../nlp/entity-extraction.js';
import {
    COLLABORATION_CUE,
    detectTopicConstraint,
    extractQuotedMentions,
    extractYearMention,
    relaxAuthorName,
    relaxTopic,
} from '../nlp/entity-extraction.js';
import { inferIntentFromText } from './intent-classifier.js';
import type { GraphTemplate } from './graph-templates.js';
import {
    AUTHORS_WITH_MULTIPLE_PAPERS,
    COLLABORATORS_OF_AUTHOR,
    LIST_ALL_AUTHORS,
    LIST_ALL_TOPICS,
    PAPERS_BY_AUTHOR,
    PAPERS_BY_TOPIC,
    PAPERS_BY_YEAR,
    PAPERS_COAUTHORED_BY,
    TOPICS_BY_AUTHOR,
    documentIds,
    formatRows,
} from './graph-templates.js';
import { EntityExtractionAmbiguous, GraphQueryRejected, describeError, withTimeout } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Answer when no template fits and no model-written query could be used.
 */
export const GRAPH_SUGGESTIONS =
    "No results found. Try queries like: • 'Which papers were written by Klaus?' • 'Who collaborated with Maklan?' • 'Show me authors with multiple papers'";

type TemplateParams = Record<string, string | number>;

/**
 * A template chosen for a query, with its strict parameters and, when a
 * looser value exists, the parameters of the single relaxed retry.
 */
export interface TemplatePlan {
    template: GraphTemplate;
    params: TemplateParams;
    relaxed: TemplateParams | null;
}

export interface GraphSearchOptions {
    /** Row cap bound to `@limit` */
    resultLimit: number;
    /** Let the model write one query when no template fits */
    nlFallback: boolean;
}

/**
 * Pick a template from the query's shape and the classified intent.
 * Returns null when no template fits.
 *
 * Order: two quoted authors with a collaboration cue, a year phrase,
 * "same author"/"multiple papers", then the intent label (the lexical
 * label stands in when the model said OTHER or CONCEPT_QUESTION).
 *
 * @throws EntityExtractionAmbiguous when the label's template needs an entity the query lacks
 */
export function planTemplate(query: string, intent: IntentLabel, entities: ExtractedEntities): TemplatePlan | null {
    const quoted = extractQuotedMentions(query);
    if (quoted.length >= 2 && COLLABORATION_CUE.test(query)) {
        const [first = '', second = ''] = quoted;
        const relaxedFirst = relaxAuthorName(first);
        const relaxedSecond = relaxAuthorName(second);
        return {
            template: PAPERS_COAUTHORED_BY,
            params: { first, second },
            relaxed:
                relaxedFirst || relaxedSecond
                    ? { first: relaxedFirst ?? first, second: relaxedSecond ?? second }
                    : null,
        };
    }

    const year = extractYearMention(query);
    if (year !== null) return { template: PAPERS_BY_YEAR, params: { year }, relaxed: null };

    if (/\bsame author\b|\bmultiple papers\b/i.test(query)) {
        return { template: AUTHORS_WITH_MULTIPLE_PAPERS, params: {}, relaxed: null };
    }

    const label = intent === 'OTHER' || intent === 'CONCEPT_QUESTION' ? inferIntentFromText(query) : intent;

    switch (label) {
        case 'PAPERS_BY_AUTHOR':
            return authorPlan(PAPERS_BY_AUTHOR, query, entities);
        case 'TOPICS_BY_AUTHOR':
            return authorPlan(TOPICS_BY_AUTHOR, query, entities);
        case 'COLLABORATIONS':
            return authorPlan(COLLABORATORS_OF_AUTHOR, query, entities);
        case 'PAPERS_BY_TOPIC': {
            const topic = entities.topics[0];
            if (!topic) throw new EntityExtractionAmbiguous('topic', query);
            const relaxed = relaxTopic(topic);
            return { template: PAPERS_BY_TOPIC, params: { topic }, relaxed: relaxed ? { topic: relaxed } : null };
        }
        case 'LIST_AUTHORS':
            return { template: LIST_ALL_AUTHORS, params: {}, relaxed: null };
        case 'LIST_TOPICS':
            return { template: LIST_ALL_TOPICS, params: {}, relaxed: null };
        case 'CONCEPT_QUESTION':
        case 'OTHER':
            return null;
    }
}

function authorPlan(template: GraphTemplate, query: string, entities: ExtractedEntities): TemplatePlan {
    const author = detectTopicConstraint(query)?.author ?? entities.authors[0];
    if (!author) throw new EntityExtractionAmbiguous('author', query);
    const relaxed = relaxAuthorName(author);
    return { template, params: { author }, relaxed: relaxed ? { author: relaxed } : null };
}

/**
 * Pull one SQL statement out of a model reply: code fences and a trailing
 * semicolon are removed. Null unless the result starts with SELECT or WITH.
 */
export function extractSql(reply: string): string | null {
    const fenced = /```(?:sql)?\s*([\s\S]*?)```/i.exec(reply)?.[1] ?? reply;
    const start = fenced.search(/\b(?:select|with)\b/i);
    if (start === -1) return null;
    const sql = fenced.slice(start).trim().replace(/;\s*$/, '').trim();
    return /^(?:select|with)\b/i.test(sql) ? sql : null;
}

/**
 * Graph retrieval path: template routing over the graph capability with
 * one relaxed retry, then an optional model-written query.
 *
 * GraphUnavailable is rethrown; the caller decides what a dead store
 * means for the session. Everything else becomes an outcome.
 */
export class GraphSearch {
    constructor(
        private readonly graph: GraphCapability,
        private readonly extractor: EntityExtractor,
        private readonly llm: LlmProvider | null,
        private readonly options: GraphSearchOptions
    ) {}

    /**
     * @param timeoutMs - Budget for a model-written query, if one is needed
     */
    async search(query: string, intent: IntentLabel, timeoutMs: number): Promise<GraphSearchOutcome> {
        let plan: TemplatePlan | null = null;
        try {
            plan = planTemplate(query, intent, this.extractor.extract(query));
        } catch (error) {
            if (!(error instanceof EntityExtractionAmbiguous)) throw error;
            logger.debug({ entity: error.entity }, 'No entity for template, trying fallback');
        }

        if (plan) return this.runTemplate(plan);
        return this.runNaturalLanguage(query, timeoutMs);
    }

    private async runTemplate(plan: TemplatePlan): Promise<GraphSearchOutcome> {
        const { template } = plan;
        const limit = this.options.resultLimit;

        let params = plan.params;
        let rows = await this.graph.run(template.sql, { ...params, limit });
        if (rows.length === 0 && plan.relaxed) {
            logger.debug({ template: template.name, strict: plan.params, relaxed: plan.relaxed }, 'Retrying with relaxed match');
            params = plan.relaxed;
            rows = await this.graph.run(template.sql, { ...params, limit });
        }

        logger.debug({ template: template.name, rows: rows.length }, 'Graph template ran');

        if (rows.length === 0) {
            return {
                kind: 'no-results',
                template: template.name,
                query: template.sql,
                summary: `No results found for ${describeParams(plan)}.`,
            };
        }

        const summary = template.summarize(rows, params);
        if (template.kind === 'documents') {
            return { kind: 'documents', template: template.name, query: template.sql, summary, documentIds: documentIds(rows) };
        }
        return { kind: 'narrative', template: template.name, query: template.sql, summary };
    }

    private async runNaturalLanguage(query: string, timeoutMs: number): Promise<GraphSearchOutcome> {
        if (!this.llm || !this.options.nlFallback || timeoutMs <= 0) {
            return { kind: 'no-pattern', summary: GRAPH_SUGGESTIONS };
        }

        let sql: string | null;
        try {
            const reply = await withTimeout(
                this.llm.complete(this.buildQueryPrompt(query), { temperature: 0, maxTokens: 256, timeoutMs }),
                timeoutMs
            );
            sql = extractSql(reply.text);
        } catch (error) {
            logger.warn({ error: describeError(error) }, 'Graph query generation failed');
            return { kind: 'no-pattern', summary: GRAPH_SUGGESTIONS };
        }

        if (!sql) {
            logger.warn('Model did not return a SELECT statement');
            return { kind: 'no-pattern', summary: GRAPH_SUGGESTIONS };
        }

        let rows: GraphRow[];
        try {
            rows = await this.graph.run(sql);
        } catch (error) {
            if (!(error instanceof GraphQueryRejected)) throw error;
            logger.warn({ sql, error: error.message }, 'Generated graph query rejected');
            return { kind: 'no-pattern', summary: GRAPH_SUGGESTIONS };
        }

        if (rows.length === 0) {
            return { kind: 'no-results', template: 'natural-language', query: sql, summary: 'No results found.' };
        }

        const limited = rows.slice(0, this.options.resultLimit);
        const ids = documentIds(limited);
        if (ids.length > 0) {
            return {
                kind: 'documents',
                template: 'natural-language',
                query: sql,
                summary: `Found ${ids.length} paper(s).`,
                documentIds: ids,
            };
        }
        return { kind: 'narrative', template: 'natural-language', query: sql, summary: formatRows(limited) };
    }

    private buildQueryPrompt(query: string): string {
        return `You translate questions about a bibliographic collection into one SQLite query.

${this.graph.describeSchema()}

Rules:
- Reply with a single SELECT statement and nothing else.
- Never modify data.
- When the question asks for papers, include d.document_id (documents.document_id) in the result.
- Add LIMIT ${this.options.resultLimit}.

Question: ${query}
SQL:`;
    }
}

function describeParams(plan: TemplatePlan): string {
    const values = Object.entries(plan.params).map(([key, value]) => `${key} "${String(value)}"`);
    const strict = values.length > 0 ? values.join(' and ') : plan.template.name;
    if (!plan.relaxed) return strict;
    const relaxed = Object.values(plan.relaxed).map((value) => `"${String(value)}"`);
    return `${strict} (also tried ${relaxed.join(' and ')})`;
}
