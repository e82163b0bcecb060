import type { IntentLabel, LlmProvider } from '../types/index.js';
import { INTENT_LABELS } from '../types/index.js';
import { extractAuthorName, extractQuotedMentions } from '../nlp/entity-extraction.js';
import { describeError, withTimeout } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const LABEL_DESCRIPTIONS: Record<IntentLabel, string> = {
    PAPERS_BY_AUTHOR: 'papers written by a specific person',
    TOPICS_BY_AUTHOR: 'topics or keywords a specific person works on',
    COLLABORATIONS: 'who collaborated or co-authored with whom',
    PAPERS_BY_TOPIC: 'papers about a specific subject',
    LIST_AUTHORS: 'list or count the authors in the collection',
    LIST_TOPICS: 'list the topics or keywords in the collection',
    CONCEPT_QUESTION: 'explain a concept or idea using the papers',
    OTHER: 'anything else',
};

/**
 * Lexical patterns that make a question worth a graph lookup.
 */
const GRAPH_TRIGGERS: readonly RegExp[] = [
    /\b(?:author|authors|authored|authorship)\b/i,
    /\b(?:wrote|written|writes)\b/i,
    /\b(?:[Pp]apers|[Ww]orks|[Aa]rticles|[Pp]ublications)\s+(?:by|from|of)\s+\p{Lu}/u,
    /collaborat/i,
    /\bco-?author/i,
    /\b(?:topics|keywords|themes)\b/i,
    /\bsame author\b|\bmultiple papers\b/i,
    /\b(?:published\s+in|from|in|during)\s+(?:18|19|20)\d{2}\b/i,
    /\b(?:papers?|articles?|publications?)\s+(?:about|on)\b/i,
    /"[^"]+"|“[^”]+”/,
];

/**
 * Cheap pre-filter run on every question: does it look like it is about
 * authorship, collaboration, topics, years or a quoted entity? No model call.
 */
export function shouldUseGraph(query: string): boolean {
    return GRAPH_TRIGGERS.some((pattern) => pattern.test(query));
}

/**
 * Closed-label classification prompt.
 */
export function buildClassifierPrompt(query: string): string {
    const labels = INTENT_LABELS.map((label) => `- ${label}: ${LABEL_DESCRIPTIONS[label]}`).join('\n');
    return `Classify the question about a collection of academic papers into exactly one label.

Labels:
${labels}

Question: ${query}

Reply with the label only.
Label:`;
}

/**
 * Pull the earliest known label out of free text. Case and separators are
 * ignored ("papers by author" matches PAPERS_BY_AUTHOR). OTHER when none.
 */
export function parseIntentLabel(text: string): IntentLabel {
    const normalized = `_${text.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_`;

    let best: IntentLabel = 'OTHER';
    let bestIndex = Number.POSITIVE_INFINITY;
    for (const label of INTENT_LABELS) {
        const index = normalized.indexOf(`_${label}_`);
        if (index !== -1 && index < bestIndex) {
            best = label;
            bestIndex = index;
        }
    }
    return best;
}

/**
 * Label from wording alone. Used when no model is configured, and by graph
 * routing when the model only said OTHER or CONCEPT_QUESTION.
 */
export function inferIntentFromText(query: string): IntentLabel {
    if (/collaborat|\bco-?author|\bworked with\b/i.test(query)) return 'COLLABORATIONS';

    const hasAuthor = extractQuotedMentions(query).length > 0 || extractAuthorName(query) !== null;

    if (/\b(?:topics?|keywords?|themes?|research areas?)\b/i.test(query)) {
        return hasAuthor ? 'TOPICS_BY_AUTHOR' : 'LIST_TOPICS';
    }
    if (/\b(?:list|all|which|show|how many)\b.*\bauthors\b/i.test(query) || /\bwho are the authors\b/i.test(query)) {
        return 'LIST_AUTHORS';
    }
    if (
        /\b(?:wrote|written|writes|authored)\b/i.test(query) ||
        /\b(?:[Pp]apers?|[Ww]orks?|[Aa]rticles?|[Pp]ublications?)\s+(?:by|from|of)\s+\p{Lu}/u.test(query) ||
        /\bby\s+\p{Lu}/u.test(query)
    ) {
        return 'PAPERS_BY_AUTHOR';
    }
    if (/\b(?:papers?|works?|articles?|publications?|research|studies)\s+(?:about|on|regarding)\b/i.test(query)) {
        return 'PAPERS_BY_TOPIC';
    }
    if (/^\s*(?:what|how|why|explain|define|describe)\b/i.test(query)) return 'CONCEPT_QUESTION';
    return 'OTHER';
}

export interface IntentClassifierOptions {
    /** Deadline for one classification call */
    timeoutMs: number;
}

/**
 * Classifies questions with the text-generation capability. Never throws:
 * any failure gives OTHER, and without a model the lexical label is used.
 */
export class IntentClassifier {
    constructor(
        private readonly llm: LlmProvider | null,
        private readonly options: IntentClassifierOptions
    ) {}

    async classify(query: string): Promise<IntentLabel> {
        if (!this.llm) return inferIntentFromText(query);

        try {
            const result = await withTimeout(
                this.llm.complete(buildClassifierPrompt(query), {
                    temperature: 0,
                    maxTokens: 12,
                    timeoutMs: this.options.timeoutMs,
                }),
                this.options.timeoutMs
            );
            const label = parseIntentLabel(result.text);
            logger.debug({ label, raw: result.text.slice(0, 60) }, 'Intent classified');
            return label;
        } catch (error) {
            logger.warn({ error: describeError(error) }, 'Intent classification failed, using OTHER');
            return 'OTHER';
        }
    }
}
