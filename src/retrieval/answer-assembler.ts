import type { LlmProvider, RankedSource } from '../types/index.js';
import { GenerationError, withTimeout } from '../utils/errors.js';

/** Sentence the model must reply with when no source supports an answer */
export const REFUSAL_SENTENCE = 'The provided sources do not contain enough information to answer this question.';

/** Answer text when generation failed or timed out but sources were found */
export const FALLBACK_ANSWER =
    'Answer generation timed out or failed. The sources listed below are the closest matches for your question.';

/** Answer text when no text-generation capability is configured */
export const GENERATION_DISABLED_ANSWER =
    'Answer generation is disabled. The sources listed below are the closest matches for your question.';

/** Answer text when nothing relevant was found */
export const NO_MATCH_ANSWER = 'No relevant papers found for this question. Try rephrasing it or asking about an author or topic.';

/**
 * Grounded prompt: numbered sources in similarity order, the graph's
 * findings when there are any, then the question.
 */
export function buildPrompt(query: string, sources: RankedSource[], graphFindings: string | null = null): string {
    const blocks = sources.map((source, index) => {
        const meta = source.metadata;
        const lines = [
            `[${index + 1}] Title: ${meta.title}`,
            `    Authors: ${meta.authors || 'Unknown'}`,
            `    Journal: ${meta.journal || 'Unknown'}${meta.year !== null ? ` (${meta.year})` : ''}`,
            `    DOI: ${meta.doi}`,
            `    Abstract: ${meta.abstract_snippet}`,
        ];
        return lines.join('\n');
    });

    const sections = [
        'You are a research assistant answering questions about a collection of academic papers.',
        'Answer only from the numbered sources below and cite them as [1], [2] and so on.',
        `If the sources do not support an answer, reply exactly: "${REFUSAL_SENTENCE}"`,
        '',
        'SOURCES:',
        blocks.length > 0 ? blocks.join('\n\n') : '(none)',
    ];

    if (graphFindings) {
        sections.push('', 'GRAPH FINDINGS:', graphFindings);
    }

    sections.push(
        '',
        `QUESTION: ${query}`,
        '',
        'Give a clear, concise answer (at most three paragraphs) that cites specific papers.',
        'ANSWER:'
    );
    return sections.join('\n');
}

export interface AnswerAssemblerOptions {
    temperature: number;
    maxTokens: number;
}

/**
 * Runs the generation call for an assembled prompt.
 */
export class AnswerAssembler {
    constructor(
        private readonly llm: LlmProvider,
        private readonly options: AnswerAssemblerOptions
    ) {}

    /**
     * @throws GenerationTimeout when `timeoutMs` elapses
     * @throws GenerationError on any other failure, including an empty reply
     */
    async invoke(prompt: string, timeoutMs: number): Promise<string> {
        const result = await withTimeout(
            this.llm.complete(prompt, {
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
                timeoutMs,
            }),
            timeoutMs
        );

        const text = result.text.trim();
        if (!text) throw new GenerationError(`${this.llm.name} returned an empty answer`);
        return text;
    }
}
