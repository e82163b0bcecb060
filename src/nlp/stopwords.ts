import lists from './stopwords.json' with { type: 'json' };

/**
 * English stopword list plus generic academic filler words.
 * No stemming, so tokenization stays deterministic.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([...lists.english, ...lists.academic]);

/**
 * Words that open or frame a question ("Which papers…", "Show me…") and are
 * never an author name or a topic on their own.
 */
export const QUERY_WORDS: ReadonlySet<string> = new Set(lists.query);

/**
 * True when `word` carries no entity information in a question.
 */
export function isFillerWord(word: string): boolean {
    const lower = word.toLowerCase();
    return STOPWORDS.has(lower) || QUERY_WORDS.has(lower);
}
