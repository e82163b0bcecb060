import type { ExtractedEntities } from '../types/index.js';
import { isFillerWord } from './stopwords.js';
import { tokenize } from './tokenizer.js';

/**
 * Pulls author and topic mentions out of a free-text question.
 * The retriever only depends on this interface, so the regex heuristic
 * below can be replaced by a model-backed extractor.
 */
export interface EntityExtractor {
    extract(text: string): ExtractedEntities;
}

/** Words that mark a quoted mention as a person rather than a topic */
export const AUTHOR_CUE = /\b(?:authors?|authored|authorship|wrote|written|writes|by|collaborat\w*|co-?authors?\w*|researchers?)\b/i;

/** Words that ask about joint work between people */
export const COLLABORATION_CUE = /\b(?:collaborat\w*|co-?author\w*|together|jointly|both)\b/i;

const NAME_AFTER_PREPOSITION = /\b(?:by|from|of|with)\s+(\p{Lu}[\p{L}'-]+(?:,?\s+\p{Lu}[\p{L}.'-]*)*)/u;
const NAME_BEFORE_VERB = /\bdoes\s+(\p{Lu}[\p{L}'-]+(?:\s+\p{Lu}[\p{L}.'-]*)*)\s+(?:write|research|work|study)/u;
const QUOTED = /"([^"]+)"|“([^”]+)”/g;
const TOPIC_PHRASE = /\b(?:about|on|regarding|related to|concerning)\s+(.+?)(?=\s+by\s+|\s+(?:from|in|during)\s+(?:18|19|20)\d{2}\b|[?!.;]|$)/i;
const TOPIC_CONSTRAINT = /\b(?:papers?|works?|articles?|publications?|research|studies)\s+(?:about|on|regarding)\s+(.+?)\s+by\s+(.+?)\s*[?.!]*$/i;
const YEAR_PHRASE = /\b(?:published\s+in|from|in|during)\s+((?:18|19|20)\d{2})\b/i;

/**
 * Double-quoted substrings ("…" or “…”), trimmed, in order of appearance.
 */
export function extractQuotedMentions(query: string): string[] {
    const mentions: string[] = [];
    for (const match of query.matchAll(QUOTED)) {
        const value = (match[1] ?? match[2] ?? '').trim();
        if (value) mentions.push(value);
    }
    return mentions;
}

/**
 * Layered author-name heuristic:
 * 1. a capitalized name after by/from/of/with
 * 2. a capitalized name between "does" and write/research/work/study
 * 3. the first run of capitalized words that are not question filler
 *
 * Approximate by nature. Returns null when nothing name-like is found.
 */
export function extractAuthorName(query: string): string | null {
    const afterPreposition = NAME_AFTER_PREPOSITION.exec(query)?.[1];
    if (afterPreposition && !isFillerWord(firstWord(afterPreposition))) {
        return cleanName(afterPreposition);
    }

    const beforeVerb = NAME_BEFORE_VERB.exec(query)?.[1];
    if (beforeVerb && !isFillerWord(firstWord(beforeVerb))) {
        return cleanName(beforeVerb);
    }

    const run: string[] = [];
    for (const raw of query.split(/\s+/)) {
        const word = raw.replace(/^[^\p{L}]+|[^\p{L}.'-]+$/gu, '');
        const capitalized = /^\p{Lu}/u.test(word) && !isFillerWord(word.replace(/\.$/, ''));
        if (capitalized) {
            run.push(word);
        } else if (run.length > 0) {
            break;
        }
    }
    return run.length > 0 ? cleanName(run.join(' ')) : null;
}

/**
 * Topic phrase following about/on/regarding/related to/concerning, cut at
 * a trailing "by …" or year phrase.
 */
export function extractTopicPhrase(query: string): string | null {
    const match = TOPIC_PHRASE.exec(query);
    const phrase = match?.[1] ? stripQuotes(match[1]) : '';
    return phrase.length > 0 ? phrase : null;
}

/**
 * Recognises "papers about X by Y": the graph result (Y's papers) is then
 * re-ranked by similarity to X. Splits on the literal word "by".
 */
export function detectTopicConstraint(query: string): { topic: string; author: string } | null {
    const match = TOPIC_CONSTRAINT.exec(query.trim());
    if (!match?.[1] || !match[2]) return null;
    const topic = stripQuotes(match[1]);
    const author = stripQuotes(match[2]);
    if (!topic || !author) return null;
    return { topic, author };
}

/**
 * Year named by a phrase such as "from 2020", "in 1999" or "published in 2021".
 */
export function extractYearMention(query: string): number | null {
    const year = YEAR_PHRASE.exec(query)?.[1];
    return year ? parseInt(year, 10) : null;
}

/**
 * Looser author value for the single retry: the part before the comma in
 * "Last, First" form, otherwise the last word. Null when that is no looser.
 */
export function relaxAuthorName(name: string): string | null {
    const trimmed = name.trim();
    const relaxed = trimmed.includes(',')
        ? (trimmed.split(',')[0] ?? '').trim()
        : (trimmed.split(/\s+/).pop() ?? '').replace(/\.$/, '');

    if (!relaxed || relaxed.toLowerCase() === trimmed.toLowerCase()) return null;
    return relaxed;
}

/**
 * Looser topic value for the single retry: its longest non-stopword token.
 * Null when that is no looser.
 */
export function relaxTopic(topic: string): string | null {
    let longest = '';
    for (const token of tokenize(topic)) {
        if (token.length > longest.length) longest = token;
    }
    if (!longest || longest === topic.trim().toLowerCase()) return null;
    return longest;
}

/**
 * Regex-based extractor.
 *
 * Quoted mentions count as authors when the question carries an
 * authorship/collaboration cue and as topics otherwise.
 */
export class HeuristicEntityExtractor implements EntityExtractor {
    extract(text: string): ExtractedEntities {
        const authors: string[] = [];
        const topics: string[] = [];

        const quoted = extractQuotedMentions(text);
        if (quoted.length > 0 && AUTHOR_CUE.test(text)) {
            authors.push(...quoted);
        } else {
            topics.push(...quoted);
            const name = extractAuthorName(text);
            if (name) authors.push(name);
        }

        const topic = extractTopicPhrase(text);
        if (topic) topics.push(topic);

        return { authors: dedupe(authors), topics: dedupe(topics) };
    }
}

function firstWord(value: string): string {
    return value.split(/[\s,]+/)[0] ?? '';
}

function cleanName(value: string): string {
    return value.replace(/[\s,]+$/, '').trim();
}

function stripQuotes(value: string): string {
    return value.trim().replace(/^["'“‘]+|["'”’]+$/g, '').trim();
}

function dedupe(values: string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const value of values) {
        const key = value.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(value);
    }
    return out;
}
