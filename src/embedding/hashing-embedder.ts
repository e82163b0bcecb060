import type { EmbeddingProvider } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';

/**
 * Field labels of the embedding text block. They occur in every document,
 * so they carry no signal and are skipped.
 */
const FIELD_LABEL_TOKENS: ReadonlySet<string> = new Set(['title', 'abstract', 'authors', 'journal', 'year']);

/**
 * Local, deterministic embedder using signed feature hashing of tokens.
 * Needs no model download; similar token sets give similar vectors.
 * Output is not normalized (the vector indexer does that).
 */
export class HashingEmbedder implements EmbeddingProvider {
    readonly name = 'hashing';

    constructor(readonly dimensions = 384) {
        if (!Number.isInteger(dimensions) || dimensions < 1) {
            throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`);
        }
    }

    async embed(texts: string[]): Promise<number[][]> {
        return texts.map((text) => this.embedOne(text));
    }

    embedOne(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);
        for (const token of tokenize(text)) {
            if (FIELD_LABEL_TOKENS.has(token)) continue;
            const hash = fnv1a(token);
            const index = hash % this.dimensions;
            // High bit picks the sign so collisions tend to cancel
            vector[index] = (vector[index] ?? 0) + ((hash & 0x80000000) === 0 ? 1 : -1);
        }
        return vector;
    }
}

/**
 * 32-bit FNV-1a over UTF-16 code units, as an unsigned integer.
 */
export function fnv1a(value: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}
