import { z } from 'zod';
import type { EmbeddingProvider } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

const EmbedResponseSchema = z.object({
    embeddings: z.array(z.array(z.number())),
});

/**
 * Embeddings from a local Ollama server (`POST /api/embed`).
 */
export class OllamaEmbedder implements EmbeddingProvider {
    readonly name = 'ollama';
    private readonly baseUrl: string;

    constructor(
        private readonly client: HttpClient,
        private readonly model: string,
        readonly dimensions: number,
        baseUrl?: string
    ) {
        this.baseUrl = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    }

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const response = await this.client.post(
            `${this.baseUrl}/api/embed`,
            { model: this.model, input: texts },
            EmbedResponseSchema,
            { source: 'ollama', timeout: 120_000 }
        );

        return checkShape(response.data.embeddings, texts.length, this.dimensions, this.name);
    }
}

/**
 * Reject a response whose vector count or length does not match the request.
 */
export function checkShape(vectors: number[][], expected: number, dimensions: number, provider: string): number[][] {
    if (vectors.length !== expected) {
        throw new Error(`${provider} returned ${vectors.length} embeddings for ${expected} inputs`);
    }
    const wrong = vectors.find((v) => v.length !== dimensions);
    if (wrong) {
        throw new Error(`${provider} returned ${wrong.length}-dimensional embeddings, expected ${dimensions}`);
    }
    return vectors;
}
