import { z } from 'zod';
import type { EmbeddingProvider } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { checkShape } from './ollama-embedder.js';

const DEFAULT_BASE_URL = 'https://api.openai.com';

const EmbeddingsResponseSchema = z.object({
    data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

/**
 * Embeddings from the OpenAI API (`POST /v1/embeddings`) or a compatible server.
 */
export class OpenAiEmbedder implements EmbeddingProvider {
    readonly name = 'openai';
    private readonly baseUrl: string;

    constructor(
        private readonly client: HttpClient,
        private readonly apiKey: string,
        private readonly model: string,
        readonly dimensions: number,
        baseUrl?: string
    ) {
        this.baseUrl = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    }

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const response = await this.client.post(
            `${this.baseUrl}/v1/embeddings`,
            { model: this.model, input: texts, dimensions: this.dimensions },
            EmbeddingsResponseSchema,
            { source: 'openai', headers: { Authorization: `Bearer ${this.apiKey}` }, timeout: 120_000 }
        );

        const ordered = [...response.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
        return checkShape(ordered, texts.length, this.dimensions, this.name);
    }
}
