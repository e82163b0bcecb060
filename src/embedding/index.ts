import type { EmbeddingConfig, EmbeddingProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { HashingEmbedder } from './hashing-embedder.js';
import { OllamaEmbedder } from './ollama-embedder.js';
import { OpenAiEmbedder } from './openai-embedder.js';

export { HashingEmbedder } from './hashing-embedder.js';
export { OllamaEmbedder } from './ollama-embedder.js';
export { OpenAiEmbedder } from './openai-embedder.js';

/**
 * Build the configured embedding provider.
 * The same configuration must be used at ingestion and query time.
 */
export function createEmbeddingProvider(config: EmbeddingConfig, client: HttpClient = getHttpClient()): EmbeddingProvider {
    switch (config.provider) {
        case 'ollama':
            return new OllamaEmbedder(client, config.model, config.dimensions, config.baseUrl);
        case 'openai': {
            const apiKey = getApiKey('OPENAI_API_KEY');
            if (!apiKey) throw new Error('OPENAI_API_KEY is required for the openai embedding provider');
            return new OpenAiEmbedder(client, apiKey, config.model, config.dimensions, config.baseUrl);
        }
        case 'hashing':
            return new HashingEmbedder(config.dimensions);
    }
}
