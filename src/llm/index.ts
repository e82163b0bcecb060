import type { LlmConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';

export { OllamaProvider } from './ollama.js';
export { OpenAiProvider } from './openai.js';

/**
 * Build the configured text-generation provider, or null when generation
 * is disabled.
 */
export function createLlmProvider(config: LlmConfig, client: HttpClient = getHttpClient()): LlmProvider | null {
    if (!config.enabled) return null;

    switch (config.provider) {
        case 'openai':
            return new OpenAiProvider(client, {
                apiKey: getApiKey('OPENAI_API_KEY'),
                baseUrl: config.baseUrl,
                model: config.model,
            });
        case 'ollama':
            return new OllamaProvider(client, { baseUrl: config.baseUrl, model: config.model });
    }
}
