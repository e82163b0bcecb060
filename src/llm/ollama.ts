import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { toGenerationError } from './errors.js';

const logger = getLogger();

const DEFAULT_BASE_URL = 'http://localhost:11434';
const DEFAULT_TIMEOUT_MS = 60_000;

const GenerateResponseSchema = z.object({
    model: z.string().optional(),
    response: z.string(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

const TagsResponseSchema = z.object({
    models: z.array(z.unknown()),
});

/**
 * Text generation through a local Ollama server (`POST /api/generate`,
 * non-streaming).
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly model: string;
    private readonly baseUrl: string;

    constructor(
        private readonly client: HttpClient,
        options: LlmProviderOptions
    ) {
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const timeoutMs = params.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        const body = {
            model: this.model,
            prompt,
            system: params.systemPrompt,
            stream: false,
            options: {
                temperature: params.temperature,
                num_predict: params.maxTokens,
            },
        };

        try {
            const response = await this.client.post(`${this.baseUrl}/api/generate`, body, GenerateResponseSchema, {
                source: 'ollama',
                timeout: timeoutMs,
                maxRetries: 0,
            });
            const data = response.data;
            logger.debug({ model: this.model, evalCount: data.eval_count }, 'Ollama completion');

            return {
                text: data.response,
                usage:
                    data.prompt_eval_count !== undefined && data.eval_count !== undefined
                        ? { promptTokens: data.prompt_eval_count, completionTokens: data.eval_count }
                        : null,
                model: data.model ?? this.model,
                provider: this.name,
            };
        } catch (error) {
            throw toGenerationError(error, this.name, timeoutMs);
        }
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.client.get(`${this.baseUrl}/api/tags`, TagsResponseSchema, {
                source: 'ollama',
                timeout: 3000,
                maxRetries: 0,
            });
            return true;
        } catch {
            return false;
        }
    }
}
