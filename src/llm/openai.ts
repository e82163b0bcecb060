import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { GenerationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { toGenerationError } from './errors.js';

const logger = getLogger();

const DEFAULT_BASE_URL = 'https://api.openai.com';
const DEFAULT_TIMEOUT_MS = 60_000;

const ChatResponseSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
        })
        .optional(),
});

const ModelsResponseSchema = z.object({
    data: z.array(z.unknown()),
});

/**
 * Text generation through the OpenAI chat completions API or a compatible server.
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
    readonly model: string;
    private readonly baseUrl: string;
    private readonly apiKey: string;

    constructor(
        private readonly client: HttpClient,
        options: LlmProviderOptions
    ) {
        if (!options.apiKey) throw new Error('OpenAI provider requires an API key');
        this.apiKey = options.apiKey;
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const timeoutMs = params.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        const messages = [
            ...(params.systemPrompt ? [{ role: 'system', content: params.systemPrompt }] : []),
            { role: 'user', content: prompt },
        ];

        try {
            const response = await this.client.post(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: this.model,
                    messages,
                    temperature: params.temperature,
                    max_tokens: params.maxTokens,
                },
                ChatResponseSchema,
                {
                    source: 'openai',
                    headers: { Authorization: `Bearer ${this.apiKey}` },
                    timeout: timeoutMs,
                    maxRetries: 0,
                }
            );
            const data = response.data;
            const content = data.choices[0]?.message.content;
            if (content === null || content === undefined) {
                throw new GenerationError('openai returned an empty completion');
            }
            logger.debug({ model: this.model, usage: data.usage }, 'OpenAI completion');

            return {
                text: content,
                usage: data.usage
                    ? { promptTokens: data.usage.prompt_tokens, completionTokens: data.usage.completion_tokens }
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
            await this.client.get(`${this.baseUrl}/v1/models`, ModelsResponseSchema, {
                source: 'openai',
                headers: { Authorization: `Bearer ${this.apiKey}` },
                timeout: 5000,
                maxRetries: 0,
            });
            return true;
        } catch {
            return false;
        }
    }
}
