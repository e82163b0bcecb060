/**
 * Interface for text-generation adapters (Ollama, OpenAI).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Default model */
    readonly model: string;

    /**
     * Send a completion request.
     * Rejects with GenerationTimeout when `timeoutMs` elapses and with
     * GenerationError on any other failure.
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check if the provider is reachable (e.g. the Ollama server is running).
     */
    isAvailable(): Promise<boolean>;
}

/**
 * Parameters for completion requests.
 */
export interface LlmCompletionParams {
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Hard deadline for the whole request */
    timeoutMs?: number;
    /** System prompt */
    systemPrompt?: string;
}

/**
 * Result from a completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage, when the provider reports it */
    usage: {
        promptTokens: number;
        completionTokens: number;
    } | null;
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * Provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (OpenAI) */
    apiKey?: string;
    /** Base URL (Ollama or a compatible endpoint) */
    baseUrl?: string;
    /** Default model */
    model: string;
}
