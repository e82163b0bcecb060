import { GenerationError, GenerationTimeout } from '../utils/errors.js';
import { HttpError } from '../utils/http-client.js';

/**
 * Map a transport failure onto the generation error taxonomy.
 */
export function toGenerationError(error: unknown, provider: string, timeoutMs: number): Error {
    if (error instanceof GenerationTimeout || error instanceof GenerationError) return error;
    if (error instanceof HttpError && error.kind === 'timeout') return new GenerationTimeout(timeoutMs);

    const message = error instanceof Error ? error.message : String(error);
    return new GenerationError(`${provider} generation failed: ${message}`, { cause: error });
}
