import type { z } from 'zod';
import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-provider rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },   // Local, effectively unlimited
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

const DEFAULT_RATE_LIMIT = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: unknown;
    timeout?: number;
    /** Rate-limit bucket name */
    source?: string;
    /** Retries after the first attempt (default 3) */
    maxRetries?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T> {
    status: number;
    data: T;
}

export type HttpErrorKind = 'http' | 'network' | 'timeout' | 'invalid-response';

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly kind: HttpErrorKind,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Centralized HTTP client with per-provider rate limiting and retry logic.
 * Response bodies are validated against a caller-supplied zod schema.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly initialBackoff: number;

    constructor(options?: { timeout?: number; version?: string; initialBackoffMs?: number }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.initialBackoff = options?.initialBackoffMs ?? 1000;
        this.userAgent = `bibliorag/${options?.version ?? '1.0.0'}`;
    }

    /**
     * Make an HTTP request with rate limiting and retry, validating the JSON body.
     */
    async request<T>(url: string, schema: z.ZodType<T>, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            maxRetries = 3,
        } = options;

        const bucket = this.getBucket(source);
        await bucket.acquire();

        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            ...headers,
        };

        let requestBody: string | undefined;
        if (body !== undefined) {
            requestBody = typeof body === 'string' ? body : JSON.stringify(body);
            requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
        }

        const maxBackoff = 30000;

        for (let attempt = 0; ; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            let response: Response;
            let payload: unknown;
            try {
                response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });
                payload = await readBody(response);
            } catch (error) {
                if (isAbortError(error)) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, 'timeout', false);
                }

                const code = errorCode(error);
                const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);

                if (retryable && attempt < maxRetries) {
                    const backoff = this.calculateBackoff(attempt, maxBackoff);
                    logger.warn(
                        { errorCode: code, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    'network',
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }

            if (!response.ok) {
                const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                if (retryable && attempt < maxRetries) {
                    const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                    const backoff = retryAfter ?? this.calculateBackoff(attempt, maxBackoff);

                    logger.warn(
                        { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable HTTP error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    'http',
                    retryable,
                    payload
                );
            }

            const parsed = schema.safeParse(payload);
            if (!parsed.success) {
                throw new HttpError(
                    `Unexpected response shape from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
                    response.status,
                    'invalid-response',
                    false,
                    payload
                );
            }

            return { status: response.status, data: parsed.data };
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T>(url: string, schema: z.ZodType<T>, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request(url, schema, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for JSON POST requests.
     */
    async post<T>(
        url: string,
        body: unknown,
        schema: z.ZodType<T>,
        options?: Omit<HttpRequestOptions, 'method' | 'body'>
    ): Promise<HttpResponse<T>> {
        return this.request(url, schema, { ...options, method: 'POST', body });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

async function readBody(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
        const parsed: unknown = await response.json();
        return parsed;
    }
    return response.text();
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

/**
 * System error code of a failed fetch. Undici wraps it in `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    const cause = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: { timeout?: number; version?: string }): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}
