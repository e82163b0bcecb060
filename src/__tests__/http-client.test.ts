import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { HttpClient, HttpError } from '../utils/http-client.js';

const OkSchema = z.object({ data: z.string() });

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, initialBackoffMs: 1 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('ollama')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should track and reset counts per source', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ data: 'ok' })));

            await client.get('http://localhost:11434/a', OkSchema, { source: 'ollama' });
            await client.get('http://localhost:11434/b', OkSchema, { source: 'ollama' });

            expect(client.getRequestCount('ollama')).toBe(2);
            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('HttpError', () => {
        it('should carry status, kind and retryable flag', () => {
            const error = new HttpError('Not Found', 404, 'http', false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.kind).toBe('http');
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const error = new HttpError('Bad Request', 400, 'http', false, { error: 'bad request' });
            expect(error.response).toEqual({ error: 'bad request' });
        });
    });

    describe('requests', () => {
        it('should send JSON bodies and validate the response', async () => {
            const fetchMock = vi.fn().mockImplementation(async () => jsonResponse({ data: 'pong' }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.post('http://localhost/api', { ping: true }, OkSchema);

            expect(response).toEqual({ status: 200, data: { data: 'pong' } });
            const [, init] = fetchMock.mock.calls[0] ?? [];
            expect(init).toMatchObject({ method: 'POST', body: '{"ping":true}' });
            expect(init.headers['Content-Type']).toBe('application/json');
        });

        it('should retry 503 responses and then succeed', async () => {
            const fetchMock = vi
                .fn()
                .mockImplementationOnce(async () => jsonResponse({ error: 'busy' }, 503))
                .mockImplementationOnce(async () => jsonResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get('http://localhost/api', OkSchema);

            expect(response.data.data).toBe('ok');
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should not retry when maxRetries is 0', async () => {
            const fetchMock = vi.fn().mockImplementation(async () => jsonResponse({ error: 'busy' }, 503));
            vi.stubGlobal('fetch', fetchMock);

            await expect(client.get('http://localhost/api', OkSchema, { maxRetries: 0 })).rejects.toMatchObject({
                status: 503,
                kind: 'http',
                retryable: true,
            });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should fail fast on 404', async () => {
            const fetchMock = vi.fn().mockImplementation(async () => jsonResponse({ error: 'missing' }, 404));
            vi.stubGlobal('fetch', fetchMock);

            await expect(client.get('http://localhost/api', OkSchema)).rejects.toMatchObject({
                status: 404,
                retryable: false,
                response: { error: 'missing' },
            });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should report a body of the wrong shape as invalid-response without retrying', async () => {
            const fetchMock = vi.fn().mockImplementation(async () => jsonResponse({ data: 42 }));
            vi.stubGlobal('fetch', fetchMock);

            const error = await client.request('http://localhost/api', OkSchema).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({
                status: 200,
                kind: 'invalid-response',
                retryable: false,
                response: { data: 42 },
            });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should return the parsed body of a request that matches its schema', async () => {
            const schema = z.object({ embedding: z.array(z.number()) });
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ embedding: [0.5, 1], extra: true })));

            const response = await client.request('http://localhost/api', schema, { method: 'POST', body: { input: 'trust' } });

            expect(response).toEqual({ status: 200, data: { embedding: [0.5, 1] } });
        });

        it('should turn an aborted request into a timeout error', async () => {
            const abort = new Error('This operation was aborted');
            abort.name = 'AbortError';
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(abort));

            await expect(client.get('http://localhost/api', OkSchema, { timeout: 10 })).rejects.toMatchObject({
                kind: 'timeout',
                retryable: false,
            });
        });

        it('should retry retryable network errors', async () => {
            const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
            const fetchMock = vi
                .fn()
                .mockRejectedValueOnce(new TypeError('fetch failed', { cause: refused }))
                .mockImplementationOnce(async () => jsonResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get('http://localhost/api', OkSchema);
            expect(response.data.data).toBe('ok');
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests beyond the burst of a source', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ data: 'ok' })));

            const start = Date.now();
            // default bucket: 5 per second, burst 5; the sixth request waits ~200ms
            await Promise.all(
                Array.from({ length: 6 }, (_, i) => client.get(`https://api.example.com/${i}`, OkSchema))
            );

            expect(Date.now() - start).toBeGreaterThanOrEqual(150);
            expect(client.getRequestCount('default')).toBe(6);
        });
    });
});
