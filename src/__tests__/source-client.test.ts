import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SourceClient, diagnose } from '../sources/source-client.js';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { SourceError } from '../utils/errors.js';
import { stubFetch, jsonResponse, hangUntilAborted, recordSendTimes, usePacingClock } from './helpers/fetch-stub.js';

describe('SourceClient', () => {
    let httpClient: HttpClient;
    let client: SourceClient;

    beforeEach(() => {
        httpClient = new HttpClient();
        client = new SourceClient({
            name: 'crossref',
            baseUrl: 'https://api.example.org/',
            httpClient,
            minIntervalMs: 0,
            timeoutMs: 1000,
            headers: { 'x-api-key': 'test-key' },
            params: { mailto: 'dev@example.org', api_key: undefined },
        });
    });

    afterEach(() => {
        httpClient.close();
        vi.unstubAllGlobals();
    });

    it('should join base URL and path and send shared params and headers', async () => {
        const requests = stubFetch(() => jsonResponse({ ok: true }));

        const data = await client.getJson('/works', { rows: 2 });

        expect(data).toEqual({ ok: true });
        const request = requests[0];
        expect(request?.url.origin + (request?.url.pathname ?? '')).toBe('https://api.example.org/works');
        expect(request?.url.searchParams.get('mailto')).toBe('dev@example.org');
        expect(request?.url.searchParams.get('rows')).toBe('2');
        expect(request?.url.searchParams.has('api_key')).toBe(false);
        expect(request?.headers.get('x-api-key')).toBe('test-key');
    });

    it('should count requests under the source name', async () => {
        stubFetch(() => jsonResponse({}));

        await client.getJson('/works');

        expect(httpClient.getRequestCount('crossref')).toBe(1);
    });

    it('should map a non-2xx response to a SourceError with a body excerpt', async () => {
        stubFetch(() => new Response('Service Unavailable', { status: 503 }));

        const error = await client.getJson('/works').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SourceError);
        expect(error).toMatchObject({
            source: 'crossref',
            diagnostic: 'HTTP 503: Service Unavailable',
            message: 'crossref: HTTP 503: Service Unavailable',
        });
    });

    it('should cap the body excerpt at 300 characters', async () => {
        stubFetch(() => new Response('e'.repeat(1000), { status: 500 }));

        await expect(client.getJson('/works')).rejects.toMatchObject({
            diagnostic: `HTTP 500: ${'e'.repeat(300)}`,
        });
    });

    it('should resolve null on 404 when asked to', async () => {
        stubFetch(() => new Response('Resource not found.', { status: 404 }));

        await expect(client.getJson('/works/10.1000/x', {}, { notFoundOn404: true })).resolves.toBeNull();
        await expect(client.getJson('/works')).rejects.toMatchObject({
            diagnostic: 'HTTP 404: Resource not found.',
        });
    });

    it('should report unparseable bodies', async () => {
        stubFetch(() => new Response('not json', { status: 200 }));

        await expect(client.getJson('/works')).rejects.toMatchObject({ diagnostic: 'invalid JSON response' });
    });

    it('should report network failures', async () => {
        stubFetch(() => {
            throw new TypeError('fetch failed');
        });

        await expect(client.getJson('/works')).rejects.toMatchObject({ diagnostic: 'network error' });
    });

    it('should apply its own timeout', async () => {
        stubFetch(hangUntilAborted);
        const slow = new SourceClient({
            name: 'osf',
            baseUrl: 'https://api.example.org',
            httpClient,
            minIntervalMs: 0,
            timeoutMs: 20,
        });

        await expect(slow.getJson('/preprints/')).rejects.toMatchObject({
            source: 'osf',
            diagnostic: 'timeout',
        });
    });

    it('should keep the transport error as the cause', async () => {
        stubFetch(() => new Response('boom', { status: 502 }));

        const error = await client.getJson('/works').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SourceError);
        expect(error instanceof SourceError && error.cause).toBeInstanceOf(HttpError);
    });
});

describe('SourceClient pacing', () => {
    let httpClient: HttpClient;

    beforeEach(() => {
        usePacingClock();
        httpClient = new HttpClient();
    });

    afterEach(() => {
        httpClient.close();
        vi.unstubAllGlobals();
        vi.useRealTimers();
    });

    function pacedClient(minIntervalMs: number): SourceClient {
        return new SourceClient({
            name: 'europepmc',
            baseUrl: 'https://api.example.org',
            httpClient,
            minIntervalMs,
            timeoutMs: 5000,
        });
    }

    it('should hold back-to-back requests for the minimum interval', async () => {
        const sentAt = recordSendTimes();
        const client = pacedClient(500);

        const done = Promise.all([client.getJson('/search'), client.getJson('/search')]);

        await vi.advanceTimersByTimeAsync(0);
        expect(sentAt).toEqual([0]);

        await vi.advanceTimersByTimeAsync(499);
        expect(sentAt).toEqual([0]);

        await vi.advanceTimersByTimeAsync(1);
        await done;
        expect(sentAt).toEqual([0, 500]);
    });

    it('should pace sequential requests too', async () => {
        const sentAt = recordSendTimes();
        const client = pacedClient(300);

        await client.getJson('/search');
        const second = client.getJson('/search');
        await vi.advanceTimersByTimeAsync(300);
        await second;

        expect(sentAt).toEqual([0, 300]);
    });

    it('should pace each client independently', async () => {
        const sentAt = recordSendTimes();
        const first = pacedClient(1000);
        const second = pacedClient(1000);

        const done = Promise.all([first.getJson('/search'), second.getJson('/search')]);
        await vi.advanceTimersByTimeAsync(0);
        await done;

        expect(sentAt).toEqual([0, 0]);
    });
});

describe('diagnose', () => {
    it('should describe each failure kind', () => {
        expect(diagnose(new HttpError('x', 'status', 400, 'bad query'))).toBe('HTTP 400: bad query');
        expect(diagnose(new HttpError('x', 'status', 500))).toBe('HTTP 500: ');
        expect(diagnose(new HttpError('x', 'timeout'))).toBe('timeout');
        expect(diagnose(new HttpError('x', 'network'))).toBe('network error');
        expect(diagnose(new HttpError('x', 'parse'))).toBe('invalid JSON response');
        expect(diagnose(new HttpError('x', 'closed'))).toBe('client closed');
    });
});
