import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { ResponseCache } from '../cache/response-cache.js';
import { jsonResponse, stubFetch } from './helpers/fetch-stub.js';

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, version: '9.9.9', email: 'test@example.com' });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('crossref')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
            expect(client.getUnavailableCount()).toBe(0);
            expect(client.allSourcesUnavailable()).toBe(false);
        });

        it('should count requests per source', async () => {
            stubFetch(() => jsonResponse({ ok: true }));

            await client.get('https://api.example.com/a', { source: 'crossref' });
            await client.get('https://api.example.com/b', { source: 'crossref' });

            expect(client.getAllRequestCounts()).toEqual({ crossref: 2 });
        });
    });

    describe('responses', () => {
        it('should send the user agent and parse JSON', async () => {
            const mockFetch = stubFetch(() => jsonResponse({ value: 1 }));

            const response = await client.get<{ value: number }>('https://api.example.com/x', { source: 'crossref' });

            expect(response.data).toEqual({ value: 1 });
            expect(response.ok).toBe(true);
            expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
                headers: { 'User-Agent': 'paper-reconcile/9.9.9 (mailto:test@example.com)' },
            });
        });

        it('should throw a non-retryable HttpError on 404 and count the source reachable', async () => {
            stubFetch(() => jsonResponse({ error: 'missing' }, 404));

            const error: unknown = await client.get('https://api.example.com/missing', { source: 'crossref' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (error instanceof HttpError) {
                expect(error.status).toBe(404);
                expect(error.retryable).toBe(false);
                expect(error.response).toEqual({ error: 'missing' });
            }
            expect(client.allSourcesUnavailable()).toBe(false);
        });
    });

    describe('source health', () => {
        it('should report all sources unavailable when nothing was reachable', async () => {
            stubFetch(() => {
                throw new TypeError('fetch failed');
            });

            await expect(client.get('https://api.example.com/down', { source: 'pubmed' })).rejects.toBeInstanceOf(HttpError);

            expect(client.getUnavailableCount('pubmed')).toBe(1);
            expect(client.getUnavailableCount()).toBe(1);
            expect(client.allSourcesUnavailable()).toBe(true);
        });

        it('should not report an outage once any source answered', async () => {
            stubFetch((url) => {
                if (url.includes('down')) throw new TypeError('fetch failed');
                return jsonResponse({ ok: true });
            });

            await client.get('https://api.example.com/down', { source: 'pubmed' }).catch(() => undefined);
            await client.get('https://api.example.com/up', { source: 'crossref' });

            expect(client.allSourcesUnavailable()).toBe(false);
        });
    });

    describe('response cache', () => {
        let cacheDir: string;

        beforeEach(() => {
            cacheDir = mkdtempSync(join(tmpdir(), 'paper-reconcile-http-'));
        });

        afterEach(() => {
            rmSync(cacheDir, { recursive: true, force: true });
        });

        it('should serve repeated GETs from the cache', async () => {
            const mockFetch = stubFetch(() => jsonResponse({ value: 1 }));
            const cached = new HttpClient({ cache: new ResponseCache({ cacheDir, ttlHours: 1 }) });

            await cached.get('https://api.example.com/same', { source: 'crossref' });
            const second = await cached.get('https://api.example.com/same', { source: 'crossref' });

            expect(second.data).toEqual({ value: 1 });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should not report an outage when cached answers were served', async () => {
            const cache = new ResponseCache({ cacheDir, ttlHours: 1 });
            stubFetch(() => jsonResponse({ value: 1 }));
            await new HttpClient({ cache }).get('https://api.example.com/warm', { source: 'crossref' });

            stubFetch(() => {
                throw new TypeError('fetch failed');
            });
            const offline = new HttpClient({ cache });

            const hit = await offline.get('https://api.example.com/warm', { source: 'crossref' });
            await expect(offline.get('https://api.example.com/cold', { source: 'pubmed' })).rejects.toBeInstanceOf(HttpError);

            expect(hit.data).toEqual({ value: 1 });
            expect(offline.getUnavailableCount('pubmed')).toBe(1);
            expect(offline.allSourcesUnavailable()).toBe(false);
        });

        it('should bypass the cache when asked', async () => {
            const mockFetch = stubFetch(() => jsonResponse({ value: 1 }));
            const cached = new HttpClient({ cache: new ResponseCache({ cacheDir, ttlHours: 1 }) });

            await cached.get('https://api.example.com/fresh', { source: 'crossref', cache: false });
            await cached.get('https://api.example.com/fresh', { source: 'crossref', cache: false });

            expect(mockFetch).toHaveBeenCalledTimes(2);
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('rate limiting', () => {
        it('should space requests to the same source', async () => {
            stubFetch(() => jsonResponse({ data: 'ok' }));

            const start = Date.now();

            // PubMed without a key: one request per 350 ms
            await client.get('https://api.example.com/1', { source: 'pubmed' });
            await client.get('https://api.example.com/2', { source: 'pubmed' });
            await client.get('https://api.example.com/3', { source: 'pubmed' });

            const elapsed = Date.now() - start;

            expect(elapsed).toBeGreaterThanOrEqual(600);
            expect(client.getRequestCount('pubmed')).toBe(3);
        });
    });
});
