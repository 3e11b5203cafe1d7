import { vi } from 'vitest';

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export function xmlResponse(body: string): Response {
    return new Response(body, { status: 200, headers: { 'content-type': 'text/xml; charset=UTF-8' } });
}

export function urlOf(input: string | URL | Request): string {
    if (typeof input === 'string') return input;
    return input instanceof URL ? input.href : input.url;
}

/**
 * Replace global fetch with a router over request URLs.
 * Remember `vi.unstubAllGlobals()` in afterEach.
 */
export function stubFetch(route: (url: string) => Response | Promise<Response>) {
    const mockFetch = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => route(urlOf(input)));
    vi.stubGlobal('fetch', mockFetch);
    return mockFetch;
}

/**
 * Parsed URLs of every request the stub received, in order.
 */
export function requestedUrls(mockFetch: ReturnType<typeof stubFetch>): URL[] {
    return mockFetch.mock.calls.map(([input]) => new URL(urlOf(input)));
}
