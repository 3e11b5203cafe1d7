import type { ResponseCache } from '../cache/response-cache.js';
import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 * With a burst of 1 it enforces a minimum interval between calls.
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

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 1 };

/**
 * Per-source pacing. Sources are called one request at a time.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    semantic_scholar: { tokensPerSecond: 1 / 1.1, maxBurst: 1 },  // ~1/s without API key
    pubmed: { tokensPerSecond: 1 / 0.35, maxBurst: 1 },           // 3/s without NCBI key
    pubmed_keyed: { tokensPerSecond: 10, maxBurst: 1 },           // 10/s with NCBI key
    crossref: { tokensPerSecond: 10, maxBurst: 1 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    /** Rate-limit bucket, when it differs from `source` */
    bucket?: string;
    /** Set false to bypass the response cache for this request */
    cache?: boolean;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Whether any source was reachable during a run.
 */
export interface SourceHealth {
    allSourcesUnavailable(): boolean;
    getUnavailableCount(source?: string): number;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    cache?: ResponseCache;
}

/**
 * Centralized HTTP client with per-source rate limiting, retry logic,
 * optional response caching and per-source reachability counters.
 */
export class HttpClient implements SourceHealth {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private reachableCounts = new Map<string, number>();
    private unavailableCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly cache: ResponseCache | undefined;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const email = options?.email ?? 'research@example.com';
        this.userAgent = `paper-reconcile/${version} (mailto:${email})`;
        this.cache = options?.cache;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            bucket: bucketName = source,
        } = options;

        // Acquire rate limit token
        const bucket = this.getBucket(bucketName);
        await bucket.acquire();

        // Track request count
        increment(this.requestCounts, source);

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        // Retry loop
        const maxRetries = 3;
        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            try {
                const controller = new AbortController();
                const timeoutId = setTimeout(() => controller.abort(), timeout);

                let response: Response;
                try {
                    response = await fetch(url, {
                        method,
                        headers: requestHeaders,
                        body: requestBody,
                        signal: controller.signal,
                    });
                } finally {
                    clearTimeout(timeoutId);
                }

                // Parse response
                const contentType = response.headers.get('content-type') ?? '';
                let data: T;
                if (contentType.includes('json')) {
                    data = (await response.json()) as T;
                } else {
                    data = (await response.text()) as T;
                }

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                // Check for errors
                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt, initialBackoff, maxBackoff);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            `Retryable HTTP error, backing off`
                        );
                        await sleep(backoff);
                        continue;
                    }

                    increment(retryable ? this.unavailableCounts : this.reachableCounts, source);
                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                increment(this.reachableCounts, source);
                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const errorCode = errorCodeOf(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoff, maxBackoff);
                    logger.warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        `Retryable network error, backing off`
                    );
                    await sleep(backoff);
                    continue;
                }

                increment(this.unavailableCounts, source);

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }
        }

        // Unreachable: the loop either returns or throws
        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * GET request, served from the response cache when one is configured.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        const useCache = this.cache !== undefined && options?.cache !== false;

        if (useCache) {
            const cached = this.cache?.get<T>(url);
            if (cached !== null && cached !== undefined) {
                // A cached answer came from the source; it counts as reachable
                increment(this.reachableCounts, options?.source ?? 'default');
                return { status: 200, headers: {}, data: cached, ok: true };
            }
        }

        const response = await this.request<T>(url, { ...options, method: 'GET' });
        if (useCache) {
            this.cache?.set(url, response.data);
        }
        return response;
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
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
     * Number of requests that could not reach their source.
     * Without a source, the total across all sources.
     */
    getUnavailableCount(source?: string): number {
        if (source !== undefined) return this.unavailableCounts.get(source) ?? 0;
        return sum(this.unavailableCounts);
    }

    /**
     * True when at least one request was made and none reached its source.
     */
    allSourcesUnavailable(): boolean {
        return sum(this.unavailableCounts) > 0 && sum(this.reachableCounts) === 0;
    }

    private getBucket(name: string): TokenBucket {
        let bucket = this.buckets.get(name);
        if (!bucket) {
            const config = RATE_LIMITS[name] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(name, bucket);
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

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Pull a Node/undici error code off an error or its cause.
 */
function errorCodeOf(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    const cause: unknown = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

function sum(counts: Map<string, number>): number {
    let total = 0;
    for (const value of counts.values()) total += value;
    return total;
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
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}
