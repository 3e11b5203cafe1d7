import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

interface CacheEntry<T> {
    timestamp: number;
    url: string;
    data: T;
}

/**
 * File-system cache for source API responses.
 * One JSON file per request URL in the cache directory.
 *
 * Cache key = SHA-256 of the URL.
 * TTL = 24 hours by default.
 */
export class ResponseCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.paperrecon-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            logger.debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private makeKey(url: string): string {
        return createHash('sha256').update(url).digest('hex');
    }

    /**
     * Get a cached response, or null if not found/expired.
     */
    get<T>(url: string): T | null {
        if (!this.enabled) return null;

        const filePath = join(this.cacheDir, `${this.makeKey(url)}.json`);
        if (!existsSync(filePath)) return null;

        try {
            const entry = JSON.parse(readFileSync(filePath, 'utf-8')) as CacheEntry<T>;

            if (Date.now() - entry.timestamp > this.ttlMs) {
                logger.debug({ url: url.slice(0, 80) }, 'Cache expired');
                return null;
            }

            logger.debug({ url: url.slice(0, 80) }, 'Cache hit');
            return entry.data;
        } catch (error) {
            logger.debug({ error, filePath }, 'Unreadable cache entry, ignoring');
            return null;
        }
    }

    /**
     * Store a response in the cache.
     */
    set<T>(url: string, data: T): void {
        if (!this.enabled) return;

        const filePath = join(this.cacheDir, `${this.makeKey(url)}.json`);
        const entry: CacheEntry<T> = {
            timestamp: Date.now(),
            url: url.slice(0, 200),
            data,
        };

        try {
            writeFileSync(filePath, JSON.stringify(entry), 'utf-8');
        } catch (error) {
            logger.warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
        }
    }

    /**
     * Entry count and total size on disk.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;

        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.json')) continue;
                entries += 1;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return { enabled: this.enabled, directory: this.cacheDir, entries, bytes };
    }
}
