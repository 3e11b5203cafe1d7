/**
 * Shared utilities for source adapters.
 */
import type { SourceTag } from '../types/index.js';
import { normalizeText } from '../core/normalize.js';
import { HttpError } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Run an adapter request, resolving to `fallback` on any failure.
 *
 * 404s are an ordinary "not found". Network errors, timeouts and
 * rate-limit/5xx responses mark the source unavailable for this call.
 */
export async function withFallback<T>(
    source: SourceTag,
    operation: string,
    fallback: T,
    fn: () => Promise<T>
): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        if (error instanceof HttpError && error.status === 404) {
            logger.debug({ source, operation }, 'Not found');
            return fallback;
        }

        if (error instanceof HttpError && (error.status === 0 || error.retryable)) {
            logger.warn({ source, operation, status: error.status, error: error.message }, 'Source unavailable');
            return fallback;
        }

        logger.warn({ source, operation, error }, 'Source request failed');
        return fallback;
    }
}

/**
 * Clean search query: hyphens and plus signs are operators for some APIs.
 */
export function cleanSearchQuery(query: string): string {
    return query
        .replace(/[-+]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Split "2018-2022" or "2020" into a [from, to] pair.
 */
export function parseYearRange(range: string | undefined): [number, number] | null {
    if (!range) return null;
    const match = /^\s*(\d{4})\s*(?:-\s*(\d{4})\s*)?$/.exec(range);
    if (!match) return null;
    const from = Number(match[1]);
    const to = match[2] ? Number(match[2]) : from;
    return from <= to ? [from, to] : [to, from];
}

/**
 * Display text: inline markup stripped, entities decoded, whitespace collapsed.
 */
export function cleanText(text: string | null | undefined): string {
    return normalizeText(text).replace(/\s+/g, ' ').trim();
}

// ─── XML helpers (fast-xml-parser output) ─────────────────

export type XmlNode = Record<string, unknown>;

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Follow a path of element names, taking the first element at each step.
 */
export function xmlChild(node: unknown, ...path: string[]): unknown {
    let current: unknown = node;
    for (const key of path) {
        const first = asArray(current)[0];
        if (!isXmlNode(first)) return undefined;
        current = first[key];
    }
    return current;
}

/**
 * All elements named `key` under `node`.
 */
export function xmlChildren(node: unknown, key: string): unknown[] {
    const first = asArray(node)[0];
    return isXmlNode(first) ? asArray(first[key]) : [];
}

/**
 * Text content of an element, with inline markup removed.
 */
export function xmlText(node: unknown): string {
    if (node === undefined || node === null) return '';
    if (typeof node === 'string' || typeof node === 'number' || typeof node === 'boolean') {
        return cleanText(String(node));
    }
    if (Array.isArray(node)) {
        return node.map(xmlText).filter(Boolean).join(' ');
    }
    if (isXmlNode(node)) {
        return Object.entries(node)
            .filter(([key]) => !key.startsWith('@_'))
            .map(([, value]) => xmlText(value))
            .filter(Boolean)
            .join(' ');
    }
    return '';
}

/**
 * Attribute value of an element.
 */
export function xmlAttr(node: unknown, name: string): string {
    if (!isXmlNode(node)) return '';
    const value = node[`@_${name}`];
    return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}
