import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ReferenceToVerify } from '../types/index.js';
import { normalizeDoi, normalizePmid } from '../core/normalize.js';
import { MalformedInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/** "1. ", "1) ", "[1] " at the start of a line */
const NUMBERED_LINE = /^\s*\[?\d+[\].)]\s+/;
const LEADING_NUMBER = /^\s*\[?\d+[\].)]\s*/;

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

/**
 * Accepts strings and numbers, trimmed; anything else is dropped.
 */
const text = z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .optional()
    .catch(undefined);

/**
 * One reference entry in a JSON file. A field of the wrong type is treated
 * as absent rather than failing the whole entry.
 */
const ReferenceEntrySchema = z.object({
    label: text,
    title: text,
    authors: z
        .union([z.array(z.string()), z.string()])
        .transform((value) => (typeof value === 'string' ? value.split(/\s*;\s*|\s*,\s+and\s+|\s+and\s+/) : value))
        .transform((names) => names.map((name) => name.trim()).filter((name) => name.length > 0))
        .optional()
        .catch(undefined),
    year: z.coerce.number().int().min(MIN_YEAR).max(MAX_YEAR).optional().catch(undefined),
    journal: text,
    volume: text,
    issue: text,
    pages: text,
    doi: text,
    pmid: text,
    source_id: text,
    abstract: text,
});

const STRING_FIELDS = ['label', 'title', 'journal', 'volume', 'issue', 'pages', 'source_id', 'abstract'] as const;

const ReferenceFileSchema = z.union([
    z.array(z.unknown()),
    z.object({ references: z.array(z.unknown()) }).transform((file) => file.references),
]);

/**
 * Extract what can be found in a free-text citation line: DOI, PMID, year,
 * volume/issue/pages. Formats seen in the wild (AMA, Vancouver, APA,
 * numbered lists) are all handled by the same patterns.
 */
export function parseReferenceText(raw: string): ReferenceToVerify {
    const reference: ReferenceToVerify = { raw: raw.trim() };
    const cleaned = raw.replace(LEADING_NUMBER, '');

    const doiMatch =
        /(?:https?:\/\/(?:dx\.)?doi\.org\/|doi[:\s]*)(10\.\d{4,}\/[^\s,;"]+)/i.exec(cleaned) ??
        /\b(10\.\d{4,}\/[^\s,;"]+)/.exec(cleaned);
    const doi = normalizeDoi(doiMatch?.[1]);
    if (doi) reference.doi = doi;

    const pmid = normalizePmid(/PMID[:\s]*(\d+)/i.exec(cleaned)?.[1]);
    if (pmid) reference.pmid = pmid;

    // Parenthesized year first, then a free-standing one
    const yearMatch = /\((\d{4})\)/.exec(cleaned) ?? /[.\s;,](\d{4})[.\s;,]/.exec(cleaned);
    if (yearMatch) {
        const year = Number(yearMatch[1]);
        if (year >= MIN_YEAR && year <= MAX_YEAR) reference.year = year;
    }

    // "10(4):663-72", then ";15:123-130"
    const vip = /(\d+)\((\d+)\)[:\s]*(\d+[-\u2013]\d+)/.exec(cleaned);
    if (vip) {
        reference.volume = vip[1];
        reference.issue = vip[2];
        reference.pages = vip[3];
    } else {
        const vp = /;(\d+)[:\s]+(\d+[-\u2013]\d+)/.exec(cleaned);
        if (vp) {
            reference.volume = vp[1];
            reference.pages = vp[2];
        }
    }

    return reference;
}

/**
 * Split free text into reference strings: a blank line or a numbered
 * line starts a new reference, other lines continue the current one.
 */
export function splitReferenceText(content: string): string[] {
    const references: string[] = [];
    let current: string[] = [];

    const flush = (): void => {
        if (current.length > 0) references.push(current.join(' '));
        current = [];
    };

    for (const line of content.split(/\r?\n/)) {
        const stripped = line.trim();
        if (!stripped) {
            flush();
        } else if (NUMBERED_LINE.test(stripped) && current.length > 0) {
            flush();
            current.push(stripped);
        } else {
            current.push(stripped);
        }
    }
    flush();

    return references;
}

/**
 * Parse one JSON reference entry. Unusable fields are dropped; identifiers
 * that do not normalize are dropped too.
 */
export function parseReferenceEntry(entry: unknown): ReferenceToVerify {
    const parsed = ReferenceEntrySchema.safeParse(entry);
    if (!parsed.success) return {};

    const data = parsed.data;
    const reference: ReferenceToVerify = {};

    for (const field of STRING_FIELDS) {
        const value = data[field];
        if (value) reference[field] = value;
    }
    if (data.authors && data.authors.length > 0) reference.authors = data.authors;
    if (data.year !== undefined) reference.year = data.year;

    const doi = normalizeDoi(data.doi);
    if (doi) reference.doi = doi;
    const pmid = normalizePmid(data.pmid);
    if (pmid) reference.pmid = pmid;

    return reference;
}

/**
 * Load references from a JSON file (an array, or `{ "references": [...] }`)
 * or from free text.
 * @throws MalformedInputError when the file cannot be read
 */
export function loadReferencesFile(path: string): ReferenceToVerify[] {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8').trim();
    } catch (error) {
        throw new MalformedInputError(path, 'cannot read reference file', { cause: error });
    }

    const json = tryParseJson(content);
    if (json !== undefined) {
        const file = ReferenceFileSchema.safeParse(json);
        if (file.success) {
            const references = file.data.map(parseReferenceEntry);
            logger.debug({ path, count: references.length }, 'Loaded JSON references');
            return references;
        }
        throw new MalformedInputError(path, 'JSON must be an array of references or { "references": [...] }');
    }

    const references = splitReferenceText(content).map(parseReferenceText);
    logger.debug({ path, count: references.length }, 'Loaded text references');
    return references;
}

function tryParseJson(content: string): unknown {
    if (!content.startsWith('[') && !content.startsWith('{')) return undefined;
    try {
        return JSON.parse(content);
    } catch (error) {
        logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Not JSON, reading as text');
        return undefined;
    }
}
