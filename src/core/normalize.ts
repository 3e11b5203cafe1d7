/**
 * Normalizer: pure functions that turn identifiers and free text into
 * comparison keys. Nothing here throws: unusable input yields null or ''.
 */

const DOI_SHAPE = /^10\.\d+(?:\.\d+)*\/\S+$/;

/**
 * Canonical DOI: no scheme/host, no `doi:` prefix, lowercase, trimmed.
 *
 * "https://doi.org/10.1234/ABC" → "10.1234/abc"
 * "doi: 10.1234/abc."           → "10.1234/abc"
 * "not a doi"                   → null
 */
export function normalizeDoi(input: string | null | undefined): string | null {
    if (!input) return null;

    let doi = input
        .trim()
        .replace(/^https?:\/\/(?:dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim()
        .replace(/[.,;]+$/, '');

    // Trailing ")" belongs to the DOI only when it closes an opening paren
    while (doi.endsWith(')') && count(doi, '(') < count(doi, ')')) {
        doi = doi.slice(0, -1).replace(/[.,;]+$/, '');
    }

    doi = doi.toLowerCase();
    return DOI_SHAPE.test(doi) ? doi : null;
}

/**
 * Canonical PMID: digits only. Accepts "12345", 12345 and "PMID: 12345".
 */
export function normalizePmid(input: string | number | null | undefined): string | null {
    if (input === null || input === undefined) return null;

    const pmid = String(input).trim().replace(/^pmid:?\s*/i, '');
    return /^\d{1,10}$/.test(pmid) ? pmid : null;
}

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
    ndash: '\u2013',
    mdash: '\u2014',
};

/**
 * Decode HTML entities (named, decimal and hex).
 */
export function decodeHtmlEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
        if (body[0] === '#') {
            const code = body[1] === 'x' || body[1] === 'X'
                ? parseInt(body.slice(2), 16)
                : parseInt(body.slice(1), 10);
            return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
        }
        return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
    });
}

/**
 * Text clean-up shared by all comparisons: HTML entities and inline markup
 * removed, Unicode dashes and curly quotes folded to ASCII.
 */
export function normalizeText(text: string | null | undefined): string {
    if (!text) return '';
    return decodeHtmlEntities(text)
        .replace(/<\/?[a-z][^>]*>/gi, '')
        .replace(/[\u2010-\u2015\u2212]/g, '-')
        .replace(/[\u2018\u2019\u201C\u201D]/g, "'");
}

/**
 * Title comparison key. Never used as a display title.
 *
 * "The Effect of X: A Trial." → "effect of x a trial"
 */
export function normalizeTitle(title: string | null | undefined): string {
    return normalizeText(title)
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')               // Collapse whitespace
        .trim()
        .replace(/^(?:the|a|an) /, '')
        .replace(/ (?:the|a|an)$/, '');
}

/**
 * Word tokens of a string, lowercased.
 */
function tokens(text: string): Set<string> {
    return new Set(normalizeText(text).toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []);
}

/**
 * Jaccard similarity on lowercased word tokens (0.0 to 1.0).
 * Either side empty → 0.
 */
export function tokenSimilarity(a: string | null | undefined, b: string | null | undefined): number {
    if (!a || !b) return 0;

    const tokensA = tokens(a);
    const tokensB = tokens(b);
    if (tokensA.size === 0 || tokensB.size === 0) return 0;

    let intersection = 0;
    for (const token of tokensA) {
        if (tokensB.has(token)) intersection += 1;
    }
    return intersection / (tokensA.size + tokensB.size - intersection);
}

/**
 * Simple Levenshtein distance.
 */
export function levenshteinDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;

    if (m === 0) return n;
    if (n === 0) return m;

    // Two rolling rows
    let previous = Array.from({ length: n + 1 }, (_, j) => j);
    let current = new Array<number>(n + 1).fill(0);

    for (let i = 1; i <= m; i++) {
        current[0] = i;
        for (let j = 1; j <= n; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                (previous[j] ?? 0) + 1,         // deletion
                (current[j - 1] ?? 0) + 1,      // insertion
                (previous[j - 1] ?? 0) + cost   // substitution
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[n] ?? 0;
}

/**
 * Normalized Levenshtein similarity of two title keys (0.0 to 1.0).
 * 1.0 = identical keys; two empty titles score 0.
 */
export function titleSimilarity(a: string | null | undefined, b: string | null | undefined): number {
    const normA = normalizeTitle(a);
    const normB = normalizeTitle(b);

    if (normA.length === 0 || normB.length === 0) return 0;
    if (normA === normB) return 1.0;

    const maxLen = Math.max(normA.length, normB.length);
    return 1.0 - levenshteinDistance(normA, normB) / maxLen;
}

/**
 * Initials token: "J", "JM", "J.M.", all capitals, at most three letters.
 */
function isInitials(token: string): boolean {
    return /^\p{Lu}{1,3}$/u.test(token.replace(/\./g, ''));
}

function surnameKey(token: string): string {
    return token
        .normalize('NFD')
        .replace(/\p{M}/gu, '')
        .toLowerCase()
        .replace(/[^\p{L}-]/gu, '');
}

/**
 * Surname comparison key from one author name.
 *
 * Handles "Last, First", "Last FM", "F. M. Last", "First Middle Last"
 * and single tokens. Diacritics and punctuation are dropped.
 */
export function extractLastName(name: string | null | undefined): string {
    const trimmed = normalizeText(name).trim();
    if (!trimmed) return '';

    if (trimmed.includes(',')) {
        return surnameKey(trimmed.split(',')[0] ?? '');
    }

    const parts = trimmed.split(/\s+/);
    const first = parts[0] ?? '';
    const last = parts[parts.length - 1] ?? '';

    if (parts.length === 1) return surnameKey(first);

    // "Younger JW": trailing initials follow the surname
    if (isInitials(last) && !isInitials(first)) return surnameKey(first);

    // "J. W. Younger", "Jarred W Younger": surname is last
    return surnameKey(last);
}

/**
 * First author's surname key, or '' without authors.
 */
export function firstAuthorSurname(authors: readonly string[] | null | undefined): string {
    if (!authors || authors.length === 0) return '';
    return extractLastName(authors[0]);
}

/**
 * Page range comparison key: dashes unified, spaces and "pp." dropped,
 * abbreviated end pages expanded ("823-33" → "823-833").
 */
export function normalizePages(pages: string | null | undefined): string {
    const cleaned = normalizeText(pages)
        .toLowerCase()
        .replace(/^pp?\.?\s*/, '')
        .replace(/\s+/g, '')
        .replace(/-+/g, '-');

    const range = /^(\d+)-(\d+)$/.exec(cleaned);
    if (!range) return cleaned;

    const start = range[1] ?? '';
    const end = range[2] ?? '';
    if (end.length >= start.length) return cleaned;

    return `${start}-${start.slice(0, start.length - end.length)}${end}`;
}

function count(text: string, char: string): number {
    let n = 0;
    for (const c of text) {
        if (c === char) n += 1;
    }
    return n;
}

const JOURNAL_STOPWORDS = new Set(['the', 'of', 'and', 'for', 'in', 'on']);

/**
 * Whether one journal name abbreviates the other, word by word.
 *
 * "N Engl J Med" ~ "The New England Journal of Medicine"
 * "J. Clin. Oncol." ~ "Journal of Clinical Oncology"
 */
export function journalAbbreviates(a: string | null | undefined, b: string | null | undefined): boolean {
    const wordsOf = (name: string | null | undefined): string[] =>
        normalizeTitle(name).split(' ').filter((word) => word.length > 0 && !JOURNAL_STOPWORDS.has(word));

    const wordsA = wordsOf(a);
    const wordsB = wordsOf(b);
    if (wordsA.length === 0 || wordsA.length !== wordsB.length) return false;

    return wordsA.every((word, i) => {
        const other = wordsB[i] ?? '';
        return word.startsWith(other) || other.startsWith(word);
    });
}
