import type { BibRecord, SourcePrecedence, SourceTag, TrackedField } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { hasValue, sortOrigins, TRACKED_FIELDS } from './record.js';

interface Candidate<T> {
    value: T;
    tag: SourceTag | undefined;
    present: boolean;
}

/**
 * Merge two records of the same work into one.
 *
 * Each field is chosen by a fixed ordering (non-empty first, then a
 * field-specific preference, then the provenance's position in
 * `precedence`, then the value itself), so the result does not depend on
 * argument order or grouping:
 *
 *   merge(a, a) = a
 *   merge(a, b) = merge(b, a)
 *   merge(merge(a, b), c) = merge(a, merge(b, c))
 *
 * Assumes `matchRecords(a, b)`. Conflicting scalar values are resolved by
 * precedence and the losing value is dropped.
 */
export function mergeRecords(
    a: BibRecord,
    b: BibRecord,
    precedence: SourcePrecedence = DEFAULT_CONFIG.precedence
): BibRecord {
    const rankOf = (tag: SourceTag | undefined): number => {
        if (tag === undefined) return precedence.length + 1;
        const index = precedence.indexOf(tag);
        return index === -1 ? precedence.length : index;
    };

    const compare = <T>(x: Candidate<T>, y: Candidate<T>, primary?: (value: T) => number): number => {
        if (x.present !== y.present) return x.present ? 1 : -1;
        if (!x.present) return 0;

        if (primary) {
            const diff = primary(x.value) - primary(y.value);
            if (diff !== 0) return diff;
        }

        const rankDiff = rankOf(y.tag) - rankOf(x.tag);
        if (rankDiff !== 0) return rankDiff;

        const tagX = x.tag ?? '';
        const tagY = y.tag ?? '';
        if (tagX !== tagY) return tagX < tagY ? 1 : -1;

        const keyX = JSON.stringify(x.value);
        const keyY = JSON.stringify(y.value);
        if (keyX === keyY) return 0;
        return keyX < keyY ? 1 : -1;
    };

    const provenance: BibRecord['provenance'] = {};

    const choose = <K extends TrackedField>(field: K, primary?: (value: BibRecord[K]) => number): BibRecord[K] => {
        const x: Candidate<BibRecord[K]> = {
            value: a[field],
            tag: a.provenance[field] ?? bestOrigin(a, rankOf),
            present: hasValue(a, field),
        };
        const y: Candidate<BibRecord[K]> = {
            value: b[field],
            tag: b.provenance[field] ?? bestOrigin(b, rankOf),
            present: hasValue(b, field),
        };

        const winner = compare(x, y, primary) >= 0 ? x : y;
        if (winner.present && winner.tag !== undefined) {
            provenance[field] = winner.tag;
        }
        return winner.value;
    };

    const merged: BibRecord = {
        title: choose('title'),
        authors: [...choose('authors', (authors) => authors.length)],
        year: choose('year'),
        journal: choose('journal'),
        volume: choose('volume'),
        issue: choose('issue'),
        pages: choose('pages'),
        doi: choose('doi'),
        pmid: choose('pmid'),
        source_id: choose('source_id'),
        abstract: pickAbstract(a.abstract, b.abstract),
        citation_count: Math.max(a.citation_count, b.citation_count),
        origin: sortOrigins([...a.origin, ...b.origin]),
        retracted: a.retracted || b.retracted,
        provenance,
    };

    // Keep provenance keys in a stable order
    const ordered: BibRecord['provenance'] = {};
    for (const field of TRACKED_FIELDS) {
        const tag = provenance[field];
        if (tag !== undefined) ordered[field] = tag;
    }
    merged.provenance = ordered;

    return merged;
}

/**
 * Merge any number of records of the same work, left to right.
 */
export function mergeAll(records: readonly BibRecord[], precedence?: SourcePrecedence): BibRecord | null {
    const [first, ...rest] = records;
    if (!first) return null;
    return rest.reduce((acc, record) => mergeRecords(acc, record, precedence), first);
}

/**
 * Highest-precedence origin of a record; stands in for missing provenance
 * on records built by hand or loaded from older sessions.
 */
function bestOrigin(record: BibRecord, rankOf: (tag: SourceTag) => number): SourceTag | undefined {
    let best: SourceTag | undefined;
    for (const tag of record.origin) {
        if (best === undefined || rankOf(tag) < rankOf(best) || (rankOf(tag) === rankOf(best) && tag < best)) {
            best = tag;
        }
    }
    return best;
}

/**
 * Longer non-empty abstract wins; equal lengths fall back to the value.
 */
function pickAbstract(x: string | null, y: string | null): string | null {
    const a = x?.trim() ? x : null;
    const b = y?.trim() ? y : null;
    if (a === null) return b;
    if (b === null) return a;
    if (a.length !== b.length) return a.length > b.length ? a : b;
    return a <= b ? a : b;
}
