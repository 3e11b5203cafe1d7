import type { BibRecord } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { firstAuthorSurname, normalizeDoi, normalizePmid, normalizeTitle, titleSimilarity } from './normalize.js';

/**
 * Which rule decided a match.
 *
 * Strong identifiers are authoritative both ways: agreement confirms,
 * disagreement vetoes and fuzzy matching is never consulted.
 */
export type MatchRule =
    | 'doi-equal'
    | 'doi-conflict'
    | 'pmid-equal'
    | 'pmid-conflict'
    | 'fuzzy'
    | 'fuzzy-rejected';

export interface MatchDecision {
    matched: boolean;
    rule: MatchRule;
    /** Title similarity, for fuzzy decisions */
    titleScore?: number;
}

export interface MatchOptions {
    /** Minimum normalized Levenshtein title similarity (default 0.9) */
    titleSimilarityThreshold?: number;
}

/**
 * Records compared by the matcher. References to verify fit this shape too.
 */
export type Matchable = Pick<BibRecord, 'title' | 'authors' | 'year' | 'doi' | 'pmid'>;

/**
 * Decide whether two records denote the same work, and why.
 *
 * 1. DOIs on both sides: equal → match, different → non-match.
 * 2. PMIDs on both sides: equal → match, different → non-match.
 * 3. Otherwise all of: similar titles, same year (or both unknown),
 *    same first-author surname (or either side without authors).
 */
export function explainMatch(a: Matchable, b: Matchable, options: MatchOptions = {}): MatchDecision {
    const threshold = options.titleSimilarityThreshold ?? DEFAULT_CONFIG.matching.titleSimilarityThreshold;

    const doiA = normalizeDoi(a.doi);
    const doiB = normalizeDoi(b.doi);
    if (doiA && doiB) {
        return doiA === doiB ? { matched: true, rule: 'doi-equal' } : { matched: false, rule: 'doi-conflict' };
    }

    const pmidA = normalizePmid(a.pmid);
    const pmidB = normalizePmid(b.pmid);
    if (pmidA && pmidB) {
        return pmidA === pmidB ? { matched: true, rule: 'pmid-equal' } : { matched: false, rule: 'pmid-conflict' };
    }

    const keyA = normalizeTitle(a.title);
    const keyB = normalizeTitle(b.title);
    const titleScore = keyA.length > 0 && keyA === keyB ? 1 : titleSimilarity(a.title, b.title);
    const titlesAgree = titleScore >= threshold;

    const yearsAgree = a.year === b.year;

    const surnameA = firstAuthorSurname(a.authors);
    const surnameB = firstAuthorSurname(b.authors);
    const authorsAgree = surnameA === '' || surnameB === '' || surnameA === surnameB;

    const matched = titlesAgree && yearsAgree && authorsAgree;
    return { matched, rule: matched ? 'fuzzy' : 'fuzzy-rejected', titleScore };
}

/**
 * Whether two records denote the same work. Symmetric.
 */
export function matchRecords(a: Matchable, b: Matchable, options: MatchOptions = {}): boolean {
    return explainMatch(a, b, options).matched;
}
