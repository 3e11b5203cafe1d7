import type {
    AttemptOutcome,
    BibRecord,
    ComparedField,
    FieldCheck,
    FieldMismatch,
    LayerAttempt,
    ReferenceToVerify,
    ResolutionLayer,
    SourceAdapter,
    SourcePrecedence,
    VerificationConfig,
    VerificationResult,
    VerificationStatus,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { matchRecords } from './matcher.js';
import { mergeAll } from './merger.js';
import { sortOrigins } from './record.js';
import {
    extractLastName,
    firstAuthorSurname,
    journalAbbreviates,
    normalizeDoi,
    normalizePages,
    normalizePmid,
    normalizeTitle,
    tokenSimilarity,
} from './normalize.js';

const logger = getLogger();

/**
 * The three sources of the resolution chain.
 */
export interface VerifierSources {
    /** DOI registry (Crossref) */
    registry: SourceAdapter;
    /** Citation-graph API (Semantic Scholar) */
    graph: SourceAdapter;
    /** Biomedical literature database (PubMed) */
    biomed: SourceAdapter;
}

export interface VerifierOptions extends Partial<VerificationConfig> {
    precedence?: SourcePrecedence;
    titleSimilarityThreshold?: number;
}

type Thresholds = Pick<VerificationConfig, 'titleThreshold' | 'journalThreshold'>;

interface CandidatePick {
    record: BibRecord | null;
    outcome: AttemptOutcome;
}

/**
 * Pick the search candidate whose title is most similar to `target`.
 * Candidates at or below `threshold` are never accepted.
 */
export function pickCandidate(candidates: readonly BibRecord[], target: string, threshold: number): CandidatePick {
    if (candidates.length === 0) return { record: null, outcome: 'not_found' };

    let best: BibRecord | null = null;
    let bestScore = threshold;
    for (const candidate of candidates) {
        const score = tokenSimilarity(target, candidate.title);
        if (score > bestScore) {
            best = candidate;
            bestScore = score;
        }
    }

    return best ? { record: best, outcome: 'found' } : { record: null, outcome: 'ambiguous' };
}

/**
 * Compare a reference against the resolved record, field by field.
 *
 * Only fields present on both sides are compared. A field that disagrees
 * with `record` but agrees with any one of `contributors` counts as
 * agreeing, with that contributor's value reported.
 */
export function compareFields(
    reference: ReferenceToVerify,
    record: BibRecord,
    contributors: readonly BibRecord[] = [],
    thresholds: Thresholds = DEFAULT_CONFIG.verification
): FieldCheck[] {
    const checks: FieldCheck[] = [];

    const check = (
        field: ComparedField,
        asserted: string | undefined,
        sourceValue: (r: BibRecord) => string,
        compare: (asserted: string, source: string) => { match: boolean; similarity?: number }
    ): void => {
        if (!asserted?.trim()) return;

        const candidates = [record, ...contributors];
        let first: FieldCheck | null = null;

        for (const candidate of candidates) {
            const value = sourceValue(candidate);
            if (!value.trim()) continue;

            const { match, similarity } = compare(asserted, value);
            const result: FieldCheck = { field, match, asserted_value: asserted, source_value: value };
            if (similarity !== undefined) result.similarity = Math.round(similarity * 100) / 100;

            if (match) {
                checks.push(result);
                return;
            }
            first ??= result;
        }

        if (first) checks.push(first);
    };

    check('title', reference.title, (r) => r.title, (a, s) => {
        const similarity = tokenSimilarity(a, s);
        return { match: normalizeTitle(a) === normalizeTitle(s) || similarity > thresholds.titleThreshold, similarity };
    });

    check('year', reference.year?.toString(), (r) => r.year?.toString() ?? '', (a, s) => ({ match: a.trim() === s }));

    check('journal', reference.journal, (r) => r.journal, (a, s) => {
        const similarity = tokenSimilarity(a, s);
        const match =
            normalizeTitle(a) === normalizeTitle(s) || similarity > thresholds.journalThreshold || journalAbbreviates(a, s);
        return { match, similarity };
    });

    check('volume', reference.volume, (r) => r.volume, (a, s) => ({ match: a.trim().toLowerCase() === s.trim().toLowerCase() }));
    check('issue', reference.issue, (r) => r.issue, (a, s) => ({ match: a.trim().toLowerCase() === s.trim().toLowerCase() }));
    check('pages', reference.pages, (r) => r.pages, (a, s) => ({ match: normalizePages(a) === normalizePages(s) }));

    check('first_author', reference.authors?.[0], (r) => r.authors[0] ?? '', (a, s) => {
        const surnameA = extractLastName(a);
        return { match: surnameA !== '' && surnameA === extractLastName(s) };
    });

    check('doi', reference.doi, (r) => r.doi ?? '', (a, s) => {
        const doi = normalizeDoi(a);
        return { match: doi !== null && doi === normalizeDoi(s) };
    });

    return checks;
}

/**
 * Resolves a reference through the registry → graph → biomedical chain,
 * falls back to a bibliographic search, and classifies the result.
 */
export class Verifier {
    private readonly options: VerificationConfig;
    private readonly precedence: SourcePrecedence;
    private readonly titleSimilarityThreshold: number;

    constructor(
        private readonly sources: VerifierSources,
        options: VerifierOptions = {}
    ) {
        const { precedence, titleSimilarityThreshold, ...verification } = options;
        this.options = { ...DEFAULT_CONFIG.verification, ...verification };
        this.precedence = precedence ?? DEFAULT_CONFIG.precedence;
        this.titleSimilarityThreshold = titleSimilarityThreshold ?? DEFAULT_CONFIG.matching.titleSimilarityThreshold;
    }

    async verify(reference: ReferenceToVerify): Promise<VerificationResult> {
        const { registry, graph, biomed } = this.sources;
        const doi = normalizeDoi(reference.doi);
        const pmid = normalizePmid(reference.pmid);
        const title = reference.title?.trim() ?? '';
        const surname = firstAuthorSurname(reference.authors);

        const attempts: LayerAttempt[] = [];
        const found: BibRecord[] = [];
        const searched = new Set<string>();

        const note = (layer: ResolutionLayer, source: SourceAdapter, method: LayerAttempt['method'], pick: CandidatePick): void => {
            attempts.push({ layer, source: source.tag, method, outcome: pick.outcome });
            if (pick.record) found.push(pick.record);
        };

        const search = async (layer: ResolutionLayer, source: SourceAdapter, query: string, target: string): Promise<void> => {
            const key = `${source.tag}:${query}`;
            if (searched.has(key)) return;
            searched.add(key);
            const candidates = await this.call(source, 'search', () => source.search(query, { limit: 3 }), []);
            note(layer, source, 'search', pickCandidate(candidates, target, this.options.fallbackThreshold));
        };

        // Layer 1: DOI registry
        if (doi) {
            const hit = await this.call(registry, 'lookupByDoi', () => registry.lookupByDoi(doi), null);
            note('registry', registry, 'doi', asPick(hit));
        }

        // Layer 2: graph API, only when the registry did not resolve it
        if (found.length === 0 && (doi || title)) {
            if (doi) {
                const hit = await this.call(graph, 'lookupByDoi', () => graph.lookupByDoi(doi), null);
                note('graph', graph, 'doi', asPick(hit?.title ? hit : null));
            } else {
                await search('graph', graph, title, title);
            }
        }

        // Layer 3: biomedical database
        let biomedHit = false;
        if (pmid) {
            const hit = await this.call(biomed, 'lookupByPmid', () => biomed.lookupByPmid(pmid), null);
            note('biomed', biomed, 'pmid', asPick(hit));
            biomedHit = hit !== null;
        }
        if (!biomedHit && doi) {
            const hit = await this.call(biomed, 'lookupByDoi', () => biomed.lookupByDoi(doi), null);
            note('biomed', biomed, 'doi', asPick(hit));
        } else if (!biomedHit && !pmid && title) {
            await search('biomed', biomed, [title, surname].filter(Boolean).join(' '), title);
        }

        // Bibliographic fallback across the registry and the biomedical database
        if (found.length === 0) {
            const target = title || stripIdentifiers(reference.raw ?? '');
            const query = [target, surname].filter(Boolean).join(' ').trim();
            if (query) {
                await search('fallback', registry, query, target);
                if (found.length === 0) {
                    await search('fallback', biomed, query, target);
                }
            }
        }

        return this.classify(reference, found, attempts);
    }

    private async classify(
        reference: ReferenceToVerify,
        found: BibRecord[],
        attempts: LayerAttempt[]
    ): Promise<VerificationResult> {
        const [primary] = found;
        if (!primary) {
            logger.debug({ label: reference.label, attempts: attempts.length }, 'Reference not found');
            return {
                reference,
                status: 'NOT_FOUND',
                matched_record: null,
                field_mismatches: [],
                field_checks: [],
                sources_used: [],
                attempts,
            };
        }

        const contributors = found.filter(
            (candidate) =>
                candidate === primary ||
                matchRecords(primary, candidate, { titleSimilarityThreshold: this.titleSimilarityThreshold })
        );
        if (contributors.length < found.length) {
            logger.warn(
                { label: reference.label, discarded: found.length - contributors.length },
                'Sources disagree on the work; keeping records that match the first confirmation'
            );
        }

        let merged = mergeAll(contributors, this.precedence) ?? primary;
        const sourcesUsed = sortOrigins(contributors.flatMap((c) => c.origin));

        if (this.options.checkRetractions && !merged.retracted && merged.pmid && !sourcesUsed.includes('pubmed')) {
            const { biomed } = this.sources;
            const pmid = merged.pmid;
            const retracted = await this.call(biomed, 'checkRetracted', () => biomed.checkRetracted(pmid), false);
            merged = { ...merged, retracted };
        }

        const checks = compareFields(reference, merged, contributors, this.options);
        const mismatches: FieldMismatch[] = checks
            .filter((c) => !c.match)
            .map((c) => ({ field: c.field, asserted_value: c.asserted_value, source_value: c.source_value }));

        let status: VerificationStatus;
        if (merged.retracted) {
            status = 'RETRACTED';
        } else {
            status = mismatches.length > 0 ? 'ERRORS_FOUND' : 'VERIFIED';
        }

        logger.debug({ label: reference.label, status, sources: sourcesUsed }, 'Reference classified');

        return {
            reference,
            status,
            matched_record: merged,
            field_mismatches: mismatches,
            field_checks: checks,
            sources_used: sourcesUsed,
            attempts,
        };
    }

    /**
     * Run one adapter call. A rejection is logged and treated as "absent"
     * so the chain moves on to the next layer.
     */
    private async call<T>(source: SourceAdapter, method: string, fn: () => Promise<T>, absent: T): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            logger.warn({ source: source.tag, method, error }, 'Source call failed, continuing with next layer');
            return absent;
        }
    }
}

function asPick(record: BibRecord | null): CandidatePick {
    return record ? { record, outcome: 'found' } : { record: null, outcome: 'not_found' };
}

/**
 * Free-text reference with DOI and PMID tokens removed, for searching.
 */
export function stripIdentifiers(raw: string): string {
    return raw
        .replace(/(?:https?:\/\/(?:dx\.)?doi\.org\/|doi[:\s]*)?10\.\d{4,}\/\S+/gi, '')
        .replace(/PMID[:\s]*\d+/gi, '')
        .replace(/\s+/g, ' ')
        .trim();
}
