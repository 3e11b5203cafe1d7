import type { BibRecord, SearchOptions, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import { createRecord } from '../core/record.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { cleanSearchQuery, parseYearRange, withFallback } from './utils.js';

const logger = getLogger();

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';
const S2_RECOMMENDATIONS_BASE = 'https://api.semanticscholar.org/recommendations/v1';

/** Fields to request from S2 API */
const PAPER_FIELDS = [
    'paperId', 'externalIds', 'title', 'abstract', 'year', 'venue',
    'publicationVenue', 'citationCount', 'authors', 'journal', 'publicationDate',
].join(',');

const REFERENCE_FIELDS = [
    'paperId', 'externalIds', 'title', 'year', 'venue', 'citationCount', 'authors',
].join(',');

const AUTHOR_FIELDS = 'authorId,name,paperCount,citationCount,hIndex';

/**
 * An author profile from the author search.
 */
export interface AuthorSummary {
    author_id: string;
    name: string;
    paper_count: number | null;
    citation_count: number | null;
    h_index: number | null;
}

/**
 * Semantic Scholar API response types.
 */
interface S2Paper {
    paperId: string;
    externalIds?: {
        DOI?: string;
        PubMed?: string;
        ArXiv?: string;
        CorpusId?: number;
    } | null;
    title?: string | null;
    abstract?: string | null;
    year?: number | null;
    venue?: string | null;
    publicationVenue?: { name?: string } | null;
    journal?: { name?: string; volume?: string; pages?: string } | null;
    citationCount?: number | null;
    publicationDate?: string | null;
    authors?: Array<{
        authorId?: string | null;
        name?: string | null;
    }>;
}

interface S2SearchResponse {
    total: number;
    offset: number;
    data?: S2Paper[];
    next?: number;
}

interface S2ReferencesResponse {
    offset: number;
    data?: Array<{
        citedPaper: S2Paper | null;
    }>;
    next?: number;
}

interface S2CitationsResponse {
    offset: number;
    data?: Array<{
        citingPaper: S2Paper | null;
    }>;
    next?: number;
}

interface S2Author {
    authorId: string | null;
    name?: string | null;
    paperCount?: number | null;
    citationCount?: number | null;
    hIndex?: number | null;
}

interface S2AuthorSearchResponse {
    total: number;
    data?: S2Author[];
}

interface S2AuthorPapersResponse {
    offset: number;
    data?: S2Paper[];
    next?: number;
}

interface S2RecommendationsResponse {
    recommendedPapers?: S2Paper[];
}

/**
 * Semantic Scholar source adapter: the citation-graph API.
 * Provides citation counts, the citation graph, author papers and
 * recommendations.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter {
    readonly name = 'Semantic Scholar';
    readonly tag = 'semantic_scholar' as const;
    private httpClient: HttpClient;
    private apiKey?: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['SEMANTIC_SCHOLAR_API_KEY'];
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(query: string, options: SearchOptions = {}): Promise<BibRecord[]> {
        const params = new URLSearchParams({
            query: cleanSearchQuery(query),
            limit: String(Math.min(options.limit ?? 20, 100)),
            fields: PAPER_FIELDS,
        });

        const years = parseYearRange(options.yearRange);
        if (years) {
            params.set('year', years[0] === years[1] ? String(years[0]) : `${years[0]}-${years[1]}`);
        }
        if (options.fieldsOfStudy) {
            params.set('fieldsOfStudy', options.fieldsOfStudy);
        }

        const url = `${S2_BASE}/paper/search?${params.toString()}`;
        logger.debug({ url }, 'S2 search');

        return withFallback(this.tag, 'search', [], async () => {
            const response = await this.httpClient.get<S2SearchResponse>(url, this.requestOptions());
            return (response.data.data ?? []).map((paper) => this.normalizeS2Paper(paper));
        });
    }

    async lookupByDoi(doi: string): Promise<BibRecord | null> {
        return this.fetchPaper(`DOI:${doi}`);
    }

    async lookupByPmid(pmid: string): Promise<BibRecord | null> {
        return this.fetchPaper(`PMID:${pmid}`);
    }

    /**
     * Semantic Scholar does not track retractions.
     */
    async checkRetracted(_pmid: string): Promise<boolean> {
        return false;
    }

    /**
     * Fetch a single paper by S2 id or a prefixed external id
     * (`DOI:...`, `PMID:...`, `ARXIV:...`).
     */
    async fetchPaper(id: string): Promise<BibRecord | null> {
        const url = `${S2_BASE}/paper/${encodeURIComponent(id)}?fields=${PAPER_FIELDS}`;
        logger.debug({ url }, 'S2 fetch paper');

        return withFallback<BibRecord | null>(this.tag, 'fetchPaper', null, async () => {
            const response = await this.httpClient.get<S2Paper>(url, this.requestOptions());
            return response.data.paperId ? this.normalizeS2Paper(response.data) : null;
        });
    }

    /**
     * Papers the given paper references (outgoing citations).
     */
    async fetchReferences(paperId: string, limit = 50): Promise<BibRecord[]> {
        const params = new URLSearchParams({
            fields: REFERENCE_FIELDS,
            limit: String(Math.min(limit, 1000)),
        });

        const url = `${S2_BASE}/paper/${encodeURIComponent(paperId)}/references?${params.toString()}`;
        logger.debug({ url }, 'S2 fetch references');

        return withFallback(this.tag, 'fetchReferences', [], async () => {
            const response = await this.httpClient.get<S2ReferencesResponse>(url, this.requestOptions());
            return (response.data.data ?? [])
                .map((ref) => ref.citedPaper)
                .filter((p): p is S2Paper => Boolean(p?.paperId))
                .map((paper) => this.normalizeS2Paper(paper));
        });
    }

    /**
     * Papers citing the given paper (incoming citations).
     */
    async fetchCitations(paperId: string, limit = 50): Promise<BibRecord[]> {
        const params = new URLSearchParams({
            fields: REFERENCE_FIELDS,
            limit: String(Math.min(limit, 1000)),
        });

        const url = `${S2_BASE}/paper/${encodeURIComponent(paperId)}/citations?${params.toString()}`;
        logger.debug({ url }, 'S2 fetch citations');

        return withFallback(this.tag, 'fetchCitations', [], async () => {
            const response = await this.httpClient.get<S2CitationsResponse>(url, this.requestOptions());
            return (response.data.data ?? [])
                .map((cite) => cite.citingPaper)
                .filter((p): p is S2Paper => Boolean(p?.paperId))
                .map((paper) => this.normalizeS2Paper(paper));
        });
    }

    /**
     * Author profiles matching a name, best match first.
     */
    async searchAuthors(name: string, limit = 5): Promise<AuthorSummary[]> {
        const params = new URLSearchParams({
            query: name.trim(),
            limit: String(limit),
            fields: AUTHOR_FIELDS,
        });

        const url = `${S2_BASE}/author/search?${params.toString()}`;
        logger.debug({ url }, 'S2 author search');

        return withFallback(this.tag, 'searchAuthors', [], async () => {
            const response = await this.httpClient.get<S2AuthorSearchResponse>(url, this.requestOptions());
            return (response.data.data ?? []).flatMap((author): AuthorSummary[] =>
                author.authorId
                    ? [{
                        author_id: author.authorId,
                        name: author.name ?? '',
                        paper_count: author.paperCount ?? null,
                        citation_count: author.citationCount ?? null,
                        h_index: author.hIndex ?? null,
                    }]
                    : []
            );
        });
    }

    /**
     * Papers by one author, newest first.
     */
    async fetchAuthorPapers(authorId: string, limit = 100): Promise<BibRecord[]> {
        const params = new URLSearchParams({
            fields: PAPER_FIELDS,
            limit: String(Math.min(limit, 1000)),
        });

        const url = `${S2_BASE}/author/${encodeURIComponent(authorId)}/papers?${params.toString()}`;
        logger.debug({ url }, 'S2 fetch author papers');

        return withFallback(this.tag, 'fetchAuthorPapers', [], async () => {
            const response = await this.httpClient.get<S2AuthorPapersResponse>(url, this.requestOptions());
            return (response.data.data ?? [])
                .filter((paper) => Boolean(paper.paperId))
                .map((paper) => this.normalizeS2Paper(paper))
                .sort((a, b) => (b.year ?? 0) - (a.year ?? 0));
        });
    }

    /**
     * Papers recommended from a set of seed papers (S2 ids or prefixed
     * external ids).
     */
    async recommend(seedIds: readonly string[], limit = 20): Promise<BibRecord[]> {
        if (seedIds.length === 0) return [];

        const params = new URLSearchParams({
            fields: PAPER_FIELDS,
            limit: String(Math.min(limit, 500)),
        });

        const url = `${S2_RECOMMENDATIONS_BASE}/papers/?${params.toString()}`;
        logger.debug({ url, seeds: seedIds.length }, 'S2 recommendations');

        return withFallback(this.tag, 'recommend', [], async () => {
            const response = await this.httpClient.post<S2RecommendationsResponse>(
                url,
                { positivePaperIds: [...seedIds] },
                this.requestOptions()
            );
            return (response.data.recommendedPapers ?? [])
                .filter((paper) => Boolean(paper.paperId))
                .map((paper) => this.normalizeS2Paper(paper));
        });
    }

    // ─── Private helpers ──────────────────────────────────────

    normalizeS2Paper(paper: S2Paper): BibRecord {
        const venue = paper.publicationVenue?.name || paper.journal?.name || paper.venue || '';

        return createRecord(this.tag, {
            source_id: paper.paperId,
            doi: paper.externalIds?.DOI ?? null,
            pmid: paper.externalIds?.PubMed ?? null,
            title: paper.title ?? '',
            authors: (paper.authors ?? []).map((a) => a.name ?? '').filter((name) => name.length > 0),
            year: paper.year ?? null,
            journal: venue,
            volume: paper.journal?.volume ?? '',
            pages: paper.journal?.pages ?? '',
            abstract: paper.abstract ?? null,
            citation_count: paper.citationCount ?? 0,
        });
    }

    private requestOptions(): { source: string; headers: Record<string, string> } {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return { source: this.tag, headers };
    }
}
