import type { BibRecord, SearchOptions, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import { createRecord } from '../core/record.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { cleanText, parseYearRange, withFallback } from './utils.js';

const logger = getLogger();

const CROSSREF_BASE = 'https://api.crossref.org';

/** Crossref caps bibliographic search pages at this many rows */
const MAX_ROWS = 20;

interface CrossrefDate {
    'date-parts'?: Array<Array<number | null>>;
}

/**
 * Crossref work (subset of fields we read).
 */
export interface CrossrefWork {
    DOI?: string;
    title?: string[];
    'container-title'?: string[];
    author?: Array<{
        given?: string;
        family?: string;
        name?: string;
    }>;
    'published-print'?: CrossrefDate;
    'published-online'?: CrossrefDate;
    issued?: CrossrefDate;
    volume?: string;
    issue?: string;
    page?: string;
    abstract?: string;
    'is-referenced-by-count'?: number;
}

interface CrossrefWorkResponse {
    status: string;
    message: CrossrefWork;
}

interface CrossrefSearchResponse {
    status: string;
    message: {
        'total-results'?: number;
        items?: CrossrefWork[];
    };
}

/**
 * First year found in published-print, then published-online, then issued.
 */
function crossrefYear(work: CrossrefWork): number | null {
    for (const date of [work['published-print'], work['published-online'], work.issued]) {
        const year = date?.['date-parts']?.[0]?.[0];
        if (typeof year === 'number' && year > 0) return year;
    }
    return null;
}

/**
 * Normalize a Crossref work into a BibRecord.
 */
export function normalizeCrossrefWork(work: CrossrefWork): BibRecord {
    const authors = (work.author ?? [])
        .map((a) => a.name ?? [a.given, a.family].filter(Boolean).join(' '))
        .map((name) => name.trim())
        .filter((name) => name.length > 0);

    return createRecord('crossref', {
        doi: work.DOI ?? null,
        title: cleanText(work.title?.[0]),
        authors,
        year: crossrefYear(work),
        journal: cleanText(work['container-title']?.[0]),
        volume: work.volume ?? '',
        issue: work.issue ?? '',
        pages: work.page ?? '',
        // JATS markup (<jats:p>) is stripped along with other tags
        abstract: cleanText(work.abstract) || null,
        citation_count: work['is-referenced-by-count'] ?? 0,
    });
}

/**
 * Crossref source adapter: the DOI registry.
 *
 * Crossref does not index PMIDs and does not flag retracted works on the
 * work itself, so `lookupByPmid` and `checkRetracted` never find anything.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefAdapter implements SourceAdapter {
    readonly name = 'Crossref';
    readonly tag = 'crossref' as const;
    private httpClient: HttpClient;
    private email?: string;

    constructor(options?: SourceAdapterOptions) {
        this.email = options?.email;
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
            'query.bibliographic': query,
            rows: String(Math.min(options.limit ?? 5, MAX_ROWS)),
        });

        const years = parseYearRange(options.yearRange);
        if (years) {
            params.set('filter', `from-pub-date:${years[0]},until-pub-date:${years[1]}`);
        }
        this.addMailto(params);

        const url = `${CROSSREF_BASE}/works?${params.toString()}`;
        logger.debug({ url }, 'Crossref search');

        return withFallback(this.tag, 'search', [], async () => {
            const response = await this.httpClient.get<CrossrefSearchResponse>(url, { source: this.tag });
            return (response.data.message.items ?? []).map(normalizeCrossrefWork);
        });
    }

    async lookupByDoi(doi: string): Promise<BibRecord | null> {
        const params = new URLSearchParams();
        this.addMailto(params);
        const query = params.toString();
        const url = `${CROSSREF_BASE}/works/${encodeURIComponent(doi)}${query ? `?${query}` : ''}`;
        logger.debug({ doi }, 'Crossref resolve DOI');

        return withFallback<BibRecord | null>(this.tag, 'lookupByDoi', null, async () => {
            const response = await this.httpClient.get<CrossrefWorkResponse>(url, { source: this.tag });
            return normalizeCrossrefWork(response.data.message);
        });
    }

    async lookupByPmid(_pmid: string): Promise<BibRecord | null> {
        return null;
    }

    async checkRetracted(_pmid: string): Promise<boolean> {
        return false;
    }

    private addMailto(params: URLSearchParams): void {
        if (this.email) params.set('mailto', this.email);
    }
}
