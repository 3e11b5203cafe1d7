import { XMLParser } from 'fast-xml-parser';
import type {
    BibRecord,
    ClinicalFilter,
    SearchOptions,
    SourceAdapter,
    SourceAdapterOptions,
} from '../types/index.js';
import { createRecord } from '../core/record.js';
import { normalizePmid } from '../core/normalize.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import {
    parseYearRange,
    withFallback,
    xmlAttr,
    xmlChild,
    xmlChildren,
    xmlText,
} from './utils.js';

const logger = getLogger();

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';
const TOOL_NAME = 'paper-reconcile';

/**
 * PubMed Clinical Queries hedges (broad, high-recall versions).
 * Appended to the user's query with AND.
 */
export const CLINICAL_QUERY_FILTERS: Readonly<Record<ClinicalFilter, string>> = {
    therapy:
        '(randomized controlled trial[pt] OR controlled clinical trial[pt] ' +
        'OR randomized[tiab] OR placebo[tiab] OR drug therapy[sh] ' +
        'OR randomly[tiab] OR trial[tiab] OR groups[tiab]) ' +
        'NOT (animals[mh] NOT humans[mh])',
    diagnosis:
        '(sensitiv*[tiab] OR sensitivity and specificity[MeSH Terms] ' +
        'OR diagnos*[tiab] OR diagnosis[MeSH:noexp] ' +
        'OR diagnostic *[MeSH:noexp] OR diagnosis,differential[MeSH:noexp] ' +
        'OR diagnosis[Subheading:noexp]) ' +
        'NOT (animals[mh] NOT humans[mh])',
    prognosis:
        '(incidence[MeSH:noexp] OR mortality[MeSH Terms] ' +
        'OR follow up studies[MeSH:noexp] OR prognos*[tw] ' +
        'OR predict*[tw] OR course[tw]) ' +
        'NOT (animals[mh] NOT humans[mh])',
    etiology:
        '(risk*[tiab] OR risk*[MeSH:noexp] OR cohort studies[MeSH Terms] ' +
        'OR odds ratio[tw] OR relative risk[tw] ' +
        'OR case control*[tw]) ' +
        'NOT (animals[mh] NOT humans[mh])',
    systematic_review:
        '(systematic review[ti] OR meta-analysis[pt] OR meta-analysis[ti] ' +
        'OR systematic literature review[ti] ' +
        'OR (systematic review[tiab] AND review[pt]) ' +
        'OR cochrane database syst rev[ta]) ' +
        'NOT (animals[mh] NOT humans[mh])',
};

/** Elements that may repeat, always parsed as arrays */
const REPEATED_ELEMENTS = new Set([
    'PubmedArticle', 'Author', 'AbstractText', 'ArticleId', 'ELocationID',
    'PublicationType', 'CommentsCorrections',
]);

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    // Titles and abstracts carry inline markup (<i>, <sup>); keep it raw and strip later
    stopNodes: ['*.ArticleTitle', '*.AbstractText'],
    isArray: (name: string) => REPEATED_ELEMENTS.has(name),
});

interface ESearchResponse {
    esearchresult?: {
        count?: string;
        idlist?: string[];
    };
}

/**
 * Parse an efetch XML document into records, one per PubmedArticle.
 */
export function parsePubmedXml(xml: string): BibRecord[] {
    if (!xml.trim() || xml.trimStart().startsWith('<error>')) return [];

    const document: unknown = xmlParser.parse(xml);
    const articles = xmlChildren(xmlChild(document, 'PubmedArticleSet'), 'PubmedArticle');

    const records: BibRecord[] = [];
    for (const article of articles) {
        const record = parsePubmedArticle(article);
        if (record) records.push(record);
    }
    return records;
}

/**
 * Parse one PubmedArticle element. Returns null when it has no PMID.
 */
export function parsePubmedArticle(article: unknown): BibRecord | null {
    const medline = xmlChild(article, 'MedlineCitation');
    const pmid = normalizePmid(xmlText(xmlChild(medline, 'PMID')));
    if (!pmid) return null;

    const art = xmlChild(medline, 'Article');
    const journal = xmlChild(art, 'Journal');
    const journalIssue = xmlChild(journal, 'JournalIssue');

    const authors = xmlChildren(xmlChild(art, 'AuthorList'), 'Author')
        .map((author) => {
            const collective = xmlText(xmlChild(author, 'CollectiveName'));
            if (collective) return collective;
            return [xmlText(xmlChild(author, 'ForeName')), xmlText(xmlChild(author, 'LastName'))]
                .filter(Boolean)
                .join(' ');
        })
        .filter((name) => name.length > 0);

    return createRecord('pubmed', {
        pmid,
        title: xmlText(xmlChild(art, 'ArticleTitle')),
        authors,
        year: parsePubDateYear(xmlChild(journalIssue, 'PubDate')),
        journal: xmlText(xmlChild(journal, 'Title')) || xmlText(xmlChild(journal, 'ISOAbbreviation')),
        volume: xmlText(xmlChild(journalIssue, 'Volume')),
        issue: xmlText(xmlChild(journalIssue, 'Issue')),
        pages: xmlText(xmlChild(art, 'Pagination', 'MedlinePgn')),
        doi: findDoi(article, art),
        abstract: parseAbstract(xmlChild(art, 'Abstract')),
        retracted: isRetracted(medline, art),
    });
}

function parsePubDateYear(pubDate: unknown): number | null {
    const year = xmlText(xmlChild(pubDate, 'Year'));
    if (/^\d{4}$/.test(year)) return Number(year);

    // "1998 Dec-1999 Jan", "2000 Spring"
    const medlineDate = /(\d{4})/.exec(xmlText(xmlChild(pubDate, 'MedlineDate')));
    return medlineDate ? Number(medlineDate[1]) : null;
}

function findDoi(article: unknown, art: unknown): string | null {
    const articleIds = xmlChildren(xmlChild(article, 'PubmedData', 'ArticleIdList'), 'ArticleId');
    const fromIdList = articleIds.find((id) => xmlAttr(id, 'IdType') === 'doi');
    if (fromIdList) return xmlText(fromIdList);

    const fromLocation = xmlChildren(art, 'ELocationID').find((id) => xmlAttr(id, 'EIdType') === 'doi');
    return fromLocation ? xmlText(fromLocation) : null;
}

/**
 * Structured abstracts become "LABEL: text" sections joined by spaces.
 */
function parseAbstract(abstract: unknown): string | null {
    const parts = xmlChildren(abstract, 'AbstractText')
        .map((section) => {
            const text = xmlText(section);
            const label = xmlAttr(section, 'Label');
            return label && text ? `${label}: ${text}` : text;
        })
        .filter(Boolean);
    return parts.length > 0 ? parts.join(' ') : null;
}

function isRetracted(medline: unknown, art: unknown): boolean {
    const publicationTypes = xmlChildren(xmlChild(art, 'PublicationTypeList'), 'PublicationType');
    if (publicationTypes.some((type) => xmlText(type).toLowerCase().includes('retracted publication'))) {
        return true;
    }

    const corrections = xmlChildren(xmlChild(medline, 'CommentsCorrectionsList'), 'CommentsCorrections');
    return corrections.some((cc) => xmlAttr(cc, 'RefType') === 'RetractionIn');
}

/**
 * PubMed source adapter: the biomedical literature database (NCBI E-utilities).
 * esearch finds PMIDs, efetch returns the article XML.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25500/
 */
export class PubMedAdapter implements SourceAdapter {
    readonly name = 'PubMed';
    readonly tag = 'pubmed' as const;
    private httpClient: HttpClient;
    private apiKey?: string;
    private email?: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['NCBI_API_KEY'];
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
        const term = options.clinicalFilter
            ? `(${query}) AND ${CLINICAL_QUERY_FILTERS[options.clinicalFilter]}`
            : query;

        return withFallback(this.tag, 'search', [], async () => {
            const pmids = await this.esearch(term, options);
            return pmids.length > 0 ? this.efetch(pmids) : [];
        });
    }

    /**
     * Papers listing `name` as an author ("Lee A", "Ann Lee").
     */
    async searchByAuthor(name: string, options: SearchOptions = {}): Promise<BibRecord[]> {
        return this.search(`${name.trim()}[Author]`, { ...options, clinicalFilter: undefined });
    }

    async lookupByDoi(doi: string): Promise<BibRecord | null> {
        return withFallback<BibRecord | null>(this.tag, 'lookupByDoi', null, async () => {
            const [pmid] = await this.esearch(`"${doi}"[doi]`, { limit: 1 });
            if (!pmid) return null;
            const [record] = await this.efetch([pmid]);
            return record ?? null;
        });
    }

    async lookupByPmid(pmid: string): Promise<BibRecord | null> {
        return withFallback<BibRecord | null>(this.tag, 'lookupByPmid', null, async () => {
            const [record] = await this.efetch([pmid]);
            return record ?? null;
        });
    }

    async checkRetracted(pmid: string): Promise<boolean> {
        const retracted = await this.checkRetractions([pmid]);
        return retracted.has(pmid);
    }

    /**
     * PMIDs among `pmids` that are formally retracted.
     */
    async checkRetractions(pmids: readonly string[]): Promise<Set<string>> {
        if (pmids.length === 0) return new Set();

        return withFallback(this.tag, 'checkRetractions', new Set<string>(), async () => {
            const records = await this.efetch(pmids);
            return new Set(records.flatMap((r) => (r.retracted && r.pmid ? [r.pmid] : [])));
        });
    }

    // ─── Private helpers ──────────────────────────────────────

    private async esearch(term: string, options: SearchOptions): Promise<string[]> {
        const params = this.baseParams({
            term,
            retmax: String(options.limit ?? 20),
            retmode: 'json',
            sort: 'relevance',
        });

        const years = parseYearRange(options.yearRange);
        if (years) {
            params.set('mindate', String(years[0]));
            params.set('maxdate', String(years[1]));
            params.set('datetype', 'pdat');
        }

        const url = `${EUTILS_BASE}/esearch.fcgi?${params.toString()}`;
        logger.debug({ term }, 'PubMed esearch');

        const response = await this.httpClient.get<ESearchResponse | string>(url, this.requestOptions());
        if (typeof response.data === 'string') {
            logger.warn({ body: response.data.slice(0, 200) }, 'Unexpected PubMed esearch response');
            return [];
        }
        return response.data.esearchresult?.idlist ?? [];
    }

    private async efetch(pmids: readonly string[]): Promise<BibRecord[]> {
        const params = this.baseParams({ id: pmids.join(','), retmode: 'xml' });
        const url = `${EUTILS_BASE}/efetch.fcgi?${params.toString()}`;
        logger.debug({ count: pmids.length }, 'PubMed efetch');

        const response = await this.httpClient.get<unknown>(url, this.requestOptions());
        return typeof response.data === 'string' ? parsePubmedXml(response.data) : [];
    }

    private baseParams(params: Record<string, string>): URLSearchParams {
        const search = new URLSearchParams({ db: 'pubmed', ...params, tool: TOOL_NAME });
        if (this.email) search.set('email', this.email);
        if (this.apiKey) search.set('api_key', this.apiKey);
        return search;
    }

    private requestOptions(): { source: string; bucket: string } {
        return { source: this.tag, bucket: this.apiKey ? 'pubmed_keyed' : 'pubmed' };
    }
}
