import type { BibRecord, SourceTag } from './record.js';

/**
 * PubMed Clinical Queries filter categories.
 */
export type ClinicalFilter = 'therapy' | 'diagnosis' | 'prognosis' | 'etiology' | 'systematic_review';

/**
 * Options accepted by `SourceAdapter.search`.
 */
export interface SearchOptions {
    /** Maximum number of records to return */
    limit?: number;

    /** Single year ("2020") or inclusive range ("2018-2022") */
    yearRange?: string;

    /** Clinical Queries filter (PubMed only, ignored elsewhere) */
    clinicalFilter?: ClinicalFilter;

    /** Field-of-study filter, e.g. "Medicine" (Semantic Scholar only) */
    fieldsOfStudy?: string;
}

/**
 * Interface for data source adapters (Semantic Scholar, PubMed, Crossref).
 *
 * Each adapter returns records already in the canonical BibRecord shape.
 * A failing or rate-limited call resolves to an empty result, never a
 * partially-populated record and never a rejection.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /** Source tag stamped into `origin` */
    readonly tag: SourceTag;

    /**
     * Free-text search. Returns normalized records in source relevance order.
     */
    search(query: string, options?: SearchOptions): Promise<BibRecord[]>;

    /**
     * Resolve a single DOI.
     */
    lookupByDoi(doi: string): Promise<BibRecord | null>;

    /**
     * Resolve a single PubMed identifier.
     */
    lookupByPmid(pmid: string): Promise<BibRecord | null>;

    /**
     * Whether the paper with this PMID has been formally retracted.
     */
    checkRetracted(pmid: string): Promise<boolean>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pools (Crossref, NCBI) */
    email?: string;
}
