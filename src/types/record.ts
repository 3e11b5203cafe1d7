/**
 * Source tags, one per upstream data source.
 */
export type SourceTag = 'semantic_scholar' | 'pubmed' | 'crossref';

/** Canonical ordering of source tags, used to keep `origin` sorted. */
export const SOURCE_TAGS: readonly SourceTag[] = ['crossref', 'pubmed', 'semantic_scholar'];

/**
 * Fields whose value carries a provenance tag.
 * The merger compares provenance per field, not per record.
 */
export type TrackedField =
    | 'title'
    | 'authors'
    | 'year'
    | 'journal'
    | 'volume'
    | 'issue'
    | 'pages'
    | 'doi'
    | 'pmid'
    | 'source_id';

/**
 * BibRecord: the canonical bibliographic record.
 * Every source adapter normalizes its responses into this shape.
 */
export interface BibRecord {
    /** Display title ('' when unknown) */
    title: string;

    /** Author names in display order, verbatim from the source */
    authors: string[];

    /** Publication year */
    year: number | null;

    /** Journal or venue name ('' when unknown) */
    journal: string;

    volume: string;
    issue: string;
    pages: string;

    /** Normalized DOI (lowercase, without scheme or doi: prefix) */
    doi: string | null;

    /** PubMed identifier (digits only) */
    pmid: string | null;

    /** Native key of the origin, e.g. a Semantic Scholar paperId */
    source_id: string | null;

    abstract: string | null;

    /** Citation count (only Semantic Scholar and Crossref populate it) */
    citation_count: number;

    /** Sources that contributed to this record, sorted by SOURCE_TAGS order */
    origin: SourceTag[];

    /** Set by a retraction check, never cleared by a merge */
    retracted: boolean;

    /** Which source supplied each tracked field */
    provenance: Partial<Record<TrackedField, SourceTag>>;
}

/**
 * Field values a source adapter supplies when creating a record.
 * Anything omitted takes the empty default.
 */
export type BibRecordFields = Partial<Omit<BibRecord, 'origin' | 'provenance'>>;

/**
 * A user-asserted reference to be verified.
 * `label` is carried through to the report and otherwise ignored.
 */
export interface ReferenceToVerify {
    label?: string;
    /** Free-text line the reference was parsed from, if any */
    raw?: string;
    title?: string;
    authors?: string[];
    year?: number;
    journal?: string;
    volume?: string;
    issue?: string;
    pages?: string;
    doi?: string;
    pmid?: string;
    source_id?: string;
    abstract?: string;
}
