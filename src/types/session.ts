import type { BibRecord } from './record.js';

/**
 * One logged search invocation.
 */
export interface SearchLogEntry {
    source: string;
    query: string;
    timestamp: string;
    result_count: number;
}

/**
 * Citation links known for one paper id.
 */
export interface CitationLinks {
    cites: string[];
    cited_by: string[];
}

export type CitationDirection = 'citedBy' | 'references';

/**
 * A persisted research session.
 * Passed into and returned from every session operation; never held globally.
 */
export interface Session {
    session_id: string;
    topic: string;
    created_at: string;
    updated_at: string;

    /** File name the session is saved under */
    filename: string;

    searches_performed: SearchLogEntry[];

    /** Records keyed by normalized identifier (see `sessionKey`) */
    papers: Record<string, BibRecord>;

    citation_graph: Record<string, CitationLinks>;
}
