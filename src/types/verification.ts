import type { BibRecord, ReferenceToVerify, SourceTag } from './record.js';

/**
 * Terminal verification states.
 */
export type VerificationStatus = 'VERIFIED' | 'ERRORS_FOUND' | 'NOT_FOUND' | 'RETRACTED';

/**
 * Fields compared between an asserted reference and the resolved record.
 */
export type ComparedField = 'title' | 'year' | 'journal' | 'volume' | 'issue' | 'pages' | 'first_author' | 'doi';

/**
 * A field whose asserted value disagrees with every confirming source.
 */
export interface FieldMismatch {
    field: ComparedField;
    asserted_value: string;
    source_value: string;
}

/**
 * Outcome of comparing one field.
 */
export interface FieldCheck {
    field: ComparedField;
    match: boolean;
    asserted_value: string;
    source_value: string;
    /** Similarity score for fuzzy-compared fields (title, journal) */
    similarity?: number;
}

/**
 * Fallback layers of the resolution chain.
 */
export type ResolutionLayer = 'registry' | 'graph' | 'biomed' | 'fallback';

/**
 * How a single source call ended.
 * `ambiguous` means candidates came back but none was similar enough.
 */
export type AttemptOutcome = 'found' | 'not_found' | 'ambiguous';

export interface LayerAttempt {
    layer: ResolutionLayer;
    source: SourceTag;
    method: 'doi' | 'pmid' | 'search';
    outcome: AttemptOutcome;
}

/**
 * Result of verifying one reference.
 */
export interface VerificationResult {
    reference: ReferenceToVerify;
    status: VerificationStatus;

    /** Merged record of all confirming sources, or null when NOT_FOUND */
    matched_record: BibRecord | null;

    field_mismatches: FieldMismatch[];
    field_checks: FieldCheck[];

    /** Sources whose record contributed to `matched_record` */
    sources_used: SourceTag[];

    attempts: LayerAttempt[];
}
