import {
    SOURCE_TAGS,
    type BibRecord,
    type BibRecordFields,
    type SourceTag,
    type TrackedField,
} from '../types/index.js';
import { normalizeDoi, normalizePmid } from './normalize.js';

export const TRACKED_FIELDS: readonly TrackedField[] = [
    'title', 'authors', 'year', 'journal', 'volume', 'issue', 'pages', 'doi', 'pmid', 'source_id',
];

/**
 * Whether a tracked field holds a value.
 */
export function hasValue(record: BibRecord, field: TrackedField): boolean {
    const value = record[field];
    if (value === null) return false;
    if (typeof value === 'string') return value.trim().length > 0;
    if (Array.isArray(value)) return value.length > 0;
    return true;
}

/**
 * Build a record from one source.
 *
 * Identifiers are normalized, missing fields take their empty defaults and
 * every non-empty tracked field is stamped with `origin` as its provenance.
 */
export function createRecord(origin: SourceTag, fields: BibRecordFields = {}): BibRecord {
    const record: BibRecord = {
        title: fields.title?.trim() ?? '',
        authors: (fields.authors ?? []).map((a) => a.trim()).filter((a) => a.length > 0),
        year: fields.year !== null && fields.year !== undefined && Number.isInteger(fields.year) ? fields.year : null,
        journal: fields.journal?.trim() ?? '',
        volume: fields.volume?.trim() ?? '',
        issue: fields.issue?.trim() ?? '',
        pages: fields.pages?.trim() ?? '',
        doi: normalizeDoi(fields.doi),
        pmid: normalizePmid(fields.pmid),
        source_id: fields.source_id?.trim() || null,
        abstract: fields.abstract?.trim() || null,
        citation_count: Math.max(0, fields.citation_count ?? 0),
        origin: [origin],
        retracted: fields.retracted ?? false,
        provenance: {},
    };

    for (const field of TRACKED_FIELDS) {
        if (hasValue(record, field)) {
            record.provenance[field] = origin;
        }
    }

    return record;
}

/**
 * Sort and de-duplicate source tags into canonical order.
 */
export function sortOrigins(tags: Iterable<SourceTag>): SourceTag[] {
    const present = new Set(tags);
    return SOURCE_TAGS.filter((tag) => present.has(tag));
}

/**
 * Deep copy of a record.
 */
export function cloneRecord(record: BibRecord): BibRecord {
    return {
        ...record,
        authors: [...record.authors],
        origin: [...record.origin],
        provenance: { ...record.provenance },
    };
}
