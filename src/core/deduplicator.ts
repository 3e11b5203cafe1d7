import type { BibRecord, SourcePrecedence } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { matchRecords, type MatchOptions } from './matcher.js';
import { mergeRecords } from './merger.js';

const logger = getLogger();

export interface DeduplicateOptions extends MatchOptions {
    precedence?: SourcePrecedence;
}

interface Entry {
    record: BibRecord;
    /** Input position of the first record folded into this entry */
    firstSeen: number;
}

/**
 * Collapse records pooled from several sources into one record per work.
 *
 * Each record merges into the first accumulated entry it matches, or is
 * appended. When a merge gives an entry a new identifier or year, any
 * other entry that now matches it is folded in as well. Nothing is dropped.
 *
 * Output is sorted by descending citation count, ties in order of first
 * appearance.
 */
export function deduplicate(records: readonly BibRecord[], options: DeduplicateOptions = {}): BibRecord[] {
    const { precedence, ...matchOptions } = options;
    const entries: Entry[] = [];

    records.forEach((record, index) => {
        const hit = entries.findIndex((entry) => matchRecords(entry.record, record, matchOptions));

        if (hit === -1) {
            entries.push({ record, firstSeen: index });
            return;
        }

        const target = entries[hit];
        if (!target) return;
        target.record = mergeRecords(target.record, record, precedence);
        foldMatches(entries, target, matchOptions, precedence);
    });

    logger.debug({ input: records.length, output: entries.length }, 'Deduplicated records');

    return entries
        .slice()
        .sort((x, y) => y.record.citation_count - x.record.citation_count || x.firstSeen - y.firstSeen)
        .map((entry) => entry.record);
}

/**
 * Merge into `target` every other entry it now matches, earlier or later,
 * until none is left. A merge can fill in a year or an identifier that
 * links the grown record to an entry it missed before.
 */
function foldMatches(
    entries: Entry[],
    target: Entry,
    matchOptions: MatchOptions,
    precedence: SourcePrecedence | undefined
): void {
    for (;;) {
        const j = entries.findIndex((other) => other !== target && matchRecords(target.record, other.record, matchOptions));
        const other = entries[j];
        if (j === -1 || !other) return;

        target.record = mergeRecords(target.record, other.record, precedence);
        target.firstSeen = Math.min(target.firstSeen, other.firstSeen);
        entries.splice(j, 1);
    }
}
