import type { BibRecord, SearchOptions, SourceAdapter, SourcePrecedence, SourceTag } from '../types/index.js';
import { deduplicate } from '../core/deduplicator.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface SearchAllOptions extends SearchOptions {
    precedence?: SourcePrecedence;
    titleSimilarityThreshold?: number;
}

export interface SearchAllResult {
    /** Deduplicated records, most cited first */
    records: BibRecord[];
    /** Raw result count per source, before deduplication */
    perSource: Partial<Record<SourceTag, number>>;
}

/**
 * Run one query against every adapter in turn, pool the results and
 * deduplicate them. A failing source contributes nothing.
 *
 * The Clinical Queries filter only narrows the PubMed query; other
 * adapters ignore it.
 */
export async function searchAll(
    query: string,
    adapters: readonly SourceAdapter[],
    options: SearchAllOptions = {}
): Promise<SearchAllResult> {
    const { precedence, titleSimilarityThreshold, ...searchOptions } = options;
    const pool: BibRecord[] = [];
    const perSource: Partial<Record<SourceTag, number>> = {};

    for (const adapter of adapters) {
        let records: BibRecord[] = [];
        try {
            records = await adapter.search(query, searchOptions);
        } catch (error) {
            logger.warn({ source: adapter.tag, error }, 'Search failed, continuing without this source');
        }

        logger.info({ source: adapter.name, count: records.length }, 'Search results');
        perSource[adapter.tag] = (perSource[adapter.tag] ?? 0) + records.length;
        pool.push(...records);
    }

    const records = deduplicate(pool, { precedence, titleSimilarityThreshold });
    logger.info({ pooled: pool.length, unique: records.length }, 'Deduplicated search results');

    return { records, perSource };
}
