import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type {
    BibRecord,
    CitationDirection,
    Session,
    SourcePrecedence,
} from '../types/index.js';
import { matchRecords, type MatchOptions } from '../core/matcher.js';
import { mergeRecords } from '../core/merger.js';
import { normalizeTitle } from '../core/normalize.js';
import { MalformedInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const SESSION_FILE_PATTERN = /^research_session_.*\.json$/;

const sourceTag = z.enum(['crossref', 'pubmed', 'semantic_scholar']);
const trackedField = z.enum([
    'title', 'authors', 'year', 'journal', 'volume', 'issue', 'pages', 'doi', 'pmid', 'source_id',
]);

/**
 * Stored record. Fields missing from older session files take their defaults.
 */
const BibRecordSchema = z.object({
    title: z.string().default(''),
    authors: z.array(z.string()).default([]),
    year: z.number().int().nullable().default(null),
    journal: z.string().default(''),
    volume: z.string().default(''),
    issue: z.string().default(''),
    pages: z.string().default(''),
    doi: z.string().nullable().default(null),
    pmid: z.string().nullable().default(null),
    source_id: z.string().nullable().default(null),
    abstract: z.string().nullable().default(null),
    citation_count: z.number().nonnegative().default(0),
    origin: z.array(sourceTag).default([]),
    retracted: z.boolean().default(false),
    provenance: z.record(trackedField, sourceTag).default({}),
});

const SessionSchema = z.object({
    session_id: z.string().min(1),
    topic: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
    filename: z.string().min(1),
    searches_performed: z
        .array(
            z.object({
                source: z.string(),
                query: z.string(),
                timestamp: z.string(),
                result_count: z.number().int().nonnegative(),
            })
        )
        .default([]),
    papers: z.record(z.string(), BibRecordSchema).default({}),
    citation_graph: z
        .record(
            z.string(),
            z.object({
                cites: z.array(z.string()).default([]),
                cited_by: z.array(z.string()).default([]),
            })
        )
        .default({}),
});

export interface SessionSummary {
    path: string;
    session_id: string;
    topic: string;
    updated_at: string;
    paper_count: number;
}

export interface AddRecordsOptions extends MatchOptions {
    precedence?: SourcePrecedence;
    now?: Date;
}

/**
 * Lowercase slug of a topic for file names ("COVID-19 & ICU" → "covid_19_icu").
 */
export function slugify(topic: string): string {
    return topic.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
}

/**
 * A new, empty session for `topic`.
 */
export function createSession(topic: string, now: Date = new Date()): Session {
    const timestamp = now.toISOString();
    const day = timestamp.slice(0, 10);

    return {
        session_id: randomUUID(),
        topic,
        created_at: timestamp,
        updated_at: timestamp,
        filename: `research_session_${slugify(topic) || 'untitled'}_${day}.json`,
        searches_performed: [],
        papers: {},
        citation_graph: {},
    };
}

/**
 * Key a record is stored under: DOI, else `pmid:<n>`, else `s2:<id>`,
 * else `title:<normalized title>`. Null when the record has none of these.
 */
export function sessionKey(record: BibRecord): string | null {
    if (record.doi) return record.doi;
    if (record.pmid) return `pmid:${record.pmid}`;
    if (record.source_id) return `s2:${record.source_id}`;
    const title = normalizeTitle(record.title);
    return title ? `title:${title}` : null;
}

/**
 * Add search results to a session and log the search.
 *
 * A record matching a stored paper is merged into it; when the merge
 * yields a better key (a DOI where there was only a PMID, say) the paper
 * is re-keyed, unless a different paper already holds that key. Returns a
 * new session; the input is left untouched.
 */
export function addRecordsToSession(
    session: Session,
    records: readonly BibRecord[],
    query: string,
    source: string,
    options: AddRecordsOptions = {}
): Session {
    const { precedence, now = new Date(), ...matchOptions } = options;
    const papers: Record<string, BibRecord> = { ...session.papers };

    for (const record of records) {
        const key = sessionKey(record);
        if (!key) {
            logger.debug({ title: record.title }, 'Record has no usable key, skipping');
            continue;
        }

        const matches = (k: string): boolean => {
            const stored = papers[k];
            return stored !== undefined && matchRecords(stored, record, matchOptions);
        };
        const existingKey = matches(key) ? key : Object.keys(papers).find(matches);

        const existing = existingKey !== undefined ? papers[existingKey] : undefined;
        if (existingKey === undefined || existing === undefined) {
            if (key in papers) {
                logger.warn({ key }, 'A different paper is already stored under this key, keeping the stored one');
                continue;
            }
            papers[key] = record;
            continue;
        }

        let merged = mergeRecords(existing, record, precedence);
        const mergedKey = sessionKey(merged) ?? existingKey;

        if (mergedKey !== existingKey) {
            const occupant = papers[mergedKey];
            if (occupant && !matchRecords(occupant, merged, matchOptions)) {
                logger.warn(
                    { key: mergedKey, kept: existingKey },
                    'A different paper is already stored under the merged key, not re-keying'
                );
                papers[existingKey] = merged;
                continue;
            }
            delete papers[existingKey];
            if (occupant) {
                merged = mergeRecords(occupant, merged, precedence);
            }
        }
        papers[mergedKey] = merged;
    }

    return {
        ...session,
        updated_at: now.toISOString(),
        searches_performed: [
            ...session.searches_performed,
            { source, query, timestamp: now.toISOString(), result_count: records.length },
        ],
        papers,
    };
}

/**
 * Record the citation links of `paperId` in one direction.
 * Linked papers are identified by their Semantic Scholar id, else DOI.
 * Returns a new session.
 */
export function addCitationsToSession(
    session: Session,
    paperId: string,
    direction: CitationDirection,
    records: readonly BibRecord[],
    now: Date = new Date()
): Session {
    const links = session.citation_graph[paperId] ?? { cites: [], cited_by: [] };
    const ids = records
        .map((record) => record.source_id ?? record.doi ?? '')
        .filter((id) => id.length > 0);

    const updated = direction === 'citedBy'
        ? { cites: [...links.cites], cited_by: ids }
        : { cites: ids, cited_by: [...links.cited_by] };

    return {
        ...session,
        updated_at: now.toISOString(),
        citation_graph: { ...session.citation_graph, [paperId]: updated },
    };
}

/**
 * Read and validate a session file.
 * @throws MalformedInputError when the file is missing, not JSON, or not a session
 */
export function loadSession(path: string): Session {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new MalformedInputError(path, 'cannot read session file', { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new MalformedInputError(path, 'session file is not valid JSON', { cause: error });
    }

    const parsed = SessionSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new MalformedInputError(path, `not a session file${where}: ${issue?.message ?? 'invalid'}`);
    }

    return parsed.data;
}

/**
 * Write a session to `dir` under its file name.
 * Written to a temporary file first and renamed into place.
 * @returns the path written
 */
export function saveSession(session: Session, dir = '.'): string {
    mkdirSync(dir, { recursive: true });
    const path = join(dir, session.filename);
    const tmpPath = `${path}.${process.pid}.tmp`;

    writeFileSync(tmpPath, JSON.stringify(session, null, 2), 'utf-8');
    renameSync(tmpPath, path);

    logger.debug({ path, papers: Object.keys(session.papers).length }, 'Session saved');
    return path;
}

/**
 * Session files in `dir`, sorted by file name. Unreadable files are
 * logged and left out.
 */
export function listSessions(dir = '.'): SessionSummary[] {
    if (!existsSync(dir)) return [];

    const summaries: SessionSummary[] = [];
    for (const name of readdirSync(dir).filter((f) => SESSION_FILE_PATTERN.test(f)).sort()) {
        const path = join(dir, name);
        try {
            const session = loadSession(path);
            summaries.push({
                path,
                session_id: session.session_id,
                topic: session.topic,
                updated_at: session.updated_at,
                paper_count: Object.keys(session.papers).length,
            });
        } catch (error) {
            logger.warn({ path, error: error instanceof Error ? error.message : String(error) }, 'Skipping unreadable session file');
        }
    }
    return summaries;
}
