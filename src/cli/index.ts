#!/usr/bin/env node

import { writeFileSync } from 'node:fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { resolveConfig, getApiKey, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { ReconcileError } from '../utils/errors.js';
import { ResponseCache } from '../cache/response-cache.js';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { PubMedAdapter } from '../sources/pubmed.js';
import { CrossrefAdapter } from '../sources/crossref.js';
import { searchAll } from '../search/search-service.js';
import { deduplicate } from '../core/deduplicator.js';
import { Verifier } from '../core/verifier.js';
import { verifyReferences, summarizeResults } from '../core/verify-references.js';
import { normalizeDoi, normalizePmid } from '../core/normalize.js';
import { loadReferencesFile } from '../references/reference-parser.js';
import {
    addCitationsToSession,
    addRecordsToSession,
    createSession,
    listSessions,
    loadSession,
    saveSession,
} from '../session/session-store.js';
import type {
    BibRecord,
    CitationDirection,
    ClinicalFilter,
    LogLevel,
    ReconcileConfig,
    SourceAdapter,
    SourceTag,
} from '../types/index.js';

const VERSION = '1.0.0';

const CLINICAL_FILTERS: ClinicalFilter[] = ['therapy', 'diagnosis', 'prognosis', 'etiology', 'systematic_review'];

interface CommonOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    cache: boolean;
}

interface SaveOptions {
    session?: string;
    save: boolean;
}

interface SearchCommandOptions extends CommonOptions, SaveOptions {
    limit?: number;
    year?: string;
    filter?: ClinicalFilter;
    crossref?: boolean;
    fieldsOfStudy?: string;
}

interface AuthorCommandOptions extends CommonOptions, SaveOptions {
    limit: number;
}

interface RecommendCommandOptions extends CommonOptions, SaveOptions {
    limit: number;
}

interface VerifyCommandOptions extends CommonOptions {
    output?: string;
    retractionCheck: boolean;
}

interface CitationsCommandOptions extends CommonOptions {
    direction: CitationDirection;
    limit: number;
    session?: string;
}

interface SessionCommandOptions extends CommonOptions {
    dir?: string;
}

interface Sources {
    s2: SemanticScholarAdapter;
    pubmed: PubMedAdapter;
    crossref: CrossrefAdapter;
}

const program = new Command();

program
    .name('paper-reconcile')
    .description('Find, reconcile and verify bibliographic records across Semantic Scholar, PubMed and Crossref.')
    .version(VERSION);

// ─── SEARCH command ───────────────────────────────────────

withCommonOptions(
    program
        .command('search')
        .description('Search Semantic Scholar and PubMed, merge duplicates and save a session')
        .argument('<query...>', 'Search query')
        .option('-l, --limit <n>', 'Results per source', parsePositiveInt)
        .option('-y, --year <range>', 'Publication year or range, e.g. 2018-2022', parseYearOption)
        .addOption(new Option('-f, --filter <type>', 'PubMed Clinical Queries filter').choices(CLINICAL_FILTERS))
        .option('--crossref', 'Also search Crossref')
        .option('--fields-of-study <fields>', 'Semantic Scholar field-of-study filter ("" for none)')
        .option('-s, --session <file>', 'Add results to an existing session file')
        .option('--no-save', 'Do not write a session file')
).action(async (words: string[], opts: SearchCommandOptions) => {
    const query = words.join(' ').trim();
    const search = { limit: opts.limit, includeCrossref: opts.crossref, fieldsOfStudy: opts.fieldsOfStudy };

    await run(opts, { search }, async (config) => {
        const sources = createSources(config);
        const adapters: SourceAdapter[] = [sources.s2, sources.pubmed];
        if (config.search.includeCrossref) adapters.push(sources.crossref);

        const { records, perSource } = await searchAll(query, adapters, {
            limit: config.search.limit,
            yearRange: opts.year,
            clinicalFilter: opts.filter,
            fieldsOfStudy: config.search.fieldsOfStudy || undefined,
            precedence: config.precedence,
            titleSimilarityThreshold: config.matching.titleSimilarityThreshold,
        });

        const sessionFile = saveRecords(opts, config, query, query, adapters.map((a) => a.tag).join('+'), records);

        printJson({ query, per_source: perSource, total: records.length, records, session_file: sessionFile });
    });
});

// ─── AUTHOR command ───────────────────────────────────────

withCommonOptions(
    program
        .command('author')
        .description('Papers by an author (Semantic Scholar, falling back to PubMed)')
        .argument('<name...>', 'Author name')
        .option('-l, --limit <n>', 'Maximum papers', parsePositiveInt, 50)
        .option('-s, --session <file>', 'Add the papers to an existing session file')
        .option('--no-save', 'Do not write a session file')
).action(async (words: string[], opts: AuthorCommandOptions) => {
    const name = words.join(' ').trim();

    await run(opts, {}, async (config) => {
        const sources = createSources(config);
        const dedupOptions = {
            precedence: config.precedence,
            titleSimilarityThreshold: config.matching.titleSimilarityThreshold,
        };

        const authors = await sources.s2.searchAuthors(name);
        const [top] = authors;

        let source: SourceTag;
        let papers: BibRecord[];
        if (top) {
            getLogger().info({ author: top.name, authorId: top.author_id }, 'Fetching papers for top author match');
            source = sources.s2.tag;
            papers = await sources.s2.fetchAuthorPapers(top.author_id, opts.limit);
        } else {
            getLogger().info({ name }, 'No Semantic Scholar author match, searching PubMed');
            source = sources.pubmed.tag;
            papers = await sources.pubmed.searchByAuthor(name, { limit: opts.limit });
        }

        const records = deduplicate(papers, dedupOptions);
        const sessionFile = saveRecords(opts, config, name, `author:${name}`, source, records);

        printJson({ author: name, authors, source, total: records.length, records, session_file: sessionFile });
    });
});

// ─── RECOMMEND command ────────────────────────────────────

withCommonOptions(
    program
        .command('recommend')
        .description('Papers recommended from one or more seed papers (Semantic Scholar)')
        .argument('<paperIds...>', 'Semantic Scholar ids, or DOI:<doi> / PMID:<pmid>')
        .option('-l, --limit <n>', 'Maximum papers', parsePositiveInt, 20)
        .option('-s, --session <file>', 'Add the papers to an existing session file')
        .option('--no-save', 'Do not write a session file')
).action(async (paperIds: string[], opts: RecommendCommandOptions) => {
    await run(opts, {}, async (config) => {
        const { s2 } = createSources(config);
        const papers = await s2.recommend(paperIds, opts.limit);
        const records = deduplicate(papers, {
            precedence: config.precedence,
            titleSimilarityThreshold: config.matching.titleSimilarityThreshold,
        });

        const topic = `recommendations ${paperIds.join(' ')}`;
        const sessionFile = saveRecords(opts, config, topic, `recommend:${paperIds.join(',')}`, s2.tag, records);

        printJson({ seeds: paperIds, total: records.length, records, session_file: sessionFile });
    });
});

// ─── VERIFY command ───────────────────────────────────────

withCommonOptions(
    program
        .command('verify')
        .description('Verify a reference list (JSON or text) against Crossref, Semantic Scholar and PubMed')
        .argument('<file>', 'Reference file (.json or text)')
        .option('-o, --output <file>', 'Write the JSON report to a file instead of stdout')
        .option('--no-retraction-check', 'Skip the PubMed retraction check')
).action(async (file: string, opts: VerifyCommandOptions) => {
    const overrides: ConfigOverrides = opts.retractionCheck ? {} : { verification: { checkRetractions: false } };

    await run(opts, overrides, async (config, http) => {
        const references = loadReferencesFile(file);
        const logger = getLogger();
        if (references.length === 0) {
            logger.warn({ file }, 'No references found in file');
        }

        const sources = createSources(config);
        const verifier = new Verifier(
            { registry: sources.crossref, graph: sources.s2, biomed: sources.pubmed },
            {
                ...config.verification,
                precedence: config.precedence,
                titleSimilarityThreshold: config.matching.titleSimilarityThreshold,
            }
        );

        const results = await verifyReferences(references, verifier, http, (done, total, result) => {
            logger.info({ done, total, label: result.reference.label, status: result.status }, 'Verified reference');
        });

        const report = { summary: summarizeResults(results), verification_results: results };
        if (opts.output) {
            writeFileSync(opts.output, JSON.stringify(report, null, 2), 'utf-8');
            logger.info({ output: opts.output }, 'Verification report written');
        } else {
            printJson(report);
        }
    });
});

// ─── CITATIONS command ────────────────────────────────────

withCommonOptions(
    program
        .command('citations')
        .description('Citing papers or references of a paper (Semantic Scholar)')
        .argument('<paperId>', 'Semantic Scholar id, or DOI:<doi> / PMID:<pmid>')
        .addOption(
            new Option('-d, --direction <direction>', 'citedBy or references')
                .choices(['citedBy', 'references'])
                .default('citedBy')
        )
        .option('-l, --limit <n>', 'Maximum papers', parsePositiveInt, 50)
        .option('-s, --session <file>', 'Record the citation links in a session file')
).action(async (paperId: string, opts: CitationsCommandOptions) => {
    await run(opts, {}, async (config) => {
        const { s2 } = createSources(config);
        const records = opts.direction === 'citedBy'
            ? await s2.fetchCitations(paperId, opts.limit)
            : await s2.fetchReferences(paperId, opts.limit);

        let sessionFile: string | null = null;
        if (opts.session) {
            let session = loadSession(opts.session);
            session = addCitationsToSession(session, paperId, opts.direction, records);
            session = addRecordsToSession(session, records, `${opts.direction}:${paperId}`, s2.tag, {
                precedence: config.precedence,
                titleSimilarityThreshold: config.matching.titleSimilarityThreshold,
            });
            sessionFile = saveSession(session, config.sessionDir);
        }

        printJson({ paper_id: paperId, direction: opts.direction, total: records.length, records, session_file: sessionFile });
    });
});

// ─── DETAIL command ───────────────────────────────────────

withCommonOptions(
    program
        .command('detail')
        .description('Full record for one paper (Semantic Scholar, then Crossref or PubMed)')
        .argument('<id>', 'Semantic Scholar id, DOI or PMID')
).action(async (id: string, opts: CommonOptions) => {
    await run(opts, {}, async (config) => {
        const record = await fetchDetail(id, createSources(config));
        if (!record) {
            throw new ReconcileError(`Paper not found in any source: ${id}`, 'NOT_FOUND');
        }
        printJson(record);
    });
});

// ─── SESSION command ──────────────────────────────────────

withCommonOptions(
    program
        .command('session')
        .description('List session files, or show one')
        .argument('[file]', 'Session file to show')
        .option('--dir <dir>', 'Directory to list sessions from')
).action(async (file: string | undefined, opts: SessionCommandOptions) => {
    await run(opts, { sessionDir: opts.dir }, async (config) => {
        if (file) {
            printJson(loadSession(file));
            return;
        }
        printJson(listSessions(config.sessionDir));
    });
});

// ─── CACHE command ────────────────────────────────────────

withCommonOptions(
    program
        .command('cache')
        .description('Manage the response cache')
        .addArgument(program.createArgument('<action>', 'clear or stats').choices(['clear', 'stats']))
).action(async (action: 'clear' | 'stats', opts: CommonOptions) => {
    await run(opts, {}, async (config) => {
        const cache = new ResponseCache({ cacheDir: config.cache.dir, ttlHours: config.cache.ttlHours, enabled: true });
        if (action === 'clear') {
            const { entries } = cache.getStats();
            cache.clear();
            printJson({ cleared: entries, directory: config.cache.dir });
            return;
        }
        printJson(cache.getStats());
    });
});

await program.parseAsync(process.argv);

// ─── Helpers ──────────────────────────────────────────────

function withCommonOptions(command: Command): Command {
    return command
        .addOption(new Option('--log-level <level>', 'Log level').choices(['error', 'warn', 'info', 'debug']))
        .option('--json-logs', 'Output JSON logs')
        .option('--no-cache', 'Disable response caching');
}

/**
 * Resolve config, set up logging and the shared HTTP client, then run the
 * command body. Errors are logged and turn into exit code 1.
 */
async function run(
    opts: CommonOptions,
    overrides: ConfigOverrides,
    body: (config: ReconcileConfig, http: HttpClient) => Promise<void>
): Promise<void> {
    const config = await resolveConfig({
        ...overrides,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        cache: { ...overrides.cache, enabled: opts.cache ? undefined : false },
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const cache = config.cache.enabled
        ? new ResponseCache({ cacheDir: config.cache.dir, ttlHours: config.cache.ttlHours })
        : undefined;
    const http = getHttpClient({ timeout: config.timeoutMs, version: VERSION, email: config.email, cache });

    try {
        await body(config, http);
    } catch (error) {
        const logger = getLogger();
        if (error instanceof ReconcileError) {
            logger.error({ code: error.code }, error.message);
        } else {
            logger.error({ error }, 'Command failed');
        }
        process.exitCode = 1;
    }
    getLogger().debug({ requests: http.getAllRequestCounts() }, 'Requests per source');
}

/**
 * Add records to the session named by `--session`, or a new one on
 * `topic`, and save it. Null under `--no-save`.
 */
function saveRecords(
    opts: SaveOptions,
    config: ReconcileConfig,
    topic: string,
    query: string,
    source: string,
    records: readonly BibRecord[]
): string | null {
    if (!opts.save) return null;

    const session = opts.session ? loadSession(opts.session) : createSession(topic);
    const updated = addRecordsToSession(session, records, query, source, {
        precedence: config.precedence,
        titleSimilarityThreshold: config.matching.titleSimilarityThreshold,
    });
    const sessionFile = saveSession(updated, config.sessionDir);
    getLogger().info({ sessionFile }, 'Session saved');
    return sessionFile;
}

function createSources(config: ReconcileConfig): Sources {
    return {
        s2: new SemanticScholarAdapter({ apiKey: getApiKey('SEMANTIC_SCHOLAR_API_KEY') }),
        pubmed: new PubMedAdapter({ apiKey: getApiKey('NCBI_API_KEY'), email: config.email }),
        crossref: new CrossrefAdapter({ email: config.email }),
    };
}

/**
 * Semantic Scholar first; a DOI falls back to Crossref, a PMID to PubMed.
 */
async function fetchDetail(id: string, sources: Sources): Promise<BibRecord | null> {
    const doi = normalizeDoi(id);
    const pmid = /^\s*(?:PMID:\s*)?\d+\s*$/i.test(id) ? normalizePmid(id) : null;

    const s2Id = doi ? `DOI:${doi}` : pmid ? `PMID:${pmid}` : id;
    const fromGraph = await sources.s2.fetchPaper(s2Id);
    if (fromGraph) return fromGraph;

    if (doi) {
        return sources.crossref.lookupByDoi(doi);
    }
    if (pmid) {
        return sources.pubmed.lookupByPmid(pmid);
    }
    return null;
}

function printJson(value: unknown): void {
    process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function parseYearOption(value: string): string {
    if (!/^\d{4}(?:-\d{4})?$/.test(value.trim())) {
        throw new InvalidArgumentError('Expected YYYY or YYYY-YYYY.');
    }
    return value.trim();
}
