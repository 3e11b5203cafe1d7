import type { SourceTag } from './record.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Ordering used to break ties when two sources disagree on a field.
 * Earlier entries win.
 */
export type SourcePrecedence = readonly SourceTag[];

/**
 * Matcher configuration.
 */
export interface MatchingConfig {
    /** Minimum normalized Levenshtein title similarity for a fuzzy match */
    titleSimilarityThreshold: number;
}

/**
 * Verifier configuration. Thresholds are Jaccard token similarities.
 */
export interface VerificationConfig {
    titleThreshold: number;
    journalThreshold: number;
    /** Minimum similarity for accepting a search candidate */
    fallbackThreshold: number;
    checkRetractions: boolean;
}

/**
 * Search configuration.
 */
export interface SearchConfig {
    limit: number;
    /** Also query Crossref when searching */
    includeCrossref: boolean;
    /** Semantic Scholar field-of-study filter, comma-separated; empty for none */
    fieldsOfStudy: string;
}

/**
 * Response cache configuration.
 */
export interface CacheConfig {
    enabled: boolean;
    dir: string;
    ttlHours: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ReconcileConfig {
    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    /** Contact email for Crossref and NCBI polite pools */
    email: string;

    /** Directory session files are written to and listed from */
    sessionDir: string;

    /** HTTP request timeout in milliseconds */
    timeoutMs: number;

    precedence: SourcePrecedence;
    matching: MatchingConfig;
    verification: VerificationConfig;
    search: SearchConfig;
    cache: CacheConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ReconcileConfig = {
    logLevel: 'info',
    jsonLogs: false,
    email: 'research@example.com',
    sessionDir: '.',
    timeoutMs: 30000,
    precedence: ['crossref', 'pubmed', 'semantic_scholar'],
    matching: {
        titleSimilarityThreshold: 0.9,
    },
    verification: {
        titleThreshold: 0.7,
        journalThreshold: 0.5,
        fallbackThreshold: 0.5,
        checkRetractions: true,
    },
    search: {
        limit: 20,
        includeCrossref: false,
        fieldsOfStudy: 'Medicine',
    },
    cache: {
        enabled: true,
        dir: '.paperrecon-cache',
        ttlHours: 24,
    },
};
