import type { PrnConflictPolicy } from './prn.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Gender lookup implementations selectable by configuration.
 */
export type GenderLookupProvider = 'wikidata' | 'fixture';

/**
 * Knowledge-base lookup configuration.
 */
export interface KnowledgeBaseConfig {
    provider: GenderLookupProvider;
    endpoint: string;

    /** JSON file of `{ name: candidates[] }`, used by the fixture provider */
    fixturePath?: string;

    cache: boolean;
    cacheDir: string;
    ttlHours: number;

    /** Parallel lookups in flight */
    concurrency: number;

    /** Per-lookup timeout; expiry degrades the mention to undetermined */
    timeoutMs: number;

    /** Contact address sent in the User-Agent */
    contact: string;

    /** Also infer author genders from their names */
    resolveAuthors: boolean;
}

/**
 * PRN list configuration.
 */
export interface PrnConfig {
    /** Automatically compiled list */
    listPath: string;

    /** Manual overlay, merged on top of the compiled list */
    adjustedPath?: string;

    conflictPolicy: PrnConflictPolicy;
}

/**
 * Output configuration.
 */
export interface OutputConfig {
    /** Directory for CSV tables */
    dir: string;
    csv: boolean;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface GenderscopeConfig {
    /** SQLite database holding corpus and results */
    db: string;

    /** Connotation norm table; optional, every mention is "no-score" without it */
    lexiconPath?: string;

    /** Given-name gazetteer override */
    givenNamesPath?: string;

    prn: PrnConfig;
    knowledgeBase: KnowledgeBaseConfig;
    output: OutputConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: GenderscopeConfig = {
    db: './genderscope.db',
    prn: {
        listPath: './data/prn_list.csv',
        conflictPolicy: 'ambiguous',
    },
    knowledgeBase: {
        provider: 'wikidata',
        endpoint: 'https://query.wikidata.org/sparql',
        cache: true,
        cacheDir: '.genderscope-cache',
        ttlHours: 24 * 30,
        concurrency: 4,
        timeoutMs: 30000,
        contact: 'genderscope@example.com',
        resolveAuthors: true,
    },
    output: {
        dir: './stats',
        csv: true,
    },
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    genderscope_version: string;
    config_json: string;
    stats_json: string;
}
