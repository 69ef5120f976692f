import { existsSync } from 'node:fs';
import type { GenderLookup, GenderscopeConfig, KnowledgeBaseConfig } from '../types/index.js';
import { GenderCacheStore } from '../cache/gender-cache.js';
import { ConnotationLexicon, loadConnotationLexicon } from '../lexicon/connotation.js';
import { RuleBasedAnnotator, type Annotator } from '../nlp/annotator.js';
import { PrnTable } from '../prn/prn-table.js';
import { GenderResolver } from '../resolver/gender-resolver.js';
import { CachedGenderLookup } from '../sources/cached.js';
import { FixtureGenderLookup } from '../sources/fixture.js';
import { WikidataGenderLookup } from '../sources/wikidata.js';
import { ConfigError, PipelineError } from '../utils/errors.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const logger = getLogger();

/**
 * Static inputs and collaborators shared by one analysis run.
 */
export interface AnalysisContext {
    config: GenderscopeConfig;
    prnTable: PrnTable;
    lexicon: ConnotationLexicon;
    annotator: Annotator;
    lookup: CachedGenderLookup;
    resolver: GenderResolver;
}

/**
 * Replace any collaborator, e.g. a fixture lookup in tests.
 */
export type ContextOverrides = Partial<Pick<AnalysisContext, 'prnTable' | 'lexicon' | 'annotator'>> & {
    lookup?: GenderLookup;
};

/**
 * The configured knowledge-base lookup, always behind the in-memory cache
 * and, when enabled, the persistent one.
 */
export function createGenderLookup(kb: KnowledgeBaseConfig): CachedGenderLookup {
    return wrapLookup(createProviderLookup(kb), kb);
}

function createProviderLookup(kb: KnowledgeBaseConfig): GenderLookup {
    switch (kb.provider) {
        case 'wikidata': {
            const wikidata = new WikidataGenderLookup({ endpoint: kb.endpoint, timeoutMs: kb.timeoutMs });
            wikidata.setHttpClient(new HttpClient({ timeout: kb.timeoutMs, version: VERSION, contact: kb.contact }));
            return wikidata;
        }
        case 'fixture':
            if (!kb.fixturePath) {
                throw new ConfigError('knowledgeBase.fixturePath is required for the fixture provider', 'knowledgeBase.fixturePath');
            }
            return FixtureGenderLookup.fromFile(kb.fixturePath);
    }
}

function wrapLookup(inner: GenderLookup, kb: KnowledgeBaseConfig): CachedGenderLookup {
    if (inner instanceof CachedGenderLookup) return inner;
    const store = kb.cache ? new GenderCacheStore({ cacheDir: kb.cacheDir, ttlHours: kb.ttlHours }) : undefined;
    return new CachedGenderLookup(inner, store);
}

/**
 * Load the PRN table. A missing or empty table is fatal: without it no
 * noun can be labelled.
 */
export function loadPrnTable(config: GenderscopeConfig): PrnTable {
    const { listPath, adjustedPath } = config.prn;
    if (!existsSync(listPath)) {
        throw new PipelineError(`PRN list not found at ${listPath}; run "genderscope compile-prn" first`, 'prn-table');
    }

    const table = PrnTable.load(listPath, adjustedPath);
    if (table.size === 0) {
        throw new PipelineError(`PRN list at ${listPath} has no entries`, 'prn-table');
    }
    return table;
}

export function createAnalysisContext(config: GenderscopeConfig, overrides: ContextOverrides = {}): AnalysisContext {
    const prnTable = overrides.prnTable ?? loadPrnTable(config);

    let lexicon = overrides.lexicon;
    if (!lexicon) {
        if (config.lexiconPath && existsSync(config.lexiconPath)) {
            lexicon = loadConnotationLexicon(config.lexiconPath);
        } else {
            if (config.lexiconPath) logger.warn({ lexiconPath: config.lexiconPath }, 'Connotation lexicon not found');
            logger.warn('No connotation lexicon configured, every mention is counted as no-score');
            lexicon = ConnotationLexicon.empty();
        }
    }

    const annotator = overrides.annotator ?? RuleBasedAnnotator.fromFile(config.givenNamesPath);
    const lookup = overrides.lookup
        ? wrapLookup(overrides.lookup, config.knowledgeBase)
        : createGenderLookup(config.knowledgeBase);

    const resolver = new GenderResolver({
        prnTable,
        lookup,
        concurrency: config.knowledgeBase.concurrency,
    });

    return { config, prnTable, lexicon, annotator, lookup, resolver };
}
