import { Command } from 'commander';
import { z } from 'zod';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { ConfigError, PipelineError, describeError } from '../utils/errors.js';
import { compilePrnList } from '../prn/compiler.js';
import { writePrnList } from '../prn/prn-table.js';
import { loadCorpusDirectory } from '../corpus/loader.js';
import { GenderscopeDatabase } from '../storage/database.js';
import { createAnalysisContext } from '../pipeline/context.js';
import { runAnalysis } from '../pipeline/analyzer.js';
import { exportResults } from '../exporters/export.js';
import { GenderCacheStore } from '../cache/gender-cache.js';
import type { GenderscopeConfig } from '../types/index.js';
import { VERSION } from '../version.js';

const program = new Command();

program
    .name('genderscope')
    .description('Measure how people of different genders are depicted in a magazine corpus.')
    .version(VERSION);

// ─── Shared options ───────────────────────────────────────

const commonOptionsSchema = z.object({
    db: z.string().optional(),
    configDir: z.string().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
});

const positiveInt = z.coerce.number().int().positive();

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'SQLite database path')
        .option('--config-dir <dir>', 'Directory to search for genderscope.config.json')
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Resolve configuration from the command's flags and set up logging.
 * Unset flags are left out so file and env values still apply.
 */
async function setup(raw: unknown, overrides: ConfigOverrides = {}): Promise<GenderscopeConfig> {
    const opts = commonOptionsSchema.parse(raw);
    const config = await resolveConfig(
        {
            ...overrides,
            ...(opts.db !== undefined ? { db: opts.db } : {}),
            ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
            ...(opts.jsonLogs !== undefined ? { jsonLogs: opts.jsonLogs } : {}),
        },
        opts.configDir !== undefined ? { searchFrom: opts.configDir } : {}
    );
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Log a failed command and exit non-zero.
 */
function fail(task: string, error: unknown): never {
    const logger = getLogger();
    if (error instanceof PipelineError) {
        logger.error({ input: error.input }, error.message);
    } else if (error instanceof ConfigError) {
        logger.error({ key: error.key }, error.message);
    } else if (error instanceof z.ZodError) {
        logger.error({ issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) }, `Invalid options for ${task}`);
    } else {
        logger.error({ error: describeError(error) }, `${task} failed`);
    }
    process.exit(1);
}

// ─── COMPILE-PRN command ──────────────────────────────────

const compileOptionsSchema = z.object({
    dump: z.string(),
    out: z.string().optional(),
    policy: z.enum(['ambiguous', 'drop']).optional(),
});

withCommonOptions(
    program
        .command('compile-prn')
        .description('Compile the people-referencing-noun list from a Wiktionary dump')
        .requiredOption('--dump <path>', 'German Wiktionary pages-articles dump (.xml or .xml.gz)')
        .option('-o, --out <path>', 'Output CSV path (default: prn.listPath)')
        .option('--policy <policy>', 'Gender conflicts: ambiguous | drop')
).action(async (raw: unknown) => {
    try {
        const opts = compileOptionsSchema.parse(raw);
        const config = await setup(raw, opts.policy !== undefined ? { prn: { conflictPolicy: opts.policy } } : {});
        const out = opts.out ?? config.prn.listPath;

        const result = await compilePrnList(opts.dump, { conflictPolicy: config.prn.conflictPolicy });
        writePrnList(out, result.entries);
    } catch (error) {
        fail('Compile', error);
    }
});

// ─── INGEST command ───────────────────────────────────────

const ingestOptionsSchema = z.object({ corpus: z.string() });

withCommonOptions(
    program
        .command('ingest')
        .description('Load a scraped corpus directory into the database')
        .requiredOption('--corpus <dir>', 'Directory with volumes.json, authors.json and articles/')
).action(async (raw: unknown) => {
    try {
        const opts = ingestOptionsSchema.parse(raw);
        const config = await setup(raw);
        const corpus = loadCorpusDirectory(opts.corpus);
        if (corpus.articles.length === 0) {
            throw new PipelineError(`No articles found in ${opts.corpus}`, 'corpus');
        }

        const db = new GenderscopeDatabase(config.db);
        try {
            const inserted = db.insertCorpus(corpus);
            getLogger().info({ db: config.db, ...inserted }, 'Corpus ingested');
        } finally {
            db.close();
        }
    } catch (error) {
        fail('Ingest', error);
    }
});

// ─── ANALYZE command ──────────────────────────────────────

const analyzeOptionsSchema = z.object({
    prn: z.string().optional(),
    adjusted: z.string().optional(),
    lexicon: z.string().optional(),
    givenNames: z.string().optional(),
    provider: z.enum(['wikidata', 'fixture']).optional(),
    fixture: z.string().optional(),
    concurrency: positiveInt.optional(),
    timeout: positiveInt.optional(),
    cache: z.boolean(),
    authors: z.boolean(),
});

withCommonOptions(
    program
        .command('analyze')
        .description('Extract mentions, resolve genders and aggregate statistics')
        .option('--prn <path>', 'Compiled PRN list')
        .option('--adjusted <path>', 'Manually adjusted PRN list, laid over the compiled one')
        .option('--lexicon <path>', 'Connotation norm table (;-separated)')
        .option('--given-names <path>', 'Given-name gazetteer (JSON)')
        .option('--provider <provider>', 'Gender lookup: wikidata | fixture')
        .option('--fixture <path>', 'Fixture lookup file for --provider fixture')
        .option('--concurrency <n>', 'Parallel knowledge-base lookups')
        .option('--timeout <ms>', 'Per-lookup timeout in milliseconds')
        .option('--no-cache', 'Disable the persistent lookup cache')
        .option('--no-authors', 'Skip author gender inference')
).action(async (raw: unknown) => {
    try {
        const opts = analyzeOptionsSchema.parse(raw);
        const config = await setup(raw, {
            ...(opts.lexicon !== undefined ? { lexiconPath: opts.lexicon } : {}),
            ...(opts.givenNames !== undefined ? { givenNamesPath: opts.givenNames } : {}),
            prn: {
                ...(opts.prn !== undefined ? { listPath: opts.prn } : {}),
                ...(opts.adjusted !== undefined ? { adjustedPath: opts.adjusted } : {}),
            },
            knowledgeBase: {
                ...(opts.provider !== undefined ? { provider: opts.provider } : {}),
                ...(opts.fixture !== undefined ? { fixturePath: opts.fixture } : {}),
                ...(opts.concurrency !== undefined ? { concurrency: opts.concurrency } : {}),
                ...(opts.timeout !== undefined ? { timeoutMs: opts.timeout } : {}),
                ...(opts.cache ? {} : { cache: false }),
                ...(opts.authors ? {} : { resolveAuthors: false }),
            },
        });

        const logger = getLogger();
        logger.info({ db: config.db, provider: config.knowledgeBase.provider }, 'Starting analysis');

        const context = createAnalysisContext(config);
        const db = new GenderscopeDatabase(config.db);
        try {
            const { summary } = await runAnalysis(db, context);
            logger.info(
                { mentions: summary.mentions, ...summary.byGender, genderWriting: summary.genderWriting },
                'Analysis complete!'
            );
        } finally {
            db.close();
        }

        if (config.output.csv) {
            exportResults(config.db, config.output.dir, 'csv');
        }
    } catch (error) {
        fail('Analysis', error);
    }
});

// ─── EXPORT command ───────────────────────────────────────

const exportOptionsSchema = z.object({
    out: z.string().optional(),
    format: z.enum(['csv', 'json']).default('csv'),
});

withCommonOptions(
    program
        .command('export')
        .description('Write the stored results as CSV tables or JSON')
        .option('-o, --out <dir>', 'Output directory (default: output.dir)')
        .option('-f, --format <format>', 'Export format: csv | json', 'csv')
).action(async (raw: unknown) => {
    try {
        const opts = exportOptionsSchema.parse(raw);
        const config = await setup(raw);
        const files = exportResults(config.db, opts.out ?? config.output.dir, opts.format);
        for (const file of files) console.log(`Exported ${file}`);
    } catch (error) {
        fail('Export', error);
    }
});

// ─── INSPECT command ──────────────────────────────────────

const inspectOptionsSchema = z.object({ article: z.string().optional() });

function printArticle(db: GenderscopeDatabase, idOrPrefix: string): void {
    const match = db.matchId('articles', idOrPrefix);
    if (match.status === 'none') {
        console.error(`No article matches "${idOrPrefix}".`);
        process.exit(1);
    }
    if (match.status === 'ambiguous') {
        console.error(`"${idOrPrefix}" matches several articles: ${match.candidates.join(', ')}`);
        process.exit(1);
    }

    const article = db.getArticleById(match.id);
    if (!article) return;

    console.log(`\n  ${article.title}`);
    console.log(`  id: ${article.id}   volume: ${article.volume_id}   authors: ${article.author_ids.join(', ') || '-'}\n`);

    for (const mention of db.getMentions(article.id)) {
        const detail = mention.resolution?.detail ? ` (${mention.resolution.detail})` : '';
        console.log(
            `    ${mention.kind}  ${mention.text.padEnd(30)} ${(mention.gender ?? 'unresolved').padEnd(13)} ${mention.resolution?.source ?? ''}${detail}`
        );
    }

    const [record] = db.getAggregates('article').filter((aggregate) => aggregate.key === article.id);
    if (record) {
        const share = record.femaleShare === null ? '-' : `${(record.femaleShare * 100).toFixed(1)}%`;
        console.log(`\n  Mentions: ${record.total}   female share: ${share}   tokens: ${record.tokens ?? '-'}`);
    }
    console.log('');
}

withCommonOptions(
    program
        .command('inspect')
        .description('Show database statistics, or the mentions of one article')
        .option('-a, --article <idOrPrefix>', 'Article id or unique id prefix')
).action(async (raw: unknown) => {
    try {
        const opts = inspectOptionsSchema.parse(raw);
        const config = await setup(raw);
        const db = new GenderscopeDatabase(config.db);

        try {
            if (opts.article !== undefined) {
                printArticle(db, opts.article);
                return;
            }

            const stats = db.getStats();
            console.log('\n📊 Genderscope Database Statistics\n');
            console.log(`  Volumes:    ${stats.volumes}`);
            console.log(`  Authors:    ${stats.authors}`);
            console.log(`  Articles:   ${stats.articles}`);
            console.log(`  Mentions:   ${stats.mentions}`);
            console.log(`  Aggregates: ${stats.aggregates}`);
            console.log(`  Runs:       ${stats.runs}`);

            if (Object.keys(stats.mentionsByGender).length > 0) {
                console.log('\n  Mentions by gender:');
                for (const [gender, count] of Object.entries(stats.mentionsByGender)) {
                    console.log(`    ${gender}: ${count}`);
                }
            }

            console.log('');
        } finally {
            db.close();
        }
    } catch (error) {
        fail('Inspect', error);
    }
});

// ─── CACHE command ────────────────────────────────────────

withCommonOptions(
    program
        .command('cache')
        .description('Manage the knowledge-base lookup cache')
        .argument('<action>', 'Action: clear | stats')
).action(async (action: string, raw: unknown) => {
    try {
        const config = await setup(raw);
        const store = new GenderCacheStore({
            cacheDir: config.knowledgeBase.cacheDir,
            ttlHours: config.knowledgeBase.ttlHours,
        });

        switch (action) {
            case 'clear': {
                const removed = store.clear();
                console.log(removed > 0 ? `Cache cleared (${removed} entries).` : 'No cache to clear.');
                break;
            }
            case 'stats': {
                const stats = store.getStats();
                console.log(`Cache: ${stats.entries} entries in ${stats.directory}`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    } catch (error) {
        fail('Cache', error);
    }
});

await program.parseAsync();
