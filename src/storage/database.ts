import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
    AggregateRecord,
    Article,
    Author,
    Corpus,
    GenderWritingMatch,
    GroupBy,
    Mention,
    RunRecord,
    Volume,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 * Corpus tables are written by `ingest` only; mentions and aggregates are
 * rebuilt by every analysis run.
 */
const MIGRATION_V1 = `
-- Runs: analysis session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  genderscope_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Volumes: magazine issues
CREATE TABLE IF NOT EXISTS volumes (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  published_date TEXT
);

-- Authors
CREATE TABLE IF NOT EXISTS authors (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  info TEXT
);

-- Articles: flattened text, immutable once ingested
CREATE TABLE IF NOT EXISTS articles (
  id TEXT PRIMARY KEY,
  volume_id TEXT NOT NULL,
  title TEXT NOT NULL,
  text TEXT NOT NULL
);

-- Article-Author junction
CREATE TABLE IF NOT EXISTS article_authors (
  article_id TEXT NOT NULL REFERENCES articles(id),
  author_id TEXT NOT NULL,
  position INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (article_id, author_id)
);

-- Mentions: person references with their resolved gender
CREATE TABLE IF NOT EXISTS mentions (
  mention_id TEXT PRIMARY KEY,
  article_id TEXT NOT NULL REFERENCES articles(id),
  kind TEXT NOT NULL,
  text TEXT NOT NULL,
  lemma TEXT NOT NULL,
  start_offset INTEGER NOT NULL,
  end_offset INTEGER NOT NULL,
  sentence INTEGER NOT NULL,
  canonical_name TEXT,
  gender TEXT,
  resolution_source TEXT,
  confidence REAL,
  detail TEXT
);

-- Aggregates: derived statistics per article, volume and author
CREATE TABLE IF NOT EXISTS aggregates (
  group_by TEXT NOT NULL,
  group_key TEXT NOT NULL,
  label TEXT NOT NULL,
  total INTEGER NOT NULL,
  female INTEGER NOT NULL,
  male INTEGER NOT NULL,
  undetermined INTEGER NOT NULL,
  ambiguous INTEGER NOT NULL,
  female_share REAL,
  record_json TEXT NOT NULL,
  PRIMARY KEY (group_by, group_key)
);

CREATE INDEX IF NOT EXISTS idx_articles_volume ON articles(volume_id);
CREATE INDEX IF NOT EXISTS idx_mentions_article ON mentions(article_id);
CREATE INDEX IF NOT EXISTS idx_mentions_gender ON mentions(gender);
`;

/**
 * SQLite schema migration v2: gender-writing terms found per article,
 * rebuilt by every analysis run.
 */
const MIGRATION_V2 = `
CREATE TABLE IF NOT EXISTS gender_writing (
  article_id TEXT NOT NULL REFERENCES articles(id),
  kind TEXT NOT NULL,
  term TEXT NOT NULL,
  count INTEGER NOT NULL,
  PRIMARY KEY (article_id, kind, term)
);
`;

const countRowSchema = z.object({ count: z.number() });
const idRowSchema = z.object({ id: z.string() });

const volumeRowSchema = z.object({
    id: z.string(),
    title: z.string(),
    published_date: z.string().nullable(),
});

const authorRowSchema = z.object({
    id: z.string(),
    name: z.string(),
    info: z.string().nullable(),
});

const articleRowSchema = z.object({
    id: z.string(),
    volume_id: z.string(),
    title: z.string(),
    text: z.string(),
});

const articleAuthorRowSchema = z.object({
    article_id: z.string(),
    author_id: z.string(),
});

const genderSchema = z.enum(['female', 'male', 'undetermined', 'ambiguous']);

const mentionRowSchema = z.object({
    mention_id: z.string(),
    article_id: z.string(),
    kind: z.enum(['PER', 'PRN']),
    text: z.string(),
    lemma: z.string(),
    start_offset: z.number(),
    end_offset: z.number(),
    sentence: z.number(),
    canonical_name: z.string().nullable(),
    gender: genderSchema.nullable(),
    resolution_source: z.enum(['prn-table', 'inclusive-form', 'knowledge-base', 'unresolved']).nullable(),
    confidence: z.number().nullable(),
    detail: z.string().nullable(),
});

const genderWritingKindSchema = z.enum(['binary', 'inclusive', 'neopronoun', 'genderConception']);

const genderWritingRowSchema = z.object({
    article_id: z.string(),
    kind: genderWritingKindSchema,
    term: z.string(),
    count: z.number(),
});

const nullableNumber = z.number().nullable();
const genderCountsSchema = z.object({
    female: z.number(),
    male: z.number(),
    undetermined: z.number(),
    ambiguous: z.number(),
});
const connotationSummarySchema = z.object({
    means: z.object({
        valence: nullableNumber,
        arousal: nullableNumber,
        imageability: nullableNumber,
        concreteness: nullableNumber,
    }),
    scored: z.number(),
    noScore: z.number(),
});

export const aggregateRecordSchema = z.object({
    groupBy: z.enum(['article', 'volume', 'author']),
    key: z.string(),
    label: z.string(),
    total: z.number(),
    counts: genderCountsSchema,
    perCounts: genderCountsSchema,
    prnCounts: genderCountsSchema,
    proportions: z.object({
        female: nullableNumber,
        male: nullableNumber,
        undetermined: nullableNumber,
        ambiguous: nullableNumber,
    }),
    femaleShare: nullableNumber,
    connotation: z.object({ female: connotationSummarySchema, male: connotationSummarySchema }),
    tokens: nullableNumber,
    slashForms: nullableNumber,
    genderWriting: z
        .object({ binary: z.number(), inclusive: z.number(), neopronoun: z.number(), genderConception: z.number() })
        .nullable(),
    inferredGender: genderSchema.nullable(),
});

const recordJsonRowSchema = z.object({ record_json: z.string() });

type IdTable = 'articles' | 'authors' | 'volumes';

/**
 * Result of an id-or-prefix lookup.
 */
export type IdMatch =
    | { status: 'found'; id: string }
    | { status: 'none' }
    | { status: 'ambiguous'; candidates: string[] };

/**
 * Genderscope database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and CRUD operations.
 */
export class GenderscopeDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.info('Database migrated to v1');
        }

        if (currentVersion < 2) {
            this.db.exec(MIGRATION_V2);
            this.db.pragma('user_version = 2');
            logger.info('Database migrated to v2');
        }
    }

    private count(sql: string): number {
        return countRowSchema.parse(this.db.prepare(sql).get()).count;
    }

    // ─── Corpus ───────────────────────────────────────────────

    /**
     * Insert a corpus snapshot in a single transaction. Records whose id is
     * already stored are left untouched. Returns the number of new rows.
     */
    insertCorpus(corpus: Corpus): { volumes: number; authors: number; articles: number } {
        const volumeStmt = this.db.prepare(`
      INSERT OR IGNORE INTO volumes (id, title, published_date)
      VALUES (@id, @title, @published_date)
    `);
        const authorStmt = this.db.prepare(`
      INSERT OR IGNORE INTO authors (id, name, info)
      VALUES (@id, @name, @info)
    `);
        const articleStmt = this.db.prepare(`
      INSERT OR IGNORE INTO articles (id, volume_id, title, text)
      VALUES (@id, @volume_id, @title, @text)
    `);
        const linkStmt = this.db.prepare(`
      INSERT OR IGNORE INTO article_authors (article_id, author_id, position)
      VALUES (?, ?, ?)
    `);

        const inserted = { volumes: 0, authors: 0, articles: 0 };

        const insertAll = this.db.transaction((snapshot: Corpus) => {
            for (const volume of snapshot.volumes) {
                inserted.volumes += volumeStmt.run(volume).changes;
            }
            for (const author of snapshot.authors) {
                inserted.authors += authorStmt.run(author).changes;
            }
            for (const article of snapshot.articles) {
                const result = articleStmt.run({
                    id: article.id,
                    volume_id: article.volume_id,
                    title: article.title,
                    text: article.text,
                });
                if (result.changes === 0) continue;
                inserted.articles++;
                article.author_ids.forEach((authorId, position) => {
                    linkStmt.run(article.id, authorId, position);
                });
            }
        });

        insertAll(corpus);
        return inserted;
    }

    getVolumes(): Volume[] {
        return this.db
            .prepare('SELECT id, title, published_date FROM volumes ORDER BY rowid')
            .all()
            .map((row) => volumeRowSchema.parse(row));
    }

    getAuthors(): Author[] {
        return this.db
            .prepare('SELECT id, name, info FROM authors ORDER BY rowid')
            .all()
            .map((row) => authorRowSchema.parse(row));
    }

    getArticles(): Article[] {
        const links = new Map<string, string[]>();
        const linkRows = this.db
            .prepare('SELECT article_id, author_id FROM article_authors ORDER BY article_id, position')
            .all();
        for (const row of linkRows) {
            const { article_id, author_id } = articleAuthorRowSchema.parse(row);
            const ids = links.get(article_id) ?? [];
            ids.push(author_id);
            links.set(article_id, ids);
        }

        return this.db
            .prepare('SELECT id, volume_id, title, text FROM articles ORDER BY rowid')
            .all()
            .map((row) => {
                const article = articleRowSchema.parse(row);
                return { ...article, author_ids: links.get(article.id) ?? [] };
            });
    }

    getArticleById(id: string): Article | undefined {
        const row = this.db.prepare('SELECT id, volume_id, title, text FROM articles WHERE id = ?').get(id);
        if (row === undefined) return undefined;

        const article = articleRowSchema.parse(row);
        const authorIds = this.db
            .prepare('SELECT author_id FROM article_authors WHERE article_id = ? ORDER BY position')
            .all(id)
            .map((link) => z.object({ author_id: z.string() }).parse(link).author_id);
        return { ...article, author_ids: authorIds };
    }

    getCorpus(): Corpus {
        return {
            volumes: this.getVolumes(),
            authors: this.getAuthors(),
            articles: this.getArticles(),
        };
    }

    getArticleCount(): number {
        return this.count('SELECT COUNT(*) as count FROM articles');
    }

    /**
     * Resolve an exact id or a unique id prefix.
     */
    matchId(table: IdTable, idOrPrefix: string): IdMatch {
        const exact = this.db.prepare(`SELECT id FROM ${table} WHERE id = ?`).get(idOrPrefix);
        if (exact !== undefined) return { status: 'found', id: idRowSchema.parse(exact).id };

        const candidates = this.db
            .prepare(`SELECT id FROM ${table} WHERE substr(id, 1, length(?)) = ? ORDER BY id LIMIT 20`)
            .all(idOrPrefix, idOrPrefix)
            .map((row) => idRowSchema.parse(row).id);

        const [only] = candidates;
        if (only === undefined) return { status: 'none' };
        if (candidates.length === 1) return { status: 'found', id: only };
        return { status: 'ambiguous', candidates };
    }

    // ─── Mentions ─────────────────────────────────────────────

    /**
     * Replace all stored mentions in a single transaction.
     */
    replaceMentions(mentions: readonly Mention[]): void {
        const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO mentions (mention_id, article_id, kind, text, lemma, start_offset, end_offset, sentence, canonical_name, gender, resolution_source, confidence, detail)
      VALUES (@mention_id, @article_id, @kind, @text, @lemma, @start_offset, @end_offset, @sentence, @canonical_name, @gender, @resolution_source, @confidence, @detail)
    `);

        const replaceAll = this.db.transaction((rows: readonly Mention[]) => {
            this.db.prepare('DELETE FROM mentions').run();
            for (const mention of rows) {
                stmt.run({
                    mention_id: mention.mention_id,
                    article_id: mention.article_id,
                    kind: mention.kind,
                    text: mention.text,
                    lemma: mention.lemma,
                    start_offset: mention.start,
                    end_offset: mention.end,
                    sentence: mention.sentence,
                    canonical_name: mention.canonical_name,
                    gender: mention.gender,
                    resolution_source: mention.resolution?.source ?? null,
                    confidence: mention.resolution?.confidence ?? null,
                    detail: mention.resolution?.detail ?? null,
                });
            }
        });

        replaceAll(mentions);
    }

    getMentions(articleId?: string): Mention[] {
        const rows = articleId
            ? this.db.prepare('SELECT * FROM mentions WHERE article_id = ? ORDER BY start_offset').all(articleId)
            : this.db.prepare('SELECT * FROM mentions ORDER BY article_id, start_offset').all();

        return rows.map((raw) => {
            const row = mentionRowSchema.parse(raw);
            return {
                mention_id: row.mention_id,
                article_id: row.article_id,
                kind: row.kind,
                text: row.text,
                lemma: row.lemma,
                start: row.start_offset,
                end: row.end_offset,
                sentence: row.sentence,
                canonical_name: row.canonical_name,
                gender: row.gender,
                resolution: row.resolution_source
                    ? { source: row.resolution_source, confidence: row.confidence ?? 0, detail: row.detail }
                    : null,
            };
        });
    }

    getMentionCount(): number {
        return this.count('SELECT COUNT(*) as count FROM mentions');
    }

    // ─── Aggregates ───────────────────────────────────────────

    /**
     * Replace all aggregate records in a single transaction.
     */
    replaceAggregates(records: readonly AggregateRecord[]): void {
        const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO aggregates (group_by, group_key, label, total, female, male, undetermined, ambiguous, female_share, record_json)
      VALUES (@group_by, @group_key, @label, @total, @female, @male, @undetermined, @ambiguous, @female_share, @record_json)
    `);

        const replaceAll = this.db.transaction((rows: readonly AggregateRecord[]) => {
            this.db.prepare('DELETE FROM aggregates').run();
            for (const record of rows) {
                stmt.run({
                    group_by: record.groupBy,
                    group_key: record.key,
                    label: record.label,
                    total: record.total,
                    female: record.counts.female,
                    male: record.counts.male,
                    undetermined: record.counts.undetermined,
                    ambiguous: record.counts.ambiguous,
                    female_share: record.femaleShare,
                    record_json: JSON.stringify(record),
                });
            }
        });

        replaceAll(records);
    }

    getAggregates(groupBy: GroupBy): AggregateRecord[] {
        return this.db
            .prepare('SELECT record_json FROM aggregates WHERE group_by = ? ORDER BY rowid')
            .all(groupBy)
            .map((row) => aggregateRecordSchema.parse(JSON.parse(recordJsonRowSchema.parse(row).record_json)));
    }

    // ─── Gender writing ───────────────────────────────────────

    /**
     * Replace all stored gender-writing matches in a single transaction.
     */
    replaceGenderWriting(matches: readonly GenderWritingMatch[]): void {
        const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO gender_writing (article_id, kind, term, count)
      VALUES (@article_id, @kind, @term, @count)
    `);

        const replaceAll = this.db.transaction((rows: readonly GenderWritingMatch[]) => {
            this.db.prepare('DELETE FROM gender_writing').run();
            for (const match of rows) {
                stmt.run(match);
            }
        });

        replaceAll(matches);
    }

    getGenderWriting(): GenderWritingMatch[] {
        return this.db
            .prepare('SELECT article_id, kind, term, count FROM gender_writing ORDER BY rowid')
            .all()
            .map((row) => genderWritingRowSchema.parse(row));
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, genderscope_version, config_json, stats_json)
      VALUES (@created_at, @genderscope_version, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        volumes: number;
        authors: number;
        articles: number;
        mentions: number;
        aggregates: number;
        runs: number;
        mentionsByGender: Record<string, number>;
    } {
        const genderRows = this.db
            .prepare("SELECT COALESCE(gender, 'unresolved') as gender, COUNT(*) as count FROM mentions GROUP BY gender")
            .all();
        const mentionsByGender: Record<string, number> = {};
        for (const raw of genderRows) {
            const row = z.object({ gender: z.string(), count: z.number() }).parse(raw);
            mentionsByGender[row.gender] = row.count;
        }

        return {
            volumes: this.count('SELECT COUNT(*) as count FROM volumes'),
            authors: this.count('SELECT COUNT(*) as count FROM authors'),
            articles: this.getArticleCount(),
            mentions: this.getMentionCount(),
            aggregates: this.count('SELECT COUNT(*) as count FROM aggregates'),
            runs: this.count('SELECT COUNT(*) as count FROM runs'),
            mentionsByGender,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Database closed');
    }
}
