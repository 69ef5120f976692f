import type {
    AggregateRecord,
    Corpus,
    GenderLabel,
    GenderWritingCounts,
    GenderWritingMatch,
    GroupBy,
    Mention,
    MentionKind,
} from '../types/index.js';
import { countGenderWriting } from '../nlp/gender-writing.js';
import { analyzeArticleText } from '../nlp/mention-extraction.js';
import { inferAuthorGenders, type AuthorGender } from '../resolver/author-gender.js';
import { aggregate, type TextStats } from '../stats/aggregator.js';
import type { GenderscopeDatabase } from '../storage/database.js';
import { PipelineError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { AnalysisContext } from './context.js';

const logger = getLogger();

export const GROUPINGS: readonly GroupBy[] = ['article', 'volume', 'author'];

export interface AnalysisSummary {
    articles: number;
    mentions: number;
    byGender: Record<GenderLabel, number>;
    byKind: Record<MentionKind, number>;
    genderWriting: GenderWritingCounts;
    lookups: { hits: number; misses: number };
    durationMs: number;
}

export interface AnalysisResult {
    mentions: Mention[];
    aggregates: Record<GroupBy, AggregateRecord[]>;
    authorGenders: Map<string, AuthorGender>;

    /** Matched gender-writing terms per article */
    genderWriting: GenderWritingMatch[];

    summary: AnalysisSummary;
}

function summarize(mentions: readonly Mention[]): Pick<AnalysisSummary, 'byGender' | 'byKind'> {
    const byGender: Record<GenderLabel, number> = { female: 0, male: 0, undetermined: 0, ambiguous: 0 };
    const byKind: Record<MentionKind, number> = { PER: 0, PRN: 0 };
    for (const mention of mentions) {
        byGender[mention.gender ?? 'undetermined']++;
        byKind[mention.kind]++;
    }
    return { byGender, byKind };
}

/**
 * Full analysis of an in-memory corpus:
 *
 * 1. Extract PER and PRN mentions per article
 * 2. Resolve their genders (PRN table, knowledge base)
 * 3. Infer author genders, when enabled
 * 4. Aggregate per article, volume and author, with the gender-writing
 *    forms found in step 1
 *
 * Articles are never modified. An empty corpus is fatal.
 */
export async function analyzeCorpus(corpus: Corpus, context: AnalysisContext): Promise<AnalysisResult> {
    if (corpus.articles.length === 0) {
        throw new PipelineError('Corpus has no articles; run "genderscope ingest" first', 'corpus');
    }

    const startTime = Date.now();
    const { config, prnTable, annotator, resolver, lexicon, lookup } = context;

    // ──────────────────────────────────────────────────
    // Step 1: Mention extraction
    // ──────────────────────────────────────────────────
    const extracted: Mention[] = [];
    const genderWriting: GenderWritingMatch[] = [];
    const textStats = new Map<string, TextStats>();
    for (const article of corpus.articles) {
        const analysis = analyzeArticleText(article, prnTable, annotator);
        extracted.push(...analysis.mentions);
        genderWriting.push(...analysis.genderWriting);
        textStats.set(article.id, {
            tokens: analysis.tokens,
            slashForms: analysis.slashForms,
            genderWriting: countGenderWriting(analysis.genderWriting),
        });
        if (analysis.genderWriting.length > 0) {
            logger.debug(
                { articleId: article.id, terms: analysis.genderWriting.map((match) => match.term) },
                'Gender-writing forms found'
            );
        }
    }
    logger.info({ articles: corpus.articles.length, mentions: extracted.length }, 'Mentions extracted');

    // ──────────────────────────────────────────────────
    // Step 2: Gender resolution
    // ──────────────────────────────────────────────────
    const mentions = await resolver.resolveMentions(extracted);

    // ──────────────────────────────────────────────────
    // Step 3: Author genders
    // ──────────────────────────────────────────────────
    const authorGenders = config.knowledgeBase.resolveAuthors
        ? await inferAuthorGenders(corpus.authors, { resolver, prnTable, annotator })
        : new Map<string, AuthorGender>();

    // ──────────────────────────────────────────────────
    // Step 4: Aggregation
    // ──────────────────────────────────────────────────
    const input = {
        ...corpus,
        mentions,
        textStats,
        authorGenders: new Map([...authorGenders].map(([id, result]) => [id, result.gender])),
    };
    const aggregates: Record<GroupBy, AggregateRecord[]> = {
        article: aggregate(input, lexicon, 'article'),
        volume: aggregate(input, lexicon, 'volume'),
        author: aggregate(input, lexicon, 'author'),
    };

    const { hits, misses } = lookup.getStats();
    const summary: AnalysisSummary = {
        articles: corpus.articles.length,
        mentions: mentions.length,
        ...summarize(mentions),
        genderWriting: countGenderWriting(genderWriting),
        lookups: { hits, misses },
        durationMs: Date.now() - startTime,
    };

    logger.info(summary, 'Analysis complete');
    return { mentions, aggregates, authorGenders, genderWriting, summary };
}

/**
 * Analyze the ingested corpus and replace the stored mentions and
 * aggregates with the new results. Each run is recorded.
 */
export async function runAnalysis(db: GenderscopeDatabase, context: AnalysisContext): Promise<AnalysisResult> {
    const result = await analyzeCorpus(db.getCorpus(), context);

    const runId = db.transaction(() => {
        db.replaceMentions(result.mentions);
        db.replaceAggregates(GROUPINGS.flatMap((groupBy) => result.aggregates[groupBy]));
        db.replaceGenderWriting(result.genderWriting);
        return db.insertRun({
            created_at: new Date().toISOString(),
            genderscope_version: VERSION,
            config_json: JSON.stringify(context.config),
            stats_json: JSON.stringify(result.summary),
        });
    });

    logger.info({ runId, mentions: result.mentions.length }, 'Results stored');
    return result;
}
