import {
    CONNOTATION_DIMENSIONS,
    GENDER_LABELS,
    GENDER_WRITING_KINDS,
    type AggregateRecord,
    type Article,
    type Author,
    type ConnotationScore,
    type ConnotationSummary,
    type GenderLabel,
    type GenderWritingCounts,
    type GroupBy,
    type Mention,
    type Volume,
} from '../types/index.js';
import { zeroGenderWritingCounts } from '../nlp/gender-writing.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Read access to connotation norms.
 */
export interface ConnotationSource {
    get(lemma: string): ConnotationScore | undefined;
}

export interface TextStats {
    tokens: number;
    slashForms: number;
    genderWriting: GenderWritingCounts;
}

export interface AggregationInput {
    volumes: readonly Volume[];
    authors: readonly Author[];
    articles: readonly Article[];

    /** Resolved mentions; an unresolved one counts as undetermined */
    mentions: readonly Mention[];

    /** Per-article token, slash-form and gender-writing counts */
    textStats?: ReadonlyMap<string, TextStats>;

    /** Authors' inferred genders (AIG) */
    authorGenders?: ReadonlyMap<string, GenderLabel>;
}

export interface Group {
    key: string;
    label: string;
    mentions: Mention[];
}

type ScoredGender = 'female' | 'male';

function zeroCounts(): Record<GenderLabel, number> {
    return { female: 0, male: 0, undetermined: 0, ambiguous: 0 };
}

/**
 * Mean connotation per dimension over the scored mentions of one gender.
 * Mentions without a lexicon entry only raise `noScore`.
 */
export function summarizeConnotation(
    mentions: readonly Mention[],
    gender: ScoredGender,
    lexicon: ConnotationSource
): ConnotationSummary {
    const sums: ConnotationScore = { valence: 0, arousal: 0, imageability: 0, concreteness: 0 };
    let scored = 0;
    let noScore = 0;

    for (const mention of mentions) {
        if (mention.gender !== gender) continue;
        const score = lexicon.get(mention.lemma);
        if (!score) {
            noScore++;
            continue;
        }
        scored++;
        for (const dim of CONNOTATION_DIMENSIONS) sums[dim] += score[dim];
    }

    const mean = (dim: keyof ConnotationScore): number | null => (scored > 0 ? sums[dim] / scored : null);
    return {
        means: {
            valence: mean('valence'),
            arousal: mean('arousal'),
            imageability: mean('imageability'),
            concreteness: mean('concreteness'),
        },
        scored,
        noScore,
    };
}

/**
 * Statistics for one group. Undetermined and ambiguous mentions are counted
 * on their own and never folded into the female/male figures.
 */
export function summarizeGroup(
    groupBy: GroupBy,
    group: Group,
    lexicon: ConnotationSource
): AggregateRecord {
    const counts = zeroCounts();
    const perCounts = zeroCounts();
    const prnCounts = zeroCounts();

    for (const mention of group.mentions) {
        const gender = mention.gender ?? 'undetermined';
        counts[gender]++;
        (mention.kind === 'PER' ? perCounts : prnCounts)[gender]++;
    }

    const total = group.mentions.length;
    const proportions: Record<GenderLabel, number | null> = {
        female: null,
        male: null,
        undetermined: null,
        ambiguous: null,
    };
    for (const label of GENDER_LABELS) {
        proportions[label] = total > 0 ? counts[label] / total : null;
    }

    const binary = counts.female + counts.male;

    return {
        groupBy,
        key: group.key,
        label: group.label,
        total,
        counts,
        perCounts,
        prnCounts,
        proportions,
        femaleShare: binary > 0 ? counts.female / binary : null,
        connotation: {
            female: summarizeConnotation(group.mentions, 'female', lexicon),
            male: summarizeConnotation(group.mentions, 'male', lexicon),
        },
        tokens: null,
        slashForms: null,
        genderWriting: null,
        inferredGender: null,
    };
}

/**
 * Create an empty group per key, in the given order; the first label wins.
 */
function groupsFor(entries: Iterable<{ key: string; label: string }>): Map<string, Group> {
    const groups = new Map<string, Group>();
    for (const { key, label } of entries) {
        if (!groups.has(key)) groups.set(key, { key, label, mentions: [] });
    }
    return groups;
}

function emptyGroups(input: AggregationInput, groupBy: GroupBy): Map<string, Group> {
    switch (groupBy) {
        case 'article':
            return groupsFor(input.articles.map((article) => ({ key: article.id, label: article.title })));
        case 'volume':
            return groupsFor([
                ...input.volumes.map((volume) => ({ key: volume.id, label: volume.title })),
                ...input.articles.map((article) => ({ key: article.volume_id, label: article.volume_id })),
            ]);
        case 'author':
            return groupsFor([
                ...input.authors.map((author) => ({ key: author.id, label: author.name })),
                ...input.articles.flatMap((article) => article.author_ids.map((id) => ({ key: id, label: id }))),
            ]);
    }
}

function groupKeysOf(article: Article, groupBy: GroupBy): string[] {
    switch (groupBy) {
        case 'article':
            return [article.id];
        case 'volume':
            return [article.volume_id];
        case 'author':
            return [...new Set(article.author_ids)];
    }
}

/**
 * Gender-writing counts summed over each group's articles. An article
 * counts once for each of its authors.
 */
function sumGenderWriting(
    articles: readonly Article[],
    textStats: ReadonlyMap<string, TextStats>,
    groupBy: GroupBy
): Map<string, GenderWritingCounts> {
    const sums = new Map<string, GenderWritingCounts>();
    for (const article of articles) {
        const stats = textStats.get(article.id);
        if (!stats) continue;
        for (const key of groupKeysOf(article, groupBy)) {
            const sum = sums.get(key) ?? zeroGenderWritingCounts();
            for (const kind of GENDER_WRITING_KINDS) sum[kind] += stats.genderWriting[kind];
            sums.set(key, sum);
        }
    }
    return sums;
}

/**
 * Aggregate resolved mentions per article, volume or author.
 *
 * Every article, volume and author of the corpus gets a record, with zero
 * counts when it has no mentions. An author-level mention counts once for
 * each author of its article. Mentions of unknown articles are skipped.
 */
export function aggregate(
    input: AggregationInput,
    lexicon: ConnotationSource,
    groupBy: GroupBy
): AggregateRecord[] {
    const articles = new Map(input.articles.map((article) => [article.id, article]));

    const groups = emptyGroups(input, groupBy);

    const orphans = new Map<string, number>();
    for (const mention of input.mentions) {
        const article = articles.get(mention.article_id);
        if (!article) {
            orphans.set(mention.article_id, (orphans.get(mention.article_id) ?? 0) + 1);
            continue;
        }
        for (const key of groupKeysOf(article, groupBy)) {
            groups.get(key)?.mentions.push(mention);
        }
    }

    for (const [articleId, count] of orphans) {
        logger.warn({ articleId, mentions: count }, 'Mentions reference an unknown article, skipped');
    }

    const records = [...groups.values()].map((group) => summarizeGroup(groupBy, group, lexicon));

    if (input.textStats) {
        const genderWriting = sumGenderWriting(input.articles, input.textStats, groupBy);
        for (const record of records) {
            if (groupBy !== 'article') {
                record.genderWriting = genderWriting.get(record.key) ?? zeroGenderWritingCounts();
                continue;
            }
            const stats = input.textStats.get(record.key);
            record.tokens = stats?.tokens ?? null;
            record.slashForms = stats?.slashForms ?? null;
            record.genderWriting = genderWriting.get(record.key) ?? null;
        }
    }

    if (groupBy === 'author' && input.authorGenders) {
        for (const record of records) {
            record.inferredGender = input.authorGenders.get(record.key) ?? null;
        }
    }

    logger.debug({ groupBy, groups: records.length, orphans: orphans.size }, 'Aggregated mentions');
    return records;
}
