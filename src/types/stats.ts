import type { GenderLabel } from './mention.js';

/**
 * Grouping granularity for aggregate tables.
 */
export type GroupBy = 'article' | 'volume' | 'author';

/**
 * Connotation (affect norm) values for a lemma.
 */
export interface ConnotationScore {
    valence: number;
    arousal: number;
    imageability: number;
    concreteness: number;
}

export const CONNOTATION_DIMENSIONS: readonly (keyof ConnotationScore)[] = [
    'valence',
    'arousal',
    'imageability',
    'concreteness',
];

/**
 * Gender-writing families counted per text: binary pair forms (LehrerInnen,
 * Lehrer/innen), gender-inclusive forms (Lehrer*innen), neopronouns, and
 * terms for gender conceptions beyond the binary.
 */
export type GenderWritingKind = 'binary' | 'inclusive' | 'neopronoun' | 'genderConception';

export const GENDER_WRITING_KINDS: readonly GenderWritingKind[] = ['binary', 'inclusive', 'neopronoun', 'genderConception'];

export type GenderWritingCounts = Record<GenderWritingKind, number>;

/**
 * Occurrences of one matched term in one article.
 */
export interface GenderWritingMatch {
    article_id: string;
    kind: GenderWritingKind;
    term: string;
    count: number;
}

/**
 * Per-gender connotation summary. Means are null when nothing was scored.
 */
export interface ConnotationSummary {
    means: Record<keyof ConnotationScore, number | null>;
    scored: number;
    noScore: number;
}

/**
 * Aggregate statistics for one grouping key. Always derived, never stored as truth.
 */
export interface AggregateRecord {
    groupBy: GroupBy;
    key: string;
    label: string;

    total: number;
    counts: Record<GenderLabel, number>;
    perCounts: Record<GenderLabel, number>;
    prnCounts: Record<GenderLabel, number>;
    proportions: Record<GenderLabel, number | null>;

    /** female / (female + male), null when neither occurs */
    femaleShare: number | null;

    connotation: {
        female: ConnotationSummary;
        male: ConnotationSummary;
    };

    /** Article only */
    tokens: number | null;
    slashForms: number | null;

    /** Gender-writing matches over the group's articles; null without text statistics */
    genderWriting: GenderWritingCounts | null;

    /** Author only: author's inferred gender */
    inferredGender: GenderLabel | null;
}
