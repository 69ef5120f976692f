/**
 * Gender label assigned to every mention.
 *
 * - `undetermined`: no gender signal found
 * - `ambiguous`: conflicting signals, or a noun usable for mixed-gender groups
 */
export type GenderLabel = 'female' | 'male' | 'undetermined' | 'ambiguous';

export const GENDER_LABELS: readonly GenderLabel[] = ['female', 'male', 'undetermined', 'ambiguous'];

/**
 * Mention kinds: a named person, or a people-referencing noun.
 */
export type MentionKind = 'PER' | 'PRN';

/**
 * Where a mention's gender came from.
 */
export type ResolutionSource =
    | 'prn-table'
    | 'inclusive-form'
    | 'knowledge-base'
    | 'unresolved';

export interface Resolution {
    source: ResolutionSource;

    /** 1 for a single consistent signal, lower for mixed signals, 0 when nothing was found */
    confidence: number;

    /** Free-form detail: the knowledge-base gender id, the failure reason, ... */
    detail: string | null;
}

/**
 * An occurrence of a person reference within an article.
 * Created by the extractor; the resolver only fills `gender` and `resolution`.
 */
export interface Mention {
    /** `${article_id}:${start}` */
    mention_id: string;
    article_id: string;
    kind: MentionKind;

    /** Surface text as it appears in the article */
    text: string;

    /** PRN: matched table lemma. PER: the surface text */
    lemma: string;

    /** Character offsets into the article text */
    start: number;
    end: number;
    sentence: number;

    /** PER only: full name used for the knowledge-base query */
    canonical_name: string | null;

    gender: GenderLabel | null;
    resolution: Resolution | null;
}
