import {
    GENDER_WRITING_KINDS,
    type GenderWritingCounts,
    type GenderWritingKind,
    type GenderWritingMatch,
} from '../types/index.js';
import type { Token } from './tokenizer.js';

export interface GenderWritingPattern {
    kind: GenderWritingKind;
    description: string;

    /** Lowercase the token before matching */
    ignoreCase: boolean;

    pattern: RegExp;
}

/**
 * The gender-writing patterns, matched against single tokens. A token may
 * match more than one pattern and is then counted once for each.
 * Exported so each pattern can be tested in isolation.
 */
export const GENDER_WRITING_PATTERNS: readonly GenderWritingPattern[] = [
    {
        kind: 'binary',
        description: 'Pair forms shortened to one word: LehrerInnen, Lehrer/innen, Lehrer/-in, Lehrer(innen), JedeR',
        ignoreCase: false,
        pattern: /\p{Lu}\S*(?:Innen|In|eR|\/-?(?:innen|in|r)|\((?:innen|in|r)\))(?![\p{L}\p{N}])/u,
    },
    {
        kind: 'inclusive',
        description: 'Gender star, gap and colon: Lehrer*innen, Lehrer_in, Lehrer:innen',
        ignoreCase: false,
        pattern: /\p{Lu}\S*[*_:](?:innen|in|r)(?![\p{L}\p{N}])/u,
    },
    {
        kind: 'neopronoun',
        description: 'Neopronouns and borrowed pronouns: hen, they, dey, sier, xier',
        ignoreCase: true,
        pattern: /^(?:hän|hen|ham|they|them|dey|demm|sie?[*_:]?er|xier)$/u,
    },
    {
        kind: 'genderConception',
        description: 'Terms for trans, inter and non-binary people and for queer and heteronormative discourse',
        ignoreCase: true,
        pattern: new RegExp(
            [
                'trans\\*?-?(?:\\*|gender|geschlechtlich(?:keit)?|ident|sexuell|sexualität|-?mann|-?frau|-?person)',
                '\\btrans\\b',
                'inter-?(?:\\*|geschlechtlich(?:keit)?|sex|sexuell|sexualität)',
                '\\binter\\b',
                'nicht-?binär|non-?binary|enby|gender-?fluid|poly-?gender',
                'hetero-?normativ(?:ität)?',
                'lgbtq?i?a?(?:2s)?',
                'lsbtt?i?a?q?',
                '(?:gender.?)?queer',
            ].join('|'),
            'u'
        ),
    },
];

export function zeroGenderWritingCounts(): GenderWritingCounts {
    return { binary: 0, inclusive: 0, neopronoun: 0, genderConception: 0 };
}

/**
 * Patterns a single word matches, in table order.
 */
export function genderWritingKinds(
    word: string,
    patterns: readonly GenderWritingPattern[] = GENDER_WRITING_PATTERNS
): GenderWritingKind[] {
    return patterns
        .filter((entry) => entry.pattern.test(entry.ignoreCase ? word.toLowerCase() : word))
        .map((entry) => entry.kind);
}

/**
 * Matched terms of one article with their counts, ordered by kind and then
 * by first occurrence.
 */
export function matchGenderWriting(
    articleId: string,
    tokens: readonly Token[],
    patterns: readonly GenderWritingPattern[] = GENDER_WRITING_PATTERNS
): GenderWritingMatch[] {
    const byKind = new Map<GenderWritingKind, Map<string, number>>();

    for (const token of tokens) {
        for (const kind of genderWritingKinds(token.text, patterns)) {
            const terms = byKind.get(kind) ?? new Map<string, number>();
            terms.set(token.text, (terms.get(token.text) ?? 0) + 1);
            byKind.set(kind, terms);
        }
    }

    return GENDER_WRITING_KINDS.flatMap((kind) =>
        [...(byKind.get(kind) ?? new Map<string, number>())].map(([term, count]) => ({
            article_id: articleId,
            kind,
            term,
            count,
        }))
    );
}

/**
 * Total matches per kind.
 */
export function countGenderWriting(matches: readonly GenderWritingMatch[]): GenderWritingCounts {
    const counts = zeroGenderWritingCounts();
    for (const match of matches) counts[match.kind] += match.count;
    return counts;
}
