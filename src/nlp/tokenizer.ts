/**
 * A word token with character offsets into the source text.
 */
export interface Token {
    text: string;
    start: number;
    end: number;

    /** Zero-based sentence index */
    sentence: number;

    /** First token of its sentence */
    sentenceStart: boolean;
}

/**
 * Words with inner hyphens and gender-inclusive joiners (`*`, `_`, `:`,
 * `/`, `/-`), optionally followed by a bracketed suffix `(innen)`.
 */
const WORD_PATTERN = /[\p{L}\p{N}]+(?:(?:[-*_:]|\/-?)[\p{L}\p{N}]+)*(?:\((?:innen|in|r)\))?/gu;

/**
 * Gender-inclusive and pair-form spellings: Lehrer*innen, Lehrer:innen,
 * Lehrer_innen, Lehrer/-innen, Lehrer(innen), LehrerInnen.
 */
const INCLUSIVE_PATTERN = /^\p{Lu}\S*?(?:[*_:](?:innen|in|r)|\/-?(?:innen|in|r)|\((?:innen|in|r)\)|\p{Ll}(?:Innen|In))$/u;

/** `/` followed by a word, as in "und/oder" or "Lehrer/innen" */
const SLASH_FORM_PATTERN = /\/ ?\p{L}+/gu;

/**
 * Abbreviations that keep their trailing dot and do not end a sentence.
 * Single letters (initials, z. B.) are handled separately.
 */
export const ABBREVIATIONS: ReadonlySet<string> = new Set([
    'abs', 'bspw', 'bzw', 'ca', 'dipl', 'dr', 'etc', 'evtl', 'fr', 'ggf', 'hg', 'hr', 'hrsg',
    'inkl', 'ing', 'jh', 'jhd', 'mio', 'mrd', 'nr', 'prof', 'sog', 'st', 'str', 'usw', 'vgl',
]);

const SENTENCE_END = /[.!?]/;
const PARAGRAPH_BREAK = /\n\s*\n/;

export function isInclusiveForm(word: string): boolean {
    return INCLUSIVE_PATTERN.test(word);
}

/**
 * Number of slash forms in a text (`Lehrer/innen`, `und/oder`).
 */
export function countSlashForms(text: string): number {
    return text.match(SLASH_FORM_PATTERN)?.length ?? 0;
}

function keepsDot(word: string): boolean {
    return /^\p{L}$/u.test(word) || ABBREVIATIONS.has(word.toLowerCase());
}

/**
 * Split text into word tokens with sentence indices. Deterministic:
 * the same text always gives the same tokens.
 *
 * A sentence ends at `.`, `!` or `?` followed by a capitalized word or a
 * digit, or at a blank line. Dots after abbreviations and after one- or
 * two-digit ordinals ("am 3. Mai") do not end a sentence.
 */
export function tokenize(text: string): Token[] {
    if (!text) return [];

    const tokens: Token[] = [];
    let sentence = 0;
    let previousEnd = 0;

    for (const match of text.matchAll(WORD_PATTERN)) {
        const start = match.index ?? 0;
        let end = start + match[0].length;
        let word = match[0];

        if (text[end] === '.' && keepsDot(word)) {
            word += '.';
            end += 1;
        }

        const previous = tokens[tokens.length - 1];
        if (previous) {
            const gap = text.slice(previousEnd, start);
            const isOrdinal = /^\d{1,2}$/.test(previous.text) && /^\.\s+$/.test(gap);
            const endsSentence =
                PARAGRAPH_BREAK.test(gap) ||
                (SENTENCE_END.test(gap) && !isOrdinal && /^[\p{Lu}\p{N}]/u.test(word));
            if (endsSentence) sentence++;
        }

        tokens.push({
            text: word,
            start,
            end,
            sentence,
            sentenceStart: !previous || previous.sentence !== sentence,
        });
        previousEnd = end;
    }

    return tokens;
}
