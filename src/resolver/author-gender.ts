import type { Author, GenderLabel } from '../types/index.js';
import type { Annotator } from '../nlp/annotator.js';
import { mentionsFromAnnotation, type PrnLookupTable } from '../nlp/mention-extraction.js';
import type { Token } from '../nlp/tokenizer.js';
import { getLogger } from '../utils/logger.js';
import type { GenderResolver } from './gender-resolver.js';

const logger = getLogger();

const FEMALE_PRONOUNS: ReadonlySet<string> = new Set(['sie', 'ihr', 'ihre', 'ihrer', 'ihrem', 'ihren', 'ihres']);
const MALE_PRONOUNS: ReadonlySet<string> = new Set(['er', 'ihn', 'ihm', 'sein', 'seine', 'seiner', 'seinem', 'seinen', 'seines']);

/**
 * The three independent cues for an author's gender.
 */
export interface AuthorGenderSignals {
    knowledgeBase: GenderLabel;
    pronouns: GenderLabel;
    nouns: GenderLabel;
}

export interface AuthorGender {
    authorId: string;
    gender: GenderLabel;
    signals: AuthorGenderSignals;
}

function fromFlags(female: boolean, male: boolean): GenderLabel {
    if (female && male) return 'ambiguous';
    if (female) return 'female';
    if (male) return 'male';
    return 'undetermined';
}

/** Plural and formal-address verb forms after "sie"/"Sie" */
function isPluralVerb(word: string): boolean {
    return word === 'sind' || word.endsWith('n');
}

/**
 * Whether a female-looking pronoun refers to a woman. "Sie" or "sie" counts
 * only before a singular verb ("sie lehrt", not "Sie sind", "sie lehren"),
 * "ihr" only before a capitalized noun ("ihr Buch", not "Ihr seid").
 * Capitalized forms inside a sentence are formal address.
 */
function isFemaleReference(tokens: readonly Token[], index: number): boolean {
    const token = tokens[index];
    if (!token) return false;
    if (/^\p{Lu}/u.test(token.text) && !token.sentenceStart) return false;

    const word = token.text.toLowerCase();
    const next = tokens[index + 1];
    const following = next && next.sentence === token.sentence ? next.text : null;

    if (word === 'sie') return following !== null && /^\p{Ll}/u.test(following) && !isPluralVerb(following);
    if (word === 'ihr') return following !== null && /^\p{Lu}/u.test(following);
    return true;
}

/**
 * Third-person singular pronouns in the author's bio.
 */
export function pronounSignal(tokens: readonly Token[]): GenderLabel {
    let female = false;
    let male = false;
    tokens.forEach((token, index) => {
        const word = token.text.toLowerCase();
        if (FEMALE_PRONOUNS.has(word) && isFemaleReference(tokens, index)) female = true;
        if (MALE_PRONOUNS.has(word)) male = true;
    });
    return fromFlags(female, male);
}

/**
 * Combine cues: one binary gender among them wins, two disagreeing ones
 * are ambiguous. Undetermined cues are ignored.
 */
export function combineSignals(signals: AuthorGenderSignals): GenderLabel {
    const labels = [signals.knowledgeBase, signals.pronouns, signals.nouns];
    const binary = new Set(labels.filter((label) => label === 'female' || label === 'male'));
    if (binary.size > 1) return 'ambiguous';

    const [only] = binary;
    if (only) return only;
    return labels.includes('ambiguous') ? 'ambiguous' : 'undetermined';
}

/**
 * Infer the gender of each author from the knowledge base (by name) and
 * from pronouns and people-referencing nouns in the author's info text.
 */
export async function inferAuthorGenders(
    authors: readonly Author[],
    options: { resolver: GenderResolver; prnTable: PrnLookupTable; annotator: Annotator }
): Promise<Map<string, AuthorGender>> {
    const { resolver, prnTable, annotator } = options;
    const byName = await resolver.resolveNames(authors.map((author) => author.name));

    const results = new Map<string, AuthorGender>();
    for (const author of authors) {
        const annotation = annotator.annotate(author.info ?? '', { commonNouns: prnTable });
        const nounGenders = mentionsFromAnnotation(author.id, annotation, prnTable)
            .filter((mention) => mention.kind === 'PRN')
            .map((mention) => resolver.resolvePrn(mention.lemma).gender);

        const signals: AuthorGenderSignals = {
            knowledgeBase: byName.get(author.name)?.gender ?? 'undetermined',
            pronouns: pronounSignal(annotation.tokens),
            nouns: fromFlags(nounGenders.includes('female'), nounGenders.includes('male')),
        };
        const gender = combineSignals(signals);

        if (gender === 'ambiguous') {
            logger.info({ author: author.name, ...signals }, 'Author gender cues disagree');
        }
        results.set(author.id, { authorId: author.id, gender, signals });
    }

    return results;
}
