import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { lemmatizeNoun } from './mention-extraction.js';
import { tokenize, type Token } from './tokenizer.js';

const logger = getLogger();

/**
 * A named-person span.
 */
export interface EntitySpan {
    label: 'PER';
    text: string;
    start: number;
    end: number;

    /** Token index range, end exclusive */
    tokenStart: number;
    tokenEnd: number;

    sentence: number;

    /** Name without honorifics; the full name for a surname seen earlier */
    canonicalName: string;
}

export interface Annotation {
    tokens: Token[];
    entities: EntitySpan[];
}

export interface WordLookup {
    has(word: string): boolean;
}

export interface AnnotateOptions {
    /** Nouns that never open or continue a name, on top of the annotator's own list */
    commonNouns?: WordLookup;
}

/**
 * Linguistic annotation over one article text.
 */
export interface Annotator {
    annotate(text: string, options?: AnnotateOptions): Annotation;
}

/** Academic titles; a name of any kind may follow them */
const TITLES: ReadonlySet<string> = new Set(['Dr.', 'Prof.']);

/** Forms of address; only a known given name or surname may follow them */
const ADDRESS_TERMS: ReadonlySet<string> = new Set(['Herr', 'Herrn', 'Frau']);

export const HONORIFICS: ReadonlySet<string> = new Set([...TITLES, ...ADDRESS_TERMS]);

/** Nobiliary particles allowed inside a name */
export const NAME_PARTICLES: ReadonlySet<string> = new Set([
    'von', 'van', 'de', 'zu', 'vom', 'zum', 'zur', 'di', 'da', 'du', 'del', 'della', 'le', 'la', 'ten', 'ter',
]);

/** Articles only count as particles right after another particle ("von der") */
const TRAILING_PARTICLES: ReadonlySet<string> = new Set(['der', 'den']);

const NAME_TOKEN = /^\p{Lu}\p{Ll}+(?:-\p{Lu}\p{Ll}+)*$/u;

const nameListSchema = z.object({ names: z.array(z.string().min(1)) });
const wordListSchema = z.object({ words: z.array(z.string().min(1)) });

export function isNameToken(word: string): boolean {
    return NAME_TOKEN.test(word);
}

/** Looked up beside the sources and beside the bundle */
function findBundled(file: string): string | undefined {
    return [`../../data/${file}`, `../data/${file}`]
        .map((relative) => fileURLToPath(new URL(relative, import.meta.url)))
        .find((candidate) => existsSync(candidate));
}

function loadList(
    file: string,
    path: string | undefined,
    read: (raw: unknown) => string[]
): Set<string> | null {
    const resolved = path ?? findBundled(file);
    if (!resolved) return null;

    const entries = read(JSON.parse(readFileSync(resolved, 'utf-8')));
    logger.debug({ path: resolved, entries: entries.length }, 'Word list loaded');
    return new Set(entries);
}

/**
 * Load the given-name gazetteer (`{ "names": [...] }`).
 */
export function loadGivenNames(path?: string): Set<string> {
    const names = loadList('given-names.json', path, (raw) => nameListSchema.parse(raw).names);
    if (!names) {
        logger.warn('Given-name gazetteer not found, names are only recognized after titles');
        return new Set();
    }
    return names;
}

/**
 * Load the surname gazetteer (`{ "names": [...] }`).
 */
export function loadSurnames(path?: string): Set<string> {
    return loadList('surnames.json', path, (raw) => nameListSchema.parse(raw).names) ?? new Set();
}

/**
 * Load the list of capitalized nouns that are never names (`{ "words": [...] }`).
 */
export function loadCommonNouns(path?: string): Set<string> {
    return loadList('common-nouns.json', path, (raw) => wordListSchema.parse(raw).words) ?? new Set();
}

export interface RuleBasedAnnotatorOptions {
    givenNames: ReadonlySet<string>;

    /** Surnames accepted after "Frau" or "Herr" without an earlier full name */
    surnames?: ReadonlySet<string>;

    /** Capitalized nouns that never open or continue a name */
    commonNouns?: ReadonlySet<string>;

    /** Longest PER span in tokens, honorifics included */
    maxNameTokens?: number;
}

/**
 * Gazetteer- and honorific-driven person recognition.
 *
 * A span opens at a known given name, at a title followed by a name, or at
 * "Frau"/"Herr" followed by a given name or a known surname. It runs over
 * capitalized name tokens and particles within one sentence, stopping at a
 * common noun. Surnames of names recognized earlier in the same text are
 * spans on their own.
 */
export class RuleBasedAnnotator implements Annotator {
    private readonly givenNames: ReadonlySet<string>;
    private readonly surnames: ReadonlySet<string>;
    private readonly commonNouns: ReadonlySet<string>;
    private readonly maxNameTokens: number;

    constructor(options: RuleBasedAnnotatorOptions) {
        this.givenNames = options.givenNames;
        this.surnames = options.surnames ?? new Set();
        this.commonNouns = options.commonNouns ?? new Set();
        this.maxNameTokens = options.maxNameTokens ?? 5;
    }

    /**
     * Annotator over the given-name gazetteer at `path` (bundled by default)
     * and the bundled surname and common-noun lists.
     */
    static fromFile(path?: string): RuleBasedAnnotator {
        return new RuleBasedAnnotator({
            givenNames: loadGivenNames(path),
            surnames: loadSurnames(),
            commonNouns: loadCommonNouns(),
        });
    }

    annotate(text: string, options: AnnotateOptions = {}): Annotation {
        const tokens = tokenize(text);
        const entities: EntitySpan[] = [];
        const scope: SpanScope = { seen: new Map(), commonNouns: options.commonNouns };

        let i = 0;
        while (i < tokens.length) {
            const span = this.matchSpan(text, tokens, i, scope);
            if (!span) {
                i++;
                continue;
            }
            entities.push(span);
            i = span.tokenEnd;
        }

        return { tokens, entities };
    }

    private isGivenName(word: string): boolean {
        const [first = word] = word.split('-');
        return this.givenNames.has(word) || this.givenNames.has(first);
    }

    private isCommonNoun(word: string, scope: SpanScope): boolean {
        const extra = scope.commonNouns;
        return lemmatizeNoun(word, (lemma) => this.commonNouns.has(lemma) || (extra?.has(lemma) ?? false)) !== null;
    }

    /** Full name of a surname seen earlier, also in its genitive form */
    private seenName(word: string, scope: SpanScope): string | undefined {
        return scope.seen.get(word) ?? scope.seen.get(word.replace(/s$/, ''));
    }

    private isKnownSurname(word: string, scope: SpanScope): boolean {
        return this.surnames.has(word) || this.seenName(word, scope) !== undefined;
    }

    private matchSpan(text: string, tokens: readonly Token[], index: number, scope: SpanScope): EntitySpan | null {
        const first = tokens[index];
        if (!first) return null;

        // Honorific chain ("Frau Prof. Dr.")
        let nameStart = index;
        let hasTitle = false;
        while (nameStart < tokens.length && nameStart - index < this.maxNameTokens) {
            const token = tokens[nameStart];
            if (!token || !HONORIFICS.has(token.text) || token.sentence !== first.sentence) break;
            if (TITLES.has(token.text)) hasTitle = true;
            nameStart++;
        }
        const hasHonorific = nameStart > index;
        const head = tokens[nameStart];
        if (!head || head.sentence !== first.sentence || !isNameToken(head.text)) return null;

        const headIsGiven = this.isGivenName(head.text);
        if (!hasHonorific && !headIsGiven) {
            const known = this.seenName(head.text, scope);
            if (!known) return null;
            return buildSpan(text, tokens, index, index + 1, known);
        }

        // "Frau Deutschlands" stays a noun; "Dr. Weber" is a name
        if (hasHonorific && !headIsGiven && !this.isKnownSurname(head.text, scope)) {
            if (!hasTitle || this.isCommonNoun(head.text, scope)) return null;
        }

        const nameEnd = this.extendName(tokens, nameStart, index, scope);
        const name = tokens
            .slice(nameStart, nameEnd)
            .map((token) => token.text)
            .join(' ');

        const last = tokens[nameEnd - 1];
        if (last && nameEnd - nameStart > 1) scope.seen.set(last.text, name);

        // "Frau Schmidt" after "Maria Schmidt"
        const canonical = nameEnd - nameStart === 1 ? (scope.seen.get(name) ?? name) : name;
        return buildSpan(text, tokens, index, nameEnd, canonical);
    }

    /**
     * Index after the last name token, starting from a name token at `from`.
     * Particles are only taken when a name token follows them. A common noun
     * ends the name unless it is a known given name or surname.
     */
    private extendName(tokens: readonly Token[], from: number, spanStart: number, scope: SpanScope): number {
        const sentence = tokens[from]?.sentence;
        let end = from + 1;

        while (end - spanStart < this.maxNameTokens) {
            let next = end;
            let previousWasParticle = false;
            while (next - spanStart < this.maxNameTokens) {
                const token = tokens[next];
                if (!token || token.sentence !== sentence) break;
                const isParticle =
                    NAME_PARTICLES.has(token.text) || (previousWasParticle && TRAILING_PARTICLES.has(token.text));
                if (!isParticle) break;
                previousWasParticle = true;
                next++;
            }

            const candidate = tokens[next];
            if (
                !candidate ||
                candidate.sentence !== sentence ||
                !isNameToken(candidate.text) ||
                next - spanStart >= this.maxNameTokens ||
                !this.continuesName(candidate.text, scope)
            ) {
                break;
            }
            end = next + 1;
        }

        return end;
    }

    private continuesName(word: string, scope: SpanScope): boolean {
        if (this.isGivenName(word) || this.isKnownSurname(word, scope)) return true;
        return !this.isCommonNoun(word, scope);
    }
}

interface SpanScope {
    /** Surname of each multi-token name so far, mapped to the full name */
    seen: Map<string, string>;
    commonNouns: WordLookup | undefined;
}

function buildSpan(
    text: string,
    tokens: readonly Token[],
    tokenStart: number,
    tokenEnd: number,
    canonicalName: string
): EntitySpan | null {
    const first = tokens[tokenStart];
    const last = tokens[tokenEnd - 1];
    if (!first || !last) return null;

    return {
        label: 'PER',
        text: text.slice(first.start, last.end),
        start: first.start,
        end: last.end,
        tokenStart,
        tokenEnd,
        sentence: first.sentence,
        canonicalName,
    };
}
