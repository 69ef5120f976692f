import type { Article, GenderWritingMatch, Mention } from '../types/index.js';
import type { Annotation, Annotator } from './annotator.js';
import { matchGenderWriting } from './gender-writing.js';
import { countSlashForms, isInclusiveForm } from './tokenizer.js';

/**
 * Read access to the PRN lexicon needed for matching.
 */
export interface PrnLookupTable {
    has(lemma: string): boolean;
}

/** Dative and genitive endings, longest first */
const INFLECTION_SUFFIXES = ['es', 'en', 's', 'n'];

/**
 * Map a capitalized surface form to a PRN lemma: the form itself, then its
 * last hyphen segment ("Grundschul-Lehrerin"), each also with a dative or
 * genitive ending stripped. Returns null when nothing is in the table.
 */
export function lemmatizeNoun(surface: string, isKnown: (lemma: string) => boolean): string | null {
    const bases = [surface];
    const lastSegment = surface.split('-').pop();
    if (lastSegment && lastSegment !== surface && lastSegment.length > 1) {
        bases.push(lastSegment.charAt(0).toUpperCase() + lastSegment.slice(1));
    }

    for (const base of bases) {
        if (isKnown(base)) return base;
        for (const suffix of INFLECTION_SUFFIXES) {
            if (base.length - suffix.length < 2 || !base.endsWith(suffix)) continue;
            const stem = base.slice(0, -suffix.length);
            if (isKnown(stem)) return stem;
        }
    }
    return null;
}

/**
 * Mentions from an annotation. PER spans take precedence: a token inside a
 * PER span never becomes a PRN mention. Ordered by start offset.
 */
export function mentionsFromAnnotation(
    articleId: string,
    annotation: Annotation,
    prnTable: PrnLookupTable
): Mention[] {
    const mentions: Mention[] = [];
    const covered = new Set<number>();

    for (const entity of annotation.entities) {
        for (let index = entity.tokenStart; index < entity.tokenEnd; index++) covered.add(index);
        mentions.push({
            mention_id: `${articleId}:${entity.start}`,
            article_id: articleId,
            kind: 'PER',
            text: entity.text,
            lemma: entity.text,
            start: entity.start,
            end: entity.end,
            sentence: entity.sentence,
            canonical_name: entity.canonicalName,
            gender: null,
            resolution: null,
        });
    }

    annotation.tokens.forEach((token, index) => {
        if (covered.has(index) || !/^\p{Lu}/u.test(token.text)) return;

        const lemma = isInclusiveForm(token.text)
            ? token.text
            : lemmatizeNoun(token.text, (candidate) => prnTable.has(candidate));
        if (!lemma) return;

        mentions.push({
            mention_id: `${articleId}:${token.start}`,
            article_id: articleId,
            kind: 'PRN',
            text: token.text,
            lemma,
            start: token.start,
            end: token.end,
            sentence: token.sentence,
            canonical_name: null,
            gender: null,
            resolution: null,
        });
    });

    return mentions.sort((a, b) => a.start - b.start);
}

/**
 * Person mentions of one article, in text order. Every call re-annotates,
 * so iterating twice yields the same sequence. PRN lemmas never open or
 * continue a name.
 */
export function* extractMentions(
    article: Pick<Article, 'id' | 'text'>,
    prnTable: PrnLookupTable,
    annotator: Annotator
): Generator<Mention> {
    const annotation = annotator.annotate(article.text, { commonNouns: prnTable });
    yield* mentionsFromAnnotation(article.id, annotation, prnTable);
}

export interface ArticleAnalysis {
    mentions: Mention[];
    tokens: number;
    slashForms: number;
    genderWriting: GenderWritingMatch[];
}

/**
 * Mentions plus the per-article text counts reported with the statistics.
 */
export function analyzeArticleText(
    article: Pick<Article, 'id' | 'text'>,
    prnTable: PrnLookupTable,
    annotator: Annotator
): ArticleAnalysis {
    const annotation = annotator.annotate(article.text, { commonNouns: prnTable });
    return {
        mentions: mentionsFromAnnotation(article.id, annotation, prnTable),
        tokens: annotation.tokens.length,
        slashForms: countSlashForms(article.text),
        genderWriting: matchGenderWriting(article.id, annotation.tokens),
    };
}
