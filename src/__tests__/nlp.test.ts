import { describe, it, expect } from 'vitest';
import { countSlashForms, isInclusiveForm, tokenize } from '../nlp/tokenizer.js';
import { RuleBasedAnnotator, isNameToken, loadCommonNouns, loadGivenNames, loadSurnames } from '../nlp/annotator.js';
import { analyzeArticleText, extractMentions, lemmatizeNoun, mentionsFromAnnotation } from '../nlp/mention-extraction.js';
import {
    GENDER_WRITING_PATTERNS,
    countGenderWriting,
    genderWritingKinds,
    matchGenderWriting,
} from '../nlp/gender-writing.js';
import { GENDER_WRITING_KINDS } from '../types/index.js';

const annotator = new RuleBasedAnnotator({
    givenNames: new Set(['Anna', 'Hans', 'Maria']),
    surnames: new Set(['Schmidt']),
});

function words(text: string): string[] {
    return tokenize(text).map((token) => token.text);
}

describe('tokenize', () => {
    it('should keep gender-inclusive forms as single tokens', () => {
        expect(words('Lehrer*innen, Lehrer:innen, Lehrer_innen, Lehrer/-innen und Lehrer(innen)')).toEqual([
            'Lehrer*innen',
            'Lehrer:innen',
            'Lehrer_innen',
            'Lehrer/-innen',
            'und',
            'Lehrer(innen)',
        ]);
    });

    it('should report offsets into the source text', () => {
        const text = 'Die  Schüler-Vertretung tagt.';
        for (const token of tokenize(text)) {
            expect(text.slice(token.start, token.end)).toBe(token.text);
        }
        expect(words(text)).toEqual(['Die', 'Schüler-Vertretung', 'tagt']);
    });

    it('should not split sentences after abbreviations or ordinals', () => {
        const tokens = tokenize('Das ist gut. Dann kam Dr. Müller am 3. Mai. Ende');

        expect(tokens.map((token) => [token.text, token.sentence])).toEqual([
            ['Das', 0],
            ['ist', 0],
            ['gut', 0],
            ['Dann', 1],
            ['kam', 1],
            ['Dr.', 1],
            ['Müller', 1],
            ['am', 1],
            ['3', 1],
            ['Mai', 1],
            ['Ende', 2],
        ]);
        expect(tokens.filter((token) => token.sentenceStart).map((token) => token.text)).toEqual(['Das', 'Dann', 'Ende']);
    });

    it('should start a new sentence at a blank line', () => {
        expect(tokenize('Titel\n\nerster Absatz').map((token) => token.sentence)).toEqual([0, 1, 1]);
    });

    it('should return nothing for empty text', () => {
        expect(tokenize('')).toEqual([]);
    });
});

describe('isInclusiveForm', () => {
    it.each(['Lehrer*innen', 'Lehrer:innen', 'Lehrer_innen', 'Lehrer/-innen', 'Lehrer(innen)', 'LehrerInnen'])(
        'should recognize %s',
        (word) => {
            expect(isInclusiveForm(word)).toBe(true);
        }
    );

    it.each(['Lehrerin', 'Lehrer', 'lehrer*innen', 'Studierende'])('should reject %s', (word) => {
        expect(isInclusiveForm(word)).toBe(false);
    });
});

describe('countSlashForms', () => {
    it('should count slashes followed by a word', () => {
        expect(countSlashForms('Lehrer/innen und/oder Kolleg/ Kollegin')).toBe(3);
        expect(countSlashForms('keine Schrägstriche')).toBe(0);
    });
});

describe('RuleBasedAnnotator', () => {
    it('should recognize a given name with its surname', () => {
        const { entities } = annotator.annotate('Die Lehrerin Maria Schmidt unterrichtet Physik.');

        expect(entities).toEqual([
            {
                label: 'PER',
                text: 'Maria Schmidt',
                start: 13,
                end: 26,
                tokenStart: 2,
                tokenEnd: 4,
                sentence: 0,
                canonicalName: 'Maria Schmidt',
            },
        ]);
    });

    it('should resolve later surname mentions to the full name', () => {
        const { entities } = annotator.annotate('Maria Schmidt kam. Schmidts Rede war kurz. Frau Schmidt lachte.');

        expect(entities.map((entity) => [entity.text, entity.canonicalName])).toEqual([
            ['Maria Schmidt', 'Maria Schmidt'],
            ['Schmidts', 'Maria Schmidt'],
            ['Frau Schmidt', 'Maria Schmidt'],
        ]);
    });

    it('should open a span at an honorific', () => {
        const { entities } = annotator.annotate('Gestern sprach Prof. Dr. Weber.');
        expect(entities.map((entity) => [entity.text, entity.canonicalName])).toEqual([['Prof. Dr. Weber', 'Weber']]);
    });

    it('should take nobiliary particles only before a name', () => {
        expect(annotator.annotate('Anna von der Leyen sprach.').entities.map((entity) => entity.text)).toEqual([
            'Anna von der Leyen',
        ]);
        expect(annotator.annotate('Hans von sprach.').entities.map((entity) => entity.text)).toEqual(['Hans']);
    });

    it('should not extend a name across sentences', () => {
        const { entities } = annotator.annotate('Das sagte Maria. Schmidt kam später.');
        expect(entities.map((entity) => entity.text)).toEqual(['Maria']);
    });

    it('should cap spans at five tokens', () => {
        const { entities } = annotator.annotate('Anna Maria Luise Sophie Charlotte Friederike Müller');
        expect(entities.map((entity) => entity.text)).toEqual(['Anna Maria Luise Sophie Charlotte']);
    });

    it('should accept hyphenated names', () => {
        expect(isNameToken('Müller-Lüdenscheidt')).toBe(true);
        expect(isNameToken('MÜLLER')).toBe(false);
        expect(annotator.annotate('Anna-Lena Berg kam.').entities.map((entity) => entity.text)).toEqual(['Anna-Lena Berg']);
    });

    it('should open a span at a form of address only before a known name', () => {
        const names = (text: string) => annotator.annotate(text).entities.map((entity) => entity.text);

        expect(names('Frau Schmidt kam.')).toEqual(['Frau Schmidt']);
        expect(names('Herr Hans Berg kam.')).toEqual(['Herr Hans Berg']);
        expect(names('Für jede Frau Deutschlands gilt das.')).toEqual([]);
    });

    it('should stop a name at a common noun', () => {
        const withNouns = new RuleBasedAnnotator({ givenNames: new Set(['Anna']), commonNouns: new Set(['Physik']) });

        expect(withNouns.annotate('Gestern hat Anna Physik unterrichtet.').entities.map((entity) => entity.text)).toEqual([
            'Anna',
        ]);
        expect(
            withNouns
                .annotate('Anna Chemie lernt.', { commonNouns: new Set(['Chemie']) })
                .entities.map((entity) => entity.text)
        ).toEqual(['Anna']);
        expect(withNouns.annotate('Anna Berg lernt.').entities.map((entity) => entity.text)).toEqual(['Anna Berg']);
    });

    it('should load the bundled gazetteer', () => {
        const names = loadGivenNames();
        expect(names.has('Maria')).toBe(true);
        expect(names.has('Lehrerin')).toBe(false);
    });

    it('should load the bundled surname and common-noun lists', () => {
        expect(loadSurnames().has('Weber')).toBe(true);
        expect(loadCommonNouns().has('Physik')).toBe(true);

        const bundled = RuleBasedAnnotator.fromFile();
        expect(bundled.annotate('Gestern hat Anna Physik unterrichtet.').entities.map((entity) => entity.text)).toEqual([
            'Anna',
        ]);
        expect(bundled.annotate('Dann sprach Frau Weber.').entities.map((entity) => entity.text)).toEqual(['Frau Weber']);
    });
});

describe('lemmatizeNoun', () => {
    const table = new Set(['Lehrer', 'Lehrerin', 'Kollege']);
    const isKnown = (lemma: string) => table.has(lemma);

    it('should match the surface form first', () => {
        expect(lemmatizeNoun('Lehrerin', isKnown)).toBe('Lehrerin');
    });

    it('should strip dative and genitive endings', () => {
        expect(lemmatizeNoun('Lehrern', isKnown)).toBe('Lehrer');
        expect(lemmatizeNoun('Lehrers', isKnown)).toBe('Lehrer');
        expect(lemmatizeNoun('Kollegen', isKnown)).toBe('Kollege');
    });

    it('should fall back to the last hyphen segment', () => {
        expect(lemmatizeNoun('Grundschul-Lehrerin', isKnown)).toBe('Lehrerin');
    });

    it('should return null for unknown words', () => {
        expect(lemmatizeNoun('Physik', isKnown)).toBeNull();
    });
});

describe('mention extraction', () => {
    const prnTable = new Set(['Lehrerin', 'Lehrer', 'Schmidt']);

    it('should emit PRN and PER mentions in text order', () => {
        const article = { id: 'a1', text: 'Die Lehrerin Maria Schmidt unterrichtet Physik.' };
        const mentions = [...extractMentions(article, prnTable, annotator)];

        expect(mentions).toEqual([
            {
                mention_id: 'a1:4',
                article_id: 'a1',
                kind: 'PRN',
                text: 'Lehrerin',
                lemma: 'Lehrerin',
                start: 4,
                end: 12,
                sentence: 0,
                canonical_name: null,
                gender: null,
                resolution: null,
            },
            {
                mention_id: 'a1:13',
                article_id: 'a1',
                kind: 'PER',
                text: 'Maria Schmidt',
                lemma: 'Maria Schmidt',
                start: 13,
                end: 26,
                sentence: 0,
                canonical_name: 'Maria Schmidt',
                gender: null,
                resolution: null,
            },
        ]);
    });

    it('should never count a token inside a PER span as PRN', () => {
        const mentions = mentionsFromAnnotation('a2', annotator.annotate('Maria Schmidt kam.'), prnTable);
        expect(mentions.map((mention) => [mention.kind, mention.text])).toEqual([['PER', 'Maria Schmidt']]);
    });

    it('should use inclusive forms as their own lemma', () => {
        const mentions = mentionsFromAnnotation('a3', annotator.annotate('Alle Lehrer*innen kamen.'), new Set<string>());
        expect(mentions.map((mention) => [mention.kind, mention.lemma])).toEqual([['PRN', 'Lehrer*innen']]);
    });

    it('should yield the same sequence on every iteration', () => {
        const article = { id: 'a4', text: 'Maria Schmidt und der Lehrer trafen Schmidts Kollegin.' };
        expect([...extractMentions(article, prnTable, annotator)]).toEqual([
            ...extractMentions(article, prnTable, annotator),
        ]);
    });

    it('should keep nouns after a form of address as PRN mentions', () => {
        const table = new Set(['Frau', 'Mann']);
        const kinds = (text: string) =>
            analyzeArticleText({ id: 'a6', text }, table, annotator).mentions.map((mention) => [
                mention.kind,
                mention.text,
            ]);

        expect(kinds('Für jede Frau Deutschlands gilt das.')).toEqual([['PRN', 'Frau']]);
        expect(kinds('Ob Mann oder Frau Karriere machen, ist offen.')).toEqual([
            ['PRN', 'Mann'],
            ['PRN', 'Frau'],
        ]);
    });

    it('should not take a PRN lemma into a name', () => {
        const table = new Set(['Lehrerin']);
        const { mentions } = analyzeArticleText({ id: 'a7', text: 'Heute kam Anna Lehrerin mit.' }, table, annotator);

        expect(mentions.map((mention) => [mention.kind, mention.text])).toEqual([
            ['PER', 'Anna'],
            ['PRN', 'Lehrerin'],
        ]);
    });

    it('should report token and slash-form counts', () => {
        const analysis = analyzeArticleText({ id: 'a5', text: 'Lehrer/innen und Schüler kamen.' }, prnTable, annotator);
        expect(analysis.tokens).toBe(4);
        expect(analysis.slashForms).toBe(1);
        expect(analysis.mentions.map((mention) => mention.lemma)).toEqual(['Lehrer/innen']);
        expect(analysis.genderWriting).toEqual([{ article_id: 'a5', kind: 'binary', term: 'Lehrer/innen', count: 1 }]);
    });
});

describe('gender writing', () => {
    it('should list one pattern per kind', () => {
        expect(GENDER_WRITING_PATTERNS.map((entry) => entry.kind)).toEqual(GENDER_WRITING_KINDS);
    });

    it('should match binary pair forms', () => {
        for (const word of ['LehrerInnen', 'KollegIn', 'Lehrer/innen', 'Lehrer/-in', 'Lehrer(innen)', 'JedeR']) {
            expect(genderWritingKinds(word)).toEqual(['binary']);
        }
        expect(genderWritingKinds('Lehrerin')).toEqual([]);
        expect(genderWritingKinds('Berlin')).toEqual([]);
    });

    it('should match gender star, gap and colon forms', () => {
        for (const word of ['Lehrer*innen', 'Lehrer_in', 'Schüler:innen', 'Jede:r']) {
            expect(genderWritingKinds(word)).toEqual(['inclusive']);
        }
        expect(genderWritingKinds('und*innen')).toEqual([]);
    });

    it('should match neopronouns regardless of case', () => {
        for (const word of ['hen', 'Xier', 'sie*er', 'sier', 'they']) {
            expect(genderWritingKinds(word)).toEqual(['neopronoun']);
        }
        expect(genderWritingKinds('sie')).toEqual([]);
        expect(genderWritingKinds('Sieger')).toEqual([]);
    });

    it('should match terms for gender conceptions beyond the binary', () => {
        const terms = ['Transfrau', 'trans', 'intergeschlechtlich', 'nicht-binär', 'Genderqueer', 'LGBTQ', 'Heteronormativität'];
        for (const word of terms) {
            expect(genderWritingKinds(word)).toEqual(['genderConception']);
        }
        for (const word of ['Transport', 'Internet', 'Interesse']) {
            expect(genderWritingKinds(word)).toEqual([]);
        }
    });

    it('should count matched terms per article by kind', () => {
        const tokens = tokenize('Die LehrerInnen und Lehrer*innen trafen Lehrer*innen. Xier ist queer.');
        const matches = matchGenderWriting('a1', tokens);

        expect(matches).toEqual([
            { article_id: 'a1', kind: 'binary', term: 'LehrerInnen', count: 1 },
            { article_id: 'a1', kind: 'inclusive', term: 'Lehrer*innen', count: 2 },
            { article_id: 'a1', kind: 'neopronoun', term: 'Xier', count: 1 },
            { article_id: 'a1', kind: 'genderConception', term: 'queer', count: 1 },
        ]);
        expect(countGenderWriting(matches)).toEqual({ binary: 1, inclusive: 2, neopronoun: 1, genderConception: 1 });
    });
});
