import { describe, it, expect } from 'vitest';
import { GenderResolver, MAX_NAME_WORDS, labelFromCandidates } from '../resolver/gender-resolver.js';
import { combineSignals, inferAuthorGenders, pronounSignal } from '../resolver/author-gender.js';
import { PrnTable } from '../prn/prn-table.js';
import { FixtureGenderLookup } from '../sources/fixture.js';
import { RuleBasedAnnotator } from '../nlp/annotator.js';
import { tokenize } from '../nlp/tokenizer.js';
import type { GenderLookup, Mention } from '../types/index.js';

const prnTable = new PrnTable([
    { lemma: 'Lehrerin', gender: 'female', source_url: 'https://example.org/lehrerin' },
    { lemma: 'Lehrer', gender: 'male', source_url: '' },
    { lemma: 'Waise', gender: 'ambiguous', source_url: '' },
]);

function createFixture(): FixtureGenderLookup {
    return new FixtureGenderLookup({
        'Maria Schmidt': [{ id: 'Q1', label: 'Maria Schmidt', gender: 'Q6581072' }],
        Schmidt: [{ id: 'Q1', label: 'Maria Schmidt', gender: 'Q6581072' }],
        'Hans Meier': [{ id: 'Q2', label: 'Hans Meier', gender: 'Q6581097' }],
        'Kim Meier': [
            { id: 'Q3', label: 'Kim Meier', gender: 'Q6581097' },
            { id: 'Q4', label: 'Kim Meier', gender: 'Q6581072' },
        ],
        'Alex Roth': [{ id: 'Q5', label: 'Alex Roth', gender: 'Q48270' }],
        'Lea Stern': [{ id: 'Q6', label: 'Lea Stern', gender: 'Q1052281' }],
        'Langsam Name': { error: 'timeout' },
        'Kaputt Name': { error: 'unavailable' },
    });
}

function mention(overrides: Partial<Mention>): Mention {
    return {
        mention_id: 'a1:0',
        article_id: 'a1',
        kind: 'PRN',
        text: '',
        lemma: '',
        start: 0,
        end: 0,
        sentence: 0,
        canonical_name: null,
        gender: null,
        resolution: null,
        ...overrides,
    };
}

describe('labelFromCandidates', () => {
    it('should leave a name without candidates undetermined', () => {
        expect(labelFromCandidates([])).toEqual({
            gender: 'undetermined',
            resolution: { source: 'unresolved', confidence: 0, detail: null },
        });
    });

    it('should ignore candidates without a recorded gender', () => {
        expect(labelFromCandidates([{ id: 'Q9', label: 'X' }]).gender).toBe('undetermined');
    });
});

describe('GenderResolver', () => {
    describe('people-referencing nouns', () => {
        const resolver = new GenderResolver({ prnTable, lookup: createFixture() });

        it('should take the gender from the PRN table', () => {
            expect(resolver.resolvePrn('Lehrerin')).toEqual({
                gender: 'female',
                resolution: { source: 'prn-table', confidence: 1, detail: 'https://example.org/lehrerin' },
            });
            expect(resolver.resolvePrn('Lehrer').resolution.detail).toBeNull();
            expect(resolver.resolvePrn('Waise').gender).toBe('ambiguous');
        });

        it('should label inclusive forms ambiguous', () => {
            expect(resolver.resolvePrn('Lehrer*innen')).toEqual({
                gender: 'ambiguous',
                resolution: { source: 'inclusive-form', confidence: 1, detail: 'Lehrer*innen' },
            });
        });

        it('should prefer a table entry for an inclusive spelling', () => {
            const overlay = new PrnTable([
                { lemma: 'Kolleg*innen', gender: 'female', source_url: 'https://example.org/manual' },
            ]);
            const withOverlay = new GenderResolver({ prnTable: overlay, lookup: createFixture() });

            expect(withOverlay.resolvePrn('Kolleg*innen')).toEqual({
                gender: 'female',
                resolution: { source: 'prn-table', confidence: 1, detail: 'https://example.org/manual' },
            });
            expect(withOverlay.resolvePrn('Lehrer*innen').resolution.source).toBe('inclusive-form');
        });

        it('should leave unknown lemmas undetermined', () => {
            expect(resolver.resolvePrn('Gast')).toEqual({
                gender: 'undetermined',
                resolution: { source: 'unresolved', confidence: 0, detail: 'lemma not in PRN table' },
            });
        });
    });

    describe('named persons', () => {
        it('should map a single gender value to its label', async () => {
            const resolver = new GenderResolver({ prnTable, lookup: createFixture() });

            expect(await resolver.resolveName('Maria Schmidt')).toEqual({
                gender: 'female',
                resolution: { source: 'knowledge-base', confidence: 1, detail: 'Q6581072' },
            });
            expect((await resolver.resolveName('Hans Meier')).gender).toBe('male');
            expect((await resolver.resolveName('Lea Stern')).gender).toBe('female');
        });

        it('should label conflicting candidates ambiguous', async () => {
            const resolver = new GenderResolver({ prnTable, lookup: createFixture() });

            expect(await resolver.resolveName('Kim Meier')).toEqual({
                gender: 'ambiguous',
                resolution: { source: 'knowledge-base', confidence: 0.5, detail: 'Q6581072,Q6581097' },
            });
        });

        it('should keep a non-binary value as detail', async () => {
            const resolver = new GenderResolver({ prnTable, lookup: createFixture() });

            expect(await resolver.resolveName('Alex Roth')).toEqual({
                gender: 'undetermined',
                resolution: { source: 'knowledge-base', confidence: 0, detail: 'Q48270' },
            });
        });

        it('should degrade lookup failures to undetermined', async () => {
            const resolver = new GenderResolver({ prnTable, lookup: createFixture() });

            expect(await resolver.resolveName('Langsam Name')).toEqual({
                gender: 'undetermined',
                resolution: { source: 'unresolved', confidence: 0, detail: 'HttpError: Request timeout after 0ms' },
            });
            expect((await resolver.resolveName('Kaputt Name')).resolution.detail).toBe(
                'HttpError: HTTP 503: Service Unavailable'
            );
        });

        it('should retry without a possessive s', async () => {
            const lookup = createFixture();
            const resolver = new GenderResolver({ prnTable, lookup });

            expect((await resolver.resolveName('Schmidts')).gender).toBe('female');
            expect(lookup.calls).toEqual(['Schmidts', 'Schmidt']);
        });

        it('should not query names longer than the word limit', async () => {
            const lookup = createFixture();
            const resolver = new GenderResolver({ prnTable, lookup });
            const name = Array.from({ length: MAX_NAME_WORDS + 1 }, (_, i) => `Name${i}`).join(' ');

            expect(await resolver.resolveName(name)).toEqual({
                gender: 'undetermined',
                resolution: { source: 'unresolved', confidence: 0, detail: 'name too long' },
            });
            expect(lookup.calls).toEqual([]);
        });

        it('should look up each distinct name once', async () => {
            const lookup = createFixture();
            const resolver = new GenderResolver({ prnTable, lookup });

            const results = await resolver.resolveNames(['Hans Meier', 'Maria Schmidt', 'Hans Meier']);
            expect([...results.keys()]).toEqual(['Hans Meier', 'Maria Schmidt']);
            expect(lookup.calls).toEqual(['Hans Meier', 'Maria Schmidt']);
        });

        it('should keep no more lookups in flight than the concurrency limit', async () => {
            let active = 0;
            let peak = 0;
            const lookup: GenderLookup = {
                name: 'Slow',
                lookup: async () => {
                    active++;
                    peak = Math.max(peak, active);
                    await new Promise<void>((resolve) => setTimeout(resolve, 5));
                    active--;
                    return [];
                },
            };
            const resolver = new GenderResolver({ prnTable, lookup, concurrency: 2 });

            await resolver.resolveNames(['Name 1', 'Name 2', 'Name 3', 'Name 4', 'Name 5']);
            expect(peak).toBe(2);
        });
    });

    describe('resolveMentions', () => {
        it('should fill gender and resolution without touching the input', async () => {
            const resolver = new GenderResolver({ prnTable, lookup: createFixture() });
            const input = [
                mention({ mention_id: 'a1:0', kind: 'PRN', text: 'Lehrerin', lemma: 'Lehrerin' }),
                mention({
                    mention_id: 'a1:9',
                    kind: 'PER',
                    text: 'Frau Schmidt',
                    lemma: 'Frau Schmidt',
                    canonical_name: 'Maria Schmidt',
                }),
            ];

            const resolved = await resolver.resolveMentions(input);

            expect(resolved.map((m) => [m.mention_id, m.gender, m.resolution?.source])).toEqual([
                ['a1:0', 'female', 'prn-table'],
                ['a1:9', 'female', 'knowledge-base'],
            ]);
            expect(resolved[1]?.text).toBe('Frau Schmidt');
            expect(input.map((m) => m.gender)).toEqual([null, null]);
        });
    });
});

describe('author gender', () => {
    it('should read third-person pronouns', () => {
        expect(pronounSignal(tokenize('Sie lehrt Physik. Ihre Klasse mag sie.'))).toBe('female');
        expect(pronounSignal(tokenize('Er schreibt. Wenden Sie sich an ihn.'))).toBe('male');
        expect(pronounSignal(tokenize('Schreibt über Schulen.'))).toBe('undetermined');
    });

    it('should not read formal address or plural pronouns as female', () => {
        expect(pronounSignal(tokenize('Sie sind herzlich eingeladen.'))).toBe('undetermined');
        expect(pronounSignal(tokenize('Sie finden uns in Berlin.'))).toBe('undetermined');
        expect(pronounSignal(tokenize('Ihr seid gemeint.'))).toBe('undetermined');
        expect(pronounSignal(tokenize('Fragen Sie Ihre Schule.'))).toBe('undetermined');
        expect(pronounSignal(tokenize('Die Kinder sagen, sie lernen gern.'))).toBe('undetermined');
    });

    it('should read a possessive ihr before a noun', () => {
        expect(pronounSignal(tokenize('Das ist ihr Buch.'))).toBe('female');
        expect(pronounSignal(tokenize('Seit 2010 leitet sie die Schule.'))).toBe('female');
    });

    it('should combine cues', () => {
        expect(combineSignals({ knowledgeBase: 'female', pronouns: 'undetermined', nouns: 'female' })).toBe('female');
        expect(combineSignals({ knowledgeBase: 'female', pronouns: 'male', nouns: 'undetermined' })).toBe('ambiguous');
        expect(combineSignals({ knowledgeBase: 'ambiguous', pronouns: 'undetermined', nouns: 'undetermined' })).toBe(
            'ambiguous'
        );
        expect(combineSignals({ knowledgeBase: 'undetermined', pronouns: 'undetermined', nouns: 'undetermined' })).toBe(
            'undetermined'
        );
    });

    it('should infer genders from name, pronouns and nouns', async () => {
        const resolver = new GenderResolver({ prnTable, lookup: createFixture() });
        const annotator = new RuleBasedAnnotator({ givenNames: new Set(['Maria', 'Hans']) });

        const genders = await inferAuthorGenders(
            [
                { id: 'au1', name: 'Maria Schmidt', info: 'Sie ist Lehrerin in Berlin.' },
                { id: 'au2', name: 'Hans Meier', info: null },
                { id: 'au3', name: 'Unbekannt', info: 'Er ist Lehrerin.' },
            ],
            { resolver, prnTable, annotator }
        );

        expect(genders.get('au1')).toEqual({
            authorId: 'au1',
            gender: 'female',
            signals: { knowledgeBase: 'female', pronouns: 'female', nouns: 'female' },
        });
        expect(genders.get('au2')?.gender).toBe('male');
        expect(genders.get('au3')?.gender).toBe('ambiguous');
    });
});
