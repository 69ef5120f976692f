import { describe, it, expect } from 'vitest';
import { aggregate, summarizeConnotation, type AggregationInput } from '../stats/aggregator.js';
import { ConnotationLexicon, parseConnotationLexicon } from '../lexicon/connotation.js';
import type { GenderLabel, Mention, MentionKind } from '../types/index.js';

let offset = 0;

function mention(articleId: string, kind: MentionKind, lemma: string, gender: GenderLabel | null): Mention {
    offset += 10;
    return {
        mention_id: `${articleId}:${offset}`,
        article_id: articleId,
        kind,
        text: lemma,
        lemma,
        start: offset,
        end: offset + lemma.length,
        sentence: 0,
        canonical_name: kind === 'PER' ? lemma : null,
        gender,
        resolution: null,
    };
}

const lexicon = new ConnotationLexicon(
    new Map([
        ['Lehrerin', { valence: 1, arousal: 2, imageability: 3, concreteness: 4 }],
        ['Lehrer', { valence: -1, arousal: 0, imageability: 1, concreteness: 2 }],
    ])
);

function createInput(): AggregationInput {
    return {
        volumes: [
            { id: 'v1', title: 'Heft 1', published_date: '2020-01-01' },
            { id: 'v2', title: 'Heft 2', published_date: null },
        ],
        authors: [
            { id: 'au1', name: 'Maria Schmidt', info: null },
            { id: 'au2', name: 'Hans Meier', info: null },
        ],
        articles: [
            { id: 'a1', volume_id: 'v1', title: 'Schule', text: '', author_ids: ['au1', 'au2'] },
            { id: 'a2', volume_id: 'v1', title: 'Unterricht', text: '', author_ids: ['au1'] },
            { id: 'a3', volume_id: 'v1', title: 'Leer', text: '', author_ids: [] },
        ],
        mentions: [
            mention('a1', 'PRN', 'Lehrerin', 'female'),
            mention('a1', 'PER', 'Maria Schmidt', 'female'),
            mention('a1', 'PRN', 'Lehrer', 'male'),
            mention('a1', 'PRN', 'Gast', 'undetermined'),
            mention('a1', 'PRN', 'Lehrer*innen', 'ambiguous'),
            mention('a2', 'PRN', 'Lehrerin', 'female'),
            mention('ghost', 'PRN', 'Lehrer', 'male'),
        ],
        textStats: new Map([
            ['a1', { tokens: 120, slashForms: 2, genderWriting: { binary: 2, inclusive: 1, neopronoun: 0, genderConception: 0 } }],
            ['a2', { tokens: 40, slashForms: 0, genderWriting: { binary: 0, inclusive: 3, neopronoun: 1, genderConception: 1 } }],
        ]),
        authorGenders: new Map<string, GenderLabel>([['au1', 'female']]),
    };
}

describe('summarizeConnotation', () => {
    it('should average scored mentions and count the rest as no-score', () => {
        const summary = summarizeConnotation(createInput().mentions, 'female', lexicon);

        expect(summary).toEqual({
            means: { valence: 1, arousal: 2, imageability: 3, concreteness: 4 },
            scored: 2,
            noScore: 1,
        });
    });

    it('should report null means when nothing was scored', () => {
        expect(summarizeConnotation([], 'male', lexicon).means).toEqual({
            valence: null,
            arousal: null,
            imageability: null,
            concreteness: null,
        });
    });
});

describe('aggregate', () => {
    it('should count labels overall and per kind for each article', () => {
        const [a1] = aggregate(createInput(), lexicon, 'article');

        expect(a1).toMatchObject({
            groupBy: 'article',
            key: 'a1',
            label: 'Schule',
            total: 5,
            counts: { female: 2, male: 1, undetermined: 1, ambiguous: 1 },
            perCounts: { female: 1, male: 0, undetermined: 0, ambiguous: 0 },
            prnCounts: { female: 1, male: 1, undetermined: 1, ambiguous: 1 },
            proportions: { female: 0.4, male: 0.2, undetermined: 0.2, ambiguous: 0.2 },
            tokens: 120,
            slashForms: 2,
            inferredGender: null,
        });
        expect(a1?.femaleShare).toBeCloseTo(2 / 3);
        expect(a1?.connotation.female).toEqual({
            means: { valence: 1, arousal: 2, imageability: 3, concreteness: 4 },
            scored: 1,
            noScore: 1,
        });
        expect(a1?.connotation.male.means.valence).toBe(-1);
    });

    it('should keep groups without mentions', () => {
        const records = aggregate(createInput(), lexicon, 'article');
        const a3 = records.find((record) => record.key === 'a3');

        expect(records.map((record) => record.key)).toEqual(['a1', 'a2', 'a3']);
        expect(a3).toMatchObject({
            total: 0,
            counts: { female: 0, male: 0, undetermined: 0, ambiguous: 0 },
            proportions: { female: null, male: null, undetermined: null, ambiguous: null },
            femaleShare: null,
            tokens: null,
        });
    });

    it('should group by volume', () => {
        const records = aggregate(createInput(), lexicon, 'volume');

        expect(records.map((record) => [record.key, record.label, record.total, record.femaleShare])).toEqual([
            ['v1', 'Heft 1', 6, 0.75],
            ['v2', 'Heft 2', 0, null],
        ]);
    });

    it('should sum gender-writing counts over each group', () => {
        const input = createInput();

        expect(aggregate(input, lexicon, 'article').map((record) => [record.key, record.genderWriting])).toEqual([
            ['a1', { binary: 2, inclusive: 1, neopronoun: 0, genderConception: 0 }],
            ['a2', { binary: 0, inclusive: 3, neopronoun: 1, genderConception: 1 }],
            ['a3', null],
        ]);
        expect(aggregate(input, lexicon, 'volume').map((record) => [record.key, record.genderWriting])).toEqual([
            ['v1', { binary: 2, inclusive: 4, neopronoun: 1, genderConception: 1 }],
            ['v2', { binary: 0, inclusive: 0, neopronoun: 0, genderConception: 0 }],
        ]);
        expect(aggregate(input, lexicon, 'author').map((record) => [record.key, record.genderWriting])).toEqual([
            ['au1', { binary: 2, inclusive: 4, neopronoun: 1, genderConception: 1 }],
            ['au2', { binary: 2, inclusive: 1, neopronoun: 0, genderConception: 0 }],
        ]);
    });

    it('should leave gender-writing counts null without text statistics', () => {
        const input: AggregationInput = { ...createInput(), textStats: undefined };
        expect(aggregate(input, lexicon, 'volume')[0]?.genderWriting).toBeNull();
    });

    it('should count a mention once for each author of its article', () => {
        const records = aggregate(createInput(), lexicon, 'author');

        expect(records.map((record) => [record.key, record.total, record.inferredGender])).toEqual([
            ['au1', 6, 'female'],
            ['au2', 5, null],
        ]);
    });

    it('should count unresolved mentions as undetermined', () => {
        const input = { ...createInput(), mentions: [mention('a2', 'PRN', 'Lehrer', null)] };
        const a2 = aggregate(input, lexicon, 'article').find((record) => record.key === 'a2');

        expect(a2?.counts.undetermined).toBe(1);
        expect(a2?.femaleShare).toBeNull();
    });

    it('should add volumes and authors referenced only by articles', () => {
        const input: AggregationInput = {
            volumes: [],
            authors: [],
            articles: [{ id: 'a9', volume_id: 'v9', title: 'Allein', text: '', author_ids: ['au9', 'au9'] }],
            mentions: [mention('a9', 'PRN', 'Lehrer', 'male')],
        };

        expect(aggregate(input, lexicon, 'volume').map((record) => [record.key, record.label, record.total])).toEqual([
            ['v9', 'v9', 1],
        ]);
        expect(aggregate(input, lexicon, 'author').map((record) => [record.key, record.total])).toEqual([['au9', 1]]);
    });

    it('should skip mentions of unknown articles', () => {
        const records = aggregate(createInput(), lexicon, 'volume');
        expect(records.reduce((sum, record) => sum + record.total, 0)).toBe(6);
    });
});

describe('ConnotationLexicon', () => {
    it('should locate columns by header name', () => {
        const parsed = parseConnotationLexicon(
            'Word;Arousal;Valence;Imageability;Concreteness\nLehrerin;2,5;1.5;4;3\nArzt;n/a;1;1;1\n'
        );

        expect(parsed.size).toBe(1);
        expect(parsed.get('Lehrerin')).toEqual({ valence: 1.5, arousal: 2.5, imageability: 4, concreteness: 3 });
        expect(parsed.get('Arzt')).toBeUndefined();
    });

    it('should fall back to the positional column order', () => {
        const parsed = parseConnotationLexicon('lehrer;1;2;3;4\n');
        expect(parsed.get('lehrer')).toEqual({ arousal: 1, valence: 2, imageability: 3, concreteness: 4 });
    });

    it('should try the lower-cased lemma', () => {
        const parsed = parseConnotationLexicon('lehrer;1;2;3;4\n');
        expect(parsed.get('Lehrer')?.valence).toBe(2);
    });

    it('should skip rows with empty cells', () => {
        expect(parseConnotationLexicon('Word;Arousal;Valence;Imageability;Concreteness\nGast;1;;1;1\n').size).toBe(0);
    });
});
