import type { DictionaryEntry } from './wikitext.js';
import { extractWordForms } from './wikitext.js';

/**
 * A gendered people-referencing noun proposed by one dictionary entry.
 */
export interface PrnCandidate {
    lemma: string;
    gender: 'female' | 'male';

    /** Title of the page the candidate was read from */
    source: string;
}

/**
 * Result of applying a single rule.
 * `pass` hands the entry to the next rule.
 */
export type RuleOutcome =
    | { kind: 'reject'; reason: string }
    | { kind: 'pass' }
    | { kind: 'classify'; candidates: PrnCandidate[] };

/**
 * One classification heuristic: a pure function over a dictionary entry.
 */
export interface ClassificationRule {
    id: string;
    description: string;
    apply(entry: DictionaryEntry): RuleOutcome;
}

/**
 * Outcome of running the full rule list over one entry.
 */
export type ClassificationResult =
    | { status: 'classified'; ruleId: string; candidates: PrnCandidate[] }
    | { status: 'rejected'; ruleId: string; reason: string }
    | { status: 'unclassified' };

const FEMALE_FORMS = 'Weibliche Wortformen';
const MALE_FORMS = 'Männliche Wortformen';

/** Hypernym fragments that mark animal or fable-creature nouns */
export const NON_HUMAN_TERMS = ['tier', 'vogel', 'stute', 'hengst', 'pferd', 'fabelwesen'];

/** Parts of speech that disqualify a noun (proper names) */
const NAME_TAGS = new Set(['Nachname', 'Vorname']);

const PASS: RuleOutcome = { kind: 'pass' };

function sectionForms(entry: DictionaryEntry, section: string): string[] {
    const body = entry.sections[section];
    return body ? extractWordForms(body) : [];
}

/**
 * Nominative plural forms from the inflection table (`Nominativ Plural`,
 * `Nominativ Plural 1`, ...).
 */
export function nominativePlurals(entry: DictionaryEntry): string[] {
    return Object.entries(entry.flexion)
        .filter(([key]) => key.startsWith('Nominativ Plural'))
        .flatMap(([, value]) => extractWordForms(value));
}

/**
 * Candidates for a headword whose gender is known: the headword and its
 * plurals get `gender`, the listed counterpart forms get the other one.
 */
function headwordWithCounterparts(
    entry: DictionaryEntry,
    gender: 'female' | 'male',
    counterparts: string[]
): PrnCandidate[] {
    const other: 'female' | 'male' = gender === 'female' ? 'male' : 'female';
    return [
        { lemma: entry.title, gender, source: entry.title },
        ...nominativePlurals(entry).map((lemma) => ({ lemma, gender, source: entry.title })),
        ...counterparts.map((lemma) => ({ lemma, gender: other, source: entry.title })),
    ];
}

/**
 * The ordered rule list. Rejection rules come first; the first rule that
 * classifies wins. Exported so each rule can be tested in isolation.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        id: 'german-language',
        description: 'Only entries of the German language section are considered',
        apply: (entry) =>
            entry.language === 'Deutsch'
                ? PASS
                : { kind: 'reject', reason: `language ${entry.language}` },
    },
    {
        id: 'common-noun',
        description: 'The first part of speech must be Substantiv and the entry must not be a name',
        apply: (entry) => {
            if (entry.partsOfSpeech[0] !== 'Substantiv') {
                return { kind: 'reject', reason: `part of speech ${entry.partsOfSpeech[0] ?? 'none'}` };
            }
            if (entry.partsOfSpeech.some((pos) => NAME_TAGS.has(pos))) {
                return { kind: 'reject', reason: 'proper name' };
            }
            return PASS;
        },
    },
    {
        id: 'non-human-hypernym',
        description: 'Hypernyms (or hyponyms when there are none) must not point at animals or fable creatures',
        apply: (entry) => {
            const related = entry.sections['Oberbegriffe'] || entry.sections['Unterbegriffe'];
            if (!related) return PASS;
            const lower = related.toLowerCase();
            const hit = NON_HUMAN_TERMS.find((term) => lower.includes(term));
            return hit ? { kind: 'reject', reason: `non-human hypernym "${hit}"` } : PASS;
        },
    },
    {
        id: 'female-counterpart',
        description: 'An entry listing female word forms but no male ones is male; the listed forms are female',
        apply: (entry) => {
            const female = sectionForms(entry, FEMALE_FORMS);
            if (female.length === 0 || sectionForms(entry, MALE_FORMS).length > 0) return PASS;
            return { kind: 'classify', candidates: headwordWithCounterparts(entry, 'male', female) };
        },
    },
    {
        id: 'male-counterpart',
        description: 'An entry listing male word forms but no female ones is female; the listed forms are male',
        apply: (entry) => {
            const male = sectionForms(entry, MALE_FORMS);
            if (male.length === 0 || sectionForms(entry, FEMALE_FORMS).length > 0) return PASS;
            return { kind: 'classify', candidates: headwordWithCounterparts(entry, 'female', male) };
        },
    },
    {
        id: 'gloss-marker',
        description: 'Without counterpart sections, a first sense reading "weibliche/männliche Person" decides',
        apply: (entry) => {
            if (entry.sections[FEMALE_FORMS] || entry.sections[MALE_FORMS]) return PASS;
            const firstSense = (entry.sections['Bedeutungen'] ?? '').split('\n')[0] ?? '';
            if (/weibliche Person/i.test(firstSense)) {
                return { kind: 'classify', candidates: headwordWithCounterparts(entry, 'female', []) };
            }
            if (/männliche Person/i.test(firstSense)) {
                return { kind: 'classify', candidates: headwordWithCounterparts(entry, 'male', []) };
            }
            return PASS;
        },
    },
];

/**
 * Run the rule list over one entry. Entries no rule classifies are reported
 * as unclassified and must be dropped by the caller, never defaulted.
 */
export function classifyEntry(
    entry: DictionaryEntry,
    rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ClassificationResult {
    for (const rule of rules) {
        const outcome = rule.apply(entry);
        if (outcome.kind === 'reject') {
            return { status: 'rejected', ruleId: rule.id, reason: outcome.reason };
        }
        if (outcome.kind === 'classify') {
            return { status: 'classified', ruleId: rule.id, candidates: outcome.candidates };
        }
    }
    return { status: 'unclassified' };
}
