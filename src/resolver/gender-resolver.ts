import type {
    GenderLabel,
    GenderLookup,
    KnowledgeBaseCandidate,
    Mention,
    PrnEntry,
    Resolution,
} from '../types/index.js';
import { isInclusiveForm } from '../nlp/tokenizer.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Sex-or-gender (P21) values mapped onto binary labels. Anything else
 * (non-binary, intersex, ...) is undetermined and kept in `resolution.detail`.
 */
export const GENDER_IDS: ReadonlyMap<string, 'female' | 'male'> = new Map<string, 'female' | 'male'>([
    ['Q6581072', 'female'],
    ['Q1052281', 'female'], // trans woman
    ['Q6581097', 'male'],
    ['Q2449503', 'male'], // trans man
]);

/** Longer names are not queried */
export const MAX_NAME_WORDS = 12;

/**
 * Read access to the PRN lexicon needed for resolution.
 */
export interface PrnGenderTable {
    get(lemma: string): PrnEntry | undefined;
}

export interface GenderResolverOptions {
    prnTable: PrnGenderTable;
    lookup: GenderLookup;

    /** Knowledge-base lookups in flight */
    concurrency?: number;
}

export interface NameResolution {
    gender: GenderLabel;
    resolution: Resolution;
}

const UNDETERMINED_EMPTY: NameResolution = {
    gender: 'undetermined',
    resolution: { source: 'unresolved', confidence: 0, detail: null },
};

/**
 * Label knowledge-base candidates: one distinct gender value gives that
 * gender, several give ambiguous, none gives undetermined.
 */
export function labelFromCandidates(candidates: readonly KnowledgeBaseCandidate[]): NameResolution {
    const genderIds = [...new Set(candidates.flatMap((candidate) => (candidate.gender ? [candidate.gender] : [])))].sort();
    const [only] = genderIds;

    if (only === undefined) return UNDETERMINED_EMPTY;

    if (genderIds.length > 1) {
        return {
            gender: 'ambiguous',
            resolution: {
                source: 'knowledge-base',
                confidence: 1 / genderIds.length,
                detail: genderIds.join(','),
            },
        };
    }

    const binary = GENDER_IDS.get(only);
    return {
        gender: binary ?? 'undetermined',
        resolution: { source: 'knowledge-base', confidence: binary ? 1 : 0, detail: only },
    };
}

/**
 * Assigns a gender label to every mention. Never throws for lookup
 * failures: they degrade to undetermined and are logged with the name.
 */
export class GenderResolver {
    private readonly prnTable: PrnGenderTable;
    private readonly lookup: GenderLookup;
    private readonly concurrency: number;

    constructor(options: GenderResolverOptions) {
        this.prnTable = options.prnTable;
        this.lookup = options.lookup;
        this.concurrency = options.concurrency ?? 4;
    }

    /**
     * PRN mentions from the table. Inclusive spellings missing from it are
     * ambiguous; an overlay entry for one takes precedence.
     */
    resolvePrn(lemma: string): NameResolution {
        const entry = this.prnTable.get(lemma);
        if (entry) {
            return {
                gender: entry.gender,
                resolution: { source: 'prn-table', confidence: 1, detail: entry.source_url || null },
            };
        }

        if (isInclusiveForm(lemma)) {
            return {
                gender: 'ambiguous',
                resolution: { source: 'inclusive-form', confidence: 1, detail: lemma },
            };
        }

        return {
            gender: 'undetermined',
            resolution: { source: 'unresolved', confidence: 0, detail: 'lemma not in PRN table' },
        };
    }

    /**
     * Resolve one person name against the knowledge base, retrying without a
     * possessive "s" when nothing is found.
     */
    async resolveName(name: string): Promise<NameResolution> {
        const trimmed = name.trim();
        if (!trimmed) return UNDETERMINED_EMPTY;

        if (trimmed.split(/\s+/).length > MAX_NAME_WORDS) {
            logger.info({ name: trimmed }, 'Name exceeds maximum length, left undetermined');
            return {
                gender: 'undetermined',
                resolution: { source: 'unresolved', confidence: 0, detail: 'name too long' },
            };
        }

        let candidates: KnowledgeBaseCandidate[];
        try {
            candidates = await this.lookup.lookup(trimmed);
        } catch (error) {
            logger.warn({ name: trimmed, lookup: this.lookup.name, error: describeError(error) }, 'Gender lookup failed');
            return {
                gender: 'undetermined',
                resolution: { source: 'unresolved', confidence: 0, detail: describeError(error) },
            };
        }

        if (candidates.length === 0 && trimmed.endsWith('s') && trimmed.length > 1) {
            return this.resolveName(trimmed.slice(0, -1));
        }

        const result = labelFromCandidates(candidates);
        if (result.gender === 'undetermined') {
            logger.info({ name: trimmed, candidates: candidates.length, detail: result.resolution.detail }, 'Named person unresolved');
        }
        return result;
    }

    /**
     * Resolve many names with a bounded pool. Each distinct name is looked up once.
     */
    async resolveNames(names: Iterable<string>): Promise<Map<string, NameResolution>> {
        const unique = [...new Set(names)];
        const results = await mapWithConcurrency(unique, this.concurrency, (name) => this.resolveName(name));
        return new Map(unique.map((name, index) => [name, results[index] ?? UNDETERMINED_EMPTY]));
    }

    /**
     * Return copies of the mentions with `gender` and `resolution` filled in.
     * Everything else is left as extracted.
     */
    async resolveMentions(mentions: readonly Mention[]): Promise<Mention[]> {
        const names = mentions.flatMap((mention) =>
            mention.kind === 'PER' ? [mention.canonical_name ?? mention.text] : []
        );
        const byName = await this.resolveNames(names);

        return mentions.map((mention) => {
            const resolved =
                mention.kind === 'PRN'
                    ? this.resolvePrn(mention.lemma)
                    : (byName.get(mention.canonical_name ?? mention.text) ?? UNDETERMINED_EMPTY);
            return { ...mention, gender: resolved.gender, resolution: resolved.resolution };
        });
    }
}
