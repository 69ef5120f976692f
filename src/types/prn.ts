/**
 * Gender stored in the PRN table. Undetermined is not a table value:
 * nouns without a gender signal are dropped at compile time.
 */
export type PrnGender = 'female' | 'male' | 'ambiguous';

/**
 * One row of the people-referencing-noun list.
 */
export interface PrnEntry {
    lemma: string;
    gender: PrnGender;

    /** Provenance: dictionary page URL(s), `; `-separated */
    source_url: string;
}

/**
 * What to do with a lemma that entries claim for both genders.
 */
export type PrnConflictPolicy = 'ambiguous' | 'drop';
