/**
 * A candidate entity returned by a knowledge-base name query.
 */
export interface KnowledgeBaseCandidate {
    /** Entity id, e.g. `Q567` */
    id: string;

    /** Display label */
    label: string;

    /** Sex-or-gender value id, e.g. `Q6581072`; absent when not recorded */
    gender?: string;
}

/**
 * Interface for gender lookups against a knowledge base (live Wikidata,
 * cached, fixed fixtures). Implementations may throw on network failure;
 * the resolver turns failures into `undetermined`.
 */
export interface GenderLookup {
    /** Human-readable implementation name */
    readonly name: string;

    /**
     * Query the knowledge base for people with the given name.
     * Returns zero or more candidates.
     */
    lookup(name: string): Promise<KnowledgeBaseCandidate[]>;
}
