import { z } from 'zod';
import type { GenderLookup, KnowledgeBaseCandidate } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const DEFAULT_ENDPOINT = 'https://query.wikidata.org/sparql';
const ENTITY_PREFIX = 'http://www.wikidata.org/entity/';

/**
 * SPARQL JSON results, restricted to the variables the queries select.
 */
const bindingValue = z.object({ value: z.string() });
const sparqlResponseSchema = z.object({
    results: z.object({
        bindings: z.array(
            z.object({
                item: bindingValue,
                itemLabel: bindingValue.optional(),
                gender: bindingValue.optional(),
            })
        ),
    }),
});

type SparqlBinding = z.infer<typeof sparqlResponseSchema>['results']['bindings'][number];

function literal(value: string, language: 'de' | 'en' = 'de'): string {
    return `"${value.replace(/["\\]/g, '')}"@${language}`;
}

function entityId(uri: string): string {
    return uri.startsWith(ENTITY_PREFIX) ? uri.slice(ENTITY_PREFIX.length) : uri;
}

/**
 * Surname candidates: every word after the first, plus compound surnames
 * with lowercase particles ("von der Leyen", "de Gaulle").
 */
export function surnameCandidates(words: readonly string[]): string[] {
    const surnames = words.slice(1);
    const last = words[words.length - 1];
    const second = words[words.length - 2];
    const third = words[words.length - 3];

    if (words.length > 2 && last && second && /^\p{Ll}/u.test(second)) {
        const compound = `${second} ${last}`;
        surnames.push(third && /^\p{Ll}/u.test(third) ? `${third} ${compound}` : compound);
    }
    return surnames;
}

/**
 * First stage: humans whose given name (P735), birth name (P1449) or
 * pseudonym (P742) and family name (P734) match the name's parts.
 * Returns null for single-word names, which have no parts to match.
 */
export function buildNamePartsQuery(name: string): string | null {
    const words = name.trim().split(/\s+/);
    if (words.length < 2) return null;

    const givenNames = words.slice(0, -1).map((word) => literal(word)).join(' ');
    const surnames = surnameCandidates(words)
        .map((word) => literal(word))
        .join(' ');

    return `SELECT ?item ?itemLabel ?gender WHERE {
    ?item wdt:P31 wd:Q5 .
    VALUES ?surname { ${surnames} }
    ?item wdt:P734 ?surnameItem .
    ?surnameItem rdfs:label|skos:altLabel ?surname .
    VALUES ?givenProperty { wdt:P735 wdt:P1449 wdt:P742 }
    VALUES ?givenName { ${givenNames} }
    ?item ?givenProperty ?givenItem .
    ?givenItem rdfs:label|skos:altLabel ?givenName .
    ?item wdt:P21 ?gender .
    SERVICE wikibase:label { bd:serviceParam wikibase:language "[AUTO_LANGUAGE],de". }
}
LIMIT 100`;
}

/**
 * Second stage: humans whose label or alias is exactly the name, in German or English.
 */
export function buildLabelQuery(name: string): string {
    const trimmed = name.trim();
    return `SELECT ?item ?itemLabel ?gender WHERE {
    ?item wdt:P31 wd:Q5 .
    VALUES ?label { ${literal(trimmed, 'de')} ${literal(trimmed, 'en')} }
    ?item rdfs:label|skos:altLabel ?label .
    ?item wdt:P21 ?gender .
    SERVICE wikibase:label { bd:serviceParam wikibase:language "[AUTO_LANGUAGE],de". }
}
LIMIT 100`;
}

/**
 * One candidate per (entity, gender) pair, in response order.
 */
export function toCandidates(bindings: readonly SparqlBinding[]): KnowledgeBaseCandidate[] {
    const seen = new Set<string>();
    const candidates: KnowledgeBaseCandidate[] = [];

    for (const binding of bindings) {
        const id = entityId(binding.item.value);
        const gender = binding.gender ? entityId(binding.gender.value) : undefined;
        const key = `${id}|${gender ?? ''}`;
        if (seen.has(key)) continue;
        seen.add(key);

        candidates.push({ id, label: binding.itemLabel?.value ?? id, ...(gender ? { gender } : {}) });
    }
    return candidates;
}

function hasSingleGender(candidates: readonly KnowledgeBaseCandidate[]): boolean {
    return new Set(candidates.map((candidate) => candidate.gender)).size === 1;
}

/**
 * Live lookup against the Wikidata SPARQL endpoint.
 *
 * Two stages: a match on the name's parts first; when that finds nothing
 * or disagrees on gender, an exact label/alias match. If the label query
 * finds nothing, the first stage's candidates are kept.
 *
 * @see https://query.wikidata.org/
 */
export class WikidataGenderLookup implements GenderLookup {
    readonly name = 'Wikidata';
    private httpClient: HttpClient;
    private readonly endpoint: string;
    private readonly timeoutMs: number | undefined;

    constructor(options: { endpoint?: string; timeoutMs?: number } = {}) {
        this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
        this.timeoutMs = options.timeoutMs;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async lookup(name: string): Promise<KnowledgeBaseCandidate[]> {
        const partsQuery = buildNamePartsQuery(name);
        const byParts = partsQuery ? await this.query(partsQuery) : [];

        if (byParts.length > 0 && hasSingleGender(byParts)) {
            logger.debug({ name, candidates: byParts.length }, 'Wikidata name-part match');
            return byParts;
        }

        const byLabel = await this.query(buildLabelQuery(name));
        logger.debug({ name, byParts: byParts.length, byLabel: byLabel.length }, 'Wikidata label match');
        return byLabel.length > 0 ? byLabel : byParts;
    }

    private async query(sparql: string): Promise<KnowledgeBaseCandidate[]> {
        const params = new URLSearchParams({ query: sparql, format: 'json' });
        const response = await this.httpClient.get(`${this.endpoint}?${params.toString()}`, {
            source: 'wikidata',
            headers: { Accept: 'application/sparql-results+json' },
            ...(this.timeoutMs !== undefined ? { timeout: this.timeoutMs } : {}),
        });

        const parsed = sparqlResponseSchema.parse(response.data);
        return toCandidates(parsed.results.bindings);
    }
}
