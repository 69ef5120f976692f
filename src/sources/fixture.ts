import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { GenderLookup, KnowledgeBaseCandidate } from '../types/index.js';
import { HttpError } from '../utils/http-client.js';
import { normalizeName } from './cached.js';

/**
 * A fixture entry: the candidates to return, or a failure to raise.
 */
export type FixtureEntry = KnowledgeBaseCandidate[] | { error: 'timeout' | 'unavailable' };

const fixtureSchema = z.record(
    z.union([
        z.array(
            z.object({
                id: z.string(),
                label: z.string(),
                gender: z.string().optional(),
            })
        ),
        z.object({ error: z.enum(['timeout', 'unavailable']) }),
    ])
);

/**
 * Fixed answers from a JSON file or object, keyed by name. Unknown names have
 * no candidates. Used by tests and offline runs.
 */
export class FixtureGenderLookup implements GenderLookup {
    readonly name = 'Fixture';
    private readonly entries: Map<string, FixtureEntry>;

    /** Names passed to `lookup`, in call order */
    readonly calls: string[] = [];

    constructor(entries: Record<string, FixtureEntry>) {
        this.entries = new Map(Object.entries(entries).map(([name, entry]) => [normalizeName(name), entry]));
    }

    static fromFile(path: string): FixtureGenderLookup {
        return new FixtureGenderLookup(fixtureSchema.parse(JSON.parse(readFileSync(path, 'utf-8'))));
    }

    async lookup(name: string): Promise<KnowledgeBaseCandidate[]> {
        this.calls.push(name);
        const entry = this.entries.get(normalizeName(name));

        if (!entry) return [];
        if (Array.isArray(entry)) return entry;
        if (entry.error === 'timeout') throw new HttpError('Request timeout after 0ms', 0, true);
        throw new HttpError('HTTP 503: Service Unavailable', 503, true);
    }
}
