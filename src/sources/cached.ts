import type { GenderLookup, KnowledgeBaseCandidate } from '../types/index.js';
import type { GenderCacheStore } from '../cache/gender-cache.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Cache key for a name: NFC, trimmed, inner whitespace collapsed, lower-cased.
 */
export function normalizeName(name: string): string {
    return name.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Wraps another lookup with an in-memory map for the run and an optional
 * persistent store. Concurrent lookups of the same key share one request;
 * failures are not cached.
 */
export class CachedGenderLookup implements GenderLookup {
    readonly name: string;
    private readonly memory = new Map<string, KnowledgeBaseCandidate[]>();
    private readonly inFlight = new Map<string, Promise<KnowledgeBaseCandidate[]>>();
    private hits = 0;
    private misses = 0;

    constructor(
        private readonly inner: GenderLookup,
        private readonly store?: GenderCacheStore
    ) {
        this.name = `${inner.name} (cached)`;
    }

    async lookup(name: string): Promise<KnowledgeBaseCandidate[]> {
        const key = normalizeName(name);

        const remembered = this.memory.get(key);
        if (remembered) {
            this.hits++;
            return remembered;
        }

        const stored = this.store?.get(key);
        if (stored) {
            this.hits++;
            this.memory.set(key, stored);
            return stored;
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            this.hits++;
            return pending;
        }

        this.misses++;
        const request = this.inner
            .lookup(name)
            .then((candidates) => {
                this.memory.set(key, candidates);
                this.store?.set(key, candidates);
                return candidates;
            })
            .finally(() => {
                this.inFlight.delete(key);
            });
        this.inFlight.set(key, request);
        return request;
    }

    getStats(): { hits: number; misses: number; entries: number } {
        logger.debug({ lookup: this.name, hits: this.hits, misses: this.misses }, 'Lookup cache stats');
        return { hits: this.hits, misses: this.misses, entries: this.memory.size };
    }
}
