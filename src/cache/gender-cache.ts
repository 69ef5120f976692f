import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { KnowledgeBaseCandidate } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';

const logger = getLogger();

const entrySchema = z.object({
    timestamp: z.number(),
    name: z.string(),
    candidates: z.array(
        z.object({
            id: z.string(),
            label: z.string(),
            gender: z.string().optional(),
        })
    ),
});

/**
 * File-system store for knowledge-base lookups, persisted across runs.
 * One JSON file per normalized name.
 *
 * File name = SHA-256 of the key.
 * TTL = 30 days by default.
 */
export class GenderCacheStore {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.genderscope-cache';
        this.ttlMs = (options.ttlHours ?? 24 * 30) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            logger.debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private filePath(key: string): string {
        return join(this.cacheDir, `${createHash('sha256').update(key).digest('hex')}.json`);
    }

    /**
     * Cached candidates, or null if not found/expired/unreadable.
     */
    get(key: string): KnowledgeBaseCandidate[] | null {
        if (!this.enabled) return null;

        const filePath = this.filePath(key);
        if (!existsSync(filePath)) return null;

        let entry;
        try {
            entry = entrySchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
        } catch (error) {
            logger.debug({ key, error: describeError(error) }, 'Unreadable cache entry ignored');
            return null;
        }

        if (Date.now() - entry.timestamp > this.ttlMs) {
            logger.debug({ key }, 'Cache expired');
            return null;
        }

        logger.debug({ key }, 'Cache hit');
        return entry.candidates;
    }

    /**
     * Store candidates. A later write for the same key replaces the earlier one.
     */
    set(key: string, candidates: KnowledgeBaseCandidate[]): void {
        if (!this.enabled) return;

        try {
            const entry = { timestamp: Date.now(), name: key, candidates };
            writeFileSync(this.filePath(key), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            logger.warn({ key, error: describeError(error) }, 'Failed to write cache entry');
        }
    }

    has(key: string): boolean {
        return this.get(key) !== null;
    }

    /**
     * Delete every cached entry. Returns the number of files removed.
     */
    clear(): number {
        if (!existsSync(this.cacheDir)) return 0;

        const files = readdirSync(this.cacheDir).filter((file) => file.endsWith('.json'));
        for (const file of files) {
            rmSync(join(this.cacheDir, file), { force: true });
        }
        logger.info({ cacheDir: this.cacheDir, removed: files.length }, 'Cache cleared');
        return files.length;
    }

    getStats(): { enabled: boolean; directory: string; entries: number } {
        const entries = existsSync(this.cacheDir)
            ? readdirSync(this.cacheDir).filter((file) => file.endsWith('.json')).length
            : 0;
        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries,
        };
    }
}
