import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { PrnEntry, PrnGender } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { csvRow } from '../utils/csv.js';

const logger = getLogger();

/**
 * Gender indicators used in the persisted list.
 */
export const PRN_INDICATORS: Record<PrnGender, string> = {
    female: 'f',
    male: 'm',
    ambiguous: 'a',
};

const INDICATOR_TO_GENDER = new Map<string, PrnGender>(
    Object.entries(PRN_INDICATORS).map(([gender, indicator]) => [indicator, toPrnGender(gender)])
);

const PRN_HEADER = ['gender', 'lemma', 'source_url'];

const rowsSchema = z.array(z.array(z.string()));

function toPrnGender(value: string): PrnGender {
    return value === 'female' || value === 'male' ? value : 'ambiguous';
}

/**
 * Serialize entries as `gender,lemma,source_url` CSV.
 */
export function formatPrnList(entries: readonly PrnEntry[]): string {
    const lines = [csvRow(PRN_HEADER)];
    for (const entry of entries) {
        lines.push(csvRow([PRN_INDICATORS[entry.gender], entry.lemma, entry.source_url]));
    }
    return lines.join('\n') + '\n';
}

export function writePrnList(path: string, entries: readonly PrnEntry[]): void {
    writeFileSync(path, formatPrnList(entries), 'utf-8');
    logger.info({ path, entries: entries.length }, 'PRN list written');
}

/**
 * Parse PRN list CSV. `#` lines are comments; a header row is optional.
 * Rows with an unknown gender indicator are logged and skipped.
 */
export function parsePrnList(content: string, origin = 'prn list'): PrnEntry[] {
    const rows = rowsSchema.parse(
        parse(content, {
            comment: '#',
            relax_column_count: true,
            skip_empty_lines: true,
            trim: true,
        })
    );

    const entries: PrnEntry[] = [];
    rows.forEach((row, index) => {
        const [indicator = '', lemma = '', sourceUrl = ''] = row;
        if (index === 0 && indicator === 'gender') return;

        const gender = INDICATOR_TO_GENDER.get(indicator.toLowerCase());
        if (!gender) {
            logger.warn({ origin, indicator, lemma }, 'Unknown gender indicator in PRN list, row skipped');
            return;
        }
        if (!lemma) {
            logger.warn({ origin, row: index + 1 }, 'PRN row without lemma skipped');
            return;
        }
        entries.push({ lemma, gender, source_url: sourceUrl });
    });

    return entries;
}

export function readPrnList(path: string): PrnEntry[] {
    return parsePrnList(readFileSync(path, 'utf-8'), path);
}

/**
 * Overlay lists keyed by lemma; a later list wins over an earlier one.
 */
export function mergePrnLists(...lists: ReadonlyArray<readonly PrnEntry[]>): PrnEntry[] {
    const merged = new Map<string, PrnEntry>();
    for (const list of lists) {
        for (const entry of list) {
            merged.set(entry.lemma, entry);
        }
    }
    return [...merged.values()];
}

/**
 * The merged PRN lexicon, loaded once per run and shared read-only.
 */
export class PrnTable {
    private readonly byLemma: ReadonlyMap<string, PrnEntry>;

    constructor(entries: readonly PrnEntry[]) {
        this.byLemma = new Map(mergePrnLists(entries).map((entry) => [entry.lemma, entry]));
    }

    /**
     * Load the compiled list and lay the manual adjustments over it.
     */
    static load(listPath: string, adjustedPath?: string): PrnTable {
        const automatic = readPrnList(listPath);
        let adjusted: PrnEntry[] = [];

        if (adjustedPath) {
            if (existsSync(adjustedPath)) {
                adjusted = readPrnList(adjustedPath);
            } else {
                logger.warn({ adjustedPath }, 'Adjusted PRN list not found, using compiled list only');
            }
        }

        const table = new PrnTable(mergePrnLists(automatic, adjusted));
        logger.info(
            { compiled: automatic.length, adjusted: adjusted.length, merged: table.size },
            'PRN table loaded'
        );
        return table;
    }

    get(lemma: string): PrnEntry | undefined {
        return this.byLemma.get(lemma);
    }

    has(lemma: string): boolean {
        return this.byLemma.has(lemma);
    }

    get size(): number {
        return this.byLemma.size;
    }

    entries(): PrnEntry[] {
        return [...this.byLemma.values()];
    }
}
