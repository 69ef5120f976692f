import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { CONNOTATION_DIMENSIONS, type ConnotationScore } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/** Column order of the norm file when it carries no usable header */
const POSITIONAL_COLUMNS = ['word', 'arousal', 'valence', 'imageability', 'concreteness'] as const;

const rowsSchema = z.array(z.array(z.string()));

/**
 * Affect norms per lemma, loaded once and shared read-only.
 */
export class ConnotationLexicon {
    constructor(private readonly scores: ReadonlyMap<string, ConnotationScore>) {}

    static empty(): ConnotationLexicon {
        return new ConnotationLexicon(new Map());
    }

    /**
     * Exact lemma first, then the lower-cased lemma.
     */
    get(lemma: string): ConnotationScore | undefined {
        return this.scores.get(lemma) ?? this.scores.get(lemma.toLowerCase());
    }

    get size(): number {
        return this.scores.size;
    }
}

/**
 * Map each column name to its index. Falls back to the norm file's
 * positional order when the first row does not name the columns.
 */
function locateColumns(header: readonly string[]): { columns: Record<string, number>; hasHeader: boolean } {
    const normalized = header.map((cell) => cell.trim().toLowerCase());
    const hasHeader = normalized.includes('word') && CONNOTATION_DIMENSIONS.every((dim) => normalized.includes(dim));

    const names: readonly string[] = hasHeader ? normalized : POSITIONAL_COLUMNS;
    const columns: Record<string, number> = {};
    names.forEach((name, index) => {
        if (!(name in columns)) columns[name] = index;
    });
    return { columns, hasHeader };
}

function cell(row: readonly string[], index: number | undefined): string {
    return index === undefined ? '' : (row[index] ?? '').trim();
}

/** Decimal comma accepted; empty cells are not numbers */
function parseScore(text: string): number {
    return text === '' ? NaN : Number(text.replace(',', '.'));
}

/**
 * Parse a `;`-separated norm table. Rows whose values are not numeric are
 * skipped with a warning.
 */
export function parseConnotationLexicon(content: string, origin = 'lexicon'): ConnotationLexicon {
    const rows = rowsSchema.parse(
        parse(content, {
            delimiter: ';',
            relax_column_count: true,
            skip_empty_lines: true,
            bom: true,
        })
    );

    const scores = new Map<string, ConnotationScore>();
    const [first] = rows;
    if (!first) return new ConnotationLexicon(scores);

    const { columns, hasHeader } = locateColumns(first);
    let skipped = 0;

    rows.slice(hasHeader ? 1 : 0).forEach((row) => {
        const word = cell(row, columns['word']);
        const values = CONNOTATION_DIMENSIONS.map((dim) => parseScore(cell(row, columns[dim])));
        const [valence, arousal, imageability, concreteness] = values;

        if (
            !word ||
            valence === undefined ||
            arousal === undefined ||
            imageability === undefined ||
            concreteness === undefined ||
            values.some((value) => !Number.isFinite(value))
        ) {
            skipped++;
            logger.warn({ origin, word, row: row.join(';') }, 'Non-numeric connotation row skipped');
            return;
        }

        scores.set(word, { valence, arousal, imageability, concreteness });
    });

    logger.info({ origin, lemmas: scores.size, skipped }, 'Connotation lexicon loaded');
    return new ConnotationLexicon(scores);
}

export function loadConnotationLexicon(path: string): ConnotationLexicon {
    return parseConnotationLexicon(readFileSync(path, 'utf-8'), path);
}
