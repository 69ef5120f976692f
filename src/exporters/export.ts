import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { GenderscopeDatabase } from '../storage/database.js';
import {
    CONNOTATION_DIMENSIONS,
    GENDER_LABELS,
    GENDER_WRITING_KINDS,
    type AggregateRecord,
    type GenderWritingKind,
    type GenderWritingMatch,
    type GroupBy,
    type Mention,
} from '../types/index.js';
import { csvRow } from '../utils/csv.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'csv' | 'json';

interface ExportData {
    aggregates: Record<GroupBy, AggregateRecord[]>;
    mentions: Mention[];
    genderWriting: GenderWritingMatch[];
}

type Cell = string | number | null;

// ─── Main Export Function ────────────────────────────────

/**
 * Write the stored results of the last analysis to `outputDir`.
 *
 *   csv:  stats_article.csv, stats_volume.csv, stats_author.csv, mentions.csv,
 *         gender_writing.csv
 *   json: genderscope.json
 *
 * Returns the written file paths.
 */
export function exportResults(dbPath: string, outputDir: string, format: ExportFormat): string[] {
    const db = new GenderscopeDatabase(dbPath);

    try {
        const data: ExportData = {
            aggregates: {
                article: db.getAggregates('article'),
                volume: db.getAggregates('volume'),
                author: db.getAggregates('author'),
            },
            mentions: db.getMentions(),
            genderWriting: db.getGenderWriting(),
        };

        mkdirSync(outputDir, { recursive: true });

        let files: Record<string, string>;
        switch (format) {
            case 'csv':
                files = {
                    'stats_article.csv': aggregatesCsv(data.aggregates.article),
                    'stats_volume.csv': aggregatesCsv(data.aggregates.volume),
                    'stats_author.csv': aggregatesCsv(data.aggregates.author),
                    'mentions.csv': mentionsCsv(data.mentions),
                    'gender_writing.csv': genderWritingCsv(data.genderWriting),
                };
                break;
            case 'json':
                files = { 'genderscope.json': exportJson(data) };
                break;
            default:
                throw new Error(`Unsupported export format: ${String(format)}`);
        }

        const written = Object.entries(files).map(([name, content]) => {
            const path = join(outputDir, name);
            writeFileSync(path, content, 'utf-8');
            return path;
        });

        logger.info(
            { format, outputDir, files: written.length, mentions: data.mentions.length, articles: data.aggregates.article.length },
            'Results exported'
        );
        return written;
    } finally {
        db.close();
    }
}

// ─── Format Implementations ─────────────────────────────

const GENDER_WRITING_COLUMNS: Record<GenderWritingKind, string> = {
    binary: 'binary_forms',
    inclusive: 'inclusive_forms',
    neopronoun: 'neopronouns',
    genderConception: 'gender_conception_terms',
};

const AGGREGATE_HEADER = [
    'group_by',
    'key',
    'label',
    'total',
    ...GENDER_LABELS,
    ...GENDER_LABELS.map((label) => `per_${label}`),
    ...GENDER_LABELS.map((label) => `prn_${label}`),
    ...GENDER_LABELS.map((label) => `prop_${label}`),
    'female_share',
    ...(['female', 'male'] as const).flatMap((gender) => [
        ...CONNOTATION_DIMENSIONS.map((dim) => `${dim}_${gender}`),
        `scored_${gender}`,
        `no_score_${gender}`,
    ]),
    'tokens',
    'slash_forms',
    ...GENDER_WRITING_KINDS.map((kind) => GENDER_WRITING_COLUMNS[kind]),
    'inferred_gender',
];

/**
 * Flatten one aggregate into the columns of {@link AGGREGATE_HEADER}.
 */
export function aggregateRow(record: AggregateRecord): Cell[] {
    return [
        record.groupBy,
        record.key,
        record.label,
        record.total,
        ...GENDER_LABELS.map((label) => record.counts[label]),
        ...GENDER_LABELS.map((label) => record.perCounts[label]),
        ...GENDER_LABELS.map((label) => record.prnCounts[label]),
        ...GENDER_LABELS.map((label) => record.proportions[label]),
        record.femaleShare,
        ...(['female', 'male'] as const).flatMap((gender) => {
            const summary = record.connotation[gender];
            return [...CONNOTATION_DIMENSIONS.map((dim) => summary.means[dim]), summary.scored, summary.noScore];
        }),
        record.tokens,
        record.slashForms,
        ...GENDER_WRITING_KINDS.map((kind) => record.genderWriting?.[kind] ?? null),
        record.inferredGender,
    ];
}

export function aggregatesCsv(records: readonly AggregateRecord[]): string {
    return [csvRow(AGGREGATE_HEADER), ...records.map((record) => csvRow(aggregateRow(record)))].join('\n') + '\n';
}

export function mentionsCsv(mentions: readonly Mention[]): string {
    const lines = [
        csvRow([
            'mention_id',
            'article_id',
            'kind',
            'text',
            'lemma',
            'start',
            'end',
            'sentence',
            'canonical_name',
            'gender',
            'resolution_source',
            'confidence',
            'detail',
        ]),
    ];
    for (const m of mentions) {
        lines.push(
            csvRow([
                m.mention_id,
                m.article_id,
                m.kind,
                m.text,
                m.lemma,
                m.start,
                m.end,
                m.sentence,
                m.canonical_name,
                m.gender,
                m.resolution?.source,
                m.resolution?.confidence,
                m.resolution?.detail,
            ])
        );
    }
    return lines.join('\n') + '\n';
}

export function genderWritingCsv(matches: readonly GenderWritingMatch[]): string {
    const lines = [csvRow(['article_id', 'kind', 'term', 'count'])];
    for (const match of matches) {
        lines.push(csvRow([match.article_id, GENDER_WRITING_COLUMNS[match.kind], match.term, match.count]));
    }
    return lines.join('\n') + '\n';
}

function exportJson(data: ExportData): string {
    return JSON.stringify(
        {
            genderscope: {
                version: VERSION,
                exported_at: new Date().toISOString(),
            },
            ...data,
        },
        null,
        2
    );
}
