import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { Article, Author, Corpus, Volume } from '../types/index.js';
import { describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Scraped article content: paragraphs, and headings mapping to their
 * nested content.
 */
export type ContentNode = string | { [heading: string]: ContentNode[] };

const contentNodeSchema: z.ZodType<ContentNode> = z.lazy(() =>
    z.union([z.string(), z.record(z.array(contentNodeSchema))])
);

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

export const volumeSchema = z.object({
    id: idSchema,
    title: z.string(),
    published_date: z.string().nullable().default(null),
});

export const authorSchema = z.object({
    id: idSchema,
    name: z.string().min(1),
    info: z.string().nullable().default(null),
});

export const articleFileSchema = z
    .object({
        id: idSchema,
        volume_id: idSchema,
        title: z.string(),
        author_ids: z.array(idSchema).default([]),
        content: z.array(contentNodeSchema).optional(),
        text: z.string().optional(),
    })
    .refine((article) => article.content !== undefined || article.text !== undefined, {
        message: 'either content or text is required',
    });

/** Bibliographies, source lists and imprints carry no article prose */
const NON_ARTICLE_TITLE = /Literatur(angaben|hinweise|verzeichnis)?|Literatur und Internetadressen|Quellen|Impressum/;

const SOFT_HYPHEN = /\u00AD/g;

export function isNonArticleTitle(title: string): boolean {
    return NON_ARTICLE_TITLE.test(title);
}

/**
 * Keep the first record per id. Later duplicates are dropped.
 */
export function dedupeById<T extends { id: string }>(records: Iterable<T>): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const record of records) {
        if (seen.has(record.id)) continue;
        seen.add(record.id);
        unique.push(record);
    }
    return unique;
}

/**
 * Depth-first list of headings and paragraphs.
 */
export function flattenContent(nodes: readonly ContentNode[]): string[] {
    const out: string[] = [];
    for (const node of nodes) {
        if (typeof node === 'string') {
            out.push(node);
            continue;
        }
        for (const [heading, children] of Object.entries(node)) {
            out.push(heading);
            out.push(...flattenContent(children));
        }
    }
    return out;
}

/**
 * Article text: the title followed by the flattened content, blank-line
 * separated, with soft hyphens removed.
 */
export function articleText(title: string, content: readonly ContentNode[] | undefined, text: string | undefined): string {
    const paragraphs = content ? [title, ...flattenContent(content)] : [text ?? ''];
    return paragraphs
        .map((paragraph) => paragraph.replace(SOFT_HYPHEN, '').trim())
        .filter((paragraph) => paragraph.length > 0)
        .join('\n\n');
}

/**
 * Validate each element of a JSON array; malformed records are logged and skipped.
 */
function parseRecords<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    if (!existsSync(file)) {
        logger.warn({ file }, 'Corpus table not found');
        return [];
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
        logger.warn({ file, error: describeError(error) }, 'Unreadable corpus table skipped');
        return [];
    }

    if (!Array.isArray(raw)) {
        logger.warn({ file }, 'Corpus table is not a JSON array, skipped');
        return [];
    }

    const records: T[] = [];
    raw.forEach((item: unknown, index) => {
        const parsed = schema.safeParse(item);
        if (parsed.success) {
            records.push(parsed.data);
        } else {
            logger.warn({ file, index, issue: parsed.error.issues[0]?.message }, 'Malformed record skipped');
        }
    });
    return records;
}

function readArticle(file: string): Article | null {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
        logger.warn({ file, error: describeError(error) }, 'Unreadable article skipped');
        return null;
    }

    const parsed = articleFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        logger.warn({ file, path: issue?.path.join('.'), issue: issue?.message }, 'Malformed article skipped');
        return null;
    }

    const { id, volume_id, title, author_ids, content, text } = parsed.data;
    if (isNonArticleTitle(title)) {
        logger.debug({ file, title }, 'Bibliography or imprint skipped');
        return null;
    }

    return { id, volume_id, title, author_ids, text: articleText(title, content, text) };
}

/**
 * Load a corpus snapshot from a directory:
 *
 *   volumes.json      [{ id, title, published_date }]
 *   authors.json      [{ id, name, info }]
 *   articles/*.json   { id, volume_id, title, author_ids, content | text }
 *
 * Records are deduplicated by id, first occurrence wins.
 */
export function loadCorpusDirectory(dir: string): Corpus {
    const volumes = dedupeById<Volume>(parseRecords(join(dir, 'volumes.json'), volumeSchema));
    const authors = dedupeById<Author>(parseRecords(join(dir, 'authors.json'), authorSchema));

    const articlesDir = join(dir, 'articles');
    const files = existsSync(articlesDir)
        ? readdirSync(articlesDir)
              .filter((file) => file.endsWith('.json'))
              .sort()
        : [];

    const loaded: Article[] = [];
    for (const file of files) {
        const article = readArticle(join(articlesDir, file));
        if (article) loaded.push(article);
    }
    const articles = dedupeById(loaded);

    logger.info(
        { dir, volumes: volumes.length, authors: authors.length, articles: articles.length, files: files.length },
        'Corpus loaded'
    );

    return { volumes, authors, articles };
}
