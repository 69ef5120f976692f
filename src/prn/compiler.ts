import { createReadStream } from 'node:fs';
import { createGunzip } from 'node:zlib';
import { pipeline, type Readable } from 'node:stream';
import sax from 'sax';
import type { PrnConflictPolicy, PrnEntry } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { parseWikitextPage } from './wikitext.js';
import { classifyEntry, type PrnCandidate } from './rules.js';

const logger = getLogger();

const WIKTIONARY_PAGE_URL = 'https://de.wiktionary.org/w/index.php?title=';

/**
 * A raw dump page: only main-namespace pages are compiled.
 */
export interface DumpPage {
    title: string;
    namespace: number;
    text: string;
}

/**
 * Counters reported after a compile run.
 */
export interface CompileStats {
    pages: number;
    entries: number;
    classified: number;
    unclassified: number;
    rejectedByRule: Record<string, number>;
    classifiedByRule: Record<string, number>;
    female: number;
    male: number;
    ambiguous: number;
    conflictsDropped: number;
}

export interface CompileResult {
    entries: PrnEntry[];
    stats: CompileStats;
}

interface Claims {
    female: Set<string>;
    male: Set<string>;
}

export function provenanceUrl(title: string): string {
    return `${WIKTIONARY_PAGE_URL}${encodeURIComponent(title)}`;
}

/**
 * Collects candidates across the whole dump. Claims are kept as sets, so
 * the final table does not depend on the order pages arrive in.
 */
export class PrnAccumulator {
    private claims = new Map<string, Claims>();
    private stats: CompileStats = {
        pages: 0,
        entries: 0,
        classified: 0,
        unclassified: 0,
        rejectedByRule: {},
        classifiedByRule: {},
        female: 0,
        male: 0,
        ambiguous: 0,
        conflictsDropped: 0,
    };

    /**
     * Parse and classify one page. Pages that fail to parse are dropped.
     */
    addPage(page: DumpPage): void {
        if (page.namespace !== 0) return;
        this.stats.pages++;

        let entries;
        try {
            entries = parseWikitextPage(page.title, page.text);
        } catch (error) {
            logger.debug({ title: page.title, error: describeError(error) }, 'Unparseable dictionary page dropped');
            return;
        }

        for (const entry of entries) {
            this.stats.entries++;
            const result = classifyEntry(entry);

            switch (result.status) {
                case 'classified':
                    this.stats.classified++;
                    increment(this.stats.classifiedByRule, result.ruleId);
                    result.candidates.forEach((candidate) => this.addCandidate(candidate));
                    break;
                case 'rejected':
                    increment(this.stats.rejectedByRule, result.ruleId);
                    break;
                case 'unclassified':
                    this.stats.unclassified++;
                    break;
            }
        }
    }

    addCandidate(candidate: PrnCandidate): void {
        const lemma = candidate.lemma.trim();
        if (!/^\p{Lu}/u.test(lemma)) return;

        let claims = this.claims.get(lemma);
        if (!claims) {
            claims = { female: new Set(), male: new Set() };
            this.claims.set(lemma, claims);
        }
        claims[candidate.gender].add(candidate.source);
    }

    /**
     * Build the deduplicated, lemma-sorted table.
     */
    finalize(conflictPolicy: PrnConflictPolicy = 'ambiguous'): CompileResult {
        const entries: PrnEntry[] = [];
        const stats: CompileStats = { ...this.stats, female: 0, male: 0, ambiguous: 0, conflictsDropped: 0 };

        for (const lemma of [...this.claims.keys()].sort(compareCodeUnits)) {
            const claims = this.claims.get(lemma);
            if (!claims) continue;

            const isFemale = claims.female.size > 0;
            const isMale = claims.male.size > 0;
            const sources = [...new Set([...claims.female, ...claims.male])].sort(compareCodeUnits);
            const source_url = sources.map(provenanceUrl).join('; ');

            if (isFemale && isMale) {
                if (conflictPolicy === 'drop') {
                    stats.conflictsDropped++;
                    continue;
                }
                stats.ambiguous++;
                entries.push({ lemma, gender: 'ambiguous', source_url });
            } else if (isFemale) {
                stats.female++;
                entries.push({ lemma, gender: 'female', source_url });
            } else {
                stats.male++;
                entries.push({ lemma, gender: 'male', source_url });
            }
        }

        return { entries, stats };
    }
}

function increment(counter: Record<string, number>, key: string): void {
    counter[key] = (counter[key] ?? 0) + 1;
}

function compareCodeUnits(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compile from pages already in memory (small dumps, tests).
 */
export function compileFromPages(
    pages: Iterable<DumpPage>,
    conflictPolicy: PrnConflictPolicy = 'ambiguous'
): CompileResult {
    const accumulator = new PrnAccumulator();
    for (const page of pages) accumulator.addPage(page);
    return accumulator.finalize(conflictPolicy);
}

/**
 * Feed a MediaWiki XML export through a streaming parser, one page at a time.
 * The dump is never held in memory as a whole.
 */
export async function streamDumpPages(
    input: Readable,
    onPage: (page: DumpPage) => void
): Promise<void> {
    const parser = sax.parser(true, { trim: false, normalize: false });

    let element: string | null = null;
    let inRevision = false;
    let page: DumpPage | null = null;

    parser.onopentag = (tag) => {
        element = tag.name;
        if (tag.name === 'page') page = { title: '', namespace: 0, text: '' };
        if (tag.name === 'revision') inRevision = true;
    };

    const onText = (text: string) => {
        if (!page) return;
        if (element === 'title' && !inRevision) page.title += text;
        else if (element === 'ns' && !inRevision) page.namespace = Number(text.trim()) || 0;
        else if (element === 'text' && inRevision) page.text += text;
    };
    parser.ontext = onText;
    parser.oncdata = onText;

    parser.onclosetag = (name) => {
        element = null;
        if (name === 'revision') inRevision = false;
        if (name === 'page' && page) {
            onPage(page);
            page = null;
        }
    };

    parser.onerror = (error) => {
        logger.warn({ line: parser.line, error: error.message }, 'Malformed XML in dump, skipping');
        parser.resume();
    };

    input.setEncoding('utf8');
    for await (const chunk of input) {
        parser.write(String(chunk));
    }
    parser.close();
}

/**
 * Dump contents, decompressed for `.gz`. Read and decompression errors
 * reach whoever consumes the returned stream.
 */
function openDump(dumpPath: string): Readable {
    const file = createReadStream(dumpPath);
    if (!dumpPath.endsWith('.gz')) return file;

    return pipeline(file, createGunzip(), (error) => {
        if (error) logger.debug({ dumpPath, error: describeError(error) }, 'Dump stream closed with an error');
    });
}

/**
 * Compile the PRN list from a Wiktionary pages-articles dump (`.xml` or `.xml.gz`).
 * Same dump in, same table out.
 */
export async function compilePrnList(
    dumpPath: string,
    options: { conflictPolicy?: PrnConflictPolicy } = {}
): Promise<CompileResult> {
    const input = openDump(dumpPath);
    const accumulator = new PrnAccumulator();

    logger.info({ dumpPath }, 'Compiling PRN list from dictionary dump');

    let pages = 0;
    await streamDumpPages(input, (page) => {
        accumulator.addPage(page);
        pages++;
        if (pages % 100000 === 0) logger.info({ pages }, 'Dump pages processed');
    });

    const result = accumulator.finalize(options.conflictPolicy);
    logger.info(
        {
            pages: result.stats.pages,
            entries: result.stats.entries,
            classified: result.stats.classified,
            female: result.stats.female,
            male: result.stats.male,
            ambiguous: result.stats.ambiguous,
            conflictsDropped: result.stats.conflictsDropped,
            rejectedByRule: result.stats.rejectedByRule,
        },
        'PRN list compiled'
    );

    return result;
}
