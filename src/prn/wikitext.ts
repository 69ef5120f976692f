/**
 * Minimal reader for German Wiktionary page markup.
 *
 * A page holds one `== Word ({{Sprache|Deutsch}}) ==` block per language and,
 * inside it, one `=== {{Wortart|Substantiv|Deutsch}}, {{m}} ===` block per part
 * of speech. Each part-of-speech block becomes one {@link DictionaryEntry}.
 */

/**
 * Structured view of one part-of-speech section.
 */
export interface DictionaryEntry {
    /** Page title (the headword) */
    title: string;

    /** Language name as written in the `Sprache` template, e.g. `Deutsch` */
    language: string;

    /** `Wortart` values of the section heading, in order */
    partsOfSpeech: string[];

    /** Body of each `{{Section}}` block, keyed by section name */
    sections: Record<string, string>;

    /** Key/value pairs of the inflection overview table */
    flexion: Record<string, string>;
}

const LANGUAGE_HEADING = /^==\s*(.+?)\s*\(\{\{Sprache\|([^}|]+)\}\}\)\s*==\s*$/;
const POS_HEADING = /^===\s*(.*?)\s*===\s*$/;
const WORTART = /\{\{Wortart\|([^|}]+)/g;
const SECTION_MARKER = /^\{\{([^{}|]+)\}\}\s*$/;
const FLEXION_START = /^\{\{Deutsch [^|}]*Übersicht/;
const FLEXION_ROW = /^\|\s*([^=]+?)\s*=\s*(.*)$/;

/**
 * Split a page into dictionary entries. Malformed blocks yield no entry;
 * text outside any language block is ignored.
 */
export function parseWikitextPage(title: string, wikitext: string): DictionaryEntry[] {
    const entries: DictionaryEntry[] = [];
    let language: string | null = null;
    let current: DictionaryEntry | null = null;
    let sectionName: string | null = null;
    let sectionLines: string[] = [];
    let inFlexion = false;

    const flushSection = () => {
        if (current && sectionName) {
            const body = sectionLines.join('\n').trim();
            current.sections[sectionName] = current.sections[sectionName]
                ? `${current.sections[sectionName]}\n${body}`
                : body;
        }
        sectionName = null;
        sectionLines = [];
    };

    const flushEntry = () => {
        flushSection();
        if (current) entries.push(current);
        current = null;
        inFlexion = false;
    };

    for (const rawLine of wikitext.split(/\r?\n/)) {
        const line = rawLine.trimEnd();

        const languageMatch = LANGUAGE_HEADING.exec(line);
        if (languageMatch) {
            flushEntry();
            language = languageMatch[2]?.trim() ?? null;
            continue;
        }

        // Level-2 headings of other shapes end the language block
        if (/^==[^=]/.test(line)) {
            flushEntry();
            language = null;
            continue;
        }

        const posMatch = POS_HEADING.exec(line);
        if (posMatch && !line.startsWith('====')) {
            flushEntry();
            if (language) {
                const heading = posMatch[1] ?? '';
                current = {
                    title,
                    language,
                    partsOfSpeech: [...heading.matchAll(WORTART)].map((m) => (m[1] ?? '').trim()),
                    sections: {},
                    flexion: {},
                };
            }
            continue;
        }

        if (!current) continue;

        if (inFlexion) {
            if (line.startsWith('}}')) {
                inFlexion = false;
                continue;
            }
            const row = FLEXION_ROW.exec(line);
            if (row?.[1] && row[2] !== undefined) {
                current.flexion[row[1]] = row[2].trim();
            }
            continue;
        }

        if (FLEXION_START.test(line)) {
            flushSection();
            inFlexion = true;
            continue;
        }

        const marker = SECTION_MARKER.exec(line);
        if (marker?.[1]) {
            flushSection();
            sectionName = marker[1].trim();
            continue;
        }

        if (sectionName) sectionLines.push(line);
    }

    flushEntry();
    return entries;
}

/**
 * Turn the body of a word-form section (or an inflection cell) into clean
 * candidate lemmas. Multi-word forms, suffix stubs (`-in`) and lowercase
 * words are discarded.
 *
 * ```
 * ":[1] [[Lehrerin]], [[Oberlehrerin]]"  →  ['Lehrerin', 'Oberlehrerin']
 * ```
 */
export function extractWordForms(text: string): string[] {
    const cleaned = text
        .replace(/<ref[^>]*\/>/g, ' ')
        .replace(/<ref[^>]*>[\s\S]*?<\/ref>/g, ' ')
        .replace(/<[^>]+>/g, ' ')
        .replace(/\{\{[^{}]*\}\}/g, ' ')
        .replace(/''[^']*''/g, ' ')
        .replace(/\([^)]*\)/g, ' ')
        .replace(/^\s*:+/gm, ' ')
        .replace(/\[[\d\s,.–-]*\]/g, ' ')
        .replace(/\[\[|\]\]/g, ' ')
        .replace(/#[^\s,;|]*/g, ' ');

    const forms: string[] = [];
    for (const part of cleaned.split(/[,/|;:\n]/)) {
        const form = part
            .trim()
            .replace(/^(der|die|das)\s+/i, '')
            .replace(/[*]/g, '')
            .trim();

        if (!form || /\s|_/.test(form)) continue;
        if (!/^\p{Lu}/u.test(form)) continue;
        forms.push(form);
    }

    return forms;
}
