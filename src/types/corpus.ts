/**
 * Corpus records as delivered by the scraper. Read-only once ingested.
 */

/**
 * A magazine issue.
 */
export interface Volume {
    /** Stable opaque identifier */
    id: string;

    title: string;

    /** ISO date string, null when the scraper found none */
    published_date: string | null;
}

/**
 * An article author. The same id may show up more than once across sources.
 */
export interface Author {
    id: string;
    name: string;
    info: string | null;
}

/**
 * A single article with its flattened text.
 */
export interface Article {
    id: string;
    volume_id: string;
    title: string;

    /** Headings and paragraphs joined by blank lines */
    text: string;

    /** Ordered author references */
    author_ids: string[];
}

/**
 * The complete corpus snapshot handed to the pipeline.
 */
export interface Corpus {
    volumes: Volume[];
    authors: Author[];
    articles: Article[];
}
