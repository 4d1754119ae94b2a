/**
 * Paper: the canonical bibliographic record every source is mapped into.
 * Instances are frozen value objects; two papers are "the same work" when
 * their `paperKey()` matches.
 */
export interface Paper {
    /** Work title. Never empty: sources that omit it get `UNTITLED`. */
    readonly title: string;

    /** Publication year, when the source reports one */
    readonly year: number | null;

    /** Normalized DOI (no `doi:` label or resolver prefix), or null */
    readonly doi: string | null;

    /** Landing page, viewer page or DOI resolver URL */
    readonly url: string | null;

    /** Display-ready author summary, e.g. "A. One, B. Two et al." */
    readonly authors: string;

    /** Tag of the source adapter that produced the record */
    readonly source: string;

    /** Citation count as reported by the source */
    readonly citationCount: number | null;
}

export const UNTITLED = 'Untitled';

/**
 * Field bag accepted by `createPaper()`. Only `source` is required; every other
 * field falls back to its "absent" value.
 */
export interface PaperInit {
    title?: string | null;
    year?: number | null;
    doi?: string | null;
    url?: string | null;
    authors?: string | null;
    source: string;
    citationCount?: number | null;
}

/**
 * Build a frozen Paper, applying the title placeholder and collapsing empty
 * strings to null.
 */
export function createPaper(init: PaperInit): Paper {
    const title = init.title?.trim();
    const doi = init.doi?.trim();
    const url = init.url?.trim();

    return Object.freeze({
        title: title || UNTITLED,
        year: init.year ?? null,
        doi: doi || null,
        url: url || null,
        authors: init.authors?.trim() ?? '',
        source: init.source,
        citationCount: init.citationCount ?? null,
    });
}

/**
 * Deduplication key: the lowercased DOI when present, otherwise the first 200
 * characters of the lowercased, whitespace-collapsed title.
 */
export function paperKey(paper: Paper): string {
    if (paper.doi) {
        return `doi:${paper.doi.toLowerCase()}`;
    }
    const title = paper.title.trim().toLowerCase().replace(/\s+/g, ' ');
    return `title:${title.slice(0, 200)}`;
}
