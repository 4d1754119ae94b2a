import { doiUrl } from '../sources/doi.js';
import type { Paper } from '../types/index.js';

/** Display limits for one result entry */
const TITLE_WIDTH = 220;
const AUTHORS_WIDTH = 160;
const QUERY_WIDTH = 120;

/**
 * Cut text to `width` characters, marking the cut with an ellipsis.
 */
export function truncate(text: string, width: number): string {
    const clean = text.trim();
    if (clean.length <= width) return clean;
    return `${clean.slice(0, Math.max(0, width - 1)).trimEnd()}…`;
}

/**
 * Link for a paper: its own URL, else the DOI resolver.
 */
export function paperLink(paper: Paper): string | null {
    return paper.url ?? (paper.doi ? doiUrl(paper.doi) : null);
}

/**
 * Render one numbered result:
 *
 *   1) Title [source]
 *      2019 • cited-by: 12
 *      A. Author, B. Author
 *      DOI: 10.1234/abc
 *      https://doi.org/10.1234/abc
 */
export function formatPaper(paper: Paper, index: number): string {
    const year = paper.year !== null ? String(paper.year) : '—';
    const cited = paper.citationCount !== null ? ` • cited-by: ${paper.citationCount}` : '';

    const lines = [
        `${index}) ${truncate(paper.title, TITLE_WIDTH)} [${paper.source}]`,
        `   ${year}${cited}`,
    ];
    if (paper.authors) {
        lines.push(`   ${truncate(paper.authors, AUTHORS_WIDTH)}`);
    }
    if (paper.doi) {
        lines.push(`   DOI: ${paper.doi}`);
    }
    const link = paperLink(paper);
    if (link) {
        lines.push(`   ${link}`);
    }
    return lines.join('\n');
}

/**
 * Render a result list under a heading, or a "no results" line.
 */
export function formatResults(heading: string, query: string, papers: readonly Paper[]): string {
    if (papers.length === 0) {
        return 'No results found.';
    }
    const entries = papers.map((paper, i) => formatPaper(paper, i + 1));
    return [`${heading}: ${truncate(query, QUERY_WIDTH)}`, ...entries].join('\n\n');
}
