/**
 * DOI detection and normalization.
 *
 * "doi:10.1037/ABC" → "10.1037/ABC"
 * "https://dx.doi.org/10.1037/abc" → "10.1037/abc"
 */

const DOI_LABEL = /^\s*doi\s*:\s*/i;
const DOI_RESOLVER_PREFIX = /^https?:\/\/(dx\.)?doi\.org\//i;
const TRAILING_NOISE = /[).,;]+$/;
const DOI_PATTERN = /^10\.[0-9]{4,9}\/\S+$/i;

/**
 * Strip a leading `doi:` label and resolver URL prefix, then trim.
 * Case and trailing punctuation are left untouched.
 */
export function normalizeDoi(raw: string | null | undefined): string {
    let current = (raw ?? '').trim();

    // Repeat until stable so stacked prefixes ("doi: https://doi.org/...") go too
    for (;;) {
        const next = current.replace(DOI_LABEL, '').replace(DOI_RESOLVER_PREFIX, '').trim();
        if (next === current) return current;
        current = next;
    }
}

/**
 * Drop sentence-boundary noise (`)`, `.`, `,`, `;`) from the end of a DOI.
 */
export function stripTrailingPunctuation(doi: string): string {
    return doi.replace(TRAILING_NOISE, '');
}

/**
 * Normalize and strip: the form used on the wire and for deduplication.
 */
export function cleanDoi(raw: string | null | undefined): string {
    return stripTrailingPunctuation(normalizeDoi(raw));
}

/**
 * Whether the whole input, once cleaned, is a DOI.
 */
export function looksLikeDoi(raw: string | null | undefined): boolean {
    return DOI_PATTERN.test(cleanDoi(raw));
}

/**
 * Resolver URL for a DOI.
 */
export function doiUrl(doi: string): string {
    return `https://doi.org/${doi}`;
}

/**
 * DOI as a URL path segment. Slashes stay literal (path lookups expect
 * them); `?` and `#` would end the path, so they are escaped.
 */
export function doiPathSegment(doi: string): string {
    return doi.replace(/[?#]/g, (char) => encodeURIComponent(char));
}
