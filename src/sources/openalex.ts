import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiUrl } from './doi.js';
import { asArray, asInteger, asString, dig, formatAuthors, isRecord, pageSize, recordsOf, type JsonRecord } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

const SELECT_FIELDS = 'id,title,doi,publication_year,authorships,primary_location,cited_by_count';

export interface OpenAlexAdapterOptions extends SourceAdapterOptions {
    /** Contact email for the polite pool */
    mailto?: string;
}

/**
 * OpenAlex source adapter.
 * Broad-coverage open index with citation counts.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements SourceAdapter {
    readonly name = 'openalex';
    private readonly client: SourceClient;

    constructor(options: OpenAlexAdapterOptions) {
        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? OPENALEX_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? 50,
            timeoutMs: options.timeoutMs ?? 14000,
            params: { mailto: options.mailto || undefined },
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const data = await this.client.getJson('/works', {
            search: query,
            'per-page': pageSize(limit, 200),
            select: SELECT_FIELDS,
        });
        return recordsOf(dig(data, 'results'))
            .map((work) => this.normalizeWork(work))
            .slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        // External ids go in the path as a URL-encoded resolver URL
        const path = `/works/${encodeURIComponent(doiUrl(cleaned))}`;
        const data = await this.client.getJson(path, { select: SELECT_FIELDS }, { notFoundOn404: true });

        if (isRecord(data) && asString(data['id'])) {
            return this.normalizeWork(data);
        }
        return null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeWork(work: JsonRecord): Paper {
        const doi = cleanDoi(asString(work['doi']));
        const landingPage = asString(dig(work, 'primary_location', 'landing_page_url'));

        const authorships = asArray(work['authorships']);
        const names = authorships.map((authorship) => asString(dig(authorship, 'author', 'display_name')));

        return createPaper({
            source: this.name,
            title: asString(work['title']),
            year: asInteger(work['publication_year']),
            doi,
            url: landingPage ?? (doi ? doiUrl(doi) : null),
            authors: formatAuthors(names, authorships.length),
            citationCount: asInteger(work['cited_by_count']),
        });
    }
}
