import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiPathSegment, doiUrl } from './doi.js';
import { asArray, asInteger, asString, dig, formatAuthors, isRecord, pageSize, recordsOf, type JsonRecord } from './utils.js';

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request from S2 API */
const PAPER_FIELDS = ['title', 'year', 'authors', 'url', 'citationCount', 'externalIds'].join(',');

/** Pacing with and without an API key */
const KEYED_INTERVAL_MS = 200;
const ANONYMOUS_INTERVAL_MS = 1000;

export interface SemanticScholarAdapterOptions extends SourceAdapterOptions {
    apiKey?: string;
}

/**
 * Semantic Scholar source adapter.
 * Citation-graph index; the shared anonymous pool is paced at one request per
 * second.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter {
    readonly name = 'semanticscholar';
    private readonly client: SourceClient;

    constructor(options: SemanticScholarAdapterOptions) {
        const apiKey = options.apiKey?.trim();
        const headers: Record<string, string> = {};
        if (apiKey) {
            headers['x-api-key'] = apiKey;
        }

        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? S2_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? (apiKey ? KEYED_INTERVAL_MS : ANONYMOUS_INTERVAL_MS),
            timeoutMs: options.timeoutMs ?? 16000,
            headers,
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const data = await this.client.getJson('/paper/search', {
            query,
            limit: pageSize(limit, 100),
            fields: PAPER_FIELDS,
        });
        return recordsOf(dig(data, 'data'))
            .map((paper) => this.normalizeS2Paper(paper))
            .slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const data = await this.client.getJson(
            `/paper/DOI:${doiPathSegment(cleaned)}`,
            { fields: PAPER_FIELDS },
            { notFoundOn404: true }
        );
        if (isRecord(data) && asString(data['title'])) {
            return this.normalizeS2Paper(data);
        }
        return null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeS2Paper(paper: JsonRecord): Paper {
        const doi = cleanDoi(asString(dig(paper, 'externalIds', 'DOI')));
        const authors = asArray(paper['authors']);

        return createPaper({
            source: this.name,
            title: asString(paper['title']),
            year: asInteger(paper['year']),
            doi,
            url: asString(paper['url']) ?? (doi ? doiUrl(doi) : null),
            authors: formatAuthors(authors.map((author) => asString(dig(author, 'name'))), authors.length),
            citationCount: asInteger(paper['citationCount']),
        });
    }
}
