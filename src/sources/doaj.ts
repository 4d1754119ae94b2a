import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiUrl } from './doi.js';
import { asArray, asInteger, asString, dig, formatAuthors, pageSize, recordsOf, type JsonRecord } from './utils.js';

const DOAJ_BASE = 'https://doaj.org/api/v2';

export interface DoajAdapterOptions extends SourceAdapterOptions {
    apiKey?: string;
}

/**
 * Directory of Open Access Journals adapter.
 *
 * The search query is a path segment, not a parameter. Field-qualified
 * queries are tried first and fall back to free text when they match nothing.
 *
 * @see https://doaj.org/api/docs
 */
export class DoajAdapter implements SourceAdapter {
    readonly name = 'doaj';
    private readonly client: SourceClient;

    constructor(options: DoajAdapterOptions) {
        const apiKey = options.apiKey?.trim();

        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? DOAJ_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? 250,
            timeoutMs: options.timeoutMs ?? 16000,
            headers: apiKey ? { Authorization: `Bearer ${apiKey}` } : {},
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const rows = pageSize(limit, 100);
        let papers = await this.searchArticles(`bibjson.title:"${query}"`, rows);
        if (papers.length === 0) {
            papers = await this.searchArticles(query, rows);
        }
        return papers.slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        let papers = await this.searchArticles(`bibjson.identifier.id:"${cleaned}"`, 1);
        if (papers.length === 0) {
            papers = await this.searchArticles(cleaned, 1);
        }
        return papers[0] ?? null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async searchArticles(query: string, rows: number): Promise<Paper[]> {
        const data = await this.client.getJson(`/search/articles/${encodeURIComponent(query)}`, { pageSize: rows });
        return recordsOf(dig(data, 'results')).map((item) => this.normalizeArticle(item));
    }

    private normalizeArticle(item: JsonRecord): Paper {
        const [bibjson = {}] = recordsOf([item['bibjson']]);
        const doi = doiFromIdentifiers(bibjson['identifier']);

        return createPaper({
            source: this.name,
            title: asString(bibjson['title']),
            year: asInteger(bibjson['year']),
            doi,
            url: firstLink(bibjson['link']) ?? (doi ? doiUrl(doi) : null),
            authors: authorsFromBibjson(bibjson['author']),
        });
    }
}

function doiFromIdentifiers(identifiers: unknown): string | null {
    for (const identifier of recordsOf(identifiers)) {
        const type = (asString(identifier['type']) ?? asString(identifier['idtype']))?.toLowerCase();
        const value = asString(identifier['id']) ?? asString(identifier['value']);
        if (type === 'doi' && value) {
            return cleanDoi(value);
        }
    }
    return null;
}

function firstLink(links: unknown): string | null {
    for (const link of recordsOf(links)) {
        const url = asString(link['url']);
        if (url) return url;
    }
    return null;
}

/**
 * Authors are `{ name }` objects, occasionally bare strings.
 */
function authorsFromBibjson(value: unknown): string {
    const authors = asArray(value);
    const names = authors.map((author) => asString(author) ?? asString(dig(author, 'name')));
    return formatAuthors(names, authors.length);
}
