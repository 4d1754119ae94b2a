import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiPathSegment, doiUrl } from './doi.js';
import { asArray, asInteger, asString, dig, formatAuthors, pageSize, recordsOf, type JsonRecord } from './utils.js';

const CROSSREF_BASE = 'https://api.crossref.org';

/** Fields requested from the works endpoint */
const SELECT_FIELDS = ['DOI', 'title', 'URL', 'author', 'issued', 'published-online', 'published-print', 'created', 'is-referenced-by-count'].join(',');

/** Date fields consulted for the year, in order of preference */
const YEAR_FIELDS = ['issued', 'published-online', 'published-print', 'created'];

export interface CrossrefAdapterOptions extends SourceAdapterOptions {
    /** Contact email for the polite pool */
    mailto?: string;
}

/**
 * Crossref source adapter.
 * Authoritative DOI registration data; first choice for DOI lookups.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefAdapter implements SourceAdapter {
    readonly name = 'crossref';
    private readonly client: SourceClient;

    constructor(options: CrossrefAdapterOptions) {
        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? CROSSREF_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? 100,
            timeoutMs: options.timeoutMs ?? 12000,
            params: { mailto: options.mailto || undefined },
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const data = await this.client.getJson('/works', {
            query,
            rows: pageSize(limit, 1000),
            filter: 'type:journal-article',
            select: SELECT_FIELDS,
        });
        return this.parseItems(dig(data, 'message', 'items')).slice(0, limit);
    }

    /**
     * Works by author name, in Crossref relevance order.
     */
    async searchByAuthor(author: string, limit: number): Promise<Paper[]> {
        const query = author.trim();
        if (!query) return [];

        const data = await this.client.getJson('/works', {
            'query.author': query,
            rows: pageSize(limit, 1000),
            filter: 'type:journal-article',
            select: SELECT_FIELDS,
        });
        return this.parseItems(dig(data, 'message', 'items')).slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const data = await this.client.getJson(
            `/works/${doiPathSegment(cleaned)}`,
            { select: SELECT_FIELDS },
            { notFoundOn404: true }
        );
        const [paper] = this.parseItems([dig(data, 'message')]);
        return paper ?? null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private parseItems(items: unknown): Paper[] {
        return recordsOf(items).map((item) => this.normalizeWork(item));
    }

    private normalizeWork(item: JsonRecord): Paper {
        const doi = cleanDoi(asString(item['DOI']));
        const url = asString(item['URL']);

        return createPaper({
            source: this.name,
            title: asString(asArray(item['title'])[0]),
            year: yearFromWork(item),
            doi,
            url: url ?? (doi ? doiUrl(doi) : null),
            authors: authorsFromWork(item),
            citationCount: asInteger(item['is-referenced-by-count']),
        });
    }
}

/**
 * First populated `date-parts[0][0]` across YEAR_FIELDS.
 */
function yearFromWork(item: JsonRecord): number | null {
    for (const field of YEAR_FIELDS) {
        const year = asInteger(asArray(asArray(dig(item, field, 'date-parts'))[0])[0]);
        if (year !== null) return year;
    }
    return null;
}

function authorsFromWork(item: JsonRecord): string {
    const authors = asArray(item['author']);
    const names = authors.map((author) => {
        const given = asString(dig(author, 'given'));
        const family = asString(dig(author, 'family'));
        return [given, family].filter(Boolean).join(' ') || null;
    });
    return formatAuthors(names, authors.length);
}
