import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiUrl } from './doi.js';
import { asArray, asString, dig, formatAuthors, pageSize, recordsOf, yearFromDateString, type JsonRecord } from './utils.js';

const PLOS_BASE = 'https://api.plos.org';

/** A Solr document id that is itself a DOI */
const DOI_ID = /^10\.[0-9]{4,9}\/\S+$/i;

export interface PlosAdapterOptions extends SourceAdapterOptions {
    apiKey?: string;
}

/**
 * PLOS search adapter (Solr).
 * Article documents use the DOI as their `id`.
 *
 * @see https://api.plos.org/solr/faq/
 */
export class PlosAdapter implements SourceAdapter {
    readonly name = 'plos';
    private readonly client: SourceClient;

    constructor(options: PlosAdapterOptions) {
        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? PLOS_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? 200,
            timeoutMs: options.timeoutMs ?? 16000,
            params: { api_key: options.apiKey?.trim() || undefined },
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const docs = await this.search(`title:"${query}"`, pageSize(limit, 1000));
        return docs.map((doc) => this.normalizeDoc(doc, null)).slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const [doc] = await this.search(`doi:"${cleaned}"`, 1);
        return doc ? this.normalizeDoc(doc, cleaned) : null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async search(q: string, rows: number): Promise<JsonRecord[]> {
        const data = await this.client.getJson('/search', { q, wt: 'json', rows });
        return recordsOf(dig(data, 'response', 'docs'));
    }

    /**
     * @param fallbackDoi - DOI to assume when the document carries none
     */
    private normalizeDoc(doc: JsonRecord, fallbackDoi: string | null): Paper {
        const doi = doiFromDoc(doc) ?? fallbackDoi;
        const authors = asArray(doc['author_display']);

        return createPaper({
            source: this.name,
            title: asString(doc['title_display']),
            year: yearFromDateString(doc['publication_date']),
            doi,
            url: doi ? doiUrl(doi) : null,
            authors: formatAuthors(authors.map((author) => asString(author)), authors.length),
        });
    }
}

/**
 * DOI from the document id, else from the `doi` field (a string or a
 * single-valued array).
 */
function doiFromDoc(doc: JsonRecord): string | null {
    const candidates = [asString(doc['id']), asString(doc['doi']), asString(asArray(doc['doi'])[0])];
    for (const candidate of candidates) {
        if (candidate && DOI_ID.test(candidate)) {
            return cleanDoi(candidate);
        }
    }
    return null;
}
