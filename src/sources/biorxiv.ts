import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiPathSegment, doiUrl } from './doi.js';
import { asString, dig, recordsOf, yearFromDateString, type JsonRecord } from './utils.js';

const BIORXIV_BASE = 'https://api.biorxiv.org';

export type PreprintServer = 'biorxiv' | 'medrxiv';

export interface BiorxivAdapterOptions extends SourceAdapterOptions {
    server: PreprintServer;
}

/**
 * bioRxiv / medRxiv details API. One instance per server; the server name is
 * also the source tag.
 *
 * The API has no title search, only date-range listings, so title search is
 * a no-op.
 *
 * @see https://api.biorxiv.org/
 */
export class BiorxivAdapter implements SourceAdapter {
    readonly name: PreprintServer;
    private readonly client: SourceClient;

    constructor(options: BiorxivAdapterOptions) {
        this.name = options.server;
        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? BIORXIV_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? 200,
            timeoutMs: options.timeoutMs ?? 18000,
        });
    }

    async searchByTitle(): Promise<Paper[]> {
        return [];
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const data = await this.client.getJson(`/details/${this.name}/${doiPathSegment(cleaned)}/na/json`, {}, { notFoundOn404: true });
        const [item] = recordsOf(dig(data, 'collection'));
        return item ? this.normalizeDetails(item) : null;
    }

    private normalizeDetails(item: JsonRecord): Paper {
        const doi = cleanDoi(asString(item['doi']));

        return createPaper({
            source: this.name,
            title: asString(item['title']),
            year: yearFromDateString(item['date']),
            doi,
            url: doi ? doiUrl(doi) : null,
            // Already a "Last, F.; Last, F." string
            authors: asString(item['authors']),
        });
    }
}
