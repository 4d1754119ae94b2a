import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiUrl } from './doi.js';
import { asString, dig, pageSize, recordsOf, yearFromDateString, type JsonRecord } from './utils.js';

const OSF_BASE = 'https://api.osf.io/v2';

/** Date attributes consulted for the year, in order of preference */
const YEAR_ATTRIBUTES = ['date_published', 'date_created', 'date_modified'];

export interface OsfAdapterOptions extends SourceAdapterOptions {
    /** Preprint provider to search, e.g. "psyarxiv" */
    provider?: string;
}

/**
 * OSF Preprints adapter, scoped to one preprint provider.
 *
 * @see https://developer.osf.io/
 */
export class OsfPreprintsAdapter implements SourceAdapter {
    readonly name = 'osf';
    readonly provider: string;
    private readonly client: SourceClient;

    constructor(options: OsfAdapterOptions) {
        this.provider = options.provider?.trim() || 'psyarxiv';
        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? OSF_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? 250,
            timeoutMs: options.timeoutMs ?? 18000,
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const items = await this.preprints({ 'filter[title]': query, 'page[size]': pageSize(limit, 100) });
        return items.map((item) => this.normalizePreprint(item)).slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const [item] = await this.preprints({ 'filter[doi]': cleaned, 'page[size]': 1 });
        return item ? this.normalizePreprint(item) : null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async preprints(filters: Record<string, string | number>): Promise<JsonRecord[]> {
        const data = await this.client.getJson('/preprints/', {
            'filter[provider]': this.provider,
            ...filters,
        });
        return recordsOf(dig(data, 'data'));
    }

    private normalizePreprint(item: JsonRecord): Paper {
        const [attributes = {}] = recordsOf([item['attributes']]);
        const doi = cleanDoi(asString(attributes['doi']));

        let year: number | null = null;
        for (const attribute of YEAR_ATTRIBUTES) {
            year = yearFromDateString(attributes[attribute]);
            if (year !== null) break;
        }

        return createPaper({
            source: this.name,
            title: asString(attributes['title']),
            year,
            doi,
            url: asString(dig(item, 'links', 'html')) ?? (doi ? doiUrl(doi) : null),
        });
    }
}
