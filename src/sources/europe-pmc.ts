import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi, doiUrl } from './doi.js';
import { asInteger, asString, dig, pageSize, recordsOf, type JsonRecord } from './utils.js';

const EUROPE_PMC_BASE = 'https://www.ebi.ac.uk/europepmc/webservices/rest';

/**
 * Europe PMC source adapter.
 * Life-sciences literature; records without a DOI link to the Europe PMC
 * viewer instead.
 *
 * @see https://europepmc.org/RestfulWebService
 */
export class EuropePmcAdapter implements SourceAdapter {
    readonly name = 'europepmc';
    private readonly client: SourceClient;

    constructor(options: SourceAdapterOptions) {
        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? EUROPE_PMC_BASE,
            httpClient: options.httpClient,
            // No published limit; stay under ~8 requests per second
            minIntervalMs: options.minIntervalMs ?? 120,
            timeoutMs: options.timeoutMs ?? 14000,
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const results = await this.search(`TITLE:"${query}"`, pageSize(limit, 1000));
        return results.slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const [paper] = await this.search(`DOI:${cleaned}`, 1);
        return paper ?? null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async search(query: string, rows: number): Promise<Paper[]> {
        const data = await this.client.getJson('/search', { query, format: 'json', pageSize: rows });
        return recordsOf(dig(data, 'resultList', 'result')).map((item) => this.normalizeResult(item));
    }

    private normalizeResult(item: JsonRecord): Paper {
        const doi = cleanDoi(asString(item['doi']));

        let url: string | null = null;
        if (doi) {
            url = doiUrl(doi);
        } else {
            // id is a PMID, PMCID or preprint id depending on `source`
            const source = asString(item['source']);
            const id = asString(item['id']);
            if (source && id) {
                url = `https://europepmc.org/article/${source}/${id}`;
            }
        }

        return createPaper({
            source: this.name,
            title: asString(item['title']),
            year: asInteger(item['pubYear']),
            doi,
            url,
            authors: asString(item['authorString']),
        });
    }
}
