import { createPaper, type Paper, type SourceAdapter, type SourceAdapterOptions } from '../types/index.js';
import { SourceClient } from './source-client.js';
import { cleanDoi } from './doi.js';
import { asArray, asString, dig, formatAuthors, pageSize, recordsOf, type JsonRecord } from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/** NCBI allows ~3 requests/s anonymously and ~10/s with a key */
const KEYED_INTERVAL_MS = 120;
const ANONYMOUS_INTERVAL_MS = 340;

const PUBDATE_YEAR = /(19\d{2}|20\d{2})/;

export interface PubMedAdapterOptions extends SourceAdapterOptions {
    apiKey?: string;
    /** Registered tool name sent with every request */
    tool?: string;
    /** Developer contact sent with every request */
    email?: string;
}

/**
 * PubMed source adapter (NCBI E-utilities).
 *
 * Two steps per query: esearch yields PMIDs, then esummary returns the
 * metadata. Everything a Paper carries comes from the summary.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedAdapter implements SourceAdapter {
    readonly name = 'pubmed';
    private readonly client: SourceClient;

    constructor(options: PubMedAdapterOptions) {
        const apiKey = options.apiKey?.trim() || undefined;

        this.client = new SourceClient({
            name: this.name,
            baseUrl: options.baseUrl ?? EUTILS_BASE,
            httpClient: options.httpClient,
            minIntervalMs: options.minIntervalMs ?? (apiKey ? KEYED_INTERVAL_MS : ANONYMOUS_INTERVAL_MS),
            timeoutMs: options.timeoutMs ?? 16000,
            params: {
                tool: options.tool?.trim() || 'litsearch',
                email: options.email?.trim() || undefined,
                api_key: apiKey,
            },
        });
    }

    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query) return [];

        const pmids = await this.esearch(`${query}[ti]`, pageSize(limit, 10000));
        const papers = await this.esummary(pmids);
        return papers.slice(0, limit);
    }

    async lookupByDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        // [AID] is the article identifier field
        const pmids = await this.esearch(`${cleaned}[AID]`, 1);
        const [paper] = await this.esummary(pmids);
        return paper ?? null;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async esearch(term: string, rows: number): Promise<string[]> {
        const data = await this.client.getJson('/esearch.fcgi', {
            db: 'pubmed',
            term,
            retmode: 'json',
            retmax: rows,
            sort: 'relevance',
        });

        return asArray(dig(data, 'esearchresult', 'idlist'))
            .map((id) => (typeof id === 'number' ? String(id) : asString(id)))
            .filter((id): id is string => !!id);
    }

    private async esummary(pmids: string[]): Promise<Paper[]> {
        if (pmids.length === 0) return [];

        const data = await this.client.getJson('/esummary.fcgi', {
            db: 'pubmed',
            id: pmids.join(','),
            retmode: 'json',
        });

        const result = dig(data, 'result');
        const papers: Paper[] = [];
        for (const uid of asArray(dig(result, 'uids'))) {
            const key = typeof uid === 'number' ? String(uid) : asString(uid);
            if (!key) continue;
            const [summary] = recordsOf([dig(result, key)]);
            if (!summary) continue;
            papers.push(this.normalizeSummary(key, summary));
        }
        return papers;
    }

    private normalizeSummary(uid: string, summary: JsonRecord): Paper {
        const authors = asArray(summary['authors']);
        const pubdate = asString(summary['pubdate']);
        const yearMatch = pubdate ? PUBDATE_YEAR.exec(pubdate) : null;

        return createPaper({
            source: this.name,
            title: asString(summary['title']),
            year: yearMatch?.[1] ? parseInt(yearMatch[1], 10) : null,
            doi: doiFromArticleIds(summary['articleids']),
            url: `https://pubmed.ncbi.nlm.nih.gov/${uid}/`,
            authors: formatAuthors(authors.map((author) => asString(dig(author, 'name'))), authors.length),
        });
    }
}

function doiFromArticleIds(articleIds: unknown): string | null {
    for (const articleId of recordsOf(articleIds)) {
        if (asString(articleId['idtype'])?.toLowerCase() !== 'doi') continue;
        const value = asString(articleId['value']);
        if (value) return cleanDoi(value);
    }
    return null;
}
