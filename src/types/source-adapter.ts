import type { Paper } from './paper.js';
import type { HttpClient } from '../utils/http-client.js';

/**
 * Interface for bibliographic source adapters (Crossref, OpenAlex, PubMed, ...).
 * Each adapter maps one external schema onto the common Paper interface.
 */
export interface SourceAdapter {
    /** Source tag stamped on every Paper the adapter produces */
    readonly name: string;

    /**
     * Free-text title search.
     * Returns papers in the source's relevance order, at most `limit` of them.
     * A blank title resolves to `[]` without a network call.
     */
    searchByTitle(title: string, limit: number): Promise<Paper[]>;

    /**
     * Resolve one DOI to at most one record.
     * Resolves to null when the source has no matching work.
     */
    lookupByDoi(doi: string): Promise<Paper | null>;
}

/**
 * Options shared by every adapter constructor.
 */
export interface SourceAdapterOptions {
    /** Shared transport, owned by the caller */
    httpClient: HttpClient;

    /** Override the source's base endpoint */
    baseUrl?: string;

    /** Override the source's minimum spacing between requests */
    minIntervalMs?: number;

    /** Override the source's per-request timeout */
    timeoutMs?: number;
}

/**
 * Registration entry for the aggregator: which operations a source is
 * consulted for.
 */
export interface SourceRegistration {
    adapter: SourceAdapter;
    supportsTitleSearch: boolean;
    supportsDoiLookup: boolean;
}
