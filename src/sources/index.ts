import type { LitSearchConfig, SourceRegistration } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { LiteratureAggregator } from '../aggregator/literature-aggregator.js';
import { CrossrefAdapter } from './crossref.js';
import { OpenAlexAdapter } from './openalex.js';
import { SemanticScholarAdapter } from './semantic-scholar.js';
import { EuropePmcAdapter } from './europe-pmc.js';
import { PubMedAdapter } from './pubmed.js';
import { PlosAdapter } from './plos.js';
import { OsfPreprintsAdapter } from './osf.js';
import { DoajAdapter } from './doaj.js';
import { BiorxivAdapter } from './biorxiv.js';

export { CrossrefAdapter, OpenAlexAdapter, SemanticScholarAdapter, EuropePmcAdapter, PubMedAdapter, PlosAdapter, OsfPreprintsAdapter, DoajAdapter, BiorxivAdapter };

/**
 * Every source client, built once per process around one shared transport.
 */
export interface Sources {
    crossref: CrossrefAdapter;
    openalex: OpenAlexAdapter;
    semanticscholar: SemanticScholarAdapter;
    europepmc: EuropePmcAdapter;
    pubmed: PubMedAdapter;
    plos: PlosAdapter;
    osf: OsfPreprintsAdapter;
    doaj: DoajAdapter;
    medrxiv: BiorxivAdapter;
    biorxiv: BiorxivAdapter;
}

/**
 * Instantiate every source adapter from config.
 */
export function createSources(config: LitSearchConfig, httpClient: HttpClient): Sources {
    return {
        crossref: new CrossrefAdapter({ httpClient, mailto: config.mailto }),
        openalex: new OpenAlexAdapter({ httpClient, mailto: config.mailto }),
        semanticscholar: new SemanticScholarAdapter({ httpClient, apiKey: config.semanticScholarApiKey }),
        europepmc: new EuropePmcAdapter({ httpClient }),
        pubmed: new PubMedAdapter({
            httpClient,
            apiKey: config.ncbi.apiKey,
            tool: config.ncbi.tool,
            email: config.ncbi.email,
        }),
        plos: new PlosAdapter({ httpClient, apiKey: config.plosApiKey }),
        osf: new OsfPreprintsAdapter({ httpClient, provider: config.osfProvider }),
        doaj: new DoajAdapter({ httpClient, apiKey: config.doajApiKey }),
        medrxiv: new BiorxivAdapter({ httpClient, server: 'medrxiv' }),
        biorxiv: new BiorxivAdapter({ httpClient, server: 'biorxiv' }),
    };
}

/**
 * Source priority. Registration-agency and broad indexes come first; the
 * preprint servers have no title search and are only asked for DOIs.
 */
export function sourceRegistrations(sources: Sources): SourceRegistration[] {
    return [
        { adapter: sources.crossref, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.openalex, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.semanticscholar, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.europepmc, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.pubmed, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.plos, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.osf, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.doaj, supportsTitleSearch: true, supportsDoiLookup: true },
        { adapter: sources.medrxiv, supportsTitleSearch: false, supportsDoiLookup: true },
        { adapter: sources.biorxiv, supportsTitleSearch: false, supportsDoiLookup: true },
    ];
}

export function createLiteratureAggregator(sources: Sources): LiteratureAggregator {
    return new LiteratureAggregator(sourceRegistrations(sources));
}

/**
 * One display line per registered source: tag and capabilities.
 */
export function describeSources(sources: Sources): string[] {
    return sourceRegistrations(sources).map(({ adapter, supportsTitleSearch, supportsDoiLookup }) => {
        const capabilities = [supportsTitleSearch ? 'title' : null, supportsDoiLookup ? 'doi' : null]
            .filter(Boolean)
            .join(', ');
        return `${adapter.name.padEnd(16)}${capabilities}`;
    });
}
