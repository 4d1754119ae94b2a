import type { LiteratureAggregator } from '../aggregator/literature-aggregator.js';
import type { CrossrefAdapter } from '../sources/crossref.js';
import { createLiteratureAggregator, createSources, describeSources, type Sources } from '../sources/index.js';
import type { LitSearchConfig, Paper } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { AggregationError, SourceError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { formatResults } from './format.js';

/**
 * What a command needs: the aggregator, the author-search source, and output
 * preferences.
 */
export interface CommandContext {
    aggregator: Pick<LiteratureAggregator, 'search' | 'lookupDoi'>;
    authorSearch: Pick<CrossrefAdapter, 'searchByAuthor'>;
    rows: number;
    json: boolean;
}

export type CommandRunner = (ctx: CommandContext, sources: Sources) => Promise<string> | string;

/**
 * Where command output and user-facing failures are written.
 */
export interface CommandOutput {
    out: (text: string) => void;
    err: (text: string) => void;
}

const consoleOutput: CommandOutput = {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
};

/**
 * Build the process-wide transport and sources, run one command, then tear
 * the transport down. Resolves to the process exit code.
 */
export async function executeCommand(
    config: LitSearchConfig,
    json: boolean,
    run: CommandRunner,
    output: CommandOutput = consoleOutput
): Promise<number> {
    const logger = getLogger();
    const httpClient = new HttpClient({ userAgent: config.userAgent, email: config.mailto });

    try {
        const sources = createSources(config, httpClient);
        const ctx: CommandContext = {
            aggregator: createLiteratureAggregator(sources),
            authorSearch: sources.crossref,
            rows: config.rows,
            json,
        };
        output.out(await run(ctx, sources));
        return 0;
    } catch (error) {
        if (error instanceof AggregationError || error instanceof SourceError) {
            output.err(`Search failed: ${error.message}`);
        } else {
            logger.error({ error }, 'Command failed');
        }
        return 1;
    } finally {
        logger.debug({ requests: httpClient.getAllRequestCounts() }, 'Requests sent');
        httpClient.close();
    }
}

function render(ctx: CommandContext, heading: string, query: string, papers: readonly Paper[]): string {
    if (ctx.json) {
        return JSON.stringify(papers, null, 2);
    }
    return formatResults(heading, query, papers);
}

/**
 * `find`: title or DOI, auto-detected.
 */
export async function runFind(ctx: CommandContext, query: string): Promise<string> {
    const papers = await ctx.aggregator.search(query, ctx.rows);
    return render(ctx, 'Results', query, papers);
}

/**
 * `doi`: metadata for one DOI.
 */
export async function runDoi(ctx: CommandContext, doi: string): Promise<string> {
    const paper = await ctx.aggregator.lookupDoi(doi);
    return render(ctx, 'DOI metadata', doi, paper ? [paper] : []);
}

/**
 * `author`: works by an author, from the registration agency.
 */
export async function runAuthor(ctx: CommandContext, author: string): Promise<string> {
    const papers = await ctx.authorSearch.searchByAuthor(author, ctx.rows);
    return render(ctx, 'Works by', author, papers);
}

/**
 * `sources`: registered sources in priority order.
 */
export function runSources(_ctx: CommandContext, sources: Sources): string {
    return describeSources(sources).join('\n');
}
