import { createPaper, paperKey, type Paper, type SourceAdapter, type SourceRegistration } from '../types/index.js';
import { cleanDoi, looksLikeDoi } from '../sources/doi.js';
import { AggregationError, describeError, type SourceFailure } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Literature aggregator. Answers a title or DOI query from an ordered list
 * of sources:
 *
 * - DOI lookup walks the DOI-capable sources in order and returns the first
 *   record found.
 * - Title search walks the title-capable sources in order, merging distinct
 *   records until `limit` is reached.
 *
 * Sources are consulted one at a time; a failing source is recorded and the
 * walk moves on. Only when no source could answer does the call fail, with an
 * AggregationError.
 */
export class LiteratureAggregator {
    private readonly titleOrder: readonly SourceAdapter[];
    private readonly doiOrder: readonly SourceAdapter[];

    constructor(registrations: readonly SourceRegistration[]) {
        this.titleOrder = registrations.filter((r) => r.supportsTitleSearch).map((r) => r.adapter);
        this.doiOrder = registrations.filter((r) => r.supportsDoiLookup).map((r) => r.adapter);
    }

    /** Source tags consulted for title search, in priority order */
    get titleSources(): string[] {
        return this.titleOrder.map((adapter) => adapter.name);
    }

    /** Source tags consulted for DOI lookup, in priority order */
    get doiSources(): string[] {
        return this.doiOrder.map((adapter) => adapter.name);
    }

    /**
     * Search by DOI or title, detected from the query.
     */
    async search(query: string, limit: number): Promise<Paper[]> {
        const trimmed = query.trim();
        if (!trimmed || limit <= 0) return [];

        if (looksLikeDoi(trimmed)) {
            const paper = await this.lookupDoi(trimmed);
            return paper ? [paper] : [];
        }

        const papers = await this.searchByTitle(trimmed, limit);
        return papers.slice(0, Math.max(0, limit));
    }

    /**
     * Merge title-search results across sources, deduplicated by `paperKey()`,
     * stopping as soon as `limit` distinct papers are collected.
     */
    async searchByTitle(title: string, limit: number): Promise<Paper[]> {
        const query = title.trim();
        if (!query || limit <= 0) return [];

        const logger = getLogger();
        const papers: Paper[] = [];
        const seen = new Set<string>();
        const failures: SourceFailure[] = [];

        for (const adapter of this.titleOrder) {
            let batch: Paper[];
            try {
                batch = await adapter.searchByTitle(query, limit);
            } catch (error) {
                failures.push(this.recordFailure(adapter, error, 'title search'));
                continue;
            }

            for (const paper of batch) {
                const key = paperKey(paper);
                if (seen.has(key)) continue;

                seen.add(key);
                papers.push(paper);
                if (papers.length >= limit) {
                    logger.debug({ query, count: papers.length, lastSource: adapter.name }, 'Title search filled');
                    return papers;
                }
            }
        }

        // Nothing found and something failed: sources were unreachable, not empty
        if (papers.length === 0 && failures.length > 0) {
            throw new AggregationError('No source returned results', failures);
        }

        logger.debug({ query, count: papers.length, failures: failures.length }, 'Title search exhausted sources');
        return papers;
    }

    /**
     * First record found for a DOI, with its DOI re-normalized. Resolves to
     * null when the DOI is unknown; fails only when every source failed.
     */
    async lookupDoi(doi: string): Promise<Paper | null> {
        const cleaned = cleanDoi(doi);
        if (!cleaned) return null;

        const failures: SourceFailure[] = [];

        for (const adapter of this.doiOrder) {
            let paper: Paper | null;
            try {
                paper = await adapter.lookupByDoi(cleaned);
            } catch (error) {
                failures.push(this.recordFailure(adapter, error, 'DOI lookup'));
                continue;
            }

            if (paper) {
                getLogger().debug({ doi: cleaned, source: adapter.name }, 'DOI resolved');
                return paper.doi ? createPaper({ ...paper, doi: cleanDoi(paper.doi) }) : paper;
            }
        }

        if (this.doiOrder.length > 0 && failures.length === this.doiOrder.length) {
            throw new AggregationError('No source could resolve the DOI', failures);
        }

        return null;
    }

    private recordFailure(adapter: SourceAdapter, error: unknown, operation: string): SourceFailure {
        const failure = { source: adapter.name, message: describeError(error) };
        getLogger().warn({ ...failure, operation }, 'Source failed');
        return failure;
    }
}
