import { describe, it, expect, vi } from 'vitest';
import { LiteratureAggregator } from '../aggregator/literature-aggregator.js';
import { createPaper, type Paper, type SourceAdapter, type SourceRegistration } from '../types/index.js';
import { AggregationError, SourceError } from '../utils/errors.js';

/**
 * In-memory adapter with canned answers.
 */
class FakeAdapter implements SourceAdapter {
    readonly searchByTitle = vi.fn(async (_title: string, _limit: number): Promise<Paper[]> => this.titleResults());
    readonly lookupByDoi = vi.fn(async (_doi: string): Promise<Paper | null> => this.doiResult());

    constructor(
        readonly name: string,
        private readonly titleResults: () => Paper[] | Promise<Paper[]> = () => [],
        private readonly doiResult: () => Paper | null | Promise<Paper | null> = () => null
    ) {}
}

function paper(source: string, title: string, doi: string | null = null): Paper {
    return createPaper({ source, title, doi });
}

function failing(name: string, diagnostic = 'HTTP 503: unavailable'): () => never {
    return () => {
        throw new SourceError(name, diagnostic);
    };
}

function register(...adapters: FakeAdapter[]): SourceRegistration[] {
    return adapters.map((adapter) => ({ adapter, supportsTitleSearch: true, supportsDoiLookup: true }));
}

describe('LiteratureAggregator', () => {
    describe('registration', () => {
        it('should order sources per capability', () => {
            const a = new FakeAdapter('a');
            const b = new FakeAdapter('b');
            const c = new FakeAdapter('c');
            const aggregator = new LiteratureAggregator([
                { adapter: a, supportsTitleSearch: true, supportsDoiLookup: true },
                { adapter: b, supportsTitleSearch: false, supportsDoiLookup: true },
                { adapter: c, supportsTitleSearch: true, supportsDoiLookup: false },
            ]);

            expect(aggregator.titleSources).toEqual(['a', 'c']);
            expect(aggregator.doiSources).toEqual(['a', 'b']);
        });
    });

    describe('searchByTitle', () => {
        it('should merge sources in priority order', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One', '10.1000/1')]);
            const b = new FakeAdapter('b', () => [paper('b', 'Two')]);
            const aggregator = new LiteratureAggregator(register(a, b));

            const papers = await aggregator.searchByTitle('memory', 5);

            expect(papers.map((p) => p.title)).toEqual(['One', 'Two']);
        });

        it('should stop consulting sources once the limit is reached', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One'), paper('a', 'Two'), paper('a', 'Three')]);
            const b = new FakeAdapter('b', () => [paper('b', 'Four')]);
            const aggregator = new LiteratureAggregator(register(a, b));

            const papers = await aggregator.searchByTitle('memory', 2);

            expect(papers.map((p) => p.title)).toEqual(['One', 'Two']);
            expect(b.searchByTitle).not.toHaveBeenCalled();
        });

        it('should pass the trimmed query and limit to each source', async () => {
            const a = new FakeAdapter('a');
            const aggregator = new LiteratureAggregator(register(a));

            await aggregator.searchByTitle('  memory  ', 3);

            expect(a.searchByTitle).toHaveBeenCalledWith('memory', 3);
        });

        it('should drop duplicates by DOI and by title', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One', '10.1000/X'), paper('a', 'Two')]);
            const b = new FakeAdapter('b', () => [
                paper('b', 'One (preprint)', '10.1000/x'),
                paper('b', '  two '),
                paper('b', 'Three'),
            ]);
            const aggregator = new LiteratureAggregator(register(a, b));

            const papers = await aggregator.searchByTitle('memory', 10);

            expect(papers.map((p) => `${p.source}:${p.title}`)).toEqual(['a:One', 'a:Two', 'b:Three']);
        });

        it('should keep going past failing sources', async () => {
            const a = new FakeAdapter('a', failing('a'));
            const b = new FakeAdapter('b', () => [paper('b', 'Two')]);
            const aggregator = new LiteratureAggregator(register(a, b));

            const papers = await aggregator.searchByTitle('memory', 5);

            expect(papers.map((p) => p.source)).toEqual(['b']);
        });

        it('should return an empty list when sources answer with nothing', async () => {
            const aggregator = new LiteratureAggregator(register(new FakeAdapter('a'), new FakeAdapter('b')));

            await expect(aggregator.searchByTitle('memory', 5)).resolves.toEqual([]);
        });

        it('should return partial results when some sources fail', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One')]);
            const b = new FakeAdapter('b', failing('b', 'timeout'));
            const aggregator = new LiteratureAggregator(register(a, b));

            await expect(aggregator.searchByTitle('memory', 5)).resolves.toHaveLength(1);
        });

        it('should fail when nothing was found and a source failed', async () => {
            const a = new FakeAdapter('a', failing('a', 'timeout'));
            const b = new FakeAdapter('b');
            const aggregator = new LiteratureAggregator(register(a, b));

            const error = await aggregator.searchByTitle('memory', 5).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AggregationError);
            expect(error).toMatchObject({
                message: 'No source returned results',
                failures: [{ source: 'a', message: 'timeout' }],
            });
        });

        it('should not consult sources for a blank query or non-positive limit', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One')]);
            const aggregator = new LiteratureAggregator(register(a));

            await expect(aggregator.searchByTitle('   ', 5)).resolves.toEqual([]);
            await expect(aggregator.searchByTitle('memory', 0)).resolves.toEqual([]);
            expect(a.searchByTitle).not.toHaveBeenCalled();
        });

        it('should record non-source errors by message', async () => {
            const a = new FakeAdapter('a', () => {
                throw new TypeError('unexpected shape');
            });
            const aggregator = new LiteratureAggregator(register(a));

            await expect(aggregator.searchByTitle('memory', 5)).rejects.toMatchObject({
                failures: [{ source: 'a', message: 'unexpected shape' }],
            });
        });
    });

    describe('lookupDoi', () => {
        it('should return the first record found', async () => {
            const a = new FakeAdapter('a');
            const b = new FakeAdapter('b', undefined, () => paper('b', 'Found', '10.1000/abc'));
            const c = new FakeAdapter('c', undefined, () => paper('c', 'Later', '10.1000/abc'));
            const aggregator = new LiteratureAggregator(register(a, b, c));

            const result = await aggregator.lookupDoi('doi:10.1000/abc');

            expect(result?.source).toBe('b');
            expect(a.lookupByDoi).toHaveBeenCalledWith('10.1000/abc');
            expect(c.lookupByDoi).not.toHaveBeenCalled();
        });

        it('should re-normalize the DOI on the returned record', async () => {
            const a = new FakeAdapter('a', undefined, () => paper('a', 'Found', 'https://doi.org/10.1000/abc.'));
            const aggregator = new LiteratureAggregator(register(a));

            const result = await aggregator.lookupDoi('10.1000/abc');

            expect(result?.doi).toBe('10.1000/abc');
        });

        it('should return null when no source knows the DOI', async () => {
            const aggregator = new LiteratureAggregator(register(new FakeAdapter('a'), new FakeAdapter('b')));

            await expect(aggregator.lookupDoi('10.1000/none')).resolves.toBeNull();
        });

        it('should return null when some sources fail and the rest find nothing', async () => {
            const a = new FakeAdapter('a', undefined, failing('a'));
            const b = new FakeAdapter('b');
            const aggregator = new LiteratureAggregator(register(a, b));

            await expect(aggregator.lookupDoi('10.1000/none')).resolves.toBeNull();
        });

        it('should fail when every source failed', async () => {
            const a = new FakeAdapter('a', undefined, failing('a', 'timeout'));
            const b = new FakeAdapter('b', undefined, failing('b', 'network error'));
            const aggregator = new LiteratureAggregator(register(a, b));

            await expect(aggregator.lookupDoi('10.1000/abc')).rejects.toMatchObject({
                name: 'AggregationError',
                failures: [
                    { source: 'a', message: 'timeout' },
                    { source: 'b', message: 'network error' },
                ],
            });
        });

        it('should return null for an empty DOI without consulting sources', async () => {
            const a = new FakeAdapter('a');
            const aggregator = new LiteratureAggregator(register(a));

            await expect(aggregator.lookupDoi('doi: ')).resolves.toBeNull();
            expect(a.lookupByDoi).not.toHaveBeenCalled();
        });
    });

    describe('search', () => {
        it('should route DOI-shaped queries to DOI lookup', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'Title hit')], () => paper('a', 'DOI hit', '10.1037/a0029146'));
            const aggregator = new LiteratureAggregator(register(a));

            const papers = await aggregator.search(' https://doi.org/10.1037/a0029146). ', 5);

            expect(papers.map((p) => p.title)).toEqual(['DOI hit']);
            expect(a.lookupByDoi).toHaveBeenCalledWith('10.1037/a0029146');
            expect(a.searchByTitle).not.toHaveBeenCalled();
        });

        it('should return an empty list for an unknown DOI', async () => {
            const aggregator = new LiteratureAggregator(register(new FakeAdapter('a')));

            await expect(aggregator.search('10.1000/none', 5)).resolves.toEqual([]);
        });

        it('should route free text to title search', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One'), paper('a', 'Two')]);
            const aggregator = new LiteratureAggregator(register(a));

            const papers = await aggregator.search('cognitive bias', 1);

            expect(papers.map((p) => p.title)).toEqual(['One']);
            expect(a.lookupByDoi).not.toHaveBeenCalled();
        });

        it('should fail when every source times out', async () => {
            const aggregator = new LiteratureAggregator(
                register(new FakeAdapter('a', failing('a', 'timeout')), new FakeAdapter('b', failing('b', 'timeout')))
            );

            await expect(aggregator.search('cognitive bias', 5)).rejects.toBeInstanceOf(AggregationError);
        });

        it('should return an empty list for a blank query', async () => {
            const a = new FakeAdapter('a');
            const aggregator = new LiteratureAggregator(register(a));

            await expect(aggregator.search('  ', 5)).resolves.toEqual([]);
            expect(a.searchByTitle).not.toHaveBeenCalled();
        });

        it('should not consult sources for a non-positive limit', async () => {
            const a = new FakeAdapter('a', () => [paper('a', 'One')], () => paper('a', 'One', '10.1000/abc'));
            const aggregator = new LiteratureAggregator(register(a));

            await expect(aggregator.search('10.1000/abc', 0)).resolves.toEqual([]);
            await expect(aggregator.search('memory', -1)).resolves.toEqual([]);
            expect(a.lookupByDoi).not.toHaveBeenCalled();
            expect(a.searchByTitle).not.toHaveBeenCalled();
        });
    });
});
