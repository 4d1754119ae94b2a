import { describe, it, expect } from 'vitest';
import { createPaper, paperKey, UNTITLED } from '../types/index.js';
import { formatAuthors, pageSize, yearFromDateString, asInteger } from '../sources/utils.js';

describe('Paper', () => {
    describe('createPaper', () => {
        it('should apply absent values', () => {
            const paper = createPaper({ source: 'crossref' });
            expect(paper).toEqual({
                title: UNTITLED,
                year: null,
                doi: null,
                url: null,
                authors: '',
                source: 'crossref',
                citationCount: null,
            });
        });

        it('should use the placeholder for blank titles', () => {
            expect(createPaper({ source: 'plos', title: '   ' }).title).toBe('Untitled');
        });

        it('should collapse empty DOI and URL to null', () => {
            const paper = createPaper({ source: 'osf', doi: '', url: ' ' });
            expect(paper.doi).toBeNull();
            expect(paper.url).toBeNull();
        });

        it('should keep a zero citation count', () => {
            expect(createPaper({ source: 'openalex', citationCount: 0 }).citationCount).toBe(0);
        });

        it('should return a frozen record', () => {
            expect(Object.isFrozen(createPaper({ source: 'crossref', title: 'A' }))).toBe(true);
        });
    });

    describe('paperKey', () => {
        it('should key by DOI case-insensitively', () => {
            const a = createPaper({ source: 'crossref', title: 'One', doi: '10.1000/ABC' });
            const b = createPaper({ source: 'openalex', title: 'Another title', doi: '10.1000/abc' });
            expect(paperKey(a)).toBe('doi:10.1000/abc');
            expect(paperKey(a)).toBe(paperKey(b));
        });

        it('should key by normalized title without a DOI', () => {
            const a = createPaper({ source: 'plos', title: 'Working   Memory\nCapacity' });
            const b = createPaper({ source: 'doaj', title: 'working memory capacity' });
            expect(paperKey(a)).toBe('title:working memory capacity');
            expect(paperKey(a)).toBe(paperKey(b));
        });

        it('should cap title keys at 200 characters', () => {
            const paper = createPaper({ source: 'plos', title: 'x'.repeat(250) });
            expect(paperKey(paper)).toBe(`title:${'x'.repeat(200)}`);
        });

        it('should distinguish DOI and title keys', () => {
            const withDoi = createPaper({ source: 'crossref', title: 'Same', doi: '10.1000/x' });
            const withoutDoi = createPaper({ source: 'plos', title: 'Same' });
            expect(paperKey(withDoi)).not.toBe(paperKey(withoutDoi));
        });
    });
});

describe('source field readers', () => {
    describe('formatAuthors', () => {
        it('should join up to four names', () => {
            expect(formatAuthors(['A', 'B', 'C'])).toBe('A, B, C');
            expect(formatAuthors(['A', 'B', 'C', 'D'])).toBe('A, B, C, D');
        });

        it('should append et al. beyond four', () => {
            expect(formatAuthors(['A', 'B', 'C', 'D', 'E'])).toBe('A, B, C, D et al.');
        });

        it('should count entries without a name towards the total', () => {
            expect(formatAuthors(['A', null, 'C', 'D', 'E'])).toBe('A, C, D et al.');
            expect(formatAuthors(['A'], 7)).toBe('A et al.');
        });

        it('should return an empty string for no authors', () => {
            expect(formatAuthors([])).toBe('');
        });
    });

    describe('yearFromDateString', () => {
        it('should read the leading year', () => {
            expect(yearFromDateString('2021-03-04')).toBe(2021);
            expect(yearFromDateString('2019')).toBe(2019);
        });

        it('should return null otherwise', () => {
            expect(yearFromDateString('March 2021')).toBeNull();
            expect(yearFromDateString(2021)).toBeNull();
        });
    });

    describe('asInteger', () => {
        it('should accept integers and numeric strings', () => {
            expect(asInteger(12)).toBe(12);
            expect(asInteger('2019')).toBe(2019);
        });

        it('should reject fractions and text', () => {
            expect(asInteger(1.5)).toBeNull();
            expect(asInteger('n/a')).toBeNull();
            expect(asInteger(null)).toBeNull();
        });
    });

    describe('pageSize', () => {
        it('should clamp to the source range', () => {
            expect(pageSize(0, 100)).toBe(1);
            expect(pageSize(5, 100)).toBe(5);
            expect(pageSize(500, 100)).toBe(100);
        });
    });
});
