import { describe, it, expect } from 'vitest';
import { createRecord, hasValue, sortOrigins } from '../core/record.js';
import { explainMatch, matchRecords, type Matchable } from '../core/matcher.js';
import { mergeAll, mergeRecords } from '../core/merger.js';
import { deduplicate } from '../core/deduplicator.js';
import type { BibRecord } from '../types/index.js';

function matchable(fields: Partial<Matchable>): Matchable {
    return { title: '', authors: [], year: null, doi: null, pmid: null, ...fields };
}

function permutations<T>(items: readonly T[]): T[][] {
    if (items.length <= 1) return [[...items]];
    return items.flatMap((item, i) =>
        permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
    );
}

describe('Records', () => {
    describe('createRecord', () => {
        it('should normalize identifiers and stamp provenance on non-empty fields', () => {
            const record = createRecord('pubmed', {
                title: '  A trial  ',
                authors: ['Ann Lee', ' '],
                doi: 'https://doi.org/10.5555/ABC',
                pmid: 'PMID: 42',
            });

            expect(record).toEqual({
                title: 'A trial',
                authors: ['Ann Lee'],
                year: null,
                journal: '',
                volume: '',
                issue: '',
                pages: '',
                doi: '10.5555/abc',
                pmid: '42',
                source_id: null,
                abstract: null,
                citation_count: 0,
                origin: ['pubmed'],
                retracted: false,
                provenance: { title: 'pubmed', authors: 'pubmed', doi: 'pubmed', pmid: 'pubmed' },
            });
        });

        it('should treat blank strings and empty lists as missing', () => {
            const record = createRecord('crossref', { journal: '   ' });
            expect(hasValue(record, 'journal')).toBe(false);
            expect(hasValue(record, 'authors')).toBe(false);
            expect(hasValue(record, 'year')).toBe(false);
        });

        it('should sort origins into canonical order', () => {
            expect(sortOrigins(['semantic_scholar', 'crossref', 'semantic_scholar'])).toEqual([
                'crossref',
                'semantic_scholar',
            ]);
        });
    });

    describe('Matcher', () => {
        it('should let conflicting DOIs veto identical metadata', () => {
            const a = matchable({ title: 'Same title', year: 2020, doi: '10.5555/one' });
            const b = matchable({ title: 'Same title', year: 2020, doi: '10.5555/two' });
            expect(explainMatch(a, b)).toEqual({ matched: false, rule: 'doi-conflict' });
        });

        it('should match equal DOIs regardless of case and prefix', () => {
            const a = matchable({ title: 'One', doi: '10.5555/ABC' });
            const b = matchable({ title: 'Completely different', doi: 'https://doi.org/10.5555/abc' });
            expect(explainMatch(a, b)).toEqual({ matched: true, rule: 'doi-equal' });
        });

        it('should decide on PMIDs when DOIs are not on both sides', () => {
            const a = matchable({ title: 'One', doi: '10.5555/abc', pmid: '111' });
            const b = matchable({ title: 'Two', pmid: '111' });
            const c = matchable({ title: 'One', pmid: '222' });
            expect(explainMatch(a, b)).toEqual({ matched: true, rule: 'pmid-equal' });
            expect(explainMatch(a, c)).toEqual({ matched: false, rule: 'pmid-conflict' });
        });

        it('should fall back to title, year and first author', () => {
            const a = matchable({
                title: 'Sleep duration and cardiometabolic risk',
                authors: ['Okafor N'],
                year: 2019,
                doi: '10.5555/s.1',
            });
            const b = matchable({
                title: 'Sleep Duration and Cardiometabolic Risk.',
                authors: ['Nkechi Okafor'],
                year: 2019,
                pmid: '31000123',
            });
            expect(explainMatch(a, b)).toEqual({ matched: true, rule: 'fuzzy', titleScore: 1 });
        });

        it('should require equal years, with unknown only matching unknown', () => {
            const a = matchable({ title: 'Sleep duration and cardiometabolic risk', year: 2019 });
            expect(matchRecords(a, { ...a, year: 2020 })).toBe(false);
            expect(matchRecords(a, { ...a, year: null })).toBe(false);
            expect(matchRecords({ ...a, year: null }, { ...a, year: null })).toBe(true);
        });

        it('should compare first authors only when both sides have them', () => {
            const a = matchable({ title: 'Sleep duration and cardiometabolic risk', year: 2019, authors: ['Okafor N'] });
            expect(matchRecords(a, { ...a, authors: ['Lee A'] })).toBe(false);
            expect(matchRecords(a, { ...a, authors: [] })).toBe(true);
        });

        it('should never match two records without titles or identifiers', () => {
            expect(matchRecords(matchable({}), matchable({}))).toBe(false);
        });

        it('should honor a custom title threshold', () => {
            const a = matchable({ title: 'Sleep and mood in shift workers', year: 2020 });
            const b = matchable({ title: 'Sleep and mood in older adults', year: 2020 });
            expect(matchRecords(a, b)).toBe(false);
            expect(matchRecords(a, b, { titleSimilarityThreshold: 0.5 })).toBe(true);
        });

        it('should be symmetric', () => {
            const records = [
                matchable({ title: 'Sleep and mood', year: 2020, authors: ['Ann Lee'] }),
                matchable({ title: 'Sleep and mood.', year: 2020, doi: '10.5555/x' }),
                matchable({ title: 'Sleep and moods', year: 2020, pmid: '5' }),
                matchable({ title: 'Other', doi: '10.5555/y', pmid: '5' }),
            ];
            for (const a of records) {
                for (const b of records) {
                    expect(explainMatch(a, b)).toEqual(explainMatch(b, a));
                }
            }
        });
    });

    describe('Merger', () => {
        const crossref = createRecord('crossref', {
            title: 'Effect of Drug X on Outcome Y',
            authors: ['Jane Doe', 'Al Roe'],
            year: 2015,
            journal: 'N Engl J Med',
            volume: '373',
            issue: '9',
            pages: '823-833',
            doi: '10.5555/drugx.1',
            citation_count: 120,
        });
        const pubmed = createRecord('pubmed', {
            title: 'Effect of drug X on outcome Y.',
            authors: ['Jane Doe', 'Al Roe', 'Bo Poe'],
            year: 2015,
            journal: 'The New England journal of medicine',
            volume: '373',
            issue: '9',
            pages: '823-33',
            doi: '10.5555/drugx.1',
            pmid: '26000001',
            abstract: 'Background and results.',
        });
        const semantic = createRecord('semantic_scholar', {
            title: 'Effect of Drug X on Outcome Y',
            authors: ['J. Doe'],
            year: 2015,
            journal: 'New England Journal of Medicine',
            doi: '10.5555/DRUGX.1',
            source_id: 's2-drugx',
            citation_count: 150,
        });

        it('should pick each field by precedence and record where it came from', () => {
            const merged = mergeRecords(crossref, pubmed);

            expect(merged).toEqual({
                title: 'Effect of Drug X on Outcome Y',
                authors: ['Jane Doe', 'Al Roe', 'Bo Poe'],
                year: 2015,
                journal: 'N Engl J Med',
                volume: '373',
                issue: '9',
                pages: '823-833',
                doi: '10.5555/drugx.1',
                pmid: '26000001',
                source_id: null,
                abstract: 'Background and results.',
                citation_count: 120,
                origin: ['crossref', 'pubmed'],
                retracted: false,
                provenance: {
                    title: 'crossref',
                    authors: 'pubmed',
                    year: 'crossref',
                    journal: 'crossref',
                    volume: 'crossref',
                    issue: 'crossref',
                    pages: 'crossref',
                    doi: 'crossref',
                    pmid: 'pubmed',
                },
            });
        });

        it('should follow a different precedence when given one', () => {
            const merged = mergeRecords(crossref, pubmed, ['pubmed', 'crossref', 'semantic_scholar']);

            expect(merged.title).toBe('Effect of drug X on outcome Y.');
            expect(merged.journal).toBe('The New England journal of medicine');
            expect(merged.pages).toBe('823-33');
            expect(merged.provenance.title).toBe('pubmed');
            expect(merged.provenance.doi).toBe('pubmed');
        });

        it('should be commutative', () => {
            expect(mergeRecords(pubmed, crossref)).toEqual(mergeRecords(crossref, pubmed));
            expect(mergeRecords(semantic, pubmed)).toEqual(mergeRecords(pubmed, semantic));
        });

        it('should be associative', () => {
            const left = mergeRecords(mergeRecords(crossref, pubmed), semantic);
            const right = mergeRecords(crossref, mergeRecords(pubmed, semantic));
            expect(left).toEqual(right);
        });

        it('should be idempotent', () => {
            expect(mergeRecords(crossref, crossref)).toEqual(crossref);
        });

        it('should keep the highest citation count and any retraction', () => {
            const retracted: BibRecord = { ...pubmed, retracted: true };
            const merged = mergeAll([crossref, retracted, semantic]);

            expect(merged?.citation_count).toBe(150);
            expect(merged?.retracted).toBe(true);
            expect(merged?.source_id).toBe('s2-drugx');
            expect(merged?.origin).toEqual(['crossref', 'pubmed', 'semantic_scholar']);
        });

        it('should return null when merging nothing', () => {
            expect(mergeAll([])).toBeNull();
        });
    });

    describe('Deduplicator', () => {
        const byPmid = createRecord('pubmed', { title: 'Alpha study of sleep', authors: ['Ann Lee'], year: 2020, pmid: '111' });
        const byDoi = createRecord('crossref', { title: 'Beta trial of mood', authors: ['Bob Kay'], year: 2021, doi: '10.5555/d.1' });
        const bridge = createRecord('semantic_scholar', {
            title: 'Gamma',
            authors: ['Cy Doe'],
            year: 2022,
            doi: '10.5555/d.1',
            pmid: '111',
            source_id: 's2m',
        });

        it('should collapse records joined through a merged identifier in any input order', () => {
            for (const order of permutations([byPmid, byDoi, bridge])) {
                const records = deduplicate(order);

                expect(records).toHaveLength(1);
                expect(records[0]?.title).toBe('Beta trial of mood');
                expect(records[0]?.doi).toBe('10.5555/d.1');
                expect(records[0]?.pmid).toBe('111');
                expect(records[0]?.source_id).toBe('s2m');
                expect(records[0]?.origin).toEqual(['crossref', 'pubmed', 'semantic_scholar']);
            }
        });

        it('should fold an earlier entry that matches only after a merge fills in its year', () => {
            const noIds = createRecord('pubmed', { title: 'Heart rate variability in runners', year: 2020 });
            const withDoi = createRecord('crossref', { title: 'Heart rate variability in runners', doi: '10.5555/hrv.1' });
            const yearOnly = createRecord('semantic_scholar', { doi: '10.5555/hrv.1', year: 2020 });

            for (const order of permutations([noIds, withDoi, yearOnly])) {
                const records = deduplicate(order);

                expect(records).toHaveLength(1);
                expect(records[0]?.title).toBe('Heart rate variability in runners');
                expect(records[0]?.year).toBe(2020);
                expect(records[0]?.doi).toBe('10.5555/hrv.1');
                expect(records[0]?.origin).toEqual(['crossref', 'pubmed', 'semantic_scholar']);
            }
        });

        it('should keep records with conflicting DOIs apart', () => {
            const a = createRecord('crossref', { title: 'Same title', year: 2020, doi: '10.5555/one' });
            const b = createRecord('pubmed', { title: 'Same title', year: 2020, doi: '10.5555/two' });
            expect(deduplicate([a, b])).toHaveLength(2);
        });

        it('should sort by citation count, ties in order of first appearance', () => {
            const a = createRecord('crossref', { title: 'First paper', doi: '10.5555/a', citation_count: 5 });
            const b = createRecord('crossref', { title: 'Second paper', doi: '10.5555/b', citation_count: 50 });
            const c = createRecord('crossref', { title: 'Third paper', doi: '10.5555/c', citation_count: 5 });

            expect(deduplicate([a, b, c]).map((r) => r.title)).toEqual(['Second paper', 'First paper', 'Third paper']);
        });

        it('should return an empty list for no input', () => {
            expect(deduplicate([])).toEqual([]);
        });
    });
});
