import { describe, it, expect } from 'vitest';
import {
    extractLastName,
    firstAuthorSurname,
    journalAbbreviates,
    levenshteinDistance,
    normalizeDoi,
    normalizePages,
    normalizePmid,
    normalizeText,
    normalizeTitle,
    titleSimilarity,
    tokenSimilarity,
} from '../core/normalize.js';

describe('Normalizer', () => {
    describe('normalizeDoi', () => {
        it('should collapse every prefix variant to the bare lowercase DOI', () => {
            const variants = [
                '10.1234/abc',
                'doi:10.1234/ABC',
                'DOI: 10.1234/abc',
                'https://doi.org/10.1234/abc',
                'http://dx.doi.org/10.1234/abc',
                '  10.1234/abc.  ',
            ];
            for (const variant of variants) {
                expect(normalizeDoi(variant)).toBe('10.1234/abc');
            }
        });

        it('should be idempotent', () => {
            const inputs = ['https://doi.org/10.5555/Trial.2015.001', 'doi:10.1002/(SICI)1097-4636', '10.1234/x;'];
            for (const input of inputs) {
                const once = normalizeDoi(input);
                expect(normalizeDoi(once)).toBe(once);
            }
        });

        it('should keep balanced parentheses and drop an unbalanced closing one', () => {
            expect(normalizeDoi('10.1002/(SICI)1097-4636(199605)')).toBe('10.1002/(sici)1097-4636(199605)');
            expect(normalizeDoi('10.1234/abc)')).toBe('10.1234/abc');
        });

        it('should return null for anything that is not a DOI', () => {
            expect(normalizeDoi('not a doi')).toBeNull();
            expect(normalizeDoi('11.1234/abc')).toBeNull();
            expect(normalizeDoi('')).toBeNull();
            expect(normalizeDoi(null)).toBeNull();
            expect(normalizeDoi(undefined)).toBeNull();
        });
    });

    describe('normalizePmid', () => {
        it('should accept digits, numbers and a PMID prefix', () => {
            expect(normalizePmid('12345')).toBe('12345');
            expect(normalizePmid(12345)).toBe('12345');
            expect(normalizePmid('PMID: 26308998')).toBe('26308998');
        });

        it('should reject non-numeric input', () => {
            expect(normalizePmid('abc')).toBeNull();
            expect(normalizePmid('')).toBeNull();
            expect(normalizePmid(null)).toBeNull();
        });
    });

    describe('normalizeText', () => {
        it('should decode entities, drop markup and fold dashes and quotes', () => {
            expect(normalizeText('Heart &amp; Lung')).toBe('Heart & Lung');
            expect(normalizeText('Effect of <i>E. coli</i>')).toBe('Effect of E. coli');
            expect(normalizeText('pre–post “study”')).toBe("pre-post 'study'");
            expect(normalizeText('&#233;t&#xE9;')).toBe('été');
        });

        it('should leave comparison operators alone', () => {
            expect(normalizeText('p < 0.05 and x > 3')).toBe('p < 0.05 and x > 3');
        });
    });

    describe('normalizeTitle', () => {
        it('should lowercase, strip punctuation and a leading article', () => {
            expect(normalizeTitle('The Effect of X: A Trial.')).toBe('effect of x a trial');
        });

        it('should treat markup and entities as plain text', () => {
            expect(normalizeTitle('Heart &amp; <b>Lung</b>')).toBe('heart lung');
        });

        it('should return an empty key for empty input', () => {
            expect(normalizeTitle('')).toBe('');
            expect(normalizeTitle(null)).toBe('');
        });
    });

    describe('tokenSimilarity', () => {
        it('should compute Jaccard similarity on word tokens', () => {
            expect(tokenSimilarity('heart failure outcomes', 'Heart failure outcomes in adults')).toBeCloseTo(0.6);
            expect(tokenSimilarity('same words here', 'here words same')).toBe(1);
        });

        it('should return 0 when either side is empty', () => {
            expect(tokenSimilarity('', 'anything')).toBe(0);
            expect(tokenSimilarity('anything', null)).toBe(0);
        });
    });

    describe('titleSimilarity', () => {
        it('should return 1.0 for titles that differ only in case and punctuation', () => {
            expect(titleSimilarity('Attention Is All You Need', 'attention is all you need.')).toBe(1.0);
        });

        it('should score near-identical titles high and unrelated ones low', () => {
            expect(titleSimilarity('Sleep and mood in shift workers', 'Sleep and mood in shift worker')).toBeGreaterThan(0.9);
            expect(titleSimilarity('Sleep and mood in shift workers', 'Tax law')).toBeLessThan(0.5);
        });

        it('should score two empty titles 0', () => {
            expect(titleSimilarity('', '')).toBe(0);
        });

        it('should compute Levenshtein distance', () => {
            expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
            expect(levenshteinDistance('', 'abc')).toBe(3);
        });
    });

    describe('extractLastName', () => {
        it('should handle the common name layouts', () => {
            expect(extractLastName('Smith, John')).toBe('smith');
            expect(extractLastName('Smith JA')).toBe('smith');
            expect(extractLastName('J. A. Smith')).toBe('smith');
            expect(extractLastName('John Smith')).toBe('smith');
            expect(extractLastName('Smith')).toBe('smith');
        });

        it('should drop diacritics and keep hyphenated surnames', () => {
            expect(extractLastName('Müller')).toBe('muller');
            expect(extractLastName('García-López M')).toBe('garcia-lopez');
        });

        it('should return an empty string for empty input', () => {
            expect(extractLastName('')).toBe('');
            expect(firstAuthorSurname([])).toBe('');
            expect(firstAuthorSurname(['Okafor N', 'Lee A'])).toBe('okafor');
        });
    });

    describe('normalizePages', () => {
        it('should expand abbreviated ranges', () => {
            expect(normalizePages('823-33')).toBe('823-833');
            expect(normalizePages('1125-1130')).toBe('1125-1130');
        });

        it('should unify dashes and drop a pp. prefix and spaces', () => {
            expect(normalizePages('pp. 823–833')).toBe('823-833');
            expect(normalizePages('823 - 833')).toBe('823-833');
        });

        it('should leave non-ranges as they are', () => {
            expect(normalizePages('e123')).toBe('e123');
        });
    });

    describe('journalAbbreviates', () => {
        it('should match an abbreviation word by word', () => {
            expect(journalAbbreviates('N Engl J Med', 'The New England Journal of Medicine')).toBe(true);
            expect(journalAbbreviates('J. Clin. Oncol.', 'Journal of Clinical Oncology')).toBe(true);
        });

        it('should not match different journals', () => {
            expect(journalAbbreviates('Lancet', 'JAMA')).toBe(false);
            expect(journalAbbreviates('J Clin Oncol', 'Journal of Clinical Nutrition')).toBe(false);
        });
    });
});
