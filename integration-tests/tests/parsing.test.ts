/**
 * Value Parsing Tests
 */

import { findAmounts, findDates, findPercentages, normalizeText, splitSentences } from '@memobench/shared';

describe('Value parsing', () => {
  describe('findAmounts', () => {
    it('should read currency markers and scale words', () => {
      expect(findAmounts('$1.5 billion and USD 75 million and €40m').map(({ amount, currency, text }) => ({ amount, currency, text }))).toEqual([
        { amount: 1500000000, currency: 'USD', text: '$1.5 billion' },
        { amount: 75000000, currency: 'USD', text: 'USD 75 million' },
        { amount: 40000000, currency: 'EUR', text: '€40m' },
      ]);
    });

    it('should read thousands separators', () => {
      expect(findAmounts('an aggregate principal amount of $250,000,000')[0]).toMatchObject({
        amount: 250000000,
        currency: 'USD',
        text: '$250,000,000',
      });
    });

    it('should ignore bare numbers', () => {
      expect(findAmounts('4.50 to 1.00')).toEqual([]);
    });
  });

  describe('findPercentages', () => {
    it('should read percent signs and basis points in order', () => {
      expect(findPercentages('SOFR plus 3.25% per annum, floor of 50 bps').map(({ percentage, text }) => ({ percentage, text }))).toEqual([
        { percentage: 3.25, text: '3.25%' },
        { percentage: 0.5, text: '50 bps' },
      ]);
    });
  });

  describe('findDates', () => {
    it('should read ISO, month-first, day-first and US numeric dates', () => {
      const text = '2029-01-15, January 15, 2029, 15th day of January, 2029, 1/15/2029, February 30, 2029';
      expect(findDates(text).map(({ date, text: raw }) => ({ date, raw }))).toEqual([
        { date: '2029-01-15', raw: '2029-01-15' },
        { date: '2029-01-15', raw: 'January 15, 2029' },
        { date: '2029-01-15', raw: '15th day of January, 2029' },
        { date: '2029-01-15', raw: '1/15/2029' },
      ]);
    });
  });

  describe('splitSentences', () => {
    it('should split on sentence ends, semicolons and newlines', () => {
      expect(
        splitSentences('Loans bear interest at 3.25% per annum. Interest is payable quarterly; Principal is due at maturity.\nSection 2.01 Commitments')
      ).toEqual([
        'Loans bear interest at 3.25% per annum.',
        'Interest is payable quarterly;',
        'Principal is due at maturity.',
        'Section 2.01 Commitments',
      ]);
    });

    it('should not split after common abbreviations', () => {
      expect(splitSentences('Acme Co. Ltd. agrees. The Lenders consent.')).toEqual(['Acme Co. Ltd. agrees.', 'The Lenders consent.']);
    });
  });

  describe('normalizeText', () => {
    it('should lowercase, drop punctuation and keep decimal points', () => {
      expect(normalizeText('Interest: 3.25% p.a., payable Quarterly.')).toBe('interest 3.25% p a payable quarterly');
    });
  });
});
