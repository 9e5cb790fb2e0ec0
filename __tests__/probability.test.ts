/**
 * Tests for entropy and surprisal helpers
 */

import { InvalidConditionalProbabilityError, InvalidProbabilityDistributionError } from '../errors';
import { entropy, normalizeCounts, surprisal, uniformEntropy } from '../probability';

describe('probability', () => {
  describe('entropy', () => {
    it('is exactly zero for a single outcome', () => {
      expect(Object.is(entropy([1.0]), 0)).toBe(true);
    });

    it('is one bit for a fair coin', () => {
      expect(entropy([0.5, 0.5])).toBe(1);
      expect(entropy([0.5, 0.5], 2)).toBe(1);
    });

    it('takes another log base', () => {
      expect(entropy([0.5, 0.5], 4)).toBeCloseTo(0.5, 12);
    });

    it('rejects probabilities that do not sum to one', () => {
      expect(() => entropy([0.5, 0.49])).toThrow(InvalidProbabilityDistributionError);
      expect(() => entropy([0.5, 0.49])).toThrow('Sum of probabilities is not 1.0');
    });

    it('tolerates rounding drift', () => {
      expect(entropy([1 / 3, 1 / 3, 1 / 3])).toBeCloseTo(Math.log2(3), 12);
    });

    it('rejects an empty distribution', () => {
      expect(() => entropy([])).toThrow(InvalidProbabilityDistributionError);
    });
  });

  describe('uniformEntropy', () => {
    it('is exactly log2(n)', () => {
      for (let n = 1; n <= 64; n++) {
        expect(uniformEntropy(n)).toBe(Math.log2(n));
      }
    });

    it('agrees with the entropy of n equal probabilities', () => {
      for (const n of [2, 3, 5, 7, 12]) {
        expect(uniformEntropy(n)).toBeCloseTo(entropy(normalizeCounts(Array<number>(n).fill(1))), 12);
      }
    });

    it('takes another base', () => {
      expect(uniformEntropy(16, 4)).toBeCloseTo(2, 12);
    });

    it('is exactly zero for one outcome', () => {
      expect(Object.is(uniformEntropy(1), 0)).toBe(true);
    });

    it('is never negative', () => {
      for (let n = 1; n < 50; n++) {
        expect(uniformEntropy(n)).toBeGreaterThanOrEqual(0);
      }
    });

    it('rejects zero outcomes', () => {
      expect(() => uniformEntropy(0)).toThrow(InvalidProbabilityDistributionError);
    });
  });

  describe('surprisal', () => {
    it('is exactly zero when event and context are equal', () => {
      expect(Object.is(surprisal(0.5, 0.5), 0)).toBe(true);
      expect(Object.is(surprisal(7, 7), 0)).toBe(true);
    });

    it('is the log ratio of event to context', () => {
      expect(surprisal(0.25, 0.5)).toBe(1);
      expect(surprisal(0.25, 0.5, 4)).toBeCloseTo(0.5, 12);
    });

    it('works on counts', () => {
      expect(surprisal(1, 2)).toBe(1);
      expect(surprisal(10, 15)).toBeCloseTo(-Math.log2(10 / 15), 12);
    });

    it('rejects an event more likely than its context', () => {
      expect(() => surprisal(0.75, 0.5)).toThrow(InvalidConditionalProbabilityError);
      expect(() => surprisal(0.75, 0.5)).toThrow(expect.objectContaining({ kind: 'InvalidConditionalProbability' }));
      expect(() => surprisal(3, 2)).toThrow('Improper conditional probability (event 3 > context 2)');
    });
  });

  describe('normalizeCounts', () => {
    it('divides by the total', () => {
      expect(normalizeCounts([1.0, 1.0])).toEqual([0.5, 0.5]);
      expect(normalizeCounts([1.0, 2.0, 1.0])).toEqual([0.25, 0.5, 0.25]);
    });
  });
});
