import {
  centsToUsd,
  formatUsd,
  rawAmountToCents,
  signedUsdToCents,
  usdToCents,
} from '../../../src/utils/money';

describe('money', () => {
  describe('usdToCents', () => {
    it.each([
      [15, 1500],
      ['15', 1500],
      ['0.5', 50],
      [12.34, 1234],
      [' 7.05 ', 705],
      ['0', 0],
    ])('should convert %p to %p cents', (input, expected) => {
      expect(usdToCents(input)).toBe(expected);
    });

    it.each([['-1'], ['1.234'], ['abc'], [''], [Number.NaN], [Number.POSITIVE_INFINITY]])(
      'should reject %p',
      (input) => {
        expect(usdToCents(input)).toBeNull();
      }
    );
  });

  describe('signedUsdToCents', () => {
    it('should accept negative amounts', () => {
      expect(signedUsdToCents('-2.50')).toBe(-250);
      expect(signedUsdToCents(-3)).toBe(-300);
    });

    it('should reject malformed negatives', () => {
      expect(signedUsdToCents('--1')).toBeNull();
    });
  });

  describe('centsToUsd', () => {
    it('should return decimal dollars', () => {
      expect(centsToUsd(1253)).toBe(12.53);
      expect(centsToUsd(-500)).toBe(-5);
    });
  });

  describe('formatUsd', () => {
    it('should format with two decimals and a leading sign', () => {
      expect(formatUsd(500)).toBe('$5.00');
      expect(formatUsd(1)).toBe('$0.01');
      expect(formatUsd(-500)).toBe('-$5.00');
    });
  });

  describe('rawAmountToCents', () => {
    it('should floor six-decimal token amounts to cents', () => {
      expect(rawAmountToCents('15000000', 6)).toBe(1500);
      expect(rawAmountToCents('15009999', 6)).toBe(1500);
      expect(rawAmountToCents('10000', 6)).toBe(1);
      expect(rawAmountToCents('9999', 6)).toBe(0);
    });

    it('should scale up tokens with fewer than two decimals', () => {
      expect(rawAmountToCents('7', 0)).toBe(700);
      expect(rawAmountToCents('75', 1)).toBe(750);
    });
  });
});
