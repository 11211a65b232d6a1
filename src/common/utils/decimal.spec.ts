import { averageHalfEven, divideHalfEven, hasAtMostTwoDecimals, toHundredths } from './decimal';

describe('decimal helpers', () => {
  describe('divideHalfEven', () => {
    it('rounds ties to the even neighbour', () => {
      expect(divideHalfEven(5, 2)).toBe(2);
      expect(divideHalfEven(7, 2)).toBe(4);
      expect(divideHalfEven(16001, 2)).toBe(8000);
      expect(divideHalfEven(16003, 2)).toBe(8002);
    });

    it('rounds non-ties to the nearest integer', () => {
      expect(divideHalfEven(26300, 3)).toBe(8767);
      expect(divideHalfEven(10, 3)).toBe(3);
      expect(divideHalfEven(880000, 100)).toBe(8800);
    });

    it('rejects non-integer input', () => {
      expect(() => divideHalfEven(1.5, 2)).toThrow(RangeError);
      expect(() => divideHalfEven(1, 0)).toThrow(RangeError);
    });
  });

  describe('averageHalfEven', () => {
    it('returns null for no values', () => {
      expect(averageHalfEven([])).toBeNull();
    });

    it('averages to two decimals with banker rounding', () => {
      expect(averageHalfEven([85, 90, 88])).toBe(87.67);
      expect(averageHalfEven([80, 80.01])).toBe(80);
      expect(averageHalfEven([80.01, 80.02])).toBe(80.02);
    });
  });

  it('detects values with more than two decimals', () => {
    expect(hasAtMostTwoDecimals(88.25)).toBe(true);
    expect(hasAtMostTwoDecimals(0.1)).toBe(true);
    expect(hasAtMostTwoDecimals(88.255)).toBe(false);
    expect(hasAtMostTwoDecimals(Number.NaN)).toBe(false);
  });

  it('converts to hundredths without float drift', () => {
    expect(toHundredths(0.29)).toBe(29);
    expect(toHundredths(80.01)).toBe(8001);
  });
});
