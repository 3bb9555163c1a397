import type { Circle } from '../../types/drawing';
import { compareXThenY, isAtOrigin, sortedUniquePoints } from '../point-order';
import { ceilToTenth, roundHalfAwayFromZero, roundHalfEven, toFixedHalfEven } from '../rounding';

function c(x: number, y: number, diameter: number): Circle {
  return { kind: 'circle', x, y, diameter };
}

describe('sortedUniquePoints', () => {
  it('keeps one circle per position after sorting', () => {
    const result = sortedUniquePoints([c(1, 0, 2), c(0, 0, 1), c(0, 0, 1)]);

    expect(result).toEqual([c(0, 0, 1), c(1, 0, 2)]);
  });

  it('orders by X, then Y', () => {
    const result = sortedUniquePoints([c(2, 1, 1), c(1, 5, 1), c(1, 2, 1), c(-3, 9, 1)]);

    expect(result.map((p) => [p.x, p.y])).toEqual([[-3, 9], [1, 2], [1, 5], [2, 1]]);
  });

  it('collapses stacked circles of different sizes to the smallest', () => {
    const result = sortedUniquePoints([c(4, 4, 2), c(4, 4, 0.5)]);

    expect(result).toEqual([c(4, 4, 0.5)]);
  });

  it('does not modify its input', () => {
    const input = [c(2, 0, 1), c(1, 0, 1)];
    sortedUniquePoints(input);
    expect(input).toEqual([c(2, 0, 1), c(1, 0, 1)]);
  });
});

describe('compareXThenY', () => {
  it('returns 0 only for identical position and diameter', () => {
    expect(compareXThenY(c(1, 1, 1), c(1, 1, 1))).toBe(0);
    expect(compareXThenY(c(1, 1, 1), c(1, 1, 2))).toBeLessThan(0);
    expect(compareXThenY(c(1, 2, 1), c(1, 1, 1))).toBeGreaterThan(0);
  });
});

describe('isAtOrigin', () => {
  it('is true only at exactly (0, 0)', () => {
    expect(isAtOrigin(c(0, 0, 1))).toBe(true);
    expect(isAtOrigin({ kind: 'circle', diameter: 1 })).toBe(true);
    expect(isAtOrigin(c(0, 0.125, 1))).toBe(false);
  });
});

describe('rounding', () => {
  it('rounds ties to even', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(-1.5)).toBe(-2);
    expect(roundHalfEven(2.4)).toBe(2);
  });

  it('rounds ties away from zero', () => {
    expect(roundHalfAwayFromZero(0.5)).toBe(1);
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-0.5)).toBe(-1);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(2.4)).toBe(2);
  });

  it('formats fixed decimals with ties to even', () => {
    expect(toFixedHalfEven(0.125, 2)).toBe('0.12');
    expect(toFixedHalfEven(0.375, 2)).toBe('0.38');
    expect(toFixedHalfEven(10, 2)).toBe('10.00');
  });

  it('rounds up to the next tenth', () => {
    expect(ceilToTenth(0.5)).toBe(0.5);
    expect(ceilToTenth(0.75)).toBe(0.8);
    expect(ceilToTenth(0.3)).toBe(0.3);
    expect(ceilToTenth(0.01)).toBe(0.1);
  });
});
