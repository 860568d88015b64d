import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  MAX_COMPONENT,
  between,
  greaterOrEqual,
  lessOrEqual,
} from '../digit-range.js';
import { CONTRADICTION } from '../fragments.js';

const anchored = (fragment: string): RegExp => new RegExp(`^${fragment}$`);

const threshold = fc
  .bigInt({ min: 0n, max: BigInt(MAX_COMPONENT) })
  .map((value) => Number(value));

function neighbourhood(n: number): number[] {
  const around = [n - 2, n - 1, n, n + 1, n + 2, 0, MAX_COMPONENT];
  return around.filter((x) => x >= 0 && x <= MAX_COMPONENT);
}

describe('greaterOrEqual', () => {
  it('matches every integer for thresholds at or below zero', () => {
    expect(greaterOrEqual(0)).toBe('\\d+');
    expect(greaterOrEqual(-3)).toBe('\\d+');
    expect(anchored(greaterOrEqual(0)).test('0')).toBe(true);
  });

  it('builds per-position alternatives', () => {
    expect(greaterOrEqual(5)).toBe('(?:\\d{2,}|[5-9])');
    expect(greaterOrEqual(15)).toBe('(?:\\d{3,}|[2-9]\\d|1[5-9])');
    expect(greaterOrEqual(99)).toBe('(?:\\d{3,}|99)');
  });

  it('omits the longer-number alternative at the ten-digit cap', () => {
    expect(greaterOrEqual(MAX_COMPONENT)).toBe('9999999999');
    expect(greaterOrEqual(MAX_COMPONENT + 1)).toBe(CONTRADICTION);
  });

  it('agrees with numeric comparison around any threshold', () => {
    fc.assert(
      fc.property(threshold, (n) => {
        const re = anchored(greaterOrEqual(n));
        for (const x of neighbourhood(n)) {
          expect(re.test(String(x))).toBe(x >= n);
        }
      }),
      { numRuns: 500 }
    );
  });

  it('rejects non-integer thresholds', () => {
    expect(() => greaterOrEqual(1.5)).toThrow(RangeError);
  });
});

describe('lessOrEqual', () => {
  it('builds shorter-width runs and per-position alternatives', () => {
    expect(lessOrEqual(9)).toBe('[0-9]');
    expect(lessOrEqual(15)).toBe('(?:\\d|0\\d|1[0-5])');
    expect(lessOrEqual(0)).toBe('0');
  });

  it('returns the contradiction for negative thresholds', () => {
    expect(lessOrEqual(-1)).toBe(CONTRADICTION);
    const re = anchored(lessOrEqual(-1));
    expect(re.test('')).toBe(false);
    expect(re.test('0')).toBe(false);
    expect(re.test('-1')).toBe(false);
  });

  it('clamps thresholds above the cap', () => {
    expect(lessOrEqual(MAX_COMPONENT + 5)).toBe(lessOrEqual(MAX_COMPONENT));
  });

  it('agrees with numeric comparison around any threshold', () => {
    fc.assert(
      fc.property(threshold, (n) => {
        const re = anchored(lessOrEqual(n));
        for (const x of neighbourhood(n)) {
          expect(re.test(String(x))).toBe(x <= n);
        }
      }),
      { numRuns: 500 }
    );
  });
});

describe('powers of ten', () => {
  const powers = Array.from({ length: 10 }, (_, k) => 10 ** k);

  it.each(powers)('separates %i from its predecessor', (n) => {
    const gte = anchored(greaterOrEqual(n));
    const lte = anchored(lessOrEqual(n));
    const below = anchored(lessOrEqual(n - 1));

    expect(gte.test(String(n))).toBe(true);
    expect(gte.test(String(n - 1))).toBe(false);
    expect(lte.test(String(n))).toBe(true);
    expect(lte.test(String(n - 1))).toBe(true);
    expect(lte.test(String(n + 1))).toBe(false);
    expect(below.test(String(n))).toBe(false);
    expect(below.test(String(n - 1))).toBe(true);
  });
});

describe('between', () => {
  it('collapses degenerate intervals', () => {
    expect(between(3, 3)).toBe('3');
    expect(between(5, 2)).toBe(CONTRADICTION);
    expect(between(0, -1)).toBe(CONTRADICTION);
    expect(between(0, 15)).toBe(lessOrEqual(15));
  });

  it('uses a single band for a full digit-count bucket', () => {
    expect(between(10, 99)).toBe('[1-9]\\d');
  });

  it('matches exactly the closed interval', () => {
    const bounds = fc
      .tuple(threshold, fc.integer({ min: 0, max: 5000 }))
      .map(([lo, width]) => [lo, Math.min(lo + width, MAX_COMPONENT)] as const);

    fc.assert(
      fc.property(bounds, ([lo, hi]) => {
        const re = anchored(between(lo, hi));
        const probes = [...neighbourhood(lo), ...neighbourhood(hi)];
        for (const x of probes) {
          expect(re.test(String(x))).toBe(x >= lo && x <= hi);
        }
      }),
      { numRuns: 500 }
    );
  });

  it('handles intervals spanning several digit counts', () => {
    const re = anchored(between(7, 12345));
    for (const [x, expected] of [
      [6, false],
      [7, true],
      [99, true],
      [1000, true],
      [12345, true],
      [12346, false],
      [99999, false],
    ] as const) {
      expect(re.test(String(x))).toBe(expected);
    }
  });
});
