import { describe, it, expect, beforeEach } from 'vitest';

import {
  clearPatternCache,
  getCachedPattern,
  patternCacheSize,
  setCachedPattern,
} from '../pattern-cache.js';
import { resolveOptions } from '../../types/options.js';
import type { ConstraintPattern } from '../../types/constraint.js';

function pattern(version: string): ConstraintPattern {
  return {
    source: `^${version}$`,
    constraint: { operator: 'exact', version },
    negated: false,
    dialect: 'ecmascript',
  };
}

describe('pattern cache', () => {
  beforeEach(() => {
    clearPatternCache();
  });

  it('keys entries by input and output-affecting options', () => {
    const ecmascript = resolveOptions();
    const pcre = resolveOptions({ dialect: 'pcre' });
    setCachedPattern('1.0.0', ecmascript, pattern('1.0.0'));

    expect(getCachedPattern('1.0.0', ecmascript)?.source).toBe('^1.0.0$');
    expect(getCachedPattern('1.0.0', pcre)).toBeUndefined();
    // lruSize is not part of the key
    expect(getCachedPattern('1.0.0', resolveOptions({ cache: { lruSize: 8 } }))).toBeDefined();
  });

  it('refreshes recency on read', () => {
    const options = resolveOptions({ cache: { lruSize: 2 } });
    setCachedPattern('a', options, pattern('a'));
    setCachedPattern('b', options, pattern('b'));
    getCachedPattern('a', options);
    setCachedPattern('c', options, pattern('c'));

    expect(getCachedPattern('a', options)).toBeDefined();
    expect(getCachedPattern('b', options)).toBeUndefined();
    expect(patternCacheSize()).toBe(2);
  });

  it('trims to a smaller limit from a later caller', () => {
    const wide = resolveOptions({ cache: { lruSize: 4 } });
    for (const v of ['a', 'b', 'c', 'd']) setCachedPattern(v, wide, pattern(v));
    setCachedPattern('e', resolveOptions({ cache: { lruSize: 1 } }), pattern('e'));
    expect(patternCacheSize()).toBe(1);
    expect(getCachedPattern('e', wide)?.source).toBe('^e$');
  });

  it('stores and returns nothing when disabled', () => {
    const off = resolveOptions({ cache: { lruSize: 0 } });
    setCachedPattern('1.0.0', off, pattern('1.0.0'));
    expect(patternCacheSize()).toBe(0);
    setCachedPattern('1.0.0', resolveOptions(), pattern('1.0.0'));
    expect(getCachedPattern('1.0.0', off)).toBeUndefined();
  });
});
