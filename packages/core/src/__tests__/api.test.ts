import { describe, it, expect, beforeEach } from 'vitest';

import {
  compileConstraint,
  compileRawConstraint,
  createMatcher,
  matches,
  mustCompile,
  toRegExp,
} from '../api.js';
import { ErrorCode } from '../errors/codes.js';
import { VERSION_SUFFIX } from '../regex/fragments.js';
import {
  ConfigError,
  DialectUnsupportedError,
  ParseError,
} from '../types/errors.js';
import { clearPatternCache, patternCacheSize } from '../util/pattern-cache.js';

beforeEach(() => {
  clearPatternCache();
});

describe('compileConstraint', () => {
  it('returns the pattern with its parsed constraint', () => {
    const result = compileConstraint(' ~1.4.0 ');
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        source: `^1\\.4\\.\\d+${VERSION_SUFFIX}$`,
        constraint: { operator: 'tilde', version: '1.4.0' },
        negated: false,
        dialect: 'ecmascript',
      });
    }
  });

  it('returns option errors as values', () => {
    const result = compileConstraint('1.0.0', { cache: { lruSize: -2 } });
    if (result.isOk()) throw new Error('expected a ConfigError');
    expect(result.error).toBeInstanceOf(ConfigError);
    expect(result.error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
  });

  it('memoizes by input, dialect and not-equal strategy', () => {
    const first = compileConstraint('>=1.2.3').unwrap();
    const second = compileConstraint('  >=1.2.3').unwrap();
    expect(second).toBe(first);
    expect(patternCacheSize()).toBe(1);

    compileConstraint('>=1.2.3', { dialect: 'pcre' });
    compileConstraint('>=1.2.3', { notEqual: 'negate' });
    expect(patternCacheSize()).toBe(3);
  });

  it('falls back to the defaults for undefined option values', () => {
    const result = compileConstraint('[1.0,2.0)', { dialect: undefined });
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.dialect).toBe('ecmascript');
      expect(new RegExp(result.value.source).test('1.5.0')).toBe(true);
    }
  });

  it('does not cache when the cache size is zero', () => {
    compileConstraint('>=1.2.3', { cache: { lruSize: 0 } });
    expect(patternCacheSize()).toBe(0);
  });

  it('evicts the least recently used entry', () => {
    const options = { cache: { lruSize: 2 } };
    compileConstraint('1.0.0', options);
    compileConstraint('2.0.0', options);
    compileConstraint('1.0.0', options);
    compileConstraint('3.0.0', options);
    expect(patternCacheSize()).toBe(2);
  });

  it('does not cache failures', () => {
    compileConstraint('>=x');
    expect(patternCacheSize()).toBe(0);
  });
});

describe('compileRawConstraint', () => {
  it('compiles a pre-split constraint', () => {
    const result = compileRawConstraint({ operator: 'caret', version: '0.3.1' });
    expect(result.unwrap().source).toBe(`^0\\.3\\.\\d+${VERSION_SUFFIX}$`);
  });
});

describe('matchers', () => {
  it('createMatcher tests versions against the constraint', () => {
    const matcher = createMatcher('<2.0.0').unwrap();
    expect(matcher.test('1.9.9')).toBe(true);
    expect(matcher.test('2.0.0')).toBe(false);
    expect(matcher.regex.source).toBe(matcher.pattern.source);
  });

  it('inverts negated patterns', () => {
    const matcher = toRegExp('!=1.0.0', { notEqual: 'negate' });
    expect(matcher.pattern.negated).toBe(true);
    expect(matcher.regex.test('1.0.0')).toBe(true);
    expect(matcher.test('1.0.0')).toBe(false);
    expect(matcher.test('1.0.1')).toBe(true);
  });

  it('matches answers a single question', () => {
    expect(matches('1.2.5', '^1.2.3')).toBe(true);
    expect(matches('2.0.0', '^1.2.3')).toBe(false);
    expect(matches('1.5.0', '[1.0,2.0)')).toBe(true);
  });

  it('throwing helpers rethrow the structured error', () => {
    expect(() => toRegExp('>=1.two')).toThrow(ParseError);
    expect(() => mustCompile('!=1.0.0', { dialect: 're2' })).toThrow(
      DialectUnsupportedError
    );
    expect(() => matches('1.0.0', '>=1.two')).toThrow("invalid minor version: 'two'");
  });

  it('mustCompile returns the pattern for valid input', () => {
    expect(mustCompile('1.0.0').source).toBe(`^1\\.0\\.0${VERSION_SUFFIX}$`);
  });
});
