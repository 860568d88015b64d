/**
 * Configuration options for constraint compilation
 *
 * All options are optional with conservative defaults.
 */

import { REGEX_DIALECTS, type RegexDialect, isRegexDialect } from '../dialect/dialects.js';
import { ConfigError } from './errors.js';

export const NOT_EQUAL_STRATEGIES = ['lookahead', 'negate'] as const;

/**
 * How `!=` is expressed:
 * - lookahead: a single pattern with a negative lookahead
 * - negate: the exact pattern, flagged for the caller to invert
 */
export type NotEqualStrategy = (typeof NOT_EQUAL_STRATEGIES)[number];

export function isNotEqualStrategy(value: string): value is NotEqualStrategy {
  return NOT_EQUAL_STRATEGIES.some((strategy) => strategy === value);
}

export interface CacheOptions {
  /** LRU size for compiled patterns; 0 disables caching (default: 64) */
  lruSize?: number;
}

export interface CompileOptions {
  /** Target regex engine (default: 'ecmascript') */
  dialect?: RegexDialect;
  /** Not-equal representation (default: 'lookahead') */
  notEqual?: NotEqualStrategy;
  cache?: CacheOptions;
}

export interface ResolvedOptions {
  dialect: RegexDialect;
  notEqual: NotEqualStrategy;
  cache: Required<CacheOptions>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  dialect: 'ecmascript',
  notEqual: 'lookahead',
  cache: {
    lruSize: 64,
  },
};

/**
 * Merge user options over the defaults.
 *
 * @throws {ConfigError} When an option value is out of range
 */
export function resolveOptions(
  userOptions: CompileOptions = {}
): ResolvedOptions {
  // An explicit `undefined` falls back to the default like an absent key.
  const resolved: ResolvedOptions = {
    dialect: userOptions.dialect ?? DEFAULT_OPTIONS.dialect,
    notEqual: userOptions.notEqual ?? DEFAULT_OPTIONS.notEqual,
    cache: {
      lruSize: userOptions.cache?.lruSize ?? DEFAULT_OPTIONS.cache.lruSize,
    },
  };

  validateOptions(resolved);
  return resolved;
}

/** Key fragment identifying the options that change compiler output. */
export function optionsCacheKey(options: ResolvedOptions): string {
  return `${options.dialect}|${options.notEqual}`;
}

function validateOptions(options: ResolvedOptions): void {
  // Values may arrive untyped from the CLI or plain JS callers.
  const dialect: string = options.dialect;
  const notEqual: string = options.notEqual;

  if (!isRegexDialect(dialect)) {
    throw new ConfigError({
      message: `dialect must be one of ${REGEX_DIALECTS.join(', ')}`,
      setting: 'dialect',
      value: dialect,
    });
  }
  if (!isNotEqualStrategy(notEqual)) {
    throw new ConfigError({
      message: `notEqual must be one of ${NOT_EQUAL_STRATEGIES.join(', ')}`,
      setting: 'notEqual',
      value: notEqual,
    });
  }
  const { lruSize } = options.cache;
  if (!Number.isInteger(lruSize) || lruSize < 0) {
    throw new ConfigError({
      message: 'cache.lruSize must be a non-negative integer',
      setting: 'cache.lruSize',
      value: lruSize,
    });
  }
}
