import type { ConstraintPattern } from '../types/constraint.js';
import { optionsCacheKey, type ResolvedOptions } from '../types/options.js';

const patternCache = new Map<string, ConstraintPattern>();

function makeCacheKey(input: string, options: ResolvedOptions): string {
  return JSON.stringify([input, optionsCacheKey(options)]);
}

export function getCachedPattern(
  input: string,
  options: ResolvedOptions
): ConstraintPattern | undefined {
  if (options.cache.lruSize === 0) {
    return undefined;
  }
  const key = makeCacheKey(input, options);
  const hit = patternCache.get(key);
  if (hit !== undefined) {
    patternCache.delete(key);
    patternCache.set(key, hit);
  }
  return hit;
}

export function setCachedPattern(
  input: string,
  options: ResolvedOptions,
  pattern: ConstraintPattern
): void {
  const limit = options.cache.lruSize;
  if (limit === 0) {
    return;
  }
  const key = makeCacheKey(input, options);
  if (patternCache.has(key)) {
    patternCache.delete(key);
  }
  patternCache.set(key, pattern);
  // A smaller limit from a later caller trims older entries too.
  while (patternCache.size > limit) {
    const oldest = patternCache.keys().next();
    if (oldest.done) break;
    patternCache.delete(oldest.value);
  }
}

export function patternCacheSize(): number {
  return patternCache.size;
}

export function clearPatternCache(): void {
  patternCache.clear();
}
