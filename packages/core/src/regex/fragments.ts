/**
 * Shared regex fragments for version patterns.
 *
 * Every constant here is a self-contained sub-expression: it can be
 * concatenated with any other fragment without re-grouping.
 */

export const REGEX_START = '^';
export const REGEX_END = '$';
export const REGEX_OR = '|';

/** One or more ASCII digits; matches every non-negative integer. */
export const DIGITS = '\\d+';
export const DOT = '\\.';

/** Optional pre-release tag, e.g. `-alpha`, `-rc.2`. */
export const PRE_RELEASE = '(?:-[a-zA-Z0-9\\-\\.]+)?';
/** Optional build metadata, e.g. `+build.1`. */
export const BUILD_METADATA = '(?:\\+[a-zA-Z0-9\\-\\.]+)?';
export const VERSION_SUFFIX = PRE_RELEASE + BUILD_METADATA;

/** `\d+\.\d+\.\d+` */
export const VERSION_CORE = DIGITS + DOT + DIGITS + DOT + DIGITS;

/**
 * Matches no input at all, the empty string included. An empty negated class
 * needs no lookaround, so it stays valid in RE2-style engines.
 */
export const CONTRADICTION = '[^\\d\\D]';

/** Anchored pattern accepting nothing. */
export const NEVER_MATCH = REGEX_START + CONTRADICTION + REGEX_END;

/** Anchored pattern accepting any `major.minor.patch` with optional tails. */
export const ANY_VERSION = REGEX_START + VERSION_CORE + VERSION_SUFFIX + REGEX_END;

export function anchor(body: string): string {
  return REGEX_START + body + REGEX_END;
}

/**
 * Join alternatives; a single alternative is returned as-is, several are
 * wrapped in a non-capturing group. Contradiction alternatives are dropped,
 * and an empty list collapses to the contradiction fragment.
 */
export function alternation(alternatives: readonly string[]): string {
  const live = alternatives.filter((alt) => alt !== CONTRADICTION);
  if (live.length === 0) return CONTRADICTION;
  if (live.length === 1) return live[0] ?? CONTRADICTION;
  return `(?:${live.join(REGEX_OR)})`;
}

/** `\d` repeated exactly `count` times; `count` must be at least 1. */
export function digitRun(count: number): string {
  return count === 1 ? '\\d' : `\\d{${count}}`;
}

/** Class covering the digits `from..to` (inclusive, both 0-9). */
export function digitClass(from: number, to: number): string {
  if (from === to) return String(from);
  return `[${from}-${to}]`;
}

export function escapeLiteral(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Quote each dot-separated component and rejoin with `\.`. */
export function quoteDotted(literal: string): string {
  return literal.split('.').map(escapeLiteral).join(DOT);
}

/**
 * Anchored pattern for a version body followed by the optional suffix. A
 * contradiction body yields {@link NEVER_MATCH}.
 */
export function versionPattern(body: string): string {
  if (body === CONTRADICTION) return NEVER_MATCH;
  return anchor(body + VERSION_SUFFIX);
}
