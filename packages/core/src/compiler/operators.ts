/**
 * Per-operator pattern builders. Each returns an anchored source string.
 */

import { classifyLiteral, exactPattern } from '../ecosystems/index.js';
import { splitSuffix } from '../parser/version-literal.js';
import { buildBoundary } from '../regex/boundary.js';
import {
  DIGITS,
  DOT,
  REGEX_END,
  REGEX_START,
  VERSION_CORE,
  VERSION_SUFFIX,
  versionPattern,
} from '../regex/fragments.js';
import type { Comparison, VersionTriple } from '../types/constraint.js';
import type { NotEqualStrategy } from '../types/options.js';

export { exactPattern };

export function comparisonPattern(
  version: VersionTriple,
  direction: Comparison
): string {
  return versionPattern(buildBoundary(version, direction));
}

/**
 * Same major; for 0.x the minor is fixed too. No lower bound is placed on
 * the minor or patch.
 */
export function caretPattern({ major, minor }: VersionTriple): string {
  if (major > 0) {
    return versionPattern(String(major) + DOT + DIGITS + DOT + DIGITS);
  }
  return versionPattern('0' + DOT + String(minor) + DOT + DIGITS);
}

/** Same major and minor. Shared by `~`, `~>` and `~=`. */
export function tildePattern({ major, minor }: VersionTriple): string {
  return versionPattern(String(major) + DOT + String(minor) + DOT + DIGITS);
}

/** Candidate shape for `!=`: the ecosystem of the literal decides it. */
function notEqualBody(literal: string): string {
  const kind = classifyLiteral(literal);
  if (kind === 'go' || kind === 'go-pseudo') return 'v' + VERSION_CORE;
  if (kind === 'nuget' && splitSuffix(literal).core.split('.').length === 4) {
    return VERSION_CORE + `(?:${DOT}${DIGITS})?`;
  }
  return VERSION_CORE;
}

export interface PatternSource {
  source: string;
  negated: boolean;
}

/**
 * `lookahead`: any version whose whole text is not matched by the exact
 * pattern. `negate`: the exact pattern itself, inverted by the caller.
 */
export function notEqualPattern(
  literal: string,
  strategy: NotEqualStrategy
): PatternSource {
  const exact = exactPattern(literal);
  if (strategy === 'negate') {
    return { source: exact, negated: true };
  }
  const exactCore = exact.slice(REGEX_START.length, -REGEX_END.length);
  return {
    source:
      REGEX_START +
      `(?!${exactCore}${REGEX_END})` +
      notEqualBody(literal) +
      VERSION_SUFFIX +
      REGEX_END,
    negated: false,
  };
}
