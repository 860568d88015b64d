/**
 * Component boundary builder.
 *
 * A version bound `M.m.p` splits into disjoint clauses, one per component
 * that decides the comparison:
 *
 *   >= 1.2.3  →  (>=2).\d+.\d+ | 1.(>=3).\d+ | 1.2.(>=3)
 *   <= 1.2.3  →  (<=0).\d+.\d+ | 1.(<=1).\d+ | 1.2.(<=3)
 *
 * A clause whose numeric fragment is the contradiction is dropped, so
 * `< 0.0.0` leaves no clause and collapses to the contradiction.
 */

import type { Bound, Comparison, VersionTriple } from '../types/constraint.js';
import { between, greaterOrEqual, lessOrEqual } from './digit-range.js';
import {
  CONTRADICTION,
  DIGITS,
  DOT,
  VERSION_CORE,
  alternation,
} from './fragments.js';

export function componentClause(
  major: string,
  minor: string,
  patch: string
): string {
  if (
    major === CONTRADICTION ||
    minor === CONTRADICTION ||
    patch === CONTRADICTION
  ) {
    return CONTRADICTION;
  }
  return major + DOT + minor + DOT + patch;
}

export function boundaryClauses(
  version: VersionTriple,
  direction: Comparison
): string[] {
  const { major, minor, patch } = version;
  const M = String(major);
  const m = String(minor);

  switch (direction) {
    case 'gte':
    case 'gt': {
      const last = direction === 'gt' ? patch + 1 : patch;
      return [
        componentClause(greaterOrEqual(major + 1), DIGITS, DIGITS),
        componentClause(M, greaterOrEqual(minor + 1), DIGITS),
        componentClause(M, m, greaterOrEqual(last)),
      ];
    }
    case 'lte':
    case 'lt': {
      const last = direction === 'lt' ? patch - 1 : patch;
      return [
        componentClause(lessOrEqual(major - 1), DIGITS, DIGITS),
        componentClause(M, lessOrEqual(minor - 1), DIGITS),
        componentClause(M, m, lessOrEqual(last)),
      ];
    }
  }
}

/** Unanchored fragment for every version on one side of `version`. */
export function buildBoundary(
  version: VersionTriple,
  direction: Comparison
): string {
  return alternation(boundaryClauses(version, direction));
}

function lowerDirection(bound: Bound): Comparison {
  return bound.inclusive ? 'gte' : 'gt';
}

function upperDirection(bound: Bound): Comparison {
  return bound.inclusive ? 'lte' : 'lt';
}

function compareTriples(a: VersionTriple, b: VersionTriple): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

/**
 * Fragment for the versions between two optional bounds. The clauses are
 * split on the first component where the bounds differ, so the result is a
 * disjoint union with no lookaround.
 */
export function buildInterval(lower?: Bound, upper?: Bound): string {
  if (!lower) {
    return upper
      ? buildBoundary(upper.version, upperDirection(upper))
      : VERSION_CORE;
  }
  if (!upper) return buildBoundary(lower.version, lowerDirection(lower));

  const lo = lower.version;
  const hi = upper.version;
  if (compareTriples(lo, hi) > 0) return CONTRADICTION;

  const pMin = lower.inclusive ? lo.patch : lo.patch + 1;
  const pMax = upper.inclusive ? hi.patch : hi.patch - 1;
  const loM = String(lo.major);
  const hiM = String(hi.major);

  if (lo.major === hi.major && lo.minor === hi.minor) {
    return alternation([
      componentClause(loM, String(lo.minor), between(pMin, pMax)),
    ]);
  }

  if (lo.major === hi.major) {
    return alternation([
      componentClause(loM, String(lo.minor), greaterOrEqual(pMin)),
      componentClause(loM, between(lo.minor + 1, hi.minor - 1), DIGITS),
      componentClause(hiM, String(hi.minor), lessOrEqual(pMax)),
    ]);
  }

  return alternation([
    componentClause(loM, greaterOrEqual(lo.minor + 1), DIGITS),
    componentClause(loM, String(lo.minor), greaterOrEqual(pMin)),
    componentClause(between(lo.major + 1, hi.major - 1), DIGITS, DIGITS),
    componentClause(hiM, lessOrEqual(hi.minor - 1), DIGITS),
    componentClause(hiM, String(hi.minor), lessOrEqual(pMax)),
  ]);
}
