/**
 * Constraint model shared by the parser, the compiler and the ecosystem
 * formatters.
 */

import type { RegexDialect } from '../dialect/dialects.js';

/** Closed set of operator tags understood by the compiler. */
export const OPERATORS = [
  'exact',
  'gte',
  'lte',
  'gt',
  'lt',
  'neq',
  'caret',
  'tilde',
  'pessimistic',
  'compatible',
  'range',
] as const;

export type Operator = (typeof OPERATORS)[number];

export type Comparison = 'gte' | 'lte' | 'gt' | 'lt';

export function isOperator(value: string): value is Operator {
  return OPERATORS.some((operator) => operator === value);
}

/**
 * Parser output. `operator` is a plain string at this seam so that callers
 * building constraints by hand get an UnsupportedOperatorError rather than a
 * silent default.
 */
export interface RawConstraint {
  operator: string;
  version: string;
}

export interface VersionConstraint extends RawConstraint {
  operator: Operator;
}

export interface VersionTriple {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export interface ParsedVersion {
  readonly triple: VersionTriple;
  /** Dot-separated components as written, before the suffix. */
  readonly components: readonly string[];
  /** Pre-release and/or build tail including its leading `-` or `+`. */
  readonly suffix: string;
  readonly literal: string;
}

/** One end of an interval. */
export interface Bound {
  version: VersionTriple;
  inclusive: boolean;
}

export interface ConstraintPattern {
  /** Anchored pattern source. */
  readonly source: string;
  readonly constraint: VersionConstraint;
  /**
   * When true the caller must invert the match result: the pattern matches
   * the versions the constraint excludes.
   */
  readonly negated: boolean;
  readonly dialect: RegexDialect;
}
