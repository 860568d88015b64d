/**
 * Constraint compiler: one dispatch over the operator tag, then a dialect
 * gate on the produced source.
 */

import {
  caretPattern,
  comparisonPattern,
  exactPattern,
  notEqualPattern,
  tildePattern,
  type PatternSource,
} from './operators.js';
import {
  dialectLabel,
  featureWorkaround,
  supportsFeature,
} from '../dialect/dialects.js';
import { mavenIntervalPattern, parseMavenRange } from '../ecosystems/index.js';
import { suggestOperators } from '../errors/suggestions.js';
import { parseVersion } from '../parser/version-literal.js';
import { usesLookahead } from '../regex/scan.js';
import {
  isOperator,
  type ConstraintPattern,
  type Operator,
  type RawConstraint,
  type VersionConstraint,
  type VersionTriple,
} from '../types/constraint.js';
import {
  DialectUnsupportedError,
  UnsupportedOperatorError,
  type SemregexError,
} from '../types/errors.js';
import type { ResolvedOptions } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';

type CompileResult = Result<ConstraintPattern, SemregexError>;

function constraintText(constraint: RawConstraint): string {
  return `${constraint.operator} ${constraint.version}`.trim();
}

function withTriple(
  literal: string,
  build: (triple: VersionTriple) => string
): Result<PatternSource, SemregexError> {
  const parsed = parseVersion(literal);
  if (parsed.isErr()) return parsed;
  return ok({ source: build(parsed.value.triple), negated: false });
}

function plain(source: string): Result<PatternSource, SemregexError> {
  return ok({ source, negated: false });
}

function buildSource(
  operator: Operator,
  literal: string,
  options: ResolvedOptions
): Result<PatternSource, SemregexError> {
  switch (operator) {
    case 'exact':
      return plain(exactPattern(literal));
    case 'gte':
    case 'lte':
    case 'gt':
    case 'lt': {
      const direction = operator;
      return withTriple(literal, (triple) => comparisonPattern(triple, direction));
    }
    case 'caret':
      return withTriple(literal, caretPattern);
    case 'tilde':
    case 'pessimistic':
    case 'compatible':
      return withTriple(literal, tildePattern);
    case 'neq':
      return ok(notEqualPattern(literal, options.notEqual));
    case 'range': {
      const range = parseMavenRange(literal);
      if (range.isErr()) return range;
      const value = range.value;
      return plain(
        value.kind === 'pinned'
          ? exactPattern(value.version)
          : mavenIntervalPattern(value.lower, value.upper)
      );
    }
  }
}

/**
 * Compile a parsed constraint. Failures are returned, never replaced by a
 * fallback pattern.
 */
export function compile(
  raw: RawConstraint,
  options: ResolvedOptions
): CompileResult {
  const { operator, version } = raw;
  if (!isOperator(operator)) {
    const error = new UnsupportedOperatorError({
      operator,
      input: constraintText(raw),
    });
    error.suggestions = suggestOperators(operator);
    return err(error);
  }

  const built = buildSource(operator, version, options);
  if (built.isErr()) return built;
  const { source, negated } = built.value;

  if (
    usesLookahead(source) &&
    !supportsFeature(options.dialect, 'lookahead')
  ) {
    const error = new DialectUnsupportedError({
      message: `'${operator}' needs negative lookahead, which the ${dialectLabel(options.dialect)} dialect does not support`,
      input: constraintText(raw),
      dialect: options.dialect,
      feature: 'lookahead',
      operator,
    });
    error.suggestions = [featureWorkaround('lookahead')];
    return err(error);
  }

  const constraint: VersionConstraint = { operator, version };
  return ok({ source, constraint, negated, dialect: options.dialect });
}
