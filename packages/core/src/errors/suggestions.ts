/**
 * Suggestion helpers: pure functions, no state.
 */

import { OPERATORS } from '../types/constraint.js';

/** Symbolic spellings accepted by the parser, mapped to operator tags. */
export const OPERATOR_SYMBOLS: Readonly<Record<string, string>> = {
  '>=': 'gte',
  '<=': 'lte',
  '!=': 'neq',
  '==': 'exact',
  '~>': 'pessimistic',
  '~=': 'compatible',
  '>': 'gt',
  '<': 'lt',
  '=': 'exact',
  '^': 'caret',
  '~': 'tilde',
};

/**
 * Approximate edit distance: positional char differences plus the length
 * delta. Good enough for short operator tags.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (shorter.length === 0) return longer.length;

  let distance = longer.length - shorter.length;
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Return up to 3 close matches for a misspelt string.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 2
): string[] {
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(input, option),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}

/**
 * Suggestions for an unknown operator tag. A symbol passed where a tag is
 * expected resolves to its tag directly.
 */
export function suggestOperators(operator: string): string[] {
  const symbolic = OPERATOR_SYMBOLS[operator];
  if (symbolic !== undefined) {
    return [`use operator '${symbolic}' for '${operator}'`];
  }
  const close = didYouMean(operator.toLowerCase(), OPERATORS);
  if (close.length > 0) {
    return close.map((tag) => `did you mean '${tag}'?`);
  }
  return [`supported operators: ${OPERATORS.join(', ')}`];
}
