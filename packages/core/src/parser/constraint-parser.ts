import type { Operator, VersionConstraint } from '../types/constraint.js';

/**
 * Operator prefixes in match order: two-character operators come before
 * the one-character operators they start with.
 */
export const OPERATOR_PREFIXES: ReadonlyArray<readonly [string, Operator]> = [
  ['>=', 'gte'],
  ['<=', 'lte'],
  ['!=', 'neq'],
  ['==', 'exact'],
  ['~>', 'pessimistic'],
  ['~=', 'compatible'],
  ['>', 'gt'],
  ['<', 'lt'],
  ['=', 'exact'],
  ['^', 'caret'],
  ['~', 'tilde'],
];

/**
 * Split a raw constraint into operator and version literal. Never fails:
 * input without a known prefix is an exact match, and bracket-led input is
 * handed to the range formatter whole.
 */
export function parseConstraint(input: string): VersionConstraint {
  const trimmed = input.trim();

  if (trimmed.startsWith('[') || trimmed.startsWith('(')) {
    return { operator: 'range', version: trimmed };
  }

  for (const [prefix, operator] of OPERATOR_PREFIXES) {
    if (trimmed.startsWith(prefix)) {
      return { operator, version: trimmed.slice(prefix.length).trim() };
    }
  }

  return { operator: 'exact', version: trimmed };
}
