/**
 * Version literal parsing: `M[.m[.p[...]]][-pre][+build]` into a numeric
 * triple plus the raw suffix.
 */

import { MAX_COMPONENT } from '../regex/digit-range.js';
import { ParseError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { ParsedVersion } from '../types/constraint.js';

const COMPONENT_NAMES = ['major', 'minor', 'patch'] as const;
const DIGITS_ONLY = /^\d+$/;

export interface SplitLiteral {
  core: string;
  /** Pre-release and build tail, empty when absent. */
  suffix: string;
}

/**
 * Split off the pre-release/build tail. Build metadata starts at the first
 * `+`; the pre-release starts at the first `-` before it.
 */
export function splitSuffix(literal: string): SplitLiteral {
  const plus = literal.indexOf('+');
  const head = plus === -1 ? literal : literal.slice(0, plus);
  const dash = head.indexOf('-');
  const core = dash === -1 ? head : head.slice(0, dash);
  return { core, suffix: literal.slice(core.length) };
}

export function componentName(index: number): string {
  return COMPONENT_NAMES[index] ?? `component ${index + 1}`;
}

/**
 * Parse a numeric version literal. Missing trailing components default to 0;
 * components past the third are validated and otherwise ignored.
 */
export function parseVersion(literal: string): Result<ParsedVersion, ParseError> {
  const { core, suffix } = splitSuffix(literal);
  const components = core.split('.');
  const values: number[] = [];

  for (const [index, text] of components.entries()) {
    const name = componentName(index);
    if (!DIGITS_ONLY.test(text)) {
      return err(
        new ParseError({
          message: `invalid ${name} version: '${text}'`,
          input: literal,
          component: name,
          valueExcerpt: text,
        })
      );
    }
    const value = Number(text);
    if (value > MAX_COMPONENT) {
      return err(
        new ParseError({
          message: `${name} version exceeds ${MAX_COMPONENT}: '${text}'`,
          input: literal,
          component: name,
          valueExcerpt: text,
        })
      );
    }
    values.push(value);
  }

  const [major = 0, minor = 0, patch = 0] = values;
  return ok({
    triple: { major, minor, patch },
    components,
    suffix,
    literal,
  });
}
