import {
  DIGITS,
  DOT,
  REGEX_END,
  REGEX_START,
  VERSION_SUFFIX,
  escapeLiteral,
} from '../regex/fragments.js';

export function isWildcardVersion(literal: string): boolean {
  return literal.includes('*');
}

/**
 * `1.2.*`, `1.*.3`, `*`. A trailing `*` stands for every remaining
 * component, so the pattern is padded to three components.
 */
export function wildcardPattern(literal: string): string {
  const parts = literal.split('.');
  const fragments = parts.map((part) =>
    part === '*' ? DIGITS : escapeLiteral(part)
  );
  if (parts[parts.length - 1] === '*') {
    while (fragments.length < 3) fragments.push(DIGITS);
  }
  return REGEX_START + fragments.join(DOT) + VERSION_SUFFIX + REGEX_END;
}
