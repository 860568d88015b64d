/**
 * Go module versions: semantic versions behind a mandatory `v`, including
 * pseudo-versions such as `v0.0.0-20210101000000-abcdef123456`.
 */

import { splitSuffix } from '../parser/version-literal.js';
import {
  REGEX_END,
  REGEX_START,
  VERSION_SUFFIX,
  escapeLiteral,
  quoteDotted,
} from '../regex/fragments.js';

const GO_PREFIX = 'v';

// vX.0.0-yyyymmddhhmmss-abcdefabcdef, vX.Y.Z-pre.0.yyyymmddhhmmss-..., vX.Y.Z-0.yyyymmddhhmmss-...
const PSEUDO_VERSION = /^v\d+\.\d+\.\d+-(?:[0-9A-Za-z.-]*\.)?\d{14}-[0-9a-f]{12}(?:\+incompatible)?$/;

export function isGoModuleVersion(literal: string): boolean {
  return literal.startsWith(GO_PREFIX) && literal.length > GO_PREFIX.length;
}

export function isPseudoVersion(literal: string): boolean {
  return PSEUDO_VERSION.test(literal);
}

/**
 * A tag without a suffix also accepts any pre-release or build tail, which
 * covers `+incompatible`. A tag with a suffix, pseudo-versions included,
 * is pinned.
 */
export function goModulePattern(literal: string): string {
  const { core, suffix } = splitSuffix(literal.slice(GO_PREFIX.length));
  const tail = suffix === '' ? VERSION_SUFFIX : escapeLiteral(suffix);
  return REGEX_START + GO_PREFIX + quoteDotted(core) + tail + REGEX_END;
}
