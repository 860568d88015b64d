import { goModulePattern, isGoModuleVersion, isPseudoVersion } from './go-module.js';
import { isNuGetVersion, nugetPattern } from './nuget.js';
import { isWildcardVersion, wildcardPattern } from './wildcard.js';
import { splitSuffix } from '../parser/version-literal.js';
import {
  REGEX_END,
  REGEX_START,
  VERSION_SUFFIX,
  escapeLiteral,
  quoteDotted,
} from '../regex/fragments.js';

export type LiteralKind = 'wildcard' | 'go-pseudo' | 'go' | 'nuget' | 'semver';

/** Which formatter an exact-match literal goes to, in dispatch order. */
export function classifyLiteral(literal: string): LiteralKind {
  if (isWildcardVersion(literal)) return 'wildcard';
  if (isGoModuleVersion(literal)) {
    return isPseudoVersion(literal) ? 'go-pseudo' : 'go';
  }
  if (isNuGetVersion(literal)) return 'nuget';
  return 'semver';
}

function semverPattern(literal: string): string {
  const { core, suffix } = splitSuffix(literal);
  const tail = suffix === '' ? VERSION_SUFFIX : escapeLiteral(suffix);
  return REGEX_START + quoteDotted(core) + tail + REGEX_END;
}

/**
 * Anchored exact-match pattern. Components are quoted, not parsed, so any
 * literal is accepted; an explicit pre-release/build tail is pinned.
 */
export function exactPattern(literal: string): string {
  switch (classifyLiteral(literal)) {
    case 'wildcard':
      return wildcardPattern(literal);
    case 'go':
    case 'go-pseudo':
      return goModulePattern(literal);
    case 'nuget':
      return nugetPattern(literal);
    case 'semver':
      return semverPattern(literal);
  }
}

export { isGoModuleVersion, isPseudoVersion, goModulePattern } from './go-module.js';
export { isNuGetVersion, nugetPattern, NUGET_PRE_RELEASE } from './nuget.js';
export { isWildcardVersion, wildcardPattern } from './wildcard.js';
export {
  parseMavenRange,
  mavenIntervalPattern,
  type MavenRange,
} from './maven-range.js';
