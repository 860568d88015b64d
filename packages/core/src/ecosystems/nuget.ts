/**
 * NuGet versions: four-part `major.minor.patch.revision` and the
 * conventional alpha/beta/rc/preview pre-release labels.
 */

import { splitSuffix } from '../parser/version-literal.js';
import {
  REGEX_END,
  REGEX_START,
  escapeLiteral,
  quoteDotted,
} from '../regex/fragments.js';

const NUGET_LABELS = ['alpha', 'beta', 'rc', 'preview'] as const;

/** Optional `-beta`, `-beta2`, `-rc.1`, ... */
export const NUGET_PRE_RELEASE = `(?:-(?:${NUGET_LABELS.join('|')})\\d*(?:\\.\\d+)?)?`;

function hasNuGetLabel(literal: string): boolean {
  return NUGET_LABELS.some((label) => literal.includes(`-${label}`));
}

export function isNuGetVersion(literal: string): boolean {
  const { core } = splitSuffix(literal);
  return core.split('.').length === 4 || hasNuGetLabel(literal);
}

export function nugetPattern(literal: string): string {
  const { core, suffix } = splitSuffix(literal);
  const tail = suffix === '' ? NUGET_PRE_RELEASE : escapeLiteral(suffix);
  return REGEX_START + quoteDotted(core) + tail + REGEX_END;
}
