/**
 * Capability table of the regex engines a pattern can target.
 */

export const REGEX_DIALECTS = ['ecmascript', 'pcre', 're2'] as const;

export type RegexDialect = (typeof REGEX_DIALECTS)[number];

export type RegexFeature = 'lookahead';

interface DialectInfo {
  label: string;
  features: ReadonlySet<RegexFeature>;
}

const DIALECT_INFO: Record<RegexDialect, DialectInfo> = {
  ecmascript: { label: 'ECMAScript', features: new Set(['lookahead']) },
  pcre: { label: 'PCRE', features: new Set(['lookahead']) },
  re2: { label: 'RE2', features: new Set() },
};

const FEATURE_WORKAROUNDS: Record<RegexFeature, string> = {
  lookahead:
    "use the 'negate' not-equal strategy and invert the match at the call site",
};

export function isRegexDialect(value: string): value is RegexDialect {
  return REGEX_DIALECTS.some((dialect) => dialect === value);
}

export function dialectLabel(dialect: RegexDialect): string {
  return DIALECT_INFO[dialect].label;
}

export function supportsFeature(
  dialect: RegexDialect,
  feature: RegexFeature
): boolean {
  return DIALECT_INFO[dialect].features.has(feature);
}

export function featureWorkaround(feature: RegexFeature): string {
  return FEATURE_WORKAROUNDS[feature];
}
