// @semregex/core entry point
//
// High-level entry points live in ./api.js; the synthesizer, boundary
// builder and formatters are exported for callers composing their own
// patterns.

export * from './api.js';

// Model
export {
  OPERATORS,
  isOperator,
  type Operator,
  type Comparison,
  type RawConstraint,
  type VersionConstraint,
  type VersionTriple,
  type ParsedVersion,
  type Bound,
  type ConstraintPattern,
} from './types/constraint.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';
export {
  DEFAULT_OPTIONS,
  NOT_EQUAL_STRATEGIES,
  isNotEqualStrategy,
  resolveOptions,
  type CompileOptions,
  type ResolvedOptions,
  type NotEqualStrategy,
  type CacheOptions,
} from './types/options.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  SemregexError,
  ParseError,
  UnsupportedOperatorError,
  DialectUnsupportedError,
  ConfigError,
  InternalError,
  isSemregexError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type JSONErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, suggestOperators } from './errors/suggestions.js';

// Dialects
export {
  REGEX_DIALECTS,
  isRegexDialect,
  dialectLabel,
  supportsFeature,
  type RegexDialect,
  type RegexFeature,
} from './dialect/dialects.js';

// Parsing
export {
  parseConstraint,
  OPERATOR_PREFIXES,
} from './parser/constraint-parser.js';
export { parseVersion, splitSuffix } from './parser/version-literal.js';

// Pattern building blocks
export {
  greaterOrEqual,
  lessOrEqual,
  between,
  MAX_COMPONENT,
} from './regex/digit-range.js';
export { buildBoundary, buildInterval } from './regex/boundary.js';
export {
  CONTRADICTION,
  NEVER_MATCH,
  ANY_VERSION,
  VERSION_SUFFIX,
} from './regex/fragments.js';
export { usesLookahead } from './regex/scan.js';
export {
  classifyLiteral,
  exactPattern,
  parseMavenRange,
  type LiteralKind,
  type MavenRange,
} from './ecosystems/index.js';
export { clearPatternCache } from './util/pattern-cache.js';
