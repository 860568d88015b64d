/**
 * Public entry points.
 *
 * `compileConstraint` and `createMatcher` return a Result; `toRegExp`,
 * `matches` and `mustCompile` throw the carried SemregexError.
 */

import { compile } from './compiler/constraint-compiler.js';
import { parseConstraint } from './parser/constraint-parser.js';
import type { ConstraintPattern, RawConstraint } from './types/constraint.js';
import {
  ConfigError,
  InternalError,
  type SemregexError,
} from './types/errors.js';
import {
  resolveOptions,
  type CompileOptions,
  type ResolvedOptions,
} from './types/options.js';
import { err, ok, type Result } from './types/result.js';
import { getCachedPattern, setCachedPattern } from './util/pattern-cache.js';

export interface VersionMatcher {
  readonly pattern: ConstraintPattern;
  /** Compiled source; for a negated pattern it matches the excluded versions. */
  readonly regex: RegExp;
  /** True when `version` satisfies the constraint. */
  test(version: string): boolean;
}

function resolve(
  options: CompileOptions | undefined
): Result<ResolvedOptions, ConfigError> {
  try {
    return ok(resolveOptions(options));
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }
}

/** Compile an already-split constraint, bypassing the parser and the cache. */
export function compileRawConstraint(
  constraint: RawConstraint,
  options?: CompileOptions
): Result<ConstraintPattern, SemregexError> {
  const resolved = resolve(options);
  if (resolved.isErr()) return resolved;
  return compile(constraint, resolved.value);
}

export function compileConstraint(
  input: string,
  options?: CompileOptions
): Result<ConstraintPattern, SemregexError> {
  const resolved = resolve(options);
  if (resolved.isErr()) return resolved;

  const key = input.trim();
  const cached = getCachedPattern(key, resolved.value);
  if (cached) return ok(cached);

  const compiled = compile(parseConstraint(key), resolved.value);
  if (compiled.isOk()) {
    setCachedPattern(key, resolved.value, compiled.value);
  }
  return compiled;
}

function toMatcher(
  pattern: ConstraintPattern
): Result<VersionMatcher, SemregexError> {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern.source);
  } catch (error) {
    return err(
      new InternalError({
        message: `generated pattern failed to compile: ${pattern.source}`,
        input: pattern.constraint.version,
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
  const { negated } = pattern;
  return ok({
    pattern,
    regex,
    test: (version: string) => regex.test(version) !== negated,
  });
}

export function createMatcher(
  input: string,
  options?: CompileOptions
): Result<VersionMatcher, SemregexError> {
  const compiled = compileConstraint(input, options);
  if (compiled.isErr()) return compiled;
  return toMatcher(compiled.value);
}

/** @throws {SemregexError} */
export function toRegExp(input: string, options?: CompileOptions): VersionMatcher {
  return createMatcher(input, options).unwrap();
}

/** @throws {SemregexError} */
export function matches(
  version: string,
  input: string,
  options?: CompileOptions
): boolean {
  return toRegExp(input, options).test(version);
}

/**
 * Compile a constraint known to be valid, e.g. a constant in source.
 * @throws {SemregexError}
 */
export function mustCompile(
  input: string,
  options?: CompileOptions
): ConstraintPattern {
  return compileConstraint(input, options).unwrap();
}
