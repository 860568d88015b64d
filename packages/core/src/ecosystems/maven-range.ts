/**
 * Maven bracketed ranges.
 *
 *   [1.0,2.0)   1.0 <= x < 2.0
 *   (1.0,)      x > 1.0
 *   (,2.0]      x <= 2.0
 *   [1.2.3]     exactly 1.2.3
 *   [,]         any version
 *
 * `[` and `]` are inclusive, `(` and `)` exclusive. Unions of several
 * ranges (`[1,2],[3,4]`) are rejected. A pre-release or build tail on a
 * bound is ignored; bounds compare on the numeric triple only.
 */

import { ErrorCode } from '../errors/codes.js';
import { parseVersion } from '../parser/version-literal.js';
import { buildInterval } from '../regex/boundary.js';
import { versionPattern } from '../regex/fragments.js';
import type { Bound } from '../types/constraint.js';
import { ParseError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export type MavenRange =
  | { kind: 'pinned'; version: string }
  | { kind: 'interval'; lower?: Bound; upper?: Bound };

function rangeError(input: string, message: string, cause?: ParseError): ParseError {
  return new ParseError({
    message,
    input,
    component: cause?.component,
    valueExcerpt: cause?.context?.valueExcerpt,
    errorCode: ErrorCode.RANGE_PARSE_FAILED,
    cause,
  });
}

function parseBound(
  input: string,
  text: string,
  inclusive: boolean
): Result<Bound | undefined, ParseError> {
  if (text === '') return ok(undefined);
  const parsed = parseVersion(text);
  if (parsed.isErr()) {
    return err(
      rangeError(input, `invalid range bound '${text}': ${parsed.error.message}`, parsed.error)
    );
  }
  return ok({ version: parsed.value.triple, inclusive });
}

export function parseMavenRange(input: string): Result<MavenRange, ParseError> {
  const range = input.trim();
  if (range.length < 3) {
    return err(rangeError(input, `invalid range format: '${range}'`));
  }

  const open = range.charAt(0);
  const close = range.charAt(range.length - 1);
  if ((open !== '[' && open !== '(') || (close !== ']' && close !== ')')) {
    return err(rangeError(input, `invalid range brackets: '${range}'`));
  }

  const content = range.slice(1, -1);
  const parts = content.split(',').map((part) => part.trim());

  if (parts.length === 1) {
    if (open !== '[' || close !== ']') {
      return err(
        rangeError(input, `single-version range must use inclusive brackets: '${range}'`)
      );
    }
    const pinned = parts[0] ?? '';
    const parsed = parseVersion(pinned);
    if (parsed.isErr()) {
      return err(
        rangeError(input, `invalid range bound '${pinned}': ${parsed.error.message}`, parsed.error)
      );
    }
    return ok({ kind: 'pinned', version: pinned });
  }

  if (parts.length !== 2) {
    return err(rangeError(input, `invalid range format: '${range}'`));
  }

  const [lowerText = '', upperText = ''] = parts;
  const lower = parseBound(input, lowerText, open === '[');
  if (lower.isErr()) return lower;
  const upper = parseBound(input, upperText, close === ']');
  if (upper.isErr()) return upper;
  return ok({ kind: 'interval', lower: lower.value, upper: upper.value });
}

/** Anchored pattern for an interval range. */
export function mavenIntervalPattern(lower?: Bound, upper?: Bound): string {
  return versionPattern(buildInterval(lower, upper));
}
