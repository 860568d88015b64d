/**
 * Digit-range synthesis: regex fragments matching every non-negative integer
 * on one side of a threshold, built from character classes and counted
 * repetition only.
 *
 * Candidates are canonical decimal strings (no sign, no leading zeros). A
 * fragment may also accept some zero-padded strings; those never occur in a
 * canonical version component.
 *
 * Examples:
 *
 *   greaterOrEqual(0)   → `\d+`
 *   greaterOrEqual(5)   → `(?:\d{2,}|[5-9])`
 *   greaterOrEqual(15)  → `(?:\d{3,}|[2-9]\d|1[5-9])`
 *   lessOrEqual(9)      → `[0-9]`
 *   lessOrEqual(15)     → `(?:\d|0\d|1[0-5])`
 *   lessOrEqual(-1)     → `[^\d\D]`
 */

import {
  CONTRADICTION,
  DIGITS,
  alternation,
  digitClass,
  digitRun,
} from './fragments.js';

/** Largest component value: ten decimal digits. */
export const MAX_COMPONENT = 9_999_999_999;
export const MAX_DIGITS = 10;

function assertInteger(value: number, fn: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${fn}: expected an integer, received ${value}`);
  }
}

function digitAt(digits: string, index: number): number {
  return digits.charCodeAt(index) - 48;
}

/**
 * Alternatives matching every string of `digits.length` digits whose value is
 * at least `digits`. The input may carry leading zeros (interval tails).
 */
function atLeastSameWidth(digits: string): string[] {
  const width = digits.length;
  const alternatives: string[] = [];
  for (let i = 0; i < width; i += 1) {
    const digit = digitAt(digits, i);
    const prefix = digits.slice(0, i);
    const rest = width - i - 1;
    if (rest === 0) {
      alternatives.push(prefix + digitClass(digit, 9));
    } else if (digit < 9) {
      alternatives.push(prefix + digitClass(digit + 1, 9) + digitRun(rest));
    }
  }
  return alternatives;
}

/** Mirror of {@link atLeastSameWidth}: same width, value at most `digits`. */
function atMostSameWidth(digits: string): string[] {
  const width = digits.length;
  const alternatives: string[] = [];
  for (let i = 0; i < width; i += 1) {
    const digit = digitAt(digits, i);
    const prefix = digits.slice(0, i);
    const rest = width - i - 1;
    if (rest === 0) {
      alternatives.push(prefix + digitClass(0, digit));
    } else if (digit > 0) {
      alternatives.push(prefix + digitClass(0, digit - 1) + digitRun(rest));
    }
  }
  return alternatives;
}

/**
 * Fragment matching every integer `>= n`.
 *
 * `n <= 0` matches everything. Thresholds above {@link MAX_COMPONENT} leave
 * nothing in range and yield the contradiction fragment.
 */
export function greaterOrEqual(n: number): string {
  assertInteger(n, 'greaterOrEqual');
  if (n <= 0) return DIGITS;
  if (n > MAX_COMPONENT) return CONTRADICTION;

  const digits = String(n);
  const alternatives: string[] = [];
  // Longer numbers are always larger; at the cap there is no longer number.
  if (digits.length < MAX_DIGITS) {
    alternatives.push(`\\d{${digits.length + 1},}`);
  }
  alternatives.push(...atLeastSameWidth(digits));
  return alternation(alternatives);
}

/**
 * Fragment matching every integer `<= n`.
 *
 * Negative `n` is a legitimate outcome of `bound - 1` during boundary
 * construction and yields the contradiction fragment instead of an error.
 */
export function lessOrEqual(n: number): string {
  assertInteger(n, 'lessOrEqual');
  if (n < 0) return CONTRADICTION;

  const digits = String(Math.min(n, MAX_COMPONENT));
  const alternatives: string[] = [];
  for (let width = 1; width < digits.length; width += 1) {
    alternatives.push(digitRun(width));
  }
  alternatives.push(...atMostSameWidth(digits));
  return alternation(alternatives);
}

function isRepeated(digits: string, digit: string): boolean {
  for (const ch of digits) {
    if (ch !== digit) return false;
  }
  return true;
}

function sameWidthBetween(lo: string, hi: string): string[] {
  if (lo === hi) return [lo];

  let split = 0;
  while (lo[split] === hi[split]) split += 1;

  const prefix = lo.slice(0, split);
  const loDigit = digitAt(lo, split);
  const hiDigit = digitAt(hi, split);
  const rest = lo.length - split - 1;
  if (rest === 0) {
    return [prefix + digitClass(loDigit, hiDigit)];
  }

  const loTail = lo.slice(split + 1);
  const hiTail = hi.slice(split + 1);
  const alternatives: string[] = [];
  let bandStart = loDigit;
  let bandEnd = hiDigit;
  let upperEdge: string | undefined;

  if (!isRepeated(loTail, '0')) {
    alternatives.push(
      prefix + String(loDigit) + alternation(atLeastSameWidth(loTail))
    );
    bandStart += 1;
  }
  if (!isRepeated(hiTail, '9')) {
    upperEdge = prefix + String(hiDigit) + alternation(atMostSameWidth(hiTail));
    bandEnd -= 1;
  }
  if (bandStart <= bandEnd) {
    alternatives.push(prefix + digitClass(bandStart, bandEnd) + digitRun(rest));
  }
  if (upperEdge !== undefined) {
    alternatives.push(upperEdge);
  }
  return alternatives;
}

/**
 * Fragment matching every integer in the closed interval `[lo, hi]`.
 * An empty interval yields the contradiction fragment.
 */
export function between(lo: number, hi: number): string {
  assertInteger(lo, 'between');
  assertInteger(hi, 'between');
  if (hi < 0 || lo > hi || lo > MAX_COMPONENT) return CONTRADICTION;
  if (lo <= 0) return lessOrEqual(hi);

  const low = String(lo);
  const high = String(Math.min(hi, MAX_COMPONENT));
  if (low.length === high.length) {
    return alternation(sameWidthBetween(low, high));
  }

  const alternatives = atLeastSameWidth(low);
  for (let width = low.length + 1; width < high.length; width += 1) {
    alternatives.push(digitRun(width));
  }
  alternatives.push(...atMostSameWidth(high));
  return alternation(alternatives);
}
