import { describe, it, expect } from 'vitest';

import { Ok, Err, ok, err, isOk, isErr, type Result } from '../result.js';
import { ParseError } from '../errors.js';

describe('Result', () => {
  describe('Ok', () => {
    it('carries the value', () => {
      const result = new Ok(10);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
      expect(result.value).toBe(10);
    });

    it('unwraps to the value', () => {
      expect(ok('pattern').unwrap()).toBe('pattern');
    });
  });

  describe('Err', () => {
    it('carries the error', () => {
      const result = new Err('original');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
      expect(result.error).toBe('original');
    });

    it('rethrows Error instances unchanged on unwrap', () => {
      const error = new ParseError({
        message: "invalid major version: 'x'",
        input: 'x',
        component: 'major',
      });
      const result = err(error);
      expect(() => result.unwrap()).toThrow(error);
    });

    it('wraps non-Error values on unwrap', () => {
      expect(() => err('test error').unwrap()).toThrow(
        'Called unwrap on an Err value: test error'
      );
    });
  });

  describe('type guards', () => {
    it('narrow to the matching variant', () => {
      const okResult: Result<string, number> = ok('success');
      const errResult: Result<string, number> = err(404);

      expect(isOk(okResult)).toBe(true);
      expect(isOk(errResult)).toBe(false);
      expect(isErr(okResult)).toBe(false);
      expect(isErr(errResult)).toBe(true);
    });

    it('lets an early return narrow a union', () => {
      const half = (n: number): Result<number, string> =>
        n % 2 === 0 ? ok(n / 2) : err(`odd: ${n}`);

      const summarize = (n: number): string => {
        const result = half(n);
        if (result.isErr()) return result.error;
        return `half: ${result.value}`;
      };

      expect(summarize(20)).toBe('half: 10');
      expect(summarize(5)).toBe('odd: 5');
    });
  });
});
