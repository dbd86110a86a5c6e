/**
 * @fileoverview Unit tests for Result
 */

import { err, GuardResults, ok, Result, UnwrapOnErrError } from '../../../src';

const parseAge = (input: string): Result<number, string> => {
  const age = Number(input);
  return Number.isInteger(age) ? ok(age) : err(`${input} is not a number`);
};

const adult = (age: number): Result<number, string> => (age >= 18 ? ok(age) : err('too young'));

describe('Result', () => {
  // ==========================================================================
  // CONSTRUCTION
  // ==========================================================================

  describe('Construction', () => {
    it('should create Ok and Err', () => {
      const success = ok(1);
      const failure = err('boom');

      expect(success.isOk).toBe(true);
      expect(success.isErr).toBe(false);
      expect(failure.isOk).toBe(false);
      expect(failure.isErr).toBe(true);
    });

    it('should create a valueless Ok', () => {
      const done = Result.ok();

      expect(done.isOk).toBe(true);
      expect(done.unwrap()).toBeUndefined();
    });

    it('should pick the arm from a condition in withBool()', () => {
      expect(Result.withBool(true, 'v', 'e').unwrap()).toBe('v');
      expect(Result.withBool(false, 'v', 'e').unwrapErr()).toBe('e');
    });

    it('should convert a GuardResult with fromGuard()', () => {
      expect(Result.fromGuard(GuardResults.ok()).isOk).toBe(true);
      expect(Result.fromGuard(GuardResults.fail('age must be less than 18')).unwrapErr()).toBe(
        'age must be less than 18',
      );
    });

    it('should capture thrown errors in fromThrowable()', () => {
      const parsed = Result.fromThrowable(() => JSON.parse('{"a":1}'));
      const broken = Result.fromThrowable(() => JSON.parse('{'));

      expect(parsed.isOk).toBe(true);
      expect(broken.unwrapErr()).toBeInstanceOf(SyntaxError);
    });

    it('should wrap thrown non-errors', () => {
      const result = Result.fromThrowable(() => {
        throw 'plain';
      });

      expect(result.unwrapErr().message).toBe('plain');
    });

    it('should be immutable', () => {
      expect(Object.isFrozen(ok(1))).toBe(true);
    });
  });

  // ==========================================================================
  // EXTRACTION
  // ==========================================================================

  describe('Extraction', () => {
    it('should unwrap the value of Ok', () => {
      expect(ok(5).unwrap()).toBe(5);
    });

    it('should throw UnwrapOnErrError when unwrapping Err', () => {
      const failure = err(new Error('disk full'));

      expect(() => failure.unwrap()).toThrowErrorType(UnwrapOnErrError);
      expect(() => failure.unwrap()).toThrow('Cannot unwrap a failed result: disk full');
    });

    it('should attach the error as cause', () => {
      const failure = err('boom');

      let caught: unknown;
      try {
        failure.unwrap();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnwrapOnErrError);
      expect(caught instanceof UnwrapOnErrError ? caught.cause : undefined).toBe('boom');
    });

    it('should throw when asking an Ok for its error', () => {
      expect(() => ok(1).unwrapErr()).toThrow('Cannot get the error of a successful result');
    });

    it('should fall back with unwrapOr() and unwrapOrElse()', () => {
      const failure: Result<number, string> = err('boom');

      expect(failure.unwrapOr(0)).toBe(0);
      expect(ok(3).unwrapOr(0)).toBe(3);
      expect(failure.unwrapOrElse((error) => error.length)).toBe(4);
    });

    it('should pick the matching branch in match()', () => {
      const render = (result: Result<number, string>): string =>
        result.match({ ok: (value) => `ok ${value}`, err: (error) => `err ${error}` });

      expect(render(ok(1))).toBe('ok 1');
      expect(render(err('x'))).toBe('err x');
    });
  });

  // ==========================================================================
  // COMPOSITION
  // ==========================================================================

  describe('Composition', () => {
    it('should transform Ok values with map()', () => {
      expect(ok(2).map((n) => n + 1).unwrap()).toBe(3);
      expect(err<string, number>('e').map((n) => n + 1).unwrapErr()).toBe('e');
    });

    it('should transform errors with mapErr()', () => {
      expect(err('e').mapErr((error) => error.toUpperCase()).unwrapErr()).toBe('E');
      expect(ok(1).mapErr(() => 'unused').unwrap()).toBe(1);
    });

    it('should chain with bind()', () => {
      expect(parseAge('20').bind(adult).unwrap()).toBe(20);
      expect(parseAge('12').bind(adult).unwrapErr()).toBe('too young');
      expect(parseAge('abc').bind(adult).unwrapErr()).toBe('abc is not a number');
    });

    it('should short-circuit bind() on Err', () => {
      let calls = 0;
      const counted = (value: number): Result<number, string> => {
        calls += 1;
        return ok(value);
      };

      err<string, number>('stop').bind(counted).bind(counted);

      expect(calls).toBe(0);
    });

    it('should satisfy left identity', () => {
      expect(ok(20).bind(adult).equals(adult(20))).toBe(true);
      expect(ok(10).bind(adult).equals(adult(10))).toBe(true);
    });

    it('should satisfy right identity', () => {
      const success = parseAge('20');
      const failure = parseAge('abc');

      expect(success.bind((value) => ok(value)).equals(success)).toBe(true);
      expect(failure.bind((value) => ok(value)).equals(failure)).toBe(true);
    });

    it('should satisfy associativity', () => {
      const double = (n: number): Result<number, string> => ok(n * 2);

      const nested = ok(10).bind((n) => adult(n).bind(double));
      const chained = ok(10).bind(adult).bind(double);

      expect(nested.equals(chained)).toBe(true);
    });

    it('should treat flatMap() as bind()', () => {
      expect(ok(30).flatMap(adult).unwrap()).toBe(30);
    });

    it('should apply bindIf() only when the condition holds', () => {
      const capped = (n: number): Result<number, string> => ok(Math.min(n, 100));

      expect(ok(150).bindIf((n) => n > 100, capped).unwrap()).toBe(100);
      expect(ok(50).bindIf((n) => n > 100, capped).unwrap()).toBe(50);
      expect(ok(150).bindIf(false, capped).unwrap()).toBe(150);
      expect(err<string, number>('e').bindIf(true, capped).unwrapErr()).toBe('e');
    });

    it('should recover with orElse()', () => {
      expect(err('e').orElse(() => ok(0)).unwrap()).toBe(0);
      expect(ok(1).orElse(() => ok(0)).unwrap()).toBe(1);
    });

    it('should convert to Maybe', () => {
      expect(ok(1).toMaybe().get()).toBe(1);
      expect(err('e').toMaybe().isNone).toBe(true);
    });
  });

  // ==========================================================================
  // COMBINE
  // ==========================================================================

  describe('combine()', () => {
    it('should collect the values of all Ok results in order', () => {
      const combined = Result.combine([ok(1), ok('two'), ok(true)] as const);

      expect(combined.unwrap()).toEqual([1, 'two', true]);
    });

    it('should return the first Err', () => {
      const combined = Result.combine([ok(1), err('first'), err('second')] as const);

      expect(combined.unwrapErr()).toBe('first');
    });

    it('should return Ok of an empty list for no results', () => {
      expect(Result.combine([]).unwrap()).toEqual([]);
    });
  });

  // ==========================================================================
  // EQUALITY & DISPLAY
  // ==========================================================================

  describe('Equality', () => {
    it('should compare arms and contents', () => {
      expect(ok(1).equals(ok(1))).toBe(true);
      expect(ok<number, string>(1).equals(err('1'))).toBe(false);
      expect(err('a').equals(err('a'))).toBe(true);
      expect(err('a').equals(err('b'))).toBe(false);
    });

    it('should render as Ok(..) or Err(..)', () => {
      expect(ok(1).toString()).toBe('Ok(1)');
      expect(err(new Error('boom')).toString()).toBe('Err(boom)');
    });
  });
});
