/**
 * @fileoverview Result - Success or failure with short-circuiting composition
 *
 * @packageDocumentation
 * @module @tessera/core/domain/monads
 *
 * ## Chaining construction steps
 *
 * A `Result<T, E>` is either `Ok(T)` or `Err(E)`. Construction logic is a
 * chain of `bind` calls; the first `Err` stops the chain and every later
 * stage is skipped, so no side effect runs after a failed guard:
 *
 * ```typescript
 * function createUser(props: UserProps): Result<User, FailureReport> {
 *   return evaluate(props, { name: 'required', age: 'ge[18]' })
 *     .map(() => Email.normalize(props.email))
 *     .bind((email) => User.register({ ...props, email }));
 * }
 *
 * const user = createUser(props).unwrapOrElse((report) => {
 *   throw report.toError();
 * });
 * ```
 *
 * Every chain should end in `unwrap` (which throws on `Err`) or
 * `unwrapOrElse` / `match` (which recover). A `FailureReport` left in an
 * unread `Err` is a dropped validation failure.
 */

import { UnwrapOnErrError } from '../exceptions';
import type { GuardResult } from '../guards/IGuard';
import { Maybe } from './Maybe';

type ResultState<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/**
 * Pattern-style handlers for {@link Result.match}.
 */
export interface ResultMatcher<T, E, U> {
  ok(value: T): U;
  err(error: E): U;
}

type OkValues<R extends readonly Result<unknown, unknown>[]> = {
  -readonly [K in keyof R]: R[K] extends Result<infer T, unknown> ? T : never;
};

type ErrOf<R extends readonly Result<unknown, unknown>[]> =
  R[number] extends Result<unknown, infer E> ? E : never;

export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {
    Object.freeze(this);
  }

  // ==================== Factories ====================

  static ok(): Result<void, never>;
  static ok<T, E = never>(value: T): Result<T, E>;
  static ok<T, E = never>(value?: T): Result<T | undefined, E> {
    return new Result<T | undefined, E>({ ok: true, value });
  }

  static err<E, T = never>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * `Ok(value)` when the condition holds, `Err(error)` otherwise.
   */
  static withBool<T, E>(condition: boolean, value: T, error: E): Result<T, E> {
    return condition ? Result.ok(value) : Result.err(error);
  }

  /**
   * First `Err` of the list, or `Ok` of all values in order.
   *
   * @example
   * ```typescript
   * const both = Result.combine([Name.create(name), Age.create(age)] as const);
   * // Result<[Name, Age], FailureReport>
   * ```
   */
  static combine<R extends readonly Result<unknown, unknown>[]>(
    results: R,
  ): Result<OkValues<R>, ErrOf<R>>;
  static combine(results: readonly Result<unknown, unknown>[]): Result<unknown[], unknown> {
    const values: unknown[] = [];
    for (const result of results) {
      if (!result.state.ok) {
        return Result.err(result.state.error);
      }
      values.push(result.state.value);
    }
    return Result.ok(values);
  }

  static fromGuard(result: GuardResult): Result<void, string> {
    return result.satisfied ? Result.ok() : Result.err(result.message ?? 'Guard not satisfied');
  }

  /**
   * Runs `fn`, capturing a thrown error in the `Err` arm.
   */
  static fromThrowable<T>(fn: () => T): Result<T, Error> {
    try {
      return Result.ok(fn());
    } catch (error) {
      return Result.err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  // ==================== Inspection ====================

  get isOk(): boolean {
    return this.state.ok;
  }

  get isErr(): boolean {
    return !this.state.ok;
  }

  /**
   * @throws {UnwrapOnErrError} when the Result is an `Err`; the error is
   * attached as `cause`
   */
  unwrap(): T {
    if (this.state.ok) {
      return this.state.value;
    }
    throw new UnwrapOnErrError(
      `Cannot unwrap a failed result: ${describe(this.state.error)}`,
      this.state.error,
    );
  }

  /**
   * @throws {UnwrapOnErrError} when the Result is an `Ok`
   */
  unwrapErr(): E {
    if (!this.state.ok) {
      return this.state.error;
    }
    throw new UnwrapOnErrError('Cannot get the error of a successful result');
  }

  unwrapOr(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  unwrapOrElse<U = T>(handler: (error: E) => U): T | U {
    return this.state.ok ? this.state.value : handler(this.state.error);
  }

  match<U>(matcher: ResultMatcher<T, E, U>): U {
    return this.state.ok ? matcher.ok(this.state.value) : matcher.err(this.state.error);
  }

  // ==================== Composition ====================

  map<U>(f: (value: T) => U): Result<U, E> {
    return this.state.ok ? Result.ok(f(this.state.value)) : Result.err(this.state.error);
  }

  mapErr<F>(f: (error: E) => F): Result<T, F> {
    return this.state.ok ? Result.ok(this.state.value) : Result.err(f(this.state.error));
  }

  /**
   * Continues with `f` on `Ok`; returns the `Err` untouched without calling `f`.
   */
  bind<U, F = E>(f: (value: T) => Result<U, F>): Result<U, E | F> {
    return this.state.ok ? f(this.state.value) : Result.err(this.state.error);
  }

  flatMap<U, F = E>(f: (value: T) => Result<U, F>): Result<U, E | F> {
    return this.bind(f);
  }

  /**
   * Applies `f` only when the value satisfies `condition`; otherwise the
   * Result is passed through.
   */
  bindIf<F = E>(
    condition: boolean | ((value: T) => boolean),
    f: (value: T) => Result<T, F>,
  ): Result<T, E | F> {
    if (!this.state.ok) {
      return Result.err(this.state.error);
    }
    const value = this.state.value;
    const holds = typeof condition === 'function' ? condition(value) : condition;
    return holds ? f(value) : Result.ok(value);
  }

  /**
   * Recovers from `Err` with `f`; an `Ok` is passed through.
   */
  orElse<U, F>(f: (error: E) => Result<U, F>): Result<T | U, F> {
    return this.state.ok ? Result.ok(this.state.value) : f(this.state.error);
  }

  toMaybe(): Maybe<T> {
    return this.state.ok ? Maybe.some(this.state.value) : Maybe.none();
  }

  equals(other: Result<T, E>, compare: (a: unknown, b: unknown) => boolean = Object.is): boolean {
    if (this.state.ok && other.state.ok) {
      return compare(this.state.value, other.state.value);
    }
    if (!this.state.ok && !other.state.ok) {
      return compare(this.state.error, other.state.error);
    }
    return false;
  }

  toString(): string {
    return this.state.ok ? `Ok(${describe(this.state.value)})` : `Err(${describe(this.state.error)})`;
  }
}

function describe(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

export function ok(): Result<void, never>;
export function ok<T, E = never>(value: T): Result<T, E>;
export function ok<T, E = never>(value?: T): Result<T | undefined, E> {
  return Result.ok<T | undefined, E>(value);
}

export function err<E, T = never>(error: E): Result<T, E> {
  return Result.err<E, T>(error);
}
