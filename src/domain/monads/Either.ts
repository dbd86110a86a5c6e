/**
 * @fileoverview Either - A value of one of two possible types
 *
 * @module @tessera/core/domain/monads
 *
 * `Right` is the happy path; `map` and `bind` act on it and pass a `Left`
 * through untouched.
 *
 * @example
 * ```typescript
 * function divide(x: number, y: number): Either<string, number> {
 *   return y === 0 ? left('division by zero') : right(x / y);
 * }
 *
 * divide(6, 3).map((n) => n + 1); // Right(3)
 * divide(1, 0).map((n) => n + 1); // Left(division by zero)
 * ```
 */

import { Result } from './Result';

type EitherState<L, R> = { readonly left: true; readonly value: L } | { readonly left: false; readonly value: R };

export class Either<L, R> {
  private constructor(private readonly state: EitherState<L, R>) {
    Object.freeze(this);
  }

  static left<L, R = never>(value: L): Either<L, R> {
    return new Either<L, R>({ left: true, value });
  }

  static right<R, L = never>(value: R): Either<L, R> {
    return new Either<L, R>({ left: false, value });
  }

  get isLeft(): boolean {
    return this.state.left;
  }

  get isRight(): boolean {
    return !this.state.left;
  }

  map<S>(f: (value: R) => S): Either<L, S> {
    return this.state.left ? Either.left(this.state.value) : Either.right(f(this.state.value));
  }

  bind<S, M = L>(f: (value: R) => Either<M, S>): Either<L | M, S> {
    return this.state.left ? Either.left(this.state.value) : f(this.state.value);
  }

  /**
   * Applies the function held in `fn` to the value held in `arg`. The first
   * `Left` encountered wins.
   */
  static ap<L, A, S>(fn: Either<L, (value: A) => S>, arg: Either<L, A>): Either<L, S> {
    if (fn.state.left) {
      return Either.left(fn.state.value);
    }
    if (arg.state.left) {
      return Either.left(arg.state.value);
    }
    return Either.right(fn.state.value(arg.state.value));
  }

  fold<U>(onLeft: (value: L) => U, onRight: (value: R) => U): U {
    return this.state.left ? onLeft(this.state.value) : onRight(this.state.value);
  }

  toResult(): Result<R, L> {
    return this.state.left ? Result.err(this.state.value) : Result.ok(this.state.value);
  }

  toString(): string {
    return `${this.state.left ? 'Left' : 'Right'}(${String(this.state.value)})`;
  }
}

export function left<L, R = never>(value: L): Either<L, R> {
  return Either.left(value);
}

export function right<R, L = never>(value: R): Either<L, R> {
  return Either.right(value);
}
