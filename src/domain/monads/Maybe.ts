/**
 * @fileoverview Maybe - Presence or absence of a value without null
 *
 * @packageDocumentation
 * @module @tessera/core/domain/monads
 *
 * A `Maybe<T>` is either `Some(T)` or `None`. Entities use it to express an
 * identity that has not been assigned yet:
 *
 * ```typescript
 * class User extends Entity<UserProps> {
 *   static restore(props: UserProps, id: string): User {
 *     return new User(props, some(Guid.fromString(id).unwrap()));
 *   }
 *
 *   static create(props: UserProps): User {
 *     return new User(props, none()); // a fresh Guid is assigned
 *   }
 * }
 * ```
 */

import { MissingValueError } from '../exceptions';
import { Result } from './Result';

type MaybeState<T> = { readonly present: true; readonly value: T } | { readonly present: false };

/**
 * Pattern-style handlers for {@link Maybe.match}.
 */
export interface MaybeMatcher<T, U> {
  some(value: T): U;
  none(): U;
}

export class Maybe<T> {
  private static readonly NONE = new Maybe<never>({ present: false });

  private constructor(private readonly state: MaybeState<T>) {
    Object.freeze(this);
  }

  // ==================== Factories ====================

  static some<T>(value: T): Maybe<T> {
    return new Maybe<T>({ present: true, value });
  }

  static none<T = never>(): Maybe<T> {
    return Maybe.NONE;
  }

  /**
   * `None` for `null` and `undefined`, `Some` for anything else.
   */
  static fromNullable<T>(value: T | null | undefined): Maybe<T> {
    return value === null || value === undefined ? Maybe.none() : Maybe.some(value);
  }

  static withBool<T>(present: boolean, value: T): Maybe<T> {
    return present ? Maybe.some(value) : Maybe.none();
  }

  // ==================== Inspection ====================

  get isSome(): boolean {
    return this.state.present;
  }

  get isNone(): boolean {
    return !this.state.present;
  }

  /**
   * @throws {MissingValueError} when the Maybe is empty
   */
  get(): T {
    if (!this.state.present) {
      throw new MissingValueError();
    }
    return this.state.value;
  }

  getOr(defaultValue: T): T {
    return this.state.present ? this.state.value : defaultValue;
  }

  /**
   * Like {@link getOr}, but the default is only computed when needed.
   */
  getOrElse(fallback: () => T): T {
    return this.state.present ? this.state.value : fallback();
  }

  match<U>(matcher: MaybeMatcher<T, U>): U {
    return this.state.present ? matcher.some(this.state.value) : matcher.none();
  }

  // ==================== Composition ====================

  map<U>(f: (value: T) => U): Maybe<U> {
    return this.state.present ? Maybe.some(f(this.state.value)) : Maybe.none();
  }

  bind<U>(f: (value: T) => Maybe<U>): Maybe<U> {
    return this.state.present ? f(this.state.value) : Maybe.none();
  }

  flatMap<U>(f: (value: T) => Maybe<U>): Maybe<U> {
    return this.bind(f);
  }

  toResult<E>(error: E): Result<T, E> {
    return this.state.present ? Result.ok(this.state.value) : Result.err(error);
  }

  /**
   * Two Maybes are equal when both are empty, or both hold equal values.
   */
  equals(other: Maybe<T>, compare: (a: T, b: T) => boolean = Object.is): boolean {
    if (this.state.present && other.state.present) {
      return compare(this.state.value, other.state.value);
    }
    return this.state.present === other.state.present;
  }

  toString(): string {
    return this.state.present ? `Some(${String(this.state.value)})` : 'None';
  }
}

export function some<T>(value: T): Maybe<T> {
  return Maybe.some(value);
}

export function none<T = never>(): Maybe<T> {
  return Maybe.none<T>();
}
