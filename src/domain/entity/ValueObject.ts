/**
 * @fileoverview ValueObject - Immutable value compared by content
 *
 * @module @tessera/core/domain/entity
 *
 * @example
 * ```typescript
 * class Email extends ValueObject<string> {
 *   static create(value: string): Result<Email, FailureReport> {
 *     return evaluate({ email: value }, { email: 'required|regex[r"^[^@\\s]+@[^@\\s]+$"]' })
 *       .map(() => new Email(value.toLowerCase()));
 *   }
 * }
 * ```
 */

export abstract class ValueObject<T> {
  protected readonly value: T;

  protected constructor(value: T) {
    this.value = value;
  }

  toValue(): T {
    return this.value;
  }

  equals(other: ValueObject<T> | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return other.constructor === this.constructor && shallowEqual(this.value, other.value);
  }
}

function shallowEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  return (
    keysA.length === keysB.length &&
    keysA.every((key) => Object.is(Reflect.get(a, key), Reflect.get(b, key)))
  );
}
