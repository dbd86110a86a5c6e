/**
 * @fileoverview FailureReport - Ordered per-field validation failures
 *
 * @module @tessera/core/domain/guards
 */

import { ValidationError } from '../exceptions';

export interface FieldFailure {
  readonly field: string;
  /** Name of the rule that failed, `!`-prefixed when negated */
  readonly rule: string;
  readonly message: string;
}

/**
 * Validation outcome carried in the `Err` arm of `evaluate`. It is an
 * expected result, not a fault, so it does not extend `Error`.
 */
export class FailureReport {
  readonly failures: readonly FieldFailure[];

  constructor(failures: readonly FieldFailure[]) {
    this.failures = Object.freeze([...failures]);
    Object.freeze(this);
  }

  get size(): number {
    return this.failures.length;
  }

  get fields(): string[] {
    return this.failures.map((failure) => failure.field);
  }

  get messages(): string[] {
    return this.failures.map((failure) => failure.message);
  }

  forField(field: string): FieldFailure | undefined {
    return this.failures.find((failure) => failure.field === field);
  }

  /**
   * Field → messages, the shape used by HTTP validation responses.
   */
  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const { field, message } of this.failures) {
      (record[field] ??= []).push(message);
    }
    return record;
  }

  toError(message: string = 'Validation Failed'): ValidationError {
    return new ValidationError(message, this.toRecord());
  }

  toString(): string {
    return this.messages.join('; ');
  }
}
