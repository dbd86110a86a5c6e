/**
 * @fileoverview Guid - Entity identity value
 *
 * @module @tessera/core/domain/entity
 */

import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import { InvalidGuidError } from '../exceptions';
import { Result } from '../monads';

export class Guid {
  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  /**
   * New random (v4) identity.
   */
  static create(): Guid {
    return new Guid(uuidv4());
  }

  static fromString(value: string): Result<Guid, InvalidGuidError> {
    const normalized = value.trim().toLowerCase();
    return uuidValidate(normalized) ? Result.ok(new Guid(normalized)) : Result.err(new InvalidGuidError(value));
  }

  equals(other: Guid | null | undefined): boolean {
    return other instanceof Guid && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
