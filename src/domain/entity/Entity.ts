/**
 * @fileoverview Entity - Identity plus properties
 *
 * @module @tessera/core/domain/entity
 *
 * @example
 * ```typescript
 * interface TaskProps {
 *   title: string;
 * }
 *
 * class Task extends Entity<TaskProps> {
 *   static create(props: TaskProps, id: Maybe<Guid> = none()): Result<Task, FailureReport> {
 *     return evaluate(props, { title: 'required|between[1,120]' }).map(() => new Task(props, id));
 *   }
 * }
 * ```
 */

import { Maybe, none } from '../monads';
import { Guid } from './Guid';

export abstract class Entity<TProps> {
  readonly id: Guid;
  protected readonly props: TProps;

  /**
   * @param id - existing identity; a new one is generated when absent
   */
  protected constructor(props: TProps, id: Maybe<Guid> = none()) {
    this.id = id.getOrElse(() => Guid.create());
    this.props = props;
  }

  getProps(): Readonly<TProps> {
    return this.props;
  }

  /**
   * Entities are equal when they share an identity.
   */
  equals(other: Entity<TProps> | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return other === this || this.id.equals(other.id);
  }
}
