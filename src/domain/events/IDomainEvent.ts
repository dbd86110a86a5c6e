/**
 * @fileoverview Domain Events - Events and the aggregates that record them
 *
 * @packageDocumentation
 * @module @tessera/core/domain/events
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * Domain layer:
 * - ✅ **CAN**: Define domain events and event-recording aggregates
 * - ✅ **CAN**: Queue events during a business operation
 * - ❌ **CANNOT**: Deliver events (that is the dispatcher's job)
 *
 * ## Event flow
 *
 * ```
 * ┌──────────────────────────────────────────────────────────┐
 * │ AGGREGATE                                                │
 * │   order.ship()                                           │
 * │     ↓                                                    │
 * │   this.remind(new OrderShipped(this.id, {...}))          │
 * │     ↓                                                    │
 * │   queued in order.domainEvents (trigger order)           │
 * └──────────────────────────────────────────────────────────┘
 *          │ repository.save(order)
 *          ↓
 * ┌──────────────────────────────────────────────────────────┐
 * │ DISPATCHER                                               │
 * │   dispatcher.trigger(order)                              │
 * │     ↓ queue drained first                                │
 * │   handlers bound to OrderShipped run in binding order    │
 * └──────────────────────────────────────────────────────────┘
 * ```
 *
 * The event **class** is the event type: handlers bound to `OrderShipped`
 * receive `OrderShipped` instances only, never a subclass or sibling.
 */

import { v4 as uuidv4 } from 'uuid';
import { Entity, Guid } from '../entity';
import { Maybe, none } from '../monads';

// ============================================================================
// Event Metadata
// ============================================================================

/**
 * Metadata attached to every domain event.
 */
export interface EventMetadata {
  /** Unique identifier of this event occurrence */
  eventId: string;
  /** ISO 8601 timestamp of when the event was created */
  occurredAt: string;
  correlationId?: string;
  actorId?: string;
}

// ============================================================================
// Domain Event
// ============================================================================

/**
 * IDomainEvent - Something significant that happened to an aggregate.
 *
 * @template TPayload - Event-specific data
 */
export interface IDomainEvent<TPayload = unknown> {
  /** Human-readable event name, used in logs */
  readonly eventName: string;
  /** Identity of the aggregate that recorded the event */
  readonly aggregateId: Guid;
  readonly metadata: EventMetadata;
  readonly payload: TPayload;
}

/**
 * Base class for concrete events. Metadata defaults to a fresh event id and
 * the current time.
 *
 * @example
 * ```typescript
 * class OrderShipped extends DomainEvent<{ carrier: string }> {
 *   readonly eventName = 'OrderShipped';
 * }
 *
 * new OrderShipped(order.id, { carrier: 'ups' });
 * ```
 */
export abstract class DomainEvent<TPayload = unknown> implements IDomainEvent<TPayload> {
  abstract readonly eventName: string;
  readonly metadata: EventMetadata;

  constructor(
    readonly aggregateId: Guid,
    readonly payload: TPayload,
    metadata: Partial<EventMetadata> = {},
  ) {
    this.metadata = {
      eventId: uuidv4(),
      occurredAt: new Date().toISOString(),
      ...metadata,
    };
  }
}

/**
 * Class of a concrete event, used as the event-type identity.
 */
export type EventType<E extends IDomainEvent = IDomainEvent> = abstract new (...args: never[]) => E;

// ============================================================================
// Event Recording Entity
// ============================================================================

/**
 * IEventRaisingEntity - An object that queues events for later dispatch.
 */
export interface IEventRaisingEntity {
  /** Pending events, in the order they were recorded */
  readonly domainEvents: readonly IDomainEvent[];

  /** Append an event to the queue */
  remind(event: IDomainEvent): void;

  /** Return the pending events and empty the queue */
  pullEvents(): IDomainEvent[];

  clearEvents(): void;
}

/**
 * AggregateRoot - Entity that records domain events.
 *
 * The queue is append-only until a dispatch pass drains it.
 *
 * @example
 * ```typescript
 * class Order extends AggregateRoot<OrderProps> {
 *   ship(carrier: string): void {
 *     this.props.status = 'shipped';
 *     this.remind(new OrderShipped(this.id, { carrier }));
 *   }
 * }
 * ```
 */
export abstract class AggregateRoot<TProps> extends Entity<TProps> implements IEventRaisingEntity {
  private _domainEvents: IDomainEvent[] = [];

  protected constructor(props: TProps, id: Maybe<Guid> = none()) {
    super(props, id);
  }

  get domainEvents(): readonly IDomainEvent[] {
    return this._domainEvents;
  }

  remind(event: IDomainEvent): void {
    this._domainEvents.push(event);
  }

  pullEvents(): IDomainEvent[] {
    const events = this._domainEvents;
    this._domainEvents = [];
    return events;
  }

  clearEvents(): void {
    this._domainEvents = [];
  }
}
