/**
 * @fileoverview EventDispatcher - Same-process, synchronous event delivery
 *
 * @packageDocumentation
 * @module @tessera/core/domain/events
 *
 * ## Delivery rules
 *
 * - Handlers bound to an event class run in binding order.
 * - `trigger(aggregate)` drains the aggregate's queue **before** the first
 *   handler runs, then delivers the events in the order they were recorded.
 * - A throwing handler stops the pass: the error propagates to the caller
 *   and the events not yet delivered are dropped, never re-queued.
 * - Binding the same handler twice delivers the event to it twice.
 *
 * This is a notification mechanism, not a durable delivery system.
 *
 * @example
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * dispatcher.bind(OrderShipped, (event) => mailer.notify(event.payload.carrier));
 * dispatcher.bind(OrderShipped, new UpdateReadModelHandler());
 *
 * order.ship('ups');
 * dispatcher.trigger(order); // both handlers run, queue is empty afterwards
 * ```
 */

import { defaultLogger } from '../logging';
import type { ILogger } from '../logging';
import type { EventType, IDomainEvent, IEventRaisingEntity } from './IDomainEvent';

/**
 * IEventHandler - Object form of a handler.
 */
export interface IEventHandler<TEvent extends IDomainEvent> {
  handle(event: TEvent): void;
}

export type EventHandlerFunction<TEvent extends IDomainEvent> = (event: TEvent) => void;

export type EventHandler<TEvent extends IDomainEvent> = EventHandlerFunction<TEvent> | IEventHandler<TEvent>;

/**
 * IEventSubscriber - Groups related bindings behind one `setup` call.
 *
 * @example
 * ```typescript
 * class ShippingNotifications implements IEventSubscriber {
 *   setup(dispatcher: EventDispatcher): void {
 *     dispatcher
 *       .bind(OrderShipped, (event) => this.onShipped(event))
 *       .bind(OrderDelivered, (event) => this.onDelivered(event));
 *   }
 * }
 *
 * dispatcher.subscribe(new ShippingNotifications());
 * ```
 */
export interface IEventSubscriber {
  setup(dispatcher: EventDispatcher): void;
}

export interface EventDispatcherOptions {
  logger?: ILogger;
}

interface Binding {
  readonly handler: unknown;
  invoke(event: IDomainEvent): void;
}

function invokeHandler<E extends IDomainEvent>(handler: EventHandler<E>, event: E): void {
  if (typeof handler === 'function') {
    handler(event);
  } else {
    handler.handle(event);
  }
}

export class EventDispatcher {
  private readonly bindings = new Map<Function, Binding[]>();
  private readonly marked = new Set<IEventRaisingEntity>();
  private readonly logger: ILogger;

  constructor(options: EventDispatcherOptions = {}) {
    this.logger = options.logger ?? defaultLogger('events');
  }

  // ==================== Binding ====================

  /**
   * Append `handler` to the handlers of `type`.
   */
  bind<E extends IDomainEvent>(type: EventType<E>, handler: EventHandler<E>): this {
    const bindings = this.bindings.get(type) ?? [];
    bindings.push({
      handler,
      invoke: (event) => {
        if (event instanceof type) {
          invokeHandler(handler, event);
        }
      },
    });
    this.bindings.set(type, bindings);
    this.logger.debug(`Bound handler to ${type.name} (${bindings.length} total)`);
    return this;
  }

  /**
   * Remove every binding of `handler` to `type`.
   */
  unbind<E extends IDomainEvent>(type: EventType<E>, handler: EventHandler<E>): this {
    const bindings = this.bindings.get(type);
    if (bindings) {
      const remaining = bindings.filter((binding) => binding.handler !== handler);
      if (remaining.length > 0) {
        this.bindings.set(type, remaining);
      } else {
        this.bindings.delete(type);
      }
    }
    return this;
  }

  /**
   * Let `subscriber` bind its handlers to this dispatcher.
   */
  subscribe(subscriber: IEventSubscriber): this {
    subscriber.setup(this);
    return this;
  }

  handlerCount(type: EventType): number {
    return this.bindings.get(type)?.length ?? 0;
  }

  /**
   * Drop every binding and every marked aggregate.
   */
  clear(): void {
    this.bindings.clear();
    this.marked.clear();
  }

  // ==================== Queueing ====================

  /**
   * Queue `event` on `aggregate` and mark the aggregate for
   * {@link triggerMarked}.
   */
  remind(aggregate: IEventRaisingEntity, event: IDomainEvent): void {
    aggregate.remind(event);
    this.marked.add(aggregate);
  }

  get markedCount(): number {
    return this.marked.size;
  }

  clearMarked(): void {
    this.marked.clear();
  }

  // ==================== Dispatch ====================

  /**
   * Deliver every queued event of `aggregate`, leaving its queue empty.
   */
  trigger(aggregate: IEventRaisingEntity): void {
    this.marked.delete(aggregate);
    const events = aggregate.pullEvents();
    for (const event of events) {
      this.dispatch(event);
    }
  }

  /**
   * Trigger every aggregate queued through {@link remind}, in marking order.
   */
  triggerMarked(): void {
    for (const aggregate of [...this.marked]) {
      this.trigger(aggregate);
    }
  }

  /**
   * Deliver one event to the handlers bound to its class.
   */
  dispatch(event: IDomainEvent): void {
    const bindings = this.bindings.get(event.constructor);
    if (!bindings) {
      this.logger.debug(`No handlers for ${event.eventName}`);
      return;
    }

    this.logger.debug(`Dispatching ${event.eventName} to ${bindings.length} handler(s)`);
    for (const binding of [...bindings]) {
      try {
        binding.invoke(event);
      } catch (error) {
        this.logger.warn(`Handler for ${event.eventName} (${event.metadata.eventId}) failed`, error);
        throw error;
      }
    }
  }
}

// ============================================================================
// Default dispatcher
// ============================================================================

let defaultInstance: EventDispatcher | undefined;

export function defaultDispatcher(): EventDispatcher {
  if (!defaultInstance) {
    defaultInstance = new EventDispatcher();
  }
  return defaultInstance;
}

export function bind<E extends IDomainEvent>(type: EventType<E>, handler: EventHandler<E>): void {
  defaultDispatcher().bind(type, handler);
}

export function unbind<E extends IDomainEvent>(type: EventType<E>, handler: EventHandler<E>): void {
  defaultDispatcher().unbind(type, handler);
}

export function subscribe(subscriber: IEventSubscriber): void {
  defaultDispatcher().subscribe(subscriber);
}

export function remind(aggregate: IEventRaisingEntity, event: IDomainEvent): void {
  defaultDispatcher().remind(aggregate, event);
}

export function trigger(aggregate: IEventRaisingEntity): void {
  defaultDispatcher().trigger(aggregate);
}
