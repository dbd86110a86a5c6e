/**
 * @module @tessera/core/domain/events
 * @description Domain events, event-recording aggregates and the dispatcher
 */

// ============================================================================
// Events & Aggregates
// ============================================================================

export { DomainEvent, AggregateRoot } from './IDomainEvent';
export type { EventMetadata, IDomainEvent, IEventRaisingEntity, EventType } from './IDomainEvent';

// ============================================================================
// Dispatcher
// ============================================================================

export {
  EventDispatcher,
  defaultDispatcher,
  bind,
  unbind,
  subscribe,
  remind,
  trigger,
} from './EventDispatcher';
export type {
  IEventHandler,
  EventHandler,
  EventHandlerFunction,
  EventDispatcherOptions,
  IEventSubscriber,
} from './EventDispatcher';
