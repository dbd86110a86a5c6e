/**
 * @module @tessera/core/domain/entity
 * @description Identity, entities, value objects and watched collections
 */

export { Guid } from './Guid';
export { Entity } from './Entity';
export { ValueObject } from './ValueObject';
export { WatchedList } from './WatchedList';
