/**
 * @module @tessera/core/domain/monads
 * @description Maybe, Result and Either
 */

export { Maybe, some, none } from './Maybe';
export type { MaybeMatcher } from './Maybe';

export { Result, ok, err } from './Result';
export type { ResultMatcher } from './Result';

export { Either, left, right } from './Either';
