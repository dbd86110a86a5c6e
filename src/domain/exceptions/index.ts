/**
 * @tessera/core - Exception Module
 *
 * Fault taxonomy of the monads, the guard engine and the entity building blocks
 */

export {
  DomainError,
  GuardError,
  UnknownGuardError,
  MalformedRuleError,
  GuardArgumentError,
  DuplicateNameError,
  RegistryFrozenError,
  UnwrapOnErrError,
  MissingValueError,
  InvalidGuidError,
  ValidationError,
} from './exceptions';
