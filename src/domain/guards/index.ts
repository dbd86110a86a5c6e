/**
 * @module @tessera/core/domain/guards
 * @description Guard registry, rule-string parser and evaluator
 */

// ============================================================================
// Guard Contract
// ============================================================================

export {
  GuardBase,
  GuardResults,
  defineGuard,
  parseGuardArgs,
  formatMessage,
  formatArgument,
} from './IGuard';
export type { IGuard, GuardArgument, GuardFactory, GuardResult } from './IGuard';

// ============================================================================
// Registry & Vocabulary
// ============================================================================

export { GuardRegistry, defaultGuardRegistry } from './GuardRegistry';
export type { GuardRegistryOptions, RegistrationError } from './GuardRegistry';

export {
  builtinGuards,
  RequiredGuard,
  EmptyGuard,
  LengthGuard,
  BetweenGuard,
  RegexGuard,
  InGuard,
  EqualGuard,
  ComparisonGuard,
} from './builtins';

// ============================================================================
// Parsing & Evaluation
// ============================================================================

export { RuleParser, toGuardArgument, DEFAULT_PARSE_CACHE_SIZE } from './RuleParser';
export type { GuardRule, RuleArgument, RuleParserOptions } from './RuleParser';

export { GuardEvaluator, evaluate, guard, guardAll, combine } from './GuardEvaluator';
export type {
  ValidationSpec,
  FieldValues,
  FieldMessages,
  GuardEvaluatorOptions,
  CompiledRule,
  CompiledField,
} from './GuardEvaluator';

export { FailureReport } from './FailureReport';
export type { FieldFailure } from './FailureReport';
