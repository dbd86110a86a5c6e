/**
 * @fileoverview GuardEvaluator - Runs rule-strings against field values
 *
 * @packageDocumentation
 * @module @tessera/core/domain/guards
 *
 * ## Evaluation order
 *
 * 1. The `ValidationSpec` (field → rule-string) is checked and **every**
 *    rule-string is parsed and resolved against the registry. A malformed
 *    rule or unknown guard name throws here, before any guard runs.
 * 2. Fields are visited in declaration order. A field's chain stops at its
 *    first unsatisfied rule (fail-fast per field); every field is visited
 *    (exhaustive across fields).
 * 3. The outcome is `Ok(undefined)` or `Err(FailureReport)` with one entry
 *    per failed field.
 *
 * A field missing from `values` is evaluated as `undefined`, so `required`
 * catches it.
 *
 * @example
 * ```typescript
 * const result = evaluate(
 *   { name: '', age: 20 },
 *   { name: 'required', age: 'lt[18]' },
 * );
 *
 * result.unwrapErr().messages;
 * // ['name is required', 'age must be less than 18']
 * ```
 */

import { z } from 'zod';
import { MalformedRuleError } from '../exceptions';
import { Result } from '../monads';
import { defaultLogger } from '../logging';
import type { ILogger } from '../logging';
import { FailureReport, FieldFailure } from './FailureReport';
import { defaultGuardRegistry, GuardRegistry } from './GuardRegistry';
import { formatMessage, GuardResult, GuardResults, IGuard } from './IGuard';
import { GuardRule, RuleParser, toGuardArgument } from './RuleParser';

/**
 * Field name → rule-string, in declaration order.
 */
export type ValidationSpec = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/**
 * Field name → value under validation: a Map, or any object whose own
 * properties are the fields (props interfaces, plain records).
 */
export type FieldValues = object;

/**
 * Field name → message replacing the guard's own message for that field.
 */
export type FieldMessages = Readonly<Record<string, string>>;

export interface GuardEvaluatorOptions {
  /** Registry rules resolve against (default: {@link defaultGuardRegistry}) */
  registry?: GuardRegistry;
  parser?: RuleParser;
  logger?: ILogger;
}

/**
 * A rule resolved to its guard.
 */
export interface CompiledRule {
  readonly rule: GuardRule;
  readonly guard: IGuard;
}

export interface CompiledField {
  readonly field: string;
  readonly statement: string;
  readonly rules: readonly CompiledRule[];
}

const SpecSchema = z.record(z.string(), z.string({ invalid_type_error: 'must be a rule-string' }));

function isMap<V>(mapping: object): mapping is ReadonlyMap<string, V> {
  return mapping instanceof Map;
}

function entriesOf(spec: ValidationSpec): [string, string][] {
  return isMap<string>(spec) ? [...spec.entries()] : Object.entries(spec);
}

function ownValue(record: object, field: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, field) ? Reflect.get(record, field) : undefined;
}

function valueOf(values: FieldValues, field: string): unknown {
  return isMap<unknown>(values) ? values.get(field) : ownValue(values, field);
}

function ruleLabel(rule: GuardRule): string {
  return rule.negate ? `!${rule.name}` : rule.name;
}

export class GuardEvaluator {
  private readonly registry: GuardRegistry;
  private readonly parser: RuleParser;
  private readonly logger: ILogger;

  constructor(options: GuardEvaluatorOptions = {}) {
    this.registry = options.registry ?? defaultGuardRegistry();
    this.parser = options.parser ?? new RuleParser();
    this.logger = options.logger ?? defaultLogger('guards');
  }

  /**
   * Parse and resolve one rule-string.
   *
   * @throws {MalformedRuleError} | {UnknownGuardError} | {GuardArgumentError}
   */
  compileRule(statement: string): CompiledRule[] {
    return this.parser.parse(statement).map((rule) => ({
      rule,
      guard: this.registry.resolve(rule.name, rule.args.map(toGuardArgument)),
    }));
  }

  /**
   * Parse and resolve every rule-string of a `ValidationSpec`.
   */
  compile(spec: ValidationSpec): CompiledField[] {
    const entries = entriesOf(spec);
    const parsed = SpecSchema.safeParse(Object.fromEntries(entries));
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const field = issue ? issue.path.join('.') : '';
      throw new MalformedRuleError('', 0, `a rule-string for field "${field}"`);
    }

    return entries.map(([field, statement]) => ({
      field,
      statement,
      rules: this.compileRule(statement),
    }));
  }

  /**
   * Validate `values` against `spec`.
   */
  evaluate(
    values: FieldValues,
    spec: ValidationSpec,
    messages: FieldMessages = {},
  ): Result<void, FailureReport> {
    const failures = this.run(this.compile(spec), values, messages);
    if (failures.length === 0) {
      return Result.ok();
    }

    this.logger.debug(`Validation failed for ${failures.map((failure) => failure.field).join(', ')}`);
    return Result.err(new FailureReport(failures));
  }

  /**
   * Validate one value against one rule-string.
   */
  guard(field: string, value: unknown, statement: string, message?: string): GuardResult {
    const failure = this.check({ field, statement, rules: this.compileRule(statement) }, value, message);
    return failure ? GuardResults.fail(failure.message) : GuardResults.ok();
  }

  /**
   * First failed field of `values` as a `GuardResult`.
   */
  guardAll(values: FieldValues, spec: ValidationSpec, messages: FieldMessages = {}): GuardResult {
    const [first] = this.run(this.compile(spec), values, messages);
    return first ? GuardResults.fail(first.message) : GuardResults.ok();
  }

  private run(fields: readonly CompiledField[], values: FieldValues, messages: FieldMessages): FieldFailure[] {
    const failures: FieldFailure[] = [];
    for (const compiled of fields) {
      const override = ownValue(messages, compiled.field);
      const failure = this.check(
        compiled,
        valueOf(values, compiled.field),
        typeof override === 'string' ? override : undefined,
      );
      if (failure) {
        failures.push(failure);
      }
    }
    return failures;
  }

  private check(compiled: CompiledField, value: unknown, override?: string): FieldFailure | undefined {
    for (const { rule, guard } of compiled.rules) {
      if (guard.isSatisfiedBy(value) !== rule.negate) {
        continue;
      }
      return {
        field: compiled.field,
        rule: ruleLabel(rule),
        message: override ?? formatMessage(guard.message, compiled.field, rule.negate, guard.params),
      };
    }
    return undefined;
  }
}

/**
 * First failed result of a list, or a satisfied result.
 */
export function combine(results: readonly GuardResult[]): GuardResult {
  return results.find((result) => !result.satisfied) ?? GuardResults.ok();
}

let defaultEvaluator: GuardEvaluator | undefined;

function evaluator(): GuardEvaluator {
  if (!defaultEvaluator) {
    defaultEvaluator = new GuardEvaluator();
  }
  return defaultEvaluator;
}

/**
 * {@link GuardEvaluator.evaluate} against the default registry.
 */
export function evaluate(
  values: FieldValues,
  spec: ValidationSpec,
  messages?: FieldMessages,
): Result<void, FailureReport> {
  return evaluator().evaluate(values, spec, messages);
}

export function guard(field: string, value: unknown, statement: string, message?: string): GuardResult {
  return evaluator().guard(field, value, statement, message);
}

export function guardAll(values: FieldValues, spec: ValidationSpec, messages?: FieldMessages): GuardResult {
  return evaluator().guardAll(values, spec, messages);
}
