/**
 * @fileoverview Guards - Named, parameterized predicates with a message template
 *
 * @packageDocumentation
 * @module @tessera/core/domain/guards
 *
 * ## Anatomy of a guard
 *
 * A guard answers one question about one value ("is it less than 18?") and
 * carries the sentence used when the answer is wrong. The sentence is a
 * template with two reserved placeholders:
 *
 * - `{name}` – the field being validated
 * - `{not}` – `"not "` when the rule is negated with `!`, empty otherwise
 *
 * Any other `{placeholder}` is filled from the guard's {@link IGuard.params}.
 *
 * ```
 * "{name} must {not}be less than {max}"
 *   lt[18]   on age → "age must be less than 18"
 *   !lt[18]  on age → "age must not be less than 18"
 * ```
 *
 * ## Custom vocabulary
 *
 * ```typescript
 * class SlugGuard extends GuardBase {
 *   readonly message = '{name} must {not}be a slug';
 *
 *   isSatisfiedBy(value: unknown): boolean {
 *     return typeof value === 'string' && /^[a-z0-9-]+$/.test(value);
 *   }
 * }
 *
 * registry.register('slug', () => new SlugGuard());
 * registry.register('uuid', defineGuard('{name} must {not}be a UUID', isUuid));
 * ```
 */

import { z } from 'zod';
import { GuardArgumentError } from '../exceptions';

/**
 * Plain value of a rule argument, as a guard factory receives it.
 */
export type GuardArgument = string | number | boolean | null | readonly GuardArgument[];

/**
 * Outcome of checking one value against one rule or rule chain.
 */
export interface GuardResult {
  readonly satisfied: boolean;
  /** Formatted failure message; `null` when satisfied */
  readonly message: string | null;
}

export const GuardResults = {
  ok(): GuardResult {
    return { satisfied: true, message: null };
  },
  fail(message: string): GuardResult {
    return { satisfied: false, message };
  },
};

/**
 * IGuard - predicate over a single value plus its failure message template
 */
export interface IGuard {
  readonly message: string;
  /** Values substituted into the message template */
  readonly params: Readonly<Record<string, GuardArgument>>;
  isSatisfiedBy(value: unknown): boolean;
}

/**
 * Builds a guard from the arguments written in the rule-string.
 */
export type GuardFactory = (args: readonly GuardArgument[]) => IGuard;

/**
 * Base class for guards without parameters; override `params` when the
 * message needs them.
 */
export abstract class GuardBase implements IGuard {
  abstract readonly message: string;

  get params(): Readonly<Record<string, GuardArgument>> {
    return {};
  }

  abstract isSatisfiedBy(value: unknown): boolean;
}

class PredicateGuard extends GuardBase {
  constructor(
    readonly message: string,
    private readonly predicate: (value: unknown) => boolean,
  ) {
    super();
  }

  isSatisfiedBy(value: unknown): boolean {
    return this.predicate(value);
  }
}

/**
 * Factory for an argument-less guard built from a predicate.
 */
export function defineGuard(message: string, predicate: (value: unknown) => boolean): GuardFactory {
  return () => new PredicateGuard(message, predicate);
}

/**
 * Validate rule arguments against a zod schema.
 *
 * @throws {GuardArgumentError} when the arguments do not match
 *
 * @example
 * ```typescript
 * const [max] = parseGuardArgs('lt', z.tuple([z.number()]), args);
 * ```
 */
export function parseGuardArgs<S extends z.ZodTypeAny>(
  guardName: string,
  schema: S,
  args: readonly GuardArgument[],
): z.output<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `argument ${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join(', ');
    throw new GuardArgumentError(guardName, reason);
  }
  return parsed.data;
}

/**
 * Substitute `{name}`, `{not}` and guard parameters into a template.
 * Unknown placeholders are left as written.
 */
export function formatMessage(
  template: string,
  field: string,
  negate: boolean,
  params: Readonly<Record<string, GuardArgument>> = {},
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
    if (key === 'name') {
      return field;
    }
    if (key === 'not') {
      return negate ? 'not ' : '';
    }
    const param = params[key];
    return param === undefined ? placeholder : formatArgument(param);
  });
}

export function formatArgument(value: GuardArgument): string {
  if (Array.isArray(value)) {
    return `[${value.map(formatArgument).join(', ')}]`;
  }
  return String(value);
}
