/**
 * @fileoverview Built-in guard vocabulary
 *
 * @module @tessera/core/domain/guards
 *
 * | Rule | Satisfied when |
 * | --- | --- |
 * | `required` | value is not `null`, `undefined` or `''` |
 * | `empty` | string/array has length 0, Map/Set has size 0 |
 * | `length[n]` | length (or size) is exactly `n` |
 * | `between[min,max]` | number, or length of a string/array, lies in `[min, max]` |
 * | `regex[r"..."]` | string matches the pattern from its first character |
 * | `in[[a,b]]`, `in[a,b]` | value is one of the listed literals |
 * | `lt[n]`, `le[n]`, `gt[n]`, `ge[n]` | numeric comparison |
 * | `eq[v]` | value is strictly equal to `v` |
 * | `odd`, `even`, `integer` | integer checks |
 * | `positive`, `negative` | sign checks (zero is neither) |
 *
 * A value of the wrong kind (a string given to `lt`, a number given to
 * `regex`) does not satisfy the guard.
 */

import { z } from 'zod';
import { GuardArgumentError } from '../exceptions';
import { GuardArgument, GuardBase, GuardFactory, parseGuardArgs } from './IGuard';

const NoArgs = z.tuple([]);
const NumberArg = z.tuple([z.number()]);
const Scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

type Scalar = z.infer<typeof Scalar>;

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

function lengthOf(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size;
  }
  return undefined;
}

// ==================== Presence ====================

export class RequiredGuard extends GuardBase {
  readonly message = '{name} is {not}required';

  isSatisfiedBy(value: unknown): boolean {
    return value !== null && value !== undefined && value !== '';
  }
}

export class EmptyGuard extends GuardBase {
  readonly message = '{name} must {not}be empty';

  isSatisfiedBy(value: unknown): boolean {
    return lengthOf(value) === 0;
  }
}

// ==================== Size ====================

export class LengthGuard extends GuardBase {
  readonly message = '{name} must {not}have length {length}';

  constructor(private readonly length: number) {
    super();
  }

  get params(): Record<string, GuardArgument> {
    return { length: this.length };
  }

  isSatisfiedBy(value: unknown): boolean {
    return lengthOf(value) === this.length;
  }
}

export class BetweenGuard extends GuardBase {
  readonly message = '{name} must {not}be between {min} and {max}';

  constructor(
    private readonly min: number,
    private readonly max: number,
  ) {
    super();
  }

  get params(): Record<string, GuardArgument> {
    return { min: this.min, max: this.max };
  }

  isSatisfiedBy(value: unknown): boolean {
    const measured = isNumber(value) ? value : lengthOf(value);
    return measured !== undefined && measured >= this.min && measured <= this.max;
  }
}

// ==================== Pattern & Membership ====================

function compilePattern(pattern: string): RegExp {
  try {
    // sticky: the match is anchored at the first character
    return new RegExp(pattern, 'y');
  } catch (error) {
    throw new GuardArgumentError('regex', error instanceof Error ? error.message : String(error));
  }
}

export class RegexGuard extends GuardBase {
  readonly message = '{name} must {not}match the regular expression {regex}';
  private readonly regex: RegExp;

  constructor(private readonly pattern: string) {
    super();
    this.regex = compilePattern(pattern);
  }

  get params(): Record<string, GuardArgument> {
    return { regex: this.pattern };
  }

  isSatisfiedBy(value: unknown): boolean {
    if (typeof value !== 'string') {
      return false;
    }
    this.regex.lastIndex = 0;
    return this.regex.test(value);
  }
}

export class InGuard extends GuardBase {
  readonly message = '{name} must {not}be in the list {list}';

  constructor(private readonly items: readonly Scalar[]) {
    super();
  }

  get params(): Record<string, GuardArgument> {
    return { list: this.items };
  }

  isSatisfiedBy(value: unknown): boolean {
    return this.items.some((item) => item === value);
  }
}

export class EqualGuard extends GuardBase {
  readonly message = '{name} must {not}be equal to {value}';

  constructor(private readonly expected: Scalar) {
    super();
  }

  get params(): Record<string, GuardArgument> {
    return { value: this.expected };
  }

  isSatisfiedBy(value: unknown): boolean {
    return value === this.expected;
  }
}

// ==================== Numeric ====================

type Comparison = 'lt' | 'le' | 'gt' | 'ge';

const COMPARISONS: Record<Comparison, { message: string; param: 'min' | 'max'; test: (a: number, b: number) => boolean }> = {
  lt: { message: '{name} must {not}be less than {max}', param: 'max', test: (a, b) => a < b },
  le: { message: '{name} must {not}be less than or equal to {max}', param: 'max', test: (a, b) => a <= b },
  gt: { message: '{name} must {not}be greater than {min}', param: 'min', test: (a, b) => a > b },
  ge: { message: '{name} must {not}be greater than or equal to {min}', param: 'min', test: (a, b) => a >= b },
};

export class ComparisonGuard extends GuardBase {
  readonly message: string;

  constructor(
    private readonly comparison: Comparison,
    private readonly bound: number,
  ) {
    super();
    this.message = COMPARISONS[comparison].message;
  }

  get params(): Record<string, GuardArgument> {
    return { [COMPARISONS[this.comparison].param]: this.bound };
  }

  isSatisfiedBy(value: unknown): boolean {
    return isNumber(value) && COMPARISONS[this.comparison].test(value, this.bound);
  }
}

class NumberPredicateGuard extends GuardBase {
  constructor(
    readonly message: string,
    private readonly test: (value: number) => boolean,
  ) {
    super();
  }

  isSatisfiedBy(value: unknown): boolean {
    return isNumber(value) && this.test(value);
  }
}

// ==================== Registration table ====================

function comparison(name: Comparison): GuardFactory {
  return (args) => {
    const [bound] = parseGuardArgs(name, NumberArg, args);
    return new ComparisonGuard(name, bound);
  };
}

function numeric(name: string, message: string, test: (value: number) => boolean): GuardFactory {
  return (args) => {
    parseGuardArgs(name, NoArgs, args);
    return new NumberPredicateGuard(message, test);
  };
}

const InArgs = z.union([
  z.tuple([z.array(Scalar)]).transform(([items]) => items),
  z.array(Scalar),
]);

const BetweenArgs = z
  .tuple([z.number(), z.number()])
  .refine(([min, max]) => min <= max, { message: 'min must not exceed max' });

/**
 * Factories of the built-in guards, keyed by rule name.
 */
export const builtinGuards: Readonly<Record<string, GuardFactory>> = {
  required: (args) => {
    parseGuardArgs('required', NoArgs, args);
    return new RequiredGuard();
  },
  empty: (args) => {
    parseGuardArgs('empty', NoArgs, args);
    return new EmptyGuard();
  },
  length: (args) => {
    const [length] = parseGuardArgs('length', z.tuple([z.number().int().nonnegative()]), args);
    return new LengthGuard(length);
  },
  between: (args) => {
    const [min, max] = parseGuardArgs('between', BetweenArgs, args);
    return new BetweenGuard(min, max);
  },
  regex: (args) => {
    const [pattern] = parseGuardArgs('regex', z.tuple([z.string()]), args);
    return new RegexGuard(pattern);
  },
  in: (args) => new InGuard(parseGuardArgs('in', InArgs, args)),
  eq: (args) => {
    const [expected] = parseGuardArgs('eq', z.tuple([Scalar]), args);
    return new EqualGuard(expected);
  },
  lt: comparison('lt'),
  le: comparison('le'),
  gt: comparison('gt'),
  ge: comparison('ge'),
  odd: numeric('odd', '{name} must {not}be odd', (value) => Number.isInteger(value) && Math.abs(value % 2) === 1),
  even: numeric('even', '{name} must {not}be even', (value) => Number.isInteger(value) && value % 2 === 0),
  integer: numeric('integer', '{name} must {not}be an integer', Number.isInteger),
  positive: numeric('positive', '{name} must {not}be positive', (value) => value > 0),
  negative: numeric('negative', '{name} must {not}be negative', (value) => value < 0),
};
