/**
 * @fileoverview Domain Exceptions - Fault taxonomy of the core
 *
 * @packageDocumentation
 * @module @tessera/core/domain/exceptions
 *
 * ## Two kinds of failure
 *
 * - **Faults** are programmer errors: an unknown guard name, a rule-string
 *   that does not parse, unwrapping the wrong arm of a `Result`. They extend
 *   {@link DomainError} and are thrown.
 * - **Validation failures** are expected domain outcomes. They travel through
 *   the `Err` arm of a `Result` as a `FailureReport` and are never thrown by
 *   the evaluator.
 *
 * @example
 * ```typescript
 * try {
 *   evaluate({ age: 20 }, { age: 'bogus_rule' });
 * } catch (error) {
 *   if (error instanceof UnknownGuardError) {
 *     console.error(`No guard named ${error.guardName}`);
 *   }
 * }
 * ```
 */

// ==================== Base ====================

/**
 * Base class of every error raised by the library.
 */
export class DomainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DomainError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Base class of faults raised while compiling or resolving guard rules.
 */
export class GuardError extends DomainError {
  constructor(message: string) {
    super(message);
    this.name = 'GuardError';
  }
}

// ==================== Guard Engine ====================

/**
 * A rule name that is not registered.
 */
export class UnknownGuardError extends GuardError {
  constructor(public readonly guardName: string) {
    super(`Guard "${guardName}" is not registered`);
    this.name = 'UnknownGuardError';
  }
}

/**
 * A rule-string that does not follow the rule grammar.
 *
 * The message points at the offending position:
 *
 * ```
 * Expected "," or "]" at position 5:
 * lt[18
 *      ^
 * ```
 */
export class MalformedRuleError extends GuardError {
  constructor(
    public readonly statement: string,
    public readonly position: number,
    public readonly expected: string,
  ) {
    super(
      `Expected ${expected} at position ${position}:\n${statement}\n${' '.repeat(position)}^`,
    );
    this.name = 'MalformedRuleError';
  }
}

/**
 * Arguments that do not fit the guard they were given to.
 */
export class GuardArgumentError extends GuardError {
  constructor(
    public readonly guardName: string,
    public readonly reason: string,
  ) {
    super(`Invalid arguments for guard "${guardName}": ${reason}`);
    this.name = 'GuardArgumentError';
  }
}

/**
 * Registration of a name that is already taken.
 */
export class DuplicateNameError extends GuardError {
  constructor(public readonly guardName: string) {
    super(`Guard "${guardName}" is already registered`);
    this.name = 'DuplicateNameError';
  }
}

/**
 * Registration against a registry that has been frozen.
 */
export class RegistryFrozenError extends GuardError {
  constructor(public readonly guardName: string) {
    super(`Cannot register guard "${guardName}": registry is frozen`);
    this.name = 'RegistryFrozenError';
  }
}

// ==================== Monads ====================

/**
 * Unwrapping a `Result` arm that is not there.
 */
export class UnwrapOnErrError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UnwrapOnErrError';
  }
}

/**
 * Reading the value of an empty `Maybe`.
 */
export class MissingValueError extends DomainError {
  constructor() {
    super('Cannot get value from a Maybe with no value');
    this.name = 'MissingValueError';
  }
}

// ==================== Entities ====================

export class InvalidGuidError extends DomainError {
  constructor(public readonly value: string) {
    super(`"${value}" is not a valid GUID`);
    this.name = 'InvalidGuidError';
  }
}

/**
 * Exception form of a validation failure, for callers that need to throw.
 *
 * @example
 * ```typescript
 * const user = User.create(props).unwrapOrElse((report) => {
 *   throw report.toError();
 * });
 * ```
 */
export class ValidationError extends DomainError {
  constructor(
    message: string = 'Validation Failed',
    public readonly errors: Record<string, string[]> = {},
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}
