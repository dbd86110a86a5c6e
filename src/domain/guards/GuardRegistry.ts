/**
 * @fileoverview GuardRegistry - Rule name → guard factory
 *
 * @packageDocumentation
 * @module @tessera/core/domain/guards
 *
 * ## Lifecycle
 *
 * 1. **Initialization**: guards are added with explicit `register` calls.
 *    Each call returns a `Result`, so a duplicate name surfaces at startup.
 * 2. **Freeze**: `freeze()` publishes the registry as read-only.
 * 3. **Evaluation**: the evaluator only calls `resolve`.
 *
 * ```typescript
 * const registry = GuardRegistry.withDefaults()
 *   .register('slug', defineGuard('{name} must {not}be a slug', isSlug))
 *   .unwrap()
 *   .freeze();
 *
 * const evaluator = new GuardEvaluator({ registry });
 * ```
 *
 * Node runs registration and evaluation on one thread, so no lock is taken;
 * a registry is never shared across worker threads.
 */

import {
  DuplicateNameError,
  MalformedRuleError,
  RegistryFrozenError,
  UnknownGuardError,
} from '../exceptions';
import { Result } from '../monads';
import { componentDefaults, defaultLogger } from '../logging';
import type { ILogger } from '../logging';
import { builtinGuards } from './builtins';
import type { GuardArgument, GuardFactory, IGuard } from './IGuard';
import { NAME_PATTERN } from './RuleParser';

export interface GuardRegistryOptions {
  /**
   * Replace an existing guard on re-registration instead of failing with
   * `DuplicateNameError` (default: `componentDefaults().allowGuardOverwrite`)
   */
  allowOverwrite?: boolean;
  logger?: ILogger;
}

export type RegistrationError = DuplicateNameError | RegistryFrozenError | MalformedRuleError;

export class GuardRegistry {
  private readonly guards = new Map<string, GuardFactory>();
  private readonly allowOverwrite: boolean;
  private readonly logger: ILogger;
  private frozen = false;

  constructor(options: GuardRegistryOptions = {}) {
    this.allowOverwrite = options.allowOverwrite ?? componentDefaults().allowGuardOverwrite;
    this.logger = options.logger ?? defaultLogger('guards');
  }

  /**
   * A registry holding the built-in guards, still open for registration.
   */
  static withDefaults(options: GuardRegistryOptions = {}): GuardRegistry {
    const registry = new GuardRegistry(options);
    for (const [name, factory] of Object.entries(builtinGuards)) {
      registry.register(name, factory).unwrap();
    }
    return registry;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  register(name: string, factory: GuardFactory): Result<this, RegistrationError> {
    if (this.frozen) {
      return Result.err(new RegistryFrozenError(name));
    }
    if (!NAME_PATTERN.test(name)) {
      return Result.err(new MalformedRuleError(name, 0, 'a guard name matching [A-Za-z_][A-Za-z0-9_]*'));
    }
    if (this.guards.has(name)) {
      if (!this.allowOverwrite) {
        return Result.err(new DuplicateNameError(name));
      }
      this.logger.debug(`Replacing guard "${name}"`);
    }

    this.guards.set(name, factory);
    this.logger.debug(`Registered guard "${name}"`);
    return Result.ok(this);
  }

  /**
   * Register several guards; stops at the first failure.
   */
  registerAll(factories: Readonly<Record<string, GuardFactory>>): Result<this, RegistrationError> {
    let result: Result<this, RegistrationError> = Result.ok(this);
    for (const [name, factory] of Object.entries(factories)) {
      result = result.bind(() => this.register(name, factory));
    }
    return result;
  }

  /**
   * Make the registry read-only. Further `register` calls fail with
   * `RegistryFrozenError`.
   */
  freeze(): this {
    if (!this.frozen) {
      this.frozen = true;
      this.logger.debug(`Guard registry frozen with ${this.guards.size} guards`);
    }
    return this;
  }

  has(name: string): boolean {
    return this.guards.has(name);
  }

  names(): string[] {
    return [...this.guards.keys()];
  }

  /**
   * Instantiate a guard with the arguments written in the rule.
   *
   * @throws {UnknownGuardError} when no guard is registered under `name`
   * @throws {GuardArgumentError} when the factory rejects the arguments
   */
  resolve(name: string, args: readonly GuardArgument[] = []): IGuard {
    const factory = this.guards.get(name);
    if (!factory) {
      throw new UnknownGuardError(name);
    }
    return factory(args);
  }
}

let defaultRegistry: GuardRegistry | undefined;

/**
 * Process-wide registry of the built-in guards. Created and frozen on first
 * use; build your own registry to add vocabulary.
 */
export function defaultGuardRegistry(): GuardRegistry {
  if (!defaultRegistry) {
    defaultRegistry = GuardRegistry.withDefaults().freeze();
  }
  return defaultRegistry;
}
