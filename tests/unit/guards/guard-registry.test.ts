/**
 * @fileoverview Unit tests for GuardRegistry
 */

import {
  defaultGuardRegistry,
  defineGuard,
  DuplicateNameError,
  GuardBase,
  GuardRegistry,
  ILogger,
  MalformedRuleError,
  RegistryFrozenError,
  silentLogger,
  UnknownGuardError,
} from '../../../src';

class SlugGuard extends GuardBase {
  readonly message = '{name} must {not}be a slug';

  isSatisfiedBy(value: unknown): boolean {
    return typeof value === 'string' && /^[a-z0-9-]+$/.test(value);
  }
}

const slug = () => new SlugGuard();

describe('GuardRegistry', () => {
  let registry: GuardRegistry;

  beforeEach(() => {
    registry = new GuardRegistry({ logger: silentLogger });
  });

  // ==========================================================================
  // REGISTRATION
  // ==========================================================================

  describe('register()', () => {
    it('should register a guard and return the registry', () => {
      const result = registry.register('slug', slug);

      expect(result.unwrap()).toBe(registry);
      expect(registry.has('slug')).toBe(true);
      expect(registry.names()).toEqual(['slug']);
    });

    it('should reject a duplicate name by default', () => {
      registry.register('slug', slug);

      const error = registry.register('slug', slug).unwrapErr();

      expect(error).toBeInstanceOf(DuplicateNameError);
      expect(error.message).toBe('Guard "slug" is already registered');
    });

    it('should replace a duplicate when overwriting is allowed', () => {
      const replacing = new GuardRegistry({ allowOverwrite: true, logger: silentLogger });
      const other = defineGuard('{name} must {not}be anything', () => true);

      replacing.register('slug', slug);
      const result = replacing.register('slug', other);

      expect(result.isOk).toBe(true);
      expect(replacing.resolve('slug').message).toBe('{name} must {not}be anything');
    });

    it('should reject names outside the rule grammar', () => {
      for (const name of ['', '1st', 'has-dash', 'a b']) {
        expect(registry.register(name, slug).unwrapErr()).toBeInstanceOf(MalformedRuleError);
      }
      expect(registry.names()).toEqual([]);
    });

    it('should register several guards with registerAll()', () => {
      const result = registry.registerAll({ slug, always: defineGuard('{name}', () => true) });

      expect(result.isOk).toBe(true);
      expect(registry.names()).toEqual(['slug', 'always']);
    });

    it('should stop registerAll() at the first failure', () => {
      registry.register('slug', slug);

      const result = registry.registerAll({ first: slug, slug, last: slug });

      expect(result.unwrapErr()).toBeInstanceOf(DuplicateNameError);
      expect(registry.has('first')).toBe(true);
      expect(registry.has('last')).toBe(false);
    });

    it('should log registrations at debug level', () => {
      const logger: ILogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };

      new GuardRegistry({ logger }).register('slug', slug);

      expect(logger.debug).toHaveBeenCalledWith('Registered guard "slug"');
    });
  });

  // ==========================================================================
  // FREEZE
  // ==========================================================================

  describe('freeze()', () => {
    it('should refuse registration once frozen', () => {
      registry.register('slug', slug);
      registry.freeze();

      const error = registry.register('other', slug).unwrapErr();

      expect(registry.isFrozen).toBe(true);
      expect(error).toBeInstanceOf(RegistryFrozenError);
      expect(registry.has('other')).toBe(false);
    });

    it('should keep resolving after freezing', () => {
      registry.register('slug', slug);

      expect(registry.freeze().resolve('slug').isSatisfiedBy('a-slug')).toBe(true);
    });
  });

  // ==========================================================================
  // RESOLUTION
  // ==========================================================================

  describe('resolve()', () => {
    it('should throw UnknownGuardError for an unregistered name', () => {
      expect(() => registry.resolve('bogus_rule')).toThrowErrorType(UnknownGuardError);
      expect(() => registry.resolve('bogus_rule')).toThrow('Guard "bogus_rule" is not registered');
    });

    it('should pass the arguments to the factory', () => {
      const factory = jest.fn(slug);
      registry.register('slug', factory);

      registry.resolve('slug', [1, 'a']);

      expect(factory).toHaveBeenCalledWith([1, 'a']);
    });
  });

  // ==========================================================================
  // DEFAULTS
  // ==========================================================================

  describe('defaults', () => {
    it('should hold the built-in guards in withDefaults()', () => {
      const defaults = GuardRegistry.withDefaults({ logger: silentLogger });

      expect(defaults.has('required')).toBe(true);
      expect(defaults.has('lt')).toBe(true);
      expect(defaults.isFrozen).toBe(false);
    });

    it('should let withDefaults() registries grow', () => {
      const defaults = GuardRegistry.withDefaults({ logger: silentLogger });

      expect(defaults.register('slug', slug).isOk).toBe(true);
    });

    it('should build the default registry once and freeze it', () => {
      const first = defaultGuardRegistry();

      expect(defaultGuardRegistry()).toBe(first);
      expect(first.isFrozen).toBe(true);
      expect(first.register('slug', slug).unwrapErr()).toBeInstanceOf(RegistryFrozenError);
    });
  });
});
