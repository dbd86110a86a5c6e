/**
 * @fileoverview Library configuration read from the environment
 *
 * @module @tessera/core/infrastructure/config
 *
 * | Variable | Values | Default |
 * | --- | --- | --- |
 * | `TESSERA_LOG_LEVEL` | debug, info, warn, error, silent | warn |
 * | `TESSERA_GUARD_OVERWRITE` | true, false | false |
 *
 * Explicit component options always win over these values. The package
 * entry point calls {@link useEnvironmentDefaults}, so components built
 * without options follow the environment.
 */

import { z } from 'zod';
import { DomainError } from '../../domain/exceptions';
import { configureDefaults } from '../../domain/logging';
import type { ComponentDefaults } from '../../domain/logging';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvironmentSchema = z.object({
  TESSERA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  TESSERA_GUARD_OVERWRITE: booleanFlag.default('false'),
});

export type TesseraConfig = ComponentDefaults;

export class ConfigError extends DomainError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an environment map.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TesseraConfig {
  const parsed = EnvironmentSchema.safeParse({
    TESSERA_LOG_LEVEL: env.TESSERA_LOG_LEVEL || undefined,
    TESSERA_GUARD_OVERWRITE: env.TESSERA_GUARD_OVERWRITE || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return {
    logLevel: parsed.data.TESSERA_LOG_LEVEL,
    allowGuardOverwrite: parsed.data.TESSERA_GUARD_OVERWRITE,
  };
}

let cached: TesseraConfig | undefined;

/**
 * Process configuration, read once on first use.
 */
export function getConfig(): TesseraConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/**
 * Forget the cached configuration so the next {@link getConfig} re-reads the
 * environment.
 */
export function resetConfig(): void {
  cached = undefined;
}

/**
 * Make {@link getConfig} the source of component defaults.
 */
export function useEnvironmentDefaults(): void {
  configureDefaults(getConfig);
}
