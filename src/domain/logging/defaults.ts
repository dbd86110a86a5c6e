/**
 * @fileoverview Component defaults - Settings used when no option is given
 *
 * @module @tessera/core/domain/logging
 *
 * Registries, evaluators, dispatchers and use cases read their fallback
 * logger level and overwrite policy from here. The domain holds the values;
 * the composition root decides where they come from:
 *
 * ```typescript
 * configureDefaults(() => ({ logLevel: 'debug', allowGuardOverwrite: false }));
 * ```
 *
 * The package entry point installs the environment-backed source from
 * `infrastructure/config`. Importing a domain module on its own leaves the
 * built-in fallback in place.
 */

import { createConsoleLogger, ILogger, LogLevel } from './ILogger';

export interface ComponentDefaults {
  logLevel: LogLevel;
  /** Default overwrite policy of new guard registries */
  allowGuardOverwrite: boolean;
}

export type DefaultsProvider = () => ComponentDefaults;

export const FALLBACK_DEFAULTS: Readonly<ComponentDefaults> = Object.freeze({
  logLevel: 'warn',
  allowGuardOverwrite: false,
});

let provider: DefaultsProvider = () => FALLBACK_DEFAULTS;

/**
 * Install the source of component defaults. Read on every component
 * construction, so a provider may cache or re-read as it likes.
 */
export function configureDefaults(source: DefaultsProvider): void {
  provider = source;
}

/**
 * Restore the built-in fallback.
 */
export function resetDefaults(): void {
  provider = () => FALLBACK_DEFAULTS;
}

export function componentDefaults(): ComponentDefaults {
  return provider();
}

/**
 * Logger a component falls back to when none is injected.
 */
export function defaultLogger(scope: string): ILogger {
  return createConsoleLogger({ level: componentDefaults().logLevel, scope });
}
