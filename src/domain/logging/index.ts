/**
 * @module @tessera/core/domain/logging
 * @description Logger port, console loggers and component defaults
 */

export { consoleLogger, silentLogger, createConsoleLogger } from './ILogger';
export type { ILogger, LogLevel, ConsoleLoggerOptions } from './ILogger';
export {
  FALLBACK_DEFAULTS,
  configureDefaults,
  resetDefaults,
  componentDefaults,
  defaultLogger,
} from './defaults';
export type { ComponentDefaults, DefaultsProvider } from './defaults';
