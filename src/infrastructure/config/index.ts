/**
 * @module @tessera/core/infrastructure/config
 */

export { loadConfig, getConfig, resetConfig, useEnvironmentDefaults, ConfigError } from './config';
export type { TesseraConfig } from './config';
