/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Adapters the domain and application layers never import:
 *
 * - **Configuration**: environment parsing that feeds component defaults
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure
 */

export * from './config';
