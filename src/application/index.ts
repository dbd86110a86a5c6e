/**
 * @module @tessera/core/application
 * @description Application layer exports
 */

// ============================================================================
// Use Cases
// ============================================================================

export * from './usecase';
