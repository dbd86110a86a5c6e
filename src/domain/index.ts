/**
 * @module @tessera/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';

// ============================================================================
// Logging
// ============================================================================

export * from './logging';

// ============================================================================
// Monads
// ============================================================================

export * from './monads';

// ============================================================================
// Guards
// ============================================================================

export * from './guards';

// ============================================================================
// Entities & Value Objects
// ============================================================================

export * from './entity';

// ============================================================================
// Domain Events
// ============================================================================

export * from './events';
