/**
 * @fileoverview @tessera/core - Functional domain building blocks
 * @description
 * Tessera Core gives domain models a small, typed toolkit:
 *
 * - `Maybe`, `Result` and `Either` for absent values and expected failures
 * - a guard registry and rule-string evaluator for declarative validation
 * - event-recording aggregates and a synchronous event dispatcher
 *
 * ## Architecture Layers
 *
 * ```
 * ┌─────────────────────────────────────────────┐
 * │ application   IUseCase, UseCaseBase          │
 * ├─────────────────────────────────────────────┤
 * │ domain        monads, guards, entities,      │
 * │               events, exceptions, logging    │
 * ├─────────────────────────────────────────────┤
 * │ infrastructure  configuration                │
 * └─────────────────────────────────────────────┘
 * ```
 *
 * @example
 * ```typescript
 * import { evaluate } from '@tessera/core';
 *
 * const result = evaluate(
 *   { name: 'Ada', age: 36 },
 *   { name: 'required', age: 'required|ge[18]' },
 * );
 *
 * result.match({
 *   ok: () => console.log('valid'),
 *   err: (report) => console.log(report.messages),
 * });
 * ```
 *
 * @packageDocumentation
 * @module @tessera/core
 * @version 1.0.0
 */

import { useEnvironmentDefaults } from './infrastructure';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ============================================================================
// COMPOSITION
// ============================================================================

// Components built without options follow TESSERA_* variables.
useEnvironmentDefaults();

export const VERSION = '1.0.0';
