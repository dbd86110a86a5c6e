/**
 * @module @tessera/core/application/usecase
 */

export { UseCaseError, UseCaseBase } from './IUseCase';
export type { IUseCase, UseCaseErrorOptions, UseCaseOptions } from './IUseCase';
