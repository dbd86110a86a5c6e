/**
 * @fileoverview Use Case - Application service contract
 *
 * @packageDocumentation
 * @module @tessera/core/application/usecase
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A use case coordinates domain objects for one user intention. Expected
 * failures come back in the `Err` arm of the `Result`; anything thrown by
 * the implementation is caught and returned as a {@link UseCaseError}.
 *
 * @example
 * ```typescript
 * class RegisterUser extends UseCaseBase<RegisterUserRequest, User, FailureReport> {
 *   constructor(private readonly users: UserRepository) {
 *     super();
 *   }
 *
 *   protected async doExecute(request: RegisterUserRequest): Promise<Result<User, FailureReport>> {
 *     const user = User.create(request);
 *     if (user.isOk) {
 *       await this.users.save(user.unwrap());
 *     }
 *     return user;
 *   }
 * }
 *
 * const result = await new RegisterUser(users).execute({ email: 'joe@example.com' });
 * ```
 */

import { DomainError } from '../../domain/exceptions';
import { err, Result } from '../../domain/monads';
import { defaultLogger } from '../../domain/logging';
import type { ILogger } from '../../domain/logging';

/**
 * IUseCase - One application operation.
 *
 * @template TRequest - Input of the operation
 * @template TResponse - Output of the operation
 */
export interface IUseCase<TRequest, TResponse> {
  execute(request: TRequest): Promise<TResponse>;
}

export interface UseCaseErrorOptions {
  cause?: unknown;
  logger?: ILogger;
}

/**
 * Unexpected failure inside a use case. Logged at error level when created.
 */
export class UseCaseError extends DomainError {
  constructor(message: string, options: UseCaseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'UseCaseError';
    const logger = options.logger ?? defaultLogger('usecase');
    logger.error(message, options.cause);
  }
}

export interface UseCaseOptions {
  logger?: ILogger;
}

/**
 * Base class adding logging and error capture around {@link doExecute}.
 */
export abstract class UseCaseBase<TRequest, TValue, TError = never>
  implements IUseCase<TRequest, Result<TValue, TError | UseCaseError>>
{
  protected readonly logger: ILogger;

  protected constructor(options: UseCaseOptions = {}) {
    this.logger = options.logger ?? defaultLogger('usecase');
  }

  async execute(request: TRequest): Promise<Result<TValue, TError | UseCaseError>> {
    const useCase = this.constructor.name || 'UseCase';
    this.logger.debug(`Executing ${useCase}`);

    try {
      const result: Result<TValue, TError | UseCaseError> = await this.doExecute(request);
      this.logger.debug(`${useCase} ${result.isOk ? 'succeeded' : 'returned an error'}`);
      return result;
    } catch (error) {
      return err(new UseCaseError(`${useCase} failed`, { cause: error, logger: this.logger }));
    }
  }

  protected abstract doExecute(request: TRequest): Promise<Result<TValue, TError>>;
}
