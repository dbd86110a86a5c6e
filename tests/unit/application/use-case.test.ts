/**
 * @fileoverview Unit tests for UseCaseBase and UseCaseError
 */

import { DomainError, err, ILogger, ok, Result, UseCaseBase, UseCaseError } from '../../../src';

function mockLogger(): ILogger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

interface Transfer {
  amount: number;
}

class TransferFunds extends UseCaseBase<Transfer, number, string> {
  constructor(
    logger: ILogger,
    private readonly ledger: (amount: number) => number,
  ) {
    super({ logger });
  }

  protected async doExecute(request: Transfer): Promise<Result<number, string>> {
    if (request.amount <= 0) {
      return err('amount must be positive');
    }
    return ok(this.ledger(request.amount));
  }
}

describe('UseCaseBase', () => {
  it('should return the Ok value of doExecute()', async () => {
    const useCase = new TransferFunds(mockLogger(), (amount) => 100 - amount);

    const result = await useCase.execute({ amount: 30 });

    expect(result.unwrap()).toBe(70);
  });

  it('should pass expected failures through untouched', async () => {
    const useCase = new TransferFunds(mockLogger(), (amount) => amount);

    const result = await useCase.execute({ amount: 0 });

    expect(result.unwrapErr()).toBe('amount must be positive');
  });

  it('should capture thrown errors as UseCaseError', async () => {
    const logger = mockLogger();
    const failure = new Error('ledger offline');
    const useCase = new TransferFunds(logger, () => {
      throw failure;
    });

    const error = (await useCase.execute({ amount: 10 })).unwrapErr();

    expect(error).toBeInstanceOf(UseCaseError);
    expect(error instanceof UseCaseError ? error.cause : undefined).toBe(failure);
    expect(logger.error).toHaveBeenCalledWith('TransferFunds failed', failure);
  });

  it('should log execution at debug level', async () => {
    const logger = mockLogger();

    await new TransferFunds(logger, (amount) => amount).execute({ amount: 1 });

    expect(logger.debug).toHaveBeenCalledWith('Executing TransferFunds');
    expect(logger.debug).toHaveBeenCalledWith('TransferFunds succeeded');
  });
});

describe('UseCaseError', () => {
  it('should be a DomainError carrying its cause', () => {
    const cause = new Error('root cause');
    const error = new UseCaseError('Import failed', { cause, logger: mockLogger() });

    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('UseCaseError');
    expect(error.message).toBe('Import failed');
    expect(error.cause).toBe(cause);
  });

  it('should log itself at error level', () => {
    const logger = mockLogger();

    new UseCaseError('Import failed', { logger });

    expect(logger.error).toHaveBeenCalledWith('Import failed', undefined);
  });
});
