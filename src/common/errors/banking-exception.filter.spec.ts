import { HttpStatus } from '@nestjs/common';
import {
  httpStatusFor,
  toErrorResponseBody,
  toRequestValidationError,
} from './banking-exception.filter';
import {
  AccountAlreadyExistsError,
  AccountNotFoundError,
  InsufficientBalanceError,
  InvalidBalanceError,
  InvalidTransactionError,
  StorageError,
  TransactionNotFoundError,
} from './banking.errors';

describe('banking exception mapping', () => {
  it('maps each error kind to its status', () => {
    expect(httpStatusFor(AccountNotFoundError.forReference('A'))).toBe(
      HttpStatus.NOT_FOUND,
    );
    expect(httpStatusFor(new TransactionNotFoundError('T'))).toBe(
      HttpStatus.NOT_FOUND,
    );
    expect(httpStatusFor(new AccountAlreadyExistsError('A'))).toBe(
      HttpStatus.CONFLICT,
    );
    expect(httpStatusFor(InvalidBalanceError.nonPositive('0.00'))).toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(httpStatusFor(InvalidTransactionError.sameAccount())).toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(httpStatusFor(new InsufficientBalanceError(1n, 2n))).toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(httpStatusFor(new StorageError('down'))).toBe(
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  });

  it('builds the error body', () => {
    expect(
      toErrorResponseBody(new AccountAlreadyExistsError('ACC001')),
    ).toEqual({
      error: 'CONFLICT',
      message: 'Account with ID ACC001 already exists',
      errorCode: 'ACCOUNT_ALREADY_EXISTS',
    });
    expect(toErrorResponseBody(new StorageError('down'))).toEqual({
      error: 'INTERNAL_SERVER_ERROR',
      message: 'down',
      errorCode: 'STORAGE_ERROR',
    });
  });

  it('turns DTO constraint failures into a validation error', () => {
    const error = toRequestValidationError([
      {
        property: 'account_id',
        constraints: {
          isString: 'account_id must be a string',
          isNotEmpty: 'Account ID cannot be null or empty',
        },
      },
      { property: 'initial_balance', constraints: {} },
    ]);

    expect(toErrorResponseBody(error)).toEqual({
      error: 'BAD_REQUEST',
      message:
        'account_id: account_id must be a string, account_id: Account ID cannot be null or empty',
      errorCode: 'VALIDATION_ERROR',
    });
  });
});
