import { formatMoney, Money } from '../money/money';

export type BankingErrorCode =
  | 'ACCOUNT_NOT_FOUND'
  | 'ACCOUNT_ALREADY_EXISTS'
  | 'INVALID_BALANCE'
  | 'VALIDATION_ERROR'
  | 'INVALID_TRANSACTION'
  | 'INSUFFICIENT_BALANCE'
  | 'TRANSACTION_NOT_FOUND'
  | 'STORAGE_ERROR';

/**
 * Base class for every failure the ledger reports to its callers.
 * The transport layer maps `code` to a status; the core never does.
 */
export abstract class BankingError extends Error {
  abstract readonly code: BankingErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AccountNotFoundError extends BankingError {
  readonly code = 'ACCOUNT_NOT_FOUND';

  constructor(
    message: string,
    public readonly accountRef: string | null = null,
  ) {
    super(message);
  }

  static forReference(accountRef: string): AccountNotFoundError {
    return new AccountNotFoundError(
      `Account with ID ${accountRef} not found`,
      accountRef,
    );
  }

  static emptyReference(side: 'Source' | 'Destination'): AccountNotFoundError {
    return new AccountNotFoundError(
      `${side} account id cannot be null or empty`,
    );
  }
}

export class AccountAlreadyExistsError extends BankingError {
  readonly code = 'ACCOUNT_ALREADY_EXISTS';

  constructor(public readonly accountRef: string) {
    super(`Account with ID ${accountRef} already exists`);
  }
}

export class InvalidBalanceError extends BankingError {
  readonly code = 'INVALID_BALANCE';

  static nonPositive(balance: string): InvalidBalanceError {
    return new InvalidBalanceError(
      `Initial balance must be positive: ${balance}`,
    );
  }

  static tooLarge(balance: string): InvalidBalanceError {
    return new InvalidBalanceError(
      `Initial balance exceeds the largest storable amount: ${balance}`,
    );
  }

  static malformed(balance: string): InvalidBalanceError {
    return new InvalidBalanceError(
      `Initial balance must be a decimal amount with at most 2 fraction digits: ${balance}`,
    );
  }
}

// Request body rejected by the DTO constraints before reaching a handler
export class RequestValidationError extends BankingError {
  readonly code = 'VALIDATION_ERROR';
}

export class InvalidTransactionError extends BankingError {
  readonly code = 'INVALID_TRANSACTION';

  static nullAmount(): InvalidTransactionError {
    return new InvalidTransactionError('Transaction amount cannot be null');
  }

  static nonPositiveAmount(amount: string): InvalidTransactionError {
    return new InvalidTransactionError(
      `Transaction amount must be positive: ${amount}`,
    );
  }

  static malformedAmount(amount: string): InvalidTransactionError {
    return new InvalidTransactionError(
      `Transaction amount must be a decimal amount with at most 2 fraction digits: ${amount}`,
    );
  }

  static sameAccount(): InvalidTransactionError {
    return new InvalidTransactionError(
      'Source and destination accounts cannot be the same',
    );
  }
}

export class InsufficientBalanceError extends BankingError {
  readonly code = 'INSUFFICIENT_BALANCE';

  constructor(
    public readonly available: Money,
    public readonly required: Money,
  ) {
    super(
      `Insufficient balance in source account. Available: ${formatMoney(
        available,
      )}, Required: ${formatMoney(required)}`,
    );
  }
}

export class TransactionNotFoundError extends BankingError {
  readonly code = 'TRANSACTION_NOT_FOUND';

  constructor(public readonly transactionRef: string) {
    super(`Transaction with ID ${transactionRef} not found`);
  }
}

/**
 * Raised by a LedgerStore for connectivity or constraint problems.
 * `uniqueViolation` is set when a unique key rejected the write.
 */
export class StorageError extends BankingError {
  readonly code = 'STORAGE_ERROR';
  readonly uniqueViolation: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; uniqueViolation?: boolean } = {},
  ) {
    super(message, { cause: options.cause });
    this.uniqueViolation = options.uniqueViolation ?? false;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
