import {
  AccountNotFoundError,
  BankingError,
  InvalidTransactionError,
} from '../../common/errors/banking.errors';
import {
  describeAmount,
  formatMoney,
  isPositive,
  Money,
  parseMoney,
} from '../../common/money/money';

export interface TransferRequest {
  sourceAccountRef: string | null;
  destinationAccountRef: string | null;
  amount: unknown;
}

export interface ValidTransfer {
  sourceAccountRef: string;
  destinationAccountRef: string;
  amount: Money;
}

export type TransferValidation =
  | { valid: true; transfer: ValidTransfer }
  | { valid: false; error: BankingError };

function hasText(value: string | null): value is string {
  return value !== null && value.trim() !== '';
}

/**
 * Checks that need no storage access, in a fixed order: missing amount,
 * empty source, empty destination, unreadable amount, non-positive amount.
 * The first failing check wins.
 */
export function validateTransferRequest(
  request: TransferRequest,
): TransferValidation {
  const { sourceAccountRef, destinationAccountRef } = request;

  if (request.amount === null || request.amount === undefined) {
    return { valid: false, error: InvalidTransactionError.nullAmount() };
  }
  if (!hasText(sourceAccountRef)) {
    return {
      valid: false,
      error: AccountNotFoundError.emptyReference('Source'),
    };
  }
  if (!hasText(destinationAccountRef)) {
    return {
      valid: false,
      error: AccountNotFoundError.emptyReference('Destination'),
    };
  }

  const amount = parseMoney(request.amount);
  if (amount === null) {
    return {
      valid: false,
      error: InvalidTransactionError.malformedAmount(
        describeAmount(request.amount),
      ),
    };
  }
  if (!isPositive(amount)) {
    return {
      valid: false,
      error: InvalidTransactionError.nonPositiveAmount(formatMoney(amount)),
    };
  }

  return {
    valid: true,
    transfer: { sourceAccountRef, destinationAccountRef, amount },
  };
}
