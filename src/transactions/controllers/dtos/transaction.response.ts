import { formatMoney } from '../../../common/money/money';
import {
  TransactionEntity,
  TransactionStatus,
} from '../../models/transaction.entity';

export interface TransactionResponse {
  transaction_id: string;
  source_account_id: string | null;
  destination_account_id: string | null;
  amount: string | null;
  status: TransactionStatus;
  error_message: string | null;
}

export interface AccountTransactionsResponse {
  transactions: TransactionResponse[];
  count: number;
}

export function toTransactionResponse(
  transaction: TransactionEntity,
): TransactionResponse {
  return {
    transaction_id: transaction.referenceId,
    source_account_id: transaction.sourceAccountRef,
    destination_account_id: transaction.destinationAccountRef,
    amount: transaction.amount === null ? null : formatMoney(transaction.amount),
    status: transaction.status,
    error_message: transaction.errorMessage,
  };
}
