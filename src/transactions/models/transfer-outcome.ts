import { BankingError } from '../../common/errors/banking.errors';
import { TransactionEntity } from './transaction.entity';

export type TransferOutcome =
  | { kind: 'completed'; transaction: TransactionEntity }
  | { kind: 'failed'; transaction: TransactionEntity; error: BankingError };
