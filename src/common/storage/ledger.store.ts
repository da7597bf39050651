import { AccountEntity } from '../../accounts/models/account.entity';
import { TransactionEntity } from '../../transactions/models/transaction.entity';

/**
 * Data access the ledger needs from persistence. Every method rejects with
 * a StorageError on connectivity or constraint problems.
 */
export interface LedgerRepository {
  findAccountByRef(referenceId: string): Promise<AccountEntity | null>;

  /**
   * Loads the named accounts and holds a write lock on each until the
   * surrounding transaction ends. Missing references are left out.
   */
  lockAccounts(referenceIds: readonly string[]): Promise<AccountEntity[]>;

  saveAccount(account: AccountEntity): Promise<AccountEntity>;

  findTransactionByRef(referenceId: string): Promise<TransactionEntity | null>;

  /** Records where the account is source or destination, oldest first. */
  findTransactionsByAccountRef(accountRef: string): Promise<TransactionEntity[]>;

  saveTransaction(transaction: TransactionEntity): Promise<TransactionEntity>;
}

/**
 * Injection token and contract for the ledger's storage collaborator.
 *
 * `transaction` runs `work` against a repository bound to a single database
 * transaction: its writes land together when `work` resolves and are rolled
 * back when it rejects. Code inside `work` must use the repository it is
 * given, never the store itself.
 */
export abstract class LedgerStore implements LedgerRepository {
  abstract transaction<T>(
    work: (repository: LedgerRepository) => Promise<T>,
  ): Promise<T>;

  abstract findAccountByRef(referenceId: string): Promise<AccountEntity | null>;

  abstract lockAccounts(
    referenceIds: readonly string[],
  ): Promise<AccountEntity[]>;

  abstract saveAccount(account: AccountEntity): Promise<AccountEntity>;

  abstract findTransactionByRef(
    referenceId: string,
  ): Promise<TransactionEntity | null>;

  abstract findTransactionsByAccountRef(
    accountRef: string,
  ): Promise<TransactionEntity[]>;

  abstract saveTransaction(
    transaction: TransactionEntity,
  ): Promise<TransactionEntity>;
}
