import { Injectable } from '@nestjs/common';
import { AccountEntity } from '../../accounts/models/account.entity';
import { TransactionEntity } from '../../transactions/models/transaction.entity';
import { StorageError } from '../errors/banking.errors';
import { isStorable } from '../money/money';
import { LedgerRepository, LedgerStore } from './ledger.store';

function copyAccount(account: AccountEntity): AccountEntity {
  return Object.assign(new AccountEntity(), account);
}

function copyTransaction(transaction: TransactionEntity): TransactionEntity {
  return Object.assign(new TransactionEntity(), transaction);
}

/**
 * One unit of work over the in-memory tables. Writes are staged and only
 * reach the shared maps through `commit()`.
 */
export class MemoryLedgerRepository implements LedgerRepository {
  private readonly stagedAccounts = new Map<string, AccountEntity>();
  private readonly stagedTransactions = new Map<string, TransactionEntity>();

  constructor(
    private readonly accounts: Map<string, AccountEntity>,
    private readonly transactions: Map<string, TransactionEntity>,
  ) {}

  async findAccountByRef(referenceId: string): Promise<AccountEntity | null> {
    const account =
      this.stagedAccounts.get(referenceId) ?? this.accounts.get(referenceId);
    return account ? copyAccount(account) : null;
  }

  async lockAccounts(
    referenceIds: readonly string[],
  ): Promise<AccountEntity[]> {
    // The store runs one unit of work at a time, so a read is already exclusive
    const ordered = [...new Set(referenceIds)].sort();
    const found: AccountEntity[] = [];

    for (const referenceId of ordered) {
      const account = await this.findAccountByRef(referenceId);
      if (account) found.push(account);
    }

    return found;
  }

  async saveAccount(account: AccountEntity): Promise<AccountEntity> {
    const existing =
      this.stagedAccounts.get(account.referenceId) ??
      this.accounts.get(account.referenceId);

    if (existing && existing.id !== account.id) {
      throw new StorageError(
        `Failed to save account: duplicate reference_id ${account.referenceId}`,
        { uniqueViolation: true },
      );
    }
    if (account.balance < 0n) {
      throw new StorageError(
        `Failed to save account: balance of ${account.referenceId} violates CHK_accounts_balance_non_negative`,
      );
    }
    // Same bound as the decimal(19,2) column
    if (!isStorable(account.balance)) {
      throw new StorageError(
        `Failed to save account: balance of ${account.referenceId} overflows decimal(19,2)`,
      );
    }

    const now = new Date();
    const stored = copyAccount(account);
    stored.createdAt = existing?.createdAt ?? now;
    stored.updatedAt = now;
    this.stagedAccounts.set(stored.referenceId, stored);

    return copyAccount(stored);
  }

  async findTransactionByRef(
    referenceId: string,
  ): Promise<TransactionEntity | null> {
    const transaction =
      this.stagedTransactions.get(referenceId) ??
      this.transactions.get(referenceId);
    return transaction ? copyTransaction(transaction) : null;
  }

  async findTransactionsByAccountRef(
    accountRef: string,
  ): Promise<TransactionEntity[]> {
    const merged = new Map([...this.transactions, ...this.stagedTransactions]);

    return [...merged.values()]
      .filter(
        transaction =>
          transaction.sourceAccountRef === accountRef ||
          transaction.destinationAccountRef === accountRef,
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copyTransaction);
  }

  async saveTransaction(
    transaction: TransactionEntity,
  ): Promise<TransactionEntity> {
    const existing =
      this.stagedTransactions.get(transaction.referenceId) ??
      this.transactions.get(transaction.referenceId);

    if (existing && existing.id !== transaction.id) {
      throw new StorageError(
        `Failed to save transaction: duplicate reference_id ${transaction.referenceId}`,
        { uniqueViolation: true },
      );
    }

    const now = new Date();
    const stored = copyTransaction(transaction);
    stored.createdAt = existing?.createdAt ?? now;
    stored.updatedAt = now;
    this.stagedTransactions.set(stored.referenceId, stored);

    return copyTransaction(stored);
  }

  commit(): void {
    for (const [referenceId, account] of this.stagedAccounts) {
      this.accounts.set(referenceId, account);
    }
    for (const [referenceId, transaction] of this.stagedTransactions) {
      this.transactions.set(referenceId, transaction);
    }
  }
}

/**
 * Process-local LedgerStore. Units of work run strictly one after another,
 * which gives the same guarantee as row locks on a single node.
 */
@Injectable()
export class MemoryLedgerStore extends LedgerStore {
  private readonly accounts = new Map<string, AccountEntity>();
  private readonly transactions = new Map<string, TransactionEntity>();
  private queue: Promise<void> = Promise.resolve();

  transaction<T>(work: (repository: LedgerRepository) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const repository = new MemoryLedgerRepository(
        this.accounts,
        this.transactions,
      );
      const result = await work(repository);
      repository.commit();
      return result;
    });

    // The caller gets the rejection; the queue only waits for the turn to end
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  findAccountByRef(referenceId: string): Promise<AccountEntity | null> {
    return this.transaction(repository =>
      repository.findAccountByRef(referenceId),
    );
  }

  lockAccounts(referenceIds: readonly string[]): Promise<AccountEntity[]> {
    return this.transaction(repository => repository.lockAccounts(referenceIds));
  }

  saveAccount(account: AccountEntity): Promise<AccountEntity> {
    return this.transaction(repository => repository.saveAccount(account));
  }

  findTransactionByRef(referenceId: string): Promise<TransactionEntity | null> {
    return this.transaction(repository =>
      repository.findTransactionByRef(referenceId),
    );
  }

  findTransactionsByAccountRef(
    accountRef: string,
  ): Promise<TransactionEntity[]> {
    return this.transaction(repository =>
      repository.findTransactionsByAccountRef(accountRef),
    );
  }

  saveTransaction(transaction: TransactionEntity): Promise<TransactionEntity> {
    return this.transaction(repository =>
      repository.saveTransaction(transaction),
    );
  }
}
