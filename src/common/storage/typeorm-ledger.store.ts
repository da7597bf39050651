import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, QueryFailedError } from 'typeorm';
import { AccountEntity } from '../../accounts/models/account.entity';
import { TransactionEntity } from '../../transactions/models/transaction.entity';
import { errorMessage, StorageError } from '../errors/banking.errors';
import { LedgerRepository, LedgerStore } from './ledger.store';

const POSTGRES_UNIQUE_VIOLATION = '23505';

export function toStorageError(operation: string, error: unknown): StorageError {
  if (error instanceof StorageError) return error;

  return new StorageError(`Failed to ${operation}: ${errorMessage(error)}`, {
    cause: error,
    uniqueViolation: isUniqueViolation(error),
  });
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;

  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === POSTGRES_UNIQUE_VIOLATION
  );
}

export class TypeOrmLedgerRepository implements LedgerRepository {
  constructor(private readonly manager: EntityManager) {}

  findAccountByRef(referenceId: string): Promise<AccountEntity | null> {
    return this.run('find account', () =>
      this.manager.findOne(AccountEntity, { where: { referenceId } }),
    );
  }

  lockAccounts(referenceIds: readonly string[]): Promise<AccountEntity[]> {
    // Same lock order for every transfer, whatever its direction
    const ordered = [...new Set(referenceIds)].sort();

    return this.run('lock accounts', () =>
      this.manager.find(AccountEntity, {
        where: { referenceId: In(ordered) },
        order: { referenceId: 'ASC' },
        lock: { mode: 'pessimistic_write' },
      }),
    );
  }

  saveAccount(account: AccountEntity): Promise<AccountEntity> {
    return this.run('save account', () =>
      this.manager.save(AccountEntity, account),
    );
  }

  findTransactionByRef(referenceId: string): Promise<TransactionEntity | null> {
    return this.run('find transaction', () =>
      this.manager.findOne(TransactionEntity, { where: { referenceId } }),
    );
  }

  findTransactionsByAccountRef(
    accountRef: string,
  ): Promise<TransactionEntity[]> {
    return this.run('list account transactions', () =>
      this.manager.find(TransactionEntity, {
        where: [
          { sourceAccountRef: accountRef },
          { destinationAccountRef: accountRef },
        ],
        order: { createdAt: 'ASC' },
      }),
    );
  }

  saveTransaction(transaction: TransactionEntity): Promise<TransactionEntity> {
    return this.run('save transaction', () =>
      this.manager.save(TransactionEntity, transaction),
    );
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw toStorageError(operation, error);
    }
  }
}

@Injectable()
export class TypeOrmLedgerStore extends LedgerStore {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {
    super();
  }

  async transaction<T>(
    work: (repository: LedgerRepository) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();

    try {
      await queryRunner.connect();
      await queryRunner.startTransaction('READ COMMITTED');
    } catch (error) {
      await queryRunner.release();
      throw toStorageError('open ledger transaction', error);
    }

    try {
      const result = await work(new TypeOrmLedgerRepository(queryRunner.manager));
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      throw error instanceof QueryFailedError
        ? toStorageError('commit ledger transaction', error)
        : error;
    } finally {
      await queryRunner.release();
    }
  }

  findAccountByRef(referenceId: string): Promise<AccountEntity | null> {
    return this.repository().findAccountByRef(referenceId);
  }

  lockAccounts(referenceIds: readonly string[]): Promise<AccountEntity[]> {
    return this.repository().lockAccounts(referenceIds);
  }

  saveAccount(account: AccountEntity): Promise<AccountEntity> {
    return this.repository().saveAccount(account);
  }

  findTransactionByRef(referenceId: string): Promise<TransactionEntity | null> {
    return this.repository().findTransactionByRef(referenceId);
  }

  findTransactionsByAccountRef(
    accountRef: string,
  ): Promise<TransactionEntity[]> {
    return this.repository().findTransactionsByAccountRef(accountRef);
  }

  saveTransaction(transaction: TransactionEntity): Promise<TransactionEntity> {
    return this.repository().saveTransaction(transaction);
  }

  private repository(): TypeOrmLedgerRepository {
    return new TypeOrmLedgerRepository(this.dataSource.manager);
  }
}
