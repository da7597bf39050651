import { DataSource, In, QueryFailedError } from 'typeorm';
import { AccountEntity } from '../../accounts/models/account.entity';
import { TransactionEntity } from '../../transactions/models/transaction.entity';
import { StorageError } from '../errors/banking.errors';
import {
  toStorageError,
  TypeOrmLedgerRepository,
} from './typeorm-ledger.store';

function uniqueViolation(): QueryFailedError {
  const driverError = Object.assign(
    new Error('duplicate key value violates unique constraint'),
    { code: '23505' },
  );
  return new QueryFailedError('INSERT INTO "accounts"', [], driverError);
}

describe('toStorageError', () => {
  it('flags Postgres unique violations', () => {
    const error = toStorageError('save account', uniqueViolation());

    expect(error).toBeInstanceOf(StorageError);
    expect(error.uniqueViolation).toBe(true);
    expect(error.message).toBe(
      'Failed to save account: duplicate key value violates unique constraint',
    );
  });

  it('wraps other failures without the flag', () => {
    const cause = new Error('connection terminated');
    const error = toStorageError('find account', cause);

    expect(error.uniqueViolation).toBe(false);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Failed to find account: connection terminated');
  });

  it('passes storage errors through unchanged', () => {
    const original = new StorageError('already wrapped');

    expect(toStorageError('save account', original)).toBe(original);
  });
});

describe('TypeOrmLedgerRepository', () => {
  // Never initialized: the manager's query methods are stubbed per test
  const dataSource = new DataSource({
    type: 'postgres',
    entities: [AccountEntity, TransactionEntity],
  });
  const manager = dataSource.manager;
  const repository = new TypeOrmLedgerRepository(manager);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('locks accounts for update in ascending reference order', async () => {
    const find = jest.spyOn(manager, 'find').mockResolvedValue([]);

    await repository.lockAccounts(['ACC002', 'ACC001', 'ACC002']);

    expect(find).toHaveBeenCalledWith(AccountEntity, {
      where: { referenceId: In(['ACC001', 'ACC002']) },
      order: { referenceId: 'ASC' },
      lock: { mode: 'pessimistic_write' },
    });
  });

  it('lists transactions where the account is source or destination', async () => {
    const find = jest.spyOn(manager, 'find').mockResolvedValue([]);

    await repository.findTransactionsByAccountRef('ACC001');

    expect(find).toHaveBeenCalledWith(TransactionEntity, {
      where: [
        { sourceAccountRef: 'ACC001' },
        { destinationAccountRef: 'ACC001' },
      ],
      order: { createdAt: 'ASC' },
    });
  });

  it('turns driver failures into storage errors', async () => {
    jest.spyOn(manager, 'save').mockRejectedValue(uniqueViolation());

    const account = new AccountEntity();
    account.referenceId = 'ACC001';

    await expect(repository.saveAccount(account)).rejects.toMatchObject({
      code: 'STORAGE_ERROR',
      uniqueViolation: true,
    });
  });
});
