import { CqrsModule, EventBus } from '@nestjs/cqrs';
import { Test } from '@nestjs/testing';
import {
  AccountAlreadyExistsError,
  InvalidBalanceError,
  StorageError,
} from '../../../common/errors/banking.errors';
import { MonitoringModule } from '../../../common/monitoring/monitoring.module';
import { LedgerStore } from '../../../common/storage/ledger.store';
import { MemoryLedgerStore } from '../../../common/storage/memory-ledger.store';
import { AccountCreatedEvent } from '../../events/impl/account-created.event';
import { CreateAccountCommand } from '../impl/create-account.command';
import {
  CreateAccountHandler,
  parseInitialBalance,
} from './create-account.handler';

describe('CreateAccountHandler', () => {
  let handler: CreateAccountHandler;
  let store: MemoryLedgerStore;
  let publish: jest.SpyInstance;

  beforeEach(async () => {
    store = new MemoryLedgerStore();
    const moduleRef = await Test.createTestingModule({
      imports: [CqrsModule, MonitoringModule],
      providers: [
        CreateAccountHandler,
        { provide: LedgerStore, useValue: store },
      ],
    }).compile();

    handler = moduleRef.get(CreateAccountHandler);
    publish = jest.spyOn(moduleRef.get(EventBus), 'publish');
  });

  it('opens an account with the requested balance', async () => {
    const account = await handler.execute(
      new CreateAccountCommand('ACC001', 1000),
    );

    expect(account.referenceId).toBe('ACC001');
    expect(account.balance).toBe(100000n);
    expect((await store.findAccountByRef('ACC001'))?.balance).toBe(100000n);
    expect(publish).toHaveBeenCalledWith(
      new AccountCreatedEvent(account.id, 'ACC001', 100000n),
    );
  });

  it('rejects a reference that is already taken', async () => {
    await handler.execute(new CreateAccountCommand('ACC001', '10.00'));

    await expect(
      handler.execute(new CreateAccountCommand('ACC001', '20.00')),
    ).rejects.toThrow(new AccountAlreadyExistsError('ACC001'));
    expect((await store.findAccountByRef('ACC001'))?.balance).toBe(1000n);
  });

  it('reports a lost insert race as an existing account', async () => {
    jest
      .spyOn(store, 'saveAccount')
      .mockRejectedValueOnce(
        new StorageError('duplicate reference_id', { uniqueViolation: true }),
      );

    await expect(
      handler.execute(new CreateAccountCommand('ACC001', 5)),
    ).rejects.toBeInstanceOf(AccountAlreadyExistsError);
  });

  it('passes other storage failures through', async () => {
    const failure = new StorageError('connection refused');
    jest.spyOn(store, 'saveAccount').mockRejectedValueOnce(failure);

    await expect(
      handler.execute(new CreateAccountCommand('ACC001', 5)),
    ).rejects.toBe(failure);
  });

  it('rejects zero and negative balances without storing anything', async () => {
    await expect(
      handler.execute(new CreateAccountCommand('ACC001', 0)),
    ).rejects.toThrow('Initial balance must be positive: 0.00');
    await expect(
      handler.execute(new CreateAccountCommand('ACC002', '-1')),
    ).rejects.toThrow('Initial balance must be positive: -1.00');

    expect(await store.findAccountByRef('ACC001')).toBeNull();
    expect(publish).not.toHaveBeenCalled();
  });

  it('rejects a balance too large for the ledger as an invalid balance', async () => {
    await expect(
      handler.execute(
        new CreateAccountCommand('ACC001', '100000000000000000.00'),
      ),
    ).rejects.toThrow(
      new InvalidBalanceError(
        'Initial balance exceeds the largest storable amount: 100000000000000000.00',
      ),
    );
    expect(await store.findAccountByRef('ACC001')).toBeNull();
  });
});

describe('parseInitialBalance', () => {
  it('accepts positive decimal amounts', () => {
    expect(parseInitialBalance('0.01')).toBe(1n);
    expect(parseInitialBalance(2500.5)).toBe(250050n);
  });

  it('accepts the largest balance the column holds', () => {
    expect(parseInitialBalance('99999999999999999.99')).toBe(10n ** 19n - 1n);
    expect(() => parseInitialBalance('100000000000000000.00')).toThrow(
      InvalidBalanceError,
    );
  });

  it('rejects unreadable amounts', () => {
    expect(() => parseInitialBalance('ten')).toThrow(InvalidBalanceError);
    expect(() => parseInitialBalance(null)).toThrow(InvalidBalanceError);
  });
});
