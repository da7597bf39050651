import { CommandHandler, EventBus, ICommandHandler } from '@nestjs/cqrs';
import { v4 as uuidv4 } from 'uuid';
import {
  AccountAlreadyExistsError,
  InvalidBalanceError,
  StorageError,
} from '../../../common/errors/banking.errors';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import {
  describeAmount,
  formatMoney,
  isPositive,
  isStorable,
  Money,
  parseMoney,
} from '../../../common/money/money';
import { LedgerStore } from '../../../common/storage/ledger.store';
import { AccountCreatedEvent } from '../../events/impl/account-created.event';
import { AccountEntity } from '../../models/account.entity';
import { CreateAccountCommand } from '../impl/create-account.command';

/**
 * Opening balances must be strictly positive and fit the balance column.
 * The DTO only checks that a value is present, so this is the one place
 * the bounds live.
 */
export function parseInitialBalance(value: unknown): Money {
  const balance = parseMoney(value);
  if (balance === null) {
    throw InvalidBalanceError.malformed(describeAmount(value));
  }
  if (!isPositive(balance)) {
    throw InvalidBalanceError.nonPositive(formatMoney(balance));
  }
  if (!isStorable(balance)) {
    throw InvalidBalanceError.tooLarge(formatMoney(balance));
  }
  return balance;
}

@CommandHandler(CreateAccountCommand)
export class CreateAccountHandler
  implements ICommandHandler<CreateAccountCommand, AccountEntity>
{
  constructor(
    private readonly ledgerStore: LedgerStore,
    private readonly eventBus: EventBus,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  async execute(command: CreateAccountCommand): Promise<AccountEntity> {
    const commandName = 'CreateAccountCommand';
    const startTime = Date.now();
    const { referenceId } = command;

    this.loggingService.logHandlerStart(commandName, {
      referenceId,
      initialBalance: describeAmount(command.initialBalance),
    });

    try {
      const existingAccount =
        await this.ledgerStore.findAccountByRef(referenceId);

      if (existingAccount) {
        this.loggingService.warn(
          `[${commandName}] Account with ID ${referenceId} already exists`,
          { existingAccountId: existingAccount.id },
        );
        throw new AccountAlreadyExistsError(referenceId);
      }

      const initialBalance = parseInitialBalance(command.initialBalance);

      const account = new AccountEntity();
      account.id = uuidv4();
      account.referenceId = referenceId;
      account.balance = initialBalance;

      let savedAccount: AccountEntity;
      try {
        savedAccount = await this.ledgerStore.saveAccount(account);
      } catch (saveError) {
        // A concurrent request may win the race between the lookup and the insert
        if (saveError instanceof StorageError && saveError.uniqueViolation) {
          this.loggingService.warn(
            `[${commandName}] Constraint violation: account ${referenceId} already exists`,
          );
          throw new AccountAlreadyExistsError(referenceId);
        }
        throw saveError;
      }

      this.eventBus.publish(
        new AccountCreatedEvent(
          savedAccount.id,
          savedAccount.referenceId,
          savedAccount.balance,
        ),
      );

      const executionTime = (Date.now() - startTime) / 1000;

      this.prometheusService
        .getCounter('commands_total')
        .inc({ command: commandName, status: 'success' }, 1);

      this.prometheusService
        .getHistogram('command_duration_seconds')
        .observe({ command: commandName }, executionTime);

      this.loggingService.logCommandSuccess(
        commandName,
        { referenceId },
        executionTime,
        { id: savedAccount.id, balance: formatMoney(savedAccount.balance) },
      );

      return savedAccount;
    } catch (error) {
      this.prometheusService
        .getCounter('commands_total')
        .inc({ command: commandName, status: 'error' }, 1);

      this.loggingService.logCommandError(commandName, error, { referenceId });

      throw error;
    }
  }
}
