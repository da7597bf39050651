import { CommandHandler, EventBus, ICommandHandler } from '@nestjs/cqrs';
import { v4 as uuidv4 } from 'uuid';
import {
  AccountNotFoundError,
  BankingError,
  errorMessage,
  InsufficientBalanceError,
  InvalidTransactionError,
  StorageError,
} from '../../../common/errors/banking.errors';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import {
  describeAmount,
  formatMoney,
  isStorable,
  Money,
  parseMoney,
} from '../../../common/money/money';
import {
  LedgerRepository,
  LedgerStore,
} from '../../../common/storage/ledger.store';
import { TransactionCompletedEvent } from '../../events/impl/transaction-completed.event';
import { TransactionFailedEvent } from '../../events/impl/transaction-failed.event';
import {
  TransactionEntity,
  TransactionStatus,
} from '../../models/transaction.entity';
import { TransferOutcome } from '../../models/transfer-outcome';
import {
  validateTransferRequest,
  ValidTransfer,
} from '../../services/transfer-request.validator';
import { ProcessTransactionCommand } from '../impl/process-transaction.command';

const ERROR_MESSAGE_LENGTH = 500;

// What the unit of work decided; a rejection leaves nothing behind.
type TransferDecision =
  | { kind: 'committed'; transaction: TransactionEntity }
  | { kind: 'rejected'; error: BankingError };

function newTransactionRecord(
  referenceId: string,
  sourceAccountRef: string | null,
  destinationAccountRef: string | null,
  amount: Money | null,
  status: TransactionStatus,
  failureMessage: string | null = null,
): TransactionEntity {
  const transaction = new TransactionEntity();
  transaction.id = uuidv4();
  transaction.referenceId = referenceId;
  transaction.sourceAccountRef = sourceAccountRef;
  transaction.destinationAccountRef = destinationAccountRef;
  transaction.amount = amount;
  transaction.status = status;
  transaction.errorMessage =
    failureMessage === null
      ? null
      : failureMessage.slice(0, ERROR_MESSAGE_LENGTH);
  transaction.processedAt =
    status === TransactionStatus.PROCESSING ? null : new Date();
  return transaction;
}

/**
 * Moves money between two accounts and leaves an audit record of the
 * attempt, whatever its outcome.
 *
 * Debit, credit and the COMPLETED record commit together inside one
 * storage transaction holding write locks on both accounts. Any rejection
 * rolls that transaction back and is recorded as a FAILED transaction in a
 * separate write. Business failures come back as a `failed` outcome and
 * are never thrown.
 */
@CommandHandler(ProcessTransactionCommand)
export class ProcessTransactionHandler
  implements ICommandHandler<ProcessTransactionCommand, TransferOutcome>
{
  constructor(
    private readonly ledgerStore: LedgerStore,
    private readonly eventBus: EventBus,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  async execute(command: ProcessTransactionCommand): Promise<TransferOutcome> {
    const commandName = 'ProcessTransactionCommand';
    const startTime = Date.now();
    const referenceId = uuidv4();

    this.loggingService.logHandlerStart(commandName, {
      referenceId,
      sourceAccountRef: command.sourceAccountRef,
      destinationAccountRef: command.destinationAccountRef,
      amount: describeAmount(command.amount),
    });

    const validation = validateTransferRequest(command);
    if (!validation.valid) {
      this.loggingService.warn(
        `[${commandName}] Transfer ${referenceId} rejected: ${validation.error.message}`,
      );
      return this.recordFailure(
        command,
        referenceId,
        validation.error,
        startTime,
      );
    }

    let decision: TransferDecision;
    try {
      decision = await this.ledgerStore.transaction(repository =>
        this.applyTransfer(repository, referenceId, validation.transfer),
      );
    } catch (error) {
      this.loggingService.logCommandError(commandName, error, { referenceId });
      const failure = new StorageError(
        `Transaction processing error: ${errorMessage(error)}`,
        { cause: error },
      );
      return this.recordFailure(command, referenceId, failure, startTime);
    }

    if (decision.kind === 'rejected') {
      this.loggingService.warn(
        `[${commandName}] Transfer ${referenceId} rejected: ${decision.error.message}`,
      );
      return this.recordFailure(
        command,
        referenceId,
        decision.error,
        startTime,
      );
    }

    const { transfer } = validation;
    this.eventBus.publish(
      new TransactionCompletedEvent(
        referenceId,
        transfer.sourceAccountRef,
        transfer.destinationAccountRef,
        transfer.amount,
      ),
    );

    const executionTime = (Date.now() - startTime) / 1000;
    this.prometheusService
      .getCounter('commands_total')
      .inc({ command: commandName, status: 'completed' }, 1);
    this.prometheusService
      .getHistogram('command_duration_seconds')
      .observe({ command: commandName }, executionTime);

    this.loggingService.logCommandSuccess(
      commandName,
      { referenceId },
      executionTime,
      {
        sourceAccountRef: transfer.sourceAccountRef,
        destinationAccountRef: transfer.destinationAccountRef,
        amount: formatMoney(transfer.amount),
      },
    );

    return { kind: 'completed', transaction: decision.transaction };
  }

  private async applyTransfer(
    repository: LedgerRepository,
    referenceId: string,
    transfer: ValidTransfer,
  ): Promise<TransferDecision> {
    const { sourceAccountRef, destinationAccountRef, amount } = transfer;

    // Locks are taken in a fixed order so opposing transfers cannot deadlock
    const accounts = await repository.lockAccounts([
      sourceAccountRef,
      destinationAccountRef,
    ]);

    const source = accounts.find(a => a.referenceId === sourceAccountRef);
    if (!source) {
      return {
        kind: 'rejected',
        error: AccountNotFoundError.forReference(sourceAccountRef),
      };
    }

    const destination = accounts.find(
      a => a.referenceId === destinationAccountRef,
    );
    if (!destination) {
      return {
        kind: 'rejected',
        error: AccountNotFoundError.forReference(destinationAccountRef),
      };
    }

    if (source.id === destination.id) {
      return { kind: 'rejected', error: InvalidTransactionError.sameAccount() };
    }

    if (source.balance < amount) {
      return {
        kind: 'rejected',
        error: new InsufficientBalanceError(source.balance, amount),
      };
    }

    const transaction = await repository.saveTransaction(
      newTransactionRecord(
        referenceId,
        sourceAccountRef,
        destinationAccountRef,
        amount,
        TransactionStatus.PROCESSING,
      ),
    );

    source.balance -= amount;
    destination.balance += amount;
    await repository.saveAccount(source);
    await repository.saveAccount(destination);

    this.loggingService.debug(`Balances updated for transfer ${referenceId}`, {
      sourceAccountRef,
      sourceBalance: formatMoney(source.balance),
      destinationAccountRef,
      destinationBalance: formatMoney(destination.balance),
    });

    transaction.transitionTo(TransactionStatus.COMPLETED);
    return {
      kind: 'committed',
      transaction: await repository.saveTransaction(transaction),
    };
  }

  /**
   * Writes the FAILED record outside the rolled-back unit of work. A failure
   * to write it is logged and the unsaved record is still returned.
   */
  private async recordFailure(
    command: ProcessTransactionCommand,
    referenceId: string,
    error: BankingError,
    startTime: number,
  ): Promise<TransferOutcome> {
    const commandName = 'ProcessTransactionCommand';
    const amount = parseMoney(command.amount);
    let transaction = newTransactionRecord(
      referenceId,
      command.sourceAccountRef,
      command.destinationAccountRef,
      amount !== null && isStorable(amount) ? amount : null,
      TransactionStatus.FAILED,
      error.message,
    );

    try {
      transaction = await this.ledgerStore.saveTransaction(transaction);
    } catch (saveError) {
      this.loggingService.error(
        `[${commandName}] Failed to save failed transaction record ${referenceId}: ${errorMessage(saveError)}`,
        { referenceId, errorCode: error.code },
      );
    }

    this.eventBus.publish(
      new TransactionFailedEvent(referenceId, error.code, error.message),
    );

    const executionTime = (Date.now() - startTime) / 1000;
    this.prometheusService
      .getCounter('commands_total')
      .inc({ command: commandName, status: 'failed' }, 1);
    this.prometheusService
      .getHistogram('command_duration_seconds')
      .observe({ command: commandName }, executionTime);

    return { kind: 'failed', transaction, error };
  }
}
