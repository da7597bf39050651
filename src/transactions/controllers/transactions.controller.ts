import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { Response } from 'express';
import { LoggingService } from '../../common/monitoring/logging.service';
import { PrometheusService } from '../../common/monitoring/prometheus.service';
import { describeAmount } from '../../common/money/money';
import { ProcessTransactionCommand } from '../commands/impl/process-transaction.command';
import { TransactionEntity } from '../models/transaction.entity';
import { TransferOutcome } from '../models/transfer-outcome';
import { GetAccountTransactionsQuery } from '../queries/impl/get-account-transactions.query';
import { GetTransactionQuery } from '../queries/impl/get-transaction.query';
import { ProcessTransactionDto } from './dtos/process-transaction.dto';
import {
  AccountTransactionsResponse,
  toTransactionResponse,
  TransactionResponse,
} from './dtos/transaction.response';

// Account ids sent as JSON numbers are read as their string form
function toAccountRef(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') {
    return value.toString();
  }
  return null;
}

@Controller('transactions')
export class TransactionsController {
  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  /**
   * Always answers with the transaction record: 201 when the transfer
   * completed, 400 when it was rejected.
   */
  @Post()
  async processTransaction(
    @Body() processTransactionDto: ProcessTransactionDto,
    @Res({ passthrough: true }) response: Response,
  ): Promise<TransactionResponse> {
    const sourceAccountRef = toAccountRef(
      processTransactionDto.source_account_id,
    );
    const destinationAccountRef = toAccountRef(
      processTransactionDto.destination_account_id,
    );

    this.loggingService.logRoute('POST /transactions', 'POST', {
      source_account_id: sourceAccountRef,
      destination_account_id: destinationAccountRef,
      amount: describeAmount(processTransactionDto.amount),
    });
    this.prometheusService.getCounter('api_requests_total').inc(
      {
        path: '/transactions',
        method: 'POST',
        operation: 'process_transaction',
      },
      1,
    );

    const outcome = await this.commandBus.execute<
      ProcessTransactionCommand,
      TransferOutcome
    >(
      new ProcessTransactionCommand(
        sourceAccountRef,
        destinationAccountRef,
        processTransactionDto.amount,
      ),
    );

    response.status(
      outcome.kind === 'completed' ? HttpStatus.CREATED : HttpStatus.BAD_REQUEST,
    );
    return toTransactionResponse(outcome.transaction);
  }

  @Get('account/:accountId')
  async getAccountTransactions(
    @Param('accountId') accountId: string,
  ): Promise<AccountTransactionsResponse> {
    this.loggingService.logRoute(
      `GET /transactions/account/${accountId}`,
      'GET',
      { accountId },
    );
    this.prometheusService.getCounter('api_requests_total').inc(
      {
        path: '/transactions/account/:accountId',
        method: 'GET',
        operation: 'get_account_transactions',
      },
      1,
    );

    const transactions = await this.queryBus.execute<
      GetAccountTransactionsQuery,
      TransactionEntity[]
    >(new GetAccountTransactionsQuery(accountId));

    return {
      transactions: transactions.map(toTransactionResponse),
      count: transactions.length,
    };
  }

  @Get(':transactionId')
  async getTransaction(
    @Param('transactionId') transactionId: string,
  ): Promise<TransactionResponse> {
    this.loggingService.logRoute(
      `GET /transactions/${transactionId}`,
      'GET',
      { transactionId },
    );
    this.prometheusService.getCounter('api_requests_total').inc(
      {
        path: '/transactions/:transactionId',
        method: 'GET',
        operation: 'get_transaction',
      },
      1,
    );

    const transaction = await this.queryBus.execute<
      GetTransactionQuery,
      TransactionEntity
    >(new GetTransactionQuery(transactionId));

    return toTransactionResponse(transaction);
  }
}
