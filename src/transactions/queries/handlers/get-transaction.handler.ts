import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { TransactionNotFoundError } from '../../../common/errors/banking.errors';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import { LedgerStore } from '../../../common/storage/ledger.store';
import { TransactionEntity } from '../../models/transaction.entity';
import { GetTransactionQuery } from '../impl/get-transaction.query';

@QueryHandler(GetTransactionQuery)
export class GetTransactionHandler
  implements IQueryHandler<GetTransactionQuery, TransactionEntity>
{
  constructor(
    private readonly ledgerStore: LedgerStore,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  async execute(query: GetTransactionQuery): Promise<TransactionEntity> {
    const queryName = 'GetTransactionQuery';
    const startTime = Date.now();
    const { referenceId } = query;

    this.loggingService.logQueryStart(queryName, { referenceId });

    try {
      const transaction =
        await this.ledgerStore.findTransactionByRef(referenceId);

      if (!transaction) {
        this.prometheusService
          .getCounter('queries_total')
          .inc({ query: queryName, status: 'not_found' }, 1);
        this.loggingService.warn(
          `Transaction not found with ID: ${referenceId}`,
          { queryName },
        );

        throw new TransactionNotFoundError(referenceId);
      }

      const executionTime = (Date.now() - startTime) / 1000;
      this.prometheusService
        .getCounter('queries_total')
        .inc({ query: queryName, status: 'success' }, 1);
      this.prometheusService
        .getHistogram('query_duration_seconds')
        .observe({ query: queryName }, executionTime);

      this.loggingService.logQuerySuccess(
        queryName,
        { referenceId },
        executionTime,
        { status: transaction.status },
      );

      return transaction;
    } catch (error) {
      if (!(error instanceof TransactionNotFoundError)) {
        this.prometheusService
          .getCounter('queries_total')
          .inc({ query: queryName, status: 'error' }, 1);
        this.loggingService.logQueryError(queryName, error, { referenceId });
      }

      throw error;
    }
  }
}
