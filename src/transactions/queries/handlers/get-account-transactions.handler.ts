import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import { LedgerStore } from '../../../common/storage/ledger.store';
import { TransactionEntity } from '../../models/transaction.entity';
import { GetAccountTransactionsQuery } from '../impl/get-account-transactions.query';

/**
 * Audit history for one account reference, as source or destination,
 * oldest first. Unknown references yield an empty list: failed attempts
 * can name accounts that do not exist.
 */
@QueryHandler(GetAccountTransactionsQuery)
export class GetAccountTransactionsHandler
  implements IQueryHandler<GetAccountTransactionsQuery, TransactionEntity[]>
{
  constructor(
    private readonly ledgerStore: LedgerStore,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  async execute(
    query: GetAccountTransactionsQuery,
  ): Promise<TransactionEntity[]> {
    const queryName = 'GetAccountTransactionsQuery';
    const startTime = Date.now();
    const { accountRef } = query;

    this.loggingService.logQueryStart(queryName, { accountRef });

    try {
      const transactions =
        await this.ledgerStore.findTransactionsByAccountRef(accountRef);

      const executionTime = (Date.now() - startTime) / 1000;
      this.prometheusService
        .getCounter('queries_total')
        .inc({ query: queryName, status: 'success' }, 1);
      this.prometheusService
        .getHistogram('query_duration_seconds')
        .observe({ query: queryName }, executionTime);

      this.loggingService.logQuerySuccess(
        queryName,
        { accountRef },
        executionTime,
        { count: transactions.length },
      );

      return transactions;
    } catch (error) {
      this.prometheusService
        .getCounter('queries_total')
        .inc({ query: queryName, status: 'error' }, 1);
      this.loggingService.logQueryError(queryName, error, { accountRef });
      throw error;
    }
  }
}
