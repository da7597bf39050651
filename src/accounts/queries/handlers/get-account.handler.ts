import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { AccountNotFoundError } from '../../../common/errors/banking.errors';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import { LedgerStore } from '../../../common/storage/ledger.store';
import { AccountEntity } from '../../models/account.entity';
import { GetAccountQuery } from '../impl/get-account.query';

@QueryHandler(GetAccountQuery)
export class GetAccountHandler
  implements IQueryHandler<GetAccountQuery, AccountEntity>
{
  constructor(
    private readonly ledgerStore: LedgerStore,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  async execute(query: GetAccountQuery): Promise<AccountEntity> {
    const queryName = 'GetAccountQuery';
    const startTime = Date.now();

    this.loggingService.logQueryStart(queryName, {
      referenceId: query.referenceId,
    });

    try {
      const account = await this.ledgerStore.findAccountByRef(
        query.referenceId,
      );

      if (!account) {
        this.prometheusService
          .getCounter('queries_total')
          .inc({ query: queryName, status: 'not_found' }, 1);

        this.loggingService.warn(
          `Account not found with ID: ${query.referenceId}`,
          { queryName, referenceId: query.referenceId },
        );

        throw AccountNotFoundError.forReference(query.referenceId);
      }

      const executionTime = (Date.now() - startTime) / 1000;
      this.prometheusService
        .getCounter('queries_total')
        .inc({ query: queryName, status: 'success' }, 1);
      this.prometheusService
        .getHistogram('query_duration_seconds')
        .observe({ query: queryName }, executionTime);

      // Balance left out of the log on purpose
      this.loggingService.logQuerySuccess(
        queryName,
        { referenceId: query.referenceId },
        executionTime,
      );

      return account;
    } catch (error) {
      if (!(error instanceof AccountNotFoundError)) {
        this.prometheusService
          .getCounter('queries_total')
          .inc({ query: queryName, status: 'error' }, 1);
        this.loggingService.logQueryError(queryName, error);
      }

      throw error;
    }
  }
}
