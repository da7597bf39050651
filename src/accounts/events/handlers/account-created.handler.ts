import { EventsHandler, IEventHandler } from '@nestjs/cqrs';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import { formatMoney } from '../../../common/money/money';
import { AccountCreatedEvent } from '../impl/account-created.event';

@EventsHandler(AccountCreatedEvent)
export class AccountCreatedHandler
  implements IEventHandler<AccountCreatedEvent>
{
  constructor(
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  handle(event: AccountCreatedEvent) {
    this.prometheusService
      .getCounter('account_operations_total')
      .inc({ operation_type: 'create', status: 'success' }, 1);

    this.loggingService.info(
      `[AccountCreatedHandler] Account ${event.referenceId} opened`,
      {
        accountId: event.id,
        initialBalance: formatMoney(event.initialBalance),
      },
    );
  }
}
