import { EventsHandler, IEventHandler } from '@nestjs/cqrs';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import { formatMoney } from '../../../common/money/money';
import { TransactionCompletedEvent } from '../impl/transaction-completed.event';

@EventsHandler(TransactionCompletedEvent)
export class TransactionCompletedHandler
  implements IEventHandler<TransactionCompletedEvent>
{
  constructor(
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  handle(event: TransactionCompletedEvent) {
    const amount = formatMoney(event.amount);

    this.prometheusService
      .getCounter('transactions_total')
      .inc({ status: 'completed' }, 1);
    this.prometheusService
      .getHistogram('transaction_amount_distribution')
      .observe(Number(amount));

    this.loggingService.info(
      `[TransactionCompletedHandler] Transfer ${event.referenceId} completed`,
      {
        sourceAccountRef: event.sourceAccountRef,
        destinationAccountRef: event.destinationAccountRef,
        amount,
      },
    );
  }
}
