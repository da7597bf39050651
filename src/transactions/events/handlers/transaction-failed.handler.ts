import { EventsHandler, IEventHandler } from '@nestjs/cqrs';
import { LoggingService } from '../../../common/monitoring/logging.service';
import { PrometheusService } from '../../../common/monitoring/prometheus.service';
import { TransactionFailedEvent } from '../impl/transaction-failed.event';

@EventsHandler(TransactionFailedEvent)
export class TransactionFailedHandler
  implements IEventHandler<TransactionFailedEvent>
{
  constructor(
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  handle(event: TransactionFailedEvent) {
    this.prometheusService
      .getCounter('transactions_total')
      .inc({ status: 'failed' }, 1);

    this.loggingService.warn(
      `[TransactionFailedHandler] Transfer ${event.referenceId} failed`,
      { errorCode: event.errorCode, errorMessage: event.errorMessage },
    );
  }
}
