import { Global, Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { LoggingService } from './logging.service';
import { MetricsController } from './metrics.controller';
import { PrometheusService } from './prometheus.service';

@Global()
@Module({
  controllers: [HealthController, MetricsController],
  providers: [PrometheusService, LoggingService],
  exports: [PrometheusService, LoggingService],
})
export class MonitoringModule {}
