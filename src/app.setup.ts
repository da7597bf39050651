import { INestApplication, ValidationPipe } from '@nestjs/common';
import {
  BankingExceptionFilter,
  toRequestValidationError,
} from './common/errors/banking-exception.filter';
import { LoggingService } from './common/monitoring/logging.service';

/** HTTP-level wiring shared by main.ts and the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix('api', { exclude: ['health'] });
  app.useGlobalPipes(
    new ValidationPipe({ exceptionFactory: toRequestValidationError }),
  );
  app.useGlobalFilters(new BankingExceptionFilter(app.get(LoggingService)));
  return app;
}
