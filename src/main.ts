import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { errorMessage } from './common/errors/banking.errors';
import { getPort } from './variables';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));

  app.enableCors({
    origin: '*',
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    preflightContinue: false,
  });
  app.enableShutdownHooks();

  const port = getPort(app.get(ConfigService));
  await app.listen(port);
  Logger.log(`Ledger service is running on: http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    `Ledger service failed to start: ${errorMessage(err)}`,
  );
  process.exit(1);
});
