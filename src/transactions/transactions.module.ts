import { Module } from '@nestjs/common';
import { CqrsModule } from '@nestjs/cqrs';
import { ProcessTransactionHandler } from './commands/handlers/process-transaction.handler';
import { TransactionsController } from './controllers/transactions.controller';
import { EventHandlers } from './events/handlers';
import { GetAccountTransactionsHandler } from './queries/handlers/get-account-transactions.handler';
import { GetTransactionHandler } from './queries/handlers/get-transaction.handler';

const QueryHandlers = [GetTransactionHandler, GetAccountTransactionsHandler];

@Module({
  imports: [CqrsModule],
  controllers: [TransactionsController],
  providers: [ProcessTransactionHandler, ...QueryHandlers, ...EventHandlers],
})
export class TransactionsModule {}
