import { Module } from '@nestjs/common';
import { CqrsModule } from '@nestjs/cqrs';
import { CreateAccountHandler } from './commands/handlers/create-account.handler';
import { AccountsController } from './controllers/accounts.controller';
import { AccountCreatedHandler } from './events/handlers/account-created.handler';
import { GetAccountHandler } from './queries/handlers/get-account.handler';

// LedgerStore and the monitoring services come from global modules
@Module({
  imports: [CqrsModule],
  controllers: [AccountsController],
  providers: [CreateAccountHandler, GetAccountHandler, AccountCreatedHandler],
})
export class AccountsModule {}
