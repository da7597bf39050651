import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CqrsModule } from '@nestjs/cqrs';
import { AccountsModule } from './accounts/accounts.module';
import { MonitoringModule } from './common/monitoring/monitoring.module';
import { StorageModule } from './common/storage/storage.module';
import { TransactionsModule } from './transactions/transactions.module';
import { getLedgerStoreDriver } from './variables';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      expandVariables: true,
      envFilePath:
        process.env.NODE_ENV === 'production' ? '.env' : '.env.local',
    }),
    StorageModule.forRoot(getLedgerStoreDriver()),
    CqrsModule,
    MonitoringModule,
    AccountsModule,
    TransactionsModule,
  ],
})
export class AppModule {}
