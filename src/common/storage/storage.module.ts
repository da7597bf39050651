import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AccountEntity } from '../../accounts/models/account.entity';
import {
  LEDGER_MIGRATIONS,
  MIGRATIONS_TABLE_NAME,
} from '../../database/ledger-migrations';
import { TransactionEntity } from '../../transactions/models/transaction.entity';
import {
  getDbSynchronize,
  getPostgresDb,
  getPostgresHost,
  getPostgresPassword,
  getPostgresPort,
  getPostgresUser,
  LedgerStoreDriver,
} from '../../variables';
import { LedgerStore } from './ledger.store';
import { MemoryLedgerStore } from './memory-ledger.store';
import { TypeOrmLedgerStore } from './typeorm-ledger.store';

export const postgresOptions = (
  configService: ConfigService,
): TypeOrmModuleOptions => ({
  type: 'postgres',
  host: getPostgresHost(configService),
  port: getPostgresPort(configService),
  username: getPostgresUser(configService),
  password: getPostgresPassword(configService),
  database: getPostgresDb(configService),
  entities: [AccountEntity, TransactionEntity],
  migrations: LEDGER_MIGRATIONS,
  migrationsTableName: MIGRATIONS_TABLE_NAME,
  migrationsRun: !getDbSynchronize(configService),
  synchronize: getDbSynchronize(configService),
});

@Global()
@Module({})
export class StorageModule {
  static forRoot(driver: LedgerStoreDriver): DynamicModule {
    return driver === 'memory'
      ? StorageModule.inMemory()
      : StorageModule.forPostgres();
  }

  static forPostgres(): DynamicModule {
    return {
      module: StorageModule,
      imports: [
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          inject: [ConfigService],
          useFactory: postgresOptions,
        }),
      ],
      providers: [{ provide: LedgerStore, useClass: TypeOrmLedgerStore }],
      exports: [LedgerStore],
    };
  }

  static inMemory(): DynamicModule {
    return {
      module: StorageModule,
      providers: [{ provide: LedgerStore, useClass: MemoryLedgerStore }],
      exports: [LedgerStore],
    };
  }
}
