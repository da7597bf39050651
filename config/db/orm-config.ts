import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { AccountEntity } from '../../src/accounts/models/account.entity';
import {
  LEDGER_MIGRATIONS,
  MIGRATIONS_TABLE_NAME,
} from '../../src/database/ledger-migrations';
import { TransactionEntity } from '../../src/transactions/models/transaction.entity';

// Loads .env when present (local development)
config();

/**
 * Data source for the TypeORM CLI (`npm run migration:run`).
 * Migrations are listed as classes so the same file works from src/ and dist/.
 */
const options: DataSourceOptions = {
  type: 'postgres',
  host: process.env.POSTGRES_HOST || 'localhost',
  port: parseInt(process.env.POSTGRES_PORT || '5432', 10),
  username: process.env.POSTGRES_USER || 'postgres',
  password: process.env.POSTGRES_PASSWORD || 'postgres',
  database: process.env.POSTGRES_DB || 'ledger_db',

  entities: [AccountEntity, TransactionEntity],
  migrations: LEDGER_MIGRATIONS,

  // Migrations own the schema
  synchronize: false,
  logging: true,
  migrationsRun: false,
  migrationsTableName: MIGRATIONS_TABLE_NAME,
};

export const AppDataSource = new DataSource(options);
