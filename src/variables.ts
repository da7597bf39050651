import { ConfigService } from '@nestjs/config';

export type LedgerStoreDriver = 'postgres' | 'memory';

export const getPort = (configService: ConfigService): number =>
  Number(configService.get<string | number>('PORT', 3000));

// Postgres config
export const getPostgresHost = (configService: ConfigService): string =>
  configService.get<string>('POSTGRES_HOST', 'localhost');

export const getPostgresPort = (configService: ConfigService): number =>
  Number(configService.get<string | number>('POSTGRES_PORT', 5432));

export const getPostgresUser = (configService: ConfigService): string =>
  configService.get<string>('POSTGRES_USER', 'postgres');

export const getPostgresPassword = (configService: ConfigService): string =>
  configService.get<string>('POSTGRES_PASSWORD', 'postgres');

export const getPostgresDb = (configService: ConfigService): string =>
  configService.get<string>('POSTGRES_DB', 'ledger_db');

export const getDbSynchronize = (configService: ConfigService): boolean =>
  configService.get<string>('DB_SYNCHRONIZE', 'false') === 'true';

// Read straight from the environment: the storage module is chosen while
// the module graph is being declared, before ConfigService exists.
export const getLedgerStoreDriver = (
  env: NodeJS.ProcessEnv = process.env,
): LedgerStoreDriver => {
  const driver = env.LEDGER_STORE ?? 'postgres';
  if (driver !== 'postgres' && driver !== 'memory') {
    throw new Error(
      `Unsupported LEDGER_STORE "${driver}". Use "postgres" or "memory".`,
    );
  }
  return driver;
};
