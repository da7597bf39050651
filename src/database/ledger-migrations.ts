import { CreateLedgerSchema1760870400000 } from './migrations/1760870400000-CreateLedgerSchema';

// The app and the TypeORM CLI must agree on both, or each replays the other's migrations
export const MIGRATIONS_TABLE_NAME = 'typeorm_migrations';

export const LEDGER_MIGRATIONS = [CreateLedgerSchema1760870400000];
