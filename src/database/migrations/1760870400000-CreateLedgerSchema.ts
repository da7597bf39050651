import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateLedgerSchema1760870400000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
            CREATE TABLE "accounts" (
                "id" uuid NOT NULL,
                "reference_id" character varying(50) NOT NULL,
                "balance" decimal(19,2) NOT NULL,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "PK_accounts" PRIMARY KEY ("id"),
                CONSTRAINT "UQ_accounts_reference_id" UNIQUE ("reference_id"),
                CONSTRAINT "CHK_accounts_balance_non_negative" CHECK ("balance" >= 0)
            )
        `);

    // No foreign keys to accounts: failed attempts may name unknown accounts
    await queryRunner.query(`
            CREATE TABLE "transactions" (
                "id" uuid NOT NULL,
                "reference_id" character varying(50) NOT NULL,
                "source_account_ref" character varying,
                "destination_account_ref" character varying,
                "amount" decimal(19,2),
                "status" character varying(20) NOT NULL,
                "error_message" character varying(500),
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
                "processed_at" TIMESTAMP,
                CONSTRAINT "PK_transactions" PRIMARY KEY ("id"),
                CONSTRAINT "UQ_transactions_reference_id" UNIQUE ("reference_id")
            )
        `);

    await queryRunner.query(
      `CREATE INDEX "IDX_transactions_source_account_ref" ON "transactions" ("source_account_ref")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_transactions_destination_account_ref" ON "transactions" ("destination_account_ref")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP INDEX IF EXISTS "IDX_transactions_destination_account_ref"`,
    );
    await queryRunner.query(
      `DROP INDEX IF EXISTS "IDX_transactions_source_account_ref"`,
    );
    await queryRunner.query(`DROP TABLE IF EXISTS "transactions"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "accounts"`);
  }
}
