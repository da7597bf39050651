import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Money } from '../../common/money/money';
import { moneyTransformer } from '../../common/money/money.transformer';
import { canTransition, TransactionStatus } from './transaction-status';

export { TransactionStatus };

/**
 * Audit record of one transfer attempt. Account references are plain
 * strings with no foreign key: failed attempts may name accounts that
 * never existed.
 */
@Entity('transactions')
export class TransactionEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({
    name: 'reference_id',
    type: 'varchar',
    length: 50,
    unique: true,
  })
  referenceId!: string;

  @Index('IDX_transactions_source_account_ref')
  @Column({ name: 'source_account_ref', type: 'varchar', nullable: true })
  sourceAccountRef!: string | null;

  @Index('IDX_transactions_destination_account_ref')
  @Column({ name: 'destination_account_ref', type: 'varchar', nullable: true })
  destinationAccountRef!: string | null;

  @Column({
    type: 'decimal',
    precision: 19,
    scale: 2,
    nullable: true,
    transformer: moneyTransformer,
  })
  amount!: Money | null;

  @Column({ type: 'varchar', length: 20 })
  status!: TransactionStatus;

  @Column({ name: 'error_message', type: 'varchar', length: 500, nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @Column({ name: 'processed_at', type: 'timestamp', nullable: true })
  processedAt!: Date | null;

  /**
   * Moves a PROCESSING record to COMPLETED or FAILED.
   * Throws when the record is already terminal.
   */
  transitionTo(status: TransactionStatus, errorMessage: string | null = null) {
    if (!canTransition(this.status, status)) {
      throw new Error(
        `Transaction ${this.referenceId} cannot move from ${this.status} to ${status}`,
      );
    }

    this.status = status;
    this.errorMessage = errorMessage;
    this.processedAt = new Date();
  }
}
