import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Money } from '../../common/money/money';
import { moneyTransformer } from '../../common/money/money.transformer';

@Entity('accounts')
@Check('CHK_accounts_balance_non_negative', '"balance" >= 0')
export class AccountEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({
    name: 'reference_id',
    type: 'varchar',
    length: 50,
    unique: true,
  })
  referenceId!: string;

  @Column({
    type: 'decimal',
    precision: 19,
    scale: 2,
    transformer: moneyTransformer,
  })
  balance!: Money;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
