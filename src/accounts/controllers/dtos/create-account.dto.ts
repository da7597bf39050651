import { IsDefined, IsNotEmpty, IsString, MaxLength } from 'class-validator';

// Wire fields keep the snake_case names existing clients already send
export class CreateAccountDto {
  @IsString()
  @IsNotEmpty({ message: 'Account ID cannot be null or empty' })
  @MaxLength(50)
  account_id!: string;

  // number or decimal string; the positivity policy is applied by the handler
  @IsDefined({ message: 'Initial balance cannot be null' })
  initial_balance!: unknown;
}
