import { IsOptional } from 'class-validator';

/**
 * Transfer request body. Fields stay loose here: missing or malformed
 * values become FAILED transactions instead of validation errors, so
 * every request gets a transaction id back.
 */
export class ProcessTransactionDto {
  @IsOptional()
  source_account_id?: unknown;

  @IsOptional()
  destination_account_id?: unknown;

  @IsOptional()
  amount?: unknown;
}
