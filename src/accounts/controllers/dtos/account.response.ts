import { formatMoney } from '../../../common/money/money';
import { AccountEntity } from '../../models/account.entity';

export interface AccountCreationResponse {
  account_id: string;
  initial_balance: string;
}

export interface AccountResponse {
  account_id: string;
  balance: string;
}

export function toAccountCreationResponse(
  account: AccountEntity,
): AccountCreationResponse {
  return {
    account_id: account.referenceId,
    initial_balance: formatMoney(account.balance),
  };
}

export function toAccountResponse(account: AccountEntity): AccountResponse {
  return {
    account_id: account.referenceId,
    balance: formatMoney(account.balance),
  };
}
