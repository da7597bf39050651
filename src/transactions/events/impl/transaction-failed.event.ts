import { BankingErrorCode } from '../../../common/errors/banking.errors';

export class TransactionFailedEvent {
  constructor(
    public readonly referenceId: string,
    public readonly errorCode: BankingErrorCode,
    public readonly errorMessage: string,
  ) {}
}
