import { Money } from '../../../common/money/money';

export class TransactionCompletedEvent {
  constructor(
    public readonly referenceId: string,
    public readonly sourceAccountRef: string,
    public readonly destinationAccountRef: string,
    public readonly amount: Money,
  ) {}
}
