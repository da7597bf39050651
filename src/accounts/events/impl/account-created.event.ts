import { Money } from '../../../common/money/money';

export class AccountCreatedEvent {
  constructor(
    public readonly id: string,
    public readonly referenceId: string,
    public readonly initialBalance: Money,
  ) {}
}
