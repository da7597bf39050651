export class GetTransactionQuery {
  constructor(public readonly referenceId: string) {}
}
