export class GetAccountQuery {
  constructor(public readonly referenceId: string) {}
}
