export class GetAccountTransactionsQuery {
  constructor(public readonly accountRef: string) {}
}
