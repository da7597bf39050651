/**
 * Request to move `amount` from one account to another. Fields arrive as
 * the caller sent them; the handler validates them and records the outcome.
 */
export class ProcessTransactionCommand {
  constructor(
    public readonly sourceAccountRef: string | null,
    public readonly destinationAccountRef: string | null,
    public readonly amount: unknown,
  ) {}
}
