export class CreateAccountCommand {
  constructor(
    public readonly referenceId: string,
    // Raw request value; parsed and checked by the handler
    public readonly initialBalance: unknown,
  ) {}
}
