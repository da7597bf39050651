export enum TransactionStatus {
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

// PROCESSING is the only state with a way out; nothing leaves a terminal state.
const ALLOWED_TRANSITIONS: Record<TransactionStatus, readonly TransactionStatus[]> =
  {
    [TransactionStatus.PROCESSING]: [
      TransactionStatus.COMPLETED,
      TransactionStatus.FAILED,
    ],
    [TransactionStatus.COMPLETED]: [],
    [TransactionStatus.FAILED]: [],
  };

export function isTerminalStatus(status: TransactionStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransition(
  from: TransactionStatus,
  to: TransactionStatus,
): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}
