import { TransactionCompletedHandler } from './transaction-completed.handler';
import { TransactionFailedHandler } from './transaction-failed.handler';

export const EventHandlers = [
  TransactionCompletedHandler,
  TransactionFailedHandler,
];
