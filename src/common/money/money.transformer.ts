import { ValueTransformer } from 'typeorm';
import { formatMoney, Money, parseMoney } from './money';

// Postgres returns decimal columns as strings; keep them exact on the way in and out.
export const moneyTransformer: ValueTransformer = {
  to(value: Money | null | undefined): string | null | undefined {
    if (value === null || value === undefined) return value;
    return formatMoney(value);
  },
  from(value: string | null): Money | null {
    if (value === null) return null;
    const parsed = parseMoney(value);
    if (parsed === null) {
      throw new Error(`Unreadable decimal value in money column: ${value}`);
    }
    return parsed;
  },
};
