/**
 * Money is kept as integer minor units (cents) in a `bigint`, never as a
 * binary float. 1000.00 → 100000n
 */
export type Money = bigint;

export const MONEY_SCALE = 2;

const MINOR_UNITS = 100n;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parses a JSON number or a decimal string into minor units.
 * Returns null when the value cannot be represented exactly with two
 * fraction digits ("10.005", "1e3", NaN, "").
 */
export function parseMoney(value: unknown): Money | null {
  let text: string;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    text = value.toString();
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    return null;
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const [, sign, units, fraction = ''] = match;
  const minor =
    BigInt(units) * MINOR_UNITS + BigInt(fraction.padEnd(MONEY_SCALE, '0'));

  return sign ? -minor : minor;
}

/**
 * Formats minor units with exactly two fraction digits.
 * 70000n → "700.00", -5000n → "-50.00"
 */
export function formatMoney(amount: Money): string {
  const negative = amount < 0n;
  const absolute = negative ? -amount : amount;
  const units = absolute / MINOR_UNITS;
  const cents = (absolute % MINOR_UNITS)
    .toString()
    .padStart(MONEY_SCALE, '0');

  return `${negative ? '-' : ''}${units}.${cents}`;
}

/**
 * Best-effort rendering of a raw request value for messages and logs.
 */
export function describeAmount(value: unknown): string {
  const parsed = parseMoney(value);
  if (parsed !== null) return formatMoney(parsed);
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

// Largest magnitude a decimal(19,2) column holds, in minor units
const MAX_STORABLE = 10n ** 19n - 1n;

export function isStorable(amount: Money): boolean {
  return amount <= MAX_STORABLE && amount >= -MAX_STORABLE;
}

export function isPositive(amount: Money): boolean {
  return amount > 0n;
}
