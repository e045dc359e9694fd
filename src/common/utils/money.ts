// Decimal columns come back from postgres.js as strings such as "207.00".
const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parses a non-negative decimal string into integer cents.
 * Returns null for a missing, malformed or negative value.
 */
export function parseMoneyToCents(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  return Math.round(parseFloat(trimmed) * 100);
}

// Largest value a decimal(10,2) column holds, in cents.
export const MAX_AMOUNT_CENTS = 9999999999;
export const MAX_AMOUNT = MAX_AMOUNT_CENTS / 100;

// Absorbs binary floating point error in value * 100; a third decimal is off by at least 0.1.
const CENT_TOLERANCE = 1e-4;

/**
 * Converts a request amount into integer cents.
 * Returns null when the value is negative, non-finite, has more than two
 * decimals or does not fit a decimal(10,2) column.
 */
export function amountToCents(value: number): number | null {
  if (!Number.isFinite(value) || value < 0) {
    return null;
  }

  const cents = value * 100;
  const rounded = Math.round(cents);
  if (Math.abs(cents - rounded) > CENT_TOLERANCE || rounded > MAX_AMOUNT_CENTS) {
    return null;
  }
  return rounded;
}

export function centsToMoney(cents: number): string {
  return (cents / 100).toFixed(2);
}
