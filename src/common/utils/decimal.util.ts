import Decimal from 'decimal.js';

// Money math runs through Decimal.js; results go back to numbers only at the edges.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

/**
 * Converts any number-like value to Decimal for financial calculations.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to a JavaScript number, keeping 8 decimal places.
 * Used where a value must survive a round trip (currency conversion).
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Rounds to cents (or percentage points) for display-facing figures.
 */
export function toMoney(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Formats with exactly 2 decimal places, e.g. "920.00".
 */
export function toFixed2(value: Decimal | number): string {
  return toDecimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}

/**
 * 2 dp with thousands separators: 278500 -> "278,500.00", -500 -> "-500.00".
 */
export function formatAmount(value: Decimal | number): string {
  const [whole, fraction] = toFixed2(value).split('.');
  return `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;
}

/** formatAmount with a leading dollar sign: "-$500.00" */
export function formatUsd(value: Decimal | number): string {
  const amount = formatAmount(value);
  return amount.startsWith('-') ? `-$${amount.slice(1)}` : `$${amount}`;
}
