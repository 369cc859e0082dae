// Static units-per-USD rates. Mock data, not time-varying.
export const EXCHANGE_RATES: Readonly<Record<string, number>> = {
  USD: 1.0,
  EUR: 0.92,
  GBP: 0.79,
  JPY: 149.5,
  CAD: 1.35,
  AUD: 1.52,
  CHF: 0.88,
  PKR: 278.5,
  INR: 83.12,
  CNY: 7.24,
  AED: 3.67,
  SAR: 3.75,
};

export const SUPPORTED_CURRENCIES = Object.keys(EXCHANGE_RATES);

export function isSupportedCurrency(code: string): boolean {
  return Object.hasOwn(EXCHANGE_RATES, code);
}
