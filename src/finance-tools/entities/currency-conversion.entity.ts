export interface CurrencyConversion {
  amount: number;
  from: string;
  to: string;
  convertedAmount: number;   // 8 dp, so A→B→A round-trips
  rate: number;              // units of `to` per unit of `from`
}
