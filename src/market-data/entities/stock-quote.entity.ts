// Synthetic quote; price is base × (1 ± 2%) drift.
export interface StockQuote {
  symbol: string;
  price: number;
  change: number;          // vs previous close
  changePercent: number;
  timestamp: string;       // ISO
}
