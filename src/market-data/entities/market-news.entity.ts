export type NewsCategory = 'stocks' | 'crypto' | 'economy' | 'tech';

export interface MarketNews {
  headline: string;
  source: string;
  timestamp: string;
  summary: string;
  category: string;
}
