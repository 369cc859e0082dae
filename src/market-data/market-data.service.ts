import { Inject, Injectable } from '@nestjs/common';
import { InputValidationError } from '../common/errors/assistant.errors';
import { divide, toDecimal, toMoney } from '../common/utils/decimal.util';
import { MarketNews, NewsCategory } from './entities/market-news.entity';
import { StockQuote } from './entities/stock-quote.entity';
import { RANDOM_SOURCE, RandomSource } from './random.provider';

const BASE_PRICES: Record<string, number> = {
  AAPL: 190,
  MSFT: 420,
  GOOGL: 170,
  AMZN: 180,
  TSLA: 250,
  NVDA: 120,
  META: 500,
};

const NEWS_TOPICS: Record<NewsCategory, string[]> = {
  stocks: ['Stock Market', 'Equities', 'Wall Street'],
  crypto: ['Cryptocurrency', 'Bitcoin', 'DeFi'],
  economy: ['Economy', 'Inflation', 'Federal Reserve'],
  tech: ['Technology', 'AI', 'Semiconductors'],
};

const NEWS_SOURCES = ['Bloomberg', 'Reuters', 'CNBC', 'Financial Times', 'MarketWatch'];

export const MAX_NEWS_ITEMS = 20;
const MAX_DRIFT = 0.02;

/**
 * Mock market data. No network: quotes are a fixed base price per ticker
 * (random for unknown tickers) plus random drift, and news is templated.
 */
@Injectable()
export class MarketDataService {
  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  /**
   * Synthetic quote for any ticker.
   * @throws InputValidationError on empty or over-long symbol
   */
  getQuote(rawSymbol: string): StockQuote {
    const symbol = normalizeSymbol(rawSymbol);
    const base = toDecimal(Object.hasOwn(BASE_PRICES, symbol) ? BASE_PRICES[symbol] : this.uniform(50, 500));
    const drift = toDecimal(this.random()).times(2).minus(1).times(MAX_DRIFT);
    const price = base.times(drift.plus(1));
    const change = toDecimal(this.uniform(-10, 10));

    return {
      symbol,
      price: toMoney(price),
      change: toMoney(change),
      changePercent: toMoney(divide(change, price).times(100)),
      timestamp: new Date().toISOString(),
    };
  }

  /** Tickers with a seeded base price */
  getKnownSymbols(): string[] {
    return Object.keys(BASE_PRICES);
  }

  /**
   * Templated headlines. Unknown categories fall back to generic "Market" news.
   * @throws InputValidationError if limit is not an integer in 1..20
   */
  getNews(category = 'stocks', limit = 5): MarketNews[] {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_NEWS_ITEMS) {
      throw new InputValidationError(`Limit must be an integer between 1 and ${MAX_NEWS_ITEMS}, got ${limit}`);
    }

    const normalized = category.trim().toLowerCase() || 'stocks';
    const topics = isNewsCategory(normalized) ? NEWS_TOPICS[normalized] : ['Market'];
    const now = Date.now();
    const items: MarketNews[] = [];

    for (let i = 0; i < limit; i++) {
      const topic = this.pick(topics);
      const source = this.pick(NEWS_SOURCES);
      const hoursAgo = Math.floor(this.random() * 25);

      items.push({
        headline: `${topic} Update: Market analysis and insights ${i + 1}`,
        source,
        timestamp: new Date(now - hoursAgo * 3_600_000).toISOString(),
        summary: `Analysis of ${topic.toLowerCase()} trends and market movements. Expert opinions on future direction.`,
        category: normalized,
      });
    }

    return items;
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  private pick<T>(values: readonly T[]): T {
    const index = Math.min(Math.floor(this.random() * values.length), values.length - 1);
    return values[index];
  }
}

export function normalizeSymbol(rawSymbol: string): string {
  const symbol = rawSymbol.trim().toUpperCase();
  if (!symbol) {
    throw new InputValidationError('Symbol must not be empty');
  }
  if (symbol.length > 10) {
    throw new InputValidationError(`Symbol must be at most 10 characters, got "${symbol}"`);
  }
  return symbol;
}

function isNewsCategory(value: string): value is NewsCategory {
  return Object.hasOwn(NEWS_TOPICS, value);
}
