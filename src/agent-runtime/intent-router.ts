import { extractHoldings, extractTargetCurrency, extractTickers } from './message-parsing';

export type Specialist = 'currency' | 'portfolio' | 'news' | 'stock' | 'triage';

export const SPECIALIST_NAMES: Record<Specialist, string> = {
  currency: 'Currency Specialist',
  portfolio: 'Portfolio Manager',
  news: 'Market Intelligence Analyst',
  stock: 'Stock Analyst',
  triage: 'Finance Assistant',
};

const CURRENCY_WORDS = /\b(currency|currencies|forex|convert|conversion|exchange rates?)\b/i;
const PORTFOLIO_WORDS =
  /\b(portfolio|holdings?|returns?|cagr|invested|investment|risk|beta|volatility|diversification|allocation|growth)\b/i;
const NEWS_WORDS = /\b(news|headlines?|trends?|sectors?|updates?|breaking)\b/i;
const WEAK_NEWS_WORDS = /\b(market|markets|latest)\b/i;
const STOCK_WORDS = /\b(stocks?|price|prices|ticker|shares?|quotes?|equity|trading)\b/i;

/**
 * Keyword dispatcher standing in for a triage agent. Checked in order:
 * currency, portfolio, news, stock; anything else goes to triage.
 */
export function routeMessage(text: string, knownTickers: readonly string[] = []): Specialist {
  if (CURRENCY_WORDS.test(text) || extractTargetCurrency(text) !== undefined) {
    return 'currency';
  }
  if (PORTFOLIO_WORDS.test(text) || extractHoldings(text).length > 0) {
    return 'portfolio';
  }

  const tickers = extractTickers(text, knownTickers);
  if (NEWS_WORDS.test(text)) {
    return 'news';
  }
  if (STOCK_WORDS.test(text) || tickers.length > 0) {
    return 'stock';
  }
  if (WEAK_NEWS_WORDS.test(text)) {
    return 'news';
  }
  return 'triage';
}
