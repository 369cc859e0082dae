import { isSupportedCurrency } from '../finance-tools/currency-rates';
import { PortfolioHolding } from '../finance-tools/entities/portfolio.entity';

// Pulls tool arguments out of free text. Everything here is pure and works on
// a single message; replaying history is the runtime's job.

const NUM = String.raw`-?\d[\d,]*(?:\.\d+)?`;

const CURRENCY_WORDS = new Map<string, string>([
  ['dollar', 'USD'],
  ['dollars', 'USD'],
  ['buck', 'USD'],
  ['bucks', 'USD'],
  ['euro', 'EUR'],
  ['euros', 'EUR'],
  ['pound', 'GBP'],
  ['pounds', 'GBP'],
  ['sterling', 'GBP'],
  ['yen', 'JPY'],
  ['rupee', 'PKR'],
  ['rupees', 'PKR'],
  ['yuan', 'CNY'],
  ['renminbi', 'CNY'],
  ['dirham', 'AED'],
  ['dirhams', 'AED'],
  ['riyal', 'SAR'],
  ['riyals', 'SAR'],
  ['franc', 'CHF'],
  ['francs', 'CHF'],
]);

const COMPANY_TICKERS = new Map<string, string>([
  ['apple', 'AAPL'],
  ['microsoft', 'MSFT'],
  ['google', 'GOOGL'],
  ['alphabet', 'GOOGL'],
  ['amazon', 'AMZN'],
  ['tesla', 'TSLA'],
  ['nvidia', 'NVDA'],
  ['meta', 'META'],
  ['facebook', 'META'],
]);

// Upper-case words that are never tickers
const NON_TICKERS = new Set([
  'AI', 'OK', 'CEO', 'CFO', 'ETF', 'IPO', 'CAGR', 'GDP', 'PE', 'EPS', 'ROI', 'USA', 'US', 'UK', 'EU',
  'FX', 'API', 'PNL', 'YTD', 'HI', 'AM', 'PM', 'THE', 'AND', 'WHAT', 'HOW', 'IS', 'MY', 'ME',
  'OF', 'TO', 'IN', 'ON', 'AT', 'FOR', 'BY', 'OR', 'IT', 'NEWS', 'BUY', 'SELL',
]);

export interface MoneyMention {
  amount: number;
  currency: string;
  index: number;
}

export interface ConversionRequest {
  amount?: number;
  from?: string;
  to?: string;
}

export interface RiskInputs {
  beta?: number;
  volatility?: number;
  diversificationScore?: number;
}

export function parseNumber(raw: string): number {
  return Number(raw.replace(/,/g, ''));
}

/** Resolves "usd", "EUR", "rupees" etc. to a supported ISO code */
export function resolveCurrency(word: string): string | undefined {
  const named = CURRENCY_WORDS.get(word.toLowerCase());
  if (named) {
    return named;
  }
  const code = word.toUpperCase();
  return code.length === 3 && isSupportedCurrency(code) ? code : undefined;
}

function matchAll(text: string, pattern: string, flags = 'gi'): RegExpMatchArray[] {
  return Array.from(text.matchAll(new RegExp(pattern, flags)));
}

/**
 * Amounts tied to a currency, in order of appearance:
 * "$150", "1000 USD", "500 rupees", "EUR 20".
 */
export function extractMoneyMentions(text: string): MoneyMention[] {
  const mentions: MoneyMention[] = [];

  for (const match of matchAll(text, String.raw`\$\s?(${NUM})`)) {
    mentions.push({ amount: parseNumber(match[1]), currency: 'USD', index: match.index ?? 0 });
  }
  for (const match of matchAll(text, String.raw`(?<![\w$.,])(${NUM})[ \t]*([a-z]{3,8})\b`)) {
    const currency = resolveCurrency(match[2]);
    if (currency) {
      mentions.push({ amount: parseNumber(match[1]), currency, index: match.index ?? 0 });
    }
  }
  for (const match of matchAll(text, String.raw`\b([a-z]{3})[ \t]+(${NUM})`)) {
    const currency = resolveCurrency(match[1]);
    if (currency && match[1] === match[1].toUpperCase()) {
      mentions.push({ amount: parseNumber(match[2]), currency, index: match.index ?? 0 });
    }
  }

  return mentions.sort((a, b) => a.index - b.index);
}

/**
 * Target currency from "to EUR", "in JPY", "into rupees" (last one wins).
 * With keepUnknownCodes, an unsupported upper-case code such as "XYZ" is
 * returned as-is so the converter can reject it by name.
 */
export function extractTargetCurrency(text: string, keepUnknownCodes = false): string | undefined {
  let target: string | undefined;
  for (const match of matchAll(text, String.raw`\b(?:to|into|in)\s+([a-z]{3,8})\b`)) {
    const resolved = resolveCurrency(match[1]);
    if (resolved) {
      target = resolved;
    } else if (keepUnknownCodes && /^[A-Z]{3}$/.test(match[1])) {
      target = match[1];
    }
  }
  return target;
}

export function parseConversionRequest(text: string): ConversionRequest {
  const to = extractTargetCurrency(text, true);
  // "100 EUR to GBP": skip the target's own mention, unless it is the only one
  const mentions = extractMoneyMentions(text);
  const mention = mentions.find((m) => m.currency !== to) ?? mentions[0];
  if (mention) {
    return { amount: mention.amount, from: mention.currency, to };
  }

  const bare = text.match(new RegExp(String.raw`(?<![\w.])(${NUM})(?!\w)`));
  if (bare) {
    return { amount: parseNumber(bare[1]), from: 'USD', to };
  }
  return { to };
}

/** Tickers in order of appearance: "(AAPL)", "TSLA", "apple", "nvda" */
export function extractTickers(text: string, knownTickers: readonly string[] = []): string[] {
  const known = new Set(knownTickers.map((t) => t.toUpperCase()));
  const found: Array<{ symbol: string; index: number }> = [];

  for (const match of matchAll(text, String.raw`\b([a-z]{1,5})\b`)) {
    const word = match[1];
    const upper = word.toUpperCase();
    const index = match.index ?? 0;

    const company = COMPANY_TICKERS.get(word.toLowerCase());
    if (company) {
      found.push({ symbol: company, index });
    } else if (known.has(upper)) {
      found.push({ symbol: upper, index });
    } else if (
      word === upper &&
      word.length >= 2 &&
      !NON_TICKERS.has(upper) &&
      !isSupportedCurrency(upper)
    ) {
      found.push({ symbol: upper, index });
    }
  }
  for (const match of matchAll(text, String.raw`\b([a-z]{6,12})\b`)) {
    const company = COMPANY_TICKERS.get(match[1].toLowerCase());
    if (company) {
      found.push({ symbol: company, index: match.index ?? 0 });
    }
  }

  const ordered = found.sort((a, b) => a.index - b.index).map((f) => f.symbol);
  return Array.from(new Set(ordered));
}

/** "100 shares of AAPL bought at $150" */
export function extractHoldings(text: string): PortfolioHolding[] {
  const pattern = String.raw`(${NUM})\s+shares?\s+(?:of\s+)?\$?([a-z][a-z.]{0,9})\s+(?:(?:bought|purchased|acquired)\s+)?(?:at|@|for)\s*\$?(${NUM})`;

  return matchAll(text, pattern).map((match) => ({
    symbol: COMPANY_TICKERS.get(match[2].toLowerCase()) ?? match[2].toUpperCase(),
    shares: parseNumber(match[1]),
    averageCost: parseNumber(match[3]),
  }));
}

export function extractYears(text: string): number | undefined {
  const match = text.match(new RegExp(String.raw`(${NUM})\s*(?:years?|yrs?)\b`, 'i'));
  return match ? parseNumber(match[1]) : undefined;
}

/**
 * Start and end values for a return calculation:
 * dollar amounts first, then "from 150 to 178.52".
 */
export function extractReturnValues(text: string): { start: number; end: number } | undefined {
  const amounts = extractMoneyMentions(text).map((m) => m.amount);
  if (amounts.length >= 2) {
    return { start: amounts[0], end: amounts[1] };
  }

  const match = text.match(new RegExp(String.raw`from\s+\$?(${NUM})\s+to\s+\$?(${NUM})`, 'i'));
  return match ? { start: parseNumber(match[1]), end: parseNumber(match[2]) } : undefined;
}

function labelledNumber(text: string, label: string): number | undefined {
  const match = text.match(new RegExp(String.raw`${label}\s*(?:of|=|:|is|at)?\s*(${NUM})`, 'i'));
  return match ? parseNumber(match[1]) : undefined;
}

export function extractRiskInputs(text: string): RiskInputs {
  return {
    beta: labelledNumber(text, 'beta'),
    volatility: labelledNumber(text, 'volatility'),
    diversificationScore: labelledNumber(text, String.raw`diversification(?:\s+score)?`),
  };
}

const NEWS_CATEGORY_WORDS: Array<[string, RegExp]> = [
  ['crypto', /\b(crypto|cryptocurrency|bitcoin|ethereum|defi)\b/i],
  ['economy', /\b(economy|economic|inflation|fed|federal reserve|interest rates?|gdp)\b/i],
  ['tech', /\b(tech|technology|ai|semiconductors?|chips?)\b/i],
];

export function extractNewsCategory(text: string): string {
  const hit = NEWS_CATEGORY_WORDS.find(([, pattern]) => pattern.test(text));
  return hit ? hit[0] : 'stocks';
}

export function extractNewsLimit(text: string): number | undefined {
  const match =
    text.match(/\btop\s+(\d+)\b/i) ?? text.match(/\b(\d+)\s+(?:\w+\s+)?(?:news|headlines|stories|articles|items)\b/i);
  return match ? Number(match[1]) : undefined;
}
