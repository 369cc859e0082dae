import { Injectable, Logger } from '@nestjs/common';
import { formatAmount, formatUsd, toDecimal, toFixed2 } from '../common/utils/decimal.util';
import { Turn } from '../conversation/entities/turn.entity';
import { SUPPORTED_CURRENCIES } from '../finance-tools/currency-rates';
import { PortfolioSummary } from '../finance-tools/entities/portfolio.entity';
import { FinanceToolsService } from '../finance-tools/finance-tools.service';
import { MarketDataService } from '../market-data/market-data.service';
import { AgentRuntime } from './agent-runtime.interface';
import { SPECIALIST_NAMES, Specialist, routeMessage } from './intent-router';
import {
  MoneyMention,
  extractHoldings,
  extractMoneyMentions,
  extractNewsCategory,
  extractNewsLimit,
  extractReturnValues,
  extractRiskInputs,
  extractTickers,
  extractYears,
  parseConversionRequest,
} from './message-parsing';

const MAX_QUOTES_PER_REPLY = 5;

export const TRIAGE_REPLY = [
  'I can help with:',
  '- Stock prices, e.g. "What is the price of AAPL?"',
  '- Portfolio analysis, e.g. "Analyze 100 shares of AAPL bought at $150"',
  '- Investment returns, e.g. "I invested $10000 and now have $15000 after 3 years"',
  '- Risk assessment, e.g. "My portfolio has beta 1.2 and volatility 20%"',
  '- Market news, e.g. "Latest crypto news"',
  '- Currency conversion, e.g. "Convert 1000 USD to EUR"',
].join('\n');

/**
 * In-process stand-in for a multi-agent runtime: routes each message to a
 * specialist by keyword and answers from the mock tools. Follow-ups such as
 * "convert that to PKR" are resolved by scanning earlier turns.
 */
@Injectable()
export class LocalAgentRuntime implements AgentRuntime {
  readonly name = 'local';
  private readonly logger = new Logger(LocalAgentRuntime.name);

  constructor(
    private readonly tools: FinanceToolsService,
    private readonly marketData: MarketDataService,
  ) {}

  async respond(history: readonly Turn[]): Promise<string> {
    const current = history[history.length - 1];
    if (!current || current.role !== 'user') {
      throw new Error('Conversation history must end with a user turn');
    }

    const earlier = history.slice(0, -1);
    const specialist = routeMessage(current.text, this.marketData.getKnownSymbols());
    this.logger.debug(`Routing to ${SPECIALIST_NAMES[specialist]}`);

    return this.dispatch(specialist, current.text, earlier);
  }

  private dispatch(specialist: Specialist, text: string, earlier: readonly Turn[]): string {
    switch (specialist) {
      case 'currency':
        return this.answerCurrency(text, earlier);
      case 'portfolio':
        return this.answerPortfolio(text);
      case 'news':
        return this.answerNews(text);
      case 'stock':
        return this.answerStock(text, earlier);
      case 'triage':
        return TRIAGE_REPLY;
    }
  }

  private answerCurrency(text: string, earlier: readonly Turn[]): string {
    const request = parseConversionRequest(text);
    if (!request.to) {
      return `Which currency should I convert to? Supported currencies: ${SUPPORTED_CURRENCIES.join(', ')}.`;
    }

    let amount = request.amount;
    let from = request.from;
    if (amount === undefined) {
      const prior = findPriorAmount(earlier, request.to);
      if (!prior) {
        return 'How much would you like to convert? For example: "convert 100 USD to EUR".';
      }
      amount = prior.amount;
      from = prior.currency;
    }

    const result = this.tools.convertCurrency(amount, from ?? 'USD', request.to);
    // Rate line first: follow-ups pick up the last amount in a reply.
    return [
      `Exchange rate: 1 ${result.from} = ${toDecimal(result.rate).toFixed(4)} ${result.to}`,
      `${formatAmount(result.amount)} ${result.from} = ${formatAmount(result.convertedAmount)} ${result.to}`,
    ].join('\n');
  }

  private answerPortfolio(text: string): string {
    const holdings = extractHoldings(text);
    if (holdings.length > 0) {
      return formatPortfolio(this.tools.analyzePortfolio(holdings));
    }

    const risk = extractRiskInputs(text);
    if (risk.beta !== undefined || risk.volatility !== undefined) {
      if (risk.beta === undefined || risk.volatility === undefined) {
        return 'For a risk check I need both the portfolio beta and its volatility, e.g. "beta 1.2, volatility 20%".';
      }
      const analysis = this.tools.describeRisk(
        this.tools.assessRisk(risk.beta, risk.volatility, risk.diversificationScore),
      );
      return `${analysis.interpretation}\nRecommendations: ${analysis.recommendation}`;
    }

    const values = extractReturnValues(text);
    if (values) {
      const years = extractYears(text);
      const analysis =
        years === undefined
          ? this.tools.calculatePercentageReturn(values.start, values.end)
          : this.tools.calculateReturns(values.start, values.end, years);
      return `${analysis.interpretation}\n${analysis.recommendation}`;
    }

    return [
      'I can analyze a portfolio if you share:',
      '- holdings, e.g. "100 shares of AAPL bought at $150"',
      '- start and end values, optionally with a period, e.g. "invested $10000, now worth $15000 over 3 years"',
      '- beta and volatility for a risk check, e.g. "beta 1.2, volatility 20%"',
    ].join('\n');
  }

  private answerNews(text: string): string {
    const category = extractNewsCategory(text);
    const items = this.tools.getMarketNews(category, extractNewsLimit(text) ?? 5);

    const lines = items.map((item, i) => `${i + 1}. ${item.headline} (${item.source})\n   ${item.summary}`);
    return [`Latest ${category} news:`, ...lines].join('\n');
  }

  private answerStock(text: string, earlier: readonly Turn[]): string {
    const known = this.marketData.getKnownSymbols();
    let tickers = extractTickers(text, known);

    for (let i = earlier.length - 1; i >= 0 && tickers.length === 0; i--) {
      tickers = extractTickers(earlier[i].text, known);
    }
    if (tickers.length === 0) {
      return 'Which stock should I look up? Give me a ticker symbol such as AAPL or TSLA.';
    }

    return tickers.slice(0, MAX_QUOTES_PER_REPLY).map((symbol) => {
      const quote = this.tools.getStockPrice(symbol);
      return `${quote.symbol} is trading at ${formatUsd(quote.price)} (${signed(quote.change)}, ${signed(quote.changePercent)}%)`;
    }).join('\n');
  }
}

/**
 * Most recent money mention before this message. Within a turn the last
 * mention wins, preferring one not already in the target currency.
 */
export function findPriorAmount(earlier: readonly Turn[], target: string): MoneyMention | undefined {
  for (let i = earlier.length - 1; i >= 0; i--) {
    const mentions = extractMoneyMentions(earlier[i].text);
    if (mentions.length === 0) {
      continue;
    }
    const candidates = mentions.filter((m) => m.currency !== target);
    const pool = candidates.length > 0 ? candidates : mentions;
    return pool[pool.length - 1];
  }
  return undefined;
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${toFixed2(value)}`;
}

function formatPortfolio(summary: PortfolioSummary): string {
  const lines = [`Portfolio summary (${summary.numPositions} ${summary.numPositions === 1 ? 'position' : 'positions'}):`];

  summary.positions.forEach((p) => {
    lines.push(
      `- ${p.symbol}: ${p.shares} shares @ ${formatUsd(p.averageCost)}, now ${formatUsd(p.currentPrice)}, ` +
        `value ${formatUsd(p.currentValue)}, gain/loss ${formatUsd(p.gainLoss)} (${toFixed2(p.gainLossPct)}%)`,
    );
  });
  lines.push(`Total value: ${formatUsd(summary.totalValue)}`);
  lines.push(`Total cost: ${formatUsd(summary.totalCost)}`);
  lines.push(`Total gain/loss: ${formatUsd(summary.totalGainLoss)} (${toFixed2(summary.gainLossPercent)}%)`);

  return lines.join('\n');
}
