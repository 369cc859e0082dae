import { Injectable } from '@nestjs/common';
import { InputValidationError } from '../common/errors/assistant.errors';
import { validateArgs } from '../common/validation/validate-args';
import { MarketNews } from '../market-data/entities/market-news.entity';
import { StockQuote } from '../market-data/entities/stock-quote.entity';
import { SUPPORTED_CURRENCIES } from './currency-rates';
import {
  AnalyzePortfolioArgsDto,
  CalculateReturnsArgsDto,
  CurrencyConverterArgsDto,
  MarketNewsArgsDto,
  PercentageReturnArgsDto,
  RiskAssessmentArgsDto,
  StockPriceArgsDto,
} from './dto/tool-args.dto';
import { CurrencyConversion } from './entities/currency-conversion.entity';
import { FinancialAnalysis } from './entities/financial-analysis.entity';
import { PortfolioSummary } from './entities/portfolio.entity';
import { RiskAssessment } from './entities/risk-assessment.entity';
import { FinanceToolsService } from './finance-tools.service';

export type ToolOutput =
  | StockQuote
  | MarketNews[]
  | PortfolioSummary
  | FinancialAnalysis
  | CurrencyConversion
  | RiskAssessment;

/** Name, description and JSON-schema parameters, as handed to a model */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

interface RegisteredTool extends ToolDefinition {
  run(args: unknown): ToolOutput;
}

const number = (description: string) => ({ type: 'number', description });
const currency = (description: string) => ({ type: 'string', enum: SUPPORTED_CURRENCIES, description });

/**
 * Catalogue of the mock tools. Arguments are validated with the class-validator
 * DTOs before the service runs, so both HTTP callers and model tool calls see
 * the same InputValidationError messages.
 */
@Injectable()
export class ToolRegistryService {
  private readonly tools: Map<string, RegisteredTool>;

  constructor(private readonly financeTools: FinanceToolsService) {
    this.tools = new Map(this.buildTools().map((tool) => [tool.name, tool]));
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Validates and runs a tool.
   * @throws InputValidationError for unknown tools or invalid arguments
   */
  invoke(name: string, args: unknown): ToolOutput {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new InputValidationError(`Unknown tool "${name}"`);
    }
    return tool.run(args);
  }

  private buildTools(): RegisteredTool[] {
    return [
      {
        name: 'get_stock_price',
        description: 'Get current stock price and recent performance for any stock symbol.',
        parameters: {
          type: 'object',
          properties: { symbol: { type: 'string', description: 'Stock ticker symbol (e.g., AAPL, GOOGL)' } },
          required: ['symbol'],
        },
        run: (raw) => {
          const args = validateArgs(StockPriceArgsDto, raw);
          return this.financeTools.getStockPrice(args.symbol);
        },
      },
      {
        name: 'get_market_news',
        description: 'Get latest market news and financial updates.',
        parameters: {
          type: 'object',
          properties: {
            category: { type: 'string', description: 'Market category (stocks, crypto, economy, tech)' },
            limit: { type: 'integer', minimum: 1, maximum: 20, description: 'Number of news items to return' },
          },
        },
        run: (raw) => {
          const args = validateArgs(MarketNewsArgsDto, raw);
          return this.financeTools.getMarketNews(args.category, args.limit);
        },
      },
      {
        name: 'analyze_portfolio',
        description: 'Analyze portfolio performance and calculate metrics.',
        parameters: {
          type: 'object',
          properties: {
            holdings: {
              type: 'array',
              description: 'List of portfolio holdings',
              items: {
                type: 'object',
                properties: {
                  symbol: { type: 'string', description: 'Stock ticker symbol' },
                  shares: number('Number of shares'),
                  averageCost: number('Average cost per share'),
                },
                required: ['symbol', 'shares', 'averageCost'],
              },
            },
          },
          required: ['holdings'],
        },
        run: (raw) => {
          const args = validateArgs(AnalyzePortfolioArgsDto, raw);
          return this.financeTools.analyzePortfolio(args.holdings);
        },
      },
      {
        name: 'calculate_returns',
        description: 'Calculate investment returns and CAGR over a period.',
        parameters: {
          type: 'object',
          properties: {
            initialInvestment: number('Initial investment amount'),
            finalValue: number('Final portfolio value'),
            periodYears: number('Investment period in years'),
          },
          required: ['initialInvestment', 'finalValue', 'periodYears'],
        },
        run: (raw) => {
          const args = validateArgs(CalculateReturnsArgsDto, raw);
          return this.financeTools.calculateReturns(args.initialInvestment, args.finalValue, args.periodYears);
        },
      },
      {
        name: 'calculate_percentage_return',
        description: 'Calculate the simple percentage return between a start and end value.',
        parameters: {
          type: 'object',
          properties: { start: number('Starting value'), end: number('Ending value') },
          required: ['start', 'end'],
        },
        run: (raw) => {
          const args = validateArgs(PercentageReturnArgsDto, raw);
          return this.financeTools.calculatePercentageReturn(args.start, args.end);
        },
      },
      {
        name: 'currency_converter',
        description: 'Convert between different currencies with current exchange rates.',
        parameters: {
          type: 'object',
          properties: {
            amount: number('Amount to convert'),
            fromCurrency: currency('Source currency code'),
            toCurrency: currency('Target currency code'),
          },
          required: ['amount', 'fromCurrency', 'toCurrency'],
        },
        run: (raw) => {
          const args = validateArgs(CurrencyConverterArgsDto, raw);
          return this.financeTools.convertCurrency(args.amount, args.fromCurrency, args.toCurrency);
        },
      },
      {
        name: 'risk_assessment',
        description: 'Assess portfolio risk from beta and volatility and provide recommendations.',
        parameters: {
          type: 'object',
          properties: {
            beta: number('Portfolio beta (systematic risk)'),
            volatility: number('Portfolio volatility percentage'),
            diversificationScore: { type: 'integer', minimum: 1, maximum: 10, description: 'Diversification score 1-10' },
          },
          required: ['beta', 'volatility'],
        },
        run: (raw) => {
          const args = validateArgs(RiskAssessmentArgsDto, raw);
          return this.financeTools.assessRisk(args.beta, args.volatility, args.diversificationScore);
        },
      },
    ];
  }
}
