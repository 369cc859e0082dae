import { Injectable } from '@nestjs/common';
import { InputValidationError } from '../common/errors/assistant.errors';
import { toFixed2 } from '../common/utils/decimal.util';
import { MarketNews } from '../market-data/entities/market-news.entity';
import { StockQuote } from '../market-data/entities/stock-quote.entity';
import { MarketDataService } from '../market-data/market-data.service';
import {
  analyzePercentageReturn,
  analyzeReturns,
  classifyRisk,
  convertCurrency,
  riskRecommendations,
  valuePortfolio,
} from './calculations';
import { CurrencyConversion } from './entities/currency-conversion.entity';
import { FinancialAnalysis } from './entities/financial-analysis.entity';
import { PortfolioHolding, PortfolioSummary } from './entities/portfolio.entity';
import { RiskAssessment } from './entities/risk-assessment.entity';

// Mock financial tools. Stateless apart from the random source behind quotes.
@Injectable()
export class FinanceToolsService {
  constructor(private readonly marketData: MarketDataService) {}

  getStockPrice(symbol: string): StockQuote {
    return this.marketData.getQuote(symbol);
  }

  getMarketNews(category?: string, limit?: number): MarketNews[] {
    return this.marketData.getNews(category, limit);
  }

  /** Values each holding at a fresh mock quote */
  analyzePortfolio(holdings: PortfolioHolding[]): PortfolioSummary {
    return valuePortfolio(holdings, (symbol) => this.marketData.getQuote(symbol).price);
  }

  calculateReturns(initialInvestment: number, finalValue: number, periodYears: number): FinancialAnalysis {
    return analyzeReturns(initialInvestment, finalValue, periodYears);
  }

  calculatePercentageReturn(start: number, end: number): FinancialAnalysis {
    return analyzePercentageReturn(start, end);
  }

  convertCurrency(amount: number, fromCurrency: string, toCurrency: string): CurrencyConversion {
    return convertCurrency(amount, fromCurrency, toCurrency);
  }

  assessRisk(beta: number, volatility: number, diversificationScore?: number): RiskAssessment {
    if (diversificationScore !== undefined) {
      if (!Number.isInteger(diversificationScore) || diversificationScore < 1 || diversificationScore > 10) {
        throw new InputValidationError(
          `Diversification score must be an integer between 1 and 10, got ${diversificationScore}`,
        );
      }
    }
    const bucket = classifyRisk(beta, volatility);

    return {
      bucket,
      beta,
      volatility,
      diversificationScore,
      recommendations: riskRecommendations(bucket, diversificationScore),
    };
  }

  /** Risk result in the shared FinancialAnalysis shape */
  describeRisk(assessment: RiskAssessment): FinancialAnalysis {
    return {
      metric: 'Risk Level',
      value: assessment.beta,
      interpretation: `Portfolio risk level: ${assessment.bucket}. Beta: ${assessment.beta}, Volatility: ${toFixed2(assessment.volatility)}%`,
      recommendation: assessment.recommendations.join('; '),
    };
  }
}
