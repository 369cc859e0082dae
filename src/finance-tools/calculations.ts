import Decimal from 'decimal.js';
import { InputValidationError } from '../common/errors/assistant.errors';
import { toDecimal, toFixed2, toMoney, toNumber } from '../common/utils/decimal.util';
import { EXCHANGE_RATES, SUPPORTED_CURRENCIES, isSupportedCurrency } from './currency-rates';
import { CurrencyConversion } from './entities/currency-conversion.entity';
import { FinancialAnalysis } from './entities/financial-analysis.entity';
import { PortfolioHolding, PortfolioSummary, PositionValuation } from './entities/portfolio.entity';
import { RiskBucket } from './entities/risk-assessment.entity';

// Stateless tool math. Every function validates its primitives first and
// throws InputValidationError before computing anything.

export function requirePositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InputValidationError(`${name} must be a positive number, got ${value}`);
  }
}

export function requireNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InputValidationError(`${name} must be zero or greater, got ${value}`);
  }
}

/** (end - start) / start, as a percentage with 2 dp */
export function percentageReturn(start: number, end: number): number {
  requirePositive(start, 'Start value');
  requireNonNegative(end, 'End value');

  return toMoney(toDecimal(end).minus(start).dividedBy(start).times(100));
}

/** CAGR: (end / start)^(1 / years) - 1, as a percentage with 2 dp */
export function compoundAnnualGrowthRate(start: number, end: number, years: number): number {
  requirePositive(start, 'Initial investment');
  requireNonNegative(end, 'Final value');
  requirePositive(years, 'Period in years');

  const growth = toDecimal(end).dividedBy(start);
  return toMoney(growth.pow(toDecimal(1).dividedBy(years)).minus(1).times(100));
}

export function analyzeReturns(initialInvestment: number, finalValue: number, periodYears: number): FinancialAnalysis {
  const cagr = compoundAnnualGrowthRate(initialInvestment, finalValue, periodYears);
  const totalReturn = percentageReturn(initialInvestment, finalValue);
  const direction = totalReturn >= 0 ? 'grew' : 'fell';
  const unit = periodYears === 1 ? 'year' : 'years';

  let recommendation: string;
  if (cagr > 10) {
    recommendation = 'Excellent performance! Consider maintaining your strategy.';
  } else if (cagr > 5) {
    recommendation = 'Good performance. Continue monitoring and diversifying.';
  } else {
    recommendation = 'Review investment strategy for better returns.';
  }

  return {
    metric: 'CAGR',
    value: cagr,
    interpretation:
      `Your investment ${direction} by ${toFixed2(Math.abs(totalReturn))}% over ${periodYears} ${unit}. ` +
      `Annualized return: ${toFixed2(cagr)}%`,
    recommendation,
  };
}

export function analyzePercentageReturn(start: number, end: number): FinancialAnalysis {
  const value = percentageReturn(start, end);
  const gain = toDecimal(end).minus(start);

  return {
    metric: 'Percentage Return',
    value,
    interpretation: `Moving from ${toFixed2(start)} to ${toFixed2(end)} is a ${toFixed2(value)}% return (${gain.isNegative() ? '' : '+'}${toFixed2(gain)}).`,
    recommendation:
      value >= 0 ? 'Positive return. Compare it against a benchmark over the same period.' : 'Negative return. Review the position against your original thesis.',
  };
}

// First row whose beta OR volatility threshold is met wins.
export const RISK_THRESHOLDS: ReadonlyArray<{ bucket: RiskBucket; minBeta: number; minVolatility: number }> = [
  { bucket: 'high', minBeta: 1.5, minVolatility: 30 },
  { bucket: 'moderate-high', minBeta: 1.1, minVolatility: 20 },
  { bucket: 'moderate', minBeta: 0.8, minVolatility: 15 },
];

export function classifyRisk(beta: number, volatility: number): RiskBucket {
  requireNonNegative(beta, 'Beta');
  requireNonNegative(volatility, 'Volatility');

  const row = RISK_THRESHOLDS.find((r) => beta >= r.minBeta || volatility >= r.minVolatility);
  return row ? row.bucket : 'low';
}

const RISK_RECOMMENDATIONS: Record<RiskBucket, string[]> = {
  high: ['Consider reducing high-beta positions', 'Add defensive stocks and bonds', 'Increase cash position'],
  'moderate-high': ['Consider trimming high-beta positions', 'Consider gradual rebalancing'],
  moderate: ['Maintain current allocation', 'Consider gradual rebalancing'],
  low: ['Your portfolio is well-positioned', 'Consider growth opportunities'],
};

export function riskRecommendations(bucket: RiskBucket, diversificationScore?: number): string[] {
  const recommendations = [...RISK_RECOMMENDATIONS[bucket]];
  if (diversificationScore !== undefined && diversificationScore < 6) {
    recommendations.push('Improve diversification across sectors');
  }
  return recommendations;
}

export function normalizeCurrency(raw: string): string {
  const code = raw.trim().toUpperCase();
  if (!isSupportedCurrency(code)) {
    throw new InputValidationError(
      `Unsupported currency "${raw}". Supported: ${SUPPORTED_CURRENCIES.join(', ')}`,
    );
  }
  return code;
}

/** amount / rate(from) × rate(to) over the static USD-based table */
export function convertCurrency(amount: number, fromCurrency: string, toCurrency: string): CurrencyConversion {
  requirePositive(amount, 'Amount');
  const from = normalizeCurrency(fromCurrency);
  const to = normalizeCurrency(toCurrency);

  const fromRate = toDecimal(EXCHANGE_RATES[from]);
  const toRate = toDecimal(EXCHANGE_RATES[to]);

  return {
    amount,
    from,
    to,
    convertedAmount: toNumber(toDecimal(amount).dividedBy(fromRate).times(toRate)),
    rate: toNumber(toRate.dividedBy(fromRate)),
  };
}

export function validateHoldings(holdings: PortfolioHolding[]): void {
  if (holdings.length === 0) {
    throw new InputValidationError('Portfolio must contain at least one holding');
  }
  holdings.forEach((holding) => {
    if (!holding.symbol.trim()) {
      throw new InputValidationError('Symbol must not be empty');
    }
    requirePositive(holding.shares, `Shares for ${holding.symbol}`);
    requirePositive(holding.averageCost, `Average cost for ${holding.symbol}`);
  });
}

/**
 * Values every holding at priceOf(symbol). Holdings are validated up front,
 * so priceOf is never called for a rejected portfolio.
 */
export function valuePortfolio(
  holdings: PortfolioHolding[],
  priceOf: (symbol: string) => number,
): PortfolioSummary {
  validateHoldings(holdings);

  let totalValue = new Decimal(0);
  let totalCost = new Decimal(0);

  const positions: PositionValuation[] = holdings.map((holding) => {
    const symbol = holding.symbol.trim().toUpperCase();
    const shares = toDecimal(holding.shares);
    const currentPrice = toDecimal(priceOf(symbol));
    const cost = shares.times(holding.averageCost);
    const value = shares.times(currentPrice);
    const gainLoss = value.minus(cost);

    totalValue = totalValue.plus(value);
    totalCost = totalCost.plus(cost);

    return {
      symbol,
      shares: holding.shares,
      averageCost: holding.averageCost,
      currentPrice: toMoney(currentPrice),
      currentValue: toMoney(value),
      gainLoss: toMoney(gainLoss),
      gainLossPct: toMoney(gainLoss.dividedBy(cost).times(100)),
    };
  });

  const totalGainLoss = totalValue.minus(totalCost);

  return {
    positions,
    totalValue: toMoney(totalValue),
    totalCost: toMoney(totalCost),
    totalGainLoss: toMoney(totalGainLoss),
    gainLossPercent: toMoney(totalGainLoss.dividedBy(totalCost).times(100)),
    numPositions: holdings.length,
  };
}
