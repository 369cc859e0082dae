import { InputValidationError } from '../common/errors/assistant.errors';
import {
  analyzePercentageReturn,
  analyzeReturns,
  classifyRisk,
  compoundAnnualGrowthRate,
  convertCurrency,
  percentageReturn,
  riskRecommendations,
  valuePortfolio,
} from './calculations';

describe('calculations', () => {
  describe('percentageReturn', () => {
    it('should compute the simple return as a percentage', () => {
      expect(percentageReturn(150, 178.52)).toBe(19.01);
    });

    it('should handle losses', () => {
      expect(percentageReturn(200, 150)).toBe(-25);
    });

    it('should reject a non-positive start value', () => {
      expect(() => percentageReturn(0, 100)).toThrow('Start value must be a positive number, got 0');
      expect(() => percentageReturn(-5, 100)).toThrow(InputValidationError);
    });
  });

  describe('compoundAnnualGrowthRate', () => {
    it('should compute CAGR over several years', () => {
      expect(compoundAnnualGrowthRate(10000, 15000, 3)).toBe(14.47);
    });

    it('should equal the simple return over one year', () => {
      expect(compoundAnnualGrowthRate(5000, 5500, 1)).toBe(10);
    });

    it('should reject a zero period', () => {
      expect(() => compoundAnnualGrowthRate(10000, 15000, 0)).toThrow(
        'Period in years must be a positive number, got 0',
      );
    });
  });

  describe('analyzeReturns', () => {
    it('should describe strong growth', () => {
      const analysis = analyzeReturns(10000, 15000, 3);

      expect(analysis).toEqual({
        metric: 'CAGR',
        value: 14.47,
        interpretation: 'Your investment grew by 50.00% over 3 years. Annualized return: 14.47%',
        recommendation: 'Excellent performance! Consider maintaining your strategy.',
      });
    });

    it('should pick the middle recommendation tier', () => {
      expect(analyzeReturns(1000, 1070, 1).recommendation).toBe(
        'Good performance. Continue monitoring and diversifying.',
      );
    });

    it('should describe a loss', () => {
      const analysis = analyzeReturns(1000, 800, 1);

      expect(analysis.value).toBe(-20);
      expect(analysis.interpretation).toBe('Your investment fell by 20.00% over 1 year. Annualized return: -20.00%');
      expect(analysis.recommendation).toBe('Review investment strategy for better returns.');
    });
  });

  describe('analyzePercentageReturn', () => {
    it('should report the return and absolute gain', () => {
      const analysis = analyzePercentageReturn(150, 178.52);

      expect(analysis.metric).toBe('Percentage Return');
      expect(analysis.value).toBe(19.01);
      expect(analysis.interpretation).toBe('Moving from 150.00 to 178.52 is a 19.01% return (+28.52).');
    });
  });

  describe('classifyRisk', () => {
    it('should map beta 1.2 and 20% volatility to moderate-high', () => {
      expect(classifyRisk(1.2, 20)).toBe('moderate-high');
    });

    it('should walk the threshold table from the top', () => {
      expect(classifyRisk(1.6, 10)).toBe('high');
      expect(classifyRisk(0.5, 35)).toBe('high');
      expect(classifyRisk(0.9, 10)).toBe('moderate');
      expect(classifyRisk(0.5, 16)).toBe('moderate');
      expect(classifyRisk(0.5, 10)).toBe('low');
    });

    it('should reject negative inputs', () => {
      expect(() => classifyRisk(-1, 10)).toThrow('Beta must be zero or greater, got -1');
    });
  });

  describe('riskRecommendations', () => {
    it('should add a diversification hint for low scores', () => {
      expect(riskRecommendations('low', 4)).toEqual([
        'Your portfolio is well-positioned',
        'Consider growth opportunities',
        'Improve diversification across sectors',
      ]);
    });

    it('should not add the hint when no score is given', () => {
      expect(riskRecommendations('moderate')).toEqual(['Maintain current allocation', 'Consider gradual rebalancing']);
    });
  });

  describe('convertCurrency', () => {
    it('should convert through the USD-based rate table', () => {
      const result = convertCurrency(1000, 'usd', 'EUR');

      expect(result).toEqual({ amount: 1000, from: 'USD', to: 'EUR', convertedAmount: 920, rate: 0.92 });
    });

    it('should convert between two non-USD currencies', () => {
      const result = convertCurrency(500, 'GBP', 'JPY');

      expect(result.convertedAmount).toBeCloseTo(94620.25316456, 6);
    });

    it.each([
      ['USD', 'PKR'],
      ['EUR', 'JPY'],
      ['GBP', 'INR'],
      ['CHF', 'AED'],
    ])('should round-trip %s -> %s -> %s', (from, to) => {
      const there = convertCurrency(1234.56, from, to);
      const back = convertCurrency(there.convertedAmount, to, from);

      expect(back.convertedAmount).toBeCloseTo(1234.56, 6);
    });

    it('should reject unknown currencies', () => {
      expect(() => convertCurrency(10, 'USD', 'XYZ')).toThrow(InputValidationError);
      expect(() => convertCurrency(10, 'USD', 'XYZ')).toThrow(/^Unsupported currency "XYZ"/);
    });

    it('should reject a non-positive amount', () => {
      expect(() => convertCurrency(-1, 'USD', 'EUR')).toThrow('Amount must be a positive number, got -1');
    });
  });

  describe('valuePortfolio', () => {
    it('should value holdings and aggregate totals', () => {
      const prices: Record<string, number> = { AAPL: 200, MSFT: 300 };

      const summary = valuePortfolio(
        [
          { symbol: 'aapl', shares: 10, averageCost: 150 },
          { symbol: 'MSFT', shares: 5, averageCost: 400 },
        ],
        (symbol) => prices[symbol],
      );

      expect(summary.positions[0]).toEqual({
        symbol: 'AAPL',
        shares: 10,
        averageCost: 150,
        currentPrice: 200,
        currentValue: 2000,
        gainLoss: 500,
        gainLossPct: 33.33,
      });
      expect(summary.positions[1].gainLoss).toBe(-500);
      expect(summary.totalValue).toBe(3500);
      expect(summary.totalCost).toBe(3500);
      expect(summary.totalGainLoss).toBe(0);
      expect(summary.gainLossPercent).toBe(0);
      expect(summary.numPositions).toBe(2);
    });

    it('should reject negative shares before pricing anything', () => {
      const priceOf = jest.fn().mockReturnValue(100);

      expect(() =>
        valuePortfolio(
          [
            { symbol: 'AAPL', shares: 10, averageCost: 150 },
            { symbol: 'MSFT', shares: -5, averageCost: 400 },
          ],
          priceOf,
        ),
      ).toThrow('Shares for MSFT must be a positive number, got -5');
      expect(priceOf).not.toHaveBeenCalled();
    });

    it('should reject an empty symbol and an empty portfolio', () => {
      expect(() => valuePortfolio([{ symbol: ' ', shares: 1, averageCost: 1 }], () => 1)).toThrow(
        'Symbol must not be empty',
      );
      expect(() => valuePortfolio([], () => 1)).toThrow('Portfolio must contain at least one holding');
    });
  });
});
