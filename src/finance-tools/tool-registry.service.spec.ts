import { Test, TestingModule } from '@nestjs/testing';
import { InputValidationError } from '../common/errors/assistant.errors';
import { MarketDataService } from '../market-data/market-data.service';
import { RANDOM_SOURCE } from '../market-data/random.provider';
import { FinanceToolsService } from './finance-tools.service';
import { ToolRegistryService } from './tool-registry.service';

describe('ToolRegistryService', () => {
  let registry: ToolRegistryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ToolRegistryService,
        FinanceToolsService,
        MarketDataService,
        { provide: RANDOM_SOURCE, useValue: () => 0.5 },
      ],
    }).compile();

    registry = module.get<ToolRegistryService>(ToolRegistryService);
  });

  it('should expose every tool definition', () => {
    const names = registry.getDefinitions().map((tool) => tool.name);

    expect(names).toEqual([
      'get_stock_price',
      'get_market_news',
      'analyze_portfolio',
      'calculate_returns',
      'calculate_percentage_return',
      'currency_converter',
      'risk_assessment',
    ]);
    expect(registry.hasTool('get_stock_price')).toBe(true);
    expect(registry.hasTool('place_order')).toBe(false);
  });

  it('should invoke a tool with valid arguments', () => {
    const result = registry.invoke('calculate_returns', {
      initialInvestment: 10000,
      finalValue: 15000,
      periodYears: 3,
    });

    expect(result).toMatchObject({ metric: 'CAGR', value: 14.47 });
  });

  it('should apply DTO defaults for optional arguments', () => {
    const result = registry.invoke('get_market_news', {});

    expect(Array.isArray(result)).toBe(true);
    expect(result).toHaveLength(5);
  });

  it('should default null news arguments', () => {
    const result = registry.invoke('get_market_news', { category: null });

    expect(result).toHaveLength(5);
    expect(result).toEqual(expect.arrayContaining([expect.objectContaining({ category: 'stocks' })]));
  });

  it('should serve generic news for a prototype key used as category', () => {
    const result = registry.invoke('get_market_news', { category: 'constructor', limit: 1 });

    expect(result).toEqual([
      expect.objectContaining({ headline: 'Market Update: Market analysis and insights 1', category: 'constructor' }),
    ]);
  });

  it('should accept lower-case currency codes', () => {
    const result = registry.invoke('currency_converter', { amount: 1000, fromCurrency: 'usd', toCurrency: 'eur' });

    expect(result).toMatchObject({ from: 'USD', to: 'EUR', convertedAmount: 920 });
  });

  it('should reject an empty symbol', () => {
    expect(() => registry.invoke('get_stock_price', { symbol: '' })).toThrow('symbol should not be empty');
  });

  it('should report nested holding errors with their path', () => {
    expect(() =>
      registry.invoke('analyze_portfolio', {
        holdings: [
          { symbol: 'AAPL', shares: 10, averageCost: 150 },
          { symbol: 'MSFT', shares: -5, averageCost: 300 },
        ],
      }),
    ).toThrow('holdings.1.shares must be a positive number');
  });

  it('should reject unexpected properties', () => {
    expect(() => registry.invoke('get_stock_price', { symbol: 'AAPL', exchange: 'NYSE' })).toThrow(
      'property exchange should not exist',
    );
  });

  it('should reject non-object arguments', () => {
    expect(() => registry.invoke('get_stock_price', 'AAPL')).toThrow('Tool arguments must be a JSON object');
  });

  it('should reject unknown tools', () => {
    expect(() => registry.invoke('place_order', {})).toThrow(InputValidationError);
    expect(() => registry.invoke('place_order', {})).toThrow('Unknown tool "place_order"');
  });
});
