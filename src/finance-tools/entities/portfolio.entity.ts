// Input only; never stored.
export interface PortfolioHolding {
  symbol: string;
  shares: number;
  averageCost: number;
}

export interface PositionValuation {
  symbol: string;
  shares: number;
  averageCost: number;
  currentPrice: number;
  currentValue: number;
  gainLoss: number;
  gainLossPct: number;
}

export interface PortfolioSummary {
  positions: PositionValuation[];
  totalValue: number;
  totalCost: number;
  totalGainLoss: number;
  gainLossPercent: number;
  numPositions: number;
}
