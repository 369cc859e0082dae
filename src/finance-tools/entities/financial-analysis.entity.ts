// Common result shape for the returns, percentage-return and risk tools.
export interface FinancialAnalysis {
  metric: string;
  value: number;
  interpretation: string;
  recommendation: string;
}
