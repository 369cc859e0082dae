export type RiskBucket = 'low' | 'moderate' | 'moderate-high' | 'high';

export interface RiskAssessment {
  bucket: RiskBucket;
  beta: number;
  volatility: number;              // percent
  diversificationScore?: number;   // 1-10
  recommendations: string[];
}
