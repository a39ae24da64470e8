/**
 * Trading Opportunity Types
 */

import { SentimentHorizon } from './sentiment';

export type OpportunityDirection = 'LONG' | 'SHORT';

export type OpportunityStatus = 'ACTIVE' | 'EXECUTED' | 'EXPIRED' | 'CANCELLED';

export type TimeSensitivity = 'URGENT' | 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * Tiers ordered from least to most time-sensitive
 */
export const TIME_SENSITIVITY_TIERS: readonly TimeSensitivity[] = ['LOW', 'MEDIUM', 'HIGH', 'URGENT'];

export interface OpportunityFactors {
  magnitude: number;
  confidence: number;
  consensus: number;
  recency: number;
  volume: number;
}

export interface RiskParameters {
  referencePrice: number;
  entryPrice: number;
  stopLoss: number;
  targetPrice: number;
  riskRewardRatio: number;
}

export interface Opportunity {
  opportunityId: string;
  ticker: string;
  direction: OpportunityDirection;
  score: number;
  priority: number;
  confidence: number;
  weightedSentiment: number;
  factors: OpportunityFactors;
  horizon: SentimentHorizon;
  timeSensitivity: TimeSensitivity;
  riskParameters: RiskParameters | null;
  supportingHeadlineIds: string[];
  status: OpportunityStatus;
  generatedAt: string;
  updatedAt: string;
  expiresAt: string;
}

/**
 * Market context used to derive risk parameters
 */
export interface MarketContext {
  price: number;
  beta?: number;
  volatility?: number;
}

export interface OpportunityScoringWeights {
  magnitude: number;
  confidence: number;
  consensus: number;
  recency: number;
  volume: number;
}

export interface OpportunityGeneratorConfig {
  lookbackHours: number;
  minConfidence: number;
  minModels: number;
  maxSignalDispersion: number;
  directionThreshold: number;
  minScore: number;
  recencyHalfLifeHours: number;
  volumeSaturation: number;
  weights: OpportunityScoringWeights;
  stopOffsetPct: number;
  targetOffsetPct: number;
  baselineVolatility: number;
  cooldownMinutes: number;
}

export interface OpportunityQuery {
  status?: OpportunityStatus;
  direction?: OpportunityDirection;
  minScore?: number;
  limit?: number;
}

/**
 * Outcome of a generation run for a single ticker
 */
export type GenerationAction = 'CREATED' | 'UPDATED' | 'REPLACED';

export interface GeneratedOpportunity {
  action: GenerationAction;
  opportunity: Opportunity;
  expiredOpportunityId?: string;
}
