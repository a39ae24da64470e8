/**
 * Pipeline Cycle Report Types
 */

import { GatewayStatus } from './gateway';
import { GenerationAction } from './opportunity';
import { OrchestrationResult } from './sentiment';

export type PortfolioIngestionStatus = 'SUCCESS' | 'SKIPPED' | 'ERROR';

export interface PortfolioIngestionResult {
  portfolioId: string;
  status: PortfolioIngestionStatus;
  fetched: number;
  persisted: number;
  duplicates: number;
  alreadyStored: number;
  tickers: string[];
  newPrimaryIds: string[];
  durationMs: number;
  gatewayStatus?: GatewayStatus;
  error?: string;
}

export type CycleStatus = 'COMPLETED' | 'PARTIAL' | 'DISABLED' | 'SKIPPED';

export interface CycleReport {
  cycleId: string;
  status: CycleStatus;
  startedAt: string;
  completedAt: string;
  portfolios: PortfolioIngestionResult[];
  scored: number;
  unscored: number;
  tickerStats: number;
  opportunities: Record<GenerationAction, number>;
  errors: string[];
}

/**
 * Outcome of an on-demand re-analysis of stored headlines
 */
export interface ReanalysisReport {
  headlineIds: string[];
  scored: number;
  unscored: number;
  results: OrchestrationResult[];
  tickerStats: number;
  opportunities: Record<GenerationAction, number>;
  errors: string[];
}

export interface HygieneReport {
  cutoff: string;
  deletedHeadlines: number;
  deletedVotes: number;
  deletedAggregates: number;
  expiredOpportunities: number;
  affectedTickers: string[];
}
