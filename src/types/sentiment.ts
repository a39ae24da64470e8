/**
 * Sentiment Types for Multi-Model Headline Scoring
 */

export type ModelProvider = 'groq' | 'openrouter';

export type SentimentHorizon = '<1h' | '1-4h' | 'same_day' | 'next_open' | '24h';

/**
 * Horizons ordered from shortest to longest
 */
export const SENTIMENT_HORIZONS: readonly SentimentHorizon[] = ['<1h', '1-4h', 'same_day', 'next_open', '24h'];

/**
 * Majority bucket: 1 positive, 0 neutral, -1 negative
 */
export type SentimentDirection = 1 | 0 | -1;

export type ModelOutcomeStatus = 'SUCCESS' | 'ERROR' | 'TIMEOUT' | 'CANCELLED' | 'QUOTA_EXHAUSTED';

export interface ModelSelection {
  modelId: string;
  provider: ModelProvider;
  weight: number;
  enabled: boolean;
}

/**
 * Validated sentiment output of a single model
 */
export interface ModelScore {
  sentiment: number;
  confidence: number;
  horizon: SentimentHorizon;
  rationale: string;
}

export interface ModelVote extends ModelScore {
  voteId: string;
  headlineId: string;
  runId: string;
  modelId: string;
  provider: ModelProvider;
  weight: number;
  responseTimeMs: number;
  createdAt: string;
}

export interface ModelOutcome {
  modelId: string;
  provider: ModelProvider;
  status: ModelOutcomeStatus;
  vote?: ModelVote;
  errorMessage?: string;
  responseTimeMs: number;
}

export interface ModelVoteSummary {
  modelId: string;
  sentiment: number;
  confidence: number;
  horizon: SentimentHorizon;
}

export interface SentimentAggregate {
  headlineId: string;
  runId: string;
  ticker: string;
  publishedAt: string;
  avgSentiment: number;
  avgConfidence: number;
  dispersion: number;
  majorityVote: SentimentDirection;
  horizonVote: SentimentHorizon;
  numModels: number;
  requestedModels: number;
  lowConfidence: boolean;
  modelVotes: ModelVoteSummary[];
  updatedAt: string;
}

/**
 * Result of one orchestration run over a headline
 */
export interface OrchestrationResult {
  headlineId: string;
  runId: string;
  outcomes: ModelOutcome[];
  aggregate: SentimentAggregate | null;
  processingTimeMs: number;
}

export interface BatchOrchestrationResult {
  results: OrchestrationResult[];
  scored: number;
  /** Includes the deferred headlines */
  unscored: number;
  /** Headlines not attempted because a provider's quota ran out */
  deferred: number;
  errors: string[];
}

export interface SentimentAlertHandler {
  alertTotalFailure(headlineId: string, errors: string[]): Promise<void>;
}
