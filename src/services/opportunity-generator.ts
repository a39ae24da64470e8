/**
 * Opportunity Generator - turns ticker sentiment into ranked trading opportunities
 *
 * Scoring is a weighted sum of five factors in [0, 1]:
 * magnitude, confidence, consensus, recency and volume.
 * Direction comes from the confidence and recency weighted sentiment;
 * risk parameters come from the ticker's market context when one is available.
 */

import {
  MarketContext,
  Opportunity,
  OpportunityDirection,
  OpportunityFactors,
  OpportunityGeneratorConfig,
  OpportunityScoringWeights,
  RiskParameters,
  TimeSensitivity,
  TIME_SENSITIVITY_TIERS,
  GeneratedOpportunity
} from '../types/opportunity';
import { SentimentAggregate, SentimentHorizon } from '../types/sentiment';
import { TickerBucketStat, TickerStatsSet } from '../types/ticker-stats';
import { MarketContextProvider } from '../types/sources';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { OpportunityRepository } from '../repositories/opportunity';
import { SentimentConsensus } from './sentiment-consensus';
import { generateUUID } from '../utils/ids';

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_SCORING_WEIGHTS: OpportunityScoringWeights = {
  magnitude: 0.35,
  confidence: 0.25,
  consensus: 0.15,
  recency: 0.15,
  volume: 0.10
};

export const DEFAULT_OPPORTUNITY_CONFIG: OpportunityGeneratorConfig = {
  lookbackHours: 6,
  minConfidence: 0.6,
  minModels: 2,
  maxSignalDispersion: 0.5,
  directionThreshold: 0.3,
  minScore: 0,
  recencyHalfLifeHours: 3,
  volumeSaturation: 10,
  weights: DEFAULT_SCORING_WEIGHTS,
  stopOffsetPct: 0.02,
  targetOffsetPct: 0.04,
  baselineVolatility: 0.02,
  cooldownMinutes: 60
};

export const HORIZON_SENSITIVITY: Record<SentimentHorizon, TimeSensitivity> = {
  '<1h': 'URGENT',
  '1-4h': 'HIGH',
  'same_day': 'MEDIUM',
  'next_open': 'MEDIUM',
  '24h': 'LOW'
};

export const TIER_EXPIRY_HOURS: Record<TimeSensitivity, number> = {
  URGENT: 1,
  HIGH: 4,
  MEDIUM: 24,
  LOW: 72
};

const MIN_RISK_SCALE = 0.25;
const MAX_RISK_SCALE = 4;
const MAX_STOP_OFFSET = 0.95;
/** A short target can fall at most this far, keeping it above zero */
const MAX_SHORT_TARGET_OFFSET = 0.95;

/**
 * Scored opportunity before it is matched against stored opportunities
 */
type OpportunityFields = Omit<Opportunity, 'opportunityId' | 'ticker' | 'direction' | 'status' | 'generatedAt'>;

export interface OpportunityCandidate {
  ticker: string;
  direction: OpportunityDirection;
  score: number;
  confidence: number;
  weightedSentiment: number;
  factors: OpportunityFactors;
  horizon: SentimentHorizon;
  timeSensitivity: TimeSensitivity;
  riskParameters: RiskParameters | null;
  supportingHeadlineIds: string[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

export const OpportunityScoring = {
  /**
   * Aggregates confident enough, backed by enough models and not neutral
   */
  contributing(aggregates: SentimentAggregate[], config: OpportunityGeneratorConfig): SentimentAggregate[] {
    return aggregates.filter(a =>
      a.avgConfidence >= config.minConfidence &&
      a.numModels >= config.minModels &&
      a.majorityVote !== 0
    );
  },

  /**
   * Exponential decay by headline age: 1 now, 0.5 after one half-life
   */
  recencyDecay(publishedAt: string, now: Date, halfLifeHours: number): number {
    const ageHours = Math.max(0, (now.getTime() - Date.parse(publishedAt)) / HOUR_MS);
    return Math.pow(0.5, ageHours / halfLifeHours);
  },

  computeFactors(
    contributing: SentimentAggregate[],
    now: Date,
    config: OpportunityGeneratorConfig
  ): { factors: OpportunityFactors; weightedSentiment: number } {
    const decays = contributing.map(a => this.recencyDecay(a.publishedAt, now, config.recencyHalfLifeHours));
    const weights = contributing.map((a, i) => a.avgConfidence * decays[i]);
    const weightedSentiment = SentimentConsensus.weightedMean(contributing.map(a => a.avgSentiment), weights);
    const volume = Math.log(1 + contributing.length) / Math.log(1 + config.volumeSaturation);

    return {
      weightedSentiment,
      factors: {
        magnitude: clamp(Math.abs(weightedSentiment), 0, 1),
        confidence: clamp(mean(contributing.map(a => a.avgConfidence)), 0, 1),
        consensus: clamp(1 - mean(contributing.map(a => a.dispersion)), 0, 1),
        recency: clamp(mean(decays), 0, 1),
        volume: clamp(volume, 0, 1)
      }
    };
  },

  compositeScore(factors: OpportunityFactors, weights: OpportunityScoringWeights): number {
    const score =
      factors.magnitude * weights.magnitude +
      factors.confidence * weights.confidence +
      factors.consensus * weights.consensus +
      factors.recency * weights.recency +
      factors.volume * weights.volume;
    return clamp(score, 0, 1);
  },

  direction(weightedSentiment: number, threshold: number): OpportunityDirection | null {
    if (weightedSentiment > threshold) return 'LONG';
    if (weightedSentiment < -threshold) return 'SHORT';
    return null;
  },

  /**
   * Stop and target around the reference price, scaled by beta or volatility
   */
  riskParameters(
    direction: OpportunityDirection,
    context: MarketContext | null,
    config: OpportunityGeneratorConfig
  ): RiskParameters | null {
    if (!context || !Number.isFinite(context.price) || context.price <= 0) {
      return null;
    }

    let scale = 1;
    if (context.beta !== undefined && Number.isFinite(context.beta) && context.beta > 0) {
      scale = context.beta;
    } else if (context.volatility !== undefined && Number.isFinite(context.volatility) && context.volatility > 0) {
      scale = context.volatility / config.baselineVolatility;
    }
    scale = clamp(scale, MIN_RISK_SCALE, MAX_RISK_SCALE);

    const price = context.price;
    const stopOffset = Math.min(config.stopOffsetPct * scale, MAX_STOP_OFFSET);
    const sign = direction === 'LONG' ? 1 : -1;
    const targetOffset = sign > 0
      ? config.targetOffsetPct * scale
      : Math.min(config.targetOffsetPct * scale, MAX_SHORT_TARGET_OFFSET);

    const stopLoss = price * (1 - sign * stopOffset);
    const targetPrice = price * (1 + sign * targetOffset);

    return {
      referencePrice: price,
      entryPrice: price,
      stopLoss,
      targetPrice,
      riskRewardRatio: Math.abs(targetPrice - price) / Math.abs(price - stopLoss)
    };
  },

  /**
   * Tier from the horizon vote, escalated by agreeing momentum and intraday shift
   */
  timeSensitivity(
    horizon: SentimentHorizon,
    direction: OpportunityDirection,
    momentum?: TickerBucketStat,
    intraday?: TickerBucketStat
  ): TimeSensitivity {
    let tier = TIME_SENSITIVITY_TIERS.indexOf(HORIZON_SENSITIVITY[horizon]);
    const sign = direction === 'LONG' ? 1 : -1;

    const slope = momentum?.momentum ?? 0;
    if (slope * sign > 0) {
      if (Math.abs(slope) >= 0.5) tier += 2;
      else if (Math.abs(slope) >= 0.2) tier += 1;
    }

    const agreeingShift = direction === 'LONG' ? 'BULLISH_SHIFT' : 'BEARISH_SHIFT';
    if (intraday?.shift === agreeingShift) {
      tier += 1;
    }

    return TIME_SENSITIVITY_TIERS[Math.min(tier, TIME_SENSITIVITY_TIERS.length - 1)];
  },

  expiresAt(tier: TimeSensitivity, from: Date): string {
    return new Date(from.getTime() + TIER_EXPIRY_HOURS[tier] * HOUR_MS).toISOString();
  },

  /**
   * Score a ticker's recent aggregates
   *
   * @returns null when nothing contributes, signals are mixed, the direction
   * is neutral or the score is below the minimum
   */
  evaluate(
    ticker: string,
    aggregates: SentimentAggregate[],
    stats: { momentum?: TickerBucketStat; intraday?: TickerBucketStat },
    context: MarketContext | null,
    now: Date,
    config: OpportunityGeneratorConfig = DEFAULT_OPPORTUNITY_CONFIG
  ): OpportunityCandidate | null {
    const contributing = this.contributing(aggregates, config);
    if (contributing.length === 0) {
      return null;
    }

    if (SentimentConsensus.populationStdDev(contributing.map(a => a.avgSentiment)) > config.maxSignalDispersion) {
      return null;
    }

    const { factors, weightedSentiment } = this.computeFactors(contributing, now, config);
    const direction = this.direction(weightedSentiment, config.directionThreshold);
    if (!direction) {
      return null;
    }

    const score = this.compositeScore(factors, config.weights);
    if (score < config.minScore) {
      return null;
    }

    const horizon = SentimentConsensus.horizonVote(contributing.map(a => a.horizonVote));

    return {
      ticker,
      direction,
      score,
      confidence: factors.confidence,
      weightedSentiment,
      factors,
      horizon,
      timeSensitivity: this.timeSensitivity(horizon, direction, stats.momentum, stats.intraday),
      riskParameters: this.riskParameters(direction, context, config),
      supportingHeadlineIds: [...contributing]
        .sort((a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt))
        .map(a => a.headlineId)
    };
  },

  /**
   * Priority descending, then score descending, then ticker
   */
  rank(opportunities: Opportunity[]): Opportunity[] {
    return [...opportunities].sort((a, b) => {
      if (b.priority !== a.priority) return b.priority - a.priority;
      if (b.score !== a.score) return b.score - a.score;
      return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
    });
  }
};

/**
 * Opportunity Generator
 */
export class OpportunityGenerator {
  private config: OpportunityGeneratorConfig;
  private marketContext?: MarketContextProvider;

  constructor(marketContext?: MarketContextProvider, config: Partial<OpportunityGeneratorConfig> = {}) {
    this.marketContext = marketContext;
    this.config = { ...DEFAULT_OPPORTUNITY_CONFIG, ...config };
  }

  configure(config: Partial<OpportunityGeneratorConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): OpportunityGeneratorConfig {
    return this.config;
  }

  /**
   * Generate opportunities for every ticker with a daily or intraday stat
   */
  async generateAll(stats: TickerStatsSet, now: Date = new Date()): Promise<GeneratedOpportunity[]> {
    const tickers = [...new Set([...stats.daily, ...stats.intraday].map(s => s.ticker))].sort();
    const generated: GeneratedOpportunity[] = [];

    for (const ticker of tickers) {
      const result = await this.generateForTicker(ticker, stats, now);
      if (result) {
        generated.push(result);
      }
    }

    return generated;
  }

  async generateForTicker(ticker: string, stats: TickerStatsSet, now: Date = new Date()): Promise<GeneratedOpportunity | null> {
    const since = new Date(now.getTime() - this.config.lookbackHours * HOUR_MS);
    const aggregates = (await SentimentAggregateRepository.listByTicker(ticker, since.toISOString()))
      .filter(a => Date.parse(a.publishedAt) <= now.getTime());

    const tickerStats = {
      momentum: stats.momentum.find(s => s.ticker === ticker),
      intraday: stats.intraday.find(s => s.ticker === ticker)
    };

    const candidate = OpportunityScoring.evaluate(ticker, aggregates, tickerStats, null, now, this.config);
    if (!candidate) {
      return null;
    }

    const context = await this.loadMarketContext(ticker);
    const priced: OpportunityCandidate = {
      ...candidate,
      riskParameters: OpportunityScoring.riskParameters(candidate.direction, context, this.config)
    };

    return this.persist(priced, now);
  }

  private async loadMarketContext(ticker: string): Promise<MarketContext | null> {
    if (!this.marketContext) {
      return null;
    }

    try {
      return await this.marketContext.getMarketContext(ticker);
    } catch (error) {
      console.warn('Market context unavailable, generating without risk parameters:', {
        ticker,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  /**
   * Update the ACTIVE opportunity generated within the cool-down, or expire
   * any older ones and create a new opportunity. An update that finds the
   * opportunity no longer ACTIVE creates a new one instead.
   */
  private async persist(candidate: OpportunityCandidate, now: Date): Promise<GeneratedOpportunity> {
    const active = (await OpportunityRepository.findActive(candidate.ticker, candidate.direction))
      .sort((a, b) => Date.parse(b.generatedAt) - Date.parse(a.generatedAt));
    const cooldownMs = this.config.cooldownMinutes * 60 * 1000;
    const timestamp = now.toISOString();

    const fields: OpportunityFields = {
      score: candidate.score,
      priority: Math.round(candidate.score * 100),
      confidence: candidate.confidence,
      weightedSentiment: candidate.weightedSentiment,
      factors: candidate.factors,
      horizon: candidate.horizon,
      timeSensitivity: candidate.timeSensitivity,
      riskParameters: candidate.riskParameters,
      supportingHeadlineIds: candidate.supportingHeadlineIds,
      updatedAt: timestamp,
      expiresAt: OpportunityScoring.expiresAt(candidate.timeSensitivity, now)
    };

    const [latest, ...stale] = active;
    if (latest && now.getTime() - Date.parse(latest.generatedAt) < cooldownMs) {
      for (const opportunity of stale) {
        await OpportunityRepository.updateStatus(opportunity.opportunityId, 'ACTIVE', 'EXPIRED', timestamp);
      }

      const updated: Opportunity = { ...latest, ...fields };
      if (await OpportunityRepository.updateActive(updated)) {
        return { action: 'UPDATED', opportunity: updated };
      }

      console.warn('Opportunity left ACTIVE before its update, creating a new one:', {
        opportunityId: latest.opportunityId,
        ticker: latest.ticker
      });
      return this.create(candidate, fields, timestamp);
    }

    for (const opportunity of active) {
      await OpportunityRepository.updateStatus(opportunity.opportunityId, 'ACTIVE', 'EXPIRED', timestamp);
    }

    return this.create(candidate, fields, timestamp, latest);
  }

  private async create(
    candidate: OpportunityCandidate,
    fields: OpportunityFields,
    timestamp: string,
    replaced?: Opportunity
  ): Promise<GeneratedOpportunity> {
    const opportunity: Opportunity = {
      opportunityId: generateUUID(),
      ticker: candidate.ticker,
      direction: candidate.direction,
      status: 'ACTIVE',
      generatedAt: timestamp,
      ...fields
    };
    await OpportunityRepository.putOpportunity(opportunity);

    console.log('Opportunity generated:', {
      opportunityId: opportunity.opportunityId,
      ticker: opportunity.ticker,
      direction: opportunity.direction,
      priority: opportunity.priority
    });

    return replaced
      ? { action: 'REPLACED', opportunity, expiredOpportunityId: replaced.opportunityId }
      : { action: 'CREATED', opportunity };
  }
}
