/**
 * Sentiment Consensus - combines the votes of one orchestration run
 *
 * Provides:
 * - Weighted mean of sentiment and confidence (equal weights when none are usable)
 * - Dispersion as the population standard deviation of sentiments
 * - Positive/neutral/negative majority with ties resolved to neutral
 * - Most common horizon with ties resolved to the shorter horizon
 * - Low-confidence flagging when too few of the requested models answered
 */

import { SentimentDirection, SentimentHorizon, SENTIMENT_HORIZONS } from '../types/sentiment';

export interface ConsensusVote {
  sentiment: number;
  confidence: number;
  horizon: SentimentHorizon;
  weight: number;
}

export interface ConsensusOptions {
  /** Sentiments within ±epsilon count as neutral */
  neutralEpsilon: number;
  /** Below this responded/requested fraction the aggregate is low-confidence */
  minResponseFraction: number;
  /** Multiplier applied to the confidence of a low-confidence aggregate */
  lowConfidencePenalty: number;
}

export interface ConsensusResult {
  avgSentiment: number;
  avgConfidence: number;
  dispersion: number;
  majorityVote: SentimentDirection;
  horizonVote: SentimentHorizon;
  numModels: number;
  requestedModels: number;
  lowConfidence: boolean;
}

export const DEFAULT_CONSENSUS_OPTIONS: ConsensusOptions = {
  neutralEpsilon: 0.05,
  minResponseFraction: 0.5,
  lowConfidencePenalty: 0.5
};

export const SentimentConsensus = {
  /**
   * Normalize weights to sum to 1.0. Negative or non-finite weights count as zero;
   * if nothing is left, every value gets the same weight.
   */
  normalizeWeights(weights: number[]): number[] {
    const usable = weights.map(w => (Number.isFinite(w) && w > 0 ? w : 0));
    const sum = usable.reduce((acc, w) => acc + w, 0);

    if (sum <= 0) {
      return weights.map(() => 1 / weights.length);
    }
    return usable.map(w => w / sum);
  },

  /**
   * Weighted mean, bounded by the smallest and largest input
   */
  weightedMean(values: number[], weights: number[]): number {
    if (values.length === 0) {
      return 0;
    }

    const normalized = this.normalizeWeights(weights);
    const mean = values.reduce((acc, value, i) => acc + value * normalized[i], 0);
    return Math.min(Math.max(mean, Math.min(...values)), Math.max(...values));
  },

  populationStdDev(values: number[]): number {
    if (values.length <= 1) {
      return 0;
    }

    const mean = values.reduce((acc, v) => acc + v, 0) / values.length;
    const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
    return Math.sqrt(variance);
  },

  bucket(sentiment: number, epsilon: number): SentimentDirection {
    if (sentiment > epsilon) return 1;
    if (sentiment < -epsilon) return -1;
    return 0;
  },

  majorityVote(sentiments: number[], epsilon: number): SentimentDirection {
    const counts = new Map<SentimentDirection, number>([[1, 0], [0, 0], [-1, 0]]);
    for (const sentiment of sentiments) {
      const direction = this.bucket(sentiment, epsilon);
      counts.set(direction, (counts.get(direction) ?? 0) + 1);
    }

    const max = Math.max(...counts.values());
    const leaders = [...counts.entries()].filter(([, count]) => count === max);
    return leaders.length === 1 ? leaders[0][0] : 0;
  },

  horizonVote(horizons: SentimentHorizon[]): SentimentHorizon {
    let best: SentimentHorizon = 'same_day';
    let bestCount = 0;

    for (const horizon of SENTIMENT_HORIZONS) {
      const count = horizons.filter(h => h === horizon).length;
      if (count > bestCount) {
        best = horizon;
        bestCount = count;
      }
    }
    return best;
  },

  /**
   * Combine the votes of one run
   *
   * @param requestedModels - Number of models the run asked for
   * @returns null when no model responded
   */
  combine(
    votes: ConsensusVote[],
    requestedModels: number,
    options: ConsensusOptions = DEFAULT_CONSENSUS_OPTIONS
  ): ConsensusResult | null {
    if (votes.length === 0) {
      return null;
    }

    const sentiments = votes.map(v => v.sentiment);
    const weights = votes.map(v => v.weight);
    const responseFraction = requestedModels > 0 ? votes.length / requestedModels : 1;
    const lowConfidence = responseFraction < options.minResponseFraction;

    const avgConfidence = this.weightedMean(votes.map(v => v.confidence), weights);

    return {
      avgSentiment: this.weightedMean(sentiments, weights),
      avgConfidence: lowConfidence ? avgConfidence * options.lowConfidencePenalty : avgConfidence,
      dispersion: this.populationStdDev(sentiments),
      majorityVote: this.majorityVote(sentiments, options.neutralEpsilon),
      horizonVote: this.horizonVote(votes.map(v => v.horizon)),
      numModels: votes.length,
      requestedModels: Math.max(requestedModels, votes.length),
      lowConfidence
    };
  }
};
