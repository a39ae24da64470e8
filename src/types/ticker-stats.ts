/**
 * Ticker Rollup Types for the Aggregation Engine
 */

import { SentimentHorizon } from './sentiment';

export type WindowType = 'daily' | 'intraday' | 'momentum';

export type SentimentShift = 'BULLISH_SHIFT' | 'BEARISH_SHIFT' | 'STABLE';

/**
 * A scored, non-duplicate headline as seen by the aggregation snapshot
 */
export interface ScoredHeadline {
  headlineId: string;
  ticker: string;
  publishedAt: string;
  sentiment: number;
  confidence: number;
  dispersion: number;
  numModels: number;
  horizon: SentimentHorizon;
  majorityVote: 1 | 0 | -1;
}

export interface TickerBucketStat {
  windowType: WindowType;
  ticker: string;
  currentSentiment: number;
  previousSentiment: number | null;
  change: number | null;
  momentum: number | null;
  shift: SentimentShift;
  headlineCount: number;
  previousHeadlineCount: number;
  bucketCount: number;
  confidence: number;
  computedAt: string;
}

export interface WindowDefinition {
  windowMs: number;
}

export interface AggregationConfig {
  daily: WindowDefinition;
  intraday: WindowDefinition;
  momentumLookbackMs: number;
  momentumBucketMs: number;
  shiftThreshold: number;
}

export interface TickerStatsSet {
  daily: TickerBucketStat[];
  intraday: TickerBucketStat[];
  momentum: TickerBucketStat[];
}
