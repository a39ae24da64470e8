/**
 * Ticker Aggregation Engine - per-ticker sentiment rollups
 *
 * Rolls scored primary headlines up into three windows:
 * - daily: last 24h against the 24h before
 * - intraday: last 6h against the 6h before
 * - momentum: least-squares slope of 24h bucket means over the last 72h
 *
 * All functions are pure over a snapshot; persistence lives in TickerStatService.
 */

import {
  AggregationConfig,
  ScoredHeadline,
  SentimentShift,
  TickerBucketStat,
  TickerStatsSet
} from '../types/ticker-stats';
import { SentimentAggregate } from '../types/sentiment';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Tolerance for float noise when comparing a change against the shift threshold
 */
const SHIFT_EPSILON = 1e-9;

export const DEFAULT_AGGREGATION_CONFIG: AggregationConfig = {
  daily: { windowMs: 24 * HOUR_MS },
  intraday: { windowMs: 6 * HOUR_MS },
  momentumLookbackMs: 72 * HOUR_MS,
  momentumBucketMs: 24 * HOUR_MS,
  shiftThreshold: 0.1
};

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function groupByTicker(snapshot: ScoredHeadline[]): Map<string, ScoredHeadline[]> {
  const groups = new Map<string, ScoredHeadline[]>();
  for (const headline of snapshot) {
    const group = groups.get(headline.ticker);
    if (group) group.push(headline);
    else groups.set(headline.ticker, [headline]);
  }
  return groups;
}

/**
 * Headlines published in (end - windowMs, end]
 */
function inWindow(headlines: ScoredHeadline[], end: number, windowMs: number): ScoredHeadline[] {
  return headlines.filter(h => {
    const t = Date.parse(h.publishedAt);
    return t > end - windowMs && t <= end;
  });
}

export const TickerAggregation = {
  /**
   * Look-back needed to compute every window from one snapshot
   */
  snapshotLookbackMs(config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG): number {
    return Math.max(2 * config.daily.windowMs, 2 * config.intraday.windowMs, config.momentumLookbackMs);
  },

  /**
   * Turn a stored aggregate into an aggregation input row
   */
  toScoredHeadline(aggregate: SentimentAggregate): ScoredHeadline {
    return {
      headlineId: aggregate.headlineId,
      ticker: aggregate.ticker,
      publishedAt: aggregate.publishedAt,
      sentiment: aggregate.avgSentiment,
      confidence: aggregate.avgConfidence,
      dispersion: aggregate.dispersion,
      numModels: aggregate.numModels,
      horizon: aggregate.horizonVote,
      majorityVote: aggregate.majorityVote
    };
  },

  classifyShift(value: number, threshold: number): SentimentShift {
    if (value >= threshold - SHIFT_EPSILON) return 'BULLISH_SHIFT';
    if (value <= -threshold + SHIFT_EPSILON) return 'BEARISH_SHIFT';
    return 'STABLE';
  },

  /**
   * Ordinary least-squares slope of y over x
   *
   * @returns null with fewer than two points or a zero denominator
   */
  olsSlope(points: Array<{ x: number; y: number }>): number | null {
    const n = points.length;
    if (n < 2) {
      return null;
    }

    let sumX = 0;
    let sumY = 0;
    let sumXY = 0;
    let sumXX = 0;
    for (const { x, y } of points) {
      sumX += x;
      sumY += y;
      sumXY += x * y;
      sumXX += x * x;
    }

    const denominator = n * sumXX - sumX * sumX;
    if (denominator === 0) {
      return null;
    }
    return (n * sumXY - sumX * sumY) / denominator;
  },

  /**
   * Largest |change| (or |momentum|) first, then ticker
   */
  sortStats(stats: TickerBucketStat[]): TickerBucketStat[] {
    const magnitude = (stat: TickerBucketStat) => Math.abs(stat.momentum ?? stat.change ?? 0);
    return [...stats].sort((a, b) => {
      const diff = magnitude(b) - magnitude(a);
      if (diff !== 0) return diff;
      return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
    });
  },

  /**
   * Current window against the equally long window before it
   */
  computeWindow(
    windowType: 'daily' | 'intraday',
    snapshot: ScoredHeadline[],
    now: Date,
    config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG
  ): TickerBucketStat[] {
    const end = now.getTime();
    const { windowMs } = config[windowType];
    const stats: TickerBucketStat[] = [];

    for (const [ticker, headlines] of groupByTicker(snapshot)) {
      const current = inWindow(headlines, end, windowMs);
      if (current.length === 0) {
        continue;
      }
      const previous = inWindow(headlines, end - windowMs, windowMs);

      const currentSentiment = mean(current.map(h => h.sentiment));
      const previousSentiment = previous.length > 0 ? mean(previous.map(h => h.sentiment)) : null;
      const change = currentSentiment - (previousSentiment ?? 0);

      stats.push({
        windowType,
        ticker,
        currentSentiment,
        previousSentiment,
        change,
        momentum: null,
        shift: this.classifyShift(change, config.shiftThreshold),
        headlineCount: current.length,
        previousHeadlineCount: previous.length,
        bucketCount: previous.length > 0 ? 2 : 1,
        confidence: mean(current.map(h => h.confidence)),
        computedAt: now.toISOString()
      });
    }

    return this.sortStats(stats);
  },

  computeDaily(snapshot: ScoredHeadline[], now: Date, config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG): TickerBucketStat[] {
    return this.computeWindow('daily', snapshot, now, config);
  },

  computeIntraday(snapshot: ScoredHeadline[], now: Date, config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG): TickerBucketStat[] {
    return this.computeWindow('intraday', snapshot, now, config);
  },

  /**
   * Slope of bucket means over the momentum look-back. Bucket 0 is the oldest.
   * Tickers with fewer than two non-empty buckets are left out.
   */
  computeMomentum(
    snapshot: ScoredHeadline[],
    now: Date,
    config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG
  ): TickerBucketStat[] {
    const end = now.getTime();
    const bucketCount = Math.ceil(config.momentumLookbackMs / config.momentumBucketMs);
    const stats: TickerBucketStat[] = [];

    for (const [ticker, headlines] of groupByTicker(snapshot)) {
      const recent = inWindow(headlines, end, config.momentumLookbackMs);
      const buckets: number[][] = Array.from({ length: bucketCount }, () => []);

      for (const headline of recent) {
        const age = end - Date.parse(headline.publishedAt);
        const fromNewest = Math.min(Math.floor(age / config.momentumBucketMs), bucketCount - 1);
        buckets[bucketCount - 1 - fromNewest].push(headline.sentiment);
      }

      const points = buckets.flatMap((values, index) => (values.length > 0 ? [{ x: index, y: mean(values) }] : []));
      const slope = this.olsSlope(points);
      if (slope === null) {
        continue;
      }

      stats.push({
        windowType: 'momentum',
        ticker,
        currentSentiment: points[points.length - 1].y,
        previousSentiment: null,
        change: null,
        momentum: slope,
        shift: this.classifyShift(slope, config.shiftThreshold),
        headlineCount: recent.length,
        previousHeadlineCount: 0,
        bucketCount: points.length,
        confidence: mean(recent.map(h => h.confidence)),
        computedAt: now.toISOString()
      });
    }

    return this.sortStats(stats);
  },

  computeAll(snapshot: ScoredHeadline[], now: Date, config: AggregationConfig = DEFAULT_AGGREGATION_CONFIG): TickerStatsSet {
    return {
      daily: this.computeDaily(snapshot, now, config),
      intraday: this.computeIntraday(snapshot, now, config),
      momentum: this.computeMomentum(snapshot, now, config)
    };
  }
};
