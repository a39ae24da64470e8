/**
 * Ticker Stat Service - recomputes and stores the per-ticker rollups
 */

import { AggregationConfig, TickerStatsSet, WindowType } from '../types/ticker-stats';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { TickerStatRepository } from '../repositories/ticker-stat';
import { TickerAggregation, DEFAULT_AGGREGATION_CONFIG } from './ticker-aggregation';

const WINDOW_TYPES: WindowType[] = ['daily', 'intraday', 'momentum'];

let aggregationConfig: AggregationConfig = DEFAULT_AGGREGATION_CONFIG;

export const TickerStatService = {
  configure(config: Partial<AggregationConfig>): void {
    aggregationConfig = { ...aggregationConfig, ...config };
  },

  getConfig(): AggregationConfig {
    return aggregationConfig;
  },

  /**
   * Recompute every window from a single read of the stored aggregates and
   * replace the stored stats of each window
   */
  async recompute(now: Date = new Date()): Promise<TickerStatsSet> {
    const since = new Date(now.getTime() - TickerAggregation.snapshotLookbackMs(aggregationConfig));
    const aggregates = await SentimentAggregateRepository.listSince(since.toISOString());
    const snapshot = aggregates.map(aggregate => TickerAggregation.toScoredHeadline(aggregate));

    const stats = TickerAggregation.computeAll(snapshot, now, aggregationConfig);

    for (const windowType of WINDOW_TYPES) {
      await TickerStatRepository.replaceWindow(windowType, stats[windowType]);
    }

    console.log('Ticker stats recomputed:', {
      aggregates: aggregates.length,
      daily: stats.daily.length,
      intraday: stats.intraday.length,
      momentum: stats.momentum.length
    });

    return stats;
  }
};
