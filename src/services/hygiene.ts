/**
 * Hygiene Service - retention cleanup for headlines and their derived data
 */

import { HygieneReport } from '../types/pipeline';
import { HeadlineRepository } from '../repositories/headline';
import { ModelVoteRepository } from '../repositories/model-vote';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { PipelineConfigService } from './pipeline-config';
import { OpportunityService } from './opportunity';
import { TickerStatService } from './ticker-stats';
import { throwIfAborted } from '../utils/abort';

const HOUR_MS = 60 * 60 * 1000;

export interface HygieneOptions {
  signal?: AbortSignal;
  now?: Date;
}

export const HygieneService = {
  /**
   * Delete headlines older than the retention period with their votes and
   * aggregates, expire stale opportunities and refresh the ticker stats the
   * deleted aggregates fed into
   */
  async runHygieneCycle(options: HygieneOptions = {}): Promise<HygieneReport> {
    const now = options.now ?? new Date();
    const config = await PipelineConfigService.getConfig();
    const cutoff = new Date(now.getTime() - config.retention.retentionHours * HOUR_MS).toISOString();

    const expired = await HeadlineRepository.listOlderThan(cutoff);
    const headlineIds = expired.map(headline => headline.headlineId);

    let deletedVotes = 0;
    let deletedAggregates = 0;
    let deletedHeadlines = 0;

    if (headlineIds.length > 0) {
      // Derived rows go first; a headline is never deleted while its votes remain
      throwIfAborted(options.signal);
      deletedVotes = await ModelVoteRepository.deleteByHeadlines(headlineIds);
      deletedAggregates = await SentimentAggregateRepository.deleteAggregates(headlineIds);
      deletedHeadlines = await HeadlineRepository.deleteHeadlines(headlineIds);
    }

    throwIfAborted(options.signal);
    const expiredOpportunities = await OpportunityService.expireStale(now);

    const affectedTickers = [...new Set(expired.map(headline => headline.ticker))].sort();

    if (deletedAggregates > 0) {
      TickerStatService.configure({ shiftThreshold: config.aggregation.shiftThreshold });
      await TickerStatService.recompute(now);
    }

    const report: HygieneReport = {
      cutoff,
      deletedHeadlines,
      deletedVotes,
      deletedAggregates,
      expiredOpportunities,
      affectedTickers
    };

    console.log('Hygiene cycle completed:', report);

    return report;
  }
};
