/**
 * Pipeline Query Service - read access to headlines, sentiment, ticker stats and opportunities
 */

import { Headline } from '../types/headline';
import { ModelVote, SentimentAggregate } from '../types/sentiment';
import { TickerBucketStat, WindowType } from '../types/ticker-stats';
import { Opportunity, OpportunityQuery } from '../types/opportunity';
import { HeadlineRepository } from '../repositories/headline';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { ModelVoteRepository } from '../repositories/model-vote';
import { TickerStatRepository } from '../repositories/ticker-stat';
import { OpportunityRepository } from '../repositories/opportunity';
import { ResourceNotFoundError } from '../db/access';
import { OpportunityService } from './opportunity';
import { OpportunityScoring } from './opportunity-generator';

const HOUR_MS = 60 * 60 * 1000;

export interface HeadlineSentiment {
  headline: Headline;
  /** Null while the headline is in the unscored backlog */
  aggregate: SentimentAggregate | null;
  votes: ModelVote[];
}

export const PipelineQueryService = {
  /**
   * @throws ResourceNotFoundError if the headline doesn't exist
   */
  async getHeadline(headlineId: string): Promise<Headline> {
    const headline = await HeadlineRepository.getHeadline(headlineId);
    if (!headline) {
      throw new ResourceNotFoundError('Headline', headlineId);
    }
    return headline;
  },

  /**
   * Headlines for a ticker published within the last `hours`, newest first
   */
  async listHeadlines(ticker: string, hours: number, now: Date = new Date()): Promise<Headline[]> {
    const since = new Date(now.getTime() - hours * HOUR_MS).toISOString();
    const headlines = await HeadlineRepository.listByTicker(ticker, since);
    return [...headlines].reverse();
  },

  /**
   * Aggregate and votes of a headline. Votes of the aggregate's run come first.
   */
  async getSentiment(headlineId: string): Promise<HeadlineSentiment> {
    const headline = await this.getHeadline(headlineId);
    const [aggregate, votes] = await Promise.all([
      SentimentAggregateRepository.getAggregate(headlineId),
      ModelVoteRepository.listByHeadline(headlineId)
    ]);

    const runId = aggregate?.runId;
    const ordered = runId
      ? [...votes.filter(v => v.runId === runId), ...votes.filter(v => v.runId !== runId)]
      : votes;

    return { headline, aggregate, votes: ordered };
  },

  async getTickerStats(windowType: WindowType, ticker?: string): Promise<TickerBucketStat[]> {
    if (ticker) {
      const stat = await TickerStatRepository.getStat(windowType, ticker);
      return stat ? [stat] : [];
    }

    const stats = await TickerStatRepository.listByWindow(windowType);
    return [...stats].sort((a, b) => {
      const magnitude = Math.abs(b.momentum ?? b.change ?? 0) - Math.abs(a.momentum ?? a.change ?? 0);
      return magnitude !== 0 ? magnitude : a.ticker.localeCompare(b.ticker);
    });
  },

  /**
   * Opportunities matching the query, ranked by priority, score and ticker
   */
  async listOpportunities(query: OpportunityQuery = {}): Promise<Opportunity[]> {
    const opportunities = query.status
      ? await OpportunityRepository.listByStatus(query.status)
      : await OpportunityRepository.listAll();

    const filtered = opportunities.filter(o =>
      (!query.direction || o.direction === query.direction) &&
      (query.minScore === undefined || o.score >= query.minScore)
    );

    const ranked = OpportunityScoring.rank(filtered);
    return query.limit !== undefined ? ranked.slice(0, query.limit) : ranked;
  },

  async getOpportunity(opportunityId: string): Promise<Opportunity> {
    return OpportunityService.getOpportunity(opportunityId);
  }
};
