import { PipelineQueryService } from './pipeline-query';
import { HeadlineRepository } from '../repositories/headline';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { ModelVoteRepository } from '../repositories/model-vote';
import { TickerStatRepository } from '../repositories/ticker-stat';
import { OpportunityRepository } from '../repositories/opportunity';
import { ResourceNotFoundError } from '../db/access';
import { Headline } from '../types/headline';
import { ModelVote, SentimentAggregate } from '../types/sentiment';
import { Opportunity } from '../types/opportunity';
import { TickerBucketStat } from '../types/ticker-stats';

jest.mock('../repositories/headline');
jest.mock('../repositories/sentiment-aggregate');
jest.mock('../repositories/model-vote');
jest.mock('../repositories/ticker-stat');
jest.mock('../repositories/opportunity');

const mockHeadlineRepo = HeadlineRepository as jest.Mocked<typeof HeadlineRepository>;
const mockAggregateRepo = SentimentAggregateRepository as jest.Mocked<typeof SentimentAggregateRepository>;
const mockVoteRepo = ModelVoteRepository as jest.Mocked<typeof ModelVoteRepository>;
const mockStatRepo = TickerStatRepository as jest.Mocked<typeof TickerStatRepository>;
const mockOpportunityRepo = OpportunityRepository as jest.Mocked<typeof OpportunityRepository>;

const NOW = new Date('2024-06-12T12:00:00.000Z');

function headline(headlineId: string, publishedAt: string): Headline {
  return {
    headlineId,
    portfolioId: 'growth',
    ticker: 'ACME',
    text: `Acme headline ${headlineId}`,
    normalizedText: `headline ${headlineId}`,
    source: 'Newswire',
    publishedAt,
    firstSeenAt: publishedAt,
    ingestedAt: publishedAt,
    isDuplicate: false,
    isPrimarySource: false,
    marketSession: 'regular'
  };
}

function vote(voteId: string, runId: string, createdAt: string): ModelVote {
  return {
    voteId,
    headlineId: 'h-1',
    runId,
    modelId: `model-${voteId}`,
    provider: 'groq',
    weight: 1,
    sentiment: 0.5,
    confidence: 0.8,
    horizon: 'same_day',
    rationale: 'Earnings beat',
    responseTimeMs: 120,
    createdAt
  };
}

function stat(ticker: string, change: number | null, momentum: number | null = null): TickerBucketStat {
  return {
    windowType: momentum === null ? 'daily' : 'momentum',
    ticker,
    currentSentiment: 0.2,
    previousSentiment: null,
    change,
    momentum,
    shift: 'STABLE',
    headlineCount: 1,
    previousHeadlineCount: 0,
    bucketCount: 1,
    confidence: 0.7,
    computedAt: NOW.toISOString()
  };
}

function opportunity(opportunityId: string, overrides: Partial<Opportunity>): Opportunity {
  return {
    opportunityId,
    ticker: 'ACME',
    direction: 'LONG',
    score: 0.7,
    priority: 70,
    confidence: 0.8,
    weightedSentiment: 0.5,
    factors: { magnitude: 0.5, confidence: 0.8, consensus: 0.9, recency: 0.8, volume: 0.3 },
    horizon: 'same_day',
    timeSensitivity: 'MEDIUM',
    riskParameters: null,
    supportingHeadlineIds: ['h-1'],
    status: 'ACTIVE',
    generatedAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    expiresAt: '2024-06-13T12:00:00.000Z',
    ...overrides
  };
}

describe('PipelineQueryService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('headlines', () => {
    it('throws ResourceNotFoundError for an unknown headline', async () => {
      mockHeadlineRepo.getHeadline.mockResolvedValue(null);

      await expect(PipelineQueryService.getHeadline('h-404')).rejects.toThrow(ResourceNotFoundError);
      await expect(PipelineQueryService.getHeadline('h-404')).rejects.toThrow('Headline not found: h-404');
    });

    it('lists a ticker window newest first', async () => {
      mockHeadlineRepo.listByTicker.mockResolvedValue([
        headline('h-1', '2024-06-12T06:00:00.000Z'),
        headline('h-2', '2024-06-12T09:00:00.000Z')
      ]);

      const result = await PipelineQueryService.listHeadlines('ACME', 12, NOW);

      expect(mockHeadlineRepo.listByTicker).toHaveBeenCalledWith('ACME', '2024-06-12T00:00:00.000Z');
      expect(result.map(h => h.headlineId)).toEqual(['h-2', 'h-1']);
    });
  });

  describe('getSentiment', () => {
    it('puts the votes of the current run first', async () => {
      const aggregate: SentimentAggregate = {
        headlineId: 'h-1',
        runId: 'run-2',
        ticker: 'ACME',
        publishedAt: '2024-06-12T06:00:00.000Z',
        avgSentiment: 0.5,
        avgConfidence: 0.8,
        dispersion: 0,
        majorityVote: 1,
        horizonVote: 'same_day',
        numModels: 1,
        requestedModels: 1,
        lowConfidence: false,
        modelVotes: [{ modelId: 'model-v3', sentiment: 0.5, confidence: 0.8, horizon: 'same_day' }],
        updatedAt: '2024-06-12T07:00:00.000Z'
      };
      mockHeadlineRepo.getHeadline.mockResolvedValue(headline('h-1', '2024-06-12T06:00:00.000Z'));
      mockAggregateRepo.getAggregate.mockResolvedValue(aggregate);
      mockVoteRepo.listByHeadline.mockResolvedValue([
        vote('v1', 'run-1', '2024-06-12T06:10:00.000Z'),
        vote('v2', 'run-1', '2024-06-12T06:11:00.000Z'),
        vote('v3', 'run-2', '2024-06-12T07:00:00.000Z')
      ]);

      const result = await PipelineQueryService.getSentiment('h-1');

      expect(result.aggregate).toBe(aggregate);
      expect(result.votes.map(v => v.voteId)).toEqual(['v3', 'v1', 'v2']);
    });

    it('returns a null aggregate for an unscored headline', async () => {
      mockHeadlineRepo.getHeadline.mockResolvedValue(headline('h-1', '2024-06-12T06:00:00.000Z'));
      mockAggregateRepo.getAggregate.mockResolvedValue(null);
      mockVoteRepo.listByHeadline.mockResolvedValue([]);

      const result = await PipelineQueryService.getSentiment('h-1');

      expect(result.aggregate).toBeNull();
      expect(result.votes).toEqual([]);
    });

    it('rejects an unknown headline before reading sentiment', async () => {
      mockHeadlineRepo.getHeadline.mockResolvedValue(null);

      await expect(PipelineQueryService.getSentiment('h-404')).rejects.toThrow(ResourceNotFoundError);
      expect(mockAggregateRepo.getAggregate).not.toHaveBeenCalled();
    });
  });

  describe('getTickerStats', () => {
    it('returns a single ticker when asked', async () => {
      mockStatRepo.getStat.mockResolvedValue(stat('ACME', 0.2));

      await expect(PipelineQueryService.getTickerStats('daily', 'ACME')).resolves.toEqual([stat('ACME', 0.2)]);
      mockStatRepo.getStat.mockResolvedValue(null);
      await expect(PipelineQueryService.getTickerStats('daily', 'INIT')).resolves.toEqual([]);
    });

    it('orders a window by magnitude, then ticker', async () => {
      mockStatRepo.listByWindow.mockResolvedValue([
        stat('INIT', 0.1),
        stat('GLOBX', -0.3),
        stat('ACME', 0.1)
      ]);

      const result = await PipelineQueryService.getTickerStats('daily');

      expect(result.map(s => s.ticker)).toEqual(['GLOBX', 'ACME', 'INIT']);
    });
  });

  describe('listOpportunities', () => {
    it('filters by status, direction and score, then ranks and limits', async () => {
      mockOpportunityRepo.listByStatus.mockResolvedValue([
        opportunity('a', { ticker: 'INIT', priority: 60, score: 0.6 }),
        opportunity('b', { ticker: 'ACME', priority: 80, score: 0.8 }),
        opportunity('c', { ticker: 'GLOBX', direction: 'SHORT', priority: 90, score: 0.9 }),
        opportunity('d', { ticker: 'ZETA', priority: 40, score: 0.4 }),
        opportunity('e', { ticker: 'BETA', priority: 60, score: 0.6 })
      ]);

      const result = await PipelineQueryService.listOpportunities({
        status: 'ACTIVE',
        direction: 'LONG',
        minScore: 0.5,
        limit: 2
      });

      expect(mockOpportunityRepo.listByStatus).toHaveBeenCalledWith('ACTIVE');
      expect(result.map(o => o.opportunityId)).toEqual(['b', 'e']);
    });

    it('scans all opportunities without a status filter', async () => {
      mockOpportunityRepo.listAll.mockResolvedValue([]);

      await expect(PipelineQueryService.listOpportunities()).resolves.toEqual([]);
      expect(mockOpportunityRepo.listByStatus).not.toHaveBeenCalled();
    });
  });
});
