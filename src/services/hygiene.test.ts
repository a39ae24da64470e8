import { HygieneService } from './hygiene';
import { PipelineConfigService, defaultPipelineConfig } from './pipeline-config';
import { OpportunityService } from './opportunity';
import { TickerStatService } from './ticker-stats';
import { HeadlineRepository } from '../repositories/headline';
import { ModelVoteRepository } from '../repositories/model-vote';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { CancelledError } from '../utils/abort';
import { Headline } from '../types/headline';

jest.mock('../repositories/headline');
jest.mock('../repositories/model-vote');
jest.mock('../repositories/sentiment-aggregate');
jest.mock('./opportunity');
jest.mock('./ticker-stats');

const mockHeadlineRepo = HeadlineRepository as jest.Mocked<typeof HeadlineRepository>;
const mockVoteRepo = ModelVoteRepository as jest.Mocked<typeof ModelVoteRepository>;
const mockAggregateRepo = SentimentAggregateRepository as jest.Mocked<typeof SentimentAggregateRepository>;
const mockOpportunityService = OpportunityService as jest.Mocked<typeof OpportunityService>;
const mockTickerStatService = TickerStatService as jest.Mocked<typeof TickerStatService>;

const NOW = new Date('2024-06-12T12:00:00.000Z');

function headline(headlineId: string, ticker: string): Headline {
  return {
    headlineId,
    portfolioId: 'growth',
    ticker,
    text: `${ticker} files quarterly report`,
    normalizedText: 'files quarterly report',
    source: 'Newswire',
    publishedAt: '2024-06-07T09:00:00.000Z',
    firstSeenAt: '2024-06-07T09:05:00.000Z',
    ingestedAt: '2024-06-07T09:05:00.000Z',
    isDuplicate: false,
    isPrimarySource: true,
    marketSession: 'pre'
  };
}

describe('HygieneService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(PipelineConfigService, 'getConfig').mockResolvedValue(defaultPipelineConfig({}));
    mockOpportunityService.expireStale.mockResolvedValue(2);
    mockTickerStatService.recompute.mockResolvedValue({ daily: [], intraday: [], momentum: [] });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('deletes expired headlines with their votes and aggregates', async () => {
    mockHeadlineRepo.listOlderThan.mockResolvedValue([
      headline('h-1', 'INIT'),
      headline('h-2', 'ACME'),
      headline('h-3', 'ACME')
    ]);
    mockVoteRepo.deleteByHeadlines.mockResolvedValue(7);
    mockAggregateRepo.deleteAggregates.mockResolvedValue(2);
    mockHeadlineRepo.deleteHeadlines.mockResolvedValue(3);

    const report = await HygieneService.runHygieneCycle({ now: NOW });

    expect(mockHeadlineRepo.listOlderThan).toHaveBeenCalledWith('2024-06-08T12:00:00.000Z');
    expect(mockVoteRepo.deleteByHeadlines).toHaveBeenCalledWith(['h-1', 'h-2', 'h-3']);
    expect(mockAggregateRepo.deleteAggregates).toHaveBeenCalledWith(['h-1', 'h-2', 'h-3']);
    expect(mockHeadlineRepo.deleteHeadlines).toHaveBeenCalledWith(['h-1', 'h-2', 'h-3']);
    expect(report).toEqual({
      cutoff: '2024-06-08T12:00:00.000Z',
      deletedHeadlines: 3,
      deletedVotes: 7,
      deletedAggregates: 2,
      expiredOpportunities: 2,
      affectedTickers: ['ACME', 'INIT']
    });
  });

  it('deletes derived rows before the headlines', async () => {
    const order: string[] = [];
    mockHeadlineRepo.listOlderThan.mockResolvedValue([headline('h-1', 'ACME')]);
    mockVoteRepo.deleteByHeadlines.mockImplementation(async () => { order.push('votes'); return 1; });
    mockAggregateRepo.deleteAggregates.mockImplementation(async () => { order.push('aggregates'); return 1; });
    mockHeadlineRepo.deleteHeadlines.mockImplementation(async () => { order.push('headlines'); return 1; });

    await HygieneService.runHygieneCycle({ now: NOW });

    expect(order).toEqual(['votes', 'aggregates', 'headlines']);
  });

  it('recomputes ticker stats when aggregates were deleted', async () => {
    mockHeadlineRepo.listOlderThan.mockResolvedValue([headline('h-1', 'ACME')]);
    mockVoteRepo.deleteByHeadlines.mockResolvedValue(3);
    mockAggregateRepo.deleteAggregates.mockResolvedValue(1);
    mockHeadlineRepo.deleteHeadlines.mockResolvedValue(1);

    await HygieneService.runHygieneCycle({ now: NOW });

    expect(mockTickerStatService.configure).toHaveBeenCalledWith({ shiftThreshold: 0.1 });
    expect(mockTickerStatService.recompute).toHaveBeenCalledWith(NOW);
  });

  it('skips deletes and stats when nothing is past retention', async () => {
    mockHeadlineRepo.listOlderThan.mockResolvedValue([]);

    const report = await HygieneService.runHygieneCycle({ now: NOW });

    expect(mockVoteRepo.deleteByHeadlines).not.toHaveBeenCalled();
    expect(mockHeadlineRepo.deleteHeadlines).not.toHaveBeenCalled();
    expect(mockTickerStatService.recompute).not.toHaveBeenCalled();
    expect(mockOpportunityService.expireStale).toHaveBeenCalledWith(NOW);
    expect(report.deletedHeadlines).toBe(0);
    expect(report.expiredOpportunities).toBe(2);
    expect(report.affectedTickers).toEqual([]);
  });

  it('uses the configured retention period', async () => {
    const config = defaultPipelineConfig({});
    jest.spyOn(PipelineConfigService, 'getConfig').mockResolvedValue({
      ...config,
      retention: { ...config.retention, retentionHours: 24 }
    });
    mockHeadlineRepo.listOlderThan.mockResolvedValue([]);

    const report = await HygieneService.runHygieneCycle({ now: NOW });

    expect(report.cutoff).toBe('2024-06-11T12:00:00.000Z');
  });

  it('stops before deleting when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    mockHeadlineRepo.listOlderThan.mockResolvedValue([headline('h-1', 'ACME')]);

    await expect(HygieneService.runHygieneCycle({ now: NOW, signal: controller.signal }))
      .rejects.toThrow(CancelledError);
    expect(mockVoteRepo.deleteByHeadlines).not.toHaveBeenCalled();
  });
});
