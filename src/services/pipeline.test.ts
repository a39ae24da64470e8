import { PipelineService, PipelineCycleError } from './pipeline';
import { PipelineConfigService, defaultPipelineConfig } from './pipeline-config';
import { IngestionService } from './ingestion';
import { SentimentOrchestrator } from './sentiment-orchestrator';
import { OpportunityGenerator } from './opportunity-generator';
import { TickerStatService } from './ticker-stats';
import { ModelCatalog } from './model-catalog';
import { FetchGateway } from './fetch-gateway';
import { HeadlineRepository } from '../repositories/headline';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { CancelledError } from '../utils/abort';
import { ResourceNotFoundError } from '../db/access';
import { Headline } from '../types/headline';
import { PipelineConfig } from '../types/pipeline-config';
import { PortfolioIngestionResult } from '../types/pipeline';
import { SentimentAggregate } from '../types/sentiment';
import { Opportunity } from '../types/opportunity';
import { TickerBucketStat } from '../types/ticker-stats';

jest.mock('../repositories/headline');
jest.mock('../repositories/sentiment-aggregate');
jest.mock('./ticker-stats');
jest.mock('./ingestion');
jest.mock('./sentiment-orchestrator');
jest.mock('./opportunity-generator');

const mockHeadlineRepo = HeadlineRepository as jest.Mocked<typeof HeadlineRepository>;
const mockAggregateRepo = SentimentAggregateRepository as jest.Mocked<typeof SentimentAggregateRepository>;
const mockTickerStatService = TickerStatService as jest.Mocked<typeof TickerStatService>;

const NOW = new Date('2024-06-12T12:00:00.000Z');

function headline(headlineId: string, publishedAt: string, isDuplicate = false): Headline {
  return {
    headlineId,
    portfolioId: 'growth',
    ticker: 'ACME',
    text: `Acme update ${headlineId}`,
    normalizedText: `update ${headlineId}`,
    source: 'Newswire',
    publishedAt,
    firstSeenAt: publishedAt,
    ingestedAt: publishedAt,
    isDuplicate,
    ...(isDuplicate && { duplicateOf: 'h-new' }),
    isPrimarySource: false,
    marketSession: 'regular'
  };
}

function ingested(portfolioId: string, newPrimaryIds: string[] = []): PortfolioIngestionResult {
  return {
    portfolioId,
    status: 'SUCCESS',
    fetched: newPrimaryIds.length,
    persisted: newPrimaryIds.length,
    duplicates: 0,
    alreadyStored: 0,
    tickers: newPrimaryIds.length > 0 ? ['ACME'] : [],
    newPrimaryIds,
    durationMs: 5
  };
}

function aggregateFor(headlineId: string): SentimentAggregate {
  return {
    headlineId,
    runId: 'run-1',
    ticker: 'ACME',
    publishedAt: '2024-06-12T08:00:00.000Z',
    avgSentiment: 0.4,
    avgConfidence: 0.8,
    dispersion: 0.1,
    majorityVote: 1,
    horizonVote: 'same_day',
    numModels: 2,
    requestedModels: 2,
    lowConfidence: false,
    modelVotes: [],
    updatedAt: '2024-06-12T08:01:00.000Z'
  };
}

const dailyStat: TickerBucketStat = {
  windowType: 'daily',
  ticker: 'ACME',
  currentSentiment: 0.4,
  previousSentiment: null,
  change: 0.4,
  momentum: null,
  shift: 'BULLISH_SHIFT',
  headlineCount: 2,
  previousHeadlineCount: 0,
  bucketCount: 1,
  confidence: 0.8,
  computedAt: NOW.toISOString()
};

const opportunity: Opportunity = {
  opportunityId: 'opp-1',
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
  supportingHeadlineIds: ['h-new'],
  status: 'ACTIVE',
  generatedAt: NOW.toISOString(),
  updatedAt: NOW.toISOString(),
  expiresAt: '2024-06-13T12:00:00.000Z'
};

describe('PipelineService', () => {
  const gateway = new FetchGateway({ sleep: async () => undefined, random: () => 0 });
  const ingestion = new IngestionService({ source: { fetchHeadlines: async () => [] }, gateway });
  const orchestrator = new SentimentOrchestrator({ gateway, resolver: { resolve: () => ({ score: async () => '{}' }) } });
  const generator = new OpportunityGenerator();
  const mockIngest = jest.mocked(ingestion.ingestPortfolio);
  const mockAnalyzeBatch = jest.mocked(orchestrator.analyzeBatch);
  const mockGenerateAll = jest.mocked(generator.generateAll);

  let config: PipelineConfig;

  function useConfig(overrides: Partial<PipelineConfig> = {}): void {
    config = {
      ...defaultPipelineConfig({ PORTFOLIO_IDS: 'growth,income', SENTIMENT_MODELS: 'groq:m1,groq:m2' }),
      ...overrides
    };
    jest.spyOn(PipelineConfigService, 'getConfig').mockResolvedValue(config);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    useConfig();

    mockIngest.mockImplementation(async (portfolioId) =>
      ingested(portfolioId, portfolioId === 'growth' ? ['h-new'] : []));
    mockHeadlineRepo.listSince.mockResolvedValue([
      headline('h-new', '2024-06-12T11:00:00.000Z'),
      headline('h-dup', '2024-06-12T11:05:00.000Z', true),
      headline('h-old', '2024-06-12T06:00:00.000Z'),
      headline('h-scored', '2024-06-12T08:00:00.000Z')
    ]);
    mockAggregateRepo.getAggregates.mockResolvedValue(new Map([['h-scored', aggregateFor('h-scored')]]));
    mockAnalyzeBatch.mockResolvedValue({ results: [], scored: 2, unscored: 0, deferred: 0, errors: [] });
    mockTickerStatService.recompute.mockResolvedValue({ daily: [dailyStat], intraday: [], momentum: [] });
    mockGenerateAll.mockResolvedValue([{ action: 'CREATED', opportunity }]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createService(catalog?: ModelCatalog): PipelineService {
    return new PipelineService({ gateway, ingestion, orchestrator, generator, catalog });
  }

  it('runs ingestion, scoring, aggregation and generation in order', async () => {
    const report = await createService().runIngestionCycle({ now: NOW });

    expect(mockIngest).toHaveBeenCalledTimes(2);
    expect(mockIngest).toHaveBeenCalledWith('growth', config, { signal: undefined, now: NOW });
    expect(mockHeadlineRepo.listSince).toHaveBeenCalledWith('2024-06-11T12:00:00.000Z');
    expect(mockAggregateRepo.getAggregates).toHaveBeenCalledWith(['h-new', 'h-old', 'h-scored']);
    expect(mockAnalyzeBatch).toHaveBeenCalledWith(
      [expect.objectContaining({ headlineId: 'h-new' }), expect.objectContaining({ headlineId: 'h-old' })],
      config.models,
      { signal: undefined }
    );
    expect(mockTickerStatService.recompute).toHaveBeenCalledWith(NOW);
    expect(mockGenerateAll).toHaveBeenCalledWith({ daily: [dailyStat], intraday: [], momentum: [] }, NOW);

    expect(report.status).toBe('COMPLETED');
    expect(report.portfolios.map(p => p.portfolioId)).toEqual(['growth', 'income']);
    expect(report.scored).toBe(2);
    expect(report.unscored).toBe(0);
    expect(report.tickerStats).toBe(1);
    expect(report.opportunities).toEqual({ CREATED: 1, UPDATED: 0, REPLACED: 0 });
    expect(report.errors).toEqual([]);
  });

  it('applies the loaded configuration to every stage', async () => {
    useConfig({
      aggregation: { shiftThreshold: 0.2 },
      quotas: { 'model:groq': { requestsPerWindow: 45, windowMs: 60000 }, headlines: { requestsPerWindow: 5, windowMs: 30000 } }
    });

    await createService().runIngestionCycle({ now: NOW });

    expect(gateway.getQuotaStatus('model:groq').limit).toBe(45);
    expect(gateway.getQuotaStatus('headlines').limit).toBe(5);
    expect(jest.mocked(ingestion.configure)).toHaveBeenCalledWith(config.deduplication);
    expect(jest.mocked(orchestrator.configure)).toHaveBeenCalledWith(config.orchestrator);
    expect(jest.mocked(generator.configure)).toHaveBeenCalledWith(config.opportunities);
    expect(mockTickerStatService.configure).toHaveBeenCalledWith({ shiftThreshold: 0.2 });
  });

  it('reports DISABLED without touching any stage when ingestion is off', async () => {
    useConfig({ ingestionEnabled: false });

    const report = await createService().runIngestionCycle({ now: NOW });

    expect(report.status).toBe('DISABLED');
    expect(report.portfolios).toEqual([]);
    expect(mockIngest).not.toHaveBeenCalled();
    expect(mockTickerStatService.recompute).not.toHaveBeenCalled();
  });

  it('reports SKIPPED when no portfolios are configured', async () => {
    useConfig({ portfolioIds: [] });

    const report = await createService().runIngestionCycle({ now: NOW });

    expect(report.status).toBe('SKIPPED');
    expect(mockIngest).not.toHaveBeenCalled();
  });

  it('caps the older backlog and takes the newest first', async () => {
    useConfig({ retention: { retentionHours: 96, maxHeadlineAgeHours: 24, maxBacklogPerCycle: 1 } });
    mockHeadlineRepo.listSince.mockResolvedValue([
      headline('h-new', '2024-06-12T11:00:00.000Z'),
      headline('h-old', '2024-06-12T06:00:00.000Z'),
      headline('h-older', '2024-06-12T02:00:00.000Z'),
      headline('h-newer', '2024-06-12T09:00:00.000Z')
    ]);
    mockAggregateRepo.getAggregates.mockResolvedValue(new Map());

    await createService().runIngestionCycle({ now: NOW });

    expect(mockAnalyzeBatch.mock.calls[0][0].map(h => h.headlineId)).toEqual(['h-new', 'h-newer']);
  });

  it('marks the cycle PARTIAL when headlines stay unscored', async () => {
    mockAnalyzeBatch.mockResolvedValue({ results: [], scored: 1, unscored: 1, deferred: 0, errors: [] });

    const report = await createService().runIngestionCycle({ now: NOW });

    expect(report.status).toBe('PARTIAL');
    expect(report.unscored).toBe(1);
  });

  it('throws a cycle error after finishing when a portfolio exhausted its retries', async () => {
    mockIngest.mockImplementation(async (portfolioId) => portfolioId === 'growth'
      ? { ...ingested('growth'), status: 'ERROR', gatewayStatus: 'RATE_LIMITED', error: 'Too many requests' }
      : ingested(portfolioId));

    const error = await createService().runIngestionCycle({ now: NOW }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineCycleError);
    if (error instanceof PipelineCycleError) {
      expect(error.reasons).toEqual(['Portfolio growth: Too many requests']);
      expect(error.report.status).toBe('PARTIAL');
      expect(error.report.portfolios[1].status).toBe('SUCCESS');
    }
    expect(mockTickerStatService.recompute).toHaveBeenCalled();
    expect(mockGenerateAll).toHaveBeenCalled();
  });

  it('keeps ingesting other portfolios when one throws', async () => {
    mockIngest.mockImplementation(async (portfolioId) => {
      if (portfolioId === 'income') {
        throw new Error('ProvisionedThroughputExceeded');
      }
      return ingested(portfolioId, ['h-new']);
    });

    const error = await createService().runIngestionCycle({ now: NOW }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineCycleError);
    if (error instanceof PipelineCycleError) {
      expect(error.reasons).toEqual(['Portfolio income: ProvisionedThroughputExceeded']);
      expect(error.report.portfolios[0].status).toBe('SUCCESS');
      expect(error.report.portfolios[1]).toEqual(expect.objectContaining({
        portfolioId: 'income',
        status: 'ERROR',
        error: 'ProvisionedThroughputExceeded'
      }));
    }
    expect(mockAnalyzeBatch).toHaveBeenCalled();
  });

  it('escalates scoring errors', async () => {
    mockAnalyzeBatch.mockResolvedValue({
      results: [],
      scored: 1,
      unscored: 1,
      deferred: 0,
      errors: ['Headline h-old: ProvisionedThroughputExceeded']
    });

    await expect(createService().runIngestionCycle({ now: NOW }))
      .rejects.toThrow('failed: Headline h-old: ProvisionedThroughputExceeded');
  });

  it('does not escalate a cancelled fetch', async () => {
    mockIngest.mockImplementation(async (portfolioId) =>
      ({ ...ingested(portfolioId), status: 'ERROR', gatewayStatus: 'CANCELLED', error: 'Headline fetch cancelled' }));

    const report = await createService().runIngestionCycle({ now: NOW });

    expect(report.status).toBe('PARTIAL');
    expect(report.errors).toEqual([]);
  });

  it('leaves the backlog unscored when no model is enabled', async () => {
    useConfig({ models: [{ modelId: 'm1', provider: 'groq', weight: 1, enabled: false }] });

    const report = await createService().runIngestionCycle({ now: NOW });

    expect(mockAnalyzeBatch).not.toHaveBeenCalled();
    expect(report.unscored).toBe(2);
    expect(report.status).toBe('PARTIAL');
    expect(console.warn).toHaveBeenCalledWith('No enabled sentiment models, headlines left unscored:', {
      cycleId: report.cycleId,
      backlog: 2
    });
  });

  it('skips models missing from the provider catalog', async () => {
    const catalog = new ModelCatalog(
      { listModels: async () => [{ id: 'm1', name: 'Model One', enabled: true }] },
      gateway
    );

    await createService(catalog).runIngestionCycle({ now: NOW });

    expect(mockAnalyzeBatch).toHaveBeenCalledWith(
      expect.any(Array),
      [{ modelId: 'm1', provider: 'groq', weight: 1, enabled: true }],
      { signal: undefined }
    );
  });

  it('stops before aggregation when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createService().runIngestionCycle({ now: NOW, signal: controller.signal }))
      .rejects.toThrow(CancelledError);
    expect(mockIngest).not.toHaveBeenCalled();
    expect(mockTickerStatService.recompute).not.toHaveBeenCalled();
  });

  describe('reanalyze', () => {
    const stored = new Map<string, Headline>([
      ['h-new', headline('h-new', '2024-06-12T11:00:00.000Z')],
      ['h-dup', headline('h-dup', '2024-06-12T11:05:00.000Z', true)],
      ['h-old', headline('h-old', '2024-06-12T06:00:00.000Z')]
    ]);

    beforeEach(() => {
      mockHeadlineRepo.getHeadline.mockImplementation(async (headlineId: string) => stored.get(headlineId) ?? null);
      mockAnalyzeBatch.mockResolvedValue({ results: [], scored: 1, unscored: 0, deferred: 0, errors: [] });
    });

    it('scores stored headlines again and refreshes stats and opportunities', async () => {
      const report = await createService().reanalyze(['h-old', 'h-old'], { now: NOW });

      expect(mockAnalyzeBatch).toHaveBeenCalledWith(
        [expect.objectContaining({ headlineId: 'h-old' })],
        config.models,
        { signal: undefined }
      );
      expect(mockIngest).not.toHaveBeenCalled();
      expect(mockTickerStatService.recompute).toHaveBeenCalledWith(NOW);
      expect(report).toEqual({
        headlineIds: ['h-old'],
        scored: 1,
        unscored: 0,
        results: [],
        tickerStats: 1,
        opportunities: { CREATED: 1, UPDATED: 0, REPLACED: 0 },
        errors: []
      });
    });

    it('scores a duplicate through its primary headline', async () => {
      await createService().reanalyze(['h-dup', 'h-new'], { now: NOW });

      const scored = mockAnalyzeBatch.mock.calls[0][0];
      expect(scored.map(h => h.headlineId)).toEqual(['h-new']);
    });

    it('rejects an unknown headline before scoring anything', async () => {
      await expect(createService().reanalyze(['h-old', 'h-404'], { now: NOW }))
        .rejects.toThrow(new ResourceNotFoundError('Headline', 'h-404'));
      expect(mockAnalyzeBatch).not.toHaveBeenCalled();
    });

    it('skips aggregation when nothing was scored', async () => {
      mockAnalyzeBatch.mockResolvedValue({ results: [], scored: 0, unscored: 1, deferred: 1, errors: [] });

      const report = await createService().reanalyze(['h-old'], { now: NOW });

      expect(report.unscored).toBe(1);
      expect(mockTickerStatService.recompute).not.toHaveBeenCalled();
      expect(mockGenerateAll).not.toHaveBeenCalled();
    });
  });
});
