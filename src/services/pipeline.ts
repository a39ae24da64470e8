/**
 * Pipeline Service - one ingestion cycle end to end
 *
 * Cycle order: ingest and deduplicate every portfolio, score new primary
 * headlines plus the unscored backlog, recompute ticker stats from a snapshot
 * read, then generate opportunities. Configuration is reloaded each cycle.
 */

import { CycleReport, CycleStatus, PortfolioIngestionResult, ReanalysisReport } from '../types/pipeline';
import { PipelineConfig } from '../types/pipeline-config';
import { GatewayStatus } from '../types/gateway';
import { Headline } from '../types/headline';
import { BatchOrchestrationResult, ModelSelection } from '../types/sentiment';
import { GenerationAction } from '../types/opportunity';
import { FetchGateway } from './fetch-gateway';
import { IngestionService } from './ingestion';
import { SentimentOrchestrator } from './sentiment-orchestrator';
import { OpportunityGenerator } from './opportunity-generator';
import { ModelCatalog } from './model-catalog';
import { PipelineConfigService } from './pipeline-config';
import { TickerStatService } from './ticker-stats';
import { HeadlineRepository } from '../repositories/headline';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { ResourceNotFoundError } from '../db/access';
import { Semaphore } from '../utils/semaphore';
import { CancelledError, throwIfAborted } from '../utils/abort';
import { generateUUID } from '../utils/ids';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Gateway outcomes that mean a portfolio failed after retries were exhausted or could not help
 */
const ESCALATING_STATUSES: GatewayStatus[] = ['RATE_LIMITED', 'TRANSIENT_ERROR', 'FATAL_ERROR'];

/**
 * Error thrown after a cycle completed with failures that should count
 * against the scheduler loop. Carries the full report.
 */
export class PipelineCycleError extends Error {
  readonly report: CycleReport;
  readonly reasons: string[];

  constructor(report: CycleReport, reasons: string[]) {
    super(`Ingestion cycle ${report.cycleId} failed: ${reasons.join('; ')}`);
    this.name = 'PipelineCycleError';
    this.report = report;
    this.reasons = reasons;
  }
}

export interface PipelineServiceDependencies {
  /** Receives the configured source quotas at the start of every cycle */
  gateway: FetchGateway;
  ingestion: IngestionService;
  orchestrator: SentimentOrchestrator;
  generator: OpportunityGenerator;
  /** When set, enabled models missing from their provider's catalog are skipped */
  catalog?: ModelCatalog;
}

export interface CycleOptions {
  signal?: AbortSignal;
  now?: Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyOpportunityCounts(): Record<GenerationAction, number> {
  return { CREATED: 0, UPDATED: 0, REPLACED: 0 };
}

export class PipelineService {
  private gateway: FetchGateway;
  private ingestion: IngestionService;
  private orchestrator: SentimentOrchestrator;
  private generator: OpportunityGenerator;
  private catalog?: ModelCatalog;

  constructor(deps: PipelineServiceDependencies) {
    this.gateway = deps.gateway;
    this.ingestion = deps.ingestion;
    this.orchestrator = deps.orchestrator;
    this.generator = deps.generator;
    this.catalog = deps.catalog;
  }

  /**
   * Run one ingestion cycle
   *
   * @throws PipelineCycleError when a portfolio failed upstream or scoring hit an
   * unexpected error; the rest of the cycle has completed by then
   * @throws CancelledError when the signal aborts between steps
   */
  async runIngestionCycle(options: CycleOptions = {}): Promise<CycleReport> {
    const startedAt = new Date();
    const now = options.now ?? startedAt;
    const cycleId = generateUUID();
    const config = await PipelineConfigService.getConfig();

    if (!config.ingestionEnabled || config.portfolioIds.length === 0) {
      const status: CycleStatus = config.ingestionEnabled ? 'SKIPPED' : 'DISABLED';
      console.log('Ingestion cycle not run:', { cycleId, status });
      return this.buildReport(cycleId, status, startedAt, [], null, 0, []);
    }

    this.applyConfig(config);

    const portfolios = await this.ingestPortfolios(config, now, options.signal);
    throwIfAborted(options.signal);

    const models = await this.resolveModels(config.models, options.signal);
    const backlog = await this.collectBacklog(portfolios, config, now);

    let batch: BatchOrchestrationResult | null = null;
    if (backlog.length > 0 && models.length > 0) {
      batch = await this.orchestrator.analyzeBatch(backlog, models, { signal: options.signal });
    } else if (backlog.length > 0) {
      console.warn('No enabled sentiment models, headlines left unscored:', { cycleId, backlog: backlog.length });
    }
    throwIfAborted(options.signal);

    const stats = await TickerStatService.recompute(now);
    const generated = await this.generator.generateAll(stats, now);

    const tickerStats = stats.daily.length + stats.intraday.length + stats.momentum.length;
    const unscored = batch ? batch.unscored : backlog.length;
    const hasFailures = portfolios.some(p => p.status === 'ERROR') || unscored > 0;
    const report = this.buildReport(
      cycleId,
      hasFailures ? 'PARTIAL' : 'COMPLETED',
      startedAt,
      portfolios,
      batch,
      tickerStats,
      generated.map(g => g.action),
      unscored
    );

    console.log('Ingestion cycle completed:', {
      cycleId,
      status: report.status,
      portfolios: portfolios.length,
      scored: report.scored,
      unscored: report.unscored,
      deferred: batch?.deferred ?? 0,
      tickerStats,
      opportunities: report.opportunities
    });

    if (report.errors.length > 0) {
      throw new PipelineCycleError(report, report.errors);
    }

    return report;
  }

  /**
   * Score stored headlines again with the current configuration, replacing
   * their aggregates, then refresh ticker stats and opportunities. A duplicate
   * is scored through its primary headline.
   *
   * @throws ResourceNotFoundError when a headline (or its primary) is not stored
   */
  async reanalyze(headlineIds: string[], options: CycleOptions = {}): Promise<ReanalysisReport> {
    const now = options.now ?? new Date();
    const config = await PipelineConfigService.getConfig();
    this.applyConfig(config);

    const headlines = await this.loadPrimaries(headlineIds);
    const models = await this.resolveModels(config.models, options.signal);
    if (models.length === 0) {
      console.warn('No enabled sentiment models, re-analysis skipped:', { headlineIds: headlines.map(h => h.headlineId) });
    }

    const batch = models.length > 0
      ? await this.orchestrator.analyzeBatch(headlines, models, { signal: options.signal })
      : null;
    throwIfAborted(options.signal);

    let tickerStats = 0;
    const opportunities = emptyOpportunityCounts();
    if (batch && batch.scored > 0) {
      const stats = await TickerStatService.recompute(now);
      tickerStats = stats.daily.length + stats.intraday.length + stats.momentum.length;
      for (const generated of await this.generator.generateAll(stats, now)) {
        opportunities[generated.action]++;
      }
    }

    const report: ReanalysisReport = {
      headlineIds: headlines.map(h => h.headlineId),
      scored: batch?.scored ?? 0,
      unscored: batch ? batch.unscored : headlines.length,
      results: batch?.results ?? [],
      tickerStats,
      opportunities,
      errors: batch?.errors ?? []
    };

    console.log('Re-analysis completed:', {
      headlines: report.headlineIds.length,
      scored: report.scored,
      unscored: report.unscored,
      opportunities: report.opportunities
    });

    return report;
  }

  private async loadPrimaries(headlineIds: string[]): Promise<Headline[]> {
    const primaries = new Map<string, Headline>();

    for (const headlineId of new Set(headlineIds)) {
      const headline = await HeadlineRepository.getHeadline(headlineId);
      if (!headline) {
        throw new ResourceNotFoundError('Headline', headlineId);
      }

      const primaryId = headline.isDuplicate ? headline.duplicateOf : undefined;
      if (primaryId === undefined) {
        primaries.set(headline.headlineId, headline);
        continue;
      }
      if (primaries.has(primaryId)) {
        continue;
      }
      const primary = await HeadlineRepository.getHeadline(primaryId);
      if (!primary) {
        throw new ResourceNotFoundError('Headline', primaryId);
      }
      primaries.set(primary.headlineId, primary);
    }

    return [...primaries.values()];
  }

  private applyConfig(config: PipelineConfig): void {
    for (const [sourceId, quota] of Object.entries(config.quotas)) {
      this.gateway.registerSource(sourceId, quota);
    }
    this.ingestion.configure(config.deduplication);
    this.orchestrator.configure(config.orchestrator);
    this.generator.configure(config.opportunities);
    TickerStatService.configure({ shiftThreshold: config.aggregation.shiftThreshold });
  }

  /**
   * Ingest all portfolios with bounded concurrency. A portfolio that throws
   * becomes an ERROR result; the others carry on.
   */
  private async ingestPortfolios(
    config: PipelineConfig,
    now: Date,
    signal?: AbortSignal
  ): Promise<PortfolioIngestionResult[]> {
    const slots = new Semaphore(config.ingestion.portfolioConcurrency);

    return Promise.all(config.portfolioIds.map(portfolioId =>
      slots.run(() => this.ingestion.ingestPortfolio(portfolioId, config, { signal, now }), signal)
        .catch((error: unknown): PortfolioIngestionResult => {
          const cancelled = error instanceof CancelledError;
          if (!cancelled) {
            console.error('Portfolio ingestion failed:', { portfolioId, error: errorMessage(error) });
          }
          return {
            portfolioId,
            status: 'ERROR',
            fetched: 0,
            persisted: 0,
            duplicates: 0,
            alreadyStored: 0,
            tickers: [],
            newPrimaryIds: [],
            durationMs: 0,
            ...(cancelled && { gatewayStatus: 'CANCELLED' as const }),
            error: errorMessage(error)
          };
        })
    ));
  }

  private async resolveModels(models: ModelSelection[], signal?: AbortSignal): Promise<ModelSelection[]> {
    const enabled = models.filter(model => model.enabled);
    if (!this.catalog) {
      return enabled;
    }

    const known: ModelSelection[] = [];
    for (const model of enabled) {
      if (await this.catalog.isKnownModel(model.provider, model.modelId, signal)) {
        known.push(model);
      } else {
        console.warn('Skipping model missing from provider catalog:', {
          provider: model.provider,
          modelId: model.modelId
        });
      }
    }
    return known;
  }

  /**
   * New primary headlines first, then up to maxBacklogPerCycle older unscored
   * primaries within the age limit, newest first
   */
  private async collectBacklog(
    portfolios: PortfolioIngestionResult[],
    config: PipelineConfig,
    now: Date
  ): Promise<Headline[]> {
    const since = new Date(now.getTime() - config.retention.maxHeadlineAgeHours * HOUR_MS).toISOString();
    const primaries = (await HeadlineRepository.listSince(since)).filter(h => !h.isDuplicate);
    if (primaries.length === 0) {
      return [];
    }

    const aggregates = await SentimentAggregateRepository.getAggregates(primaries.map(h => h.headlineId));
    const unscored = primaries.filter(h => !aggregates.has(h.headlineId));

    const newIds = new Set(portfolios.flatMap(p => p.newPrimaryIds));
    const fresh = unscored.filter(h => newIds.has(h.headlineId));
    const older = unscored
      .filter(h => !newIds.has(h.headlineId))
      .sort((a, b) => b.publishedAt.localeCompare(a.publishedAt) || a.headlineId.localeCompare(b.headlineId))
      .slice(0, config.retention.maxBacklogPerCycle);

    return [...fresh, ...older];
  }

  private buildReport(
    cycleId: string,
    status: CycleStatus,
    startedAt: Date,
    portfolios: PortfolioIngestionResult[],
    batch: BatchOrchestrationResult | null,
    tickerStats: number,
    actions: GenerationAction[],
    unscored = 0
  ): CycleReport {
    const errors: string[] = [];
    for (const portfolio of portfolios) {
      if (portfolio.status !== 'ERROR') continue;
      const escalates = portfolio.gatewayStatus === undefined || ESCALATING_STATUSES.includes(portfolio.gatewayStatus);
      if (escalates) {
        errors.push(`Portfolio ${portfolio.portfolioId}: ${portfolio.error ?? 'unknown error'}`);
      }
    }
    errors.push(...(batch?.errors ?? []));

    const opportunities = emptyOpportunityCounts();
    for (const action of actions) {
      opportunities[action]++;
    }

    return {
      cycleId,
      status,
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
      portfolios,
      scored: batch?.scored ?? 0,
      unscored,
      tickerStats,
      opportunities,
      errors
    };
  }
}
