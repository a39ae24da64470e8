/**
 * Ingestion Service - fetches, normalizes, deduplicates and stores headlines
 *
 * One portfolio at a time is ingested under a per-portfolio lock so two
 * workers never process the same feed concurrently. Within a worker,
 * portfolios sharing a ticker deduplicate and store that ticker's headlines
 * one after the other, each against the history the previous one wrote.
 */

import { Headline } from '../types/headline';
import { PipelineConfig, DeduplicationSettings } from '../types/pipeline-config';
import { PortfolioIngestionResult } from '../types/pipeline';
import { HeadlineSource } from '../types/sources';
import { FetchGateway } from './fetch-gateway';
import { HeadlineDeduplicator, SimilarityScorer } from './headline-deduplicator';
import { toHeadline } from './headline-normalizer';
import { HeadlineRepository } from '../repositories/headline';
import { IngestionLockRepository, portfolioLockKey } from '../repositories/ingestion-lock';
import { Semaphore } from '../utils/semaphore';
import { generateUUID } from '../utils/ids';

export const HEADLINE_SOURCE_ID = 'headlines';

export interface IngestionServiceDependencies {
  source: HeadlineSource;
  gateway: FetchGateway;
  /** Override of the deduplicator's similarity function */
  scorer?: SimilarityScorer;
  /** Lock owner identity; defaults to a random id per service instance */
  owner?: string;
}

export interface IngestOptions {
  signal?: AbortSignal;
  now?: Date;
}

const HOUR_MS = 60 * 60 * 1000;

function emptyResult(portfolioId: string, status: PortfolioIngestionResult['status'], startTime: number): PortfolioIngestionResult {
  return {
    portfolioId,
    status,
    fetched: 0,
    persisted: 0,
    duplicates: 0,
    alreadyStored: 0,
    tickers: [],
    newPrimaryIds: [],
    durationMs: Date.now() - startTime
  };
}

/**
 * Ingestion Service
 */
export class IngestionService {
  private source: HeadlineSource;
  private gateway: FetchGateway;
  private scorer?: SimilarityScorer;
  private owner: string;
  private deduplicator: HeadlineDeduplicator;
  private tickerLocks = new Map<string, Semaphore>();

  constructor(deps: IngestionServiceDependencies) {
    this.source = deps.source;
    this.gateway = deps.gateway;
    this.scorer = deps.scorer;
    this.owner = deps.owner ?? `worker-${generateUUID()}`;
    this.deduplicator = new HeadlineDeduplicator({ scorer: this.scorer });
  }

  /**
   * Rebuild the deduplicator from the current settings
   */
  configure(settings: DeduplicationSettings): void {
    this.deduplicator = new HeadlineDeduplicator({
      similarityThreshold: settings.similarityThreshold,
      proximityWindowMs: settings.proximityWindowMinutes * 60 * 1000,
      lookbackHours: settings.lookbackHours,
      minTokensForTokenSet: settings.minTokensForTokenSet,
      scorer: this.scorer
    });
  }

  /**
   * Ingest the current headlines of one portfolio
   *
   * Upstream failures are reported in the result; persistence failures propagate.
   */
  async ingestPortfolio(
    portfolioId: string,
    config: Pick<PipelineConfig, 'ingestion'>,
    options: IngestOptions = {}
  ): Promise<PortfolioIngestionResult> {
    const startTime = Date.now();
    const now = options.now ?? new Date();
    const lockKey = portfolioLockKey(portfolioId);

    const lock = await IngestionLockRepository.acquire(lockKey, this.owner, config.ingestion.lockTtlSeconds, now);
    if (!lock) {
      console.log('Portfolio ingestion already in progress, skipping:', { portfolioId });
      return emptyResult(portfolioId, 'SKIPPED', startTime);
    }

    try {
      return await this.ingestLocked(portfolioId, now, startTime, options.signal);
    } finally {
      await this.releaseLock(lockKey, portfolioId);
    }
  }

  private async releaseLock(lockKey: string, portfolioId: string): Promise<void> {
    try {
      const released = await IngestionLockRepository.release(lockKey, this.owner);
      if (!released) {
        console.warn('Ingestion lock expired before release:', { portfolioId });
      }
    } catch (error) {
      // Left to expire by TTL
      console.error('Failed to release ingestion lock:', {
        portfolioId,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private async ingestLocked(
    portfolioId: string,
    now: Date,
    startTime: number,
    signal?: AbortSignal
  ): Promise<PortfolioIngestionResult> {
    const fetched = await this.gateway.execute(
      HEADLINE_SOURCE_ID,
      `fetch:${portfolioId}`,
      (callSignal) => this.source.fetchHeadlines(portfolioId, callSignal),
      { signal }
    );

    if (fetched.status !== 'OK') {
      const error = fetched.status === 'CANCELLED' ? 'Headline fetch cancelled' : fetched.error.message;
      console.warn('Headline fetch failed:', { portfolioId, status: fetched.status, error });
      return {
        ...emptyResult(portfolioId, 'ERROR', startTime),
        gatewayStatus: fetched.status,
        error
      };
    }

    const unique = new Map<string, Headline>();
    for (const raw of fetched.value) {
      const headline = toHeadline(raw, portfolioId, now);
      if (!unique.has(headline.headlineId)) {
        unique.set(headline.headlineId, headline);
      }
    }

    const existing = await HeadlineRepository.findExistingIds([...unique.keys()]);
    const fresh = [...unique.values()].filter(h => !existing.has(h.headlineId));
    const tickers = [...new Set(fresh.map(h => h.ticker))].sort();

    const { persisted, duplicates, alreadyStored, newPrimaryIds } = await this.withTickerLocks(
      tickers,
      () => this.deduplicateAndStore(fresh, tickers, now),
      signal
    );

    const result: PortfolioIngestionResult = {
      portfolioId,
      status: 'SUCCESS',
      fetched: fetched.value.length,
      persisted,
      duplicates,
      alreadyStored: alreadyStored + existing.size,
      tickers,
      newPrimaryIds,
      durationMs: Date.now() - startTime
    };

    console.log('Portfolio ingested:', {
      portfolioId,
      fetched: result.fetched,
      persisted,
      duplicates,
      alreadyStored: result.alreadyStored
    });

    return result;
  }

  private async deduplicateAndStore(
    fresh: Headline[],
    tickers: string[],
    now: Date
  ): Promise<Pick<PortfolioIngestionResult, 'persisted' | 'duplicates' | 'alreadyStored' | 'newPrimaryIds'>> {
    const historyStart = new Date(now.getTime() - this.deduplicator.lookbackHours * HOUR_MS).toISOString();
    const history: Headline[] = [];
    for (const ticker of tickers) {
      history.push(...await HeadlineRepository.listByTicker(ticker, historyStart));
    }

    const decisions = this.deduplicator.deduplicateBatch(fresh, history);

    let persisted = 0;
    let duplicates = 0;
    let alreadyStored = 0;
    const newPrimaryIds: string[] = [];

    for (const { headline } of decisions) {
      const stored = await HeadlineRepository.putHeadline(headline);
      if (!stored) {
        alreadyStored++;
        continue;
      }

      persisted++;
      if (headline.isDuplicate) {
        duplicates++;
      } else {
        newPrimaryIds.push(headline.headlineId);
      }
    }

    return { persisted, duplicates, alreadyStored, newPrimaryIds };
  }

  /**
   * Run a task holding the lock of every given ticker. Locks are taken in
   * sorted order so two holders never wait on each other.
   */
  private async withTickerLocks<T>(tickers: string[], task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const held: Array<{ ticker: string; release: () => void }> = [];
    try {
      for (const ticker of [...tickers].sort()) {
        let lock = this.tickerLocks.get(ticker);
        if (!lock) {
          lock = new Semaphore(1);
          this.tickerLocks.set(ticker, lock);
        }
        held.push({ ticker, release: await lock.acquire(signal) });
      }
      return await task();
    } finally {
      for (const { ticker, release } of held.reverse()) {
        release();
        const lock = this.tickerLocks.get(ticker);
        if (lock && lock.active === 0 && lock.pending === 0) {
          this.tickerLocks.delete(ticker);
        }
      }
    }
  }
}
