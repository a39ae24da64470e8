/**
 * Pipeline Worker
 *
 * Wires the pipeline services around the external collaborators (headline
 * feed, model clients, catalog, market data) and hands the two loops to the
 * scheduler. The embedding process owns the collaborators and calls
 * `attachShutdownHandlers` so SIGINT/SIGTERM stop the scheduler cleanly.
 */

import { FetchGateway, FetchGatewayConfig } from './services/fetch-gateway';
import { IngestionService } from './services/ingestion';
import { SentimentOrchestrator } from './services/sentiment-orchestrator';
import { OpportunityGenerator } from './services/opportunity-generator';
import { ModelCatalog } from './services/model-catalog';
import { PipelineService } from './services/pipeline';
import { HygieneService } from './services/hygiene';
import { PipelineScheduler } from './services/scheduler';
import { Environment } from './services/pipeline-config';
import { SchedulerConfig } from './types/scheduler';
import {
  HeadlineSource,
  MarketContextProvider,
  ModelCatalogSource,
  SentimentModelResolver
} from './types/sources';

export interface PipelineCollaborators {
  headlineSource: HeadlineSource;
  modelResolver: SentimentModelResolver;
  catalogSource?: ModelCatalogSource;
  marketContext?: MarketContextProvider;
}

export interface PipelineWorkerOptions {
  gateway?: FetchGatewayConfig;
  scheduler?: Partial<SchedulerConfig>;
  env?: Environment;
}

export interface PipelineWorker {
  gateway: FetchGateway;
  pipeline: PipelineService;
  scheduler: PipelineScheduler;
}

function parseInterval(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    console.warn('Ignoring invalid scheduler interval:', { value });
    return undefined;
  }
  return parsed;
}

/**
 * Scheduler intervals from INGESTION_INTERVAL_MS and HYGIENE_INTERVAL_MS
 */
export function schedulerConfigFromEnv(env: Environment): Partial<SchedulerConfig> {
  const config: Partial<SchedulerConfig> = {};
  const ingestionIntervalMs = parseInterval(env.INGESTION_INTERVAL_MS);
  const hygieneIntervalMs = parseInterval(env.HYGIENE_INTERVAL_MS);
  if (ingestionIntervalMs !== undefined) config.ingestionIntervalMs = ingestionIntervalMs;
  if (hygieneIntervalMs !== undefined) config.hygieneIntervalMs = hygieneIntervalMs;
  return config;
}

export function createPipelineWorker(
  collaborators: PipelineCollaborators,
  options: PipelineWorkerOptions = {}
): PipelineWorker {
  const env = options.env ?? process.env;
  const gateway = new FetchGateway(options.gateway);

  const pipeline = new PipelineService({
    gateway,
    ingestion: new IngestionService({ source: collaborators.headlineSource, gateway }),
    orchestrator: new SentimentOrchestrator({ gateway, resolver: collaborators.modelResolver }),
    generator: new OpportunityGenerator(collaborators.marketContext),
    catalog: collaborators.catalogSource ? new ModelCatalog(collaborators.catalogSource, gateway) : undefined
  });

  const scheduler = new PipelineScheduler(
    {
      ingestion: (signal) => pipeline.runIngestionCycle({ signal }),
      hygiene: (signal) => HygieneService.runHygieneCycle({ signal })
    },
    { ...schedulerConfigFromEnv(env), ...options.scheduler }
  );

  return { gateway, pipeline, scheduler };
}

/**
 * Stop the scheduler on SIGINT/SIGTERM. Returns a function that removes the handlers.
 */
export function attachShutdownHandlers(
  scheduler: PipelineScheduler,
  onStopped: () => void = () => undefined
): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    console.log('Shutdown signal received, stopping scheduler:', { signal });
    scheduler
      .stop()
      .then(onStopped)
      .catch((error: unknown) => {
        console.error('Scheduler stop failed:', { error: error instanceof Error ? error.message : String(error) });
      });
  };

  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);

  return () => {
    process.removeListener('SIGINT', handler);
    process.removeListener('SIGTERM', handler);
  };
}
