/**
 * Headline sentiment pipeline public API
 */

export * from './types/gateway';
export * from './types/headline';
export * from './types/opportunity';
export * from './types/pipeline';
export * from './types/pipeline-config';
export * from './types/scheduler';
export * from './types/sentiment';
export * from './types/sources';
export * from './types/ticker-stats';

export { FetchGateway, RetryPolicy, DEFAULT_RETRY_POLICY, DEFAULT_SOURCE_QUOTA, unwrap } from './services/fetch-gateway';
export {
  GatewayError,
  RateLimitedError,
  QuotaExhaustedError,
  TransientError,
  FatalError,
  GatewayErrorClassifier,
  parseRetryAfterHeader
} from './services/gateway-error';
export { HeadlineDeduplicator, editRatio, tokenSetRatio } from './services/headline-deduplicator';
export { toHeadline, createHeadlineId, normalizeText, marketSession } from './services/headline-normalizer';
export { ModelCatalog, getFallbackModels } from './services/model-catalog';
export { ModelResponseValidator } from './services/model-response-validator';
export { SentimentConsensus } from './services/sentiment-consensus';
export { SentimentOrchestrator, DEFAULT_ORCHESTRATOR_CONFIG } from './services/sentiment-orchestrator';
export { TickerAggregation } from './services/ticker-aggregation';
export { TickerStatService } from './services/ticker-stats';
export { OpportunityGenerator, OpportunityScoring } from './services/opportunity-generator';
export { OpportunityService, VALID_STATUS_TRANSITIONS } from './services/opportunity';
export { IngestionService } from './services/ingestion';
export { HygieneService } from './services/hygiene';
export { PipelineService, PipelineCycleError } from './services/pipeline';
export { PipelineScheduler, VALID_SCHEDULER_TRANSITIONS, DEFAULT_SCHEDULER_CONFIG } from './services/scheduler';
export { PipelineConfigService, ConfigValidationError } from './services/pipeline-config';
export { PipelineQueryService } from './services/pipeline-query';
export { ResourceNotFoundError, UnprocessedItemsError } from './db/access';
export { InvalidStateTransitionError } from './utils/errors';
export { CancelledError } from './utils/abort';
export { createAnalyzeHeadlineHandler } from './handlers/sentiment';
export { createPipelineWorker, attachShutdownHandlers } from './worker';
export type { PipelineCollaborators, PipelineWorker, PipelineWorkerOptions } from './worker';
