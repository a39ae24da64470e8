/**
 * Sentiment Orchestrator - multi-model parallel headline scoring
 *
 * Every enabled model scores a headline concurrently, bounded by a global
 * max-in-flight semaphore and the Fetch Gateway's per-provider quotas. Results
 * that arrive within the per-headline deadline are validated, stored as votes
 * and combined into the headline's aggregate. A failing model never aborts
 * the others; if none answers, no aggregate is written and the headline stays
 * in the unscored backlog. Once a provider's quota is used up, a batch admits
 * no further headlines that need it.
 */

import {
  BatchOrchestrationResult,
  ModelOutcome,
  ModelProvider,
  ModelSelection,
  ModelVote,
  OrchestrationResult,
  SentimentAggregate,
  SentimentAlertHandler
} from '../types/sentiment';
import { Headline } from '../types/headline';
import { GatewayResult } from '../types/gateway';
import { ModelPrompt, SentimentModelResolver } from '../types/sources';
import { FetchGateway } from './fetch-gateway';
import { QuotaExhaustedError } from './gateway-error';
import { ModelResponseValidator } from './model-response-validator';
import { SentimentConsensus, ConsensusOptions, DEFAULT_CONSENSUS_OPTIONS } from './sentiment-consensus';
import { ModelVoteRepository } from '../repositories/model-vote';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { Semaphore } from '../utils/semaphore';
import { CancelledError } from '../utils/abort';
import { generateUUID } from '../utils/ids';

export interface SentimentOrchestratorConfig extends ConsensusOptions {
  maxInFlight: number;
  headlineDeadlineMs: number;
  modelTimeoutMs: number;
  alertOnTotalFailure: boolean;
}

export interface SentimentOrchestratorDependencies {
  gateway: FetchGateway;
  resolver: SentimentModelResolver;
  validator?: ModelResponseValidator;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: SentimentOrchestratorConfig = {
  ...DEFAULT_CONSENSUS_OPTIONS,
  maxInFlight: 4,
  headlineDeadlineMs: 30000,
  modelTimeoutMs: 20000,
  alertOnTotalFailure: true
};

const defaultAlertHandler: SentimentAlertHandler = {
  async alertTotalFailure(headlineId: string, errors: string[]): Promise<void> {
    console.error('Sentiment total failure alert:', { headlineId, errors });
  }
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Sentiment Orchestrator
 */
export class SentimentOrchestrator {
  private config: SentimentOrchestratorConfig;
  private semaphore: Semaphore;
  private alertHandler: SentimentAlertHandler = defaultAlertHandler;
  private gateway: FetchGateway;
  private resolver: SentimentModelResolver;
  private validator: ModelResponseValidator;

  constructor(deps: SentimentOrchestratorDependencies, config: Partial<SentimentOrchestratorConfig> = {}) {
    this.gateway = deps.gateway;
    this.resolver = deps.resolver;
    this.validator = deps.validator ?? new ModelResponseValidator();
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    this.semaphore = new Semaphore(this.config.maxInFlight);
  }

  /**
   * Update the configuration; a new max-in-flight applies to calls not yet started
   */
  configure(config: Partial<SentimentOrchestratorConfig>): void {
    this.config = { ...this.config, ...config };
    this.semaphore.setLimit(this.config.maxInFlight);
  }

  setAlertHandler(handler: SentimentAlertHandler): void {
    this.alertHandler = handler;
  }

  /**
   * Score one headline with every enabled model and store the resulting aggregate
   */
  async analyzeHeadline(
    headline: Headline,
    models: ModelSelection[],
    options: AnalyzeOptions = {}
  ): Promise<OrchestrationResult> {
    const startTime = Date.now();
    const runId = generateUUID();
    const enabled = models.filter(model => model.enabled);

    if (enabled.length === 0) {
      console.warn('No enabled sentiment models, headline left unscored:', { headlineId: headline.headlineId });
      return { headlineId: headline.headlineId, runId, outcomes: [], aggregate: null, processingTimeMs: 0 };
    }

    const runController = new AbortController();
    let deadlineReached = false;
    const deadline = setTimeout(() => {
      deadlineReached = true;
      runController.abort();
    }, this.config.headlineDeadlineMs);
    const onExternalAbort = () => runController.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (options.signal?.aborted) {
      runController.abort();
    }

    const prompt: ModelPrompt = {
      ticker: headline.ticker,
      headline: headline.text,
      source: headline.source,
      publishedAt: headline.publishedAt
    };

    let outcomes: ModelOutcome[];
    try {
      outcomes = await Promise.all(
        enabled.map(selection =>
          this.invokeModel(headline.headlineId, runId, selection, prompt, runController.signal, () => deadlineReached)
        )
      );
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }

    const votes = outcomes.flatMap(outcome => (outcome.vote ? [outcome.vote] : []));
    const consensus = SentimentConsensus.combine(votes, enabled.length, this.config);

    if (!consensus) {
      const errors = outcomes.map(o => `${o.provider}:${o.modelId} ${o.status}${o.errorMessage ? ` ${o.errorMessage}` : ''}`);
      const quotaOnly = outcomes.every(o => o.status === 'QUOTA_EXHAUSTED');
      if (quotaOnly) {
        console.warn('Model quotas exhausted, headline left in backlog:', { headlineId: headline.headlineId });
      } else if (this.config.alertOnTotalFailure && !options.signal?.aborted) {
        await this.alertHandler.alertTotalFailure(headline.headlineId, errors);
      }
      return {
        headlineId: headline.headlineId,
        runId,
        outcomes,
        aggregate: null,
        processingTimeMs: Date.now() - startTime
      };
    }

    const aggregate: SentimentAggregate = {
      headlineId: headline.headlineId,
      runId,
      ticker: headline.ticker,
      publishedAt: headline.publishedAt,
      ...consensus,
      modelVotes: votes.map(v => ({
        modelId: v.modelId,
        sentiment: v.sentiment,
        confidence: v.confidence,
        horizon: v.horizon
      })),
      updatedAt: new Date().toISOString()
    };

    await ModelVoteRepository.putVotes(votes);
    await SentimentAggregateRepository.putAggregate(aggregate);

    if (aggregate.lowConfidence) {
      console.warn('Partial model response, aggregate flagged low confidence:', {
        headlineId: headline.headlineId,
        responded: aggregate.numModels,
        requested: aggregate.requestedModels
      });
    }

    return {
      headlineId: headline.headlineId,
      runId,
      outcomes,
      aggregate,
      processingTimeMs: Date.now() - startTime
    };
  }

  /**
   * Score several headlines. All model calls share the global semaphore and
   * headlines are admitted only as fast as their models can run. After a model
   * reports its provider's quota exhausted, headlines not yet started are
   * deferred unscored.
   */
  async analyzeBatch(
    headlines: Headline[],
    models: ModelSelection[],
    options: AnalyzeOptions = {}
  ): Promise<BatchOrchestrationResult> {
    const enabled = models.filter(m => m.enabled);
    const headlineSlots = new Semaphore(Math.max(1, Math.floor(this.config.maxInFlight / Math.max(1, enabled.length))));
    const exhausted = new Set<ModelProvider>();

    const admit = async (headline: Headline): Promise<OrchestrationResult | null> => {
      if (enabled.some(model => exhausted.has(model.provider))) {
        return null;
      }
      const result = await this.analyzeHeadline(headline, models, options);
      for (const outcome of result.outcomes) {
        if (outcome.status === 'QUOTA_EXHAUSTED') exhausted.add(outcome.provider);
      }
      return result;
    };

    const settled = await Promise.allSettled(
      headlines.map(headline => headlineSlots.run(() => admit(headline), options.signal))
    );

    const results: OrchestrationResult[] = [];
    const errors: string[] = [];
    let unscored = 0;
    let deferred = 0;

    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        if (outcome.value === null) {
          deferred++;
          unscored++;
          return;
        }
        results.push(outcome.value);
        if (!outcome.value.aggregate) unscored++;
        return;
      }

      unscored++;
      if (!(outcome.reason instanceof CancelledError)) {
        const message = `Headline ${headlines[index].headlineId}: ${toError(outcome.reason).message}`;
        console.error('Sentiment analysis failed:', { error: message });
        errors.push(message);
      }
    });

    if (deferred > 0) {
      console.warn('Model quota exhausted, headlines deferred to a later cycle:', {
        providers: [...exhausted],
        deferred
      });
    }

    return {
      results,
      scored: results.filter(r => r.aggregate !== null).length,
      unscored,
      deferred,
      errors
    };
  }

  /**
   * Invoke one model under the semaphore, the gateway and a per-model timeout.
   * Always resolves.
   */
  private async invokeModel(
    headlineId: string,
    runId: string,
    selection: ModelSelection,
    prompt: ModelPrompt,
    runSignal: AbortSignal,
    isDeadlineReached: () => boolean
  ): Promise<ModelOutcome> {
    const startTime = Date.now();
    const { modelId, provider } = selection;
    const modelController = new AbortController();
    const onRunAbort = () => modelController.abort();
    runSignal.addEventListener('abort', onRunAbort, { once: true });
    if (runSignal.aborted) {
      modelController.abort();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'TIMEOUT'>(resolve => {
      timer = setTimeout(() => {
        modelController.abort();
        resolve('TIMEOUT');
      }, this.config.modelTimeoutMs);
    });

    const call = this.semaphore
      .run(
        () => this.gateway.execute(
          `model:${provider}`,
          `score:${modelId}`,
          (signal) => this.resolver.resolve(selection).score(prompt, signal),
          { signal: modelController.signal }
        ),
        modelController.signal
      )
      .catch((error: unknown): GatewayResult<unknown> => (
        error instanceof CancelledError
          ? { status: 'CANCELLED', attempts: 0 }
          : { status: 'FATAL_ERROR', attempts: 0, error: toError(error) }
      ));

    try {
      const result = await Promise.race([call, timeout]);
      const responseTimeMs = Date.now() - startTime;

      if (result === 'TIMEOUT') {
        return {
          modelId, provider, status: 'TIMEOUT', responseTimeMs,
          errorMessage: `Model timed out after ${this.config.modelTimeoutMs}ms`
        };
      }

      if (result.status === 'CANCELLED') {
        return isDeadlineReached()
          ? { modelId, provider, status: 'TIMEOUT', responseTimeMs, errorMessage: 'Headline deadline reached' }
          : { modelId, provider, status: 'CANCELLED', responseTimeMs };
      }

      if (result.status === 'RATE_LIMITED' && result.error instanceof QuotaExhaustedError) {
        return { modelId, provider, status: 'QUOTA_EXHAUSTED', responseTimeMs, errorMessage: result.error.message };
      }

      if (result.status !== 'OK') {
        return { modelId, provider, status: 'ERROR', responseTimeMs, errorMessage: `${result.status}: ${result.error.message}` };
      }

      const validation = this.validator.validate(result.value);
      if (!validation.valid || !validation.score) {
        return {
          modelId, provider, status: 'ERROR', responseTimeMs,
          errorMessage: `Invalid model response: ${validation.errors.map(e => `${e.path} ${e.message}`).join('; ')}`
        };
      }

      const vote: ModelVote = {
        voteId: generateUUID(),
        headlineId,
        runId,
        modelId,
        provider,
        weight: selection.weight,
        ...validation.score,
        responseTimeMs,
        createdAt: new Date().toISOString()
      };

      return { modelId, provider, status: 'SUCCESS', vote, responseTimeMs };
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', onRunAbort);
    }
  }
}
