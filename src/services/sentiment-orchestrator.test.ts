import { SentimentOrchestrator } from './sentiment-orchestrator';
import { FetchGateway } from './fetch-gateway';
import { ModelVoteRepository } from '../repositories/model-vote';
import { SentimentAggregateRepository } from '../repositories/sentiment-aggregate';
import { Headline } from '../types/headline';
import { ModelSelection, SentimentAlertHandler } from '../types/sentiment';
import { ModelPrompt, SentimentModel, SentimentModelResolver } from '../types/sources';
import { CancelledError } from '../utils/abort';

jest.mock('../repositories/model-vote');
jest.mock('../repositories/sentiment-aggregate');

const mockVoteRepo = ModelVoteRepository as jest.Mocked<typeof ModelVoteRepository>;
const mockAggregateRepo = SentimentAggregateRepository as jest.Mocked<typeof SentimentAggregateRepository>;

const headline: Headline = {
  headlineId: 'h-1',
  portfolioId: 'growth',
  ticker: 'ACME',
  text: 'Acme beats Q2 estimates',
  normalizedText: 'beats q2 estimates',
  source: 'Reuters',
  publishedAt: '2024-06-12T14:00:00.000Z',
  firstSeenAt: '2024-06-12T14:01:00.000Z',
  ingestedAt: '2024-06-12T14:01:00.000Z',
  isDuplicate: false,
  isPrimarySource: false,
  marketSession: 'regular'
};

function selection(modelId: string, weight = 1, enabled = true): ModelSelection {
  return { modelId, provider: 'groq', weight, enabled };
}

function respond(output: unknown): SentimentModel {
  return { score: async () => output };
}

function fail(error: Error): SentimentModel {
  return { score: async () => { throw error; } };
}

/**
 * A model that only settles when its call is cancelled
 */
function hang(onAbort?: () => void): SentimentModel {
  return {
    score: (_prompt: ModelPrompt, signal?: AbortSignal) => new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => {
        onAbort?.();
        reject(new CancelledError());
      }, { once: true });
    })
  };
}

function resolverFor(models: Record<string, SentimentModel>): SentimentModelResolver {
  return {
    resolve: (sel: ModelSelection) => {
      const model = models[sel.modelId];
      if (!model) throw new Error(`Unknown model ${sel.modelId}`);
      return model;
    }
  };
}

function createOrchestrator(models: Record<string, SentimentModel>, config = {}) {
  const gateway = new FetchGateway({ sleep: async () => undefined, random: () => 0 });
  const alertHandler: jest.Mocked<SentimentAlertHandler> = {
    alertTotalFailure: jest.fn().mockResolvedValue(undefined)
  };
  const orchestrator = new SentimentOrchestrator({ gateway, resolver: resolverFor(models) }, config);
  orchestrator.setAlertHandler(alertHandler);
  return { orchestrator, alertHandler, gateway };
}

const unauthorized = () => Object.assign(new Error('Unauthorized'), { status: 401 });

describe('SentimentOrchestrator', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockVoteRepo.putVotes.mockResolvedValue(undefined);
    mockAggregateRepo.putAggregate.mockResolvedValue(undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('analyzeHeadline', () => {
    it('combines the votes of every responding model', async () => {
      const { orchestrator, alertHandler } = createOrchestrator({
        m1: respond('{"sentiment": 0.8, "confidence": 0.9, "horizon": "1-4h", "rationale": "beat"}'),
        m2: respond({ sentiment: 0.6, confidence: 0.7, horizon: '1-4h' }),
        m3: respond('Answer: {"sentiment": -0.1, "confidence": 0.5, "horizon": "24h"}')
      });

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('m2'), selection('m3')]);

      expect(result.outcomes.map(o => o.status)).toEqual(['SUCCESS', 'SUCCESS', 'SUCCESS']);
      expect(result.aggregate).not.toBeNull();
      expect(result.aggregate?.avgSentiment).toBeCloseTo(0.4333, 3);
      expect(result.aggregate?.avgConfidence).toBeCloseTo(0.7, 6);
      expect(result.aggregate?.majorityVote).toBe(1);
      expect(result.aggregate?.horizonVote).toBe('1-4h');
      expect(result.aggregate?.numModels).toBe(3);
      expect(result.aggregate?.requestedModels).toBe(3);
      expect(result.aggregate?.lowConfidence).toBe(false);
      expect(result.aggregate?.ticker).toBe('ACME');
      expect(result.aggregate?.runId).toBe(result.runId);

      const votes = mockVoteRepo.putVotes.mock.calls[0][0];
      expect(votes).toHaveLength(3);
      expect(votes.every(v => v.runId === result.runId && v.headlineId === 'h-1')).toBe(true);
      expect(votes[0].rationale).toBe('beat');
      expect(votes[1].rationale).toBe('');
      expect(mockAggregateRepo.putAggregate).toHaveBeenCalledWith(result.aggregate);
      expect(alertHandler.alertTotalFailure).not.toHaveBeenCalled();
    });

    it('passes the headline to each model as a prompt', async () => {
      const score = jest.fn().mockResolvedValue({ sentiment: 0.2 });
      const { orchestrator } = createOrchestrator({ m1: { score } });

      await orchestrator.analyzeHeadline(headline, [selection('m1')]);

      expect(score).toHaveBeenCalledWith(
        { ticker: 'ACME', headline: 'Acme beats Q2 estimates', source: 'Reuters', publishedAt: '2024-06-12T14:00:00.000Z' },
        expect.anything()
      );
    });

    it('excludes a failing model without affecting the others', async () => {
      const { orchestrator } = createOrchestrator({
        m1: respond({ sentiment: 0.5, confidence: 0.8 }),
        m2: fail(unauthorized()),
        m3: respond({ sentiment: 0.3, confidence: 0.6 })
      });

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('m2'), selection('m3')]);

      expect(result.outcomes[1]).toMatchObject({ modelId: 'm2', status: 'ERROR' });
      expect(result.outcomes[1].errorMessage).toBe('FATAL_ERROR: Unauthorized');
      expect(result.aggregate?.numModels).toBe(2);
      expect(result.aggregate?.requestedModels).toBe(3);
      expect(result.aggregate?.avgSentiment).toBeCloseTo(0.4, 6);
      expect(result.aggregate?.lowConfidence).toBe(false);
    });

    it('treats an invalid response as a failed model', async () => {
      const { orchestrator } = createOrchestrator({
        m1: respond({ sentiment: 1.7 }),
        m2: respond('not json at all'),
        m3: respond({ sentiment: -0.4 })
      });

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('m2'), selection('m3')]);

      expect(result.outcomes.map(o => o.status)).toEqual(['ERROR', 'ERROR', 'SUCCESS']);
      expect(result.outcomes[0].errorMessage).toMatch(/^Invalid model response: \/sentiment/);
      expect(result.aggregate?.numModels).toBe(1);
      expect(result.aggregate?.lowConfidence).toBe(true);
      expect(result.aggregate?.avgConfidence).toBeCloseTo(0.25, 6);
    });

    it('writes no aggregate and raises an alert when no model responds', async () => {
      const { orchestrator, alertHandler } = createOrchestrator({
        m1: fail(unauthorized()),
        m2: fail(unauthorized())
      });

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('m2')]);

      expect(result.aggregate).toBeNull();
      expect(mockVoteRepo.putVotes).not.toHaveBeenCalled();
      expect(mockAggregateRepo.putAggregate).not.toHaveBeenCalled();
      expect(alertHandler.alertTotalFailure).toHaveBeenCalledWith('h-1', [
        'groq:m1 ERROR FATAL_ERROR: Unauthorized',
        'groq:m2 ERROR FATAL_ERROR: Unauthorized'
      ]);
    });

    it('does not alert when alerting is disabled', async () => {
      const { orchestrator, alertHandler } = createOrchestrator({ m1: fail(unauthorized()) }, { alertOnTotalFailure: false });

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1')]);

      expect(result.aggregate).toBeNull();
      expect(alertHandler.alertTotalFailure).not.toHaveBeenCalled();
    });

    it('skips disabled models', async () => {
      const disabled = jest.fn();
      const { orchestrator, alertHandler } = createOrchestrator({
        m1: respond({ sentiment: 0.2 }),
        m2: { score: disabled }
      });

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('m2', 1, false)]);

      expect(disabled).not.toHaveBeenCalled();
      expect(result.outcomes).toHaveLength(1);
      expect(result.aggregate?.requestedModels).toBe(1);

      const none = await orchestrator.analyzeHeadline(headline, [selection('m2', 1, false)]);
      expect(none.aggregate).toBeNull();
      expect(none.outcomes).toEqual([]);
      expect(alertHandler.alertTotalFailure).not.toHaveBeenCalled();
    });

    it('times out a slow model and cancels its call', async () => {
      const onAbort = jest.fn();
      const { orchestrator } = createOrchestrator(
        { m1: respond({ sentiment: 0.6 }), slow: hang(onAbort) },
        { modelTimeoutMs: 20, headlineDeadlineMs: 1000 }
      );

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('slow')]);

      expect(result.outcomes[1]).toMatchObject({ modelId: 'slow', status: 'TIMEOUT' });
      expect(onAbort).toHaveBeenCalledTimes(1);
      expect(result.aggregate?.numModels).toBe(1);
      expect(result.aggregate?.requestedModels).toBe(2);
    });

    it('stops waiting at the headline deadline', async () => {
      const { orchestrator } = createOrchestrator(
        { m1: respond({ sentiment: -0.6 }), slow: hang() },
        { modelTimeoutMs: 1000, headlineDeadlineMs: 20 }
      );

      const result = await orchestrator.analyzeHeadline(headline, [selection('m1'), selection('slow')]);

      expect(result.outcomes[1]).toMatchObject({ status: 'TIMEOUT', errorMessage: 'Headline deadline reached' });
      expect(result.aggregate?.avgSentiment).toBeCloseTo(-0.6, 6);
    });

    it('reports cancelled models when the caller aborts', async () => {
      const { orchestrator, alertHandler } = createOrchestrator({ slow: hang() }, { modelTimeoutMs: 1000 });
      const controller = new AbortController();

      const pending = orchestrator.analyzeHeadline(headline, [selection('slow')], { signal: controller.signal });
      setTimeout(() => controller.abort(), 10);
      const result = await pending;

      expect(result.outcomes[0].status).toBe('CANCELLED');
      expect(result.aggregate).toBeNull();
      expect(alertHandler.alertTotalFailure).not.toHaveBeenCalled();
    });

    it('never runs more model calls than maxInFlight', async () => {
      let active = 0;
      let peak = 0;
      const tracked: SentimentModel = {
        score: async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise(resolve => setTimeout(resolve, 5));
          active--;
          return { sentiment: 0.1 };
        }
      };
      const models = ['a', 'b', 'c', 'd', 'e'];
      const { orchestrator } = createOrchestrator(
        Object.fromEntries(models.map(id => [id, tracked])),
        { maxInFlight: 2 }
      );

      const result = await orchestrator.analyzeHeadline(headline, models.map(id => selection(id)));

      expect(peak).toBe(2);
      expect(result.aggregate?.numModels).toBe(5);
    });

    it('routes model calls through the provider quota', async () => {
      const { orchestrator, gateway } = createOrchestrator({ m1: respond({ sentiment: 0.1 }) });

      await orchestrator.analyzeHeadline(headline, [selection('m1'), { ...selection('m1'), provider: 'openrouter' }]);

      expect(gateway.getQuotaStatus('model:groq').calls).toBe(1);
      expect(gateway.getQuotaStatus('model:openrouter').calls).toBe(1);
    });
  });

  describe('analyzeBatch', () => {
    it('counts scored and unscored headlines', async () => {
      const { orchestrator } = createOrchestrator({
        m1: {
          score: async (prompt: ModelPrompt) => {
            if (prompt.ticker === 'GLOBX') throw unauthorized();
            return { sentiment: 0.4 };
          }
        }
      });
      const second: Headline = { ...headline, headlineId: 'h-2', ticker: 'GLOBX' };
      const third: Headline = { ...headline, headlineId: 'h-3' };

      const result = await orchestrator.analyzeBatch([headline, second, third], [selection('m1')]);

      expect(result.scored).toBe(2);
      expect(result.unscored).toBe(1);
      expect(result.errors).toEqual([]);
      expect(result.results.map(r => r.headlineId)).toEqual(['h-1', 'h-2', 'h-3']);
    });

    it('reports persistence failures as errors', async () => {
      mockAggregateRepo.putAggregate
        .mockRejectedValueOnce(new Error('ProvisionedThroughputExceeded'))
        .mockResolvedValue(undefined);
      const { orchestrator } = createOrchestrator({ m1: respond({ sentiment: 0.4 }) }, { maxInFlight: 1 });
      const second: Headline = { ...headline, headlineId: 'h-2' };

      const result = await orchestrator.analyzeBatch([headline, second], [selection('m1')]);

      expect(result.scored).toBe(1);
      expect(result.unscored).toBe(1);
      expect(result.errors).toEqual(['Headline h-1: ProvisionedThroughputExceeded']);
    });

    it('defers the remaining headlines once the provider quota runs out', async () => {
      const score = jest.fn().mockResolvedValue({ sentiment: 0.4 });
      const { orchestrator, alertHandler, gateway } = createOrchestrator({ m1: { score }, m2: { score }, m3: { score } });
      gateway.registerSource('model:groq', { requestsPerWindow: 6, windowMs: 60000 });
      const batch = ['h-1', 'h-2', 'h-3', 'h-4', 'h-5'].map(id => ({ ...headline, headlineId: id }));

      const result = await orchestrator.analyzeBatch(batch, [selection('m1'), selection('m2'), selection('m3')]);

      expect(result.scored).toBe(2);
      expect(result.unscored).toBe(3);
      expect(result.deferred).toBe(2);
      expect(result.errors).toEqual([]);
      expect(score).toHaveBeenCalledTimes(6);
      expect(result.results.map(r => r.headlineId)).toEqual(['h-1', 'h-2', 'h-3']);
      expect(result.results[2].outcomes.map(o => o.status))
        .toEqual(['QUOTA_EXHAUSTED', 'QUOTA_EXHAUSTED', 'QUOTA_EXHAUSTED']);
      expect(result.results[2].aggregate).toBeNull();
      expect(alertHandler.alertTotalFailure).not.toHaveBeenCalled();
    });
  });
});
