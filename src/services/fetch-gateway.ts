/**
 * Rate-Limited Fetch Gateway
 *
 * Every upstream call (headline feeds, model catalogs, model inference) goes
 * through the gateway. It enforces a fixed-window quota per source, classifies
 * failures, retries them under a single RetryPolicy and keeps per-source
 * telemetry.
 */

import {
  BackoffPolicy,
  GatewayCallOptions,
  GatewayErrorCategory,
  GatewayResult,
  QuotaStatus,
  RetryPolicyConfig,
  SourceQuota
} from '../types/gateway';
import { GatewayErrorClassifier, RateLimitedError, GatewayError, QuotaExhaustedError } from './gateway-error';
import { CancelledError, sleep } from '../utils/abort';

/**
 * Default retry behaviour. Rate-limited delays never exceed 5x the base delay.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  RATE_LIMITED: {
    maxAttempts: 4,
    baseDelayMs: 1000,
    maxDelayMs: 5000,
    multiplier: 2,
    jitterFactor: 0.1
  },
  TRANSIENT: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10000,
    multiplier: 2,
    jitterFactor: 0.1
  }
};

/**
 * Quota applied to sources that were not registered explicitly
 */
export const DEFAULT_SOURCE_QUOTA: SourceQuota = {
  requestsPerWindow: 10,
  windowMs: 60000
};

/**
 * Retry policy parameterized by error category
 */
export class RetryPolicy {
  private config: RetryPolicyConfig;
  private random: () => number;

  constructor(config: Partial<RetryPolicyConfig> = {}, random: () => number = Math.random) {
    this.config = { ...DEFAULT_RETRY_POLICY, ...config };
    this.random = random;
  }

  private policyFor(category: 'RATE_LIMITED' | 'TRANSIENT'): BackoffPolicy {
    return this.config[category];
  }

  /**
   * Whether another attempt is allowed after `attempts` failed attempts
   */
  shouldRetry(category: GatewayErrorCategory, attempts: number): boolean {
    if (category === 'FATAL') {
      return false;
    }
    return attempts < this.policyFor(category).maxAttempts;
  }

  /**
   * Exponential backoff with jitter for the given attempt (1-based), capped at maxDelayMs
   */
  delayFor(category: 'RATE_LIMITED' | 'TRANSIENT', attempt: number): number {
    const policy = this.policyFor(category);
    const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
    const capped = Math.min(exponential, policy.maxDelayMs);
    const jitter = capped * policy.jitterFactor * this.random();
    return Math.floor(Math.min(capped + jitter, policy.maxDelayMs));
  }

  maxDelayMs(category: 'RATE_LIMITED' | 'TRANSIENT'): number {
    return this.policyFor(category).maxDelayMs;
  }
}

/**
 * Fixed-window quota state and telemetry of one source
 */
interface SourceState {
  quota: SourceQuota;
  windowStart: number;
  used: number;
  calls: number;
  rateLimited: number;
  transientErrors: number;
  fatalErrors: number;
}

/**
 * Configuration for the fetch gateway
 */
export interface FetchGatewayConfig {
  defaultQuota?: SourceQuota;
  quotas?: Record<string, SourceQuota>;
  retryPolicy?: Partial<RetryPolicyConfig>;
  /** Wait used between attempts; must reject with CancelledError when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  clock?: () => number;
}

/**
 * Rate-Limited Fetch Gateway
 */
export class FetchGateway {
  private sources: Map<string, SourceState> = new Map();
  private defaultQuota: SourceQuota;
  private retryPolicy: RetryPolicy;
  private wait: (ms: number, signal?: AbortSignal) => Promise<void>;
  private clock: () => number;

  constructor(config: FetchGatewayConfig = {}) {
    this.defaultQuota = config.defaultQuota ?? DEFAULT_SOURCE_QUOTA;
    this.retryPolicy = new RetryPolicy(config.retryPolicy, config.random);
    this.wait = config.sleep ?? sleep;
    this.clock = config.clock ?? Date.now;

    for (const [sourceId, quota] of Object.entries(config.quotas ?? {})) {
      this.registerSource(sourceId, quota);
    }
  }

  /**
   * Register or replace the quota of a source. Counters are kept.
   */
  registerSource(sourceId: string, quota: SourceQuota): void {
    const existing = this.sources.get(sourceId);
    if (existing) {
      existing.quota = quota;
      return;
    }
    this.sources.set(sourceId, this.createState(quota));
  }

  private createState(quota: SourceQuota): SourceState {
    return {
      quota,
      windowStart: this.clock(),
      used: 0,
      calls: 0,
      rateLimited: 0,
      transientErrors: 0,
      fatalErrors: 0
    };
  }

  private getState(sourceId: string): SourceState {
    let state = this.sources.get(sourceId);
    if (!state) {
      state = this.createState(this.defaultQuota);
      this.sources.set(sourceId, state);
    }

    const now = this.clock();
    if (now - state.windowStart >= state.quota.windowMs) {
      state.windowStart = now;
      state.used = 0;
    }
    return state;
  }

  /**
   * Take one request from the source's current window
   *
   * @returns null if allowed, otherwise the time until the window resets
   */
  private consume(sourceId: string): number | null {
    const state = this.getState(sourceId);
    if (state.used >= state.quota.requestsPerWindow) {
      return Math.max(0, state.windowStart + state.quota.windowMs - this.clock());
    }
    state.used++;
    return null;
  }

  private recordError(sourceId: string, category: GatewayErrorCategory): void {
    const state = this.getState(sourceId);
    if (category === 'RATE_LIMITED') state.rateLimited++;
    else if (category === 'TRANSIENT') state.transientErrors++;
    else state.fatalErrors++;
  }

  /**
   * Execute an upstream call under the source's quota and the retry policy
   *
   * Never throws for upstream failures: the outcome is reported as a GatewayResult.
   */
  async execute<T>(
    sourceId: string,
    operation: string,
    fn: (signal?: AbortSignal) => Promise<T>,
    options: GatewayCallOptions = {}
  ): Promise<GatewayResult<T>> {
    const { signal } = options;
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        return { status: 'CANCELLED', attempts };
      }

      let error: GatewayError;
      const quotaWaitMs = this.consume(sourceId);

      if (quotaWaitMs !== null) {
        error = new QuotaExhaustedError(sourceId, quotaWaitMs);
      } else {
        this.getState(sourceId).calls++;
        try {
          const value = await fn(signal);
          return { status: 'OK', value, attempts: attempts + 1 };
        } catch (thrown) {
          if (signal?.aborted || thrown instanceof CancelledError) {
            return { status: 'CANCELLED', attempts: attempts + 1 };
          }
          error = GatewayErrorClassifier.classify(thrown);
        }
      }

      attempts++;
      this.recordError(sourceId, error.category);

      if (error.category === 'FATAL') {
        console.error('Gateway call failed with fatal error:', {
          sourceId, operation, attempts, error: error.message
        });
        return { status: 'FATAL_ERROR', attempts, error };
      }

      const retryAfterMs = error instanceof RateLimitedError ? error.retryAfterMs ?? 0 : 0;
      const exhausted =
        !this.retryPolicy.shouldRetry(error.category, attempts) ||
        retryAfterMs > this.retryPolicy.maxDelayMs(error.category);

      if (exhausted) {
        console.warn('Gateway call gave up after retries:', {
          sourceId, operation, attempts, category: error.category, error: error.message
        });
        return error.category === 'RATE_LIMITED'
          ? { status: 'RATE_LIMITED', retryAfterMs, attempts, error }
          : { status: 'TRANSIENT_ERROR', attempts, error };
      }

      const delayMs = Math.max(this.retryPolicy.delayFor(error.category, attempts), retryAfterMs);
      try {
        await this.wait(delayMs, signal);
      } catch (waitError) {
        if (waitError instanceof CancelledError) {
          return { status: 'CANCELLED', attempts };
        }
        throw waitError;
      }
    }
  }

  /**
   * Current quota window and counters of a source
   */
  getQuotaStatus(sourceId: string): QuotaStatus {
    const state = this.getState(sourceId);
    return {
      sourceId,
      limit: state.quota.requestsPerWindow,
      used: state.used,
      remaining: Math.max(0, state.quota.requestsPerWindow - state.used),
      resetsAt: new Date(state.windowStart + state.quota.windowMs).toISOString(),
      calls: state.calls,
      rateLimited: state.rateLimited,
      transientErrors: state.transientErrors,
      fatalErrors: state.fatalErrors
    };
  }

  listQuotaStatus(): QuotaStatus[] {
    return [...this.sources.keys()].sort().map(sourceId => this.getQuotaStatus(sourceId));
  }
}

/**
 * Return the value of an OK result or throw the error it carries
 */
export function unwrap<T>(result: GatewayResult<T>): T {
  switch (result.status) {
    case 'OK':
      return result.value;
    case 'CANCELLED':
      throw new CancelledError();
    default:
      throw result.error;
  }
}
