/**
 * Fetch Gateway Types
 */

export type GatewayErrorCategory = 'RATE_LIMITED' | 'TRANSIENT' | 'FATAL';

export interface SourceQuota {
  requestsPerWindow: number;
  windowMs: number;
}

export interface QuotaStatus {
  sourceId: string;
  limit: number;
  used: number;
  remaining: number;
  resetsAt: string;
  calls: number;
  rateLimited: number;
  transientErrors: number;
  fatalErrors: number;
}

export interface BackoffPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitterFactor: number;
}

/**
 * Retry behavior per error category. Fatal errors are never retried.
 */
export interface RetryPolicyConfig {
  RATE_LIMITED: BackoffPolicy;
  TRANSIENT: BackoffPolicy;
}

export interface GatewayCallOptions {
  signal?: AbortSignal;
}

export type GatewayResult<T> =
  | { status: 'OK'; value: T; attempts: number }
  | { status: 'RATE_LIMITED'; retryAfterMs: number; attempts: number; error: Error }
  | { status: 'TRANSIENT_ERROR'; attempts: number; error: Error }
  | { status: 'FATAL_ERROR'; attempts: number; error: Error }
  | { status: 'CANCELLED'; attempts: number };

export type GatewayStatus = GatewayResult<unknown>['status'];
