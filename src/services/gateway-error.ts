/**
 * Gateway Error Taxonomy
 *
 * Upstream failures are classified as rate limited, transient or fatal. The
 * classification decides the retry behaviour of the Fetch Gateway.
 */

import { GatewayErrorCategory } from '../types/gateway';

/**
 * Base class of classified upstream errors
 */
export abstract class GatewayError extends Error {
  abstract readonly category: GatewayErrorCategory;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.statusCode = statusCode;
  }
}

/**
 * Upstream quota exceeded (HTTP 429 or local quota exhausted)
 */
export class RateLimitedError extends GatewayError {
  readonly category = 'RATE_LIMITED' as const;
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, statusCode?: number) {
    super(message, statusCode);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * The gateway's own quota for a source is used up until the window resets
 */
export class QuotaExhaustedError extends RateLimitedError {
  readonly sourceId: string;

  constructor(sourceId: string, retryAfterMs: number) {
    super(`Quota exhausted for ${sourceId}`, retryAfterMs);
    this.name = 'QuotaExhaustedError';
    this.sourceId = sourceId;
  }
}

/**
 * Failure that may succeed on retry (timeouts, network errors, 5xx)
 */
export class TransientError extends GatewayError {
  readonly category = 'TRANSIENT' as const;

  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'TransientError';
  }
}

/**
 * Failure that will not succeed on retry (auth, malformed request, schema violation)
 */
export class FatalError extends GatewayError {
  readonly category = 'FATAL' as const;

  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'FatalError';
  }
}

/**
 * HTTP status codes with a fixed category
 */
const HTTP_STATUS_CATEGORIES: Record<string, GatewayErrorCategory> = {
  '400': 'FATAL',
  '401': 'FATAL',
  '403': 'FATAL',
  '404': 'FATAL',
  '408': 'TRANSIENT',
  '422': 'FATAL',
  '429': 'RATE_LIMITED'
};

/**
 * Node and HTTP client error codes
 */
const ERROR_CODE_CATEGORIES: Record<string, GatewayErrorCategory> = {
  ETIMEDOUT: 'TRANSIENT',
  ECONNRESET: 'TRANSIENT',
  ECONNREFUSED: 'TRANSIENT',
  ENOTFOUND: 'TRANSIENT',
  EAI_AGAIN: 'TRANSIENT',
  EPIPE: 'TRANSIENT',
  rate_limit_exceeded: 'RATE_LIMITED',
  invalid_api_key: 'FATAL',
  model_not_found: 'FATAL'
};

/**
 * Error message patterns for categorization
 */
const ERROR_MESSAGE_PATTERNS: Array<{ pattern: RegExp; category: GatewayErrorCategory }> = [
  { pattern: /rate limit/i, category: 'RATE_LIMITED' },
  { pattern: /too many requests/i, category: 'RATE_LIMITED' },
  { pattern: /throttl/i, category: 'RATE_LIMITED' },
  { pattern: /quota/i, category: 'RATE_LIMITED' },
  { pattern: /unauthorized/i, category: 'FATAL' },
  { pattern: /forbidden/i, category: 'FATAL' },
  { pattern: /invalid api key/i, category: 'FATAL' },
  { pattern: /authentication/i, category: 'FATAL' },
  { pattern: /schema/i, category: 'FATAL' },
  { pattern: /timeout/i, category: 'TRANSIENT' },
  { pattern: /timed out/i, category: 'TRANSIENT' },
  { pattern: /network/i, category: 'TRANSIENT' },
  { pattern: /socket hang up/i, category: 'TRANSIENT' },
  { pattern: /fetch failed/i, category: 'TRANSIENT' },
  { pattern: /unavailable/i, category: 'TRANSIENT' }
];

function numberProperty(value: object, key: string): number | undefined {
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'number' && Number.isFinite(property) ? property : undefined;
}

function stringProperty(value: object, key: string): string | undefined {
  const property: unknown = Reflect.get(value, key);
  if (typeof property === 'string') return property;
  if (typeof property === 'number') return String(property);
  return undefined;
}

/**
 * Parse an HTTP Retry-After header value (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfterHeader(value: string | undefined, now: Date = new Date()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = new Date(value);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now.getTime());
  }

  return undefined;
}

/**
 * Gateway Error Classifier
 */
export const GatewayErrorClassifier = {
  /**
   * Extract an HTTP status code from common client error shapes
   */
  extractStatusCode(error: object): number | undefined {
    const response: unknown = Reflect.get(error, 'response');
    return (
      numberProperty(error, 'status') ??
      numberProperty(error, 'statusCode') ??
      (typeof response === 'object' && response !== null ? numberProperty(response, 'status') : undefined)
    );
  },

  extractRetryAfterMs(error: object): number | undefined {
    const retryAfterMs = numberProperty(error, 'retryAfterMs');
    if (retryAfterMs !== undefined) {
      return retryAfterMs;
    }
    const retryAfterSeconds = numberProperty(error, 'retryAfter');
    if (retryAfterSeconds !== undefined) {
      return retryAfterSeconds * 1000;
    }
    return parseRetryAfterHeader(stringProperty(error, 'retryAfterHeader'));
  },

  /**
   * Determine the category of an arbitrary thrown value
   *
   * Already-classified errors keep their class. Unknown errors are treated as transient.
   */
  categorize(error: unknown): GatewayErrorCategory {
    if (error instanceof GatewayError) {
      return error.category;
    }

    if (typeof error !== 'object' || error === null) {
      return 'TRANSIENT';
    }

    const statusCode = this.extractStatusCode(error);
    if (statusCode !== undefined) {
      const statusCategory = HTTP_STATUS_CATEGORIES[String(statusCode)];
      if (statusCategory) {
        return statusCategory;
      }
      if (statusCode >= 500) {
        return 'TRANSIENT';
      }
      if (statusCode >= 400) {
        return 'FATAL';
      }
    }

    const code = stringProperty(error, 'code');
    if (code && ERROR_CODE_CATEGORIES[code]) {
      return ERROR_CODE_CATEGORIES[code];
    }

    const message = stringProperty(error, 'message') ?? '';
    for (const { pattern, category } of ERROR_MESSAGE_PATTERNS) {
      if (pattern.test(message)) {
        return category;
      }
    }

    return 'TRANSIENT';
  },

  /**
   * Convert any thrown value into the matching GatewayError subclass
   */
  classify(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const details = typeof error === 'object' && error !== null ? error : {};
    const statusCode = this.extractStatusCode(details);

    switch (this.categorize(error)) {
      case 'RATE_LIMITED':
        return new RateLimitedError(message, this.extractRetryAfterMs(details), statusCode);
      case 'FATAL':
        return new FatalError(message, statusCode);
      default:
        return new TransientError(message, statusCode);
    }
  }
};
