/**
 * Headline Types for News Ingestion and Deduplication
 */

export type MarketSession = 'pre' | 'regular' | 'after' | 'closed';

/**
 * Headline record as returned by an upstream headline source
 */
export interface RawHeadline {
  ticker: string;
  text: string;
  source: string;
  timestamp: string;
  link?: string;
  company?: string;
  sector?: string;
  industry?: string;
}

export interface Headline {
  headlineId: string;
  portfolioId: string;
  ticker: string;
  company?: string;
  text: string;
  normalizedText: string;
  source: string;
  link?: string;
  publishedAt: string;
  firstSeenAt: string;
  ingestedAt: string;
  isDuplicate: boolean;
  duplicateOf?: string;
  isPrimarySource: boolean;
  marketSession: MarketSession;
  sector?: string;
  industry?: string;
}

/**
 * Outcome of checking one headline against the recent history of its ticker
 */
export interface DeduplicationResult {
  isDuplicate: boolean;
  duplicateOf?: string;
  similarity: number;
}

export interface DeduplicationDecision extends DeduplicationResult {
  headline: Headline;
}
