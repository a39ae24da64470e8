/**
 * Headline Normalizer
 *
 * Turns raw headline records into Headline entities: text normalization for
 * similarity comparison, content-derived ids, market session tagging and
 * primary-source detection.
 */

import { Headline, MarketSession, RawHeadline } from '../types/headline';
import { contentHash } from '../utils/ids';

/**
 * Wire-service boilerplate that carries no meaning for similarity
 */
const BOILERPLATE_PATTERN = /\b(breaking|alert|update|exclusive|just in|watch|hot|trending|must read|developing)\b/g;

/**
 * Sources that publish first-hand company announcements
 */
const PRIMARY_SOURCES = [
  'pr newswire',
  'business wire',
  'globe newswire',
  'sec',
  'company press release',
  'investor relations'
];

/**
 * Session boundaries in minutes after midnight US/Eastern
 */
const SESSION_BOUNDARIES: Array<{ before: number; session: MarketSession }> = [
  { before: 4 * 60, session: 'closed' },
  { before: 9 * 60 + 30, session: 'pre' },
  { before: 16 * 60, session: 'regular' },
  { before: 20 * 60, session: 'after' }
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Normalize headline text for similarity comparison
 *
 * Never throws: anything that is not a string normalizes to ''.
 */
export function normalizeText(text: unknown, ticker?: string): string {
  if (typeof text !== 'string') {
    return '';
  }

  let normalized = text;

  if (ticker && ticker.trim()) {
    const symbol = escapeRegExp(ticker.trim());
    normalized = normalized
      .replace(new RegExp(`^\\s*${symbol}\\s*:`, 'i'), ' ')
      .replace(new RegExp(`\\b(nyse|nasdaq|amex)\\s*:\\s*${symbol}\\b`, 'gi'), ' ')
      .replace(new RegExp(`\\(\\s*${symbol}\\s*\\)`, 'gi'), ' ')
      .replace(new RegExp(`\\$${symbol}\\b`, 'gi'), ' ');
  }

  return normalized
    .toLowerCase()
    .replace(/[^\w\s]/g, ' ')
    .replace(BOILERPLATE_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Eastern offset from UTC in hours: daylight time March through October
 */
function easternOffsetHours(date: Date): number {
  const month = date.getUTCMonth();
  return month >= 2 && month <= 9 ? 4 : 5;
}

/**
 * US equity market session a timestamp falls in
 */
export function marketSession(timestamp: Date): MarketSession {
  const utcMinutes = timestamp.getUTCHours() * 60 + timestamp.getUTCMinutes();
  const easternMinutes = (utcMinutes - easternOffsetHours(timestamp) * 60 + 24 * 60) % (24 * 60);

  for (const boundary of SESSION_BOUNDARIES) {
    if (easternMinutes < boundary.before) {
      return boundary.session;
    }
  }
  return 'closed';
}

export function isPrimarySource(source: string): boolean {
  const normalized = source.toLowerCase();
  return PRIMARY_SOURCES.some(primary =>
    primary === 'sec' ? /\bsec\b/.test(normalized) : normalized.includes(primary)
  );
}

export function createHeadlineId(ticker: string, source: string, publishedAt: string, normalizedText: string): string {
  return contentHash(ticker, source, publishedAt, normalizedText);
}

function parseTimestamp(value: string): Date | null {
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Build a Headline from a raw source record. Dedup flags start cleared.
 *
 * An unparsable timestamp publishes the headline at `now`, while its id is
 * keyed on the raw timestamp text so a re-fetch derives the same id.
 */
export function toHeadline(raw: RawHeadline, portfolioId: string, now: Date = new Date()): Headline {
  const ticker = (raw.ticker || '').trim().toUpperCase() || 'UNKNOWN';
  const parsed = parseTimestamp(raw.timestamp);
  const published = parsed ?? now;
  const publishedAt = published.toISOString();
  const idTimestamp = parsed ? publishedAt : `unparsed:${String(raw.timestamp).trim()}`;
  const text = typeof raw.text === 'string' ? raw.text.trim() : '';
  const source = (raw.source || '').trim() || 'unknown';
  const normalizedText = normalizeText(text, ticker);

  return {
    headlineId: createHeadlineId(ticker, source, idTimestamp, normalizedText),
    portfolioId,
    ticker,
    text,
    normalizedText,
    source,
    publishedAt,
    firstSeenAt: now.toISOString(),
    ingestedAt: now.toISOString(),
    isDuplicate: false,
    isPrimarySource: isPrimarySource(source),
    marketSession: marketSession(published),
    ...(raw.company && { company: raw.company }),
    ...(raw.link && { link: raw.link }),
    ...(raw.sector && { sector: raw.sector }),
    ...(raw.industry && { industry: raw.industry })
  };
}
