/**
 * Headline Deduplication Service
 *
 * Marks near-identical headlines about the same ticker as duplicates of the
 * earliest version of the story. Similarity is fuzzy: an edit-distance ratio,
 * plus a token-set ratio when both texts are long enough for word overlap to
 * be meaningful.
 */

import { DeduplicationDecision, DeduplicationResult, Headline } from '../types/headline';

/**
 * Similarity scorer over two normalized texts, returning a value in [0, 1]
 */
export type SimilarityScorer = (a: string, b: string) => number;

/**
 * Configuration for the headline deduplicator
 */
export interface HeadlineDeduplicatorConfig {
  /** Similarity at or above which two headlines are the same story (0.0 to 1.0) */
  similarityThreshold?: number;
  /** Maximum distance in publication time between duplicates */
  proximityWindowMs?: number;
  /** How far back the history passed to the deduplicator should reach */
  lookbackHours?: number;
  /** Minimum token count of the shorter text before the token-set ratio applies */
  minTokensForTokenSet?: number;
  /** Override of the similarity function */
  scorer?: SimilarityScorer;
}

const DEFAULT_CONFIG: Required<Omit<HeadlineDeduplicatorConfig, 'scorer'>> = {
  similarityThreshold: 0.85,
  proximityWindowMs: 4 * 60 * 60 * 1000,
  lookbackHours: 48,
  minTokensForTokenSet: 3
};

/**
 * Length of the longest common subsequence of two strings
 */
function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Edit-distance ratio where only insertions and deletions count:
 * (lenA + lenB - distance) / (lenA + lenB)
 */
export function editRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 0;
  }
  return (2 * longestCommonSubsequence(a, b)) / total;
}

function tokenize(text: string): string[] {
  return text.split(' ').filter(token => token.length > 0);
}

/**
 * Token-set ratio: compares the shared tokens against each side's full token set
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(tokenize(a));
  const tokensB = new Set(tokenize(b));

  const intersection = [...tokensA].filter(t => tokensB.has(t)).sort().join(' ');
  const onlyA = [...tokensA].filter(t => !tokensB.has(t)).sort().join(' ');
  const onlyB = [...tokensB].filter(t => !tokensA.has(t)).sort().join(' ');

  const combinedA = `${intersection} ${onlyA}`.trim();
  const combinedB = `${intersection} ${onlyB}`.trim();

  return Math.max(
    editRatio(intersection, combinedA),
    editRatio(intersection, combinedB),
    editRatio(combinedA, combinedB)
  );
}

/**
 * Headline Deduplication Service
 */
export class HeadlineDeduplicator {
  private config: Required<Omit<HeadlineDeduplicatorConfig, 'scorer'>>;
  private scorer?: SimilarityScorer;

  constructor(config: HeadlineDeduplicatorConfig = {}) {
    const { scorer, ...rest } = config;
    this.config = { ...DEFAULT_CONFIG, ...rest };
    this.scorer = scorer;
  }

  get lookbackHours(): number {
    return this.config.lookbackHours;
  }

  /**
   * Similarity between two normalized texts in [0, 1]
   *
   * Falls back to exact comparison if scoring fails.
   */
  similarity(a: string, b: string): number {
    try {
      if (this.scorer) {
        return this.scorer(a, b);
      }

      const edit = editRatio(a, b);
      const shorterTokens = Math.min(tokenize(a).length, tokenize(b).length);
      if (shorterTokens < this.config.minTokensForTokenSet) {
        return edit;
      }
      return Math.max(edit, tokenSetRatio(a, b));
    } catch (error) {
      console.warn('Fuzzy similarity failed, using exact comparison:', {
        error: error instanceof Error ? error.message : String(error)
      });
      return a.length > 0 && a === b ? 1 : 0;
    }
  }

  /**
   * Check a headline against earlier primary headlines of the same ticker
   *
   * Among equally similar candidates the earliest one is the primary.
   */
  checkDuplicate(candidate: Headline, history: Headline[]): DeduplicationResult {
    const candidateTime = new Date(candidate.publishedAt).getTime();
    let best: { headline: Headline; similarity: number } | null = null;

    for (const existing of history) {
      if (
        existing.isDuplicate ||
        existing.ticker !== candidate.ticker ||
        existing.headlineId === candidate.headlineId
      ) {
        continue;
      }

      const distance = Math.abs(new Date(existing.publishedAt).getTime() - candidateTime);
      if (distance > this.config.proximityWindowMs) {
        continue;
      }

      const similarity = this.similarity(candidate.normalizedText, existing.normalizedText);
      if (
        !best ||
        similarity > best.similarity ||
        (similarity === best.similarity && isEarlier(existing, best.headline))
      ) {
        best = { headline: existing, similarity };
      }
    }

    if (best && best.similarity >= this.config.similarityThreshold) {
      return {
        isDuplicate: true,
        duplicateOf: best.headline.headlineId,
        similarity: best.similarity
      };
    }

    return {
      isDuplicate: false,
      similarity: best?.similarity ?? 0
    };
  }

  /**
   * Deduplicate a batch against existing history
   *
   * Headlines are processed in publication order so the earliest of a group is
   * the primary; accepted primaries join the history for later ones.
   */
  deduplicateBatch(incoming: Headline[], history: Headline[]): DeduplicationDecision[] {
    const ordered = [...incoming].sort((a, b) => (isEarlier(a, b) ? -1 : isEarlier(b, a) ? 1 : 0));
    const working = [...history];
    const decisions: DeduplicationDecision[] = [];

    for (const headline of ordered) {
      const result = this.checkDuplicate(headline, working);
      const decided: Headline = {
        ...headline,
        isDuplicate: result.isDuplicate,
        ...(result.duplicateOf && { duplicateOf: result.duplicateOf })
      };

      if (!result.isDuplicate) {
        working.push(decided);
      }
      decisions.push({ ...result, headline: decided });
    }

    return decisions;
  }
}

function isEarlier(a: Headline, b: Headline): boolean {
  const timeA = new Date(a.publishedAt).getTime();
  const timeB = new Date(b.publishedAt).getTime();
  if (timeA !== timeB) {
    return timeA < timeB;
  }
  return a.headlineId < b.headlineId;
}
