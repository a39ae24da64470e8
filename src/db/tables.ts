/**
 * DynamoDB table configurations for the headline sentiment pipeline
 */

/**
 * Table name constants - use environment variables for flexibility across environments
 */
export const TableNames = {
  HEADLINES: process.env.HEADLINES_TABLE || 'headlines',
  MODEL_VOTES: process.env.MODEL_VOTES_TABLE || 'model-votes',
  SENTIMENT_AGGREGATES: process.env.SENTIMENT_AGGREGATES_TABLE || 'sentiment-aggregates',
  TICKER_STATS: process.env.TICKER_STATS_TABLE || 'ticker-stats',
  OPPORTUNITIES: process.env.OPPORTUNITIES_TABLE || 'opportunities',
  PIPELINE_CONFIG: process.env.PIPELINE_CONFIG_TABLE || 'pipeline-config',
  INGESTION_LOCKS: process.env.INGESTION_LOCKS_TABLE || 'ingestion-locks'
} as const;

/**
 * Key schema definitions for each table
 */
export const KeySchemas = {
  /**
   * Headlines Table
   * - Partition Key: headlineId (content-derived, so re-fetches upsert the same row)
   */
  HEADLINES: {
    partitionKey: 'headlineId'
  },

  /**
   * Model Votes Table (append-only)
   * - Partition Key: headlineId
   * - Sort Key: voteId
   */
  MODEL_VOTES: {
    partitionKey: 'headlineId',
    sortKey: 'voteId'
  },

  /**
   * Sentiment Aggregates Table
   * - Partition Key: headlineId
   */
  SENTIMENT_AGGREGATES: {
    partitionKey: 'headlineId'
  },

  /**
   * Ticker Stats Table
   * - Partition Key: windowType
   * - Sort Key: ticker
   */
  TICKER_STATS: {
    partitionKey: 'windowType',
    sortKey: 'ticker'
  },

  /**
   * Opportunities Table
   * - Partition Key: opportunityId
   */
  OPPORTUNITIES: {
    partitionKey: 'opportunityId'
  },

  /**
   * Pipeline Config Table
   * - Partition Key: configId
   */
  PIPELINE_CONFIG: {
    partitionKey: 'configId'
  },

  /**
   * Ingestion Locks Table
   * - Partition Key: lockKey
   * - TTL attribute: expiresAtEpoch
   */
  INGESTION_LOCKS: {
    partitionKey: 'lockKey'
  }
} as const;

/**
 * Global Secondary Index names
 */
export const GSINames = {
  HEADLINES: {
    TICKER_PUBLISHED_INDEX: 'ticker-publishedAt-index'
  },
  SENTIMENT_AGGREGATES: {
    TICKER_PUBLISHED_INDEX: 'ticker-publishedAt-index'
  },
  OPPORTUNITIES: {
    STATUS_PRIORITY_INDEX: 'status-priority-index',
    TICKER_DIRECTION_INDEX: 'tickerDirection-generatedAt-index'
  }
} as const;

/**
 * DynamoDB batch write limit
 */
export const BATCH_WRITE_LIMIT = 25;

/**
 * DynamoDB batchGet limit
 */
export const BATCH_GET_LIMIT = 100;
