/**
 * Sentiment Aggregate Repository
 *
 * One aggregate per headline. Each completed orchestration run replaces the
 * previous aggregate with a single full-item put.
 */

import { documentClient } from '../db/client';
import { TableNames, KeySchemas, GSINames } from '../db/tables';
import { queryAll, scanAll, batchWriteAll, batchGetAll } from '../db/access';
import {
  SentimentAggregate,
  SentimentDirection,
  SentimentHorizon,
  ModelVoteSummary
} from '../types/sentiment';

/**
 * Serialized aggregate for DynamoDB storage
 */
interface SerializedSentimentAggregate {
  headlineId: string;
  runId: string;
  ticker: string;
  publishedAt: string;
  avgSentiment: number;
  avgConfidence: number;
  dispersion: number;
  majorityVote: SentimentDirection;
  horizonVote: SentimentHorizon;
  numModels: number;
  requestedModels: number;
  lowConfidence: boolean;
  modelVotes: string;  // JSON serialized array
  updatedAt: string;
}

function serializeSentimentAggregate(aggregate: SentimentAggregate): SerializedSentimentAggregate {
  return {
    headlineId: aggregate.headlineId,
    runId: aggregate.runId,
    ticker: aggregate.ticker,
    publishedAt: aggregate.publishedAt,
    avgSentiment: aggregate.avgSentiment,
    avgConfidence: aggregate.avgConfidence,
    dispersion: aggregate.dispersion,
    majorityVote: aggregate.majorityVote,
    horizonVote: aggregate.horizonVote,
    numModels: aggregate.numModels,
    requestedModels: aggregate.requestedModels,
    lowConfidence: aggregate.lowConfidence,
    modelVotes: JSON.stringify(aggregate.modelVotes),
    updatedAt: aggregate.updatedAt
  };
}

function deserializeSentimentAggregate(item: SerializedSentimentAggregate): SentimentAggregate {
  const modelVotes: ModelVoteSummary[] = JSON.parse(item.modelVotes);
  return {
    headlineId: item.headlineId,
    runId: item.runId,
    ticker: item.ticker,
    publishedAt: item.publishedAt,
    avgSentiment: item.avgSentiment,
    avgConfidence: item.avgConfidence,
    dispersion: item.dispersion,
    majorityVote: item.majorityVote,
    horizonVote: item.horizonVote,
    numModels: item.numModels,
    requestedModels: item.requestedModels,
    lowConfidence: item.lowConfidence,
    modelVotes,
    updatedAt: item.updatedAt
  };
}

/**
 * Sentiment Aggregate Repository
 */
export const SentimentAggregateRepository = {
  async getAggregate(headlineId: string): Promise<SentimentAggregate | null> {
    const result = await documentClient.get({
      TableName: TableNames.SENTIMENT_AGGREGATES,
      Key: {
        [KeySchemas.SENTIMENT_AGGREGATES.partitionKey]: headlineId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return deserializeSentimentAggregate(result.Item as SerializedSentimentAggregate);
  },

  /**
   * Write the aggregate, replacing any previous aggregate of the headline
   */
  async putAggregate(aggregate: SentimentAggregate): Promise<void> {
    await documentClient.put({
      TableName: TableNames.SENTIMENT_AGGREGATES,
      Item: serializeSentimentAggregate(aggregate)
    }).promise();
  },

  /**
   * Fetch aggregates for the given headlines, keyed by headlineId
   */
  async getAggregates(headlineIds: string[]): Promise<Map<string, SentimentAggregate>> {
    const aggregates = new Map<string, SentimentAggregate>();
    const items = await batchGetAll(
      TableNames.SENTIMENT_AGGREGATES,
      [...new Set(headlineIds)].map(id => ({ [KeySchemas.SENTIMENT_AGGREGATES.partitionKey]: id }))
    );

    for (const item of items) {
      const aggregate = deserializeSentimentAggregate(item as SerializedSentimentAggregate);
      aggregates.set(aggregate.headlineId, aggregate);
    }

    return aggregates;
  },

  /**
   * List aggregates for a ticker whose headline was published at or after startTime
   */
  async listByTicker(ticker: string, startTime: string): Promise<SentimentAggregate[]> {
    const items = await queryAll({
      TableName: TableNames.SENTIMENT_AGGREGATES,
      IndexName: GSINames.SENTIMENT_AGGREGATES.TICKER_PUBLISHED_INDEX,
      KeyConditionExpression: 'ticker = :ticker AND publishedAt >= :start',
      ExpressionAttributeValues: {
        ':ticker': ticker,
        ':start': startTime
      }
    });

    return items.map(item => deserializeSentimentAggregate(item as SerializedSentimentAggregate));
  },

  /**
   * List all aggregates whose headline was published at or after startTime
   */
  async listSince(startTime: string): Promise<SentimentAggregate[]> {
    const items = await scanAll({
      TableName: TableNames.SENTIMENT_AGGREGATES,
      FilterExpression: 'publishedAt >= :start',
      ExpressionAttributeValues: {
        ':start': startTime
      }
    });

    return items.map(item => deserializeSentimentAggregate(item as SerializedSentimentAggregate));
  },

  /**
   * Delete aggregates by headline id
   *
   * @returns Number of aggregates that existed and were deleted
   */
  async deleteAggregates(headlineIds: string[]): Promise<number> {
    const existing = await this.getAggregates(headlineIds);

    await batchWriteAll(
      TableNames.SENTIMENT_AGGREGATES,
      [...existing.keys()].map(id => ({
        DeleteRequest: {
          Key: { [KeySchemas.SENTIMENT_AGGREGATES.partitionKey]: id }
        }
      }))
    );

    return existing.size;
  }
};

// Export serialization functions for testing
export { serializeSentimentAggregate, deserializeSentimentAggregate };
