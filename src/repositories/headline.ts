/**
 * Headline Repository - persistence for ingested headlines
 *
 * Headlines are keyed by their content-derived headlineId so repeated fetches
 * of the same story upsert into the same row. A GSI on ticker/publishedAt
 * serves the deduplication look-back and per-ticker listings.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas, GSINames } from '../db/tables';
import { isConditionalCheckFailed, queryAll, scanAll, batchWriteAll, batchGetAll } from '../db/access';
import { Headline, MarketSession } from '../types/headline';

/**
 * Serialized headline for DynamoDB storage
 */
interface SerializedHeadline {
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
 * Serialize a Headline for DynamoDB storage
 */
function serializeHeadline(headline: Headline): SerializedHeadline {
  return {
    headlineId: headline.headlineId,
    portfolioId: headline.portfolioId,
    ticker: headline.ticker,
    text: headline.text,
    normalizedText: headline.normalizedText,
    source: headline.source,
    publishedAt: headline.publishedAt,
    firstSeenAt: headline.firstSeenAt,
    ingestedAt: headline.ingestedAt,
    isDuplicate: headline.isDuplicate,
    isPrimarySource: headline.isPrimarySource,
    marketSession: headline.marketSession,
    ...(headline.company !== undefined && { company: headline.company }),
    ...(headline.link !== undefined && { link: headline.link }),
    ...(headline.duplicateOf !== undefined && { duplicateOf: headline.duplicateOf }),
    ...(headline.sector !== undefined && { sector: headline.sector }),
    ...(headline.industry !== undefined && { industry: headline.industry })
  };
}

/**
 * Deserialize a DynamoDB item back to Headline
 */
function deserializeHeadline(item: SerializedHeadline): Headline {
  return {
    headlineId: item.headlineId,
    portfolioId: item.portfolioId,
    ticker: item.ticker,
    text: item.text,
    normalizedText: item.normalizedText,
    source: item.source,
    publishedAt: item.publishedAt,
    firstSeenAt: item.firstSeenAt,
    ingestedAt: item.ingestedAt,
    isDuplicate: item.isDuplicate,
    isPrimarySource: item.isPrimarySource,
    marketSession: item.marketSession,
    ...(item.company !== undefined && { company: item.company }),
    ...(item.link !== undefined && { link: item.link }),
    ...(item.duplicateOf !== undefined && { duplicateOf: item.duplicateOf }),
    ...(item.sector !== undefined && { sector: item.sector }),
    ...(item.industry !== undefined && { industry: item.industry })
  };
}

/**
 * Headline Repository
 */
export const HeadlineRepository = {
  /**
   * Get a headline by id
   *
   * @returns The headline, or null if not found
   */
  async getHeadline(headlineId: string): Promise<Headline | null> {
    const result = await documentClient.get({
      TableName: TableNames.HEADLINES,
      Key: {
        [KeySchemas.HEADLINES.partitionKey]: headlineId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return deserializeHeadline(result.Item as SerializedHeadline);
  },

  /**
   * Insert a headline unless a row with the same id already exists
   *
   * @returns True if the headline was written, false if it was already stored
   */
  async putHeadline(headline: Headline): Promise<boolean> {
    try {
      await documentClient.put({
        TableName: TableNames.HEADLINES,
        Item: serializeHeadline(headline),
        ConditionExpression: 'attribute_not_exists(headlineId)'
      }).promise();
      return true;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      throw error;
    }
  },

  /**
   * Return the subset of the given ids that are already stored
   */
  async findExistingIds(headlineIds: string[]): Promise<Set<string>> {
    const items = await batchGetAll(
      TableNames.HEADLINES,
      [...new Set(headlineIds)].map(id => ({ [KeySchemas.HEADLINES.partitionKey]: id })),
      'headlineId'
    );

    return new Set(items.map(item => String(item.headlineId)));
  },

  /**
   * List headlines for a ticker published within a time range, oldest first
   *
   * @param startTime - Inclusive lower bound (ISO string)
   * @param endTime - Inclusive upper bound (ISO string), open-ended if omitted
   */
  async listByTicker(ticker: string, startTime: string, endTime?: string): Promise<Headline[]> {
    const values: DynamoDB.DocumentClient.ExpressionAttributeValueMap = {
      ':ticker': ticker,
      ':start': startTime
    };
    let keyCondition = 'ticker = :ticker AND publishedAt >= :start';

    if (endTime) {
      keyCondition = 'ticker = :ticker AND publishedAt BETWEEN :start AND :end';
      values[':end'] = endTime;
    }

    const items = await queryAll({
      TableName: TableNames.HEADLINES,
      IndexName: GSINames.HEADLINES.TICKER_PUBLISHED_INDEX,
      KeyConditionExpression: keyCondition,
      ExpressionAttributeValues: values,
      ScanIndexForward: true
    });

    return items.map(item => deserializeHeadline(item as SerializedHeadline));
  },

  /**
   * List all headlines published at or after the given time
   */
  async listSince(startTime: string): Promise<Headline[]> {
    const items = await scanAll({
      TableName: TableNames.HEADLINES,
      FilterExpression: 'publishedAt >= :start',
      ExpressionAttributeValues: {
        ':start': startTime
      }
    });

    return items.map(item => deserializeHeadline(item as SerializedHeadline));
  },

  /**
   * List all headlines published before the given time
   */
  async listOlderThan(cutoff: string): Promise<Headline[]> {
    const items = await scanAll({
      TableName: TableNames.HEADLINES,
      FilterExpression: 'publishedAt < :cutoff',
      ExpressionAttributeValues: {
        ':cutoff': cutoff
      }
    });

    return items.map(item => deserializeHeadline(item as SerializedHeadline));
  },

  /**
   * Delete headlines by id
   *
   * @returns Number of delete requests issued
   */
  async deleteHeadlines(headlineIds: string[]): Promise<number> {
    const writeRequests = headlineIds.map(id => ({
      DeleteRequest: {
        Key: { [KeySchemas.HEADLINES.partitionKey]: id }
      }
    }));

    await batchWriteAll(TableNames.HEADLINES, writeRequests);
    return writeRequests.length;
  }
};

// Export serialization functions for testing
export { serializeHeadline, deserializeHeadline };
