/**
 * Ticker Stat Repository - derived per-ticker rollups
 *
 * Stats are stored with windowType as partition key and ticker as sort key.
 * A recompute replaces the whole window.
 */

import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { queryAll, batchWriteAll } from '../db/access';
import { TickerBucketStat, WindowType } from '../types/ticker-stats';

/**
 * Ticker Stat Repository
 */
export const TickerStatRepository = {
  async getStat(windowType: WindowType, ticker: string): Promise<TickerBucketStat | null> {
    const result = await documentClient.get({
      TableName: TableNames.TICKER_STATS,
      Key: {
        [KeySchemas.TICKER_STATS.partitionKey]: windowType,
        [KeySchemas.TICKER_STATS.sortKey]: ticker
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as TickerBucketStat;
  },

  async listByWindow(windowType: WindowType): Promise<TickerBucketStat[]> {
    const items = await queryAll({
      TableName: TableNames.TICKER_STATS,
      KeyConditionExpression: 'windowType = :windowType',
      ExpressionAttributeValues: {
        ':windowType': windowType
      }
    });

    return items.map(item => item as TickerBucketStat);
  },

  /**
   * Replace the stored stats of a window: tickers missing from the new set are removed
   */
  async replaceWindow(windowType: WindowType, stats: TickerBucketStat[]): Promise<void> {
    const existing = await this.listByWindow(windowType);
    const keep = new Set(stats.map(stat => stat.ticker));

    const deletes = existing
      .filter(stat => !keep.has(stat.ticker))
      .map(stat => ({
        DeleteRequest: {
          Key: {
            [KeySchemas.TICKER_STATS.partitionKey]: windowType,
            [KeySchemas.TICKER_STATS.sortKey]: stat.ticker
          }
        }
      }));

    const puts = stats.map(stat => ({
      PutRequest: {
        Item: { ...stat, windowType }
      }
    }));

    await batchWriteAll(TableNames.TICKER_STATS, [...deletes, ...puts]);
  }
};
