/**
 * Ingestion Lock Repository - per-portfolio "in ingestion" locks
 *
 * A lock is a conditional put that succeeds when no row exists or the existing
 * row has expired. The expiresAtEpoch attribute doubles as the table's TTL
 * attribute so abandoned locks are also removed by DynamoDB.
 */

import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { isConditionalCheckFailed } from '../db/access';

export interface IngestionLock {
  lockKey: string;
  owner: string;
  acquiredAt: string;
  expiresAtEpoch: number;
}

export function portfolioLockKey(portfolioId: string): string {
  return `ingestion:portfolio:${portfolioId}:lock`;
}

export const IngestionLockRepository = {
  /**
   * Try to take the lock
   *
   * @returns The lock if acquired, null if another owner holds an unexpired lock
   */
  async acquire(lockKey: string, owner: string, ttlSeconds: number, now: Date = new Date()): Promise<IngestionLock | null> {
    const nowEpoch = Math.floor(now.getTime() / 1000);
    const lock: IngestionLock = {
      lockKey,
      owner,
      acquiredAt: now.toISOString(),
      expiresAtEpoch: nowEpoch + ttlSeconds
    };

    try {
      await documentClient.put({
        TableName: TableNames.INGESTION_LOCKS,
        Item: lock,
        ConditionExpression: 'attribute_not_exists(lockKey) OR expiresAtEpoch < :now',
        ExpressionAttributeValues: {
          ':now': nowEpoch
        }
      }).promise();
      return lock;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return null;
      }
      throw error;
    }
  },

  /**
   * Release a lock held by the given owner
   *
   * @returns False if the lock had expired and been taken over by another owner
   */
  async release(lockKey: string, owner: string): Promise<boolean> {
    try {
      await documentClient.delete({
        TableName: TableNames.INGESTION_LOCKS,
        Key: {
          [KeySchemas.INGESTION_LOCKS.partitionKey]: lockKey
        },
        ConditionExpression: '#owner = :owner',
        ExpressionAttributeNames: {
          '#owner': 'owner'
        },
        ExpressionAttributeValues: {
          ':owner': owner
        }
      }).promise();
      return true;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      throw error;
    }
  }
};
