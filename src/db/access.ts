import { DynamoDB } from 'aws-sdk';
import { documentClient } from './client';
import { BATCH_GET_LIMIT, BATCH_WRITE_LIMIT } from './tables';
import { sleep } from '../utils/abort';

/**
 * Error thrown when a requested resource is not found
 */
export class ResourceNotFoundError extends Error {
  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`);
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * Error thrown when a batch request still has unprocessed items after every retry
 */
export class UnprocessedItemsError extends Error {
  readonly tableName: string;
  readonly remaining: number;

  constructor(operation: string, tableName: string, remaining: number, attempts: number) {
    super(`${operation} on ${tableName} left ${remaining} unprocessed items after ${attempts} attempts`);
    this.name = 'UnprocessedItemsError';
    this.tableName = tableName;
    this.remaining = remaining;
  }
}

/**
 * Retry of the items DynamoDB returns unprocessed from a batch request
 */
export interface BatchRetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_BATCH_RETRY: BatchRetryOptions = {
  maxAttempts: 5,
  baseDelayMs: 50,
  maxDelayMs: 2000,
  sleep: (ms) => sleep(ms)
};

function batchRetryDelay(options: BatchRetryOptions, attempt: number): number {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

/**
 * Check whether an error is a failed DynamoDB conditional write
 */
export function isConditionalCheckFailed(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ConditionalCheckFailedException';
}

/**
 * Run a query to completion, following LastEvaluatedKey
 */
export async function queryAll(params: DynamoDB.DocumentClient.QueryInput): Promise<DynamoDB.DocumentClient.ItemList> {
  const items: DynamoDB.DocumentClient.ItemList = [];
  let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

  do {
    const result = await documentClient.query({
      ...params,
      ...(exclusiveStartKey && { ExclusiveStartKey: exclusiveStartKey })
    }).promise();
    items.push(...(result.Items || []));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

/**
 * Run a scan to completion, following LastEvaluatedKey
 */
export async function scanAll(params: DynamoDB.DocumentClient.ScanInput): Promise<DynamoDB.DocumentClient.ItemList> {
  const items: DynamoDB.DocumentClient.ItemList = [];
  let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

  do {
    const result = await documentClient.scan({
      ...params,
      ...(exclusiveStartKey && { ExclusiveStartKey: exclusiveStartKey })
    }).promise();
    items.push(...(result.Items || []));
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

/**
 * Write requests in chunks of 25 (DynamoDB limit), resubmitting unprocessed
 * items with exponential backoff
 *
 * @throws UnprocessedItemsError when items remain after maxAttempts
 */
export async function batchWriteAll(
  tableName: string,
  writeRequests: DynamoDB.DocumentClient.WriteRequest[],
  retry: BatchRetryOptions = DEFAULT_BATCH_RETRY
): Promise<void> {
  for (let i = 0; i < writeRequests.length; i += BATCH_WRITE_LIMIT) {
    let pending = writeRequests.slice(i, i + BATCH_WRITE_LIMIT);

    for (let attempt = 1; pending.length > 0; attempt++) {
      if (attempt > 1) {
        await retry.sleep(batchRetryDelay(retry, attempt - 1));
      }
      const result = await documentClient.batchWrite({
        RequestItems: {
          [tableName]: pending
        }
      }).promise();

      pending = result.UnprocessedItems?.[tableName] ?? [];
      if (pending.length > 0 && attempt >= retry.maxAttempts) {
        throw new UnprocessedItemsError('batchWrite', tableName, pending.length, attempt);
      }
    }
  }
}

/**
 * Get items by key in chunks of 100 (DynamoDB limit), requesting unprocessed
 * keys again with exponential backoff
 *
 * @throws UnprocessedItemsError when keys remain after maxAttempts
 */
export async function batchGetAll(
  tableName: string,
  keys: DynamoDB.DocumentClient.Key[],
  projectionExpression?: string,
  retry: BatchRetryOptions = DEFAULT_BATCH_RETRY
): Promise<DynamoDB.DocumentClient.ItemList> {
  const items: DynamoDB.DocumentClient.ItemList = [];

  for (let i = 0; i < keys.length; i += BATCH_GET_LIMIT) {
    let pending = keys.slice(i, i + BATCH_GET_LIMIT);

    for (let attempt = 1; pending.length > 0; attempt++) {
      if (attempt > 1) {
        await retry.sleep(batchRetryDelay(retry, attempt - 1));
      }
      const result = await documentClient.batchGet({
        RequestItems: {
          [tableName]: {
            Keys: pending,
            ...(projectionExpression !== undefined && { ProjectionExpression: projectionExpression })
          }
        }
      }).promise();

      items.push(...(result.Responses?.[tableName] || []));
      pending = result.UnprocessedKeys?.[tableName]?.Keys ?? [];
      if (pending.length > 0 && attempt >= retry.maxAttempts) {
        throw new UnprocessedItemsError('batchGet', tableName, pending.length, attempt);
      }
    }
  }

  return items;
}
