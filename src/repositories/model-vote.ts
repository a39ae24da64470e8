/**
 * Model Vote Repository - append-only storage of individual model outputs
 *
 * Votes are stored with headlineId as partition key and voteId as sort key.
 */

import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { queryAll, batchWriteAll } from '../db/access';
import { ModelVote, ModelProvider, SentimentHorizon } from '../types/sentiment';

/**
 * Serialized model vote for DynamoDB storage
 */
interface SerializedModelVote {
  headlineId: string;
  voteId: string;
  runId: string;
  modelId: string;
  provider: ModelProvider;
  weight: number;
  sentiment: number;
  confidence: number;
  horizon: SentimentHorizon;
  rationale: string;
  responseTimeMs: number;
  createdAt: string;
}

function serializeModelVote(vote: ModelVote): SerializedModelVote {
  return {
    headlineId: vote.headlineId,
    voteId: vote.voteId,
    runId: vote.runId,
    modelId: vote.modelId,
    provider: vote.provider,
    weight: vote.weight,
    sentiment: vote.sentiment,
    confidence: vote.confidence,
    horizon: vote.horizon,
    rationale: vote.rationale,
    responseTimeMs: vote.responseTimeMs,
    createdAt: vote.createdAt
  };
}

function deserializeModelVote(item: SerializedModelVote): ModelVote {
  return {
    voteId: item.voteId,
    headlineId: item.headlineId,
    runId: item.runId,
    modelId: item.modelId,
    provider: item.provider,
    weight: item.weight,
    sentiment: item.sentiment,
    confidence: item.confidence,
    horizon: item.horizon,
    rationale: item.rationale,
    responseTimeMs: item.responseTimeMs,
    createdAt: item.createdAt
  };
}

/**
 * Model Vote Repository
 */
export const ModelVoteRepository = {
  /**
   * Append votes. Existing votes are never modified.
   */
  async putVotes(votes: ModelVote[]): Promise<void> {
    if (votes.length === 0) {
      return;
    }

    await batchWriteAll(
      TableNames.MODEL_VOTES,
      votes.map(vote => ({ PutRequest: { Item: serializeModelVote(vote) } }))
    );
  },

  /**
   * List every vote recorded for a headline, across all runs
   */
  async listByHeadline(headlineId: string): Promise<ModelVote[]> {
    const items = await queryAll({
      TableName: TableNames.MODEL_VOTES,
      KeyConditionExpression: '#headlineId = :headlineId',
      ExpressionAttributeNames: {
        '#headlineId': KeySchemas.MODEL_VOTES.partitionKey
      },
      ExpressionAttributeValues: {
        ':headlineId': headlineId
      }
    });

    return items
      .map(item => deserializeModelVote(item as SerializedModelVote))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  },

  /**
   * Delete all votes of the given headlines
   *
   * @returns Number of votes deleted
   */
  async deleteByHeadlines(headlineIds: string[]): Promise<number> {
    let deleted = 0;

    for (const headlineId of headlineIds) {
      const items = await queryAll({
        TableName: TableNames.MODEL_VOTES,
        KeyConditionExpression: '#headlineId = :headlineId',
        ExpressionAttributeNames: {
          '#headlineId': KeySchemas.MODEL_VOTES.partitionKey
        },
        ExpressionAttributeValues: {
          ':headlineId': headlineId
        },
        ProjectionExpression: 'headlineId, voteId'
      });

      await batchWriteAll(
        TableNames.MODEL_VOTES,
        items.map(item => ({
          DeleteRequest: {
            Key: {
              [KeySchemas.MODEL_VOTES.partitionKey]: item.headlineId,
              [KeySchemas.MODEL_VOTES.sortKey]: item.voteId
            }
          }
        }))
      );
      deleted += items.length;
    }

    return deleted;
  }
};

// Export serialization functions for testing
export { serializeModelVote, deserializeModelVote };
