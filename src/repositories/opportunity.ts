/**
 * Opportunity Repository - persistence for generated trading opportunities
 *
 * Opportunities are keyed by opportunityId. GSIs serve status listings ordered
 * by priority and the active lookup per ticker and direction.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas, GSINames } from '../db/tables';
import { isConditionalCheckFailed, queryAll, scanAll } from '../db/access';
import {
  Opportunity,
  OpportunityDirection,
  OpportunityStatus,
  OpportunityFactors,
  RiskParameters,
  TimeSensitivity
} from '../types/opportunity';
import { SentimentHorizon } from '../types/sentiment';

/**
 * Serialized opportunity for DynamoDB storage
 */
interface SerializedOpportunity {
  opportunityId: string;
  ticker: string;
  direction: OpportunityDirection;
  tickerDirection: string;
  score: number;
  priority: number;
  confidence: number;
  weightedSentiment: number;
  factors: string;  // JSON serialized object
  horizon: SentimentHorizon;
  timeSensitivity: TimeSensitivity;
  riskParameters: string | null;  // JSON serialized object
  supportingHeadlineIds: string;  // JSON serialized array
  status: OpportunityStatus;
  generatedAt: string;
  updatedAt: string;
  expiresAt: string;
}

function createTickerDirectionKey(ticker: string, direction: OpportunityDirection): string {
  return `${ticker}#${direction}`;
}

function serializeOpportunity(opportunity: Opportunity): SerializedOpportunity {
  return {
    opportunityId: opportunity.opportunityId,
    ticker: opportunity.ticker,
    direction: opportunity.direction,
    tickerDirection: createTickerDirectionKey(opportunity.ticker, opportunity.direction),
    score: opportunity.score,
    priority: opportunity.priority,
    confidence: opportunity.confidence,
    weightedSentiment: opportunity.weightedSentiment,
    factors: JSON.stringify(opportunity.factors),
    horizon: opportunity.horizon,
    timeSensitivity: opportunity.timeSensitivity,
    riskParameters: opportunity.riskParameters ? JSON.stringify(opportunity.riskParameters) : null,
    supportingHeadlineIds: JSON.stringify(opportunity.supportingHeadlineIds),
    status: opportunity.status,
    generatedAt: opportunity.generatedAt,
    updatedAt: opportunity.updatedAt,
    expiresAt: opportunity.expiresAt
  };
}

function deserializeOpportunity(item: SerializedOpportunity): Opportunity {
  const factors: OpportunityFactors = JSON.parse(item.factors);
  const riskParameters: RiskParameters | null = item.riskParameters ? JSON.parse(item.riskParameters) : null;
  const supportingHeadlineIds: string[] = JSON.parse(item.supportingHeadlineIds);

  return {
    opportunityId: item.opportunityId,
    ticker: item.ticker,
    direction: item.direction,
    score: item.score,
    priority: item.priority,
    confidence: item.confidence,
    weightedSentiment: item.weightedSentiment,
    factors,
    horizon: item.horizon,
    timeSensitivity: item.timeSensitivity,
    riskParameters,
    supportingHeadlineIds,
    status: item.status,
    generatedAt: item.generatedAt,
    updatedAt: item.updatedAt,
    expiresAt: item.expiresAt
  };
}

/**
 * Opportunity Repository
 */
export const OpportunityRepository = {
  async getOpportunity(opportunityId: string): Promise<Opportunity | null> {
    const result = await documentClient.get({
      TableName: TableNames.OPPORTUNITIES,
      Key: {
        [KeySchemas.OPPORTUNITIES.partitionKey]: opportunityId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return deserializeOpportunity(result.Item as SerializedOpportunity);
  },

  async putOpportunity(opportunity: Opportunity): Promise<void> {
    await documentClient.put({
      TableName: TableNames.OPPORTUNITIES,
      Item: serializeOpportunity(opportunity)
    }).promise();
  },

  /**
   * Overwrite an opportunity only while the stored copy is still ACTIVE
   *
   * @returns false if it was expired, executed or cancelled in the meantime
   */
  async updateActive(opportunity: Opportunity): Promise<boolean> {
    try {
      await documentClient.put({
        TableName: TableNames.OPPORTUNITIES,
        Item: serializeOpportunity(opportunity),
        ConditionExpression: '#status = :active',
        ExpressionAttributeNames: {
          '#status': 'status'
        },
        ExpressionAttributeValues: {
          ':active': 'ACTIVE'
        }
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
   * Find ACTIVE opportunities for a ticker and direction, most recent first
   */
  async findActive(ticker: string, direction: OpportunityDirection): Promise<Opportunity[]> {
    const items = await queryAll({
      TableName: TableNames.OPPORTUNITIES,
      IndexName: GSINames.OPPORTUNITIES.TICKER_DIRECTION_INDEX,
      KeyConditionExpression: 'tickerDirection = :tickerDirection',
      FilterExpression: '#status = :active',
      ExpressionAttributeNames: {
        '#status': 'status'
      },
      ExpressionAttributeValues: {
        ':tickerDirection': createTickerDirectionKey(ticker, direction),
        ':active': 'ACTIVE'
      },
      ScanIndexForward: false
    });

    return items.map(item => deserializeOpportunity(item as SerializedOpportunity));
  },

  /**
   * List opportunities in a status, highest priority first
   */
  async listByStatus(status: OpportunityStatus): Promise<Opportunity[]> {
    const items = await queryAll({
      TableName: TableNames.OPPORTUNITIES,
      IndexName: GSINames.OPPORTUNITIES.STATUS_PRIORITY_INDEX,
      KeyConditionExpression: '#status = :status',
      ExpressionAttributeNames: {
        '#status': 'status'
      },
      ExpressionAttributeValues: {
        ':status': status
      },
      ScanIndexForward: false
    });

    return items.map(item => deserializeOpportunity(item as SerializedOpportunity));
  },

  async listAll(): Promise<Opportunity[]> {
    const items = await scanAll({ TableName: TableNames.OPPORTUNITIES });
    return items.map(item => deserializeOpportunity(item as SerializedOpportunity));
  },

  /**
   * Move an opportunity to a new status only if it is still in the expected status
   *
   * @returns The updated opportunity, or null if the status had already changed
   */
  async updateStatus(
    opportunityId: string,
    expected: OpportunityStatus,
    status: OpportunityStatus,
    updatedAt: string
  ): Promise<Opportunity | null> {
    const params: DynamoDB.DocumentClient.UpdateItemInput = {
      TableName: TableNames.OPPORTUNITIES,
      Key: {
        [KeySchemas.OPPORTUNITIES.partitionKey]: opportunityId
      },
      UpdateExpression: 'SET #status = :status, updatedAt = :updatedAt',
      ConditionExpression: '#status = :expected',
      ExpressionAttributeNames: {
        '#status': 'status'
      },
      ExpressionAttributeValues: {
        ':status': status,
        ':expected': expected,
        ':updatedAt': updatedAt
      },
      ReturnValues: 'ALL_NEW'
    };

    try {
      const result = await documentClient.update(params).promise();
      return result.Attributes ? deserializeOpportunity(result.Attributes as SerializedOpportunity) : null;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return null;
      }
      throw error;
    }
  }
};

// Export serialization functions for testing
export { serializeOpportunity, deserializeOpportunity };
