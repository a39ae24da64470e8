import { DynamoDB } from 'aws-sdk';

/**
 * DynamoDB DocumentClient configuration
 * Uses environment variables for configuration with sensible defaults
 */
const dynamoDbConfig: DynamoDB.DocumentClient.DocumentClientOptions & DynamoDB.Types.ClientConfiguration = {
  region: process.env.AWS_REGION || 'us-east-1',
  ...(process.env.DYNAMODB_ENDPOINT && {
    endpoint: process.env.DYNAMODB_ENDPOINT
  }),
  convertEmptyValues: true
};

/**
 * Singleton DynamoDB DocumentClient instance shared by all repositories
 */
export const documentClient = new DynamoDB.DocumentClient(dynamoDbConfig);
