/**
 * Pipeline Config Repository - persisted configuration overrides
 */

import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { StoredPipelineConfig } from '../types/pipeline-config';

export const PipelineConfigRepository = {
  async getConfig(configId: string): Promise<StoredPipelineConfig | null> {
    const result = await documentClient.get({
      TableName: TableNames.PIPELINE_CONFIG,
      Key: {
        [KeySchemas.PIPELINE_CONFIG.partitionKey]: configId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as StoredPipelineConfig;
  },

  async putConfig(stored: StoredPipelineConfig): Promise<void> {
    await documentClient.put({
      TableName: TableNames.PIPELINE_CONFIG,
      Item: stored
    }).promise();
  }
};
