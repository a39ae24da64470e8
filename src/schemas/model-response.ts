/**
 * JSON Schema for headline sentiment model responses.
 * Missing confidence, horizon and rationale are filled with defaults.
 */

import { SentimentHorizon } from '../types/sentiment';

export interface ModelResponseOutput {
  sentiment: number;
  confidence: number;
  horizon: SentimentHorizon;
  rationale: string;
}

export const ModelResponseSchema = {
  type: 'object',
  required: ['sentiment'],
  properties: {
    sentiment: {
      type: 'number',
      minimum: -1,
      maximum: 1
    },
    confidence: {
      type: 'number',
      minimum: 0,
      maximum: 1,
      default: 0.5
    },
    horizon: {
      type: 'string',
      enum: ['<1h', '1-4h', 'same_day', 'next_open', '24h'],
      default: 'same_day'
    },
    rationale: {
      type: 'string',
      default: ''
    }
  },
  additionalProperties: true
} as const;
