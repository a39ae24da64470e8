/**
 * JSON Schema for the persisted pipeline configuration.
 * Unknown fields are rejected at every level.
 */

const probability = { type: 'number', minimum: 0, maximum: 1 } as const;
const positiveNumber = { type: 'number', exclusiveMinimum: 0 } as const;
const positiveInteger = { type: 'integer', minimum: 1 } as const;

export const PipelineConfigSchema = {
  type: 'object',
  required: [
    'portfolioIds', 'ingestionEnabled', 'models', 'deduplication', 'orchestrator',
    'aggregation', 'opportunities', 'ingestion', 'retention', 'quotas'
  ],
  properties: {
    portfolioIds: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
      uniqueItems: true
    },
    ingestionEnabled: { type: 'boolean' },
    models: {
      type: 'array',
      items: {
        type: 'object',
        required: ['modelId', 'provider', 'weight', 'enabled'],
        properties: {
          modelId: { type: 'string', minLength: 1 },
          provider: { type: 'string', enum: ['groq', 'openrouter'] },
          weight: { type: 'number', minimum: 0 },
          enabled: { type: 'boolean' }
        },
        additionalProperties: false
      }
    },
    deduplication: {
      type: 'object',
      required: ['similarityThreshold', 'proximityWindowMinutes', 'lookbackHours', 'minTokensForTokenSet'],
      properties: {
        similarityThreshold: probability,
        proximityWindowMinutes: positiveNumber,
        lookbackHours: positiveNumber,
        minTokensForTokenSet: { type: 'integer', minimum: 0 }
      },
      additionalProperties: false
    },
    orchestrator: {
      type: 'object',
      required: [
        'maxInFlight', 'headlineDeadlineMs', 'modelTimeoutMs',
        'minResponseFraction', 'lowConfidencePenalty', 'neutralEpsilon'
      ],
      properties: {
        maxInFlight: positiveInteger,
        headlineDeadlineMs: positiveInteger,
        modelTimeoutMs: positiveInteger,
        minResponseFraction: probability,
        lowConfidencePenalty: probability,
        neutralEpsilon: { type: 'number', minimum: 0, maximum: 1 }
      },
      additionalProperties: false
    },
    aggregation: {
      type: 'object',
      required: ['shiftThreshold'],
      properties: {
        shiftThreshold: positiveNumber
      },
      additionalProperties: false
    },
    opportunities: {
      type: 'object',
      required: [
        'lookbackHours', 'minConfidence', 'minModels', 'maxSignalDispersion', 'directionThreshold',
        'minScore', 'recencyHalfLifeHours', 'volumeSaturation', 'weights', 'stopOffsetPct',
        'targetOffsetPct', 'baselineVolatility', 'cooldownMinutes'
      ],
      properties: {
        lookbackHours: positiveNumber,
        minConfidence: probability,
        minModels: positiveInteger,
        maxSignalDispersion: { type: 'number', minimum: 0 },
        directionThreshold: probability,
        minScore: probability,
        recencyHalfLifeHours: positiveNumber,
        volumeSaturation: positiveInteger,
        weights: {
          type: 'object',
          required: ['magnitude', 'confidence', 'consensus', 'recency', 'volume'],
          properties: {
            magnitude: probability,
            confidence: probability,
            consensus: probability,
            recency: probability,
            volume: probability
          },
          additionalProperties: false
        },
        stopOffsetPct: { type: 'number', exclusiveMinimum: 0, maximum: 0.5 },
        targetOffsetPct: { type: 'number', exclusiveMinimum: 0, maximum: 1 },
        baselineVolatility: positiveNumber,
        cooldownMinutes: { type: 'number', minimum: 0 }
      },
      additionalProperties: false
    },
    ingestion: {
      type: 'object',
      required: ['portfolioConcurrency', 'lockTtlSeconds'],
      properties: {
        portfolioConcurrency: positiveInteger,
        lockTtlSeconds: positiveInteger
      },
      additionalProperties: false
    },
    retention: {
      type: 'object',
      required: ['retentionHours', 'maxHeadlineAgeHours', 'maxBacklogPerCycle'],
      properties: {
        retentionHours: positiveNumber,
        maxHeadlineAgeHours: positiveNumber,
        maxBacklogPerCycle: { type: 'integer', minimum: 0 }
      },
      additionalProperties: false
    },
    quotas: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['requestsPerWindow', 'windowMs'],
        properties: {
          requestsPerWindow: positiveInteger,
          windowMs: positiveInteger
        },
        additionalProperties: false
      }
    }
  },
  additionalProperties: false
} as const;
