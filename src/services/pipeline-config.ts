/**
 * Pipeline Configuration Service
 *
 * Defaults come from code and environment variables; persisted overrides are
 * validated against the pipeline config schema and read at the start of each cycle.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { PipelineConfigSchema } from '../schemas/pipeline-config';
import { PipelineConfig, PipelineConfigPatch } from '../types/pipeline-config';
import { ModelSelection } from '../types/sentiment';
import { SourceQuota } from '../types/gateway';
import { PipelineConfigRepository } from '../repositories/pipeline-config';
import { DEFAULT_CONSENSUS_OPTIONS } from './sentiment-consensus';
import { DEFAULT_ORCHESTRATOR_CONFIG } from './sentiment-orchestrator';
import { DEFAULT_AGGREGATION_CONFIG } from './ticker-aggregation';
import { DEFAULT_OPPORTUNITY_CONFIG } from './opportunity-generator';
import { DEFAULT_SOURCE_QUOTA } from './fetch-gateway';
import { SchemaValidationError } from './model-response-validator';

export const PIPELINE_CONFIG_ID = 'default';

const MINUTE_MS = 60 * 1000;

export type Environment = Record<string, string | undefined>;

/**
 * Error thrown when a configuration fails schema validation
 */
export class ConfigValidationError extends Error {
  readonly errors: SchemaValidationError[];

  constructor(errors: SchemaValidationError[]) {
    super(`Invalid pipeline configuration: ${errors.map(e => `${e.path} ${e.message}`).join('; ')}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function perMinute(value: string | undefined, fallback: number): SourceQuota {
  return { requestsPerWindow: parsePositiveInt(value, fallback), windowMs: MINUTE_MS };
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return [...new Set(value.split(',').map(item => item.trim()).filter(item => item.length > 0))];
}

/**
 * Parses `provider:modelId[:weight]` entries, e.g. `groq:llama-3.1-8b-instant:2`.
 * Model ids may themselves contain colons, so a trailing numeric segment is read as the weight.
 */
export function parseModelSelections(value: string | undefined): ModelSelection[] {
  const selections: ModelSelection[] = [];

  for (const entry of parseList(value)) {
    const [provider, ...rest] = entry.split(':');
    if ((provider !== 'groq' && provider !== 'openrouter') || rest.length === 0) {
      console.warn('Ignoring invalid model selection', { entry });
      continue;
    }

    let weight = 1;
    const last = rest[rest.length - 1];
    if (rest.length > 1 && /^\d+(\.\d+)?$/.test(last)) {
      weight = Number(last);
      rest.pop();
    }

    selections.push({ provider, modelId: rest.join(':'), weight, enabled: true });
  }

  return selections;
}

/**
 * Builds the default configuration from code defaults and environment overrides
 */
export function defaultPipelineConfig(env: Environment = process.env): PipelineConfig {
  return {
    portfolioIds: parseList(env.PORTFOLIO_IDS),
    ingestionEnabled: env.INGESTION_ENABLED !== 'false',
    models: parseModelSelections(env.SENTIMENT_MODELS),
    deduplication: {
      similarityThreshold: 0.85,
      proximityWindowMinutes: 240,
      lookbackHours: 48,
      minTokensForTokenSet: 3
    },
    orchestrator: {
      ...DEFAULT_CONSENSUS_OPTIONS,
      maxInFlight: parsePositiveInt(env.MAX_MODELS_IN_FLIGHT, DEFAULT_ORCHESTRATOR_CONFIG.maxInFlight),
      headlineDeadlineMs: DEFAULT_ORCHESTRATOR_CONFIG.headlineDeadlineMs,
      modelTimeoutMs: DEFAULT_ORCHESTRATOR_CONFIG.modelTimeoutMs
    },
    aggregation: {
      shiftThreshold: DEFAULT_AGGREGATION_CONFIG.shiftThreshold
    },
    opportunities: {
      ...DEFAULT_OPPORTUNITY_CONFIG,
      weights: { ...DEFAULT_OPPORTUNITY_CONFIG.weights }
    },
    ingestion: {
      portfolioConcurrency: 3,
      lockTtlSeconds: 300
    },
    retention: {
      retentionHours: 96,
      maxHeadlineAgeHours: 24,
      maxBacklogPerCycle: 50
    },
    quotas: {
      headlines: perMinute(env.HEADLINE_REQUESTS_PER_MINUTE, DEFAULT_SOURCE_QUOTA.requestsPerWindow),
      'model:groq': perMinute(env.GROQ_REQUESTS_PER_MINUTE, 30),
      'model:openrouter': perMinute(env.OPENROUTER_REQUESTS_PER_MINUTE, 20)
    }
  };
}

/**
 * Merges a patch into a configuration, group by group. The result is unchecked
 * until it passes validation.
 */
export function mergeConfig(base: PipelineConfig, patch: PipelineConfigPatch): unknown {
  return {
    ...base,
    ...patch,
    deduplication: { ...base.deduplication, ...patch.deduplication },
    orchestrator: { ...base.orchestrator, ...patch.orchestrator },
    aggregation: { ...base.aggregation, ...patch.aggregation },
    opportunities: {
      ...base.opportunities,
      ...patch.opportunities,
      weights: { ...base.opportunities.weights, ...patch.opportunities?.weights }
    },
    ingestion: { ...base.ingestion, ...patch.ingestion },
    retention: { ...base.retention, ...patch.retention },
    quotas: { ...base.quotas, ...patch.quotas }
  };
}

const PATCH_GROUPS = [
  'deduplication', 'orchestrator', 'aggregation', 'opportunities', 'ingestion', 'retention', 'quotas'
] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape check for an untrusted patch: an object whose nested groups are
 * objects. Field values are checked by schema validation after merging.
 */
export function isConfigPatch(value: unknown): value is PipelineConfigPatch {
  if (!isPlainObject(value)) {
    return false;
  }
  if (PATCH_GROUPS.some(group => value[group] !== undefined && !isPlainObject(value[group]))) {
    return false;
  }
  const opportunities = value.opportunities;
  return !isPlainObject(opportunities) || opportunities.weights === undefined || isPlainObject(opportunities.weights);
}

const ajv = new Ajv({ allErrors: true, verbose: true });
const validateSchema: ValidateFunction<PipelineConfig> = ajv.compile<PipelineConfig>(PipelineConfigSchema);

function convertErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError[] {
  if (!errors) return [];

  return errors.map((error) => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
    keyword: error.keyword,
    params: { ...error.params }
  }));
}

let environment: Environment = process.env;

export const PipelineConfigService = {
  /**
   * Replaces the environment the defaults are read from
   */
  setEnvironment(env: Environment): void {
    environment = env;
  },

  getDefaults(): PipelineConfig {
    return defaultPipelineConfig(environment);
  },

  /**
   * Validates a candidate configuration, throwing ConfigValidationError with the failing paths
   */
  validateConfig(candidate: unknown): PipelineConfig {
    if (validateSchema(candidate)) {
      return candidate;
    }
    throw new ConfigValidationError(convertErrors(validateSchema.errors));
  },

  /**
   * Effective configuration: defaults overlaid with the persisted overrides.
   * Stored configurations written before a field existed pick up its default.
   */
  async getConfig(): Promise<PipelineConfig> {
    const defaults = this.getDefaults();
    const stored = await PipelineConfigRepository.getConfig(PIPELINE_CONFIG_ID);
    if (!stored) {
      return defaults;
    }
    return this.validateConfig(mergeConfig(defaults, stored.config));
  },

  /**
   * Applies a partial update and persists the full validated configuration
   */
  async updateConfig(patch: PipelineConfigPatch, now: Date = new Date()): Promise<PipelineConfig> {
    const current = await this.getConfig();
    const config = this.validateConfig(mergeConfig(current, patch));

    await PipelineConfigRepository.putConfig({
      configId: PIPELINE_CONFIG_ID,
      config,
      updatedAt: now.toISOString()
    });

    console.log('Pipeline configuration updated', {
      fields: Object.keys(patch),
      portfolios: config.portfolioIds.length,
      models: config.models.length
    });

    return config;
  }
};
