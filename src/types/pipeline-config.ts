/**
 * Pipeline Configuration Types
 */

import { ModelSelection } from './sentiment';
import { OpportunityGeneratorConfig } from './opportunity';
import { SourceQuota } from './gateway';

export interface DeduplicationSettings {
  similarityThreshold: number;
  proximityWindowMinutes: number;
  lookbackHours: number;
  minTokensForTokenSet: number;
}

export interface OrchestratorSettings {
  maxInFlight: number;
  headlineDeadlineMs: number;
  modelTimeoutMs: number;
  minResponseFraction: number;
  lowConfidencePenalty: number;
  neutralEpsilon: number;
}

export interface AggregationSettings {
  shiftThreshold: number;
}

export interface IngestionSettings {
  portfolioConcurrency: number;
  lockTtlSeconds: number;
}

export interface RetentionSettings {
  retentionHours: number;
  maxHeadlineAgeHours: number;
  maxBacklogPerCycle: number;
}

/**
 * Request quotas keyed by gateway source id, e.g. `model:groq` or `headlines`
 */
export type QuotaSettings = Record<string, SourceQuota>;

export interface PipelineConfig {
  portfolioIds: string[];
  ingestionEnabled: boolean;
  models: ModelSelection[];
  deduplication: DeduplicationSettings;
  orchestrator: OrchestratorSettings;
  aggregation: AggregationSettings;
  opportunities: OpportunityGeneratorConfig;
  ingestion: IngestionSettings;
  retention: RetentionSettings;
  quotas: QuotaSettings;
}

/**
 * Partial update accepted by the configuration service. Nested groups merge field by field.
 */
export interface PipelineConfigPatch {
  portfolioIds?: string[];
  ingestionEnabled?: boolean;
  models?: ModelSelection[];
  deduplication?: Partial<DeduplicationSettings>;
  orchestrator?: Partial<OrchestratorSettings>;
  aggregation?: Partial<AggregationSettings>;
  opportunities?: Partial<Omit<OpportunityGeneratorConfig, 'weights'>> & {
    weights?: Partial<OpportunityGeneratorConfig['weights']>;
  };
  ingestion?: Partial<IngestionSettings>;
  retention?: Partial<RetentionSettings>;
  /** Listed sources replace their quota; others keep theirs */
  quotas?: QuotaSettings;
}

export interface StoredPipelineConfig {
  configId: string;
  config: PipelineConfig;
  updatedAt: string;
}
