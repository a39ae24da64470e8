/**
 * Pipeline Scheduler Types
 */

export type SchedulerState = 'STOPPED' | 'RUNNING' | 'PAUSED' | 'STOPPING';

export type SchedulerHealth = 'HEALTHY' | 'DEGRADED';

export type LoopName = 'ingestion' | 'hygiene';

export interface LoopStatus {
  intervalMs: number;
  iterations: number;
  successes: number;
  failures: number;
  consecutiveFailures: number;
  running: boolean;
  lastRunAt?: string;
  lastSuccessAt?: string;
  lastError?: string;
}

export interface SchedulerStatus {
  state: SchedulerState;
  health: SchedulerHealth;
  startedAt?: string;
  lastHeartbeatAt?: string;
  loops: Record<LoopName, LoopStatus>;
}

export interface SchedulerConfig {
  ingestionIntervalMs: number;
  hygieneIntervalMs: number;
  degradedThreshold: number;
  runImmediately: boolean;
}

export interface DegradedCallback {
  (loop: LoopName, consecutiveFailures: number, lastError?: string): void;
}

/**
 * Work performed by one scheduler loop iteration
 */
export interface LoopTask {
  (signal: AbortSignal): Promise<unknown>;
}
