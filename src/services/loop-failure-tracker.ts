/**
 * Loop Failure Tracker
 * Tracks consecutive iteration failures per scheduler loop and raises the
 * degraded alert once when a loop reaches its threshold.
 */

import { DegradedCallback, LoopName } from '../types/scheduler';

export interface LoopFailureRecord {
  loop: LoopName;
  consecutiveFailures: number;
  lastFailureAt: string;
  lastFailureReason?: string;
  alertTriggered: boolean;
}

export interface LoopFailureTrackerConfig {
  degradedThreshold: number;
  onDegraded?: DegradedCallback;
}

const DEFAULT_DEGRADED_THRESHOLD = 3;

export class LoopFailureTracker {
  private failures: Map<LoopName, LoopFailureRecord>;
  private degradedThreshold: number;
  private onDegraded?: DegradedCallback;

  constructor(config?: Partial<LoopFailureTrackerConfig>) {
    this.failures = new Map();
    this.degradedThreshold = config?.degradedThreshold ?? DEFAULT_DEGRADED_THRESHOLD;
    this.onDegraded = config?.onDegraded;
  }

  /**
   * Records a failed iteration. The callback fires only on the failure that
   * first reaches the threshold; a success re-arms it.
   */
  recordFailure(loop: LoopName, reason?: string, now: Date = new Date()): LoopFailureRecord {
    const existing = this.failures.get(loop);

    const consecutiveFailures = (existing?.consecutiveFailures ?? 0) + 1;
    const shouldAlert = consecutiveFailures >= this.degradedThreshold && !existing?.alertTriggered;

    const record: LoopFailureRecord = {
      loop,
      consecutiveFailures,
      lastFailureAt: now.toISOString(),
      lastFailureReason: reason,
      alertTriggered: (existing?.alertTriggered ?? false) || shouldAlert
    };

    this.failures.set(loop, record);

    if (shouldAlert && this.onDegraded) {
      try {
        this.onDegraded(loop, consecutiveFailures, reason);
      } catch (error) {
        console.error('Degraded callback failed:', {
          loop,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return record;
  }

  recordSuccess(loop: LoopName): void {
    this.failures.delete(loop);
  }

  getConsecutiveFailures(loop: LoopName): number {
    return this.failures.get(loop)?.consecutiveFailures ?? 0;
  }

  getFailureRecord(loop: LoopName): LoopFailureRecord | undefined {
    return this.failures.get(loop);
  }

  isDegraded(loop: LoopName): boolean {
    return this.getConsecutiveFailures(loop) >= this.degradedThreshold;
  }

  /**
   * Loops currently at or above the degraded threshold
   */
  getDegradedLoops(): LoopName[] {
    const result: LoopName[] = [];
    this.failures.forEach((record, loop) => {
      if (record.consecutiveFailures >= this.degradedThreshold) {
        result.push(loop);
      }
    });
    return result;
  }

  setDegradedCallback(callback: DegradedCallback): void {
    this.onDegraded = callback;
  }

  resetAll(): void {
    this.failures.clear();
  }
}
