/**
 * Pipeline Scheduler
 *
 * Drives the ingestion and hygiene loops on chained timers, so iterations of
 * one loop never overlap. Lifecycle changes go through an explicit transition
 * table; a failing iteration is logged and counted but never stops the
 * scheduler.
 */

import {
  DegradedCallback,
  LoopName,
  LoopStatus,
  LoopTask,
  SchedulerConfig,
  SchedulerState,
  SchedulerStatus
} from '../types/scheduler';
import { LoopFailureTracker } from './loop-failure-tracker';
import { InvalidStateTransitionError } from '../utils/errors';

/**
 * Valid state transitions map
 */
export const VALID_SCHEDULER_TRANSITIONS: Record<SchedulerState, SchedulerState[]> = {
  'STOPPED': ['RUNNING'],
  'RUNNING': ['PAUSED', 'STOPPING'],
  'PAUSED': ['RUNNING', 'STOPPING'],
  'STOPPING': ['STOPPED']
};

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  ingestionIntervalMs: 5 * 60 * 1000,
  hygieneIntervalMs: 60 * 60 * 1000,
  degradedThreshold: 3,
  runImmediately: true
};

export type SchedulerTasks = Record<LoopName, LoopTask>;

export interface PipelineSchedulerOptions {
  onDegraded?: DegradedCallback;
}

interface LoopRuntime {
  name: LoopName;
  task: LoopTask;
  timer: NodeJS.Timeout | null;
  inFlight: Promise<void> | null;
  controller: AbortController | null;
  status: LoopStatus;
}

const LOOP_NAMES: LoopName[] = ['ingestion', 'hygiene'];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function initialLoopStatus(intervalMs: number): LoopStatus {
  return {
    intervalMs,
    iterations: 0,
    successes: 0,
    failures: 0,
    consecutiveFailures: 0,
    running: false
  };
}

export class PipelineScheduler {
  private state: SchedulerState = 'STOPPED';
  private config: SchedulerConfig;
  private loops: Record<LoopName, LoopRuntime>;
  private tracker: LoopFailureTracker;
  private stopPromise: Promise<void> | null = null;
  private startedAt?: string;
  private lastHeartbeatAt?: string;

  constructor(tasks: SchedulerTasks, config: Partial<SchedulerConfig> = {}, options: PipelineSchedulerOptions = {}) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.tracker = new LoopFailureTracker({
      degradedThreshold: this.config.degradedThreshold,
      onDegraded: options.onDegraded ?? ((loop, consecutiveFailures, lastError) => {
        console.error('Scheduler loop degraded:', { loop, consecutiveFailures, lastError });
      })
    });
    this.loops = {
      ingestion: this.createLoop('ingestion', tasks.ingestion, this.config.ingestionIntervalMs),
      hygiene: this.createLoop('hygiene', tasks.hygiene, this.config.hygieneIntervalMs)
    };
  }

  private createLoop(name: LoopName, task: LoopTask, intervalMs: number): LoopRuntime {
    return { name, task, timer: null, inFlight: null, controller: null, status: initialLoopStatus(intervalMs) };
  }

  setDegradedHandler(callback: DegradedCallback): void {
    this.tracker.setDegradedCallback(callback);
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Check if a state transition is valid
   */
  isValidTransition(currentState: SchedulerState, targetState: SchedulerState): boolean {
    return VALID_SCHEDULER_TRANSITIONS[currentState].includes(targetState);
  }

  private transition(targetState: SchedulerState): void {
    if (!this.isValidTransition(this.state, targetState)) {
      throw new InvalidStateTransitionError(this.state, targetState, 'scheduler state');
    }
    console.log('Scheduler state changed:', { from: this.state, to: targetState });
    this.state = targetState;
  }

  /**
   * Start both loops. The first iteration of each runs immediately unless
   * configured otherwise. No-op while running or paused.
   *
   * @throws InvalidStateTransitionError while stopping
   */
  start(): void {
    if (this.state === 'RUNNING' || this.state === 'PAUSED') {
      return;
    }
    this.transition('RUNNING');

    this.startedAt = new Date().toISOString();
    this.tracker.resetAll();
    for (const name of LOOP_NAMES) {
      const loop = this.loops[name];
      loop.status = initialLoopStatus(loop.status.intervalMs);
      this.schedule(loop, this.config.runImmediately ? 0 : loop.status.intervalMs);
    }
  }

  /**
   * Pause both loops and cancel in-flight iterations. Timers keep ticking so
   * the heartbeat stays current.
   */
  pause(): void {
    if (this.state === 'PAUSED') {
      return;
    }
    this.transition('PAUSED');
    this.abortInFlight();
  }

  resume(): void {
    if (this.state === 'RUNNING') {
      return;
    }
    this.transition('RUNNING');
  }

  /**
   * Stop both loops, cancelling and then awaiting in-flight iterations.
   * Concurrent calls share one promise.
   */
  stop(): Promise<void> {
    if (this.state === 'STOPPED') {
      return Promise.resolve();
    }
    if (this.stopPromise) {
      return this.stopPromise;
    }

    this.transition('STOPPING');
    for (const name of LOOP_NAMES) {
      const loop = this.loops[name];
      if (loop.timer) {
        clearTimeout(loop.timer);
        loop.timer = null;
      }
    }
    this.abortInFlight();

    const inFlight = LOOP_NAMES
      .map(name => this.loops[name].inFlight)
      .filter((p): p is Promise<void> => p !== null);

    this.stopPromise = Promise.all(inFlight).then(() => {
      this.transition('STOPPED');
      this.stopPromise = null;
    });
    return this.stopPromise;
  }

  /**
   * Run one ingestion iteration now. Shares the in-flight iteration when one
   * is already running; errors are contained like scheduled iterations.
   *
   * @returns false when the scheduler is not running
   */
  async triggerIngestion(): Promise<boolean> {
    if (this.state !== 'RUNNING') {
      console.warn('Ingestion trigger ignored, scheduler not running:', { state: this.state });
      return false;
    }
    await this.runIteration(this.loops.ingestion);
    return true;
  }

  /**
   * Snapshot of the scheduler. Has no side effects.
   */
  status(): SchedulerStatus {
    return {
      state: this.state,
      health: this.tracker.getDegradedLoops().length > 0 ? 'DEGRADED' : 'HEALTHY',
      startedAt: this.startedAt,
      lastHeartbeatAt: this.lastHeartbeatAt,
      loops: {
        ingestion: { ...this.loops.ingestion.status },
        hygiene: { ...this.loops.hygiene.status }
      }
    };
  }

  private abortInFlight(): void {
    for (const name of LOOP_NAMES) {
      this.loops[name].controller?.abort();
    }
  }

  private schedule(loop: LoopRuntime, delayMs: number): void {
    loop.timer = setTimeout(() => {
      loop.timer = null;
      void this.tick(loop);
    }, delayMs);
  }

  private async tick(loop: LoopRuntime): Promise<void> {
    if (this.state === 'STOPPING' || this.state === 'STOPPED') {
      return;
    }

    this.lastHeartbeatAt = new Date().toISOString();
    if (this.state === 'RUNNING') {
      await this.runIteration(loop);
    }

    if (this.state === 'RUNNING' || this.state === 'PAUSED') {
      this.schedule(loop, loop.status.intervalMs);
    }
  }

  private runIteration(loop: LoopRuntime): Promise<void> {
    if (loop.inFlight) {
      return loop.inFlight;
    }

    const controller = new AbortController();
    loop.controller = controller;
    loop.inFlight = this.execute(loop, controller.signal).finally(() => {
      loop.inFlight = null;
      loop.controller = null;
    });
    return loop.inFlight;
  }

  /**
   * Run the loop's task once. Never rejects.
   */
  private async execute(loop: LoopRuntime, signal: AbortSignal): Promise<void> {
    const status = loop.status;
    const startTime = Date.now();
    status.running = true;
    status.iterations++;
    status.lastRunAt = new Date().toISOString();

    try {
      await loop.task(signal);
      status.successes++;
      status.lastSuccessAt = new Date().toISOString();
      this.tracker.recordSuccess(loop.name);
      status.consecutiveFailures = 0;
    } catch (error) {
      if (signal.aborted) {
        // Paused or stopped mid-iteration; not a failure of the loop
        console.log('Scheduler iteration cancelled:', { loop: loop.name, durationMs: Date.now() - startTime });
        return;
      }

      const message = errorMessage(error);
      status.failures++;
      status.lastError = message;
      this.tracker.recordFailure(loop.name, message);
      status.consecutiveFailures = this.tracker.getConsecutiveFailures(loop.name);

      console.error('Scheduler iteration failed:', {
        loop: loop.name,
        error: message,
        consecutiveFailures: status.consecutiveFailures,
        durationMs: Date.now() - startTime
      });
    } finally {
      status.running = false;
    }
  }
}
