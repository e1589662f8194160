import type { Checker } from '../checker/index.js';
import type { Monitor, RunNowResult } from '../domain/index.js';
import { MonitorNotFoundError, PersistenceError } from '../errors/index.js';
import { ExecutionStats, printSummary } from '../metrics/index.js';
import type { MonitorRegistry } from '../persistence/index.js';
import { type Clock, systemClock } from '../resilience/index.js';
import type { ResultLogger } from '../results/index.js';
import { formatError } from '../utils/index.js';

export type SchedulerState = 'stopped' | 'running';

export interface SchedulerOptions {
  /** Sleep between the end of one tick and the next snapshot */
  tickIntervalMs: number;
  /** Sleep after a tick fails before trying again */
  recoveryDelayMs: number;
  /** Print the stats summary every N ticks; 0 disables */
  statsReportEveryTicks?: number;
}

export interface SchedulerDeps {
  registry: MonitorRegistry;
  checker: Pick<Checker, 'execute'>;
  resultLogger: Pick<ResultLogger, 'log'>;
  clock?: Clock;
  stats?: ExecutionStats;
}

/**
 * Fixed-interval run loop over the enabled monitors, plus on-demand runs.
 *
 * Each tick snapshots the enabled monitors and checks them one at a time in
 * snapshot order. `stop()` lets the current tick drain and prevents the next
 * one; in-flight checks are never cancelled. `runNow()` is independent of the
 * loop and may overlap a tick.
 */
export class Scheduler {
  private state: SchedulerState = 'stopped';
  private loop: Promise<void> | null = null;
  private sleepAbort: AbortController | null = null;
  private tickCount = 0;

  private readonly registry: MonitorRegistry;
  private readonly checker: Pick<Checker, 'execute'>;
  private readonly resultLogger: Pick<ResultLogger, 'log'>;
  private readonly clock: Clock;
  private readonly stats: ExecutionStats;

  constructor(
    deps: SchedulerDeps,
    private readonly options: SchedulerOptions,
  ) {
    this.registry = deps.registry;
    this.checker = deps.checker;
    this.resultLogger = deps.resultLogger;
    this.clock = deps.clock ?? systemClock;
    this.stats = deps.stats ?? new ExecutionStats();
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Start the loop. The returned promise settles once the loop has stopped.
   */
  start(): Promise<void> {
    if (this.state === 'running' && this.loop) {
      console.warn('[Scheduler] Already running');
      return this.loop;
    }

    this.state = 'running';
    if (!this.loop) {
      this.loop = this.runLoop().finally(() => {
        this.loop = null;
      });
    }
    return this.loop;
  }

  stop(): void {
    if (this.state === 'stopped') return;

    console.log('[Scheduler] Stop requested, current tick will finish');
    this.state = 'stopped';
    this.sleepAbort?.abort();
  }

  /**
   * Execute one monitor immediately and persist its result.
   * Unknown ids return `not_found` without touching persistence;
   * PersistenceError propagates to the caller.
   */
  async runNow(monitorId: number): Promise<RunNowResult> {
    const monitor = await this.registry.getMonitor(monitorId);
    if (!monitor) {
      const error = new MonitorNotFoundError(monitorId);
      console.warn(`[Scheduler] ${error.message}`);
      return { kind: 'not_found', monitorId, errorMessage: error.message };
    }

    console.log(`[Scheduler] Executing monitor ${monitor.id} on demand: ${monitor.name}`);
    const result = await this.checker.execute(monitor.id, monitor.url, monitor.timeoutSeconds);

    try {
      const recordId = await this.resultLogger.log(monitor.id, result);
      return { kind: 'completed', monitorId: monitor.id, recordId, result };
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.stats.recordPersistenceFailure();
      }
      throw error;
    }
  }

  private async runLoop(): Promise<void> {
    console.log('[Scheduler] Started');

    while (this.state === 'running') {
      let delayMs = this.options.tickIntervalMs;

      try {
        await this.runTick();
      } catch (error) {
        console.error(`[Scheduler] Tick failed, retrying in ${this.options.recoveryDelayMs}ms: ${formatError(error)}`);
        this.stats.recordLoopError();
        delayMs = this.options.recoveryDelayMs;
      }

      if (this.state !== 'running') break;
      await this.sleep(delayMs);
    }

    console.log('[Scheduler] Stopped');
  }

  private async runTick(): Promise<void> {
    this.tickCount++;
    this.stats.recordTick();

    const monitors = await this.registry.listEnabledMonitors();
    console.log(`[Scheduler] Tick ${this.tickCount}: ${monitors.length} enabled monitor(s)`);

    for (const monitor of monitors) {
      await this.runScheduled(monitor);
    }

    const every = this.options.statsReportEveryTicks ?? 0;
    if (every > 0 && this.tickCount % every === 0) {
      printSummary(this.stats.getSnapshot());
    }
  }

  /** A persistence failure is logged and the tick moves on to the next monitor */
  private async runScheduled(monitor: Monitor): Promise<void> {
    console.log(`[Scheduler] Executing scheduled monitor ${monitor.id}: ${monitor.name}`);
    const result = await this.checker.execute(monitor.id, monitor.url, monitor.timeoutSeconds);

    try {
      await this.resultLogger.log(monitor.id, result);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.stats.recordPersistenceFailure();
      console.error(`[Scheduler] Result for monitor ${monitor.id} not stored: ${formatError(error)}`);
    }
  }

  private async sleep(ms: number): Promise<void> {
    const controller = new AbortController();
    this.sleepAbort = controller;
    try {
      await this.clock.sleep(ms, controller.signal);
    } finally {
      this.sleepAbort = null;
    }
  }
}
