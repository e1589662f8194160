import type { ExecutionResult } from '../domain/index.js';
import type { StatsSnapshot } from './types.js';

/**
 * ExecutionStats counts what the worker did: check outcomes, trace
 * read-back failures, persistence failures and loop errors. Shared by the
 * scheduler and the checker so degraded paths stay visible.
 */
export class ExecutionStats {
  private state: StatsSnapshot;

  constructor(now: number = Date.now()) {
    this.state = ExecutionStats.empty(now);
  }

  private static empty(now: number): StatsSnapshot {
    return {
      startedAt: now,
      ticks: 0,
      outcomes: { success: 0, timeout: 0, error: 0 },
      traceReadFailures: 0,
      persistenceFailures: 0,
      loopErrors: 0,
      totalCheckDurationMs: 0,
      slowestCheck: null,
    };
  }

  recordTick(): number {
    this.state.ticks++;
    return this.state.ticks;
  }

  recordOutcome(monitorId: number, result: ExecutionResult): void {
    this.state.outcomes[result.status]++;

    const durationMs = result.completedAt.getTime() - result.startedAt.getTime();
    this.state.totalCheckDurationMs += durationMs;
    if (!this.state.slowestCheck || durationMs > this.state.slowestCheck.durationMs) {
      this.state.slowestCheck = { monitorId, durationMs };
    }
  }

  recordTraceReadFailure(): void {
    this.state.traceReadFailures++;
  }

  recordPersistenceFailure(): void {
    this.state.persistenceFailures++;
  }

  recordLoopError(): void {
    this.state.loopErrors++;
  }

  getSnapshot(): StatsSnapshot {
    return {
      ...this.state,
      outcomes: { ...this.state.outcomes },
      slowestCheck: this.state.slowestCheck ? { ...this.state.slowestCheck } : null,
    };
  }

  reset(now: number = Date.now()): void {
    this.state = ExecutionStats.empty(now);
  }
}
