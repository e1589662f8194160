/**
 * Execution statistics types
 * Counters kept in-process for the lifetime of the worker
 */

import type { ExecutionStatus } from '../domain/index.js';

/** Point-in-time copy of the worker's counters */
export interface StatsSnapshot {
  startedAt: number; // epoch ms when collection began
  ticks: number;
  outcomes: Record<ExecutionStatus, number>;
  traceReadFailures: number;
  persistenceFailures: number;
  loopErrors: number;
  totalCheckDurationMs: number;
  slowestCheck: SlowCheck | null;
}

export interface SlowCheck {
  monitorId: number;
  durationMs: number;
}

/** Derived figures printed in the periodic summary */
export interface StatsSummary {
  totalChecks: number;
  successRate: number; // 0..1, 0 when no checks ran
  avgCheckDurationMs: number;
  slowestCheck: SlowCheck | null;
  traceReadFailures: number;
  persistenceFailures: number;
  loopErrors: number;
}
