/**
 * Domain types for synthetic checks.
 * Monitors come from the registry; results flow from the checker to the result logger.
 */

import type { HarDocument } from '../trace/types.js';

/** A registered URL to check (owned by the registry, never mutated here) */
export interface Monitor {
  id: number;
  name: string;
  url: string;
  timeoutSeconds: number;
  enabled: boolean;
}

export type ExecutionStatus = 'success' | 'timeout' | 'error';

/** Page-load timings in milliseconds; null when the browser did not expose the value */
export interface PageTimings {
  ttfbMs: number | null;
  domContentLoadedMs: number | null;
  pageLoadMs: number | null;
}

interface ExecutionBase {
  trace: HarDocument | null;
  startedAt: Date;
  completedAt: Date;
}

export interface SuccessfulExecution extends ExecutionBase, PageTimings {
  status: 'success';
  errorMessage: null;
}

/** Timeouts and errors never carry metrics */
export interface FailedExecution extends ExecutionBase {
  status: 'timeout' | 'error';
  errorMessage: string;
  ttfbMs: null;
  domContentLoadedMs: null;
  pageLoadMs: null;
}

export type ExecutionResult = SuccessfulExecution | FailedExecution;

export type MetricName = 'ttfb_ms' | 'dom_content_loaded_ms' | 'page_load_ms';

/** One row of the performance_metrics table, before it has an id */
export interface MetricRow {
  metricName: MetricName;
  metricValue: number | null;
  recordedAt: Date;
}

/** Fields of the execution_logs row inserted for every check */
export interface ExecutionRecordFields {
  monitorId: number;
  startedAt: Date;
  completedAt: Date;
  status: ExecutionStatus;
  errorMessage: string | null;
}

/** Outcome of an on-demand run */
export type RunNowResult =
  | { kind: 'completed'; monitorId: number; recordId: string; result: ExecutionResult }
  | { kind: 'not_found'; monitorId: number; errorMessage: string };
