import type { HarDocument } from '../trace/types.js';
import type {
  ExecutionResult,
  FailedExecution,
  MetricRow,
  PageTimings,
  SuccessfulExecution,
} from './types.js';

interface ExecutionWindow {
  startedAt: Date;
  completedAt: Date;
  trace: HarDocument | null;
}

export function successResult(
  timings: PageTimings,
  window: ExecutionWindow,
): SuccessfulExecution {
  return { status: 'success', errorMessage: null, ...timings, ...window };
}

export function failedResult(
  status: FailedExecution['status'],
  errorMessage: string,
  window: ExecutionWindow,
): FailedExecution {
  return {
    status,
    // Failed results must always explain themselves
    errorMessage: errorMessage.trim() || `Check ended with status ${status}`,
    ttfbMs: null,
    domContentLoadedMs: null,
    pageLoadMs: null,
    ...window,
  };
}

/**
 * Metric rows persisted for a result.
 *
 * Rows are only produced for successful results that have a TTFB value; the
 * other two timings are written as null when absent. A success without TTFB
 * yields no rows even when the DOM and load timings are present.
 */
export function buildMetricRows(
  result: ExecutionResult,
  recordedAt: Date,
): MetricRow[] {
  if (result.status !== 'success' || result.ttfbMs === null) {
    return [];
  }

  return [
    { metricName: 'ttfb_ms', metricValue: result.ttfbMs, recordedAt },
    {
      metricName: 'dom_content_loaded_ms',
      metricValue: result.domContentLoadedMs,
      recordedAt,
    },
    { metricName: 'page_load_ms', metricValue: result.pageLoadMs, recordedAt },
  ];
}
