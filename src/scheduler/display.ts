import type { RunNowResult } from '../domain/index.js';

/** JSON shape printed by `run-now`; the HAR itself is summarized, not dumped */
export interface RunNowReport {
  monitor_id: number;
  status: 'success' | 'timeout' | 'error' | 'not_found';
  error_message: string | null;
  log_id: string | null;
  ttfb_ms: number | null;
  dom_content_loaded_ms: number | null;
  page_load_ms: number | null;
  trace_entries: number | null;
  started_at: string | null;
  completed_at: string | null;
}

export function toRunNowReport(outcome: RunNowResult): RunNowReport {
  if (outcome.kind === 'not_found') {
    return {
      monitor_id: outcome.monitorId,
      status: 'not_found',
      error_message: outcome.errorMessage,
      log_id: null,
      ttfb_ms: null,
      dom_content_loaded_ms: null,
      page_load_ms: null,
      trace_entries: null,
      started_at: null,
      completed_at: null,
    };
  }

  const { result } = outcome;
  return {
    monitor_id: outcome.monitorId,
    status: result.status,
    error_message: result.errorMessage,
    log_id: outcome.recordId,
    ttfb_ms: result.ttfbMs,
    dom_content_loaded_ms: result.domContentLoadedMs,
    page_load_ms: result.pageLoadMs,
    trace_entries: result.trace ? result.trace.log.entries.length : null,
    started_at: result.startedAt.toISOString(),
    completed_at: result.completedAt.toISOString(),
  };
}

/** Print run-now outcome */
export function printRunNowReport(outcome: RunNowResult): void {
  console.log(JSON.stringify(toRunNowReport(outcome), null, 2));
}
