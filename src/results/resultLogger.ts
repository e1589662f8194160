import { buildMetricRows, type ExecutionResult } from '../domain/index.js';
import type { ExecutionStore } from '../persistence/index.js';
import { type Clock, systemClock } from '../resilience/index.js';

/**
 * Persists one check result: the execution record, then the metric batch,
 * then the trace. Each write is its own statement; a failure rejects with
 * PersistenceError and is not retried.
 */
export class ResultLogger {
  private readonly clock: Clock;

  constructor(
    private readonly store: ExecutionStore,
    clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  async log(monitorId: number, result: ExecutionResult): Promise<string> {
    const recordId = await this.store.insertExecutionRecord({
      monitorId,
      startedAt: result.startedAt,
      completedAt: result.completedAt,
      status: result.status,
      errorMessage: result.errorMessage,
    });

    const rows = buildMetricRows(result, this.clock.now());
    if (rows.length > 0) {
      await this.store.insertMetricRows(recordId, rows);
    } else if (result.status === 'success') {
      // Metric rows are only written when TTFB is present
      console.warn(
        `[ResultLogger] Monitor ${monitorId} record ${recordId}: no TTFB, metrics not stored ` +
          `(dcl=${result.domContentLoadedMs ?? '-'}, load=${result.pageLoadMs ?? '-'})`,
      );
    }

    if (result.trace) {
      await this.store.attachTrace(recordId, result.trace);
    }

    return recordId;
  }
}
