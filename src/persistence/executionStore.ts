import type { Pool } from 'pg';
import type { ExecutionRecordFields, MetricRow } from '../domain/index.js';
import { PersistenceError } from '../errors/index.js';
import type { HarDocument } from '../trace/index.js';
import type { ExecutionStore } from './types.js';

/** Execution records and metric rows in `execution_logs` / `performance_metrics` */
export class PgExecutionStore implements ExecutionStore {
  constructor(private readonly pool: Pool) {}

  async insertExecutionRecord(fields: ExecutionRecordFields): Promise<string> {
    let row: { id: string } | undefined;
    try {
      const result = await this.pool.query<{ id: string }>(
        `INSERT INTO execution_logs
           (monitor_id, started_at, completed_at, status, error_message)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id`,
        [
          fields.monitorId,
          fields.startedAt,
          fields.completedAt,
          fields.status,
          fields.errorMessage,
        ],
      );
      row = result.rows[0];
    } catch (error) {
      throw new PersistenceError('insertExecutionRecord', error);
    }

    if (!row) {
      throw new PersistenceError(
        'insertExecutionRecord',
        new Error('INSERT returned no id'),
      );
    }
    // BIGSERIAL ids arrive as strings
    return String(row.id);
  }

  /** All rows go in one multi-row INSERT so the batch is atomic */
  async insertMetricRows(recordId: string, rows: MetricRow[]): Promise<void> {
    if (rows.length === 0) return;

    const values: unknown[] = [];
    const tuples = rows.map((row, i) => {
      const base = i * 4;
      values.push(recordId, row.metricName, row.metricValue, row.recordedAt);
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4})`;
    });

    try {
      await this.pool.query(
        `INSERT INTO performance_metrics
           (execution_log_id, metric_name, metric_value, recorded_at)
         VALUES ${tuples.join(', ')}`,
        values,
      );
    } catch (error) {
      throw new PersistenceError('insertMetricRows', error);
    }
  }

  async attachTrace(recordId: string, trace: HarDocument): Promise<void> {
    let updated: number | null;
    try {
      const result = await this.pool.query(
        'UPDATE execution_logs SET har_data = $1 WHERE id = $2',
        [JSON.stringify(trace), recordId],
      );
      updated = result.rowCount;
    } catch (error) {
      throw new PersistenceError('attachTrace', error);
    }

    if (updated === 0) {
      throw new PersistenceError(
        'attachTrace',
        new Error(`execution record ${recordId} does not exist`),
      );
    }
  }
}
