import type { Pool } from 'pg';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceError } from '../../errors/index.js';
import type { HarDocument } from '../../trace/index.js';
import { PgExecutionStore } from '../executionStore.js';

/** Collapse whitespace so assertions do not depend on SQL indentation */
function sql(text: unknown): string {
  return String(text).replace(/\s+/g, ' ').trim();
}

describe('PgExecutionStore', () => {
  let query: ReturnType<typeof vi.fn>;
  let store: PgExecutionStore;

  beforeEach(() => {
    query = vi.fn();
    store = new PgExecutionStore({ query } as unknown as Pool);
  });

  describe('insertExecutionRecord', () => {
    const fields = {
      monitorId: 3,
      startedAt: new Date('2026-02-01T08:00:00.000Z'),
      completedAt: new Date('2026-02-01T08:00:04.000Z'),
      status: 'timeout' as const,
      errorMessage: 'Page load timeout: 5000ms',
    };

    it('inserts the record and returns its id', async () => {
      query.mockResolvedValueOnce({ rows: [{ id: '1001' }], rowCount: 1 });

      const id = await store.insertExecutionRecord(fields);

      expect(id).toBe('1001');
      const [text, values] = query.mock.calls[0] ?? [];
      expect(sql(text)).toBe(
        'INSERT INTO execution_logs (monitor_id, started_at, completed_at, status, error_message) VALUES ($1, $2, $3, $4, $5) RETURNING id',
      );
      expect(values).toEqual([
        3,
        fields.startedAt,
        fields.completedAt,
        'timeout',
        'Page load timeout: 5000ms',
      ]);
    });

    it('wraps driver errors in PersistenceError', async () => {
      query.mockRejectedValueOnce(new Error('connection refused'));

      const error = await store.insertExecutionRecord(fields).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({
        operation: 'insertExecutionRecord',
        message: 'Persistence failed during insertExecutionRecord: connection refused',
      });
    });

    it('fails when no id comes back', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await expect(store.insertExecutionRecord(fields)).rejects.toThrow(
        'Persistence failed during insertExecutionRecord: INSERT returned no id',
      );
    });
  });

  describe('insertMetricRows', () => {
    const recordedAt = new Date('2026-02-01T08:00:05.000Z');

    it('writes the batch as one multi-row statement', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 3 });

      await store.insertMetricRows('1001', [
        { metricName: 'ttfb_ms', metricValue: 88, recordedAt },
        { metricName: 'dom_content_loaded_ms', metricValue: null, recordedAt },
        { metricName: 'page_load_ms', metricValue: 640, recordedAt },
      ]);

      expect(query).toHaveBeenCalledTimes(1);
      const [text, values] = query.mock.calls[0] ?? [];
      expect(sql(text)).toBe(
        'INSERT INTO performance_metrics (execution_log_id, metric_name, metric_value, recorded_at) ' +
          'VALUES ($1, $2, $3, $4), ($5, $6, $7, $8), ($9, $10, $11, $12)',
      );
      expect(values).toEqual([
        '1001', 'ttfb_ms', 88, recordedAt,
        '1001', 'dom_content_loaded_ms', null, recordedAt,
        '1001', 'page_load_ms', 640, recordedAt,
      ]);
    });

    it('does nothing for an empty batch', async () => {
      await store.insertMetricRows('1001', []);

      expect(query).not.toHaveBeenCalled();
    });

    it('wraps driver errors in PersistenceError', async () => {
      query.mockRejectedValueOnce(new Error('deadlock detected'));

      await expect(
        store.insertMetricRows('1001', [{ metricName: 'ttfb_ms', metricValue: 1, recordedAt }]),
      ).rejects.toBeInstanceOf(PersistenceError);
    });
  });

  describe('attachTrace', () => {
    const trace: HarDocument = {
      log: { version: '1.2', creator: { name: 'Playwright', version: '1.47.0' }, entries: [] },
    };

    it('updates har_data with the serialized trace', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 1 });

      await store.attachTrace('1001', trace);

      expect(query).toHaveBeenCalledWith(
        'UPDATE execution_logs SET har_data = $1 WHERE id = $2',
        [JSON.stringify(trace), '1001'],
      );
    });

    it('fails when the record does not exist', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await expect(store.attachTrace('999', trace)).rejects.toThrow(
        'Persistence failed during attachTrace: execution record 999 does not exist',
      );
    });
  });
});
