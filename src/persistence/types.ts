import type {
  ExecutionRecordFields,
  MetricRow,
  Monitor,
} from '../domain/index.js';
import type { HarDocument } from '../trace/index.js';

/** Read-only view of the monitor registry */
export interface MonitorRegistry {
  /** Enabled monitors in a stable order */
  listEnabledMonitors(): Promise<Monitor[]>;
  getMonitor(id: number): Promise<Monitor | null>;
}

/**
 * Execution persistence. Every call is one atomic statement; failures reject
 * with PersistenceError.
 */
export interface ExecutionStore {
  insertExecutionRecord(fields: ExecutionRecordFields): Promise<string>;
  insertMetricRows(recordId: string, rows: MetricRow[]): Promise<void>;
  attachTrace(recordId: string, trace: HarDocument): Promise<void>;
}
