import type { Pool } from 'pg';
import type { Monitor } from '../domain/index.js';
import { PersistenceError } from '../errors/index.js';
import type { MonitorRegistry } from './types.js';

interface MonitorRow {
  id: number;
  name: string;
  url: string;
  timeout_seconds: number;
  enabled: boolean;
}

const MONITOR_COLUMNS = 'id, name, url, timeout_seconds, enabled';

function rowToMonitor(row: MonitorRow): Monitor {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    timeoutSeconds: row.timeout_seconds,
    enabled: row.enabled,
  };
}

/** Monitor registry backed by the `monitors` table */
export class PgMonitorRegistry implements MonitorRegistry {
  constructor(private readonly pool: Pool) {}

  async listEnabledMonitors(): Promise<Monitor[]> {
    try {
      const { rows } = await this.pool.query<MonitorRow>(
        `SELECT ${MONITOR_COLUMNS} FROM monitors WHERE enabled = true ORDER BY id`,
      );
      return rows.map(rowToMonitor);
    } catch (error) {
      throw new PersistenceError('listEnabledMonitors', error);
    }
  }

  async getMonitor(id: number): Promise<Monitor | null> {
    try {
      const { rows } = await this.pool.query<MonitorRow>(
        `SELECT ${MONITOR_COLUMNS} FROM monitors WHERE id = $1`,
        [id],
      );
      const row = rows[0];
      return row ? rowToMonitor(row) : null;
    } catch (error) {
      throw new PersistenceError('getMonitor', error);
    }
  }
}
