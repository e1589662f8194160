import pg from 'pg';
import type { Pool } from 'pg';
import { formatError } from '../utils/index.js';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
}

/**
 * Create the connection pool shared by the registry and the execution store
 */
export function createPool(config: DatabaseConfig): Pool {
  const pool = new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
  });

  // Idle clients can error when the server restarts; pg re-connects on next use
  pool.on('error', (error) => {
    console.error(`[Persistence] Idle client error: ${formatError(error)}`);
  });

  return pool;
}
