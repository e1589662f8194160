import * as os from 'node:os';
import * as path from 'node:path';
import 'dotenv/config';
import { ConfigError } from './errors/index.js';

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw);
}

export const config = {
  // Headless mode - set HEADLESS=false to watch checks run
  headless: process.env.HEADLESS !== 'false',

  // Chromium flags for running inside containers
  browserArgs: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],

  // Database connection
  database: {
    host: process.env.DB_HOST || 'postgres',
    port: readInt('DB_PORT', 5432),
    database: process.env.DB_NAME || 'synthetics',
    user: process.env.DB_USER || 'synthetics',
    password: process.env.DB_PASSWORD || '',
    max: readInt('DB_POOL_MAX', 10),
  },

  // Loop timing
  tickIntervalMs: readInt('TICK_INTERVAL_MS', 60 * 1000),
  recoveryDelayMs: readInt('RECOVERY_DELAY_MS', 10 * 1000),

  // Bounds on slow browser operations (navigation uses the monitor's own timeout)
  launchTimeoutMs: readInt('LAUNCH_TIMEOUT_MS', 30 * 1000),
  evaluateTimeoutMs: readInt('EVALUATE_TIMEOUT_MS', 10 * 1000),
  traceReadTimeoutMs: readInt('TRACE_READ_TIMEOUT_MS', 10 * 1000),

  // Transient HAR files, deleted after each check
  traceDir:
    process.env.TRACE_DIR || path.join(os.tmpdir(), 'synthetic-monitor-traces'),

  // Print the stats summary every N ticks (0 disables)
  statsReportEveryTicks: readInt('STATS_REPORT_EVERY_TICKS', 30),
};

export function validateConfig(): void {
  const positive: Array<[string, number]> = [
    ['DB_PORT', config.database.port],
    ['DB_POOL_MAX', config.database.max],
    ['TICK_INTERVAL_MS', config.tickIntervalMs],
    ['RECOVERY_DELAY_MS', config.recoveryDelayMs],
    ['LAUNCH_TIMEOUT_MS', config.launchTimeoutMs],
    ['EVALUATE_TIMEOUT_MS', config.evaluateTimeoutMs],
    ['TRACE_READ_TIMEOUT_MS', config.traceReadTimeoutMs],
  ];

  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(name, `expected a positive integer, got ${process.env[name]}`);
    }
  }

  if (!Number.isInteger(config.statsReportEveryTicks) || config.statsReportEveryTicks < 0) {
    throw new ConfigError(
      'STATS_REPORT_EVERY_TICKS',
      `expected a non-negative integer, got ${process.env.STATS_REPORT_EVERY_TICKS}`,
    );
  }
}
