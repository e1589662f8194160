#!/usr/bin/env node
import { createChromiumLauncher } from './browser/index.js';
import { Checker } from './checker/index.js';
import { config, validateConfig } from './config.js';
import { ExecutionStats, printSummary } from './metrics/index.js';
import {
  createPool,
  PgExecutionStore,
  PgMonitorRegistry,
} from './persistence/index.js';
import { ResultLogger } from './results/index.js';
import { printRunNowReport, Scheduler } from './scheduler/index.js';
import { formatError } from './utils/index.js';

const USAGE = 'Usage: synthetic-monitor [run-now <monitorId>]';

async function main() {
  validateConfig();

  const pool = createPool(config.database);
  const stats = new ExecutionStats();

  const checker = new Checker({
    launch: createChromiumLauncher({
      headless: config.headless,
      args: config.browserArgs,
      timeoutMs: config.launchTimeoutMs,
    }),
    traceDir: config.traceDir,
    setupTimeoutMs: config.launchTimeoutMs,
    evaluateTimeoutMs: config.evaluateTimeoutMs,
    traceReadTimeoutMs: config.traceReadTimeoutMs,
    stats,
  });

  const scheduler = new Scheduler(
    {
      registry: new PgMonitorRegistry(pool),
      checker,
      resultLogger: new ResultLogger(new PgExecutionStore(pool)),
      stats,
    },
    {
      tickIntervalMs: config.tickIntervalMs,
      recoveryDelayMs: config.recoveryDelayMs,
      statsReportEveryTicks: config.statsReportEveryTicks,
    },
  );

  const [command, argument] = process.argv.slice(2);

  try {
    if (command === 'run-now') {
      const monitorId = Number(argument);
      if (!Number.isInteger(monitorId)) {
        throw new Error(USAGE);
      }
      const outcome = await scheduler.runNow(monitorId);
      printRunNowReport(outcome);
      if (outcome.kind === 'not_found') process.exitCode = 1;
      return;
    }

    if (command !== undefined) {
      throw new Error(USAGE);
    }

    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`[Main] ${signal} received, stopping after the current tick...`);
      scheduler.stop();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    console.log(
      `[Main] Synthetic worker starting (interval ${config.tickIntervalMs}ms, traces in ${config.traceDir})`,
    );
    await scheduler.start();
    printSummary(stats.getSnapshot());
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error('[FATAL] Unhandled error in main:', formatError(e));
  process.exit(1);
});
