import type { StatsSnapshot, StatsSummary } from './types.js';

/**
 * Derive the printable summary from a stats snapshot
 */
export function generateSummary(snapshot: StatsSnapshot): StatsSummary {
  const { success, timeout, error } = snapshot.outcomes;
  const totalChecks = success + timeout + error;

  return {
    totalChecks,
    successRate: totalChecks === 0 ? 0 : success / totalChecks,
    avgCheckDurationMs:
      totalChecks === 0 ? 0 : snapshot.totalCheckDurationMs / totalChecks,
    slowestCheck: snapshot.slowestCheck,
    traceReadFailures: snapshot.traceReadFailures,
    persistenceFailures: snapshot.persistenceFailures,
    loopErrors: snapshot.loopErrors,
  };
}

/**
 * Print summary to console
 */
export function printSummary(snapshot: StatsSnapshot): void {
  const summary = generateSummary(snapshot);
  const { success, timeout, error } = snapshot.outcomes;

  console.log(`\n[Stats] ═══ ${snapshot.ticks} tick(s) ═══`);
  console.log(
    `  Checks: ${summary.totalChecks} (success ${success}, timeout ${timeout}, error ${error})`,
  );
  console.log(`  Success rate: ${formatPercent(summary.successRate)}`);
  console.log(`  Avg check duration: ${formatDuration(summary.avgCheckDurationMs)}`);
  if (summary.slowestCheck) {
    console.log(
      `  Slowest: monitor ${summary.slowestCheck.monitorId} (${formatDuration(summary.slowestCheck.durationMs)})`,
    );
  }

  if (summary.traceReadFailures + summary.persistenceFailures + summary.loopErrors > 0) {
    console.log('  Degraded:');
    console.log(`    Trace read failures: ${summary.traceReadFailures}`);
    console.log(`    Persistence failures: ${summary.persistenceFailures}`);
    console.log(`    Loop errors: ${summary.loopErrors}`);
  }
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
