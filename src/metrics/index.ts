/**
 * Execution Statistics Module
 *
 * Counts check outcomes and degraded paths (trace read-back, persistence,
 * loop recovery) so they are observable without a metrics backend.
 *
 * Usage:
 * 1. Create once: const stats = new ExecutionStats();
 * 2. Share with the checker and scheduler
 * 3. Print: printSummary(stats.getSnapshot());
 */

export { ExecutionStats } from './collector.js';
export {
  formatDuration,
  formatPercent,
  generateSummary,
  printSummary,
} from './reporter.js';
export type * from './types.js';
