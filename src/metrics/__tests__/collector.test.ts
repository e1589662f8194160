import { describe, expect, it } from 'vitest';
import { failedResult, successResult } from '../../domain/index.js';
import { ExecutionStats } from '../collector.js';

function window(durationMs: number) {
  const startedAt = new Date('2026-01-01T00:00:00.000Z');
  return {
    startedAt,
    completedAt: new Date(startedAt.getTime() + durationMs),
    trace: null,
  };
}

describe('ExecutionStats', () => {
  it('counts outcomes by status and tracks the slowest check', () => {
    const stats = new ExecutionStats(1000);

    stats.recordOutcome(1, successResult({ ttfbMs: 10, domContentLoadedMs: 20, pageLoadMs: 30 }, window(300)));
    stats.recordOutcome(2, failedResult('timeout', 'page.goto: Timeout', window(5000)));
    stats.recordOutcome(3, failedResult('error', 'net::ERR_NAME_NOT_RESOLVED', window(100)));

    const snapshot = stats.getSnapshot();
    expect(snapshot.startedAt).toBe(1000);
    expect(snapshot.outcomes).toEqual({ success: 1, timeout: 1, error: 1 });
    expect(snapshot.totalCheckDurationMs).toBe(5400);
    expect(snapshot.slowestCheck).toEqual({ monitorId: 2, durationMs: 5000 });
  });

  it('counts ticks and degraded paths', () => {
    const stats = new ExecutionStats(0);

    expect(stats.recordTick()).toBe(1);
    expect(stats.recordTick()).toBe(2);
    stats.recordTraceReadFailure();
    stats.recordPersistenceFailure();
    stats.recordPersistenceFailure();
    stats.recordLoopError();

    const snapshot = stats.getSnapshot();
    expect(snapshot.ticks).toBe(2);
    expect(snapshot.traceReadFailures).toBe(1);
    expect(snapshot.persistenceFailures).toBe(2);
    expect(snapshot.loopErrors).toBe(1);
  });

  it('returns snapshots detached from later updates', () => {
    const stats = new ExecutionStats(0);
    const before = stats.getSnapshot();

    stats.recordOutcome(1, failedResult('error', 'boom', window(10)));

    expect(before.outcomes.error).toBe(0);
    expect(before.slowestCheck).toBeNull();
  });

  it('resets all counters', () => {
    const stats = new ExecutionStats(0);
    stats.recordTick();
    stats.recordLoopError();

    stats.reset(500);

    const snapshot = stats.getSnapshot();
    expect(snapshot.startedAt).toBe(500);
    expect(snapshot.ticks).toBe(0);
    expect(snapshot.loopErrors).toBe(0);
  });
});
