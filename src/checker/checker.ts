import { errors, type Page, type Response } from 'playwright';
import { extractPageTimings } from '../browser/timings.js';
import { type BrowserLauncher, withBrowserSession } from '../browser/session.js';
import {
  type ExecutionResult,
  failedResult,
  type PageTimings,
  successResult,
} from '../domain/index.js';
import type { ExecutionStats } from '../metrics/index.js';
import { type Clock, systemClock } from '../resilience/index.js';
import { TraceCapture } from '../trace/index.js';
import { errorMessage, formatError, truncate } from '../utils/index.js';

export interface CheckerOptions {
  launch: BrowserLauncher;
  traceDir: string;
  /** Bound on context and page creation */
  setupTimeoutMs: number;
  /** Bound on the in-page timing evaluation */
  evaluateTimeoutMs: number;
  /** Bound on reading the HAR back */
  traceReadTimeoutMs: number;
  clock?: Clock;
  stats?: ExecutionStats;
}

/** How navigation ended, before the session is released */
type NavigationOutcome =
  | { kind: 'loaded'; timings: PageTimings }
  | { kind: 'timeout'; message: string }
  | { kind: 'error'; message: string };

/**
 * Runs one synthetic check: fresh browser, bounded navigation, timing
 * extraction, HAR capture, release. Never throws; every failure is encoded in
 * the returned result's status.
 */
export class Checker {
  private readonly clock: Clock;

  constructor(private readonly options: CheckerOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async execute(
    monitorId: number,
    url: string,
    timeoutSeconds: number,
  ): Promise<ExecutionResult> {
    const startedAt = this.clock.now();
    let trace: TraceCapture | null = null;
    let outcome: NavigationOutcome;

    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
      // Playwright treats a zero timeout as unbounded
      outcome = { kind: 'error', message: `Invalid timeout: ${timeoutSeconds} seconds` };
    } else {
      try {
        trace = await TraceCapture.create(monitorId, {
          traceDir: this.options.traceDir,
          readTimeoutMs: this.options.traceReadTimeoutMs,
          stats: this.options.stats,
        });
        outcome = await withBrowserSession(
          {
            launch: this.options.launch,
            trace,
            setupTimeoutMs: this.options.setupTimeoutMs,
          },
          (page) => this.navigate(page, url, timeoutSeconds),
        );
      } catch (error) {
        console.error(
          `[Checker] Monitor ${monitorId} execution failed: ${formatError(error)}`,
        );
        outcome = { kind: 'error', message: errorMessage(error) };
      }
    }

    const window = {
      startedAt,
      completedAt: this.clock.now(),
      trace: trace?.trace ?? null,
    };
    const result =
      outcome.kind === 'loaded'
        ? successResult(outcome.timings, window)
        : failedResult(outcome.kind, outcome.message, window);

    this.options.stats?.recordOutcome(monitorId, result);
    this.logResult(monitorId, url, result);
    return result;
  }

  private async navigate(
    page: Page,
    url: string,
    timeoutSeconds: number,
  ): Promise<NavigationOutcome> {
    let response: Response | null;
    try {
      response = await page.goto(url, {
        timeout: timeoutSeconds * 1000,
        waitUntil: 'load',
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return { kind: 'timeout', message: `Page load timeout: ${error.message}` };
      }
      throw error;
    }

    const timings = await extractPageTimings(
      page,
      response,
      this.options.evaluateTimeoutMs,
    );
    return { kind: 'loaded', timings };
  }

  private logResult(monitorId: number, url: string, result: ExecutionResult): void {
    const durationMs = result.completedAt.getTime() - result.startedAt.getTime();
    const target = truncate(url, 80);

    if (result.status === 'success') {
      console.log(
        `[Checker] Monitor ${monitorId} ${target}: success in ${durationMs}ms ` +
          `(ttfb=${result.ttfbMs ?? '-'}, dcl=${result.domContentLoadedMs ?? '-'}, load=${result.pageLoadMs ?? '-'})`,
      );
    } else {
      console.warn(
        `[Checker] Monitor ${monitorId} ${target}: ${result.status} after ${durationMs}ms: ` +
          truncate(result.errorMessage.split('\n')[0] ?? '', 200),
      );
    }
  }
}
