import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rm } from 'node:fs/promises';
import * as path from 'node:path';
import type { ExecutionStats } from '../metrics/index.js';
import { withTimeout } from '../resilience/index.js';
import { formatError } from '../utils/index.js';
import type { HarDocument } from './types.js';

export interface TraceCaptureOptions {
  traceDir: string;
  readTimeoutMs: number;
  stats?: ExecutionStats;
}

/** Check that parsed JSON has the HAR shape the worker relies on */
export function isHarDocument(value: unknown): value is HarDocument {
  if (typeof value !== 'object' || value === null || !('log' in value)) {
    return false;
  }
  const { log } = value;
  return (
    typeof log === 'object' &&
    log !== null &&
    'entries' in log &&
    Array.isArray(log.entries)
  );
}

/**
 * HAR capture target for exactly one check.
 *
 * The browser context writes the HAR when it closes; `finalize()` then reads
 * it back and deletes the file. Capture problems are reported as warnings and
 * counted, never thrown, so they cannot fail the check.
 */
export class TraceCapture {
  private document: HarDocument | null = null;
  private finalized = false;

  private constructor(
    readonly monitorId: number,
    readonly filePath: string | null,
    private readonly options: TraceCaptureOptions,
  ) {}

  static async create(
    monitorId: number,
    options: TraceCaptureOptions,
  ): Promise<TraceCapture> {
    const filePath = path.join(
      options.traceDir,
      `monitor_${monitorId}_${randomUUID()}.har`,
    );

    try {
      await mkdir(options.traceDir, { recursive: true });
      return new TraceCapture(monitorId, filePath, options);
    } catch (error) {
      console.warn(
        `[Trace] Cannot prepare ${options.traceDir}, monitor ${monitorId} runs without a trace: ${formatError(error)}`,
      );
      options.stats?.recordTraceReadFailure();
      return new TraceCapture(monitorId, null, options);
    }
  }

  /** Options for `browser.newContext({ recordHar })`, undefined when capture is off */
  recordHarOptions(): { path: string; content: 'omit' } | undefined {
    return this.filePath ? { path: this.filePath, content: 'omit' } : undefined;
  }

  get trace(): HarDocument | null {
    return this.document;
  }

  /**
   * Read the flushed HAR back and remove the file.
   * Must run after the browser context is closed.
   */
  async finalize(): Promise<HarDocument | null> {
    if (this.finalized || !this.filePath) return this.document;
    this.finalized = true;

    const filePath = this.filePath;
    try {
      const raw = await withTimeout(
        readFile(filePath, 'utf-8'),
        this.options.readTimeoutMs,
        'Trace read-back',
      );
      const parsed: unknown = JSON.parse(raw);
      if (!isHarDocument(parsed)) {
        throw new Error('file is not a HAR document (missing log.entries)');
      }
      this.document = parsed;
    } catch (error) {
      console.warn(
        `[Trace] Failed to read trace for monitor ${this.monitorId}: ${formatError(error)}`,
      );
      this.options.stats?.recordTraceReadFailure();
    } finally {
      await rm(filePath, { force: true }).catch((error: unknown) => {
        console.warn(`[Trace] Failed to delete ${filePath}: ${formatError(error)}`);
      });
    }

    return this.document;
  }
}
