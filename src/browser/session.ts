import { type Browser, type Page, chromium } from 'playwright';
import { withTimeout } from '../resilience/index.js';
import type { TraceCapture } from '../trace/index.js';
import { formatError } from '../utils/index.js';

/** Launches a fresh browser; one per check */
export type BrowserLauncher = () => Promise<Browser>;

export interface LaunchOptions {
  headless: boolean;
  args: string[];
  timeoutMs: number;
}

/**
 * Create a Chromium launcher with the worker's launch options
 */
export function createChromiumLauncher(options: LaunchOptions): BrowserLauncher {
  return () =>
    chromium.launch({
      headless: options.headless,
      args: options.args,
      timeout: options.timeoutMs,
    });
}

export interface SessionOptions {
  launch: BrowserLauncher;
  trace: TraceCapture;
  /** Bound on creating the context and page */
  setupTimeoutMs: number;
}

async function closeAndWarn(what: string, close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (error) {
    console.warn(`[Browser] Failed to close ${what}: ${formatError(error)}`);
  }
}

/**
 * Run `body` against a page in a fresh, isolated browser session.
 *
 * Release order on every exit path: context close (flushes the HAR), trace
 * read-back, browser close. Errors from `body` propagate after release.
 */
export async function withBrowserSession<T>(
  options: SessionOptions,
  body: (page: Page) => Promise<T>,
): Promise<T> {
  const browser = await options.launch();

  try {
    const context = await withTimeout(
      browser.newContext({ recordHar: options.trace.recordHarOptions() }),
      options.setupTimeoutMs,
      'Browser context creation',
    );

    try {
      const page = await withTimeout(
        context.newPage(),
        options.setupTimeoutMs,
        'Page creation',
      );
      return await body(page);
    } finally {
      await closeAndWarn('browser context', () => context.close());
      await options.trace.finalize();
    }
  } finally {
    await closeAndWarn('browser', () => browser.close());
  }
}
