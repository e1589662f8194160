import type { Page, Response } from 'playwright';
import type { PageTimings } from '../domain/index.js';
import { withTimeout } from '../resilience/index.js';

/** Raw values read from the page's performance APIs */
export interface RawDocumentTimings {
  /** Legacy performance.timing marks (epoch ms, 0 when not reached) */
  legacy: {
    navigationStart: number;
    domContentLoadedEventEnd: number;
    loadEventEnd: number;
  } | null;
  /** Navigation Timing Level 2 entry (ms since time origin), null when unsupported */
  navigation: {
    domContentLoadedEventEnd: number;
    loadEventEnd: number;
  } | null;
}

/**
 * TTFB from the navigation request's resource timing.
 * Playwright reports -1 for marks the browser did not record.
 */
export function resolveTtfb(response: Response | null): number | null {
  if (!response) return null;
  const { responseStart } = response.request().timing();
  return Number.isFinite(responseStart) && responseStart >= 0 ? responseStart : null;
}

function pickTiming(
  navigationValue: number | undefined,
  legacyEnd: number | undefined,
  legacyStart: number | undefined,
): number | null {
  if (navigationValue !== undefined && navigationValue > 0) {
    return navigationValue;
  }
  if (legacyEnd !== undefined && legacyStart !== undefined && legacyEnd > 0 && legacyStart > 0) {
    return legacyEnd - legacyStart;
  }
  return null;
}

/**
 * Prefer the Navigation Timing entry; fall back to the legacy timing object
 * when the entry is missing or its mark has not been set yet.
 */
export function resolveDocumentTimings(
  raw: RawDocumentTimings,
): Pick<PageTimings, 'domContentLoadedMs' | 'pageLoadMs'> {
  return {
    domContentLoadedMs: pickTiming(
      raw.navigation?.domContentLoadedEventEnd,
      raw.legacy?.domContentLoadedEventEnd,
      raw.legacy?.navigationStart,
    ),
    pageLoadMs: pickTiming(
      raw.navigation?.loadEventEnd,
      raw.legacy?.loadEventEnd,
      raw.legacy?.navigationStart,
    ),
  };
}

/** Runs inside the page */
function readDocumentTimings(): RawDocumentTimings {
  const [entry] = performance.getEntriesByType('navigation');
  const navigation =
    typeof PerformanceNavigationTiming !== 'undefined' &&
    entry instanceof PerformanceNavigationTiming
      ? {
          domContentLoadedEventEnd: entry.domContentLoadedEventEnd,
          loadEventEnd: entry.loadEventEnd,
        }
      : null;

  const timing = performance.timing;
  const legacy = timing
    ? {
        navigationStart: timing.navigationStart,
        domContentLoadedEventEnd: timing.domContentLoadedEventEnd,
        loadEventEnd: timing.loadEventEnd,
      }
    : null;

  return { legacy, navigation };
}

/**
 * Extract TTFB, DOM-ready and load timings from a loaded page.
 * Missing values are null; only a failed or timed-out evaluation throws.
 */
export async function extractPageTimings(
  page: Page,
  response: Response | null,
  evaluateTimeoutMs: number,
): Promise<PageTimings> {
  const ttfbMs = resolveTtfb(response);
  const raw = await withTimeout(
    page.evaluate(readDocumentTimings),
    evaluateTimeoutMs,
    'Page timing evaluation',
  );

  return { ttfbMs, ...resolveDocumentTimings(raw) };
}
