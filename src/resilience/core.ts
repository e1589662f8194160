/**
 * Core resilience primitives - generic, reusable patterns
 * No dependencies on Playwright or the database
 */

import { setTimeout as delay } from 'node:timers/promises';
import { OperationTimeoutError } from '../errors/index.js';
import type { Clock } from './types.js';

/**
 * Race an operation against a time bound.
 * The operation keeps running after the bound; only the wait is abandoned.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  description: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new OperationTimeoutError(description, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Wall-clock time and real timers */
export const systemClock: Clock = {
  now: () => new Date(),

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') return;
      throw error;
    }
  },
};
