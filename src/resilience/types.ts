/**
 * Resilience types - time source and bounds for slow operations
 * No dependencies on Playwright or the database
 */

/** Time source injected into the scheduler and checker */
export interface Clock {
  now(): Date;
  /** Resolves after `ms`, or early (without error) once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
