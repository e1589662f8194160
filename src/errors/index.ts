/** Base error for all monitor worker errors */
export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
  }
}

/** Monitor id is unknown to the registry */
export class MonitorNotFoundError extends MonitorError {
  constructor(public readonly monitorId: number) {
    super(`Monitor ${monitorId} not found`);
    this.name = 'MonitorNotFoundError';
  }
}

/** A write or read against the database failed */
export class PersistenceError extends MonitorError {
  constructor(
    public readonly operation:
      | 'insertExecutionRecord'
      | 'insertMetricRows'
      | 'attachTrace'
      | 'listEnabledMonitors'
      | 'getMonitor',
    cause: unknown,
  ) {
    super(
      `Persistence failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'PersistenceError';
  }
}

/** An operation exceeded its time bound */
export class OperationTimeoutError extends MonitorError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/** Invalid environment configuration */
export class ConfigError extends MonitorError {
  constructor(public readonly setting: string, details: string) {
    super(`Invalid ${setting}: ${details}`);
    this.name = 'ConfigError';
  }
}
