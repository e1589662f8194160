export { PgExecutionStore } from './executionStore.js';
export { createPool, type DatabaseConfig } from './pool.js';
export { PgMonitorRegistry } from './registry.js';
export type { ExecutionStore, MonitorRegistry } from './types.js';
