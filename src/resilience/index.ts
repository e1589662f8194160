export { systemClock, withTimeout } from './core.js';
export type { Clock } from './types.js';
