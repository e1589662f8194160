export {
  Scheduler,
  type SchedulerDeps,
  type SchedulerOptions,
  type SchedulerState,
} from './scheduler.js';
export { printRunNowReport, type RunNowReport, toRunNowReport } from './display.js';
