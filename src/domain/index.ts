export { buildMetricRows, failedResult, successResult } from './result.js';
export type {
  ExecutionRecordFields,
  ExecutionResult,
  ExecutionStatus,
  FailedExecution,
  MetricName,
  MetricRow,
  Monitor,
  PageTimings,
  RunNowResult,
  SuccessfulExecution,
} from './types.js';
