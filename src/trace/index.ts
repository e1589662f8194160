export { isHarDocument, TraceCapture, type TraceCaptureOptions } from './capture.js';
export type { HarDocument, HarEntry, HarLog, HarTimings } from './types.js';
