/**
 * HTTP Archive (HAR 1.2) shapes, limited to the fields the worker reads.
 * The document is stored as-is, so unknown fields are preserved.
 */

export interface HarTimings {
  blocked?: number;
  dns?: number;
  connect?: number;
  ssl?: number;
  send: number;
  wait: number; // time to first byte for this request
  receive: number;
}

export interface HarEntry {
  startedDateTime: string;
  time: number; // milliseconds
  request: { method: string; url: string; [key: string]: unknown };
  response: { status: number; [key: string]: unknown };
  timings: HarTimings;
  [key: string]: unknown;
}

export interface HarLog {
  version: string;
  creator: { name: string; version: string };
  pages?: unknown[];
  entries: HarEntry[];
  [key: string]: unknown;
}

export interface HarDocument {
  log: HarLog;
}
