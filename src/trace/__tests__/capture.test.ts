import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { ExecutionStats } from '../../metrics/index.js';
import { isHarDocument, TraceCapture } from '../capture.js';

const HAR = {
  log: {
    version: '1.2',
    creator: { name: 'Playwright', version: '1.47.0' },
    entries: [],
  },
};

describe('isHarDocument', () => {
  it('accepts a document with log.entries', () => {
    expect(isHarDocument(HAR)).toBe(true);
  });

  it.each([
    ['null', null],
    ['an array', []],
    ['a missing log', { version: '1.2' }],
    ['a log without entries', { log: { version: '1.2' } }],
    ['non-array entries', { log: { entries: {} } }],
  ])('rejects %s', (_label, value) => {
    expect(isHarDocument(value)).toBe(false);
  });
});

describe('TraceCapture', () => {
  let traceDir: string;
  let stats: ExecutionStats;
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    traceDir = mkdtempSync(path.join(os.tmpdir(), 'trace-test-'));
    stats = new ExecutionStats();
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(traceDir, { recursive: true, force: true });
  });

  async function create(dir = traceDir) {
    return TraceCapture.create(5, { traceDir: dir, readTimeoutMs: 1000, stats });
  }

  it('points recordHar at a per-check file with content omitted', async () => {
    const capture = await create();

    const options = capture.recordHarOptions();

    expect(options?.content).toBe('omit');
    expect(path.dirname(options?.path ?? '')).toBe(traceDir);
    expect(path.basename(options?.path ?? '')).toMatch(/^monitor_5_.+\.har$/);
  });

  it('reads the HAR back and deletes the file', async () => {
    const capture = await create();
    const filePath = capture.filePath ?? '';
    writeFileSync(filePath, JSON.stringify(HAR));

    const trace = await capture.finalize();

    expect(trace).toEqual(HAR);
    expect(capture.trace).toEqual(HAR);
    expect(existsSync(filePath)).toBe(false);
    expect(stats.getSnapshot().traceReadFailures).toBe(0);
  });

  it('warns, counts and deletes when the file is not a HAR document', async () => {
    const capture = await create();
    const filePath = capture.filePath ?? '';
    writeFileSync(filePath, JSON.stringify({ entries: [] }));

    const trace = await capture.finalize();

    expect(trace).toBeNull();
    expect(existsSync(filePath)).toBe(false);
    expect(stats.getSnapshot().traceReadFailures).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      '[Trace] Failed to read trace for monitor 5: Error: file is not a HAR document (missing log.entries)',
    );
  });

  it('counts a missing file once even if finalized twice', async () => {
    const capture = await create();

    await capture.finalize();
    await capture.finalize();

    expect(stats.getSnapshot().traceReadFailures).toBe(1);
  });

  it('runs without a trace when the directory cannot be created', async () => {
    const blocker = path.join(traceDir, 'not-a-dir');
    writeFileSync(blocker, '');

    const capture = await create(path.join(blocker, 'traces'));

    expect(capture.filePath).toBeNull();
    expect(capture.recordHarOptions()).toBeUndefined();
    await expect(capture.finalize()).resolves.toBeNull();
    expect(stats.getSnapshot().traceReadFailures).toBe(1);
  });
});
