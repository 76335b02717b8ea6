import { describe, it, expect, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DebugLog, SAMPLE_LIMIT, type OperationEntry, type OperationStats } from '../src/debug.js';
import { quietLogger } from './helpers.js';

const root = fs.mkdtempSync(path.join(os.tmpdir(), 'meshbridge-debug-'));

afterAll(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

// ─── Helpers ──────────────────────────────────────────────────

let dirCount = 0;

function makeLog(verbose: boolean, lines: string[] = []): DebugLog {
  dirCount++;
  return new DebugLog({
    logDir: path.join(root, `run-${dirCount}`),
    verbose,
    logger: quietLogger(lines),
    now: () => new Date(2026, 0, 5, 9, 30),
  });
}

function entries(log: DebugLog): OperationEntry[] {
  if (!fs.existsSync(log.opLogPath)) return [];
  return fs
    .readFileSync(log.opLogPath, 'utf8')
    .trim()
    .split('\n')
    .map((line): OperationEntry => JSON.parse(line));
}

function stats(log: DebugLog, op: string): OperationStats {
  const value = log.performanceReport()[op];
  if (!value || !('count' in value)) throw new Error(`no stats for ${op}`);
  return value;
}

// ─── Operation log ────────────────────────────────────────────

describe('DebugLog operation log', () => {
  it('names the file after the local date', () => {
    const log = makeLog(false);
    expect(path.basename(log.opLogPath)).toBe('operations_20260105.jsonl');
  });

  it('skips successful calls in lean mode', async () => {
    const log = makeLog(false);
    const value = await log.track('get_scene_info', { detail_level: 'summary' }, async () => ({ status: 'success' }));
    expect(value).toEqual({ status: 'success' });
    expect(entries(log)).toEqual([]);
    expect(log.mode).toBe('LEAN');
  });

  it('writes failures in lean mode with code bodies summarized', async () => {
    const lines: string[] = [];
    const log = makeLog(false, lines);
    await expect(
      log.track('execute_code', { code: 'x'.repeat(40), timeout: 30 }, async () => {
        throw new Error('socket exploded');
      }),
    ).rejects.toThrow('socket exploded');

    const [entry] = entries(log);
    expect(entry).toMatchObject({
      op: 'execute_code',
      status: 'error',
      params: { code: '<40 chars>', timeout: 30 },
      error: 'socket exploded',
    });
    expect(entry.traceback).toContain('socket exploded');
    expect(entry.ts).toBe(new Date(2026, 0, 5, 9, 30).toISOString());
    expect(lines.some((l) => l.includes('✗ execute_code') && l.includes('ERROR: socket exploded'))).toBe(true);
  });

  it('treats an error result as a failed operation', async () => {
    const log = makeLog(false);
    await log.track('export_mesh', { filepath: '/tmp/a.stl' }, async () => ({
      status: 'error',
      error_code: 'EXPORT_FAILED',
      message: 'disk full',
    }));
    expect(entries(log)).toEqual([
      expect.objectContaining({ op: 'export_mesh', status: 'error', error: 'disk full', params: { filepath: '/tmp/a.stl' } }),
    ]);
    expect(log.performanceReport()._summary).toMatchObject({ total_calls: 1, total_errors: 1 });
  });

  it('writes every call with parameters and a result summary in verbose mode', async () => {
    const log = makeLog(true);
    await log.track('execute_code', { code: 'y'.repeat(600) }, async () => ({ status: 'success', stdout: 'ok' }));

    const [entry] = entries(log);
    expect(entry.status).toBe('success');
    expect(entry.params).toEqual({ code: 'y'.repeat(500) });
    expect(entry.result_summary).toBe('{"status":"success","stdout":"ok"}');
    expect(log.mode).toBe('VERBOSE');
  });
});

// ─── Performance ──────────────────────────────────────────────

describe('DebugLog performance report', () => {
  it('summarizes calls per operation', async () => {
    const log = makeLog(false);
    for (let i = 0; i < 3; i++) await log.track('ping', {}, async () => ({ status: 'success' }));

    const report = log.performanceReport();
    expect(report._summary).toMatchObject({ total_calls: 3, total_errors: 0, log_dir: log.logDir, mode: 'LEAN' });
    const ping = stats(log, 'ping');
    expect(ping.count).toBe(3);
    expect(ping.min_ms).toBeLessThanOrEqual(ping.avg_ms);
    expect(ping.avg_ms).toBeLessThanOrEqual(ping.max_ms);
  });

  it('keeps a bounded window of samples', async () => {
    const log = makeLog(false);
    for (let i = 0; i < SAMPLE_LIMIT + 5; i++) await log.track('ping', {}, async () => null);
    expect(stats(log, 'ping').count).toBe(SAMPLE_LIMIT);
    expect(log.performanceReport()._summary.total_calls).toBe(SAMPLE_LIMIT + 5);
  });
});
