/**
 * Operation log and per-tool timing.
 *
 * Every tool call gets a summary line in the text log (stderr). The JSON
 * operation log, `<logDir>/operations_YYYYMMDD.jsonl`, always receives
 * failures; verbose mode writes every call with parameters and a result
 * summary. Lean mode replaces `code` bodies with their length.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createLogger, type Logger } from '@meshbridge/protocol';

export const SAMPLE_LIMIT = 100;
const PARAM_TEXT_LIMIT = 500;
const RESULT_SUMMARY_LIMIT = 300;

export interface DebugLogOptions {
  logDir: string;
  verbose?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface OperationEntry {
  ts: string;
  op: string;
  status: 'success' | 'error';
  duration_ms: number;
  params?: Record<string, unknown>;
  error?: string;
  traceback?: string;
  result_summary?: string;
}

export interface OperationStats {
  count: number;
  avg_ms: number;
  min_ms: number;
  max_ms: number;
  last_ms: number;
}

export interface PerformanceSummary {
  total_calls: number;
  total_errors: number;
  uptime_s: number;
  log_dir: string;
  mode: 'LEAN' | 'VERBOSE';
}

export type PerformanceReport = { _summary: PerformanceSummary } & Record<string, OperationStats | PerformanceSummary>;

const round2 = (n: number) => Math.round(n * 100) / 100;

function truncateStrings(params: Record<string, unknown>, limit: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = typeof value === 'string' && value.length > limit ? value.slice(0, limit) : value;
  }
  return out;
}

/** A tool result reporting `{ status: 'error' }` counts as a failed operation. */
function reportedError(result: unknown): string | null {
  if (typeof result !== 'object' || result === null) return null;
  if (!('status' in result) || result.status !== 'error') return null;
  return 'message' in result && typeof result.message === 'string' ? result.message : 'error';
}

export class DebugLog {
  readonly logDir: string;
  readonly verbose: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly samples = new Map<string, number[]>();
  private readonly startedAt = performance.now();
  private totalCalls = 0;
  private totalErrors = 0;

  constructor(options: DebugLogOptions) {
    this.logDir = options.logDir;
    this.verbose = options.verbose ?? false;
    this.logger = options.logger ?? createLogger('ops');
    this.now = options.now ?? (() => new Date());
  }

  get mode(): 'LEAN' | 'VERBOSE' {
    return this.verbose ? 'VERBOSE' : 'LEAN';
  }

  get opLogPath(): string {
    const d = this.now();
    const stamp = `${d.getFullYear()}${String(d.getMonth() + 1).padStart(2, '0')}${String(d.getDate()).padStart(2, '0')}`;
    return path.join(this.logDir, `operations_${stamp}.jsonl`);
  }

  /** Run `fn` as operation `op`, logging and timing it. Errors propagate unchanged. */
  async track<T>(op: string, params: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    const t0 = performance.now();
    let thrown: unknown = null;
    let failed = false;
    let result: T | undefined;
    try {
      result = await fn();
      return result;
    } catch (err) {
      thrown = err;
      failed = true;
      throw err;
    } finally {
      const durationMs = performance.now() - t0;
      this.recordSample(op, durationMs);
      const error = failed ? describe(thrown) : reportedError(result);
      await this.logOperation(op, params, result, error, failed ? stackOf(thrown) : undefined, durationMs);
    }
  }

  async logOperation(
    op: string,
    params: Record<string, unknown>,
    result: unknown,
    error: string | null,
    traceback: string | undefined,
    durationMs: number,
  ): Promise<void> {
    this.totalCalls++;
    if (error !== null) this.totalErrors++;

    const ms = Math.round(durationMs);
    if (error !== null) {
      this.logger.error('✗ %s %dms  ERROR: %s', op, ms, error);
    } else if (this.verbose) {
      this.logger.info('✓ %s %dms', op, ms);
    } else {
      this.logger.debug('✓ %s %dms', op, ms);
    }

    if (error === null && !this.verbose) return;

    const shown = this.verbose ? params : leanParams(params);
    const entry: OperationEntry = {
      ts: this.now().toISOString(),
      op,
      status: error === null ? 'success' : 'error',
      duration_ms: round2(durationMs),
    };
    if (Object.keys(shown).length > 0) entry.params = truncateStrings(shown, PARAM_TEXT_LIMIT);
    if (error !== null) {
      entry.error = error;
      if (traceback) entry.traceback = traceback;
    } else if (result !== undefined) {
      entry.result_summary = JSON.stringify(result).slice(0, RESULT_SUMMARY_LIMIT);
    }
    await this.append(entry);
  }

  private async append(entry: OperationEntry): Promise<void> {
    try {
      await fs.mkdir(this.logDir, { recursive: true });
      await fs.appendFile(this.opLogPath, JSON.stringify(entry) + '\n', 'utf8');
    } catch (err) {
      this.logger.warn('could not write operation log: %s', describe(err));
    }
  }

  // ─── Performance ────────────────────────────────────────────

  private recordSample(op: string, durationMs: number): void {
    let list = this.samples.get(op);
    if (!list) {
      list = [];
      this.samples.set(op, list);
    }
    list.push(durationMs);
    if (list.length > SAMPLE_LIMIT) list.shift();
  }

  performanceReport(): PerformanceReport {
    const report: PerformanceReport = {
      _summary: {
        total_calls: this.totalCalls,
        total_errors: this.totalErrors,
        uptime_s: Math.round((performance.now() - this.startedAt) / 100) / 10,
        log_dir: this.logDir,
        mode: this.mode,
      },
    };
    for (const [op, list] of this.samples) {
      if (list.length === 0) continue;
      const total = list.reduce((sum, ms) => sum + ms, 0);
      report[op] = {
        count: list.length,
        avg_ms: round2(total / list.length),
        min_ms: round2(Math.min(...list)),
        max_ms: round2(Math.max(...list)),
        last_ms: round2(list[list.length - 1]),
      };
    }
    return report;
  }
}

function leanParams(params: Record<string, unknown>): Record<string, unknown> {
  const code = params.code;
  return typeof code === 'string' ? { ...params, code: `<${code.length} chars>` } : params;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function stackOf(err: unknown): string | undefined {
  return err instanceof Error ? err.stack : undefined;
}
