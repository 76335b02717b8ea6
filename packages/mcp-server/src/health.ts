/**
 * Connection health monitor.
 *
 * A background loop pings the host every interval (the first check comes
 * one full interval after start) and keeps counters plus a bounded event
 * history for manage_connection(action='status').
 */

import { createLogger, type Logger } from '@meshbridge/protocol';
import type { PingResult } from './connection.js';

export const HISTORY_LIMIT = 50;

/** What the monitor needs from a connection. */
export interface PingTarget {
  readonly connected: boolean;
  /** Another caller holds the socket; checks are skipped until it is free. */
  readonly busy?: boolean;
  ping(timeoutMs: number): Promise<PingResult>;
}

export type HealthEvent =
  | { ts: string; event: 'ok' | 'recovered'; latency_ms: number; consecutive_failures_before: number }
  | { ts: string; event: 'failure'; reason: string; latency_ms: number | null; consecutive_failures: number }
  | { ts: string; event: 'reconnect_attempt'; success: boolean; attempt_number: number }
  | { ts: string; event: 'connection_lost'; reason: string };

export interface HealthStatus {
  healthy: boolean;
  total_pings: number;
  successful_pings: number;
  consecutive_failures: number;
  reconnect_attempts: number;
  last_success_ago_s: number | null;
  monitor_uptime_s: number;
  ping_interval_s: number;
}

export interface HealthReport extends HealthStatus {
  history: HealthEvent[];
}

export interface HealthMonitorOptions {
  intervalMs?: number;
  checkTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

class Aborted extends Error {}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Aborted());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Aborted());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Aborted());
      return;
    }
    const onAbort = () => reject(new Aborted());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

const round1 = (n: number) => Math.round(n * 10) / 10;

export class HealthMonitor {
  readonly intervalMs: number;
  readonly checkTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  totalPings = 0;
  successfulPings = 0;
  consecutiveFailures = 0;
  reconnectAttempts = 0;
  private readonly startedAt = performance.now();
  private lastSuccessAt: number | null = null;
  private readonly history: HealthEvent[] = [];

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly target: PingTarget,
    options: HealthMonitorOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 30_000;
    this.checkTimeoutMs = options.checkTimeoutMs ?? 5_000;
    this.logger = options.logger ?? createLogger('health');
    this.now = options.now ?? (() => new Date());
  }

  // ─── Lifecycle ──────────────────────────────────────────────

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.logger.info('health monitor started (interval %ds)', this.intervalMs / 1000);
  }

  /** Stop the loop; counters and history are kept. */
  async stop(): Promise<void> {
    const { controller, loop } = this;
    if (!controller) return;
    this.controller = null;
    this.loop = null;
    controller.abort();
    await loop;
    this.logger.info('health monitor stopped');
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      for (;;) {
        await abortableSleep(this.intervalMs, signal);
        await this.cycle(signal);
      }
    } catch (err) {
      if (err instanceof Aborted) return;
      this.logger.error('health loop stopped: %s', err instanceof Error ? err.message : String(err));
      if (this.controller?.signal === signal) this.controller = null;
    }
  }

  // ─── Checks ─────────────────────────────────────────────────

  /** Run one check now, outside the schedule. */
  checkNow(): Promise<void> {
    return this.cycle(new AbortController().signal);
  }

  private async cycle(signal: AbortSignal): Promise<void> {
    if (this.target.busy === true) {
      this.logger.debug('host busy, skipping check');
      return;
    }
    if (!this.target.connected) {
      this.totalPings++;
      this.recordFailure('not_connected', null);
      return;
    }

    const outcome = await raceAbort(this.pingWithin(this.checkTimeoutMs), signal);
    this.totalPings++;
    if (outcome.kind === 'timeout') {
      this.recordFailure('ping_timeout', null);
    } else if (outcome.kind === 'thrown') {
      this.recordFailure(outcome.message, null);
    } else if (outcome.result.status === 'ok') {
      this.recordSuccess(outcome.result.latency_ms);
    } else {
      this.recordFailure(outcome.result.error, outcome.result.latency_ms);
    }
  }

  private pingWithin(
    ms: number,
  ): Promise<{ kind: 'result'; result: PingResult } | { kind: 'timeout' } | { kind: 'thrown'; message: string }> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve({ kind: 'timeout' }), ms);
      this.target.ping(ms).then(
        (result) => {
          clearTimeout(timer);
          resolve({ kind: 'result', result });
        },
        (err: unknown) => {
          clearTimeout(timer);
          resolve({ kind: 'thrown', message: err instanceof Error ? err.message : String(err) });
        },
      );
    });
  }

  // ─── Recording ──────────────────────────────────────────────

  private recordSuccess(latencyMs: number): void {
    const before = this.consecutiveFailures;
    this.consecutiveFailures = 0;
    this.successfulPings++;
    this.lastSuccessAt = performance.now();
    if (before > 0) {
      this.logger.info('host connection recovered after %d failure(s)', before);
    } else {
      this.logger.debug('ping %dms', latencyMs);
    }
    this.append({
      ts: this.timestamp(),
      event: before > 0 ? 'recovered' : 'ok',
      latency_ms: latencyMs,
      consecutive_failures_before: before,
    });
  }

  private recordFailure(reason: string, latencyMs: number | null): void {
    this.consecutiveFailures++;
    this.logger.warn('ping failed (%s), consecutive: %d', reason, this.consecutiveFailures);
    this.append({
      ts: this.timestamp(),
      event: 'failure',
      reason,
      latency_ms: latencyMs,
      consecutive_failures: this.consecutiveFailures,
    });
  }

  recordReconnectAttempt(success: boolean): void {
    this.reconnectAttempts++;
    this.append({ ts: this.timestamp(), event: 'reconnect_attempt', success, attempt_number: this.reconnectAttempts });
    if (success) {
      this.consecutiveFailures = 0;
      this.lastSuccessAt = performance.now();
      this.logger.info('reconnect #%d succeeded', this.reconnectAttempts);
    } else {
      this.logger.warn('reconnect #%d failed', this.reconnectAttempts);
    }
  }

  recordConnectionLost(reason: string): void {
    this.append({ ts: this.timestamp(), event: 'connection_lost', reason });
    this.logger.error('connection lost: %s', reason);
  }

  private append(event: HealthEvent): void {
    this.history.push(event);
    if (this.history.length > HISTORY_LIMIT) this.history.shift();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ─── Reporting ──────────────────────────────────────────────

  get healthy(): boolean {
    return this.target.connected && this.consecutiveFailures === 0;
  }

  getStatus(): HealthStatus {
    const now = performance.now();
    return {
      healthy: this.healthy,
      total_pings: this.totalPings,
      successful_pings: this.successfulPings,
      consecutive_failures: this.consecutiveFailures,
      reconnect_attempts: this.reconnectAttempts,
      last_success_ago_s: this.lastSuccessAt === null ? null : round1((now - this.lastSuccessAt) / 1000),
      monitor_uptime_s: round1((now - this.startedAt) / 1000),
      ping_interval_s: this.intervalMs / 1000,
    };
  }

  exportReport(): HealthReport {
    return { ...this.getStatus(), history: [...this.history] };
  }
}
