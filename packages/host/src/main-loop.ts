/**
 * Main loop — the host application's timer API and its only execution
 * context for command handlers.
 *
 * A callback returns the seconds until it should run again, or null to be
 * unregistered. Callbacks never overlap: an async callback is awaited
 * before any other timer fires.
 */

import { createLogger, type Logger } from '@meshbridge/protocol';

export type TimerCallback = () => number | null | Promise<number | null>;

type Handle = ReturnType<typeof setTimeout>;

export class MainLoop {
  /** Registered callbacks; the handle is null while the callback runs. */
  private readonly timers = new Map<TimerCallback, Handle | null>();
  private chain: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger = createLogger('main-loop')) {}

  register(callback: TimerCallback, firstInterval = 0): void {
    this.unregister(callback);
    this.schedule(callback, firstInterval);
  }

  unregister(callback: TimerCallback): boolean {
    if (!this.timers.has(callback)) return false;
    const handle = this.timers.get(callback);
    if (handle) clearTimeout(handle);
    this.timers.delete(callback);
    return true;
  }

  isRegistered(callback: TimerCallback): boolean {
    return this.timers.has(callback);
  }

  /** Unregister everything. */
  clear(): void {
    for (const callback of [...this.timers.keys()]) this.unregister(callback);
  }

  /** Resolves once every callback already queued has finished. */
  idle(): Promise<void> {
    return this.chain;
  }

  private schedule(callback: TimerCallback, seconds: number): void {
    const handle = setTimeout(() => this.fire(callback, handle), Math.max(0, seconds * 1000));
    this.timers.set(callback, handle);
  }

  private fire(callback: TimerCallback, handle: Handle): void {
    this.chain = this.chain.then(async () => {
      // unregistered or re-registered since this timer was set
      if (this.timers.get(callback) !== handle) return;
      this.timers.set(callback, null);

      let next: number | null;
      try {
        next = await callback();
      } catch (err) {
        this.logger.error('timer callback failed, unregistering: %s', err instanceof Error ? err.stack : String(err));
        next = null;
      }

      if (this.timers.get(callback) !== null) return;
      if (next === null) this.timers.delete(callback);
      else this.schedule(callback, next);
    });
  }
}
