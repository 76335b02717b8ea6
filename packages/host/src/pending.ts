/**
 * Pending commands — the hand-off between socket sessions and the main loop.
 */

import type { Request, Response } from '@meshbridge/protocol';

/** One request waiting for its response. The first resolve wins. */
export class PendingCommand {
  readonly done: Promise<Response>;
  private response: Response | null = null;
  private readonly settle: (response: Response) => void;

  constructor(readonly request: Request) {
    let settle: (response: Response) => void = () => {};
    this.done = new Promise<Response>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  resolve(response: Response): boolean {
    if (this.response !== null) return false;
    this.response = response;
    this.settle(response);
    return true;
  }

  /** The response, or null when `timeoutMs` passes first. */
  wait(timeoutMs: number): Promise<Response | null> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(null), timeoutMs);
      void this.done.then((response) => {
        clearTimeout(timer);
        resolve(response);
      });
    });
  }
}

/** FIFO shared by every session; the main loop is its only consumer. */
export class CommandQueue {
  private readonly items: PendingCommand[] = [];

  push(command: PendingCommand): void {
    this.items.push(command);
  }

  shift(): PendingCommand | undefined {
    return this.items.shift();
  }

  get depth(): number {
    return this.items.length;
  }

  drain(): PendingCommand[] {
    return this.items.splice(0, this.items.length);
  }
}
