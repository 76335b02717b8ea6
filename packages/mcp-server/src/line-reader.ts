/**
 * Pull-style line reader over a socket.
 *
 * Lines that arrive while nobody is waiting stay buffered, so a response
 * that lands after its request timed out is read (and discarded) by the
 * next caller instead of being lost mid-stream.
 */

import type * as net from 'node:net';

export type ReadResult =
  | { kind: 'line'; line: string }
  | { kind: 'timeout' }
  | { kind: 'closed'; reason: string | null };

type Waiter = (result: ReadResult) => void;

export class LineReader {
  private buffer = '';
  private readonly lines: string[] = [];
  private closed = false;
  private closeReason: string | null = null;
  private waiter: Waiter | null = null;

  constructor(socket: net.Socket) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.receive(chunk));
    socket.on('error', (err) => {
      this.closeReason = err.message;
    });
    socket.on('end', () => this.close());
    socket.on('close', () => this.close());
  }

  /** Next non-blank line, or why there is none within `timeoutMs`. */
  next(timeoutMs: number): Promise<ReadResult> {
    if (this.waiter) throw new Error('LineReader already has a pending read');
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve({ kind: 'line', line });
    if (this.closed) return Promise.resolve({ kind: 'closed', reason: this.closeReason });
    if (timeoutMs <= 0) return Promise.resolve({ kind: 'timeout' });

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: 'timeout' });
      }, timeoutMs);
      this.waiter = (result) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(result);
      };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.waiter?.({ kind: 'closed', reason: this.closeReason });
  }

  private receive(chunk: string): void {
    this.buffer += chunk;
    let nl: number;
    while ((nl = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, nl);
      this.buffer = this.buffer.slice(nl + 1);
      if (line.trim() === '') continue;
      if (this.waiter) this.waiter({ kind: 'line', line });
      else this.lines.push(line);
    }
  }
}
