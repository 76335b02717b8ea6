import * as net from 'node:net';
import { createLogger, type Logger } from '@meshbridge/protocol';

// ─── Logging ──────────────────────────────────────────────────

export function quietLogger(lines: string[] = []): Logger {
  return createLogger('test', { level: 'debug', stream: { write: (chunk: string) => lines.push(chunk) } });
}

// ─── TCP client ───────────────────────────────────────────────

/** Send raw text and collect `expected` response lines. */
export function exchange(port: number, payload: string, expected: number, timeoutMs = 5000): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: '127.0.0.1', port });
    const lines: string[] = [];
    let buffer = '';
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Timed out with ${lines.length}/${expected} lines`));
    }, timeoutMs);

    socket.setEncoding('utf8');
    socket.on('connect', () => socket.write(payload));
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      let nl: number;
      while ((nl = buffer.indexOf('\n')) !== -1) {
        lines.push(buffer.slice(0, nl));
        buffer = buffer.slice(nl + 1);
      }
      if (lines.length >= expected) {
        clearTimeout(timer);
        socket.end();
        resolve(lines);
      }
    });
    socket.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
