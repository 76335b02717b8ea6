/**
 * Host bridge — TCP listener on 127.0.0.1 feeding the main loop.
 *
 * Every accepted socket gets a ClientSession that reads newline-delimited
 * requests and waits for each response before reading on. All sessions
 * share one CommandQueue; a main-loop tick runs at most one command per
 * poll, so handlers never overlap.
 */

import * as net from 'node:net';
import {
  DEFAULT_PORT,
  createLogger,
  errorResponse,
  newMessageId,
  parseRequest,
  recoverMessageId,
  serializeMessage,
  type Logger,
  type Response,
} from '@meshbridge/protocol';
import type { CommandTable } from './dispatch.js';
import type { MainLoop } from './main-loop.js';
import { CommandQueue, PendingCommand } from './pending.js';

export type BridgeState = 'stopped' | 'listening' | 'error';

export interface BridgeOptions {
  port?: number;
  graceMs?: number;
  pollMs?: number;
  /** Used when a request carries no numeric params.timeout (seconds). */
  defaultTimeoutS?: number;
  logger?: Logger;
}

export interface BridgeStatus {
  status: BridgeState;
  port: number | null;
  connection_count: number;
  active_clients: number;
  queue_depth: number;
  last_command: string | null;
  last_command_at: string | null;
}

// ─── Session ─────────────────────────────────────────────────

interface SessionHost {
  readonly queue: CommandQueue;
  readonly logger: Logger;
  deadlineMs(params: Record<string, unknown>): number;
  closed(session: ClientSession): void;
}

export class ClientSession {
  private buffer = '';
  private readonly lines: string[] = [];
  private draining = false;
  private open = true;
  readonly peer: string;

  constructor(
    readonly socket: net.Socket,
    private readonly host: SessionHost,
  ) {
    this.peer = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.receive(chunk));
    socket.on('error', (err) => host.logger.debug('client %s socket error: %s', this.peer, err.message));
    socket.on('close', () => {
      this.open = false;
      host.closed(this);
    });
  }

  close(): void {
    this.open = false;
    this.socket.destroy();
  }

  private receive(chunk: string): void {
    this.buffer += chunk;
    let nl: number;
    while ((nl = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, nl);
      this.buffer = this.buffer.slice(nl + 1);
      if (line.trim() !== '') this.lines.push(line);
    }
    this.drain().catch((err: unknown) => {
      this.host.logger.error('session %s failed: %s', this.peer, err instanceof Error ? err.message : String(err));
      this.close();
    });
  }

  /** Handle buffered lines strictly in order, one at a time. */
  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      let line: string | undefined;
      while (this.open && (line = this.lines.shift()) !== undefined) {
        this.write(await this.handle(line));
      }
    } finally {
      this.draining = false;
    }
  }

  private async handle(line: string): Promise<Response> {
    const { value: request, error } = parseRequest(line);
    if (request === null) {
      this.host.logger.warn('client %s sent an invalid request: %s', this.peer, error);
      return errorResponse(recoverMessageId(line) ?? newMessageId(), 'INVALID_COMMAND', error);
    }

    const pending = new PendingCommand(request);
    this.host.queue.push(pending);
    const deadline = this.host.deadlineMs(request.params);
    const response = await pending.wait(deadline);
    if (response) return response;

    this.host.logger.warn('%s (%s) timed out after %dms', request.command, request.message_id, deadline);
    return errorResponse(
      request.message_id,
      'TIMEOUT',
      `Command timed out after ${deadline / 1000}s waiting for the host main loop.`,
      { context: { command: request.command } },
    );
  }

  private write(response: Response): void {
    if (!this.open || this.socket.destroyed || !this.socket.writable) {
      this.host.logger.warn('client %s gone, dropping response %s', this.peer, response.message_id);
      return;
    }
    this.socket.write(serializeMessage(response), (err) => {
      if (err) this.host.logger.warn('write to %s failed: %s', this.peer, err.message);
    });
  }
}

// ─── Bridge ──────────────────────────────────────────────────

export class HostBridge implements SessionHost {
  readonly queue = new CommandQueue();
  readonly logger: Logger;

  private server: net.Server | null = null;
  private state: BridgeState = 'stopped';
  private readonly sessions = new Set<ClientSession>();
  private connectionCount = 0;
  private lastCommand: string | null = null;
  private lastCommandAt: Date | null = null;

  private readonly port: number;
  private readonly graceMs: number;
  private readonly pollMs: number;
  private readonly defaultTimeoutS: number;

  constructor(
    private readonly table: CommandTable,
    private readonly loop: MainLoop,
    options: BridgeOptions = {},
  ) {
    this.port = options.port ?? DEFAULT_PORT;
    this.graceMs = options.graceMs ?? 10_000;
    this.pollMs = options.pollMs ?? 50;
    this.defaultTimeoutS = options.defaultTimeoutS ?? 60;
    this.logger = options.logger ?? createLogger('bridge');
  }

  async start(port = this.port): Promise<void> {
    if (this.state === 'listening') return;

    const server = net.createServer((socket) => this.accept(socket));
    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, '127.0.0.1', () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (err) {
      this.state = 'error';
      this.logger.error('failed to listen on 127.0.0.1:%d: %s', port, err instanceof Error ? err.message : String(err));
      throw err;
    }

    server.on('error', (err) => this.logger.error('listener error: %s', err.message));
    this.server = server;
    this.state = 'listening';
    this.loop.register(this.tick);
    this.logger.info('listening on 127.0.0.1:%d', this.address());
  }

  async stop(): Promise<void> {
    this.loop.unregister(this.tick);
    const server = this.server;
    this.server = null;
    if (this.state !== 'error') this.state = 'stopped';

    for (const pending of this.queue.drain()) {
      pending.resolve(errorResponse(pending.request.message_id, 'INTERNAL_ERROR', 'Host bridge stopped'));
    }
    for (const session of this.sessions) session.close();
    this.sessions.clear();

    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      this.state = 'stopped';
      this.logger.info('stopped');
    }
  }

  /** Bound port, or null when not listening. */
  address(): number | null {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr.port : null;
  }

  status(): BridgeStatus {
    return {
      status: this.state,
      port: this.address(),
      connection_count: this.connectionCount,
      active_clients: this.sessions.size,
      queue_depth: this.queue.depth,
      last_command: this.lastCommand,
      last_command_at: this.lastCommandAt?.toISOString() ?? null,
    };
  }

  deadlineMs(params: Record<string, unknown>): number {
    const timeout = params['timeout'];
    const seconds = typeof timeout === 'number' && Number.isFinite(timeout) && timeout > 0 ? timeout : this.defaultTimeoutS;
    return seconds * 1000 + this.graceMs;
  }

  closed(session: ClientSession): void {
    if (this.sessions.delete(session)) {
      this.logger.debug('client %s disconnected', session.peer);
    }
  }

  private accept(socket: net.Socket): void {
    const session = new ClientSession(socket, this);
    this.sessions.add(session);
    this.connectionCount++;
    this.logger.info('client %s connected', session.peer);
  }

  /** One command per tick. */
  private readonly tick = async (): Promise<number | null> => {
    if (this.state !== 'listening') return null;
    const pending = this.queue.shift();
    if (pending) {
      const { command } = pending.request;
      this.lastCommand = command;
      this.lastCommandAt = new Date();
      this.logger.debug('dispatching %s (%s)', command, pending.request.message_id);
      pending.resolve(await this.table.dispatch(pending.request));
    }
    return this.pollMs / 1000;
  };
}
