/**
 * Client side of the bridge — one TCP channel to the host.
 *
 * Transport failures throw HostConnectionError and leave the connection
 * disconnected. Remote failures, read timeouts and malformed replies come
 * back as ordinary error responses and keep the channel open.
 *
 * Not reentrant: callers serialize through a CommandLane.
 */

import * as net from 'node:net';
import {
  DEFAULT_PORT,
  PROTOCOL_VERSION,
  compareVersions,
  createLogger,
  createRequest,
  errorResponse,
  isErrorCode,
  parseResponse,
  serializeMessage,
  versionsCompatible,
  type Command,
  type ErrorCode,
  type Logger,
  type Params,
  type Request,
  type Response,
} from '@meshbridge/protocol';
import { LineReader } from './line-reader.js';

const RECONNECT_HINT = "Use manage_connection(action='reconnect') to re-establish the connection.";

// ─── Errors ──────────────────────────────────────────────────

export class HostConnectionError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'HostConnectionError';
  }
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Types ───────────────────────────────────────────────────

export type ConnectionState = 'disconnected' | 'connecting' | 'handshaking' | 'connected';

export type SocketFactory = (options: { host: string; port: number }) => net.Socket;

export interface ConnectionOptions {
  host?: string;
  port?: number;
  connectTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  commandTimeoutMs?: number;
  logger?: Logger;
  socketFactory?: SocketFactory;
}

export interface ConnectionStatus {
  connected: boolean;
  state: ConnectionState;
  host: string;
  port: number;
  host_version: string | null;
  addon_version: string | null;
  protocol_version: string | null;
  mcp_protocol_version: string;
  uptime_seconds: number | null;
  connection_count: number;
}

export type PingResult =
  | { status: 'ok'; latency_ms: number }
  | { status: 'error'; latency_ms: number; error: string };

const defaultSocketFactory: SocketFactory = ({ host, port }) => net.createConnection({ host, port });

// ─── Connection ──────────────────────────────────────────────

export class HostConnection {
  readonly host: string;
  readonly port: number;
  private readonly connectTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly commandTimeoutMs: number;
  private readonly logger: Logger;
  private readonly socketFactory: SocketFactory;

  private state: ConnectionState = 'disconnected';
  private socket: net.Socket | null = null;
  private reader: LineReader | null = null;
  private connectionCount = 0;
  private connectedAt: number | null = null;
  private hostVersion: string | null = null;
  private addonVersion: string | null = null;
  private remoteProtocolVersion: string | null = null;

  constructor(options: ConnectionOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? DEFAULT_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5_000;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 5_000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30_000;
    this.logger = options.logger ?? createLogger('connection');
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
  }

  get connected(): boolean {
    return this.state === 'connected';
  }

  // ─── Lifecycle ──────────────────────────────────────────────

  /** Open the socket and run the version handshake. No-op when already connected. */
  async connect(): Promise<void> {
    if (this.state === 'connected') return;
    this.teardown();

    this.logger.info('connecting to host on %s:%d', this.host, this.port);
    this.state = 'connecting';
    let socket: net.Socket;
    try {
      socket = await this.open();
    } catch (err) {
      this.state = 'disconnected';
      throw err;
    }

    this.socket = socket;
    this.reader = new LineReader(socket);
    this.connectionCount++;
    this.connectedAt = performance.now();
    this.state = 'handshaking';

    try {
      await this.handshake();
    } catch (err) {
      this.teardown();
      throw err;
    }
    this.state = 'connected';
  }

  async disconnect(): Promise<void> {
    if (this.state === 'disconnected' && this.socket === null) return;
    this.teardown();
    this.logger.info('disconnected from host');
  }

  async reconnect(): Promise<ConnectionStatus> {
    this.logger.info('reconnecting to host');
    await this.disconnect();
    await this.connect();
    return this.status();
  }

  status(): ConnectionStatus {
    return {
      connected: this.connected,
      state: this.state,
      host: this.host,
      port: this.port,
      host_version: this.hostVersion,
      addon_version: this.addonVersion,
      protocol_version: this.remoteProtocolVersion,
      mcp_protocol_version: PROTOCOL_VERSION,
      uptime_seconds: this.connectedAt === null ? null : Math.round((performance.now() - this.connectedAt) / 100) / 10,
      connection_count: this.connectionCount,
    };
  }

  private open(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = this.socketFactory({ host: this.host, port: this.port });

      const cleanup = () => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };
      const onConnect = () => {
        cleanup();
        resolve(socket);
      };
      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(this.describeConnectError(err));
      };
      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new HostConnectionError(
          'CONNECTION_TIMEOUT',
          `Connection to host timed out after ${this.connectTimeoutMs / 1000}s. ` +
            `Check that the host is running and its bridge is listening on port ${this.port}.`,
        ));
      }, this.connectTimeoutMs);

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }

  private describeConnectError(err: Error): HostConnectionError {
    if (errnoCode(err) === 'ECONNREFUSED') {
      return new HostConnectionError(
        'CONNECTION_REFUSED',
        `Cannot connect to host on ${this.host}:${this.port}. ` +
          'Ensure the host application is running and its bridge has been started.',
      );
    }
    return new HostConnectionError('CONNECTION_REFUSED', `Failed to connect to host: ${err.message}`);
  }

  private async handshake(): Promise<void> {
    this.logger.debug('performing protocol handshake');
    const response = await this.exchange(createRequest('get_version'), this.handshakeTimeoutMs);

    if (response.status === 'error') {
      const code = isErrorCode(response.error.code) ? response.error.code : 'INTERNAL_ERROR';
      throw new HostConnectionError(code, `Handshake failed: ${response.error.message}`);
    }

    const { result } = response;
    const remote = typeof result.protocol_version === 'string' ? result.protocol_version : 'unknown';
    this.remoteProtocolVersion = remote;
    this.hostVersion = typeof result.host_version === 'string' ? result.host_version : 'unknown';
    this.addonVersion = typeof result.addon_version === 'string' ? result.addon_version : 'unknown';

    if (!versionsCompatible(PROTOCOL_VERSION, remote)) {
      const outdated = compareVersions(remote, PROTOCOL_VERSION) < 0 ? 'host bridge' : 'MCP server';
      throw new HostConnectionError(
        'VERSION_MISMATCH',
        `Protocol version mismatch: MCP server uses ${PROTOCOL_VERSION}, host bridge uses ${remote}. ` +
          `Update the ${outdated} to resolve this.`,
      );
    }

    this.logger.info('handshake ok: %s, addon %s, protocol %s', this.hostVersion, this.addonVersion, remote);
  }

  private teardown(): void {
    this.reader?.close();
    this.socket?.destroy();
    this.reader = null;
    this.socket = null;
    this.connectedAt = null;
    this.state = 'disconnected';
  }

  // ─── Commands ───────────────────────────────────────────────

  /**
   * Send one command and read its response.
   * Throws HostConnectionError when the channel is down or drops.
   */
  async sendCommand(command: Command, params: Params = {}, timeoutMs = this.commandTimeoutMs): Promise<Response> {
    if (this.state !== 'connected') {
      throw new HostConnectionError('CONNECTION_LOST', `Not connected to host. ${RECONNECT_HINT}`);
    }
    const request = createRequest(command, params);
    this.logger.debug('→ %s %s', command, request.message_id);
    const response = await this.exchange(request, timeoutMs);
    this.logger.debug('← %s %s', response.status, response.message_id);
    return response;
  }

  /** Round trip of a `ping` command, in wall-clock milliseconds. */
  async ping(timeoutMs = 5_000): Promise<PingResult> {
    const t0 = performance.now();
    const response = await this.sendCommand('ping', {}, timeoutMs);
    const latency = Math.round((performance.now() - t0) * 100) / 100;
    if (response.status === 'success') return { status: 'ok', latency_ms: latency };
    return { status: 'error', latency_ms: latency, error: response.error.message };
  }

  private async exchange(request: Request, timeoutMs: number): Promise<Response> {
    const { socket, reader } = this;
    if (socket === null || reader === null) {
      throw new HostConnectionError('CONNECTION_LOST', `Not connected to host. ${RECONNECT_HINT}`);
    }

    try {
      await writeLine(socket, serializeMessage(request));
    } catch (err) {
      this.teardown();
      throw new HostConnectionError(
        'CONNECTION_LOST',
        `Lost connection to host while sending command: ${reasonOf(err)}. ${RECONNECT_HINT}`,
      );
    }

    const deadline = performance.now() + timeoutMs;
    for (;;) {
      const read = await reader.next(deadline - performance.now());

      if (read.kind === 'timeout') {
        return errorResponse(
          request.message_id,
          'TIMEOUT',
          `Command '${request.command}' timed out after ${timeoutMs / 1000}s. ` +
            'The command may still be running in the host.',
        );
      }

      if (read.kind === 'closed') {
        this.teardown();
        throw new HostConnectionError(
          'CONNECTION_LOST',
          read.reason
            ? `Lost connection to host while waiting for response: ${read.reason}. ${RECONNECT_HINT}`
            : `Host closed the connection (possibly crashed). ${RECONNECT_HINT}`,
        );
      }

      const { value: response, error } = parseResponse(read.line);
      if (response === null) {
        return errorResponse(
          request.message_id,
          'INTERNAL_ERROR',
          `Received malformed response from host: ${error}. Raw (truncated): ${JSON.stringify(read.line.slice(0, 200))}`,
        );
      }

      // A reply to an earlier request that timed out on this side.
      if (response.message_id !== '' && response.message_id !== request.message_id) {
        this.logger.warn('discarding late response %s while waiting for %s', response.message_id, request.message_id);
        continue;
      }
      return response;
    }
  }
}

function writeLine(socket: net.Socket, line: string): Promise<void> {
  if (socket.destroyed || !socket.writable) {
    return Promise.reject(new Error('socket is not writable'));
  }
  return new Promise((resolve, reject) => {
    socket.write(line, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
