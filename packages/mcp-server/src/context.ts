/**
 * Everything a tool call needs, built once per server process: the
 * connection, the health monitor, the operation log and the lane that keeps
 * tool calls and health pings from interleaving on the socket.
 */

import { createLogger, type Command, type Logger, type Params, type Response } from '@meshbridge/protocol';
import type { ServerConfig } from './config.js';
import { HostConnection, type ConnectionStatus, type SocketFactory } from './connection.js';
import { HealthMonitor } from './health.js';
import { DebugLog } from './debug.js';
import { CommandLane } from './lane.js';

export interface ToolContextOptions {
  logger?: Logger;
  socketFactory?: SocketFactory;
  /** Run the health monitor once connected. */
  monitor?: boolean;
}

export class ToolContext {
  readonly connection: HostConnection;
  readonly monitor: HealthMonitor;
  readonly debug: DebugLog;
  readonly lane = new CommandLane();
  readonly logger: Logger;
  private readonly autoMonitor: boolean;

  constructor(
    readonly config: ServerConfig,
    options: ToolContextOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('mcp', { level: config.logLevel });
    this.autoMonitor = options.monitor ?? true;
    this.connection = new HostConnection({
      host: config.host,
      port: config.port,
      connectTimeoutMs: config.connectTimeoutMs,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      commandTimeoutMs: config.commandTimeoutMs,
      logger: this.logger.child('connection'),
      socketFactory: options.socketFactory,
    });
    const connection = this.connection;
    const lane = this.lane;
    this.monitor = new HealthMonitor(
      {
        get connected() {
          return connection.connected;
        },
        get busy() {
          return lane.busy;
        },
        ping: (timeoutMs) => lane.run(() => connection.ping(timeoutMs)),
      },
      {
        intervalMs: config.healthIntervalMs,
        checkTimeoutMs: config.healthTimeoutMs,
        logger: this.logger.child('health'),
      },
    );
    this.debug = new DebugLog({ logDir: config.logDir, verbose: config.verbose, logger: this.logger.child('ops') });
  }

  /** Connect when needed; a successful connect starts the health monitor if it is not running. */
  async ensureConnected(): Promise<HostConnection> {
    if (!this.connection.connected) {
      await this.connection.connect();
      this.watch();
    }
    return this.connection;
  }

  /** Drop the socket and connect again, then make sure the monitor runs. */
  async reconnect(): Promise<ConnectionStatus> {
    const status = await this.lane.run(() => this.connection.reconnect());
    this.watch();
    return status;
  }

  private watch(): void {
    if (this.autoMonitor && !this.monitor.running) this.monitor.start();
  }

  /** Connect if needed and send one command, serialized with every other caller. */
  send(command: Command, params: Params, timeoutMs?: number): Promise<Response> {
    return this.lane.run(async () => {
      const connection = await this.ensureConnected();
      return connection.sendCommand(command, params, timeoutMs);
    });
  }

  async close(): Promise<void> {
    await this.monitor.stop();
    await this.lane.run(() => this.connection.disconnect());
  }
}
