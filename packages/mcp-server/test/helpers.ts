import * as net from 'node:net';
import {
  PROTOCOL_VERSION,
  createLogger,
  parseRequest,
  serializeMessage,
  successResponse,
  type Logger,
  type Request,
  type Response,
} from '@meshbridge/protocol';

// ─── Logging ──────────────────────────────────────────────────

export function quietLogger(lines: string[] = []): Logger {
  return createLogger('test', { level: 'debug', stream: { write: (chunk: string) => lines.push(chunk) } });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Mock host ────────────────────────────────────────────────

/** A Response to send, a raw line to write verbatim, or null for no reply. */
export type Reply = Response | string | null;
export type Responder = (request: Request, socket: net.Socket) => Reply | Promise<Reply>;

export interface MockHost {
  port: number;
  requests: Request[];
  respond: Responder;
  close(): Promise<void>;
}

export function versionReply(request: Request, protocolVersion = PROTOCOL_VERSION): Response {
  return successResponse(request.message_id, {
    protocol_version: protocolVersion,
    addon_version: '0.1.0',
    host_version: 'mock-host 1.0',
  });
}

export const defaultResponder = (request: Request): Reply => {
  if (request.command === 'get_version') return versionReply(request);
  if (request.command === 'ping') return successResponse(request.message_id, { pong: true });
  return successResponse(request.message_id, {});
};

/**
 * In-process stand-in for the host bridge. Each request line is answered
 * independently as soon as its responder settles.
 */
export async function startMockHost(respond: Responder = defaultResponder): Promise<MockHost> {
  const sockets = new Set<net.Socket>();
  const mock: MockHost = {
    port: 0,
    requests: [],
    respond,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => socket.destroy());
    socket.setEncoding('utf8');
    let buffer = '';
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      let nl: number;
      while ((nl = buffer.indexOf('\n')) !== -1) {
        const line = buffer.slice(0, nl);
        buffer = buffer.slice(nl + 1);
        const { value: request } = parseRequest(line);
        if (request === null) continue;
        mock.requests.push(request);
        Promise.resolve(mock.respond(request, socket)).then((reply) => {
          if (reply === null || socket.destroyed) return;
          socket.write(typeof reply === 'string' ? reply + '\n' : serializeMessage(reply));
        }, (err: unknown) => socket.destroy(err instanceof Error ? err : new Error(String(err))));
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('mock host has no port');
  mock.port = address.port;
  return mock;
}

/** A port that was just free: listen on an ephemeral port and close it again. */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('no port');
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}
