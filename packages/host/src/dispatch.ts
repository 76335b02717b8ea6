/**
 * Command table — routes a parsed request to its handler and turns the
 * outcome into exactly one response. dispatch() never rejects.
 */

import {
  PROTOCOL_VERSION,
  compareVersions,
  errorResponse,
  successResponse,
  versionsCompatible,
  type Command,
  type ErrorResponse,
  type Logger,
  type Params,
  type Request,
  type Response,
  type ResultPayload,
} from '@meshbridge/protocol';
import { HandlerError } from './errors.js';
import type { Scene } from './scene.js';

export interface HandlerContext {
  command: Command;
  scene: Scene;
  logger: Logger;
}

export type Handler = (params: Params, ctx: HandlerContext) => ResultPayload | Promise<ResultPayload>;

export interface RegisterOptions {
  replace?: boolean;
}

// ─── Error classification ────────────────────────────────────

interface ErrorLike {
  name: string;
  message: string;
  stack?: string;
}

/** Errors thrown inside a vm context are not `instanceof Error` here. */
function asErrorLike(err: unknown): ErrorLike {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    const name = 'name' in err && typeof err.name === 'string' ? err.name : 'Error';
    const stack = 'stack' in err && typeof err.stack === 'string' ? err.stack : undefined;
    return { name, message: err.message, stack };
  }
  return { name: 'Error', message: String(err) };
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

export function classifyError(messageId: string, command: Command, params: Params, err: unknown): ErrorResponse {
  if (err instanceof HandlerError) {
    const kind = err.kind;
    switch (kind) {
      case 'not_found':
        return errorResponse(messageId, 'OBJECT_NOT_FOUND', err.message, { context: { command, params } });
      case 'invalid_params':
        return errorResponse(messageId, 'INVALID_PARAMS', err.message, { context: { command } });
      case 'missing_file':
      case 'io':
        return errorResponse(
          messageId,
          command === 'import_mesh' ? 'IMPORT_FAILED' : 'EXPORT_FAILED',
          err.message,
          { context: { command } },
        );
      default: {
        const unreachable: never = kind;
        throw new Error(`Unhandled handler error kind: ${String(unreachable)}`);
      }
    }
  }
  const e = asErrorLike(err);
  return errorResponse(
    messageId,
    'EXECUTION_ERROR',
    `Exception during ${command}: ${e.name}: ${lastLine(e.message)}`,
    { traceback: e.stack ?? `${e.name}: ${e.message}`, context: { command } },
  );
}

// ─── Table ───────────────────────────────────────────────────

export class CommandTable {
  private readonly handlers = new Map<Command, Handler>();

  constructor(
    private readonly scene: Scene,
    private readonly logger: Logger,
  ) {}

  register(command: Command, handler: Handler, options: RegisterOptions = {}): void {
    if (this.handlers.has(command) && !options.replace) {
      throw new Error(`Handler for "${command}" already registered. Pass { replace: true } to override.`);
    }
    this.handlers.set(command, handler);
  }

  unregister(command: Command): boolean {
    return this.handlers.delete(command);
  }

  commands(): Command[] {
    return [...this.handlers.keys()].sort();
  }

  async dispatch(request: Request): Promise<Response> {
    const { message_id: id, command, params, protocol_version: version } = request;

    if (!versionsCompatible(version, PROTOCOL_VERSION)) {
      const stale = compareVersions(version, PROTOCOL_VERSION) < 0 ? 'MCP server' : 'host bridge';
      return errorResponse(
        id,
        'VERSION_MISMATCH',
        `Protocol version mismatch: request uses ${version}, host uses ${PROTOCOL_VERSION}. Update the ${stale}.`,
      );
    }

    const handler = this.handlers.get(command);
    if (!handler) {
      return errorResponse(
        id,
        'INVALID_COMMAND',
        `Unknown command: "${command}". Valid commands: [${this.commands().join(', ')}]`,
      );
    }

    const t0 = performance.now();
    try {
      const result = await handler(params, { command, scene: this.scene, logger: this.logger });
      const elapsed = (performance.now() - t0) / 1000;
      return successResponse(id, { ...result, _execution_time: Number(elapsed.toFixed(4)) });
    } catch (err) {
      const response = classifyError(id, command, params, err);
      this.logger.debug('%s failed: %s', command, response.error.message);
      return response;
    }
  }
}
