/**
 * Line codec — one JSON message per line, terminated by a single '\n'.
 *
 * Parsers never throw: they return either a value or a human-readable error
 * string, so both sides can answer malformed input with a local error reply.
 */

import { z } from 'zod';
import {
  isCommand,
  newMessageId,
  type ErrorDetail,
  type Message,
  type Request,
  type Response,
} from './messages.js';
import { PROTOCOL_VERSION } from './version.js';

export type ParseResult<T> =
  | { value: T; error: null }
  | { value: null; error: string };

// ─── Schemas ─────────────────────────────────────────────────

const requestShape = z.object({
  protocol_version: z.string().optional(),
  message_id: z.string().optional(),
  params: z.record(z.unknown()).optional(),
});

const errorShape = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  traceback: z.string().nullable().optional(),
  context: z.record(z.unknown()).nullable().optional(),
});

const responseShape = z.object({
  protocol_version: z.string().optional(),
  message_id: z.string().optional(),
  status: z.string(),
  result: z.record(z.unknown()).nullable().optional(),
  error: errorShape.nullable().optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function decodeObject(raw: string): ParseResult<Record<string, unknown>> {
  let value: unknown;
  try {
    value = JSON.parse(raw.trim());
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { value: null, error: `Invalid JSON: ${reason}` };
  }
  if (!isRecord(value)) {
    return { value: null, error: 'Message must be a JSON object' };
  }
  return { value, error: null };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ─── Parsing ─────────────────────────────────────────────────

export function parseRequest(raw: string): ParseResult<Request> {
  const decoded = decodeObject(raw);
  if (decoded.error !== null) return decoded;
  const obj = decoded.value;

  if (!('command' in obj)) {
    return { value: null, error: 'Missing required field: command' };
  }
  if (!isCommand(obj.command)) {
    return { value: null, error: `Unknown command: ${JSON.stringify(obj.command)}` };
  }

  const parsed = requestShape.safeParse(obj);
  if (!parsed.success) {
    return { value: null, error: `Malformed request: ${describeIssues(parsed.error)}` };
  }

  return {
    value: {
      protocol_version: parsed.data.protocol_version ?? PROTOCOL_VERSION,
      message_id: parsed.data.message_id ?? newMessageId(),
      command: obj.command,
      params: parsed.data.params ?? {},
    },
    error: null,
  };
}

export function parseResponse(raw: string): ParseResult<Response> {
  const decoded = decodeObject(raw);
  if (decoded.error !== null) return decoded;
  const obj = decoded.value;

  if (!('status' in obj)) {
    return { value: null, error: 'Missing required field: status' };
  }

  const parsed = responseShape.safeParse(obj);
  if (!parsed.success) {
    return { value: null, error: `Malformed response: ${describeIssues(parsed.error)}` };
  }

  const data = parsed.data;
  const protocolVersion = data.protocol_version ?? PROTOCOL_VERSION;
  const messageId = data.message_id ?? '';

  if (data.status === 'success') {
    return {
      value: {
        protocol_version: protocolVersion,
        message_id: messageId,
        status: 'success',
        result: data.result ?? {},
      },
      error: null,
    };
  }

  const error: ErrorDetail = {
    code: data.error?.code ?? 'INTERNAL_ERROR',
    message: data.error?.message ?? 'Unknown error',
  };
  if (data.error?.traceback) error.traceback = data.error.traceback;
  if (data.error?.context && Object.keys(data.error.context).length > 0) {
    error.context = data.error.context;
  }

  return {
    value: {
      protocol_version: protocolVersion,
      message_id: messageId,
      status: 'error',
      error,
    },
    error: null,
  };
}

/**
 * Best-effort recovery of `message_id` from a line that failed to parse,
 * so the error reply can still be correlated. Returns null when absent.
 */
export function recoverMessageId(raw: string): string | null {
  const decoded = decodeObject(raw);
  if (decoded.error !== null) return null;
  const id = decoded.value.message_id;
  return typeof id === 'string' && id.length > 0 ? id : null;
}

// ─── Serialization ───────────────────────────────────────────

/** JSON encoding never emits a raw newline, so the trailing '\n' is the only one. */
export function serializeMessage(message: Message): string {
  return JSON.stringify(message) + '\n';
}
