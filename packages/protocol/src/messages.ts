/**
 * Message types shared by the host bridge and the MCP server.
 *
 * Request and Response travel as one JSON object per line. ErrorDetail codes
 * come from WIRE_ERROR_CODES; CONNECTION_ERROR_CODES are raised locally by the
 * client when the transport fails and never appear on the wire.
 */

import { randomUUID } from 'node:crypto';
import { PROTOCOL_VERSION } from './version.js';

// ─── Commands ────────────────────────────────────────────────

export const COMMANDS = [
  'get_version',
  'ping',
  'execute_code',
  'get_scene_info',
  'export_mesh',
  'check_printability',
  'screenshot',
  'import_mesh',
] as const;

export type Command = (typeof COMMANDS)[number];

export function isCommand(value: unknown): value is Command {
  return typeof value === 'string' && (COMMANDS as readonly string[]).includes(value);
}

// ─── Error codes ─────────────────────────────────────────────

export const WIRE_ERROR_CODES = [
  'EXECUTION_ERROR',
  'TIMEOUT',
  'INVALID_COMMAND',
  'INVALID_PARAMS',
  'OBJECT_NOT_FOUND',
  'EXPORT_FAILED',
  'IMPORT_FAILED',
  'VERSION_MISMATCH',
  'INTERNAL_ERROR',
] as const;

export type WireErrorCode = (typeof WIRE_ERROR_CODES)[number];

export const CONNECTION_ERROR_CODES = [
  'CONNECTION_REFUSED',
  'CONNECTION_LOST',
  'CONNECTION_TIMEOUT',
] as const;

export type ConnectionErrorCode = (typeof CONNECTION_ERROR_CODES)[number];

export type ErrorCode = WireErrorCode | ConnectionErrorCode;

export function isConnectionErrorCode(code: string): code is ConnectionErrorCode {
  return (CONNECTION_ERROR_CODES as readonly string[]).includes(code);
}

export function isErrorCode(code: string): code is ErrorCode {
  return (WIRE_ERROR_CODES as readonly string[]).includes(code) || isConnectionErrorCode(code);
}

// ─── Messages ────────────────────────────────────────────────

export type Params = Record<string, unknown>;
export type ResultPayload = Record<string, unknown>;

export interface Request {
  readonly protocol_version: string;
  readonly message_id: string;
  readonly command: Command;
  readonly params: Params;
}

export interface ErrorDetail {
  /** Wire codes from the host; unknown strings are kept as sent. */
  code: string;
  message: string;
  traceback?: string;
  context?: Record<string, unknown>;
}

export interface SuccessResponse {
  protocol_version: string;
  message_id: string;
  status: 'success';
  result: ResultPayload;
}

export interface ErrorResponse {
  protocol_version: string;
  message_id: string;
  status: 'error';
  error: ErrorDetail;
}

export type Response = SuccessResponse | ErrorResponse;

export type Message = Request | Response;

// ─── Constructors ────────────────────────────────────────────

export function newMessageId(): string {
  return randomUUID();
}

export function createRequest(command: Command, params: Params = {}, messageId = newMessageId()): Request {
  return {
    protocol_version: PROTOCOL_VERSION,
    message_id: messageId,
    command,
    params,
  };
}

export function successResponse(messageId: string, result: ResultPayload): SuccessResponse {
  return {
    protocol_version: PROTOCOL_VERSION,
    message_id: messageId,
    status: 'success',
    result,
  };
}

export interface ErrorExtras {
  traceback?: string;
  context?: Record<string, unknown>;
}

export function errorResponse(
  messageId: string,
  code: ErrorCode,
  message: string,
  extras: ErrorExtras = {},
): ErrorResponse {
  const error: ErrorDetail = { code, message };
  if (extras.traceback) error.traceback = extras.traceback;
  if (extras.context && Object.keys(extras.context).length > 0) error.context = extras.context;
  return {
    protocol_version: PROTOCOL_VERSION,
    message_id: messageId,
    status: 'error',
    error,
  };
}
