// Public API
export { PROTOCOL_VERSION, parseVersion, versionsCompatible, compareVersions } from './version.js';

// Messages
export {
  COMMANDS,
  WIRE_ERROR_CODES,
  CONNECTION_ERROR_CODES,
  isCommand,
  isConnectionErrorCode,
  isErrorCode,
  newMessageId,
  createRequest,
  successResponse,
  errorResponse,
} from './messages.js';
export type {
  Command,
  WireErrorCode,
  ConnectionErrorCode,
  ErrorCode,
  Params,
  ResultPayload,
  Request,
  ErrorDetail,
  ErrorExtras,
  SuccessResponse,
  ErrorResponse,
  Response,
  Message,
} from './messages.js';

// Line codec
export { parseRequest, parseResponse, recoverMessageId, serializeMessage } from './codec.js';
export type { ParseResult } from './codec.js';

// Logging
export { createLogger, parseLogLevel } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogSink } from './logger.js';

// Environment
export { DEFAULT_PORT, parseIntEnv, parseBoolEnv } from './env.js';
export type { Env } from './env.js';
