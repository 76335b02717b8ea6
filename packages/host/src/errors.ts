/**
 * Handler errors — the only failures the command table classifies by kind.
 * Anything else a handler throws is reported as an execution error.
 */

export type HandlerErrorKind = 'not_found' | 'invalid_params' | 'missing_file' | 'io';

export class HandlerError extends Error {
  readonly kind: HandlerErrorKind;

  constructor(kind: HandlerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandlerError';
    this.kind = kind;
  }
}

export function notFound(message: string): HandlerError {
  return new HandlerError('not_found', message);
}

export function invalidParams(message: string): HandlerError {
  return new HandlerError('invalid_params', message);
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/** Map a filesystem failure onto missing_file / io. */
export function fromFsError(err: unknown, filepath: string): HandlerError {
  const code = errnoCode(err);
  const reason = err instanceof Error ? err.message : String(err);
  if (code === 'ENOENT') {
    return new HandlerError('missing_file', `File not found: ${filepath}`, { cause: err });
  }
  return new HandlerError('io', `I/O error on ${filepath}: ${reason}`, { cause: err });
}

// ─── Param readers ───────────────────────────────────────────

type Params = Record<string, unknown>;

export function requireString(params: Params, key: string): string {
  const value = params[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw invalidParams(`Missing required parameter: ${key}`);
  }
  return value;
}

export function optionalString(params: Params, key: string): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw invalidParams(`Parameter ${key} must be a string`);
  return value;
}

export function optionalNumber(params: Params, key: string, fallback: number): number {
  const value = params[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalidParams(`Parameter ${key} must be a finite number`);
  }
  return value;
}

export function optionalBoolean(params: Params, key: string, fallback: boolean): boolean {
  const value = params[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') throw invalidParams(`Parameter ${key} must be a boolean`);
  return value;
}

export function optionalStringList(params: Params, key: string): string[] | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw invalidParams(`Parameter ${key} must be a list of strings`);
  }
  return value;
}
