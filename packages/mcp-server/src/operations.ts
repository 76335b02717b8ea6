/**
 * Tool operations — one host command each.
 *
 * Parameters are checked locally first and rejected as INVALID_PARAMS
 * without touching the socket. Results are flat JSON objects with a
 * `status` of 'success' or 'error'; connection failures carry a
 * CONNECTION_* code so the caller knows a reconnect is worth trying.
 */

import type { Command, ErrorDetail, Params, Response } from '@meshbridge/protocol';
import { HostConnectionError, type PingResult } from './connection.js';
import type { ToolContext } from './context.js';
import { interpretPrintability, validateExportParams, validateImportParams } from './validators.js';

// ─── Results ─────────────────────────────────────────────────

export interface ToolSuccess {
  status: 'success';
  [key: string]: unknown;
}

export interface ToolError {
  status: 'error';
  error_code: string;
  message: string;
  traceback?: string;
  context?: Record<string, unknown>;
}

export type ToolResult = ToolSuccess | ToolError;

export function invalidParams(message: string): ToolError {
  return { status: 'error', error_code: 'INVALID_PARAMS', message };
}

function remoteError(error: ErrorDetail): ToolError {
  const out: ToolError = { status: 'error', error_code: error.code, message: error.message };
  if (error.traceback) out.traceback = error.traceback;
  if (error.context) out.context = error.context;
  return out;
}

function connectionError(ctx: ToolContext, err: HostConnectionError): ToolError {
  ctx.monitor.recordConnectionLost(err.message);
  return { status: 'error', error_code: err.code, message: err.message };
}

/** Send one command and flatten the response into a tool result. */
async function call(ctx: ToolContext, command: Command, params: Params, timeoutMs?: number): Promise<ToolResult> {
  let response: Response;
  try {
    response = await ctx.send(command, params, timeoutMs);
  } catch (err) {
    if (err instanceof HostConnectionError) return connectionError(ctx, err);
    throw err;
  }
  if (response.status === 'error') return remoteError(response.error);
  return { ...response.result, status: 'success' };
}

// ─── Scene ───────────────────────────────────────────────────

export interface ExecuteCodeParams {
  code: string;
  /** Seconds the host may spend on the script. */
  timeout?: number;
}

export function executeCode(ctx: ToolContext, { code, timeout = 30 }: ExecuteCodeParams): Promise<ToolResult> {
  // Five extra seconds so the host's own timeout reply arrives before ours.
  return call(ctx, 'execute_code', { code, timeout }, (timeout + 5) * 1000);
}

export const DETAIL_LEVELS = ['summary', 'mesh', 'full'] as const;

export async function getSceneInfo(ctx: ToolContext, { detail_level = 'summary' }: { detail_level?: string }): Promise<ToolResult> {
  if (!DETAIL_LEVELS.some((level) => level === detail_level)) {
    return invalidParams(`Invalid detail_level '${detail_level}'. Must be 'summary', 'mesh', or 'full'.`);
  }
  return call(ctx, 'get_scene_info', { detail_level });
}

// ─── Mesh I/O ────────────────────────────────────────────────

export interface ExportMeshParams {
  filepath: string;
  objects?: string[];
  format?: string;
  scale?: number;
  validate?: boolean;
}

export async function exportMesh(
  ctx: ToolContext,
  { filepath, objects, format = 'stl', scale = 1, validate = true }: ExportMeshParams,
): Promise<ToolResult> {
  const fmt = format.toLowerCase();
  const problem = validateExportParams(filepath, fmt, scale, objects);
  if (problem) return invalidParams(problem);

  const params: Params = { filepath, format: fmt, scale, validate };
  if (objects !== undefined) params.objects = objects;
  return call(ctx, 'export_mesh', params, 60_000);
}

export interface ImportMeshParams {
  filepath: string;
  format?: string;
  scale?: number;
}

export async function importMesh(ctx: ToolContext, { filepath, format, scale = 1 }: ImportMeshParams): Promise<ToolResult> {
  const fmt = format?.toLowerCase();
  const problem = validateImportParams(filepath, fmt, scale);
  if (problem) return invalidParams(problem);

  const params: Params = { filepath, scale };
  if (fmt !== undefined) params.format = fmt;
  return call(ctx, 'import_mesh', params, 30_000);
}

// ─── Inspection ──────────────────────────────────────────────

export interface PrintabilityParams {
  object_name: string;
  /** Scene units (metres at prototype scale). */
  min_thickness?: number;
  target_scale?: number;
}

export async function checkPrintability(
  ctx: ToolContext,
  { object_name, min_thickness = 0.005, target_scale = 0.01148 }: PrintabilityParams,
): Promise<ToolResult> {
  if (!object_name.trim()) return invalidParams('object_name must not be empty');
  if (!(min_thickness > 0)) return invalidParams(`min_thickness must be positive, got ${min_thickness}`);
  if (!(target_scale > 0)) return invalidParams(`target_scale must be positive, got ${target_scale}`);

  const result = await call(ctx, 'check_printability', { object_name, min_thickness, target_scale });
  if (result.status === 'error') return result;
  return interpretPrintability(result);
}

export interface ScreenshotParams {
  filepath?: string;
  width?: number;
  height?: number;
}

export async function screenshot(ctx: ToolContext, { filepath, width = 1920, height = 1080 }: ScreenshotParams): Promise<ToolResult> {
  const params: Params = { width, height };
  if (filepath !== undefined) params.filepath = filepath;
  return call(ctx, 'screenshot', params, 30_000);
}

// ─── Connection management ───────────────────────────────────

export const CONNECTION_ACTIONS = ['status', 'reconnect', 'ping'] as const;
export type ConnectionAction = (typeof CONNECTION_ACTIONS)[number];

export async function manageConnection(ctx: ToolContext, { action }: { action: string }): Promise<ToolResult> {
  switch (action) {
    case 'status': {
      const connection = ctx.connection.status();
      const note = connection.connected
        ? {}
        : {
            note:
              'Not connected. Ensure the host application is running with its bridge started, ' +
              "then call manage_connection(action='reconnect').",
          };
      return {
        status: 'success',
        ...connection,
        ...note,
        health: ctx.monitor.getStatus(),
        performance: ctx.debug.performanceReport(),
      };
    }

    case 'reconnect':
      try {
        const status = await ctx.reconnect();
        ctx.monitor.recordReconnectAttempt(true);
        return { ...status, status: 'success' };
      } catch (err) {
        if (!(err instanceof HostConnectionError)) throw err;
        ctx.monitor.recordReconnectAttempt(false);
        return connectionError(ctx, err);
      }

    case 'ping':
      try {
        const ping: PingResult = await ctx.lane.run(async () => {
          const connection = await ctx.ensureConnected();
          return connection.ping();
        });
        return { status: 'success', ping };
      } catch (err) {
        if (err instanceof HostConnectionError) return connectionError(ctx, err);
        throw err;
      }

    default:
      return invalidParams(`Invalid action '${action}'. Must be 'status', 'reconnect', or 'ping'.`);
  }
}
