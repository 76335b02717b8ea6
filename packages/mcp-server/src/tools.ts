/**
 * MCP Tool Registrations — seven tools over the host bridge.
 *
 * Every tool answers with JSON carrying `status: 'success' | 'error'`;
 * errors include an `error_code` that separates connection trouble
 * (reconnect) from bad input or a failed command (change the request).
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ToolContext } from './context.js';
import {
  CONNECTION_ACTIONS,
  DETAIL_LEVELS,
  checkPrintability,
  executeCode,
  exportMesh,
  getSceneInfo,
  importMesh,
  manageConnection,
  screenshot,
  type ToolResult,
} from './operations.js';
import { EXPORT_FORMATS, IMPORT_FORMATS } from './validators.js';

function asText(result: ToolResult) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer, ctx: ToolContext): void {

  // ─── Scene (2) ──────────────────────────────────────────────

  server.tool(
    'execute_code',
    'Run a script inside the host application. The script sees `scene` plus helpers ' +
      '(addBox, addSphere, addCylinder, removeObject, select, translate, scaleObject) and a captured console. ' +
      'Use it for anything the dedicated tools do not cover.',
    {
      code: z.string().min(1).describe('Script source. The value of the last expression is returned.'),
      timeout: z.number().positive().default(30).describe('Seconds to wait for completion'),
    },
    async (params) => asText(await ctx.debug.track('execute_code', params, () => executeCode(ctx, params))),
  );

  server.tool(
    'get_scene_info',
    'Describe the current scene: object names and types, plus mesh statistics or modifiers at higher detail levels.',
    {
      detail_level: z.enum(DETAIL_LEVELS).default('summary')
        .describe('summary: names and types; mesh: vertex/face counts and bounds; full: adds modifiers and materials'),
    },
    async (params) => asText(await ctx.debug.track('get_scene_info', params, () => getSceneInfo(ctx, params))),
  );

  // ─── Mesh I/O (2) ───────────────────────────────────────────

  server.tool(
    'export_mesh',
    'Export mesh objects for production (3D printing or CNC). Model at full prototype scale in metres and apply ' +
      'the scale here; for HO scale use 1/87.1 ≈ 0.01148.',
    {
      filepath: z.string().min(1).describe('Output file path (absolute path recommended)'),
      objects: z.array(z.string()).optional().describe('Objects to export (default: the current selection)'),
      format: z.enum(EXPORT_FORMATS).default('stl').describe('Output format'),
      scale: z.number().positive().default(1).describe('Scale factor applied at export only'),
      validate: z.boolean().default(true).describe('Run a manifold check on each object before writing'),
    },
    async (params) => asText(await ctx.debug.track('export_mesh', params, () => exportMesh(ctx, params))),
  );

  server.tool(
    'import_mesh',
    'Import a mesh file into the scene. New objects are selected.',
    {
      filepath: z.string().min(1).describe('Path of the mesh file to read'),
      format: z.enum(IMPORT_FORMATS).optional().describe('File format (default: from the extension)'),
      scale: z.number().positive().default(1).describe('Scale factor applied on import'),
    },
    async (params) => asText(await ctx.debug.track('import_mesh', params, () => importMesh(ctx, params))),
  );

  // ─── Inspection (2) ─────────────────────────────────────────

  server.tool(
    'check_mesh_printability',
    'Analyze a mesh for 3D printing: manifold edges, loose geometry, degenerate faces, self-intersections, thin ' +
      'features and dimensions at prototype and target scale. Features under 0.3mm at target scale are warnings, ' +
      'under 0.05mm are issues.',
    {
      object_name: z.string().min(1).describe('Name of the mesh object to analyze'),
      min_thickness: z.number().positive().default(0.005)
        .describe('Minimum feature size in scene units (metres at prototype scale)'),
      target_scale: z.number().positive().default(0.01148).describe('Scale used for the mm figures (HO = 1/87.1)'),
    },
    async (params) => asText(
      await ctx.debug.track('check_mesh_printability', params, () => checkPrintability(ctx, params)),
    ),
  );

  server.tool(
    'screenshot',
    'Render the viewport to PNG. Without a filepath the image is returned inline.',
    {
      filepath: z.string().optional().describe('Where to save the PNG (omit to receive the image)'),
      width: z.number().int().min(1).max(8192).default(1920).describe('Width in pixels'),
      height: z.number().int().min(1).max(8192).default(1080).describe('Height in pixels'),
    },
    async (params) => {
      const result = await ctx.debug.track('screenshot', params, () => screenshot(ctx, params));
      if (result.status === 'success' && typeof result.image_base64 === 'string') {
        return { content: [{ type: 'image' as const, data: result.image_base64, mimeType: 'image/png' }] };
      }
      return asText(result);
    },
  );

  // ─── Connection (1) ─────────────────────────────────────────

  server.tool(
    'manage_connection',
    'Diagnose or reset the host connection. status: versions, uptime, health counters and per-tool timings; ' +
      'reconnect: drop and re-open the socket; ping: measure round-trip latency.',
    {
      action: z.enum(CONNECTION_ACTIONS).describe('status | reconnect | ping'),
    },
    async (params) => asText(await manageConnection(ctx, params)),
  );
}
