import { describe, it, expect, afterEach, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { errorResponse, successResponse } from '@meshbridge/protocol';
import { loadServerConfig } from '../src/config.js';
import { ToolContext } from '../src/context.js';
import {
  checkPrintability,
  executeCode,
  exportMesh,
  getSceneInfo,
  importMesh,
  manageConnection,
  screenshot,
} from '../src/operations.js';
import { closedPort, defaultResponder, quietLogger, sleep, startMockHost, type MockHost, type Responder } from './helpers.js';

const logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'meshbridge-ops-'));

afterAll(() => {
  fs.rmSync(logDir, { recursive: true, force: true });
});

// ─── Helpers ──────────────────────────────────────────────────

let mock: MockHost | null = null;
let ctx: ToolContext | null = null;

afterEach(async () => {
  await ctx?.close();
  await mock?.close();
  ctx = null;
  mock = null;
});

function contextFor(port: number): ToolContext {
  const config = loadServerConfig({ MESHBRIDGE_PORT: String(port), MESHBRIDGE_LOG_DIR: logDir });
  return new ToolContext(config, { logger: quietLogger(), monitor: false });
}

async function setup(respond: Responder = defaultResponder) {
  mock = await startMockHost(respond);
  ctx = contextFor(mock.port);
  return { mock, ctx };
}

// ─── Local validation ─────────────────────────────────────────

describe('local validation', () => {
  it('rejects bad input without contacting the host', async () => {
    const { mock, ctx } = await setup();
    expect(await getSceneInfo(ctx, { detail_level: 'everything' })).toEqual({
      status: 'error',
      error_code: 'INVALID_PARAMS',
      message: "Invalid detail_level 'everything'. Must be 'summary', 'mesh', or 'full'.",
    });
    expect((await exportMesh(ctx, { filepath: '/tmp/a.fbx', format: 'fbx' })).status).toBe('error');
    expect((await importMesh(ctx, { filepath: '' })).status).toBe('error');
    expect((await checkPrintability(ctx, { object_name: 'Cube', min_thickness: 0 })).status).toBe('error');
    expect(await manageConnection(ctx, { action: 'restart' })).toMatchObject({ error_code: 'INVALID_PARAMS' });
    expect(mock.requests).toEqual([]);
    expect(ctx.connection.connected).toBe(false);
  });
});

// ─── Commands ─────────────────────────────────────────────────

describe('commands', () => {
  it('connects on first use and flattens the result', async () => {
    const { mock, ctx } = await setup((request) =>
      request.command === 'execute_code'
        ? successResponse(request.message_id, { stdout: 'hi\n', return_value: '3' })
        : defaultResponder(request),
    );
    const result = await executeCode(ctx, { code: '1 + 2' });
    expect(result).toEqual({ status: 'success', stdout: 'hi\n', return_value: '3' });
    expect(mock.requests.map((r) => [r.command, r.params])).toEqual([
      ['get_version', {}],
      ['execute_code', { code: '1 + 2', timeout: 30 }],
    ]);
  });

  it('sends normalized export and import parameters', async () => {
    const { mock, ctx } = await setup();
    await exportMesh(ctx, { filepath: '/tmp/a.obj', format: 'OBJ', objects: ['Cube'] });
    await importMesh(ctx, { filepath: '/tmp/a.obj', scale: 2 });
    await screenshot(ctx, { width: 64, height: 48 });
    expect(mock.requests.slice(1).map((r) => r.params)).toEqual([
      { filepath: '/tmp/a.obj', format: 'obj', scale: 1, validate: true, objects: ['Cube'] },
      { filepath: '/tmp/a.obj', scale: 2 },
      { width: 64, height: 48 },
    ]);
  });

  it('returns remote errors with their code, trace and context', async () => {
    const { ctx } = await setup((request) =>
      request.command === 'get_scene_info'
        ? errorResponse(request.message_id, 'EXECUTION_ERROR', 'Exception during get_scene_info: Error: boom', {
            traceback: 'Error: boom\n    at handler',
            context: { command: 'get_scene_info' },
          })
        : defaultResponder(request),
    );
    expect(await getSceneInfo(ctx, {})).toEqual({
      status: 'error',
      error_code: 'EXECUTION_ERROR',
      message: 'Exception during get_scene_info: Error: boom',
      traceback: 'Error: boom\n    at handler',
      context: { command: 'get_scene_info' },
    });
    expect(ctx.connection.connected).toBe(true);
  });

  it('adds the interpretation to a printability report', async () => {
    const { mock, ctx } = await setup((request) =>
      request.command === 'check_printability'
        ? successResponse(request.message_id, { is_manifold: true, printable: true, thin_features: [] })
        : defaultResponder(request),
    );
    const result = await checkPrintability(ctx, { object_name: 'Cube' });
    expect(result).toMatchObject({ status: 'success', summary: 'Mesh is print-ready.', issues: [] });
    expect(mock.requests[1].params).toEqual({ object_name: 'Cube', min_thickness: 0.005, target_scale: 0.01148 });
  });

  it('reports an unreachable host as a connection error and records it', async () => {
    ctx = contextFor(await closedPort());
    const result = await getSceneInfo(ctx, {});
    expect(result).toMatchObject({ status: 'error', error_code: 'CONNECTION_REFUSED' });
    const history = ctx.monitor.exportReport().history;
    expect(history.map((e) => e.event)).toEqual(['connection_lost']);
  });
});

// ─── manage_connection ────────────────────────────────────────

describe('manage_connection', () => {
  it('explains how to connect when disconnected', async () => {
    ctx = contextFor(await closedPort());
    const result = await manageConnection(ctx, { action: 'status' });
    expect(result).toMatchObject({
      status: 'success',
      connected: false,
      state: 'disconnected',
      health: { healthy: false, total_pings: 0 },
      performance: { _summary: { total_calls: 0, mode: 'LEAN' } },
    });
    expect(result.status === 'success' && result.note).toMatch(/^Not connected\./);
  });

  it('pings, connecting first when needed', async () => {
    const { ctx } = await setup();
    const result = await manageConnection(ctx, { action: 'ping' });
    expect(result).toMatchObject({ status: 'success', ping: { status: 'ok' } });
    expect(ctx.connection.connected).toBe(true);
  });

  it('records reconnect attempts on the monitor', async () => {
    const { ctx } = await setup();
    const result = await manageConnection(ctx, { action: 'reconnect' });
    expect(result).toMatchObject({ status: 'success', connected: true, connection_count: 1 });
    await mock?.close();
    mock = null;

    const failed = await manageConnection(ctx, { action: 'reconnect' });
    expect(failed).toMatchObject({ status: 'error', error_code: 'CONNECTION_REFUSED' });
    expect(ctx.monitor.exportReport().history.map((e) => e.event)).toEqual([
      'reconnect_attempt',
      'reconnect_attempt',
      'connection_lost',
    ]);
    expect(ctx.monitor.getStatus().reconnect_attempts).toBe(2);
  });
});

// ─── Health checks ────────────────────────────────────────────

describe('health checks beside tool calls', () => {
  it('waits out a slow command instead of counting it as a failed ping', async () => {
    const { mock, ctx } = await setup(async (request) => {
      if (request.command !== 'execute_code') return defaultResponder(request);
      await sleep(300);
      return successResponse(request.message_id, { return_value: 'done' });
    });
    await ctx.ensureConnected();

    const slow = ctx.send('execute_code', { code: 'wait()', timeout: 30 });
    await ctx.monitor.checkNow();
    await ctx.monitor.checkNow();
    expect(ctx.monitor.exportReport().history).toEqual([]);

    await expect(slow).resolves.toMatchObject({ status: 'success', result: { return_value: 'done' } });
    await ctx.monitor.checkNow();
    expect(ctx.monitor.exportReport().history.map((e) => e.event)).toEqual(['ok']);
    expect(ctx.monitor.healthy).toBe(true);
    expect(mock.requests.map((r) => r.command)).toEqual(['get_version', 'execute_code', 'ping']);
  });
});
