import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createHost, boxMesh, type HostApp } from '@meshbridge/host';
import { loadServerConfig } from '../src/config.js';
import { ToolContext } from '../src/context.js';
import { checkPrintability, executeCode, exportMesh, getSceneInfo, importMesh, manageConnection } from '../src/operations.js';
import { quietLogger } from './helpers.js';

// Full path: tool operation → TCP → bridge → main loop → handler → back.

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'meshbridge-e2e-'));
let host: HostApp;
let ctx: ToolContext;

beforeAll(async () => {
  host = createHost({ port: 0, pollMs: 5, logger: quietLogger() });
  host.scene.add('Cube', boxMesh(2, 2, 2));
  await host.bridge.start();
  const port = host.bridge.address();
  if (port === null) throw new Error('bridge not listening');
  const config = loadServerConfig({ MESHBRIDGE_PORT: String(port), MESHBRIDGE_LOG_DIR: path.join(tmp, 'logs') });
  ctx = new ToolContext(config, { logger: quietLogger(), monitor: false });
});

afterAll(async () => {
  await ctx.close();
  await host.shutdown();
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('MCP operations against a live host', () => {
  it('handshakes and pings', async () => {
    const result = await manageConnection(ctx, { action: 'ping' });
    expect(result).toMatchObject({ status: 'success', ping: { status: 'ok' } });
    const status = ctx.connection.status();
    expect(status.protocol_version).toBe('0.1.0');
    expect(status.host_version).toMatch(/^meshbridge-host 0\.1\.0/);
  });

  it('builds geometry with a script and reads it back', async () => {
    const run = await executeCode(ctx, { code: "addBox('Base', 4, 4, 1, [0, 0, 3]); scene.names()" });
    expect(run).toMatchObject({ status: 'success', return_value: "[ 'Cube', 'Base' ]" });

    const info = await getSceneInfo(ctx, { detail_level: 'mesh' });
    expect(info).toMatchObject({ status: 'success', object_count: 2 });
  });

  it('exports, re-imports and checks a mesh', async () => {
    const filepath = path.join(tmp, 'Cube.stl');
    const exported = await exportMesh(ctx, { filepath, objects: ['Cube'] });
    expect(exported).toMatchObject({ status: 'success', format: 'stl', total_faces: 12, file_size_bytes: 684 });

    const imported = await importMesh(ctx, { filepath });
    expect(imported).toMatchObject({ status: 'success', imported_objects: ['Cube.001'], total_vertices: 8 });

    const report = await checkPrintability(ctx, { object_name: 'Cube.001' });
    expect(report).toMatchObject({ status: 'success', is_manifold: true, printable: true, summary: 'Mesh is print-ready.' });
  });

  it('surfaces host errors as tool errors', async () => {
    const result = await checkPrintability(ctx, { object_name: 'Ghost' });
    expect(result).toMatchObject({ status: 'error', error_code: 'OBJECT_NOT_FOUND' });
    expect(ctx.connection.connected).toBe(true);
  });
});
