import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { COMMANDS, PROTOCOL_VERSION, createRequest, type Command, type Params, type ErrorDetail } from '@meshbridge/protocol';
import { createHost, type HostApp } from '../src/host.js';
import { boxMesh } from '../src/primitives.js';
import { quietLogger } from './helpers.js';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'meshbridge-handlers-'));

afterAll(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

let host: HostApp;

beforeEach(() => {
  host = createHost({ logger: quietLogger() });
  host.scene.add('Cube', boxMesh(2, 2, 2));
});

async function run(command: Command, params: Params = {}): Promise<Record<string, unknown>> {
  const response = await host.table.dispatch(createRequest(command, params));
  if (response.status !== 'success') throw new Error(`${response.error.code}: ${response.error.message}`);
  return response.result;
}

async function fail(command: Command, params: Params = {}): Promise<ErrorDetail> {
  const response = await host.table.dispatch(createRequest(command, params));
  if (response.status !== 'error') throw new Error(`Expected ${command} to fail`);
  return response.error;
}

// ─── Info ─────────────────────────────────────────────────────

describe('get_version / ping', () => {
  it('reports versions and every command', async () => {
    const result = await run('get_version');
    expect(result.protocol_version).toBe(PROTOCOL_VERSION);
    expect(result.addon_version).toBe('0.1.0');
    expect(result.host_version).toMatch(/^meshbridge-host 0\.1\.0 \(node /);
    expect(result.available_commands).toEqual([...COMMANDS]);
  });

  it('answers ping with a timestamp in seconds', async () => {
    const result = await run('ping');
    expect(result.pong).toBe(true);
    expect(Math.abs(Number(result.timestamp) - Date.now() / 1000)).toBeLessThan(5);
  });
});

describe('get_scene_info', () => {
  it('lists objects at summary level', async () => {
    const result = await run('get_scene_info');
    expect(result).toMatchObject({
      scene_name: 'Scene',
      object_count: 1,
      unit_system: 'METRIC',
      unit_scale: 1,
      frame_current: 1,
      objects: [{ name: 'Cube', type: 'MESH', visible: true }],
    });
  });

  it('adds counts and world bounds at mesh level', async () => {
    host.scene.get('Cube').location = [0, 0, 1];
    const result = await run('get_scene_info', { detail_level: 'mesh' });
    expect(result.objects).toEqual([{
      name: 'Cube',
      type: 'MESH',
      visible: true,
      vertex_count: 8,
      face_count: 12,
      bounding_box: { min: [-1, -1, 0], max: [1, 1, 2], size: [2, 2, 2] },
    }]);
  });

  it('adds modifiers and materials at full level', async () => {
    host.scene.add('Pivot', null);
    const result = await run('get_scene_info', { detail_level: 'full' });
    expect(result.objects).toEqual([
      expect.objectContaining({ name: 'Cube', modifiers: [], materials: [] }),
      { name: 'Pivot', type: 'EMPTY', visible: true, modifiers: [] },
    ]);
  });

  it('rejects an unknown detail level', async () => {
    const error = await fail('get_scene_info', { detail_level: 'everything' });
    expect(error.code).toBe('INVALID_PARAMS');
  });
});

// ─── execute_code ─────────────────────────────────────────────

describe('execute_code', () => {
  it('requires code', async () => {
    expect(await fail('execute_code')).toEqual({
      code: 'INVALID_PARAMS',
      message: 'Missing required parameter: code',
      context: { command: 'execute_code' },
    });
  });

  it('reports script exceptions as execution errors', async () => {
    const error = await fail('execute_code', { code: 'throw new Error("nope")' });
    expect(error.code).toBe('EXECUTION_ERROR');
    expect(error.message).toBe('Exception during execute_code: Error: nope');
    expect(error.traceback).toContain('execute_code.js');
  });

  it('reports missing scene objects as OBJECT_NOT_FOUND', async () => {
    const error = await fail('execute_code', { code: "scene.get('Ghost')" });
    expect(error.code).toBe('OBJECT_NOT_FOUND');
    expect(error.message).toBe("Object 'Ghost' not found. Available: [Cube]");
  });
});

// ─── export_mesh ──────────────────────────────────────────────

describe('export_mesh', () => {
  it('writes a binary STL of the named objects', async () => {
    const filepath = path.join(tmp, 'out', 'cube.stl');
    const result = await run('export_mesh', { filepath, objects: ['Cube'], scale: 0.5 });
    expect(result).toMatchObject({
      filepath,
      format: 'stl',
      object_count: 1,
      total_vertices: 8,
      total_faces: 12,
      file_size_bytes: 684,
      scale_applied: 0.5,
      bounding_box_scaled_mm: { x_mm: 1000, y_mm: 1000, z_mm: 1000 },
      validation_result: { all_manifold: true },
    });
    expect(fs.statSync(filepath).size).toBe(684);
  });

  it('skips validation when asked', async () => {
    const result = await run('export_mesh', { filepath: path.join(tmp, 'cube.obj'), format: 'OBJ', validate: false });
    expect(result.format).toBe('obj');
    expect(result.validation_result).toBeNull();
  });

  it('rejects unsupported formats and bad scales', async () => {
    const filepath = path.join(tmp, 'x.3mf');
    expect((await fail('export_mesh', { filepath, format: '3mf' })).message).toMatch(/^3MF export needs a zip container/);
    expect((await fail('export_mesh', { filepath, format: 'fbx' })).code).toBe('INVALID_PARAMS');
    expect((await fail('export_mesh', { filepath, scale: 0 })).message).toBe('scale must be positive, got 0');
  });

  it('reports unknown objects', async () => {
    const error = await fail('export_mesh', { filepath: path.join(tmp, 'y.stl'), objects: ['Nope'] });
    expect(error.code).toBe('OBJECT_NOT_FOUND');
  });

  it('refuses an empty selection', async () => {
    host.scene.select([]);
    host.scene.add('Pivot', null);
    const error = await fail('export_mesh', { filepath: path.join(tmp, 'z.stl') });
    expect(error.code).toBe('INVALID_PARAMS');
    expect(error.message).toMatch(/^No mesh objects selected/);
  });
});

// ─── import_mesh ──────────────────────────────────────────────

describe('import_mesh', () => {
  it('imports what export_mesh wrote', async () => {
    const filepath = path.join(tmp, 'roundtrip.obj');
    await run('export_mesh', { filepath, format: 'obj' });
    const result = await run('import_mesh', { filepath, scale: 2 });
    expect(result).toEqual({
      imported_objects: ['Cube.001'],
      object_count: 1,
      total_vertices: 8,
      total_faces: 12,
      bounding_box: { min: [-2, -2, -2], max: [2, 2, 2], size_m: [4, 4, 4] },
      _execution_time: expect.any(Number),
    });
    expect(host.scene.selected().map((o) => o.name)).toEqual(['Cube.001']);
  });

  it('reports a missing file as IMPORT_FAILED', async () => {
    const filepath = path.join(tmp, 'missing.stl');
    const error = await fail('import_mesh', { filepath });
    expect(error).toEqual({
      code: 'IMPORT_FAILED',
      message: `File not found: ${filepath}`,
      context: { command: 'import_mesh' },
    });
  });

  it('reports unparseable content as IMPORT_FAILED', async () => {
    const filepath = path.join(tmp, 'broken.ply');
    fs.writeFileSync(filepath, 'not a ply file\n');
    const error = await fail('import_mesh', { filepath });
    expect(error.code).toBe('IMPORT_FAILED');
    expect(error.message).toBe(`Failed to parse PLY file ${filepath}: Not a PLY file: missing "ply" magic line`);
  });

  it('explains formats the host cannot read', async () => {
    const error = await fail('import_mesh', { filepath: path.join(tmp, 'part.step') });
    expect(error.code).toBe('INVALID_PARAMS');
    expect(error.message).toMatch(/^STEP import needs a CAD kernel/);
  });
});

// ─── check_printability ───────────────────────────────────────

describe('check_printability', () => {
  it('passes a closed cube', async () => {
    const result = await run('check_printability', { object_name: 'Cube' });
    expect(result).toMatchObject({
      object_name: 'Cube',
      is_manifold: true,
      non_manifold_edges: 0,
      non_manifold_verts: 0,
      loose_geometry: { vertices: 0, edges: 0 },
      degenerate_faces: 0,
      self_intersections: 0,
      thin_features: [],
      target_scale: 0.01148,
      printable: true,
    });
    const bbox = result.bounding_box as { prototype_m: number[]; scaled_mm: number[] };
    expect(bbox.prototype_m).toEqual([2, 2, 2]);
    expect(bbox.scaled_mm[0]).toBeCloseTo(22.96, 3);
    const volume = result.volume as { prototype_m3: number; scaled_mm3: number };
    expect(volume.prototype_m3).toBe(8);
    expect(volume.scaled_mm3).toBeCloseTo(12103.63, 1);
  });

  it('fails an open mesh', async () => {
    const box = boxMesh(1, 1, 1);
    host.scene.add('Open', { ...box, indices: box.indices.slice(0, 30) });
    const result = await run('check_printability', { object_name: 'Open' });
    expect(result.is_manifold).toBe(false);
    expect(result.non_manifold_edges).toBe(4);
    expect(result.printable).toBe(false);
  });

  it('rejects empties and unknown objects', async () => {
    host.scene.add('Pivot', null);
    expect((await fail('check_printability', { object_name: 'Pivot' })).message).toBe(
      "Object 'Pivot' is type 'EMPTY', not MESH",
    );
    expect((await fail('check_printability', { object_name: 'Ghost' })).code).toBe('OBJECT_NOT_FOUND');
  });
});

// ─── screenshot ───────────────────────────────────────────────

describe('screenshot', () => {
  it('returns a base64 PNG by default', async () => {
    const result = await run('screenshot', { width: 64, height: 48 });
    expect(result.width).toBe(64);
    expect(result.height).toBe(48);
    const png = Buffer.from(String(result.image_base64), 'base64');
    expect(png.subarray(1, 4).toString('ascii')).toBe('PNG');
    expect(png.readUInt32BE(16)).toBe(64);
  });

  it('writes the PNG when given a path', async () => {
    const filepath = path.join(tmp, 'shots', 'view.png');
    const result = await run('screenshot', { filepath, width: 32, height: 32 });
    expect(result.filepath).toBe(filepath);
    expect(result.file_size_bytes).toBe(fs.statSync(filepath).size);
  });

  it('bounds the image size', async () => {
    expect((await fail('screenshot', { width: 0 })).code).toBe('INVALID_PARAMS');
    expect((await fail('screenshot', { height: 10.5 })).code).toBe('INVALID_PARAMS');
  });
});
