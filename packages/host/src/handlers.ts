/**
 * Command handlers — one per protocol command, all running on the main loop.
 *
 * Handlers read params through the typed readers in errors.ts and raise
 * HandlerError for anything the caller can fix.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { COMMANDS, PROTOCOL_VERSION, type Command, type Params } from '@meshbridge/protocol';
import type { Handler } from './dispatch.js';
import {
  HandlerError,
  fromFsError,
  invalidParams,
  optionalBoolean,
  optionalNumber,
  optionalString,
  optionalStringList,
  requireString,
} from './errors.js';
import { boundsSize, mergeBounds, round, round3, scale as scaleVec, type BoundingBox } from './vec3.js';
import { computeBounds, mergeMeshes, scaleMesh, triangleCount, type NamedMesh, type TriangleMesh } from './mesh.js';
import type { Scene, SceneObject } from './scene.js';
import { exportSTL, importSTL } from './formats/stl.js';
import { exportOBJ, importOBJ } from './formats/obj.js';
import { exportPLY, importPLY } from './formats/ply.js';
import {
  buildEdges,
  checkManifold,
  countSelfIntersections,
  degenerateFaces,
  looseGeometry,
  meshVolume,
  thinFeatures,
} from './analysis.js';
import { renderPNG } from './viewport.js';
import { runScript } from './exec.js';

export const HOST_VERSION = '0.1.0';
export const HOST_NAME = 'meshbridge-host';

const MESH_FORMATS = ['stl', 'obj', 'ply'] as const;
type MeshFormat = (typeof MESH_FORMATS)[number];

function isMeshFormat(value: string): value is MeshFormat {
  return (MESH_FORMATS as readonly string[]).includes(value);
}

function unsupportedFormat(fmt: string, direction: 'export' | 'import'): HandlerError {
  if (fmt === '3mf') {
    return invalidParams(`3MF ${direction} needs a zip container, which this host does not provide. Use stl, obj or ply.`);
  }
  if (fmt === 'step' && direction === 'import') {
    return invalidParams('STEP import needs a CAD kernel, which this host does not provide. Convert to stl, obj or ply first.');
  }
  return invalidParams(`Unsupported ${direction} format: '${fmt}'. Supported: ${MESH_FORMATS.join(', ')}`);
}

// ─── Info ────────────────────────────────────────────────────

const getVersion: Handler = () => ({
  protocol_version: PROTOCOL_VERSION,
  addon_version: HOST_VERSION,
  host_version: `${HOST_NAME} ${HOST_VERSION} (node ${process.versions.node})`,
  available_commands: [...COMMANDS],
});

const ping: Handler = () => ({ pong: true, timestamp: Date.now() / 1000 });

const DETAIL_LEVELS = ['summary', 'mesh', 'full'];

function boundsRecord(b: BoundingBox): Record<string, number[]> {
  return { min: b.min, max: b.max, size: boundsSize(b) };
}

const getSceneInfo: Handler = (params, { scene }) => {
  const detail = optionalString(params, 'detail_level') ?? 'summary';
  if (!DETAIL_LEVELS.includes(detail)) {
    throw invalidParams(`detail_level must be one of ${DETAIL_LEVELS.join(', ')}, got '${detail}'`);
  }

  const objects = scene.list().map((obj) => {
    const info: Record<string, unknown> = { name: obj.name, type: obj.type, visible: obj.visible };
    if (detail !== 'summary' && obj.mesh) {
      info.vertex_count = obj.mesh.vertices.length;
      info.face_count = triangleCount(obj.mesh);
      const b = scene.worldBounds(obj);
      if (b) info.bounding_box = boundsRecord(b);
    }
    if (detail === 'full') {
      info.modifiers = obj.modifiers;
      if (obj.mesh) info.materials = obj.materials;
    }
    return info;
  });

  return {
    scene_name: scene.name,
    object_count: scene.size,
    unit_system: scene.unitSystem,
    unit_scale: scene.unitScale,
    frame_current: scene.frameCurrent,
    objects,
  };
};

// ─── Scripts ─────────────────────────────────────────────────

const executeCode: Handler = (params, { scene }) => {
  const code = requireString(params, 'code');
  const timeout = optionalNumber(params, 'timeout', 30);
  if (timeout <= 0) throw invalidParams(`timeout must be positive, got ${timeout}`);
  return { ...runScript(scene, code, Math.round(timeout * 1000)) };
};

// ─── Export ──────────────────────────────────────────────────

function meshObjects(scene: Scene, names: string[] | undefined): SceneObject[] {
  if (names !== undefined) scene.select(names);
  return scene.selected().filter((o) => o.type === 'MESH');
}

function quickManifold(scene: Scene, objects: SceneObject[]): Record<string, unknown> {
  const perObject = objects.map((obj) => {
    const mesh = scene.worldMesh(obj);
    const report = mesh ? checkManifold(mesh) : { isManifold: false, nonManifoldEdges: 0, nonManifoldVerts: 0 };
    return {
      object: obj.name,
      is_manifold: report.isManifold,
      non_manifold_edges: report.nonManifoldEdges,
      non_manifold_verts: report.nonManifoldVerts,
    };
  });
  return { all_manifold: perObject.every((r) => r.is_manifold), per_object: perObject };
}

function encodeMeshes(fmt: MeshFormat, meshes: NamedMesh[]): Uint8Array | string {
  switch (fmt) {
    case 'stl':
      return exportSTL(mergeMeshes(meshes.map((m) => m.mesh)));
    case 'obj':
      return exportOBJ(meshes);
    case 'ply':
      return exportPLY(mergeMeshes(meshes.map((m) => m.mesh)));
  }
}

async function writeOutput(filepath: string, data: Uint8Array | string): Promise<number> {
  try {
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    await fs.writeFile(filepath, data);
    return (await fs.stat(filepath)).size;
  } catch (err) {
    throw fromFsError(err, filepath);
  }
}

const exportMesh: Handler = async (params, { scene }) => {
  const filepath = path.resolve(requireString(params, 'filepath'));
  const fmt = (optionalString(params, 'format') ?? 'stl').toLowerCase();
  const factor = optionalNumber(params, 'scale', 1);
  const validate = optionalBoolean(params, 'validate', true);
  const names = optionalStringList(params, 'objects');

  if (!isMeshFormat(fmt)) throw unsupportedFormat(fmt, 'export');
  if (factor <= 0) throw invalidParams(`scale must be positive, got ${factor}`);

  const selected = meshObjects(scene, names);
  if (selected.length === 0) {
    throw invalidParams(
      "No mesh objects selected for export. Either specify 'objects' or select objects before calling export_mesh.",
    );
  }

  const validation = validate ? quickManifold(scene, selected) : null;

  const meshes: NamedMesh[] = [];
  for (const obj of selected) {
    const world = scene.worldMesh(obj);
    if (world) meshes.push({ name: obj.name, mesh: scaleMesh(world, factor) });
  }
  const size = await writeOutput(filepath, encodeMeshes(fmt, meshes));

  const bounds = mergeBounds(meshes.filter((m) => m.mesh.vertices.length > 0).map((m) => computeBounds(m.mesh)));
  const sizeMm = bounds ? round3(scaleVec(boundsSize(bounds), 1000), 3) : null;

  return {
    filepath,
    format: fmt,
    object_count: selected.length,
    total_vertices: meshes.reduce((n, m) => n + m.mesh.vertices.length, 0),
    total_faces: meshes.reduce((n, m) => n + triangleCount(m.mesh), 0),
    file_size_bytes: size,
    scale_applied: factor,
    bounding_box_scaled_mm: sizeMm ? { x_mm: sizeMm[0], y_mm: sizeMm[1], z_mm: sizeMm[2] } : {},
    validation_result: validation,
  };
};

// ─── Printability ────────────────────────────────────────────

const checkPrintability: Handler = (params, { scene }) => {
  const name = requireString(params, 'object_name');
  const minThickness = optionalNumber(params, 'min_thickness', 0.005);
  const targetScale = optionalNumber(params, 'target_scale', 0.01148);

  const obj = scene.get(name);
  const mesh = scene.worldMesh(obj);
  if (!mesh) throw invalidParams(`Object '${name}' is type '${obj.type}', not MESH`);

  const edges = buildEdges(mesh);
  const manifold = checkManifold(mesh, edges);
  const loose = looseGeometry(mesh, edges);
  const degenerate = degenerateFaces(mesh);
  const volume = meshVolume(mesh);
  const size = boundsSize(computeBounds(mesh));
  const toMm = targetScale * 1000;

  const printable = manifold.isManifold && loose.vertices === 0 && loose.edges === 0 && degenerate === 0;

  return {
    object_name: obj.name,
    is_manifold: manifold.isManifold,
    non_manifold_edges: manifold.nonManifoldEdges,
    non_manifold_verts: manifold.nonManifoldVerts,
    loose_geometry: loose,
    degenerate_faces: degenerate,
    self_intersections: countSelfIntersections(mesh),
    thin_features: thinFeatures(mesh, minThickness, targetScale),
    bounding_box: {
      prototype_m: round3(size, 4),
      scaled_mm: round3(scaleVec(size, toMm), 3),
    },
    volume: {
      prototype_m3: round(volume, 6),
      scaled_mm3: round(volume * toMm ** 3, 3),
    },
    target_scale: targetScale,
    printable,
  };
};

// ─── Screenshot ──────────────────────────────────────────────

const MAX_DIMENSION = 8192;

function dimension(params: Params, key: string, fallback: number): number {
  const value = optionalNumber(params, key, fallback);
  if (!Number.isInteger(value) || value < 1 || value > MAX_DIMENSION) {
    throw invalidParams(`${key} must be an integer between 1 and ${MAX_DIMENSION}, got ${value}`);
  }
  return value;
}

const screenshot: Handler = async (params, { scene }) => {
  const filepath = optionalString(params, 'filepath');
  const width = dimension(params, 'width', 1920);
  const height = dimension(params, 'height', 1080);
  const png = renderPNG(scene, { width, height });

  if (filepath) {
    const resolved = path.resolve(filepath);
    const size = await writeOutput(resolved, png);
    return { filepath: resolved, width, height, file_size_bytes: size };
  }
  return { image_base64: png.toString('base64'), width, height };
};

// ─── Import ──────────────────────────────────────────────────

function decodeMeshes(fmt: MeshFormat, data: Buffer, baseName: string): NamedMesh[] {
  switch (fmt) {
    case 'stl':
      return [{ name: baseName, mesh: importSTL(data) }];
    case 'obj':
      return importOBJ(data.toString('utf8'), baseName);
    case 'ply':
      return [{ name: baseName, mesh: importPLY(data.toString('utf8')) }];
  }
}

const importMesh: Handler = async (params, { scene, logger }) => {
  const filepath = requireString(params, 'filepath');
  const ext = path.extname(filepath).slice(1);
  const fmt = (optionalString(params, 'format') ?? ext).toLowerCase();
  const factor = optionalNumber(params, 'scale', 1);

  if (!isMeshFormat(fmt)) throw unsupportedFormat(fmt, 'import');
  if (factor <= 0) throw invalidParams(`scale must be positive, got ${factor}`);

  let data: Buffer;
  try {
    data = await fs.readFile(filepath);
  } catch (err) {
    throw fromFsError(err, filepath);
  }

  let parsed: NamedMesh[];
  try {
    parsed = decodeMeshes(fmt, data, path.basename(filepath, path.extname(filepath)));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new HandlerError('io', `Failed to parse ${fmt.toUpperCase()} file ${filepath}: ${reason}`, { cause: err });
  }

  const added: SceneObject[] = parsed.map(({ name, mesh }) => scene.add(name, scaleMesh(mesh, factor), { select: false }));
  const names = added.map((o) => o.name);
  if (names.length > 0) scene.select(names);
  logger.info('imported %d object(s) from %s', names.length, filepath);

  const meshes = added.map((o) => o.mesh).filter((m): m is TriangleMesh => m !== null);
  const bounds = mergeBounds(added.flatMap((o) => scene.worldBounds(o) ?? []));

  return {
    imported_objects: [...names].sort(),
    object_count: names.length,
    total_vertices: meshes.reduce((n, m) => n + m.vertices.length, 0),
    total_faces: meshes.reduce((n, m) => n + triangleCount(m), 0),
    bounding_box: bounds
      ? { min: round3(bounds.min, 4), max: round3(bounds.max, 4), size_m: round3(boundsSize(bounds), 4) }
      : null,
  };
};

// ─── Table ───────────────────────────────────────────────────

export const defaultHandlers: Record<Command, Handler> = {
  get_version: getVersion,
  ping,
  execute_code: executeCode,
  get_scene_info: getSceneInfo,
  export_mesh: exportMesh,
  check_printability: checkPrintability,
  screenshot,
  import_mesh: importMesh,
};
