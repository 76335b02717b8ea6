/**
 * Indexed triangle mesh — the geometry every scene object carries.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { sub, cross, length, add, scale as scaleVec } from './vec3.js';

export interface TriangleMesh {
  /** Vertex positions in object space. */
  vertices: Vec3[];
  /** Triangle indices into vertices[], groups of 3. */
  indices: number[];
  /** Edges that belong to no face (wire geometry from OBJ `l` records). */
  looseEdges: [number, number][];
}

export function createMesh(vertices: Vec3[], indices: number[], looseEdges: [number, number][] = []): TriangleMesh {
  if (indices.length % 3 !== 0) {
    throw new Error(`Mesh indices length ${indices.length} is not a multiple of 3`);
  }
  for (const i of [...indices, ...looseEdges.flat()]) {
    if (!Number.isInteger(i) || i < 0 || i >= vertices.length) {
      throw new Error(`Mesh index ${i} out of range (vertex count ${vertices.length})`);
    }
  }
  return { vertices, indices, looseEdges };
}

export function triangleCount(mesh: TriangleMesh): number {
  return mesh.indices.length / 3;
}

export function triangle(mesh: TriangleMesh, t: number): [Vec3, Vec3, Vec3] {
  return [
    mesh.vertices[mesh.indices[t * 3]],
    mesh.vertices[mesh.indices[t * 3 + 1]],
    mesh.vertices[mesh.indices[t * 3 + 2]],
  ];
}

export function triangleArea(a: Vec3, b: Vec3, c: Vec3): number {
  return length(cross(sub(b, a), sub(c, a))) / 2;
}

/** Bounds of all vertices; a zero box at the origin for an empty mesh. */
export function computeBounds(mesh: TriangleMesh): BoundingBox {
  if (mesh.vertices.length === 0) {
    return { min: [0, 0, 0], max: [0, 0, 0] };
  }
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const v of mesh.vertices) {
    for (let i = 0; i < 3; i++) {
      if (v[i] < min[i]) min[i] = v[i];
      if (v[i] > max[i]) max[i] = v[i];
    }
  }
  return { min, max };
}

export function mapVertices(mesh: TriangleMesh, fn: (v: Vec3) => Vec3): TriangleMesh {
  return {
    vertices: mesh.vertices.map(fn),
    indices: [...mesh.indices],
    looseEdges: mesh.looseEdges.map(([a, b]) => [a, b]),
  };
}

export function translateMesh(mesh: TriangleMesh, offset: Vec3): TriangleMesh {
  return mapVertices(mesh, (v) => add(v, offset));
}

export function scaleMesh(mesh: TriangleMesh, factor: number): TriangleMesh {
  return mapVertices(mesh, (v) => scaleVec(v, factor));
}

/**
 * Merge vertices with identical coordinates (after rounding to `precision`
 * decimals). STL stores three private vertices per facet; welding restores
 * the shared topology the analysis needs.
 */
export function weldVertices(positions: Vec3[], indices: number[], precision = 6): TriangleMesh {
  const lookup = new Map<string, number>();
  const vertices: Vec3[] = [];
  const remap: number[] = [];
  for (const p of positions) {
    const key = p.map((c) => c.toFixed(precision)).join(',');
    let idx = lookup.get(key);
    if (idx === undefined) {
      idx = vertices.length;
      lookup.set(key, idx);
      vertices.push(p);
    }
    remap.push(idx);
  }
  return createMesh(vertices, indices.map((i) => remap[i]));
}

// ─── Collections ─────────────────────────────────────────────

export interface NamedMesh {
  name: string;
  mesh: TriangleMesh;
}

/** Concatenate meshes into one, offsetting indices. */
export function mergeMeshes(meshes: TriangleMesh[]): TriangleMesh {
  const vertices: Vec3[] = [];
  const indices: number[] = [];
  const looseEdges: [number, number][] = [];
  for (const m of meshes) {
    const base = vertices.length;
    vertices.push(...m.vertices);
    for (const i of m.indices) indices.push(base + i);
    for (const [a, b] of m.looseEdges) looseEdges.push([base + a, base + b]);
  }
  return { vertices, indices, looseEdges };
}
