/**
 * Mesh analysis for printability checks.
 *
 * Works on world-space meshes. Edges are undirected vertex pairs; an edge
 * is manifold when exactly two faces share it.
 */

import type { Vec3 } from './vec3.js';
import { sub, cross, dot, length, midpoint, round3 } from './vec3.js';
import { triangle, triangleArea, triangleCount, type TriangleMesh } from './mesh.js';

export const DEGENERATE_AREA = 1e-10;
export const SELF_INTERSECTION_LIMIT = 5000;
export const THIN_FEATURE_CAP = 20;

const edgeKey = (a: number, b: number) => (a < b ? `${a}_${b}` : `${b}_${a}`);

// ─── Topology ────────────────────────────────────────────────

export interface EdgeInfo {
  a: number;
  b: number;
  faces: number[];
}

/** All face edges plus loose edges, keyed by sorted vertex pair. */
export function buildEdges(mesh: TriangleMesh): Map<string, EdgeInfo> {
  const edges = new Map<string, EdgeInfo>();
  const touch = (a: number, b: number, face: number | null) => {
    const key = edgeKey(a, b);
    let info = edges.get(key);
    if (!info) {
      info = { a: Math.min(a, b), b: Math.max(a, b), faces: [] };
      edges.set(key, info);
    }
    if (face !== null) info.faces.push(face);
  };
  for (let t = 0; t < triangleCount(mesh); t++) {
    const [i, j, k] = mesh.indices.slice(t * 3, t * 3 + 3);
    touch(i, j, t);
    touch(j, k, t);
    touch(k, i, t);
  }
  for (const [a, b] of mesh.looseEdges) touch(a, b, null);
  return edges;
}

/** Number of edge-connected face fans around each vertex. */
function fanCounts(mesh: TriangleMesh): number[] {
  const facesOf: number[][] = mesh.vertices.map(() => []);
  for (let t = 0; t < triangleCount(mesh); t++) {
    for (const v of mesh.indices.slice(t * 3, t * 3 + 3)) facesOf[v].push(t);
  }
  return facesOf.map((faces, v) => {
    if (faces.length === 0) return 0;
    // union-find over faces sharing an edge through v
    const parent = new Map<number, number>(faces.map((f) => [f, f]));
    const find = (f: number): number => {
      let root = f;
      while (parent.get(root) !== root) root = parent.get(root) ?? root;
      return root;
    };
    const byEdge = new Map<number, number>();
    for (const f of faces) {
      for (const other of mesh.indices.slice(f * 3, f * 3 + 3)) {
        if (other === v) continue;
        const seen = byEdge.get(other);
        if (seen === undefined) byEdge.set(other, f);
        else parent.set(find(f), find(seen));
      }
    }
    return new Set(faces.map(find)).size;
  });
}

export interface ManifoldReport {
  isManifold: boolean;
  nonManifoldEdges: number;
  nonManifoldVerts: number;
}

export function checkManifold(mesh: TriangleMesh, edges = buildEdges(mesh)): ManifoldReport {
  const badVerts = new Set<number>();
  let nonManifoldEdges = 0;
  for (const e of edges.values()) {
    if (e.faces.length !== 2) {
      nonManifoldEdges++;
      badVerts.add(e.a);
      badVerts.add(e.b);
    }
  }
  fanCounts(mesh).forEach((fans, v) => {
    if (fans > 1) badVerts.add(v);
  });
  return {
    isManifold: nonManifoldEdges === 0 && badVerts.size === 0,
    nonManifoldEdges,
    nonManifoldVerts: badVerts.size,
  };
}

export function looseGeometry(mesh: TriangleMesh, edges = buildEdges(mesh)): { vertices: number; edges: number } {
  const used = new Set<number>();
  let looseEdges = 0;
  for (const e of edges.values()) {
    used.add(e.a);
    used.add(e.b);
    if (e.faces.length === 0) looseEdges++;
  }
  return { vertices: mesh.vertices.length - used.size, edges: looseEdges };
}

export function degenerateFaces(mesh: TriangleMesh): number {
  let count = 0;
  for (let t = 0; t < triangleCount(mesh); t++) {
    if (triangleArea(...triangle(mesh, t)) < DEGENERATE_AREA) count++;
  }
  return count;
}

/** Unsigned enclosed volume from the divergence theorem. */
export function meshVolume(mesh: TriangleMesh): number {
  let sum = 0;
  for (let t = 0; t < triangleCount(mesh); t++) {
    const [a, b, c] = triangle(mesh, t);
    sum += dot(a, cross(b, c));
  }
  return Math.abs(sum / 6);
}

// ─── Self intersection ───────────────────────────────────────

const EPS = 1e-9;

/** Segment p→q crosses the interior of triangle abc (Möller–Trumbore). */
function segmentHitsTriangle(p: Vec3, q: Vec3, a: Vec3, b: Vec3, c: Vec3): boolean {
  const dir = sub(q, p);
  const e1 = sub(b, a);
  const e2 = sub(c, a);
  const h = cross(dir, e2);
  const det = dot(e1, h);
  if (Math.abs(det) < EPS) return false;
  const s = sub(p, a);
  const u = dot(s, h) / det;
  if (u < EPS || u > 1 - EPS) return false;
  const qv = cross(s, e1);
  const v = dot(dir, qv) / det;
  if (v < EPS || u + v > 1 - EPS) return false;
  const t = dot(e2, qv) / det;
  return t > EPS && t < 1 - EPS;
}

function boxesOverlap(a: [Vec3, Vec3, Vec3], b: [Vec3, Vec3, Vec3]): boolean {
  for (let i = 0; i < 3; i++) {
    const aMin = Math.min(a[0][i], a[1][i], a[2][i]);
    const aMax = Math.max(a[0][i], a[1][i], a[2][i]);
    const bMin = Math.min(b[0][i], b[1][i], b[2][i]);
    const bMax = Math.max(b[0][i], b[1][i], b[2][i]);
    if (aMax < bMin || bMax < aMin) return false;
  }
  return true;
}

/**
 * Count pairs of triangles that pierce each other. Triangles sharing a
 * vertex are skipped. Returns null above SELF_INTERSECTION_LIMIT triangles.
 */
export function countSelfIntersections(mesh: TriangleMesh, limit = SELF_INTERSECTION_LIMIT): number | null {
  const n = triangleCount(mesh);
  if (n > limit) return null;
  const tris = Array.from({ length: n }, (_, t) => triangle(mesh, t));
  let pairs = 0;
  for (let i = 0; i < n; i++) {
    const vi = mesh.indices.slice(i * 3, i * 3 + 3);
    for (let j = i + 1; j < n; j++) {
      if (mesh.indices.slice(j * 3, j * 3 + 3).some((v) => vi.includes(v))) continue;
      const A = tris[i], B = tris[j];
      if (!boxesOverlap(A, B)) continue;
      const hit =
        [[0, 1], [1, 2], [2, 0]].some(([x, y]) => segmentHitsTriangle(A[x], A[y], ...B)) ||
        [[0, 1], [1, 2], [2, 0]].some(([x, y]) => segmentHitsTriangle(B[x], B[y], ...A));
      if (hit) pairs++;
    }
  }
  return pairs;
}

// ─── Thin features ───────────────────────────────────────────

export interface ThinFeature {
  min_dimension_prototype_m: number;
  min_dimension_scaled_mm: number;
  location: Vec3;
}

export type ThinFeatureEntry = ThinFeature | { note: string };

/** Edges shorter than minThickness, reported at prototype and target scale. */
export function thinFeatures(mesh: TriangleMesh, minThickness: number, targetScale: number): ThinFeatureEntry[] {
  const found: ThinFeatureEntry[] = [];
  for (const e of buildEdges(mesh).values()) {
    const a = mesh.vertices[e.a];
    const b = mesh.vertices[e.b];
    const len = length(sub(b, a));
    if (len >= minThickness) continue;
    found.push({
      min_dimension_prototype_m: Number(len.toFixed(6)),
      min_dimension_scaled_mm: Number((len * targetScale * 1000).toFixed(4)),
      location: round3(midpoint(a, b), 4),
    });
    if (found.length >= THIN_FEATURE_CAP) {
      found.push({ note: `Additional thin features not shown (capped at ${THIN_FEATURE_CAP})` });
      break;
    }
  }
  return found;
}
