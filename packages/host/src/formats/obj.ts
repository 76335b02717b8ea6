/**
 * Wavefront OBJ — text export and import.
 *
 * Each named mesh becomes an `o` group. Indices are 1-based and global
 * across the file; `l` records carry loose edges.
 */

import type { Vec3 } from '../vec3.js';
import { createMesh, type NamedMesh } from '../mesh.js';

const fmt = (n: number) => Number(n.toFixed(6)).toString();

export function exportOBJ(meshes: NamedMesh[]): string {
  const lines: string[] = ['# meshbridge OBJ export'];
  let base = 1;
  for (const { name, mesh } of meshes) {
    lines.push(`o ${name}`);
    for (const v of mesh.vertices) lines.push(`v ${fmt(v[0])} ${fmt(v[1])} ${fmt(v[2])}`);
    for (let t = 0; t < mesh.indices.length; t += 3) {
      lines.push(`f ${mesh.indices[t] + base} ${mesh.indices[t + 1] + base} ${mesh.indices[t + 2] + base}`);
    }
    for (const [a, b] of mesh.looseEdges) lines.push(`l ${a + base} ${b + base}`);
    base += mesh.vertices.length;
  }
  return lines.join('\n') + '\n';
}

interface ObjGroup {
  name: string;
  faces: number[][];
  lines: number[][];
}

/** Resolve a face/line token ("7", "7/1/3", "-1") to a 0-based global index. */
function resolveIndex(token: string, vertexCount: number, lineNo: number): number {
  const raw = Number.parseInt(token.split('/')[0], 10);
  if (!Number.isInteger(raw) || raw === 0) {
    throw new Error(`Line ${lineNo}: invalid vertex reference "${token}"`);
  }
  const idx = raw > 0 ? raw - 1 : vertexCount + raw;
  if (idx < 0 || idx >= vertexCount) {
    throw new Error(`Line ${lineNo}: vertex reference ${raw} out of range (${vertexCount} vertices)`);
  }
  return idx;
}

export function importOBJ(text: string, defaultName = 'Imported'): NamedMesh[] {
  const positions: Vec3[] = [];
  const groups: ObjGroup[] = [];
  let current: ObjGroup | null = null;

  const group = (): ObjGroup => {
    if (!current) {
      current = { name: defaultName, faces: [], lines: [] };
      groups.push(current);
    }
    return current;
  };

  text.split(/\r?\n/).forEach((rawLine, i) => {
    const lineNo = i + 1;
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) return;
    const [tag, ...rest] = line.split(/\s+/);
    switch (tag) {
      case 'v': {
        const c = rest.slice(0, 3).map(Number);
        if (c.length < 3 || c.some((n) => !Number.isFinite(n))) {
          throw new Error(`Line ${lineNo}: malformed vertex "${line}"`);
        }
        positions.push([c[0], c[1], c[2]]);
        break;
      }
      case 'o': {
        current = { name: rest.join(' ') || defaultName, faces: [], lines: [] };
        groups.push(current);
        break;
      }
      case 'f': {
        if (rest.length < 3) throw new Error(`Line ${lineNo}: face needs at least 3 vertices`);
        group().faces.push(rest.map((tok) => resolveIndex(tok, positions.length, lineNo)));
        break;
      }
      case 'l': {
        if (rest.length < 2) throw new Error(`Line ${lineNo}: line element needs at least 2 vertices`);
        group().lines.push(rest.map((tok) => resolveIndex(tok, positions.length, lineNo)));
        break;
      }
      default:
        // vt, vn, g, s, usemtl, mtllib carry nothing the scene keeps
        break;
    }
  });

  return groups
    .filter((g) => g.faces.length > 0 || g.lines.length > 0)
    .map((g) => {
      const remap = new Map<number, number>();
      const vertices: Vec3[] = [];
      const local = (globalIdx: number): number => {
        let idx = remap.get(globalIdx);
        if (idx === undefined) {
          idx = vertices.length;
          remap.set(globalIdx, idx);
          vertices.push(positions[globalIdx]);
        }
        return idx;
      };
      const indices: number[] = [];
      for (const face of g.faces) {
        // fan triangulation of convex polygons
        for (let k = 1; k < face.length - 1; k++) {
          indices.push(local(face[0]), local(face[k]), local(face[k + 1]));
        }
      }
      const looseEdges: [number, number][] = [];
      for (const polyline of g.lines) {
        for (let k = 0; k < polyline.length - 1; k++) {
          looseEdges.push([local(polyline[k]), local(polyline[k + 1])]);
        }
      }
      return { name: g.name, mesh: createMesh(vertices, indices, looseEdges) };
    });
}
