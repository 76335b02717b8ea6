/**
 * PLY (ASCII) — export and import of vertex, face and edge elements.
 */

import type { Vec3 } from '../vec3.js';
import { createMesh, type TriangleMesh } from '../mesh.js';

export function exportPLY(mesh: TriangleMesh): string {
  const triangleCount = mesh.indices.length / 3;
  const header = [
    'ply',
    'format ascii 1.0',
    'comment meshbridge PLY export',
    `element vertex ${mesh.vertices.length}`,
    'property float x',
    'property float y',
    'property float z',
    `element face ${triangleCount}`,
    'property list uchar int vertex_indices',
  ];
  if (mesh.looseEdges.length > 0) {
    header.push(`element edge ${mesh.looseEdges.length}`, 'property int vertex1', 'property int vertex2');
  }
  header.push('end_header');

  const body: string[] = [];
  for (const v of mesh.vertices) body.push(`${v[0]} ${v[1]} ${v[2]}`);
  for (let t = 0; t < mesh.indices.length; t += 3) {
    body.push(`3 ${mesh.indices[t]} ${mesh.indices[t + 1]} ${mesh.indices[t + 2]}`);
  }
  for (const [a, b] of mesh.looseEdges) body.push(`${a} ${b}`);
  return [...header, ...body].join('\n') + '\n';
}

interface PlyElement {
  name: string;
  count: number;
  properties: string[];
}

export function importPLY(text: string): TriangleMesh {
  const lines = text.split(/\r?\n/);
  if (lines[0]?.trim() !== 'ply') throw new Error('Not a PLY file: missing "ply" magic line');

  const elements: PlyElement[] = [];
  let cursor = 1;
  for (; cursor < lines.length; cursor++) {
    const parts = lines[cursor].trim().split(/\s+/);
    if (parts[0] === 'end_header') {
      cursor++;
      break;
    }
    if (parts[0] === 'format' && parts[1] !== 'ascii') {
      throw new Error(`PLY format "${parts[1]}" not supported; only ascii`);
    }
    if (parts[0] === 'element') {
      elements.push({ name: parts[1], count: Number.parseInt(parts[2], 10), properties: [] });
    } else if (parts[0] === 'property') {
      const el = elements[elements.length - 1];
      if (!el) throw new Error(`PLY property before any element on line ${cursor + 1}`);
      el.properties.push(parts[parts.length - 1]);
    }
  }

  const vertices: Vec3[] = [];
  const indices: number[] = [];
  const looseEdges: [number, number][] = [];

  for (const el of elements) {
    for (let n = 0; n < el.count; n++, cursor++) {
      const row = (lines[cursor] ?? '').trim();
      if (row === '') throw new Error(`PLY data ended early in element "${el.name}"`);
      const values = row.split(/\s+/).map(Number);
      if (el.name === 'vertex') {
        const x = values[el.properties.indexOf('x')];
        const y = values[el.properties.indexOf('y')];
        const z = values[el.properties.indexOf('z')];
        if (![x, y, z].every(Number.isFinite)) throw new Error(`Malformed PLY vertex: "${row}"`);
        vertices.push([x, y, z]);
      } else if (el.name === 'face') {
        const [k, ...ids] = values;
        for (let j = 1; j < k - 1; j++) indices.push(ids[0], ids[j], ids[j + 1]);
      } else if (el.name === 'edge') {
        looseEdges.push([values[el.properties.indexOf('vertex1')], values[el.properties.indexOf('vertex2')]]);
      }
    }
  }
  return createMesh(vertices, indices, looseEdges);
}
