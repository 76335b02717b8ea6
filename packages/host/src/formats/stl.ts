/**
 * STL — binary export, binary and ASCII import.
 *
 * Binary layout: 80-byte header + uint32 count + 50 bytes per triangle
 * (normal, three vertices, uint16 attribute count).
 */

import type { Vec3 } from '../vec3.js';
import { sub, cross, normalize } from '../vec3.js';
import { weldVertices, type TriangleMesh } from '../mesh.js';

export function exportSTL(mesh: TriangleMesh, header = 'meshbridge'): Uint8Array {
  const headerBytes = new TextEncoder().encode(header);
  if (headerBytes.length > 80) {
    throw new Error(`STL header exceeds 80 bytes (got ${headerBytes.length}). Shorten the header string.`);
  }

  const { vertices, indices } = mesh;
  const triangleCount = indices.length / 3;
  const bytes = new Uint8Array(84 + triangleCount * 50);
  const view = new DataView(bytes.buffer);
  bytes.set(headerBytes, 0);
  view.setUint32(80, triangleCount, true);

  let offset = 84;
  const put = (v: Vec3) => {
    view.setFloat32(offset, v[0], true);
    view.setFloat32(offset + 4, v[1], true);
    view.setFloat32(offset + 8, v[2], true);
    offset += 12;
  };

  for (let t = 0; t < triangleCount; t++) {
    const v0 = vertices[indices[t * 3]];
    const v1 = vertices[indices[t * 3 + 1]];
    const v2 = vertices[indices[t * 3 + 2]];
    put(normalize(cross(sub(v1, v0), sub(v2, v0))));
    put(v0);
    put(v1);
    put(v2);
    view.setUint16(offset, 0, true);
    offset += 2;
  }
  return bytes;
}

function isBinarySTL(data: Uint8Array): boolean {
  if (data.length < 84) return false;
  const count = new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(80, true);
  return data.length === 84 + count * 50;
}

function importBinary(data: Uint8Array): TriangleMesh {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const count = view.getUint32(80, true);
  const positions: Vec3[] = [];
  let offset = 84;
  for (let t = 0; t < count; t++) {
    offset += 12; // normal, recomputed on export
    for (let k = 0; k < 3; k++) {
      positions.push([
        view.getFloat32(offset, true),
        view.getFloat32(offset + 4, true),
        view.getFloat32(offset + 8, true),
      ]);
      offset += 12;
    }
    offset += 2;
  }
  return weldVertices(positions, positions.map((_, i) => i));
}

function importAscii(text: string): TriangleMesh {
  const positions: Vec3[] = [];
  for (const line of text.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] !== 'vertex') continue;
    const coords = parts.slice(1, 4).map(Number);
    if (coords.length !== 3 || coords.some((c) => !Number.isFinite(c))) {
      throw new Error(`Malformed STL vertex line: "${line.trim()}"`);
    }
    positions.push([coords[0], coords[1], coords[2]]);
  }
  if (positions.length % 3 !== 0) {
    throw new Error(`STL facet has an incomplete vertex loop (${positions.length} vertices)`);
  }
  return weldVertices(positions, positions.map((_, i) => i));
}

export function importSTL(data: Uint8Array): TriangleMesh {
  if (isBinarySTL(data)) return importBinary(data);
  const text = new TextDecoder().decode(data);
  if (text.trimStart().startsWith('solid')) return importAscii(text);
  throw new Error('Unrecognized STL data: neither binary nor ASCII');
}
