/**
 * Closed primitive meshes, centered at the origin, Z up.
 * All triangles wind counter-clockwise seen from outside.
 */

import type { Vec3 } from './vec3.js';
import { createMesh, type TriangleMesh } from './mesh.js';

export function boxMesh(width: number, depth: number, height: number): TriangleMesh {
  const x = width / 2, y = depth / 2, z = height / 2;
  const vertices: Vec3[] = [
    [-x, -y, -z], [x, -y, -z], [x, y, -z], [-x, y, -z],
    [-x, -y, z], [x, -y, z], [x, y, z], [-x, y, z],
  ];
  const indices = [
    0, 2, 1, 0, 3, 2, // bottom
    4, 5, 6, 4, 6, 7, // top
    0, 1, 5, 0, 5, 4, // front
    2, 3, 7, 2, 7, 6, // back
    1, 2, 6, 1, 6, 5, // right
    3, 0, 4, 3, 4, 7, // left
  ];
  return createMesh(vertices, indices);
}

/** UV sphere: two pole vertices plus (rings - 1) rows of `segments`. */
export function sphereMesh(radius: number, segments = 16, rings = 8): TriangleMesh {
  if (segments < 3 || rings < 2) {
    throw new Error(`Sphere needs segments >= 3 and rings >= 2 (got ${segments}, ${rings})`);
  }
  const vertices: Vec3[] = [[0, 0, radius]];
  for (let r = 1; r < rings; r++) {
    const phi = (Math.PI * r) / rings;
    for (let s = 0; s < segments; s++) {
      const theta = (2 * Math.PI * s) / segments;
      vertices.push([
        radius * Math.sin(phi) * Math.cos(theta),
        radius * Math.sin(phi) * Math.sin(theta),
        radius * Math.cos(phi),
      ]);
    }
  }
  const south = vertices.length;
  vertices.push([0, 0, -radius]);

  const row = (r: number, s: number) => 1 + (r - 1) * segments + (s % segments);
  const indices: number[] = [];
  for (let s = 0; s < segments; s++) {
    indices.push(0, row(1, s), row(1, s + 1));
  }
  for (let r = 1; r < rings - 1; r++) {
    for (let s = 0; s < segments; s++) {
      const a = row(r, s), b = row(r, s + 1), c = row(r + 1, s), d = row(r + 1, s + 1);
      indices.push(a, c, d, a, d, b);
    }
  }
  for (let s = 0; s < segments; s++) {
    indices.push(south, row(rings - 1, s + 1), row(rings - 1, s));
  }
  return createMesh(vertices, indices);
}

/** Capped cylinder along Z. */
export function cylinderMesh(radius: number, height: number, segments = 16): TriangleMesh {
  if (segments < 3) throw new Error(`Cylinder needs segments >= 3 (got ${segments})`);
  const h = height / 2;
  const vertices: Vec3[] = [];
  for (let s = 0; s < segments; s++) {
    const theta = (2 * Math.PI * s) / segments;
    vertices.push([radius * Math.cos(theta), radius * Math.sin(theta), -h]);
  }
  for (let s = 0; s < segments; s++) {
    const theta = (2 * Math.PI * s) / segments;
    vertices.push([radius * Math.cos(theta), radius * Math.sin(theta), h]);
  }
  const bottom = vertices.length;
  vertices.push([0, 0, -h]);
  const top = vertices.length;
  vertices.push([0, 0, h]);

  const indices: number[] = [];
  for (let s = 0; s < segments; s++) {
    const n = (s + 1) % segments;
    const b0 = s, b1 = n, t0 = segments + s, t1 = segments + n;
    indices.push(b0, b1, t1, b0, t1, t0);
    indices.push(bottom, b1, b0);
    indices.push(top, t0, t1);
  }
  return createMesh(vertices, indices);
}
