import { describe, it, expect } from 'vitest';
import {
  checkManifold,
  countSelfIntersections,
  degenerateFaces,
  looseGeometry,
  meshVolume,
  thinFeatures,
} from '../src/analysis.js';
import { boxMesh, sphereMesh, cylinderMesh } from '../src/primitives.js';
import { createMesh, mergeMeshes, translateMesh } from '../src/mesh.js';

describe('checkManifold', () => {
  it('accepts closed primitives', () => {
    for (const mesh of [boxMesh(2, 3, 4), sphereMesh(1), cylinderMesh(1, 2)]) {
      expect(checkManifold(mesh)).toEqual({ isManifold: true, nonManifoldEdges: 0, nonManifoldVerts: 0 });
    }
  });

  it('flags the rim of an open box', () => {
    const box = boxMesh(2, 2, 2);
    const open = createMesh(box.vertices, box.indices.slice(0, 30)); // drop the left face
    expect(checkManifold(open)).toEqual({ isManifold: false, nonManifoldEdges: 4, nonManifoldVerts: 4 });
  });

  it('flags a vertex shared by two separate fans', () => {
    // two triangles touching only at vertex 0
    const bowtie = createMesh(
      [[0, 0, 0], [1, 0, 0], [1, 1, 0], [-1, 0, 0], [-1, -1, 0]],
      [0, 1, 2, 0, 3, 4],
    );
    const report = checkManifold(bowtie);
    expect(report.isManifold).toBe(false);
    expect(report.nonManifoldEdges).toBe(6);
    expect(report.nonManifoldVerts).toBe(5);
  });
});

describe('looseGeometry', () => {
  it('counts vertices and edges outside any face', () => {
    const box = boxMesh(2, 2, 2);
    const mesh = createMesh([...box.vertices, [5, 5, 5], [6, 6, 6], [7, 7, 7]], box.indices, [[9, 10]]);
    expect(looseGeometry(mesh)).toEqual({ vertices: 1, edges: 1 });
  });

  it('reports nothing for a closed box', () => {
    expect(looseGeometry(boxMesh(1, 1, 1))).toEqual({ vertices: 0, edges: 0 });
  });
});

describe('degenerateFaces', () => {
  it('counts zero-area triangles', () => {
    const mesh = createMesh([[0, 0, 0], [1, 0, 0], [2, 0, 0], [0, 1, 0]], [0, 1, 2, 0, 1, 3]);
    expect(degenerateFaces(mesh)).toBe(1);
  });
});

describe('meshVolume', () => {
  it('is exact for a box', () => {
    expect(meshVolume(boxMesh(2, 3, 4))).toBeCloseTo(24, 10);
  });

  it('does not depend on position', () => {
    expect(meshVolume(translateMesh(boxMesh(1, 1, 1), [10, -4, 3]))).toBeCloseTo(1, 10);
  });

  it('approaches the analytic sphere volume from below', () => {
    const v = meshVolume(sphereMesh(1, 32, 16));
    expect(v).toBeLessThan((4 / 3) * Math.PI);
    expect(v).toBeGreaterThan(0.95 * (4 / 3) * Math.PI);
  });
});

describe('countSelfIntersections', () => {
  it('finds none in a single closed box', () => {
    expect(countSelfIntersections(boxMesh(2, 2, 2))).toBe(0);
  });

  it('finds none in separated boxes', () => {
    const mesh = mergeMeshes([boxMesh(1, 1, 1), translateMesh(boxMesh(1, 1, 1), [3, 0, 0])]);
    expect(countSelfIntersections(mesh)).toBe(0);
  });

  it('finds piercing faces in overlapping boxes', () => {
    const mesh = mergeMeshes([boxMesh(2, 2, 2), translateMesh(boxMesh(2, 2, 2), [1, 0.5, 0.25])]);
    const count = countSelfIntersections(mesh);
    expect(count).not.toBeNull();
    expect(count).toBeGreaterThan(0);
  });

  it('skips meshes above the triangle limit', () => {
    expect(countSelfIntersections(boxMesh(1, 1, 1), 11)).toBeNull();
    expect(countSelfIntersections(boxMesh(1, 1, 1), 12)).toBe(0);
  });
});

describe('thinFeatures', () => {
  it('reports edges shorter than the minimum at both scales', () => {
    const found = thinFeatures(boxMesh(2, 2, 2), 2.5, 0.01148);
    expect(found).toHaveLength(12);
    expect(found[0]).toEqual({
      min_dimension_prototype_m: 2,
      min_dimension_scaled_mm: 22.96,
      location: expect.any(Array),
    });
  });

  it('reports nothing when every edge is long enough', () => {
    expect(thinFeatures(boxMesh(2, 2, 2), 1, 0.01148)).toEqual([]);
  });

  it('caps the list and appends a note', () => {
    const found = thinFeatures(sphereMesh(1), 100, 0.01148);
    expect(found).toHaveLength(21);
    expect(found[20]).toEqual({ note: 'Additional thin features not shown (capped at 20)' });
  });
});
