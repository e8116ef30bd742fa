/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geometry Package Unit Tests
 *
 * Post-processing passes over hand-built meshes.
 */

import { describe, it, expect } from 'vitest';
import {
  LoadOptions,
  NORMAL_OFFSET,
  PrimitiveMode,
  VERTEX_STRIDE,
  packVertices,
  readVertex,
  type Mesh,
  type Scene,
  type Vec3,
  type Vertex,
} from '@meshport/data';

import { weldVertices, weldMeshes } from './vertex-welder.js';
import { generateNormals, needsNormals } from './normal-generator.js';
import { postProcess } from './post-process.js';
import { getSceneStats, calculateBounds, triangleCount } from './scene-stats.js';

// Helper to create a vertex with zero normal
function vertex(position: Vec3, normal: Vec3 = [0, 0, 0]): Vertex {
  return {
    position,
    texCoord: [0, 0],
    color: [1, 1, 1, 1],
    normal,
    tangent: [0, 0, 0],
  };
}

// Helper to create test mesh data
function createTestMesh(vertices: Vertex[], indices?: number[], mode = PrimitiveMode.Triangles): Mesh {
  return {
    vertices: packVertices(vertices),
    vertexCount: vertices.length,
    indices: indices ? new Uint32Array(indices) : undefined,
    mode,
  };
}

function normalOf(mesh: Mesh, index: number): Vec3 {
  return readVertex(mesh.vertices, index).normal;
}

function expectVec3Close(actual: Vec3, expected: Vec3): void {
  expect(actual[0]).toBeCloseTo(expected[0], 5);
  expect(actual[1]).toBeCloseTo(expected[1], 5);
  expect(actual[2]).toBeCloseTo(expected[2], 5);
}

// Non-planar quad: face A = (0,1,2) has normal +Z, face B = (0,2,3) has normal (1,-1,1)
const Q0 = vertex([0, 0, 0]);
const Q1 = vertex([1, 0, 0]);
const Q2 = vertex([1, 1, 0]);
const Q3 = vertex([0, 1, 1]);

describe('weldVertices', () => {
  it('should collapse bit-identical vertices in first-seen order', () => {
    const a = vertex([1, 2, 3]);
    const b = vertex([4, 5, 6]);
    const mesh = createTestMesh([a, b, a, b, a]);

    expect(weldVertices(mesh)).toBe(true);

    expect(mesh.vertexCount).toBe(2);
    expect(mesh.vertices.length).toBe(2 * VERTEX_STRIDE);
    expect(Array.from(mesh.indices ?? [])).toEqual([0, 1, 0, 1, 0]);
    expect(readVertex(mesh.vertices, 0)).toEqual(a);
    expect(readVertex(mesh.vertices, 1)).toEqual(b);
  });

  it('should keep a vertex differing in one least significant bit', () => {
    const a = vertex([1, 2, 3]);
    const b = vertex([4, 5, 6]);
    const mesh = createTestMesh([a, b, a, a]);
    // Flip the lowest mantissa bit of vertex 3's position.x
    const bits = new Uint32Array(mesh.vertices.buffer);
    bits[3 * VERTEX_STRIDE] ^= 1;

    weldVertices(mesh);

    expect(mesh.vertexCount).toBe(3);
    expect(Array.from(mesh.indices ?? [])).toEqual([0, 1, 0, 2]);
    expect(mesh.vertices[2 * VERTEX_STRIDE]).not.toBe(1);
    expect(mesh.vertices[2 * VERTEX_STRIDE]).toBeCloseTo(1, 6);
  });

  it('should treat distinct NaN encodings as distinct vertices', () => {
    const mesh = createTestMesh([vertex([0, 0, 0]), vertex([0, 0, 0]), vertex([0, 0, 0])]);
    const bits = new Uint32Array(mesh.vertices.buffer);
    bits[0] = 0x7fc00000;
    bits[VERTEX_STRIDE] = 0x7fc00001;
    bits[2 * VERTEX_STRIDE] = 0x7fc00000;

    weldVertices(mesh);

    expect(mesh.vertexCount).toBe(2);
    expect(Array.from(mesh.indices ?? [])).toEqual([0, 1, 0]);
    const out = new Uint32Array(mesh.vertices.buffer, mesh.vertices.byteOffset, mesh.vertices.length);
    expect(out[0]).toBe(0x7fc00000);
    expect(out[VERTEX_STRIDE]).toBe(0x7fc00001);
  });

  it('should keep 0 and -0 apart', () => {
    const mesh = createTestMesh([vertex([0, 0, 0]), vertex([-0, 0, 0])]);

    weldVertices(mesh);

    expect(mesh.vertexCount).toBe(2);
  });

  it('should leave indexed meshes unchanged', () => {
    const mesh = createTestMesh([Q0, Q0, Q1], [0, 1, 2]);
    const vertices = mesh.vertices;
    const indices = mesh.indices;

    expect(weldVertices(mesh)).toBe(false);

    expect(mesh.vertices).toBe(vertices);
    expect(mesh.indices).toBe(indices);
    expect(mesh.vertexCount).toBe(3);
  });

  it('should be idempotent', () => {
    const mesh = createTestMesh([Q0, Q1, Q0]);
    weldVertices(mesh);
    const after = { vertices: mesh.vertices, indices: mesh.indices };

    expect(weldVertices(mesh)).toBe(false);
    expect(mesh.vertices).toBe(after.vertices);
    expect(mesh.indices).toBe(after.indices);
  });

  it('should handle empty meshes', () => {
    const mesh = createTestMesh([]);
    weldVertices(mesh);
    expect(mesh.vertexCount).toBe(0);
    expect(mesh.indices?.length).toBe(0);
  });
});

describe('weldMeshes', () => {
  it('should report merged vertex totals', () => {
    const stats = weldMeshes([
      createTestMesh([Q0, Q1, Q0, Q1]),
      createTestMesh([Q0, Q1, Q2], [0, 1, 2]),
    ]);

    expect(stats).toEqual({ inputVertices: 4, outputVertices: 2, weldedMeshes: 1 });
  });
});

describe('generateNormals', () => {
  it('should give an isolated triangle identical unit normals', () => {
    const mesh = createTestMesh([vertex([0, 0, 0]), vertex([1, 0, 0]), vertex([0, 1, 0])]);

    expect(generateNormals(mesh)).toBe(true);

    const first = normalOf(mesh, 0);
    expectVec3Close(first, [0, 0, 1]);
    for (let i = 0; i < 3; i++) {
      const n = normalOf(mesh, i);
      expect(Math.abs(Math.hypot(...n) - 1)).toBeLessThan(1e-5);
      expect(n).toEqual(first);
    }
  });

  it('should average shared vertices of an indexed mesh', () => {
    const mesh = createTestMesh([Q0, Q1, Q2, Q3], [0, 1, 2, 0, 2, 3]);

    generateNormals(mesh);

    const s6 = Math.sqrt(6);
    const s3 = Math.sqrt(3);
    expectVec3Close(normalOf(mesh, 0), [1 / s6, -1 / s6, 2 / s6]);
    expectVec3Close(normalOf(mesh, 2), [1 / s6, -1 / s6, 2 / s6]);
    expectVec3Close(normalOf(mesh, 1), [0, 0, 1]);
    expectVec3Close(normalOf(mesh, 3), [1 / s3, -1 / s3, 1 / s3]);
  });

  it('should produce flat normals for unindexed meshes', () => {
    const mesh = createTestMesh([Q0, Q1, Q2, Q0, Q2, Q3]);

    generateNormals(mesh);

    const s3 = Math.sqrt(3);
    for (const i of [0, 1, 2]) expectVec3Close(normalOf(mesh, i), [0, 0, 1]);
    for (const i of [3, 4, 5]) expectVec3Close(normalOf(mesh, i), [1 / s3, -1 / s3, 1 / s3]);
  });

  it('should keep supplied normals', () => {
    const mesh = createTestMesh([vertex([0, 0, 0], [1, 0, 0]), vertex([1, 0, 0]), vertex([0, 1, 0])]);

    expect(needsNormals(mesh)).toBe(false);
    expect(generateNormals(mesh)).toBe(false);
    expect(normalOf(mesh, 0)).toEqual([1, 0, 0]);
    expect(normalOf(mesh, 1)).toEqual([0, 0, 0]);
  });

  it('should treat short or NaN first normals as missing', () => {
    expect(needsNormals(createTestMesh([vertex([0, 0, 0], [0.3, 0, 0])]))).toBe(true);
    expect(needsNormals(createTestMesh([vertex([0, 0, 0], [NaN, 0, 0])]))).toBe(true);
    expect(needsNormals(createTestMesh([vertex([0, 0, 0], [0.5, 0, 0])]))).toBe(false);
    expect(needsNormals(createTestMesh([]))).toBe(false);
  });

  it('should start accumulation from the existing near-zero values', () => {
    const mesh = createTestMesh([vertex([0, 0, 0], [0.25, 0, 0]), vertex([2, 0, 0]), vertex([0, 2, 0])]);

    generateNormals(mesh);

    // Face normal is (0,0,4); vertex 0 starts at (0.25,0,0)
    const n = normalOf(mesh, 0);
    const length = Math.hypot(0.25, 0, 4);
    expectVec3Close(n, [0.25 / length, 0, 4 / length]);
    expectVec3Close(normalOf(mesh, 1), [0, 0, 1]);
  });

  it('should leave degenerate triangles with zero normals', () => {
    const p = vertex([1, 1, 1]);
    const mesh = createTestMesh([p, p, p]);

    generateNormals(mesh);

    expect(normalOf(mesh, 0)).toEqual([0, 0, 0]);
  });

  it('should skip non-triangle topologies', () => {
    const mesh = createTestMesh([Q0, Q1, Q2], undefined, PrimitiveMode.Lines);

    expect(generateNormals(mesh)).toBe(false);
    expect(mesh.vertices[NORMAL_OFFSET + 2]).toBe(0);
  });
});

describe('postProcess', () => {
  it('should leave the scene untouched without options', () => {
    const mesh = createTestMesh([Q0, Q1, Q2, Q0, Q2, Q3]);
    const vertices = mesh.vertices;
    const snapshot = Array.from(vertices);
    const scene: Scene = { meshes: [mesh] };

    const result = postProcess(scene, LoadOptions.None);

    expect(result).toBe(scene);
    expect(mesh.vertices).toBe(vertices);
    expect(Array.from(mesh.vertices)).toEqual(snapshot);
    expect(mesh.indices).toBeUndefined();
  });

  it('should weld before generating normals', () => {
    const mesh = createTestMesh([Q0, Q1, Q2, Q0, Q2, Q3]);
    const scene: Scene = { meshes: [mesh] };

    postProcess(scene, LoadOptions.GenerateIndices | LoadOptions.GenerateNormals);

    expect(mesh.vertexCount).toBe(4);
    expect(Array.from(mesh.indices ?? [])).toEqual([0, 1, 2, 0, 2, 3]);
    const s6 = Math.sqrt(6);
    expectVec3Close(normalOf(mesh, 0), [1 / s6, -1 / s6, 2 / s6]);
  });

  it('should generate normals without welding when only normals are requested', () => {
    const mesh = createTestMesh([Q0, Q1, Q2, Q0, Q2, Q3]);

    postProcess({ meshes: [mesh] }, LoadOptions.GenerateNormals);

    expect(mesh.indices).toBeUndefined();
    expect(mesh.vertexCount).toBe(6);
    expectVec3Close(normalOf(mesh, 0), [0, 0, 1]);
  });
});

describe('getSceneStats', () => {
  it('should calculate correct totals', () => {
    const scene: Scene = {
      meshes: [
        createTestMesh([Q0, Q1, Q2]), // 3 vertices, 1 triangle
        createTestMesh([Q0, Q1, Q2, Q3], [0, 1, 2, 0, 2, 3]), // 4 vertices, 2 triangles
        createTestMesh([Q0, Q1], undefined, PrimitiveMode.Lines),
      ],
      images: [{ path: 'a.png' }],
    };

    const stats = getSceneStats(scene);

    expect(stats.meshCount).toBe(3);
    expect(stats.totalVertices).toBe(9);
    expect(stats.totalIndices).toBe(6);
    expect(stats.totalTriangles).toBe(3);
    expect(stats.indexedMeshes).toBe(1);
    expect(stats.materialCount).toBe(0);
    expect(stats.imageCount).toBe(1);
    expect(stats.bounds).toEqual({ min: [0, 0, 0], max: [1, 1, 1] });
  });

  it('should handle empty scenes', () => {
    const stats = getSceneStats({ meshes: [] });

    expect(stats.totalVertices).toBe(0);
    expect(stats.totalTriangles).toBe(0);
    expect(stats.bounds).toBeNull();
  });

  it('should ignore non-finite positions in bounds', () => {
    const mesh = createTestMesh([vertex([NaN, 0, 0]), vertex([2, 3, 4])]);
    expect(calculateBounds([mesh])).toEqual({ min: [2, 3, 4], max: [2, 3, 4] });
  });

  it('should count triangles per topology', () => {
    expect(triangleCount(createTestMesh([Q0, Q1, Q2, Q3]))).toBe(1);
    expect(triangleCount(createTestMesh([Q0, Q1, Q2], undefined, PrimitiveMode.Points))).toBe(0);
  });
});
