/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Normal reconstruction from triangle geometry
 *
 * Face normals are accumulated unnormalized (so larger faces weigh more)
 * into every vertex of the face, then normalized. Indexed meshes get smooth
 * normals; unindexed meshes share no vertices and get flat normals.
 */

import { NORMAL_OFFSET, PrimitiveMode, VERTEX_STRIDE, type Mesh } from '@meshport/data';

/** Below this length the first normal counts as never supplied */
const MISSING_NORMAL_THRESHOLD = 0.5;

export function needsNormals(mesh: Mesh): boolean {
  if (mesh.vertexCount === 0) return false;
  const n = NORMAL_OFFSET;
  const length = Math.hypot(mesh.vertices[n], mesh.vertices[n + 1], mesh.vertices[n + 2]);
  // NaN compares false, so it counts as missing
  return !(length >= MISSING_NORMAL_THRESHOLD);
}

/**
 * Add -((p1 - p2) × (p3 - p2)) to the normals of all three vertices
 */
function accumulateFace(vertices: Float32Array, a: number, b: number, c: number): void {
  const pa = a * VERTEX_STRIDE;
  const pb = b * VERTEX_STRIDE;
  const pc = c * VERTEX_STRIDE;

  const e1x = vertices[pa] - vertices[pb];
  const e1y = vertices[pa + 1] - vertices[pb + 1];
  const e1z = vertices[pa + 2] - vertices[pb + 2];

  const e2x = vertices[pc] - vertices[pb];
  const e2y = vertices[pc + 1] - vertices[pb + 1];
  const e2z = vertices[pc + 2] - vertices[pb + 2];

  const nx = -(e1y * e2z - e1z * e2y);
  const ny = -(e1z * e2x - e1x * e2z);
  const nz = -(e1x * e2y - e1y * e2x);

  for (const base of [pa, pb, pc]) {
    vertices[base + NORMAL_OFFSET] += nx;
    vertices[base + NORMAL_OFFSET + 1] += ny;
    vertices[base + NORMAL_OFFSET + 2] += nz;
  }
}

function normalizeAll(vertices: Float32Array, vertexCount: number): void {
  for (let v = 0; v < vertexCount; v++) {
    const n = v * VERTEX_STRIDE + NORMAL_OFFSET;
    const length = Math.hypot(vertices[n], vertices[n + 1], vertices[n + 2]);
    // Degenerate faces leave a zero normal; keep it zero instead of NaN
    if (length > 0) {
      vertices[n] /= length;
      vertices[n + 1] /= length;
      vertices[n + 2] /= length;
    }
  }
}

/**
 * Rebuild normals of a triangle-list mesh in place when they are missing
 *
 * Accumulation starts from the existing (near-zero) normals.
 *
 * @returns true if normals were generated
 */
export function generateNormals(mesh: Mesh): boolean {
  if (mesh.mode !== PrimitiveMode.Triangles || !needsNormals(mesh)) {
    return false;
  }

  const { vertices, indices } = mesh;
  if (indices) {
    const end = indices.length - (indices.length % 3);
    for (let i = 0; i < end; i += 3) {
      accumulateFace(vertices, indices[i], indices[i + 1], indices[i + 2]);
    }
  } else {
    const end = mesh.vertexCount - (mesh.vertexCount % 3);
    for (let v = 0; v < end; v += 3) {
      accumulateFace(vertices, v, v + 1, v + 2);
    }
  }

  normalizeAll(vertices, mesh.vertexCount);
  return true;
}
