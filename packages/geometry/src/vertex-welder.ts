/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Vertex welder - generates an index buffer for unindexed meshes
 *
 * Vertices are equal only when every float has the same bit pattern, so
 * -0 and 0 stay apart and distinct NaN encodings stay apart.
 */

import { VERTEX_STRIDE, createVertexBuffer, type Mesh } from '@meshport/data';

/**
 * Structural key of one vertex: its raw 32-bit words
 */
export function vertexKey(bits: Uint32Array, vertex: number): string {
  const base = vertex * VERTEX_STRIDE;
  let key = '';
  for (let i = 0; i < VERTEX_STRIDE; i++) {
    if (i > 0) key += ',';
    key += bits[base + i].toString(16);
  }
  return key;
}

function rawBits(vertices: Float32Array): Uint32Array {
  return new Uint32Array(vertices.buffer, vertices.byteOffset, vertices.length);
}

/**
 * Deduplicate the vertices of an unindexed mesh in place
 *
 * First-seen order decides output order. Meshes that already have
 * indices are left untouched.
 *
 * @returns true if the mesh was welded
 */
export function weldVertices(mesh: Mesh): boolean {
  if (mesh.indices) {
    return false;
  }

  const source = rawBits(mesh.vertices);
  const firstSeen = new Map<string, number>();
  const kept: number[] = [];
  const indices = new Uint32Array(mesh.vertexCount);

  for (let v = 0; v < mesh.vertexCount; v++) {
    const key = vertexKey(source, v);
    let index = firstSeen.get(key);
    if (index === undefined) {
      index = kept.length;
      firstSeen.set(key, index);
      kept.push(v);
    }
    indices[v] = index;
  }

  const vertices = createVertexBuffer(kept.length);
  const target = rawBits(vertices);
  kept.forEach((v, i) => {
    target.set(source.subarray(v * VERTEX_STRIDE, (v + 1) * VERTEX_STRIDE), i * VERTEX_STRIDE);
  });

  mesh.vertices = vertices;
  mesh.vertexCount = kept.length;
  mesh.indices = indices;
  return true;
}

export interface WeldStats {
  inputVertices: number;
  outputVertices: number;
  weldedMeshes: number;
}

/**
 * Weld every unindexed mesh and report how much was merged
 */
export function weldMeshes(meshes: Mesh[]): WeldStats {
  let inputVertices = 0;
  let outputVertices = 0;
  let weldedMeshes = 0;
  for (const mesh of meshes) {
    const before = mesh.vertexCount;
    if (weldVertices(mesh)) {
      inputVertices += before;
      outputVertices += mesh.vertexCount;
      weldedMeshes++;
    }
  }
  return { inputVertices, outputVertices, weldedMeshes };
}
