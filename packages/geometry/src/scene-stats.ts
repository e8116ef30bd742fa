/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene statistics - vertex/triangle totals and position bounds
 */

import { PrimitiveMode, VERTEX_STRIDE, type Mesh, type Scene, type Vec3 } from '@meshport/data';

export interface AABB {
  min: Vec3;
  max: Vec3;
}

export interface SceneStats {
  meshCount: number;
  totalVertices: number;
  totalIndices: number;
  totalTriangles: number;
  indexedMeshes: number;
  materialCount: number;
  imageCount: number;
  nodeCount: number;
  /** Null when the scene has no finite positions */
  bounds: AABB | null;
}

/**
 * Triangles drawn by a triangle-list mesh; other topologies count zero
 */
export function triangleCount(mesh: Mesh): number {
  if (mesh.mode !== PrimitiveMode.Triangles) return 0;
  const elements = mesh.indices ? mesh.indices.length : mesh.vertexCount;
  return Math.floor(elements / 3);
}

/**
 * Bounds over all finite positions
 */
export function calculateBounds(meshes: Mesh[]): AABB | null {
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  let found = false;

  for (const mesh of meshes) {
    for (let v = 0; v < mesh.vertexCount; v++) {
      const base = v * VERTEX_STRIDE;
      const x = mesh.vertices[base];
      const y = mesh.vertices[base + 1];
      const z = mesh.vertices[base + 2];
      if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) continue;

      min[0] = Math.min(min[0], x);
      min[1] = Math.min(min[1], y);
      min[2] = Math.min(min[2], z);
      max[0] = Math.max(max[0], x);
      max[1] = Math.max(max[1], y);
      max[2] = Math.max(max[2], z);
      found = true;
    }
  }

  return found ? { min, max } : null;
}

export function getSceneStats(scene: Scene): SceneStats {
  let totalVertices = 0;
  let totalIndices = 0;
  let totalTriangles = 0;
  let indexedMeshes = 0;

  for (const mesh of scene.meshes) {
    totalVertices += mesh.vertexCount;
    totalTriangles += triangleCount(mesh);
    if (mesh.indices) {
      totalIndices += mesh.indices.length;
      indexedMeshes++;
    }
  }

  return {
    meshCount: scene.meshes.length,
    totalVertices,
    totalIndices,
    totalTriangles,
    indexedMeshes,
    materialCount: scene.materials?.length ?? 0,
    imageCount: scene.images?.length ?? 0,
    nodeCount: scene.nodes?.length ?? 0,
    bounds: calculateBounds(scene.meshes),
  };
}
