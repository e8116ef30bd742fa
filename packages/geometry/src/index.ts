/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshport/geometry - Scene post-processing
 */

export { postProcess } from './post-process.js';
export { weldVertices, weldMeshes, vertexKey, type WeldStats } from './vertex-welder.js';
export { generateNormals, needsNormals } from './normal-generator.js';
export {
  getSceneStats,
  calculateBounds,
  triangleCount,
  type SceneStats,
  type AABB,
} from './scene-stats.js';
