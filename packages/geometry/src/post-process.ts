/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Flag-driven post-processing of an assembled Scene
 */

import {
  LoadOptions,
  PrimitiveMode,
  createLogger,
  hasOption,
  type Logger,
  type Scene,
} from '@meshport/data';
import { generateNormals } from './normal-generator.js';
import { weldMeshes } from './vertex-welder.js';

const defaultLogger = createLogger('PostProcess');

/**
 * Apply the passes selected in `options` to the scene's meshes, in place
 *
 * Indices are generated before normals so welded meshes get smooth normals.
 * With LoadOptions.None the scene is returned exactly as given.
 */
export function postProcess(scene: Scene, options: LoadOptions, log: Logger = defaultLogger): Scene {
  if (hasOption(options, LoadOptions.GenerateIndices)) {
    const stats = weldMeshes(scene.meshes);
    log.info(`Welded ${stats.weldedMeshes} meshes`, {
      operation: 'generateIndices',
      data: { inputVertices: stats.inputVertices, outputVertices: stats.outputVertices },
    });
  }

  if (hasOption(options, LoadOptions.GenerateNormals)) {
    let generated = 0;
    scene.meshes.forEach((mesh, index) => {
      if (mesh.mode !== PrimitiveMode.Triangles) {
        log.warn(`Skipping normal generation for ${PrimitiveMode[mesh.mode]} topology`, {
          operation: 'generateNormals',
          entity: 'meshes',
          index,
        });
        return;
      }
      if (generateNormals(mesh)) generated++;
    });
    log.info(`Generated normals for ${generated} meshes`, { operation: 'generateNormals' });
  }

  return scene;
}
