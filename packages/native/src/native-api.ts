/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Entry points for native hosts
 *
 * Hosts pass a path and the raw option bits, get back a handle, read the
 * flat scene through it and release it once.
 */

import { createLogger, parseLoadOptions } from '@meshport/data';
import { importScene, type ImportConfig } from '@meshport/gltf';
import { SceneHandleTable, type SceneHandle } from './handle-table.js';
import { flattenScene, type NativeScene } from './native-scene.js';

const log = createLogger('Native');

const sceneHandles = new SceneHandleTable();

/**
 * Import a glTF file and hand ownership of the flat scene to the caller
 * @throws RangeError for unknown option bits, ImportError when the import fails
 */
export function loadNativeScene(path: string, flags: number, config: ImportConfig = {}): SceneHandle {
  const options = parseLoadOptions(flags);
  const scene = flattenScene(importScene(path, options, config));
  const handle = sceneHandles.open(scene);
  log.debug(`Opened handle ${handle}`, { path, meshes: scene.meshCount }, { operation: 'loadNativeScene' });
  return handle;
}

export function getNativeScene(handle: SceneHandle): NativeScene {
  return sceneHandles.get(handle);
}

/**
 * Release everything owned by a handle
 * @throws HandleError when the handle was already released
 */
export function releaseNativeScene(handle: SceneHandle): void {
  sceneHandles.release(handle);
  log.debug(`Released handle ${handle}`, undefined, { operation: 'releaseNativeScene' });
}

/** Handles opened and not yet released */
export function openNativeSceneCount(): number {
  return sceneHandles.size;
}
