/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshport/native - flat scene layout and handle ownership for native hosts
 */

export {
  NO_REFERENCE,
  decodeReference,
  encodeReference,
  flattenScene,
  type NativeImage,
  type NativeMaterial,
  type NativeMesh,
  type NativeScene,
} from './native-scene.js';
export { HandleError, SceneHandleTable, type SceneHandle } from './handle-table.js';
export { getNativeScene, loadNativeScene, openNativeSceneCount, releaseNativeScene } from './native-api.js';
