/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Opaque scene handles
 *
 * A handle owns one NativeScene and everything reachable from it. Hosts
 * never free meshes, materials or images on their own; one release drops
 * the whole scene. Handles are never reused, so a stale handle can only
 * fail, never alias a newer scene.
 */

import type { NativeScene } from './native-scene.js';

export type SceneHandle = number;

export class HandleError extends Error {
  constructor(
    public readonly handle: SceneHandle,
    reason: 'unknown' | 'released'
  ) {
    super(reason === 'released' ? `Scene handle ${handle} was already released` : `Unknown scene handle ${handle}`);
    this.name = 'HandleError';
  }
}

export class SceneHandleTable {
  private readonly scenes = new Map<SceneHandle, NativeScene>();
  private nextHandle: SceneHandle = 1;

  /** Take ownership of a scene */
  open(scene: NativeScene): SceneHandle {
    const handle = this.nextHandle++;
    this.scenes.set(handle, scene);
    return handle;
  }

  /**
   * Borrow the scene behind a live handle
   * @throws HandleError for released or unknown handles
   */
  get(handle: SceneHandle): NativeScene {
    const scene = this.scenes.get(handle);
    if (scene === undefined) {
      throw this.invalid(handle);
    }
    return scene;
  }

  /**
   * Drop a scene and every array it owns
   * @throws HandleError on a second release or an unknown handle
   */
  release(handle: SceneHandle): void {
    const scene = this.scenes.get(handle);
    if (scene === undefined) {
      throw this.invalid(handle);
    }
    this.scenes.delete(handle);

    // Detach children so borrowed references stop reaching the data
    scene.meshes.length = 0;
    scene.materials.length = 0;
    scene.images.length = 0;
    scene.meshCount = 0;
    scene.materialCount = 0;
    scene.imageCount = 0;
  }

  isOpen(handle: SceneHandle): boolean {
    return this.scenes.has(handle);
  }

  /** Number of scenes not yet released */
  get size(): number {
    return this.scenes.size;
  }

  private invalid(handle: SceneHandle): HandleError {
    // Handles are issued in sequence, so any issued handle without a scene was released
    const issued = Number.isInteger(handle) && handle >= 1 && handle < this.nextHandle;
    return new HandleError(handle, issued ? 'released' : 'unknown');
  }
}
