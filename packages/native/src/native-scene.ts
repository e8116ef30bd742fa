/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Flat scene layout for hosts across a foreign-function boundary
 *
 * Every optional reference is a u32 where NO_REFERENCE means "absent".
 * Arrays are typed arrays paired with explicit element counts, and every
 * array is an owned copy: nothing aliases the Scene it was built from.
 */

import { AlphaMode, ImageDataType, PrimitiveMode, type Image, type Material, type Mesh, type Scene } from '@meshport/data';

/** Largest u32; valid indices are strictly below it */
export const NO_REFERENCE = 0xffffffff;

export interface NativeMesh {
  /** Interleaved vertices, VERTEX_STRIDE floats each */
  vertices: Float32Array;
  vertexCount: number;
  /** Empty when the mesh is unindexed */
  indices: Uint32Array;
  indexCount: number;
  material: number;
  mode: PrimitiveMode;
}

export interface NativeMaterial {
  albedoColor: Float32Array;
  albedoTexture: number;
  normalTexture: number;
  normalScale: number;
  metallic: number;
  metallicTexture: number;
  roughness: number;
  roughnessTexture: number;
  occlusionTexture: number;
  occlusionStrength: number;
  emissiveColor: Float32Array;
  emissiveTexture: number;
  alphaMode: AlphaMode;
  alphaCutoff: number;
  doubleSided: boolean;
}

export interface NativeImage {
  /** UTF-8 path bytes; empty when the image has no path */
  path: Uint8Array;
  pathLength: number;
  dataType: ImageDataType;
  /** Embedded bytes; always empty for file-referenced images */
  data: Uint8Array;
  dataLength: number;
}

export interface NativeScene {
  meshes: NativeMesh[];
  meshCount: number;
  materials: NativeMaterial[];
  materialCount: number;
  images: NativeImage[];
  imageCount: number;
}

/**
 * Encode an optional index as a u32 reference
 * @throws RangeError when the index collides with the sentinel or is not a u32
 */
export function encodeReference(index: number | undefined): number {
  if (index === undefined) return NO_REFERENCE;
  if (!Number.isInteger(index) || index < 0 || index >= NO_REFERENCE) {
    throw new RangeError(`Reference ${index} is outside the u32 index range`);
  }
  return index;
}

export function decodeReference(reference: number): number | undefined {
  return reference === NO_REFERENCE ? undefined : reference;
}

function flattenMesh(mesh: Mesh): NativeMesh {
  const indices = mesh.indices ? mesh.indices.slice() : new Uint32Array(0);
  return {
    vertices: mesh.vertices.slice(),
    vertexCount: mesh.vertexCount,
    indices,
    indexCount: indices.length,
    material: encodeReference(mesh.material),
    mode: mesh.mode,
  };
}

function flattenMaterial(material: Material): NativeMaterial {
  return {
    albedoColor: Float32Array.from(material.albedoColor),
    albedoTexture: encodeReference(material.albedoTexture),
    normalTexture: encodeReference(material.normalTexture),
    normalScale: material.normalScale,
    metallic: material.metallic,
    metallicTexture: encodeReference(material.metallicTexture),
    roughness: material.roughness,
    roughnessTexture: encodeReference(material.roughnessTexture),
    occlusionTexture: encodeReference(material.occlusionTexture),
    occlusionStrength: material.occlusionStrength,
    emissiveColor: Float32Array.from(material.emissiveColor),
    emissiveTexture: encodeReference(material.emissiveTexture),
    alphaMode: material.alphaMode,
    alphaCutoff: material.alphaCutoff,
    doubleSided: material.doubleSided,
  };
}

const encoder = new TextEncoder();

function flattenImage(image: Image): NativeImage {
  const path = image.path !== undefined ? encoder.encode(image.path) : new Uint8Array(0);
  const data = image.data ? image.data.slice() : new Uint8Array(0);
  return {
    path,
    pathLength: path.length,
    dataType: image.dataType ?? ImageDataType.Unknown,
    data,
    dataLength: data.length,
  };
}

/**
 * Copy a Scene into the flat layout
 */
export function flattenScene(scene: Scene): NativeScene {
  const meshes = scene.meshes.map(flattenMesh);
  const materials = (scene.materials ?? []).map(flattenMaterial);
  const images = (scene.images ?? []).map(flattenImage);
  return {
    meshes,
    meshCount: meshes.length,
    materials,
    materialCount: materials.length,
    images,
    imageCount: images.length,
  };
}
